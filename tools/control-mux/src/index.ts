// Wire types
export type {
  Envelope,
  HookConfigEntry,
  OutboundControlRequestBody,
  ControlRequest,
  ControlResponseBody,
  ControlResponse,
  ControlOutcome,
  PermissionMode,
  PermissionUpdateDestination,
  PermissionRuleValue,
  PermissionUpdateType,
  PermissionUpdate,
  PermissionResult,
  ToolPermissionContext,
  CanUseTool,
  HookEvent,
  HookOutput,
  HookContext,
  HookCallback,
  HookMatcher,
  SideChannel,
} from './protocol-types.js';
export {
  CONTROL_REQUEST,
  CONTROL_RESPONSE,
  CONTROL_CANCEL_REQUEST,
  HOOK_EVENTS,
  isEnvelope,
  toControlResponse,
} from './protocol-types.js';

// Errors
export {
  ControlMuxError,
  ConnectionError,
  ProcessError,
  CliNotFoundError,
  DecodeError,
  ProtocolError,
  DispatchError,
  CallbackError,
  ControlRequestError,
  TimeoutError,
  MessageParseError,
  SessionClosedError,
  ConfigError,
  isControlMuxError,
  isErrorCode,
  errorMessage,
} from './errors.js';
export type { ControlMuxErrorCode } from './errors.js';

// Multiplexer core
export { Sink } from './sink.js';
export { StreamTransport } from './transport.js';
export type { Transport } from './transport.js';
export { SubprocessTransport } from './subprocess-transport.js';
export type {
  SubprocessTransportOptions,
  SubprocessDeps,
  ChildProcessLike,
  SpawnProcessOptions,
} from './subprocess-transport.js';
export { RequestIdAllocator, PendingRequests } from './correlation.js';
export { CallbackRegistry } from './callback-registry.js';
export type { CallbackRegistryInit } from './callback-registry.js';
export {
  ControlRequestDispatcher,
  serializePermissionResult,
  serializeHookOutput,
  parsePermissionSuggestions,
} from './dispatcher.js';
export { LineDemultiplexer, decodeLine } from './demux.js';
export type { DecodedLine, DemuxRoutes } from './demux.js';
export { ControlSession } from './session.js';
export type { ControlSessionOptions } from './session.js';

// Client
export { ConversationClient, createSubprocessTransport } from './client.js';
export type { SessionOptions } from './client.js';
export { query, querySync } from './query.js';
export { parseMessage, assistantText } from './message-parser.js';
export type {
  Message,
  UserMessage,
  AssistantMessage,
  SystemMessage,
  ResultMessage,
  StreamEvent,
  ContentBlock,
  TextBlock,
  ThinkingBlock,
  ToolUseBlock,
  ToolResultBlock,
} from './message-parser.js';
export { buildCliArgs, findCli } from './cli-args.js';
export type { CliProcessOptions, FindCliDeps } from './cli-args.js';

// Ambient
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerDeps, LogStream, TranscriptLogger, WireDirection } from './logger.js';
export { loadCliConfig, CONFIG_FILE_NAME } from './config.js';
export type { CliConfig, CliOptions, ConfigDeps } from './config.js';
export { setupShutdownHandlers } from './shutdown.js';
export type { ShutdownDeps, ShutdownOptions, Interruptible } from './shutdown.js';
