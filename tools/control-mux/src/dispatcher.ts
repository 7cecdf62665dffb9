import { z } from 'zod';
import type { CallbackRegistry } from './callback-registry.js';
import { CallbackError, DispatchError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import {
  isEnvelope,
  type ControlOutcome,
  type Envelope,
  type HookOutput,
  type PermissionResult,
  type PermissionUpdate,
} from './protocol-types.js';

// ─── Inbound request schemas ──────────────────────────────────────

/** A missing or null `input` is an empty object. */
const inputSchema = z
  .record(z.unknown())
  .nullish()
  .transform((input) => input ?? {});

const permissionUpdateSchema = z.object({
  type: z.enum([
    'addRules',
    'replaceRules',
    'removeRules',
    'setMode',
    'addDirectories',
    'removeDirectories',
  ]),
  rules: z
    .array(z.object({ toolName: z.string(), ruleContent: z.string().optional() }))
    .optional(),
  behavior: z.enum(['allow', 'deny', 'ask']).optional(),
  mode: z.enum(['default', 'acceptEdits', 'plan', 'bypassPermissions']).optional(),
  directories: z.array(z.string()).optional(),
  destination: z.enum(['userSettings', 'projectSettings', 'localSettings', 'session']).optional(),
});

const canUseToolSchema = z.object({
  subtype: z.literal('can_use_tool'),
  tool_name: z.string(),
  input: inputSchema,
  tool_use_id: z.string().nullish(),
  permission_suggestions: z.array(z.unknown()).nullish(),
  blocked_path: z.string().nullish(),
});

const hookCallbackSchema = z.object({
  subtype: z.literal('hook_callback'),
  callback_id: z.string(),
  input: inputSchema,
  tool_use_id: z.string().nullish(),
});

const mcpMessageSchema = z.object({
  subtype: z.literal('mcp_message'),
  server_name: z.string(),
  message: z.unknown(),
});

function parseRequest<T extends z.ZodTypeAny>(schema: T, request: Envelope, subtype: string): z.infer<T> {
  const result = schema.safeParse(request);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'request'}: ${i.message}`);
    throw new DispatchError(`invalid ${subtype} request: ${issues.join(', ')}`);
  }
  return result.data;
}

/**
 * Keep the suggestions that match the PermissionUpdate shape; the rest are
 * dropped rather than failing the whole permission check.
 */
export function parsePermissionSuggestions(raw: unknown[] | null | undefined): PermissionUpdate[] {
  const suggestions: PermissionUpdate[] = [];
  for (const entry of raw ?? []) {
    const parsed = permissionUpdateSchema.safeParse(entry);
    if (parsed.success) suggestions.push(parsed.data);
  }
  return suggestions;
}

// ─── Serialization ────────────────────────────────────────────────

function assertNever(value: never): never {
  throw new Error(`unexpected permission result: ${JSON.stringify(value)}`);
}

/** Exhaustive mapping of a permission decision to its wire payload. */
export function serializePermissionResult(result: PermissionResult): Envelope {
  switch (result.behavior) {
    case 'allow': {
      const payload: Envelope = { behavior: 'allow' };
      if (result.updatedInput !== undefined) payload.updated_input = result.updatedInput;
      if (result.updatedPermissions !== undefined) {
        payload.updated_permissions = result.updatedPermissions;
      }
      return payload;
    }
    case 'deny': {
      const payload: Envelope = { behavior: 'deny', message: result.message };
      if (result.interrupt) payload.interrupt = true;
      return payload;
    }
    default:
      return assertNever(result);
  }
}

export function serializeHookOutput(output: HookOutput | undefined): Envelope {
  const payload: Envelope = {};
  if (!output) return payload;
  if (output.decision !== undefined) payload.decision = output.decision;
  if (output.systemMessage !== undefined) payload.systemMessage = output.systemMessage;
  if (output.hookSpecificOutput !== undefined) payload.hookSpecificOutput = output.hookSpecificOutput;
  return payload;
}

// ─── Dispatcher ───────────────────────────────────────────────────

export interface DispatcherOptions {
  registry: CallbackRegistry;
  logger?: Logger;
}

/**
 * Routes inbound control requests to the registered callbacks.
 *
 * `dispatch` never rejects: every path, including unknown subtypes and
 * throwing callbacks, ends in exactly one ControlOutcome that the session
 * writes back under the same request id.
 */
export class ControlRequestDispatcher {
  private readonly registry: CallbackRegistry;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? silentLogger;
  }

  async dispatch(requestId: string, request: unknown, signal: AbortSignal): Promise<ControlOutcome> {
    const subtype = isEnvelope(request) && typeof request.subtype === 'string' ? request.subtype : undefined;
    this.logger.debug('Control request received', { requestId, subtype });

    let outcome: ControlOutcome;
    try {
      outcome = { ok: true, response: await this.route(request, signal) };
    } catch (err) {
      outcome = { ok: false, error: errorMessage(err) };
      this.logger.debug('Control request failed', { requestId, subtype, error: outcome.error });
    }

    this.logger.debug('Control request responded', { requestId, subtype, ok: outcome.ok });
    return outcome;
  }

  private async route(request: unknown, signal: AbortSignal): Promise<Envelope> {
    if (!isEnvelope(request)) {
      throw new DispatchError('invalid control request');
    }

    const subtype = request.subtype;
    switch (subtype) {
      case 'can_use_tool':
        return this.handleCanUseTool(request, signal);
      case 'hook_callback':
        return this.handleHookCallback(parseRequest(hookCallbackSchema, request, 'hook_callback'), signal);
      case 'mcp_message':
        return this.handleSideChannel(parseRequest(mcpMessageSchema, request, 'mcp_message'), signal);
      default:
        throw new DispatchError(`unsupported control request subtype: ${String(subtype)}`);
    }
  }

  private async handleCanUseTool(raw: Envelope, signal: AbortSignal): Promise<Envelope> {
    const callback = this.registry.permissionCallback;
    // Unconfigured sessions allow everything, whatever the request carries.
    if (!callback) return { behavior: 'allow' };

    const request = parseRequest(canUseToolSchema, raw, 'can_use_tool');

    let result: PermissionResult;
    try {
      result = await callback(request.tool_name, request.input, {
        signal,
        suggestions: parsePermissionSuggestions(request.permission_suggestions),
        toolUseId: request.tool_use_id ?? undefined,
        blockedPath: request.blocked_path ?? undefined,
      });
    } catch (err) {
      throw new CallbackError('can_use_tool', err);
    }

    try {
      return serializePermissionResult(result);
    } catch (err) {
      throw new CallbackError('can_use_tool', err);
    }
  }

  private async handleHookCallback(
    request: z.infer<typeof hookCallbackSchema>,
    signal: AbortSignal,
  ): Promise<Envelope> {
    const callback = this.registry.hookCallback(request.callback_id);
    if (!callback) {
      throw new DispatchError(`callback not found: ${request.callback_id}`);
    }

    try {
      const output = await callback(request.input, request.tool_use_id ?? undefined, { signal });
      return serializeHookOutput(output);
    } catch (err) {
      throw new CallbackError('hook_callback', err);
    }
  }

  private async handleSideChannel(
    request: z.infer<typeof mcpMessageSchema>,
    signal: AbortSignal,
  ): Promise<Envelope> {
    const channel = this.registry.sideChannel(request.server_name);
    if (!channel) {
      throw new DispatchError(`side channel not found: ${request.server_name}`);
    }
    if (!channel.handle) {
      throw new DispatchError(`side channel ${request.server_name}: message handling not implemented`);
    }

    try {
      const result = await channel.handle(request.message, { signal });
      return { mcp_response: result };
    } catch (err) {
      throw new CallbackError('mcp_message', err);
    }
  }
}
