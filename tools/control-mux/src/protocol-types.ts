// ─── Envelopes ────────────────────────────────────────────────────

/** One decoded JSON object, corresponding to exactly one wire line. */
export type Envelope = Record<string, unknown>;

export const CONTROL_REQUEST = 'control_request';
export const CONTROL_RESPONSE = 'control_response';
export const CONTROL_CANCEL_REQUEST = 'control_cancel_request';

export function isEnvelope(value: unknown): value is Envelope {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── Outbound requests (to the subprocess stdin) ──────────────────

/** One registered hook callback as announced in `initialize`. */
export type HookConfigEntry = { matcher: string | null; callback_id: string };

export type OutboundControlRequestBody =
  | { subtype: 'interrupt' }
  | { subtype: 'initialize'; hooks?: Partial<Record<HookEvent, HookConfigEntry[]>> }
  | { subtype: 'set_permission_mode'; mode: string }
  | { subtype: 'set_model'; model: string | null };

export interface ControlRequest<R = OutboundControlRequestBody> {
  type: 'control_request';
  request_id: string;
  request: R;
}

// ─── Responses ────────────────────────────────────────────────────

export type ControlResponseBody =
  | { subtype: 'success'; request_id: string; response?: Envelope }
  | { subtype: 'error'; request_id: string; error: string };

export interface ControlResponse {
  type: 'control_response';
  response: ControlResponseBody;
}

/** Outcome a dispatcher produces for exactly one inbound request. */
export type ControlOutcome =
  | { ok: true; response: Envelope }
  | { ok: false; error: string };

export function toControlResponse(requestId: string, outcome: ControlOutcome): ControlResponse {
  return {
    type: 'control_response',
    response: outcome.ok
      ? { subtype: 'success', request_id: requestId, response: outcome.response }
      : { subtype: 'error', request_id: requestId, error: outcome.error },
  };
}

// ─── Permissions ──────────────────────────────────────────────────

export type PermissionMode = 'default' | 'acceptEdits' | 'plan' | 'bypassPermissions';

type PermissionBehavior = 'allow' | 'deny' | 'ask';

export type PermissionUpdateDestination =
  | 'userSettings'
  | 'projectSettings'
  | 'localSettings'
  | 'session';

export interface PermissionRuleValue {
  toolName: string;
  ruleContent?: string;
}

export type PermissionUpdateType =
  | 'addRules'
  | 'replaceRules'
  | 'removeRules'
  | 'setMode'
  | 'addDirectories'
  | 'removeDirectories';

export interface PermissionUpdate {
  type: PermissionUpdateType;
  rules?: PermissionRuleValue[];
  behavior?: PermissionBehavior;
  mode?: PermissionMode;
  directories?: string[];
  destination?: PermissionUpdateDestination;
}

export type PermissionResult =
  | { behavior: 'allow'; updatedInput?: Envelope; updatedPermissions?: PermissionUpdate[] }
  | { behavior: 'deny'; message: string; interrupt?: boolean };

export interface ToolPermissionContext {
  /** Aborted when the far side cancels the request or the session closes. */
  signal: AbortSignal;
  suggestions: PermissionUpdate[];
  toolUseId?: string;
  blockedPath?: string;
}

export type CanUseTool = (
  toolName: string,
  input: Envelope,
  context: ToolPermissionContext,
) => PermissionResult | Promise<PermissionResult>;

// ─── Hooks ────────────────────────────────────────────────────────

export const HOOK_EVENTS = [
  'PreToolUse',
  'PostToolUse',
  'UserPromptSubmit',
  'Stop',
  'SubagentStop',
  'PreCompact',
] as const;

export type HookEvent = (typeof HOOK_EVENTS)[number];

export interface HookOutput {
  decision?: 'block';
  systemMessage?: string;
  hookSpecificOutput?: unknown;
}

export interface HookContext {
  signal: AbortSignal;
}

export type HookCallback = (
  input: Envelope,
  toolUseId: string | undefined,
  context: HookContext,
) => HookOutput | undefined | Promise<HookOutput | undefined>;

export interface HookMatcher {
  /** Tool-name pattern the far side matches; omitted matches everything. */
  matcher?: string;
  hooks: HookCallback[];
}

// ─── Side channels (embedded extension servers) ───────────────────

export interface SideChannel {
  /** Absent on channels that are declared but cannot take messages yet. */
  handle?: (message: unknown, context: { signal: AbortSignal }) => unknown | Promise<unknown>;
}
