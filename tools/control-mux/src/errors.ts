/**
 * Error hierarchy for the control multiplexer.
 *
 * Every error carries a `.code` discriminant so consumers draining the error
 * sink can switch on it:
 *
 * ```ts
 * for await (const err of session.errors()) {
 *   switch (err.code) {
 *     case 'DECODE':     logger.warn('Skipped line', { line: err.line }); break;
 *     case 'CONNECTION': logger.error('Lost subprocess', { error: err.message }); break;
 *   }
 * }
 * ```
 */

export type ControlMuxErrorCode =
  | 'CONNECTION'
  | 'PROCESS_EXITED'
  | 'CLI_NOT_FOUND'
  | 'DECODE'
  | 'PROTOCOL'
  | 'DISPATCH'
  | 'CALLBACK'
  | 'CONTROL_REQUEST'
  | 'TIMEOUT'
  | 'MESSAGE_PARSE'
  | 'SESSION_CLOSED'
  | 'CONFIG';

export class ControlMuxError extends Error {
  readonly code: ControlMuxErrorCode;

  constructor(code: ControlMuxErrorCode, message: string, opts?: { cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.code = code;
    this.name = 'ControlMuxError';
  }
}

/** Transport unavailable or broken. */
export class ConnectionError extends ControlMuxError {
  declare readonly code: 'CONNECTION';

  constructor(message: string, cause?: unknown) {
    super('CONNECTION', cause !== undefined ? `${message}: ${errorMessage(cause)}` : message, { cause });
    this.name = 'ConnectionError';
  }
}

/** The subprocess exited with a non-zero code or was killed. */
export class ProcessError extends ControlMuxError {
  declare readonly code: 'PROCESS_EXITED';
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly stderr: string;

  constructor(exitCode: number | null, signal: string | null, stderr: string) {
    const base = `CLI process exited (code=${exitCode}, signal=${signal})`;
    super('PROCESS_EXITED', stderr ? `${base}: ${stderr.trim()}` : base);
    this.name = 'ProcessError';
    this.exitCode = exitCode;
    this.signal = signal;
    this.stderr = stderr;
  }
}

export class CliNotFoundError extends ControlMuxError {
  declare readonly code: 'CLI_NOT_FOUND';
  readonly searched: string[];

  constructor(searched: string[]) {
    super(
      'CLI_NOT_FOUND',
      `claude CLI not found. Searched PATH and: ${searched.join(', ')}. Pass cliPath or set CONTROL_MUX_CLI_PATH.`,
    );
    this.name = 'CliNotFoundError';
    this.searched = searched;
  }
}

/** A wire line that is not a single JSON object. Non-fatal. */
export class DecodeError extends ControlMuxError {
  declare readonly code: 'DECODE';
  readonly line: string;

  constructor(line: string, cause?: unknown) {
    const reason = cause !== undefined ? errorMessage(cause) : 'not a JSON object';
    super('DECODE', `failed to decode line: ${reason}`, { cause });
    this.name = 'DecodeError';
    this.line = line;
  }
}

/** Correlation broken: unmatched response, reused id, malformed control envelope. */
export class ProtocolError extends ControlMuxError {
  declare readonly code: 'PROTOCOL';
  readonly requestId: string | undefined;

  constructor(message: string, requestId?: string) {
    super('PROTOCOL', message);
    this.name = 'ProtocolError';
    this.requestId = requestId;
  }
}

/** No route for an inbound control request. Becomes a Failure response. */
export class DispatchError extends ControlMuxError {
  declare readonly code: 'DISPATCH';

  constructor(message: string) {
    super('DISPATCH', message);
    this.name = 'DispatchError';
  }
}

/** A consumer-supplied callback threw or rejected. Becomes a Failure response. */
export class CallbackError extends ControlMuxError {
  declare readonly code: 'CALLBACK';
  readonly subtype: string;

  constructor(subtype: string, cause: unknown) {
    super('CALLBACK', errorMessage(cause), { cause });
    this.name = 'CallbackError';
    this.subtype = subtype;
  }
}

/** The far side answered one of our requests with an error response. */
export class ControlRequestError extends ControlMuxError {
  declare readonly code: 'CONTROL_REQUEST';
  readonly subtype: string;
  readonly requestId: string;

  constructor(subtype: string, requestId: string, message: string) {
    super('CONTROL_REQUEST', `${subtype} request ${requestId} failed: ${message}`);
    this.name = 'ControlRequestError';
    this.subtype = subtype;
    this.requestId = requestId;
  }
}

export class TimeoutError extends ControlMuxError {
  declare readonly code: 'TIMEOUT';
  readonly subtype: string;
  readonly timeoutMs: number;

  constructor(subtype: string, timeoutMs: number) {
    super('TIMEOUT', `${subtype}: timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.subtype = subtype;
    this.timeoutMs = timeoutMs;
  }
}

/** A conversation envelope does not match the shape of its `type`. */
export class MessageParseError extends ControlMuxError {
  declare readonly code: 'MESSAGE_PARSE';
  readonly data: unknown;

  constructor(message: string, data: unknown) {
    super('MESSAGE_PARSE', message);
    this.name = 'MessageParseError';
    this.data = data;
  }
}

export class SessionClosedError extends ControlMuxError {
  declare readonly code: 'SESSION_CLOSED';

  constructor(message = 'Session is closed') {
    super('SESSION_CLOSED', message);
    this.name = 'SessionClosedError';
  }
}

export class ConfigError extends ControlMuxError {
  declare readonly code: 'CONFIG';

  constructor(message: string) {
    super('CONFIG', message);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isControlMuxError(err: unknown): err is ControlMuxError {
  return err instanceof ControlMuxError;
}

export function isErrorCode<C extends ControlMuxErrorCode>(
  err: unknown,
  code: C,
): err is ControlMuxError & { code: C } {
  return err instanceof ControlMuxError && err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
