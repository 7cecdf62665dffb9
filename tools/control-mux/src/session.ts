import { CallbackRegistry, type CallbackRegistryInit } from './callback-registry.js';
import { PendingRequests, RequestIdAllocator } from './correlation.js';
import { LineDemultiplexer } from './demux.js';
import { ControlRequestDispatcher } from './dispatcher.js';
import {
  ConnectionError,
  ProtocolError,
  SessionClosedError,
  errorMessage,
  type ControlMuxError,
} from './errors.js';
import { silentLogger, type Logger, type TranscriptLogger } from './logger.js';
import {
  isEnvelope,
  toControlResponse,
  type ControlRequest,
  type ControlResponse,
  type Envelope,
  type OutboundControlRequestBody,
  type PermissionMode,
} from './protocol-types.js';
import { Sink } from './sink.js';
import type { Transport } from './transport.js';

const DEFAULT_MESSAGE_BUFFER = 100;
const DEFAULT_ERROR_BUFFER = 10;
const DEFAULT_CONTROL_TIMEOUT_MS = 60000;
const DEFAULT_CLOSE_GRACE_MS = 1000;

export interface ControlSessionOptions extends CallbackRegistryInit {
  /** Message sink capacity before the read loop blocks. */
  messageBufferSize?: number;
  errorBufferSize?: number;
  /** Default timeout for awaited outbound requests; 0 disables it. */
  controlTimeoutMs?: number;
  /** How long close() waits for in-flight callbacks before abandoning them. */
  closeGraceMs?: number;
  logger?: Logger;
  transcript?: TranscriptLogger;
}

interface InflightRequest {
  controller: AbortController;
  task: Promise<void>;
}

/**
 * One control-protocol session over a transport.
 *
 * Owns the read loop, the callback registry, both sinks and the outbound
 * correlation state. Inbound control requests run as independent tasks;
 * their responses are written in completion order, correlated only by
 * request id.
 */
export class ControlSession {
  readonly registry: CallbackRegistry;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly transcript: TranscriptLogger | undefined;
  private readonly messageSink: Sink<Envelope>;
  private readonly errorSink: Sink<ControlMuxError>;
  private readonly dispatcher: ControlRequestDispatcher;
  private readonly ids = new RequestIdAllocator();
  private readonly pending = new PendingRequests();
  /** Fire-and-forget request ids whose replies are absorbed without a waiter. */
  private readonly unawaited = new Map<string, string>();
  private readonly inflight = new Map<string, InflightRequest>();
  private readonly abortController = new AbortController();
  private readonly controlTimeoutMs: number;
  private readonly closeGraceMs: number;
  private readLoop: Promise<void> | null = null;
  private closing: Promise<void> | null = null;

  constructor(transport: Transport, options: ControlSessionOptions = {}) {
    this.transport = transport;
    this.logger = options.logger ?? silentLogger;
    this.transcript = options.transcript;
    this.registry = CallbackRegistry.from(options);
    this.dispatcher = new ControlRequestDispatcher({ registry: this.registry, logger: this.logger });
    this.messageSink = new Sink(options.messageBufferSize ?? DEFAULT_MESSAGE_BUFFER);
    this.errorSink = new Sink(options.errorBufferSize ?? DEFAULT_ERROR_BUFFER);
    this.controlTimeoutMs = options.controlTimeoutMs ?? DEFAULT_CONTROL_TIMEOUT_MS;
    this.closeGraceMs = options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS;
  }

  /** Aborted once close() begins. */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get closed(): boolean {
    return this.closing !== null;
  }

  /** Number of inbound control requests still being handled. */
  get inflightCount(): number {
    return this.inflight.size;
  }

  /** Begin reading from the transport. Calling it again is a no-op. */
  start(): void {
    if (this.closing) throw new SessionClosedError();
    if (this.readLoop) return;

    const demux = new LineDemultiplexer(this.transport, {
      conversation: (envelope) => this.messageSink.push(envelope),
      controlRequest: (envelope) => this.startControlTask(envelope),
      controlResponse: (envelope) => this.settleResponse(envelope),
      controlCancel: (envelope) => this.cancelControlTask(envelope),
      error: (error) => this.report(error),
      line: (line) => this.transcript?.write('in', line),
      end: () => this.onReadLoopEnd(),
    });
    this.readLoop = demux.run(this.signal);
  }

  /** Conversation envelopes in wire order; ends when the session ends. */
  messages(): AsyncIterable<Envelope> {
    return this.messageSink;
  }

  /** Decode, protocol and connection errors in occurrence order. */
  errors(): AsyncIterable<ControlMuxError> {
    return this.errorSink;
  }

  // ── Outbound control requests ─────────────────────────────────

  /** Write a control request without waiting for its reply. Resolves with the request id. */
  async issue(request: OutboundControlRequestBody): Promise<string> {
    this.assertOpen();
    const requestId = this.ids.next();
    this.unawaited.set(requestId, request.subtype);
    try {
      await this.writeEnvelope(controlRequest(requestId, request));
    } catch (err) {
      this.unawaited.delete(requestId);
      throw err;
    }
    return requestId;
  }

  /** Write a control request and wait for the correlated success payload. */
  async request(
    request: OutboundControlRequestBody,
    opts: { timeoutMs?: number } = {},
  ): Promise<Envelope> {
    this.assertOpen();
    const requestId = this.ids.next();
    const reply = this.pending.register(requestId, request.subtype, opts.timeoutMs ?? this.controlTimeoutMs);

    try {
      await this.writeEnvelope(controlRequest(requestId, request));
    } catch (err) {
      this.pending.reject(requestId, err instanceof Error ? err : new ConnectionError(errorMessage(err)));
    }
    return reply;
  }

  interrupt(): Promise<string> {
    return this.issue({ subtype: 'interrupt' });
  }

  /** Announce the registered hooks to the far side and wait for its acknowledgement. */
  initialize(): Promise<Envelope> {
    return this.request({ subtype: 'initialize', hooks: this.registry.initializeHooks() });
  }

  setPermissionMode(mode: PermissionMode): Promise<Envelope> {
    return this.request({ subtype: 'set_permission_mode', mode });
  }

  setModel(model: string | null): Promise<Envelope> {
    return this.request({ subtype: 'set_model', model });
  }

  // ── Conversation output ───────────────────────────────────────

  sendUserMessage(content: string | unknown[], sessionId = 'default'): Promise<void> {
    return this.sendRaw({
      type: 'user',
      message: { role: 'user', content },
      parent_tool_use_id: null,
      session_id: sessionId,
    });
  }

  async sendRaw(envelope: Envelope): Promise<void> {
    this.assertOpen();
    await this.writeEnvelope(envelope);
  }

  // ── Teardown ──────────────────────────────────────────────────

  /**
   * Idempotent: every call returns the same promise. Stops new dispatch and
   * ends both sinks, gives in-flight callbacks `closeGraceMs` to write their
   * responses, then closes the transport.
   */
  close(): Promise<void> {
    this.closing ??= this.teardown();
    return this.closing;
  }

  private async teardown(): Promise<void> {
    this.logger.debug('Closing control session', { inflight: this.inflight.size, pending: this.pending.size });
    this.abortController.abort();
    this.pending.rejectAll(() => new SessionClosedError());

    // Unblocks a read loop waiting on a full sink.
    this.messageSink.close();
    this.errorSink.close();

    const tasks = [...this.inflight.values()].map((entry) => entry.task);
    if (tasks.length > 0) {
      const settled = await Promise.race([
        Promise.allSettled(tasks).then(() => true),
        delay(this.closeGraceMs).then(() => false),
      ]);
      if (!settled) {
        this.logger.warn('Abandoning in-flight control requests', { requestIds: [...this.inflight.keys()] });
      }
    }

    try {
      await this.transport.close();
    } catch (err) {
      this.logger.warn('Error closing transport', { error: errorMessage(err) });
    }
    await this.readLoop;
    await this.transcript?.close();
  }

  // ── Inbound handling ──────────────────────────────────────────

  private startControlTask(envelope: Envelope): void {
    const requestId = envelope.request_id;
    if (typeof requestId !== 'string' || requestId === '') {
      void this.report(new ProtocolError('control request without request_id'));
      return;
    }
    if (this.signal.aborted) return;

    if (this.inflight.has(requestId)) {
      void this.report(new ProtocolError(`duplicate request id: ${requestId}`, requestId));
      return;
    }

    const controller = new AbortController();
    const abortOnClose = (): void => controller.abort();
    this.signal.addEventListener('abort', abortOnClose, { once: true });

    const task = this.dispatcher
      .dispatch(requestId, envelope.request, controller.signal)
      .then((outcome) => this.writeEnvelope(toControlResponse(requestId, outcome)))
      .catch((err: unknown) => {
        // Losing the race with close() is expected; anything else is worth a warning.
        const context = { requestId, error: errorMessage(err) };
        if (this.signal.aborted) {
          this.logger.debug('Dropped control response after close', context);
        } else {
          this.logger.warn('Failed to write control response', context);
        }
      })
      .finally(() => {
        this.signal.removeEventListener('abort', abortOnClose);
        this.inflight.delete(requestId);
      });

    this.inflight.set(requestId, { controller, task });
  }

  private cancelControlTask(envelope: Envelope): void {
    const requestId = envelope.request_id;
    if (typeof requestId !== 'string') return;
    const entry = this.inflight.get(requestId);
    if (!entry) {
      this.logger.debug('Cancel for unknown control request', { requestId });
      return;
    }
    entry.controller.abort();
  }

  private settleResponse(envelope: Envelope): void {
    const body = envelope.response;
    if (!isEnvelope(body) || typeof body.request_id !== 'string') {
      void this.report(new ProtocolError('malformed control_response'));
      return;
    }

    const requestId = body.request_id;
    const isError = body.subtype === 'error';
    const errorText = typeof body.error === 'string' ? body.error : 'unknown error';

    const fireAndForget = this.unawaited.get(requestId);
    if (fireAndForget !== undefined) {
      this.unawaited.delete(requestId);
      if (isError) {
        this.logger.warn('Control request rejected', { requestId, subtype: fireAndForget, error: errorText });
      }
      return;
    }

    const matched = isError
      ? this.pending.fail(requestId, errorText)
      : this.pending.resolve(requestId, isEnvelope(body.response) ? body.response : {});
    if (!matched) {
      void this.report(new ProtocolError(`control response for unknown request: ${requestId}`, requestId));
    }
  }

  /**
   * Push an error onto the error sink. Resolves false once the sink is
   * closed; waits while the sink is full.
   */
  report(error: ControlMuxError): Promise<boolean> {
    this.logger.debug('Session error', { code: error.code, error: error.message });
    return this.errorSink.push(error);
  }

  private onReadLoopEnd(): void {
    this.logger.debug('Read loop ended');
    this.pending.rejectAll(() =>
      this.signal.aborted ? new SessionClosedError() : new ConnectionError('transport closed'),
    );
    this.messageSink.close();
    this.errorSink.close();
  }

  private async writeEnvelope(envelope: Envelope | ControlRequest | ControlResponse): Promise<void> {
    const line = JSON.stringify(envelope);
    this.transcript?.write('out', line);
    await this.transport.write(line);
  }

  private assertOpen(): void {
    if (this.closing) throw new SessionClosedError();
  }
}

function controlRequest(requestId: string, request: OutboundControlRequestBody): ControlRequest {
  return { type: 'control_request', request_id: requestId, request };
}

function delay(ms: number): Promise<void> {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, ms).unref();
  });
}
