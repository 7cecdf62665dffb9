import { buildCliArgs, findCli, type CliProcessOptions } from './cli-args.js';
import { ConnectionError, isErrorCode, type ControlMuxError } from './errors.js';
import { parseMessage, type Message } from './message-parser.js';
import type { Envelope, PermissionMode } from './protocol-types.js';
import { ControlSession, type ControlSessionOptions } from './session.js';
import { SubprocessTransport } from './subprocess-transport.js';
import type { Transport } from './transport.js';

export interface SessionOptions extends CliProcessOptions, ControlSessionOptions {
  /** Called with each chunk the CLI writes to stderr. */
  onStderr?: (data: string) => void;
  /** Replaces spawning the CLI, e.g. with a StreamTransport over existing pipes. */
  transportFactory?: (options: SessionOptions) => Transport;
}

/** Spawn the CLI in stream-json mode for the given options. */
export function createSubprocessTransport(options: SessionOptions): SubprocessTransport {
  const args = buildCliArgs(options, options.canUseTool !== undefined);
  return new SubprocessTransport({
    command: findCli(options.cliPath),
    args,
    cwd: options.cwd,
    env: options.env,
    onStderr: options.onStderr,
  });
}

/**
 * Bidirectional conversation with the CLI: send prompts, read typed
 * messages, interrupt, and answer permission and hook requests through the
 * callbacks in the options.
 */
export class ConversationClient {
  private readonly options: SessionOptions;
  private session: ControlSession | null = null;
  private transport: Transport | null = null;

  constructor(options: SessionOptions = {}) {
    this.options = options;
  }

  /** True once connect() has opened a session, even before initialize completes. */
  hasSession(): boolean {
    return this.session !== null;
  }

  isConnected(): boolean {
    return this.session !== null && !this.session.closed && (this.transport?.isConnected() ?? false);
  }

  /**
   * Start the transport and the session, announce hooks, then send the
   * optional first prompt. On failure everything started is torn down again.
   */
  async connect(prompt?: string): Promise<void> {
    if (this.session) throw new ConnectionError('already connected');

    const factory = this.options.transportFactory ?? createSubprocessTransport;
    const transport = factory(this.options);
    const session = new ControlSession(transport, this.options);
    this.transport = transport;
    this.session = session;

    try {
      session.start();
      await session.initialize();
      if (prompt !== undefined) await session.sendUserMessage(prompt);
    } catch (err) {
      await session.close();
      this.session = null;
      this.transport = null;
      throw err;
    }
  }

  sendMessage(prompt: string, sessionId = 'default'): Promise<void> {
    return this.requireSession().sendUserMessage(prompt, sessionId);
  }

  /**
   * Every typed message until the session ends. Envelopes that fail to parse
   * are reported on errors() and skipped.
   */
  async *receiveMessages(): AsyncGenerator<Message> {
    const session = this.requireSession();
    for await (const envelope of session.messages()) {
      const message = this.tryParse(session, envelope);
      if (message) yield message;
    }
  }

  /** Messages up to and including the next `result`. */
  async *receiveResponse(): AsyncGenerator<Message> {
    for await (const message of this.receiveMessages()) {
      yield message;
      if (message.type === 'result') return;
    }
  }

  errors(): AsyncIterable<ControlMuxError> {
    return this.requireSession().errors();
  }

  async interrupt(): Promise<void> {
    await this.requireSession().interrupt();
  }

  async setPermissionMode(mode: PermissionMode): Promise<void> {
    await this.requireSession().setPermissionMode(mode);
  }

  async setModel(model: string | null): Promise<void> {
    await this.requireSession().setModel(model);
  }

  /** Idempotent; a client that never connected closes trivially. */
  async close(): Promise<void> {
    await this.session?.close();
  }

  private tryParse(session: ControlSession, envelope: Envelope): Message | undefined {
    try {
      return parseMessage(envelope);
    } catch (err) {
      if (!isErrorCode(err, 'MESSAGE_PARSE')) throw err;
      // Not awaited: a full error sink must not stall message delivery.
      void session.report(err);
      return undefined;
    }
  }

  private requireSession(): ControlSession {
    if (!this.session) {
      throw new ConnectionError('not connected, call connect() first');
    }
    return this.session;
  }
}
