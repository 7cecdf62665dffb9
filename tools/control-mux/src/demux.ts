import {
  ConnectionError,
  DecodeError,
  errorMessage,
  isControlMuxError,
  type ControlMuxError,
} from './errors.js';
import {
  CONTROL_CANCEL_REQUEST,
  CONTROL_REQUEST,
  CONTROL_RESPONSE,
  isEnvelope,
  type Envelope,
} from './protocol-types.js';
import type { Transport } from './transport.js';

export type DecodedLine =
  | { kind: 'skip' }
  | { kind: 'invalid'; error: DecodeError }
  | { kind: 'conversation'; envelope: Envelope }
  | { kind: 'controlRequest'; envelope: Envelope }
  | { kind: 'controlResponse'; envelope: Envelope }
  | { kind: 'controlCancel'; envelope: Envelope };

/**
 * Decode and classify one wire line.
 *
 * Only syntactic failures are errors: a JSON object of any unrecognised shape
 * is still a conversation envelope.
 */
export function decodeLine(line: string): DecodedLine {
  if (line.trim() === '') return { kind: 'skip' };

  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (err) {
    return { kind: 'invalid', error: new DecodeError(line, err) };
  }

  if (!isEnvelope(value)) {
    return { kind: 'invalid', error: new DecodeError(line) };
  }

  switch (value.type) {
    case CONTROL_REQUEST:
      return { kind: 'controlRequest', envelope: value };
    case CONTROL_RESPONSE:
      return { kind: 'controlResponse', envelope: value };
    case CONTROL_CANCEL_REQUEST:
      return { kind: 'controlCancel', envelope: value };
    default:
      return { kind: 'conversation', envelope: value };
  }
}

/**
 * Where the read loop hands each classified line. The session implements
 * this; `conversation` and `error` resolve false once their sink is closed.
 */
export interface DemuxRoutes {
  conversation(envelope: Envelope): Promise<boolean>;
  /** Must not block: the handler starts its own task. */
  controlRequest(envelope: Envelope): void;
  controlResponse(envelope: Envelope): void;
  controlCancel(envelope: Envelope): void;
  error(error: ControlMuxError): Promise<boolean>;
  /** Raw inbound line, before decoding. */
  line?(line: string): void;
  /** Called exactly once when the loop stops, for any reason. */
  end(): void;
}

/**
 * The single reader of the transport. Owns the read loop until EOF, an I/O
 * failure, or cancellation.
 */
export class LineDemultiplexer {
  private readonly transport: Transport;
  private readonly routes: DemuxRoutes;

  constructor(transport: Transport, routes: DemuxRoutes) {
    this.transport = transport;
    this.routes = routes;
  }

  /** Resolves when the loop has stopped. Never rejects. */
  async run(signal: AbortSignal): Promise<void> {
    try {
      for await (const line of this.transport.lines()) {
        if (signal.aborted) break;
        this.routes.line?.(line);

        const keepReading = await this.route(decodeLine(line));
        if (!keepReading) break;
      }
    } catch (err) {
      // A read failure caused by our own shutdown is not worth reporting.
      if (!signal.aborted) {
        await this.routes.error(
          isControlMuxError(err) ? err : new ConnectionError('error reading from transport', errorMessage(err)),
        );
      }
    } finally {
      this.routes.end();
    }
  }

  private async route(decoded: DecodedLine): Promise<boolean> {
    switch (decoded.kind) {
      case 'skip':
        return true;
      case 'invalid':
        return this.routes.error(decoded.error);
      case 'conversation':
        return this.routes.conversation(decoded.envelope);
      case 'controlRequest':
        this.routes.controlRequest(decoded.envelope);
        return true;
      case 'controlResponse':
        this.routes.controlResponse(decoded.envelope);
        return true;
      case 'controlCancel':
        this.routes.controlCancel(decoded.envelope);
        return true;
    }
  }
}
