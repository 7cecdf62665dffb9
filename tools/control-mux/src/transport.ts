import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { ConnectionError } from './errors.js';

/**
 * Line-oriented duplex channel to the subprocess.
 *
 * The multiplexer frames everything as newline-delimited JSON and treats the
 * transport as opaque: it writes whole lines and reads whole lines.
 */
export interface Transport {
  /** Write one line; the transport appends the newline. Concurrent calls never interleave. */
  write(line: string): Promise<void>;

  /** The single stream of inbound lines. Ends on EOF or close; throws on I/O failure. */
  lines(): AsyncIterable<string>;

  /** Idempotent. Unblocks a pending read. */
  close(): Promise<void>;

  isConnected(): boolean;
}

/**
 * Transport over an already-open Writable/Readable pair (a child's stdio, or
 * PassThrough streams in tests).
 */
export class StreamTransport implements Transport {
  private readonly stdin: Writable;
  private readonly stdout: Readable;
  private rl: Interface | null = null;
  private writeTail: Promise<void> = Promise.resolve();
  private ioError: unknown = undefined;
  private connected = true;
  private reading = false;

  constructor(stdin: Writable, stdout: Readable) {
    this.stdin = stdin;
    this.stdout = stdout;

    this.stdin.on('error', (err: Error) => {
      this.connected = false;
      this.ioError ??= err;
    });
    this.stdout.on('error', (err: Error) => {
      this.ioError ??= err;
      this.rl?.close();
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  write(line: string): Promise<void> {
    const run = this.writeTail.then(() => this.writeNow(line));
    // Keep the chain alive for later writers; the caller still sees the rejection.
    this.writeTail = run.catch(() => undefined);
    return run;
  }

  async *lines(): AsyncGenerator<string> {
    if (this.reading) throw new Error('StreamTransport supports a single reader');
    this.reading = true;
    if (!this.connected) return;

    const rl = createInterface({ input: this.stdout, crlfDelay: Infinity });
    this.rl = rl;

    for await (const line of rl) {
      yield line;
    }

    if (this.ioError !== undefined && this.connected) {
      throw new ConnectionError('error reading from transport', this.ioError);
    }
  }

  async close(): Promise<void> {
    if (!this.connected) {
      this.rl?.close();
      return;
    }
    this.connected = false;
    this.rl?.close();
    await this.writeTail;
    if (!this.stdin.writableEnded) this.stdin.end();
  }

  private writeNow(line: string): Promise<void> {
    if (!this.connected) {
      return Promise.reject(new ConnectionError('transport not connected'));
    }
    return new Promise<void>((resolve, reject) => {
      this.stdin.write(line + '\n', (err) => {
        if (err) {
          this.connected = false;
          reject(new ConnectionError('failed to write to transport', err));
        } else {
          resolve();
        }
      });
    });
  }
}
