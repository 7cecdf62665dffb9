import { spawn as nodeSpawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import { ConnectionError, ProcessError } from './errors.js';
import { StreamTransport, type Transport } from './transport.js';

const STDERR_TAIL_BYTES = 64 * 1024;
const GRACEFUL_KILL_TIMEOUT_MS = 5000;

/**
 * Options passed to the spawnProcess function.
 */
export interface SpawnProcessOptions {
  cwd: string | undefined;
  env: Record<string, string | undefined>;
  stdio: ['pipe', 'pipe', 'pipe'];
}

/**
 * Minimal child process interface for dependency injection.
 * Node's ChildProcess satisfies it structurally.
 */
export interface ChildProcessLike {
  readonly pid?: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

/**
 * Injectable dependencies for SubprocessTransport.
 */
export interface SubprocessDeps {
  spawnProcess: (command: string, args: string[], options: SpawnProcessOptions) => ChildProcessLike;
  env: Record<string, string | undefined>;
}

const defaultDeps: SubprocessDeps = {
  spawnProcess: (command, args, options) => nodeSpawn(command, args, options),
  env: process.env,
};

export interface SubprocessTransportOptions {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Called with each stderr chunk the process writes. */
  onStderr?: (data: string) => void;
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
  spawnError?: Error;
}

/**
 * Transport backed by a spawned CLI process speaking stream-json on stdio.
 *
 * The read side ends when stdout closes; a non-zero exit then surfaces as a
 * ProcessError carrying the tail of stderr.
 */
export class SubprocessTransport implements Transport {
  private readonly child: ChildProcessLike;
  private readonly stream: StreamTransport;
  private readonly exited: Promise<ExitStatus>;
  private hasExited = false;
  private closing: Promise<void> | null = null;
  private stderrTail = '';

  constructor(options: SubprocessTransportOptions, deps: Partial<SubprocessDeps> = {}) {
    const { spawnProcess, env } = { ...defaultDeps, ...deps };

    this.child = spawnProcess(options.command, options.args, {
      cwd: options.cwd,
      env: { ...env, ...options.env, CLAUDE_CODE_ENTRYPOINT: 'sdk-ts' },
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    // Register exit handlers before touching the pipes so a synchronous
    // spawn failure is still observed.
    this.exited = new Promise<ExitStatus>((resolve) => {
      this.child.once('exit', (code, signal) => {
        this.hasExited = true;
        resolve({ code, signal });
      });
      this.child.once('error', (err) => {
        this.hasExited = true;
        resolve({ code: null, signal: null, spawnError: err });
      });
    });

    const { stdin, stdout, stderr } = this.child;
    if (!stdin || !stdout) {
      throw new ConnectionError('failed to create stdio pipes for CLI process');
    }

    stderr?.on('data', (chunk: Buffer) => {
      const text = chunk.toString();
      this.stderrTail = (this.stderrTail + text).slice(-STDERR_TAIL_BYTES);
      options.onStderr?.(text);
    });

    this.stream = new StreamTransport(stdin, stdout);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isConnected(): boolean {
    return !this.hasExited && this.stream.isConnected();
  }

  write(line: string): Promise<void> {
    return this.stream.write(line);
  }

  async *lines(): AsyncGenerator<string> {
    yield* this.stream.lines();

    if (this.closing) return;
    const status = await this.exited;
    if (this.closing) return;

    if (status.spawnError) {
      throw new ConnectionError('failed to start CLI process', status.spawnError);
    }
    if (status.code !== 0 && (status.code !== null || status.signal !== null)) {
      throw new ProcessError(status.code, status.signal, this.stderrTail);
    }
  }

  /** Idempotent. Ends stdin, then SIGTERM, then SIGKILL after a grace period. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    await this.stream.close();
    if (this.hasExited) return;

    this.child.kill('SIGTERM');
    const exitedInTime = await Promise.race([
      this.exited.then(() => true),
      delay(GRACEFUL_KILL_TIMEOUT_MS).then(() => false),
    ]);
    if (!exitedInTime) {
      this.child.kill('SIGKILL');
    }
  }
}

function delay(ms: number): Promise<void> {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, ms).unref();
  });
}
