import * as fs from 'node:fs';
import * as path from 'node:path';

export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  createTranscriptLogger(sessionName: string, logDir: string): TranscriptLogger;
}

export type WireDirection = 'in' | 'out';

/**
 * Raw wire transcript for one session. Inbound lines are prefixed `<< `,
 * outbound lines `>> `.
 */
export interface TranscriptLogger {
  logFilePath: string;
  write(direction: WireDirection, line: string): void;
  /** Resolves once buffered lines are flushed. */
  close(): Promise<void>;
}

/** The part of fs.WriteStream the transcript uses. */
export interface LogStream {
  write(chunk: string): unknown;
  end(callback?: () => void): unknown;
}

/** Seams for tests; each defaults to the process or fs. */
export interface LoggerDeps {
  writeStderr: (data: string) => void;
  now: () => Date;
  createWriteStream: (filePath: string) => LogStream;
}

const defaultDeps: LoggerDeps = {
  writeStderr: (data: string) => process.stderr.write(data),
  now: () => new Date(),
  createWriteStream: (filePath: string) => fs.createWriteStream(filePath, { flags: 'a' }),
};

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
};

/** `2026-02-23T14:30:00.000Z` becomes `20260223T143000Z`. */
function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}

/** ` {"key":value}` for the defined context fields; Error values print as their message. */
function renderContext(context: Record<string, unknown> | undefined): string {
  const fields = Object.entries(context ?? {})
    .filter(([, value]) => value !== undefined)
    .map(([key, value]): [string, unknown] => [key, value instanceof Error ? value.message : value]);
  return fields.length > 0 ? ` ${JSON.stringify(Object.fromEntries(fields))}` : '';
}

function openTranscript(logFilePath: string, stream: LogStream): TranscriptLogger {
  let closing: Promise<void> | undefined;

  return {
    logFilePath,

    write(direction: WireDirection, line: string): void {
      if (closing) return;
      stream.write(`${direction === 'in' ? '<<' : '>>'} ${line}\n`);
    },

    close(): Promise<void> {
      closing ??= new Promise<void>((resolve) => {
        stream.end(() => resolve());
      });
      return closing;
    },
  };
}

/**
 * Logger writing `[timestamp] [LEVEL] message {context}` lines to stderr;
 * stdout stays free for conversation output. Debug lines need `verbose`.
 */
export function createLogger(verbose: boolean, deps: Partial<LoggerDeps> = {}): Logger {
  const { writeStderr, now, createWriteStream } = { ...defaultDeps, ...deps };

  const emitter =
    (level: LogLevel) =>
    (message: string, context?: Record<string, unknown>): void => {
      if (level === 'debug' && !verbose) return;
      writeStderr(`[${now().toISOString()}] [${LEVEL_TAGS[level]}] ${message}${renderContext(context)}\n`);
    };

  return {
    debug: emitter('debug'),
    info: emitter('info'),
    warn: emitter('warn'),
    error: emitter('error'),

    createTranscriptLogger(sessionName: string, logDir: string): TranscriptLogger {
      const logFilePath = path.join(logDir, `${sessionName}-${compactTimestamp(now())}.log`);
      return openTranscript(logFilePath, createWriteStream(logFilePath));
    },
  };
}

const noop = (): void => {};

/** Logger that discards everything. Default for library sessions. */
export const silentLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
  createTranscriptLogger(sessionName: string, logDir: string): TranscriptLogger {
    return { logFilePath: path.join(logDir, `${sessionName}.log`), write: noop, close: async () => undefined };
  },
};
