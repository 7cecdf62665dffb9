import type { ConversationClient } from '../../client.js';
import type { Logger } from '../../logger.js';
import type { Message } from '../../message-parser.js';
import { formatMessage, formatResultSummary } from './format.js';

export interface RunIo {
  write: (text: string) => void;
  logger: Logger;
  /** Print each message as a JSON line instead of text. */
  json?: boolean;
}

/** Log every session error until the error sink closes. */
export async function drainErrors(client: ConversationClient, logger: Logger): Promise<void> {
  for await (const err of client.errors()) {
    logger.warn('Session error', { code: err.code, error: err.message });
  }
}

function printMessage(message: Message, io: RunIo): void {
  if (io.json) {
    io.write(JSON.stringify(message) + '\n');
    return;
  }
  const text = formatMessage(message);
  if (text !== undefined) io.write(text);
  if (message.type === 'result') io.logger.info(formatResultSummary(message));
}

/**
 * Print one response of a connected client whose prompt is already sent.
 * Resolves with the process exit code: 0 for a successful result.
 */
export async function runAsk(client: ConversationClient, io: RunIo): Promise<number> {
  const draining = drainErrors(client, io.logger);
  let exitCode = 1;
  let sawResult = false;

  try {
    for await (const message of client.receiveResponse()) {
      printMessage(message, io);
      if (message.type === 'result') {
        sawResult = true;
        exitCode = message.isError ? 1 : 0;
      }
    }
    if (!sawResult) io.logger.error('Session ended before a result message');
  } finally {
    await client.close();
    await draining;
  }
  return exitCode;
}

/**
 * Interactive loop over input lines. `/interrupt` interrupts the current
 * turn, `/exit` ends the session; anything else is sent as a prompt.
 * Replies print as they arrive, independently of input.
 */
export async function runChat(client: ConversationClient, input: AsyncIterable<string>, io: RunIo): Promise<number> {
  const draining = drainErrors(client, io.logger);
  const printing = (async () => {
    for await (const message of client.receiveMessages()) {
      printMessage(message, io);
    }
  })();

  try {
    for await (const raw of input) {
      const line = raw.trim();
      if (line === '') continue;
      if (line === '/exit') break;
      if (line === '/interrupt') {
        await client.interrupt();
        continue;
      }
      if (!client.isConnected()) {
        io.logger.error('Session is no longer connected');
        return 1;
      }
      await client.sendMessage(line);
    }
  } finally {
    await client.close();
    await Promise.all([printing, draining]);
  }
  return 0;
}
