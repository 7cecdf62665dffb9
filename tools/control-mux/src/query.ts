import { ConversationClient, type SessionOptions } from './client.js';
import { ConnectionError, type ControlMuxError } from './errors.js';
import type { Message } from './message-parser.js';

/** Drain a client's error sink, keeping the last error that ended the session. */
async function lastFatalError(client: ConversationClient): Promise<ControlMuxError | undefined> {
  let fatal: ControlMuxError | undefined;
  for await (const err of client.errors()) {
    if (err.code === 'CONNECTION' || err.code === 'PROCESS_EXITED') fatal = err;
  }
  return fatal;
}

/**
 * One-shot conversation: send `prompt`, yield every typed message up to and
 * including the `result`, then close the session.
 *
 * Errors are drained while messages are read, so a burst of bad lines never
 * stalls the read loop. If the session ends before a result arrives, the
 * last connection or process failure it reported is thrown.
 */
export async function* query(prompt: string, options: SessionOptions = {}): AsyncGenerator<Message> {
  const client = new ConversationClient(options);
  const connecting = client.connect(prompt);
  // connect() opens the session before its first await.
  const fatal = client.hasSession() ? lastFatalError(client) : Promise.resolve(undefined);

  try {
    await connecting;
  } catch (err) {
    // A failed connect closes the session, which ends the drain.
    await fatal;
    throw err;
  }

  try {
    for await (const message of client.receiveResponse()) {
      yield message;
      if (message.type === 'result') return;
    }

    // The message stream ends only once both sinks are closed.
    throw (await fatal) ?? new ConnectionError('session ended before a result message');
  } finally {
    await client.close();
    await fatal;
  }
}

/** Collect every message of a one-shot query. */
export async function querySync(prompt: string, options: SessionOptions = {}): Promise<Message[]> {
  const messages: Message[] = [];
  for await (const message of query(prompt, options)) {
    messages.push(message);
  }
  return messages;
}
