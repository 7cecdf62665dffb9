import type { Command } from 'commander';
import { ConversationClient } from '../../client.js';
import { loadCliConfig, type CliOptions } from '../../config.js';
import { errorMessage } from '../../errors.js';
import { createLogger, type Logger } from '../../logger.js';
import { setupShutdownHandlers } from '../../shutdown.js';
import { toSessionOptions } from '../logic/session-options.js';

export interface CommandContext {
  client: ConversationClient;
  logger: Logger;
}

/** Resolve configuration from the program-level options and build a client. */
export async function createCommandContext(command: Command, sessionName: string): Promise<CommandContext> {
  const options: CliOptions = command.optsWithGlobals();
  const config = await loadCliConfig(options);
  const logger = createLogger(config.verbose);
  const client = new ConversationClient(toSessionOptions(config, logger, sessionName));

  setupShutdownHandlers({ client, logger });
  logger.debug('Configuration loaded', { cwd: config.cwd, model: config.model, permissionMode: config.permissionMode });
  return { client, logger };
}

export function fail(err: unknown): never {
  process.stderr.write(`Error: ${errorMessage(err)}\n`);
  process.exit(1);
}
