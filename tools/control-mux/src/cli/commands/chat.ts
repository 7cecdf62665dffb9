import { Command } from 'commander';
import { createInterface } from 'node:readline';
import { runChat } from '../logic/run.js';
import { createCommandContext, fail } from '../utils/setup.js';

export const chatCommand = new Command('chat')
  .description('Interactive session: one prompt per line, /interrupt, /exit')
  .option('--json', 'Print each message as a JSON line', false)
  .action(async (options: { json: boolean }, command: Command) => {
    try {
      const { client, logger } = await createCommandContext(command, 'chat');
      await client.connect();
      logger.info('Connected. Type a prompt, /interrupt or /exit.');

      const input = createInterface({ input: process.stdin, crlfDelay: Infinity });
      try {
        process.exitCode = await runChat(client, input, {
          write: (text) => process.stdout.write(text),
          logger,
          json: options.json,
        });
      } finally {
        input.close();
      }
    } catch (err) {
      fail(err);
    }
  });
