import { Command } from 'commander';
import { runAsk } from '../logic/run.js';
import { createCommandContext, fail } from '../utils/setup.js';

export const askCommand = new Command('ask')
  .description('Send one prompt and print the reply')
  .argument('<prompt...>', 'Prompt text')
  .option('--json', 'Print each message as a JSON line', false)
  .action(async (words: string[], options: { json: boolean }, command: Command) => {
    try {
      const { client, logger } = await createCommandContext(command, 'ask');
      await client.connect(words.join(' '));
      const exitCode = await runAsk(client, {
        write: (text) => process.stdout.write(text),
        logger,
        json: options.json,
      });
      process.exitCode = exitCode;
    } catch (err) {
      fail(err);
    }
  });
