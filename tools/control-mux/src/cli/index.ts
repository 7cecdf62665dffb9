#!/usr/bin/env node
import { Command } from 'commander';
import { askCommand } from './commands/ask.js';
import { chatCommand } from './commands/chat.js';

const program = new Command();

program
  .name('control-mux')
  .description('Drive the claude CLI over its stream-json control protocol')
  .version('0.1.0')
  .option('--cli-path <path>', 'Path to the claude executable')
  .option('--cwd <path>', 'Working directory for the session')
  .option('--model <model>', 'Model for the session')
  .option('--permission-mode <mode>', 'default, acceptEdits, plan or bypassPermissions')
  .option('--max-turns <n>', 'Maximum conversation turns')
  .option('--allowed-tools <list>', 'Comma-separated tools allowed without prompting')
  .option('--deny-tools <list>', 'Comma-separated tools the permission callback denies')
  .option('--log-dir <path>', 'Write a wire transcript per session to this directory')
  .option('--config <path>', 'YAML config file (default: .control-mux.yaml)')
  .option('--verbose', 'Verbose output', false);

program.addCommand(askCommand);
program.addCommand(chatCommand);

program.parseAsync().catch((err: unknown) => {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
