#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { serveCommand } from './commands/serve.js';
import { sessionCommand } from './commands/session.js';
import { presetsCommand } from './commands/presets.js';
import { chatCommand } from './commands/chat.js';

const program = new Command();

program
  .name('imgchat')
  .description('Conversational marketing image generation over WebSocket')
  .version('0.1.0');

program.addCommand(serveCommand);
program.addCommand(sessionCommand);
program.addCommand(presetsCommand);
program.addCommand(chatCommand);

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.yellow('Run `imgchat --help` for available commands'));
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
