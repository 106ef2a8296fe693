#!/usr/bin/env node
import { Command } from 'commander';
import { toolsCommand } from '../src/commands/tools.js';
import { validateCommand } from '../src/commands/validate.js';
import { configCommand } from '../src/commands/config.js';
import { serveCommand } from '../src/commands/serve.js';

const program = new Command();

program
  .name('marquee')
  .description('Marquee - validated movie catalog tools over MCP')
  .version('0.1.0');

program.addCommand(toolsCommand);
program.addCommand(validateCommand);
program.addCommand(configCommand);
program.addCommand(serveCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
