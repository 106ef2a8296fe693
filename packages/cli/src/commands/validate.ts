import { Command } from 'commander';
import { ToolValidator } from '@marquee/core';
import { setupRuntime } from '../setup.js';
import { formatValidationResult } from '../output/formatter.js';

function parseArgumentBag(text: string): Record<string, unknown> | string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return `--args is not valid JSON: ${err instanceof Error ? err.message : String(err)}`;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return '--args must be a JSON object';
  }
  return Object.fromEntries(Object.entries(parsed));
}

export const validateCommand = new Command('validate')
  .description('Validate an argument bag against a tool schema')
  .argument('<tool>', 'Tool name')
  .option('-a, --args <json>', 'Arguments as a JSON object', '{}')
  .option('-c, --config <path>', 'Config file path')
  .option('--json', 'Print the raw validation result')
  .action(async (tool: string, options: { args: string; config?: string; json?: boolean }) => {
    const args = parseArgumentBag(options.args);
    if (typeof args === 'string') {
      console.error(args);
      process.exitCode = 1;
      return;
    }

    const { catalog } = await setupRuntime(options.config);
    const result = new ToolValidator(catalog.list()).validate(tool, args);

    console.log(options.json ? JSON.stringify(result, null, 2) : formatValidationResult(tool, result));
    if (!result.valid) {
      process.exitCode = 1;
    }
  });
