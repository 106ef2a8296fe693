import { Command } from 'commander';
import { toolDefinitionToMcpTool } from '@marquee/tools';
import { setupRuntime } from '../setup.js';
import { formatToolList } from '../output/formatter.js';

export const toolsCommand = new Command('tools')
  .description('Inspect the tool catalog');

toolsCommand
  .command('list')
  .description('List catalog tools')
  .option('-c, --config <path>', 'Config file path')
  .option('-t, --tag <tag>', 'Only tools carrying this tag')
  .action(async (options: { config?: string; tag?: string }) => {
    const { catalog } = await setupRuntime(options.config);
    const tag = options.tag;
    const tools = tag ? catalog.list().filter(t => t.tags?.includes(tag)) : catalog.list();
    console.log(formatToolList(tools));
  });

toolsCommand
  .command('show <name>')
  .description('Print the JSON Schema of one tool')
  .option('-c, --config <path>', 'Config file path')
  .action(async (name: string, options: { config?: string }) => {
    const { catalog } = await setupRuntime(options.config);
    const tool = catalog.get(name);
    if (!tool) {
      console.error(`Unknown tool: ${name}`);
      process.exitCode = 1;
      return;
    }
    console.log(JSON.stringify(toolDefinitionToMcpTool(tool), null, 2));
  });
