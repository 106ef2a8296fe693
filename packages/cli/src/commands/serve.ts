import { Command } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ContextManager } from '@marquee/core';
import { createMarqueeServer, createFixtureSearch, loadFixtureRecords, type SearchSource } from '@marquee/tools';
import { setupRuntime } from '../setup.js';

export const serveCommand = new Command('serve')
  .description('Run the MCP tool server on stdio')
  .option('-c, --config <path>', 'Config file path')
  .option('-f, --fixture <file>', 'JSON array of records served by create_search_context')
  .action(async (options: { config?: string; fixture?: string }) => {
    const { config, logger, catalog } = await setupRuntime(options.config);

    let search: SearchSource | undefined;
    if (options.fixture) {
      const records = await loadFixtureRecords(options.fixture);
      search = createFixtureSearch(records);
      logger.info('fixture search enabled', { file: options.fixture, records: records.length });
    }

    const contexts = new ContextManager({
      pagination: config.pagination,
      logger: logger.child('contexts'),
    });
    const server = createMarqueeServer({
      catalog,
      contexts,
      search,
      logger: logger.child('mcp'),
      inlineResultLimit: config.pagination.inlineResultLimit,
      info: config.server,
    });

    server.onclose = () => {
      contexts.stop();
      logger.info('server closed');
    };

    contexts.start();
    await server.connect(new StdioServerTransport());
    logger.info('serving on stdio', { tools: catalog.size });
  });
