import type { MarqueeConfig } from '@marquee/shared';
import { ConfigManager, createLogger, type Logger } from '@marquee/core';
import { loadCatalog, type ToolCatalog } from '@marquee/tools';

export interface CliRuntime {
  config: MarqueeConfig;
  logger: Logger;
  catalog: ToolCatalog;
}

/** Loads configuration, then the tool catalog it points at. */
export async function setupRuntime(configPath?: string): Promise<CliRuntime> {
  const config = await new ConfigManager().load({ configPath });
  const logger = createLogger({ level: config.logging.level, scope: 'marquee' });
  const catalog = await loadCatalog({
    extraDirs: config.catalog.extraDirs,
    disabledTools: config.catalog.disabledTools,
  });
  logger.debug('catalog loaded', { tools: catalog.size });
  return { config, logger, catalog };
}
