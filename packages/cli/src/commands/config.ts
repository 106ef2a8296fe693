import { Command } from 'commander';
import { ConfigManager, CONFIG_FILE_NAMES, CONFIG_ENV_VARS } from '@marquee/core';

export const configCommand = new Command('config')
  .description('Inspect configuration');

configCommand
  .command('show')
  .description('Show the effective configuration')
  .option('-c, --config <path>', 'Config file path')
  .action(async (options: { config?: string }) => {
    const config = await new ConfigManager().load({ configPath: options.config });
    console.log(JSON.stringify(config, null, 2));
  });

configCommand
  .command('path')
  .description('Show config file search paths')
  .action(() => {
    console.log('Config files searched from the working directory upward (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ./${name}`));
    console.log('');
    console.log('Environment variables:');
    for (const name of CONFIG_ENV_VARS) {
      console.log(`  ${name}`);
    }
  });
