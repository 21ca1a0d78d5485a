import { Command } from 'commander';
import chalk from 'chalk';
import { collectWarnings, loadRunConfig, resolveConfigDir } from '@digestor/core';
import { DEFAULT_LABEL } from '@digestor/protocol';
import { exitWithConfigError } from '../options.js';

interface CheckCommandOptions {
  config: string;
  configDir?: string;
  debug: boolean;
}

export const checkCommand = new Command('check')
  .description('Validate channels, output channel and credentials for a config label')
  .option('-c, --config <label>', 'Config label to check', DEFAULT_LABEL)
  .option('--config-dir <dir>', 'Config directory (default: ~/.digestor)')
  .option('--debug', 'Check only what debug mode needs', false)
  .action(async (opts: CheckCommandOptions) => {
    const configDir = opts.configDir ?? resolveConfigDir();
    try {
      const config = await loadRunConfig(opts.config, { mode: opts.debug ? 'debug' : 'deliver' }, process.env, configDir);

      console.log(chalk.green(`✓ Config "${config.label}" is usable`));
      console.log(chalk.gray(`  Channels:       ${config.channelIds.join(', ')}`));
      console.log(chalk.gray(`  Output channel: ${config.outputChannelId}`));
      console.log(chalk.gray(`  Window:         ${config.hours}h, up to ${config.maxPages} pages per channel`));
      console.log(chalk.gray(`  Model:          ${config.model}`));
      console.log(chalk.gray(`  Prompt:         ${config.promptDir}/${config.label}.txt`));
      console.log(chalk.gray(`  Primary:        ${config.botToken ? 'bot session' : 'not configured'}`));
      console.log(chalk.gray(`  Fallback:       ${config.reader ? `REST (${config.reader.scheme})` : 'not configured'}`));

      for (const warning of collectWarnings(config)) {
        console.log(chalk.yellow(`⚠ ${warning}`));
      }
    } catch (err) {
      exitWithConfigError(err);
    }
  });
