import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  collectWarnings,
  createPipelineDeps,
  loadRunConfig,
  resolveConfigDir,
  runDigest,
  type RunConfig,
  type RunMode,
  type RunReport,
} from '@digestor/core';
import { DEFAULT_LABEL, type DeliveryFormat } from '@digestor/protocol';
import { exitWithConfigError, parseFormat, parsePositiveInt } from '../options.js';

interface RunCommandOptions {
  config: string;
  hours?: number;
  format?: DeliveryFormat;
  maxPages?: number;
  promptDir?: string;
  configDir?: string;
  debug: boolean;
  send: boolean;
  json: boolean;
}

export const runCommand = new Command('run')
  .description('Fetch recent channel messages, summarize them and post the digest')
  .option('-c, --config <label>', 'Config label (selects channels, output channel and prompt)', DEFAULT_LABEL)
  .option('--hours <n>', 'Hours of history to include', parsePositiveInt)
  .option('--format <format>', 'Digest layout: plain or quote', parseFormat)
  .option('--max-pages <n>', 'History pages to read per channel before stopping', parsePositiveInt)
  .option('--prompt-dir <dir>', 'Directory holding <label>.txt prompts')
  .option('--config-dir <dir>', 'Config directory (default: ~/.digestor)')
  .option('--debug', 'Print the aggregated transcript instead of summarizing', false)
  .option('--no-send', 'Summarize and print the fragments without posting them')
  .option('--json', 'Output the run report as JSON', false)
  .action(async (opts: RunCommandOptions) => {
    const mode: RunMode = opts.debug ? 'debug' : opts.send ? 'deliver' : 'dry-run';

    let config: RunConfig;
    try {
      config = await loadRunConfig(
        opts.config,
        {
          hours: opts.hours,
          format: opts.format,
          maxPages: opts.maxPages,
          promptDir: opts.promptDir,
          mode,
        },
        process.env,
        opts.configDir ?? resolveConfigDir(),
      );
    } catch (err) {
      exitWithConfigError(err);
    }

    for (const warning of collectWarnings(config)) {
      console.log(chalk.yellow(`⚠ ${warning}`));
    }

    const spinner = ora({
      text: `Building ${chalk.cyan(config.label)} digest for the last ${config.hours}h (${config.channelIds.length} channels)...`,
    }).start();

    try {
      const report = await runDigest(config, {
        ...createPipelineDeps(config),
        output: (text) => {
          spinner.stop();
          console.log(text);
        },
      });
      spinner.stop();

      if (opts.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        printReport(config, report);
      }

      if (report.status === 'failed') {
        process.exit(1);
      }
    } catch (err) {
      spinner.fail('Digest run failed');
      console.error(chalk.red(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    }
  });

function printReport(config: RunConfig, report: RunReport): void {
  console.log();
  console.log(chalk.bold.white(`📰 Digest (${config.label})`));
  console.log(chalk.dim('─'.repeat(60)));
  console.log(`Channels: ${report.channelNames.join(', ') || chalk.dim('none')}`);
  console.log(`Messages: ${report.totalMessages}`);

  switch (report.status) {
    case 'empty':
      console.log(chalk.yellow('No messages found in the time window; nothing was sent.'));
      break;
    case 'debug':
      console.log(chalk.dim('Debug mode: transcript printed above, nothing summarized or sent.'));
      break;
    case 'dry-run':
      console.log(chalk.dim(`Dry run: ${report.fragments} fragment(s) printed above, nothing sent.`));
      break;
    case 'delivered':
      console.log(chalk.green(`✓ Delivered ${report.sent}/${report.fragments} fragment(s) via ${report.transport}`));
      break;
    case 'failed':
      console.log(chalk.red(report.reason === 'no_transport'
        ? '✗ No delivery transport available (check BOT_TOKEN / DISCORD_TOKEN)'
        : `✗ Fallback delivered ${report.sent}/${report.fragments} fragment(s)`));
      break;
  }
}
