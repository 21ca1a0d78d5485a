import { InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { ConfigError, MissingCredentialError } from '@digestor/core';
import type { DeliveryFormat } from '@digestor/protocol';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseFormat(value: string): DeliveryFormat {
  if (value !== 'plain' && value !== 'quote') {
    throw new InvalidArgumentError('Must be "plain" or "quote".');
  }
  return value;
}

/** Print a configuration or credential failure and exit */
export function exitWithConfigError(err: unknown): never {
  if (err instanceof ConfigError) {
    console.log(chalk.red('✗ Missing or invalid configuration:'));
    for (const problem of err.problems) {
      console.log(chalk.red(`  - ${problem}`));
    }
  } else if (err instanceof MissingCredentialError) {
    console.log(chalk.red(`✗ ${err.message}`));
    console.log(chalk.gray(`  export ${err.credential.split(' ')[0]}="..." or add it to credentials.json`));
  } else {
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  }
  process.exit(1);
}
