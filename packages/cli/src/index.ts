import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { checkCommand } from './commands/check.js';

const program = new Command();

program
  .name('digestor')
  .description('📰 Digestor - summarize recent Discord channel activity into one digest')
  .version('0.1.0');

program.addCommand(runCommand);   // Fetch, summarize, deliver
program.addCommand(checkCommand); // Validate configuration only

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
