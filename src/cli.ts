#!/usr/bin/env node
import { Command, Option } from 'commander';
import { formatSummary, runPurge, DEFAULT_BASE_BATCH_SIZE } from './app/run-purge';
import { loadPurgeConfigFromProcess } from './config/purge.config';
import { AppError, ValidationError, errorMessage } from './utils/errors';
import { logger } from './utils/logger';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function printError(message: string, details: string[] = [], write: (line: string) => void = console.error): void {
  write(`Error: ${message}`);
  for (const detail of details) write(`  - ${detail}`);
}

export function buildProgram(): Command {
  return new Command()
    .name('mailbox-purge')
    .description('Count, preview and delete aged messages in a hosted mailbox')
    .requiredOption('-m, --mailbox <address>', 'target mailbox (user principal name or id)')
    .option('-f, --folder <name>', 'folder to process: well-known name, id or path (repeatable; default inbox)', collect, [])
    .option('--all-folders', 'process every folder in the mailbox, one at a time', false)
    .option('--older-than-days <days>', 'select messages received more than <days> days ago')
    .option('--before <date>', 'select messages received before <date>')
    .option('--start <date>', 'range start, inclusive (requires --end)')
    .option('--end <date>', 'range end, inclusive; a date without a time covers that whole day (at most 365 days after --start)')
    .addOption(
      new Option('-b, --backend <kind>', 'deletion backend').choices(['remote-mail', 'bulk-search']).default('remote-mail')
    )
    .option('--check-only', 'report folder inventory and match counts; delete nothing', false)
    .option('--dry-run', 'report what would be deleted; delete nothing', false)
    .option('--confirm <token>', 'answer the confirmation prompt non-interactively (YES or DELETE)')
    .option('--batch-size <n>', 'base page size; ids are fetched 4x this per page, capped at 200', String(DEFAULT_BASE_BATCH_SIZE))
    .option('--extended-wait', 'wait up to 120 minutes for a bulk search instead of 10', false)
    .addHelpText(
      'after',
      `
Examples:
  $ mailbox-purge -m user@example.com --older-than-days 365 --check-only
  $ mailbox-purge -m user@example.com --start 2023-01-01 --end 2023-12-31 --dry-run
  $ mailbox-purge -m user@example.com --before 2022-01-01 --backend bulk-search --extended-wait
`
    );
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  program.parse(argv);

  try {
    const config = loadPurgeConfigFromProcess();
    const report = await runPurge(program.opts(), { config });
    for (const line of formatSummary(report)) console.log(line);
    if (report.error) printError(report.error, report.errorDetails);
    return report.exitCode;
  } catch (error) {
    if (error instanceof ValidationError) {
      printError(error.message, error.details);
      return error.exitCode;
    }
    logger.error('purge.fatal', { error: errorMessage(error) });
    return error instanceof AppError ? error.exitCode : 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error('purge.unhandled', { error: errorMessage(error) });
      process.exitCode = 1;
    }
  );
}
