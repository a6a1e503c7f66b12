import { z } from 'zod';
import type { PurgeConfig } from '../config/purge.config';
import { buildDateFilter, describeFilter } from '../services/date-filter.service';
import type { DeletionRunResult } from '../services/deletion-engine.service';
import { DEFAULT_MAX_WAIT_MINUTES, EXTENDED_MAX_WAIT_MINUTES } from '../services/ports/bulk-search.port';
import type { RemoteMailBackendPort } from '../services/ports/remote-mail.port';
import type { RunContext, RunTotals } from '../services/run-context';
import type { DateFilter, MailFolder, ProcessingMode } from '../types/purge.types';
import { AppError, ValidationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { createPurgeRuntime, type CompositionOverrides } from './composition-root';

export const DEFAULT_BASE_BATCH_SIZE = 50;
export const MAX_BASE_BATCH_SIZE = 50;
const DEFAULT_FOLDER = 'inbox';

const wholeNumber = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a whole number')
    .transform(Number),
]);

const dateInput = z
  .string()
  .trim()
  .min(1)
  .transform((value, ctx) => {
    const parsed = new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a valid date (use YYYY-MM-DD or an ISO timestamp)` });
      return z.NEVER;
    }
    return parsed;
  });

export const purgeOptionsSchema = z
  .object({
    mailbox: z.string().trim().min(1, 'a mailbox address is required'),
    folder: z.array(z.string().trim().min(1)).default([]),
    allFolders: z.boolean().default(false),
    olderThanDays: wholeNumber.optional(),
    before: dateInput.optional(),
    start: dateInput.optional(),
    end: dateInput.optional(),
    backend: z.enum(['remote-mail', 'bulk-search']).default('remote-mail'),
    checkOnly: z.boolean().default(false),
    dryRun: z.boolean().default(false),
    confirm: z.string().optional(),
    batchSize: wholeNumber.pipe(z.number().int().min(1).max(MAX_BASE_BATCH_SIZE)).default(DEFAULT_BASE_BATCH_SIZE),
    extendedWait: z.boolean().default(false),
  })
  .superRefine((opts, ctx) => {
    if (opts.checkOnly && opts.dryRun) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['checkOnly'], message: '--check-only and --dry-run are mutually exclusive' });
    }
    if (opts.allFolders && opts.folder.length > 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['allFolders'], message: '--all-folders cannot be combined with --folder' });
    }
    if (opts.backend === 'bulk-search' && (opts.allFolders || opts.folder.length > 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['backend'],
        message: 'the bulk-search backend always covers the whole mailbox; drop --folder/--all-folders',
      });
    }
  });

export type PurgeOptions = z.output<typeof purgeOptionsSchema>;

export function parsePurgeOptions(raw: unknown): PurgeOptions {
  const parsed = purgeOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid command line options',
      parsed.error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    );
  }
  return parsed.data;
}

export function modeOf(options: Pick<PurgeOptions, 'checkOnly' | 'dryRun'>): ProcessingMode {
  if (options.checkOnly) return 'check-only';
  if (options.dryRun) return 'dry-run';
  return 'delete';
}

export interface RunPurgeDeps {
  config: PurgeConfig;
  overrides?: CompositionOverrides;
}

export interface PurgeRunReport {
  runId: string;
  exitCode: number;
  totals: RunTotals;
  elapsedMs: number;
  filter: DateFilter;
  result?: DeletionRunResult;
  inventory: MailFolder[];
  error?: string;
  // Corrective guidance carried by a validation failure raised mid-run
  errorDetails?: string[];
}

/** Non-zero when any requested action did not complete. A decline is not a failure. */
export function exitCodeFor(totals: RunTotals): number {
  return totals.failed > 0 || totals.incompleteTargets > 0 ? 1 : 0;
}

async function selectFolders(
  backend: RemoteMailBackendPort,
  context: RunContext,
  mailbox: string,
  options: PurgeOptions
): Promise<MailFolder[]> {
  if (options.allFolders) {
    const folders = await backend.listFolders(mailbox);
    await context.log('INFO', `Enumerated ${folders.length} folders in ${mailbox}`, { mailbox, folders: folders.length });
    return folders;
  }
  const names = options.folder.length > 0 ? options.folder : [DEFAULT_FOLDER];
  const folders: MailFolder[] = [];
  for (const name of names) {
    const folder = await backend.resolveFolder(mailbox, name);
    await context.log('INFO', `Resolved folder "${name}" to ${folder.path}`, { mailbox, folder: folder.path });
    folders.push(folder);
  }
  return folders;
}

async function logInventory(context: RunContext, mailbox: string, folders: MailFolder[]): Promise<void> {
  for (const folder of folders) {
    const size = folder.sizeBytes === null ? 'unknown size' : `${folder.sizeBytes} bytes`;
    await context.log('INFO', `Inventory ${folder.path}: ${folder.totalItemCount} items, ${size}`, {
      mailbox,
      folder: folder.path,
      totalItemCount: folder.totalItemCount,
      sizeBytes: folder.sizeBytes,
    });
  }
}

export function formatSummary(report: PurgeRunReport): string[] {
  const { totals } = report;
  return [
    `Run ${report.runId} (${describeFilter(report.filter)})`,
    `Targets processed: ${totals.targets}, incomplete: ${totals.incompleteTargets}`,
    `Matched: ${totals.matched}, deleted: ${totals.deleted}, failed: ${totals.failed}, accepted for purge: ${totals.acceptedForPurge}`,
    `Elapsed: ${(report.elapsedMs / 1000).toFixed(1)}s`,
  ];
}

/**
 * Validates everything local first, then wires the selected backend and runs
 * the engine over each target. Validation problems throw before any remote
 * call; failures after that are audited and reflected in the exit code.
 */
export async function runPurge(raw: unknown, deps: RunPurgeDeps): Promise<PurgeRunReport> {
  const options = parsePurgeOptions(raw);
  const now = new Date(deps.overrides?.clock?.now() ?? Date.now());
  const filter = buildDateFilter(
    { olderThanDays: options.olderThanDays, before: options.before, start: options.start, end: options.end },
    now
  );
  const mode = modeOf(options);

  const runtime = createPurgeRuntime(
    deps.config,
    {
      backend: options.backend,
      confirmToken: options.confirm,
      engine: {
        mode,
        baseBatchSize: options.batchSize,
        batchPauseMs: deps.config.batchPauseMs,
        maxWaitMinutes: options.extendedWait ? EXTENDED_MAX_WAIT_MINUTES : DEFAULT_MAX_WAIT_MINUTES,
      },
    },
    deps.overrides
  );
  const { context, backend, engine } = runtime;
  const mailbox = options.mailbox;

  await context.log('INFO', `Run started for ${mailbox}: ${describeFilter(filter)}`, {
    runId: context.runId,
    mailbox,
    backend: backend.kind,
    mode,
  });

  let result: DeletionRunResult | undefined;
  let inventory: MailFolder[] = [];
  let failure: unknown;
  try {
    let folders: MailFolder[] = [];
    if (backend.kind === 'remote-mail') {
      folders = await selectFolders(backend, context, mailbox, options);
      if (mode === 'check-only') {
        inventory = folders;
        await logInventory(context, mailbox, folders);
      }
    }
    result = await engine.run({ mailbox, filter, folders });
  } catch (error) {
    failure = error;
    await context.log('ERROR', `Run stopped: ${errorMessage(error)}`, {
      mailbox,
      errorName: error instanceof Error ? error.name : 'Error',
    });
  }

  const totals: RunTotals = { ...context.totals };
  const exitCode = failure !== undefined ? (failure instanceof AppError ? failure.exitCode : 1) : exitCodeFor(totals);
  const report: PurgeRunReport = {
    runId: context.runId,
    exitCode,
    totals,
    elapsedMs: context.elapsedMs(),
    filter,
    result,
    inventory,
    error: failure !== undefined ? errorMessage(failure) : undefined,
    errorDetails: failure instanceof AppError ? failure.details : undefined,
  };

  await context.log(exitCode === 0 ? 'SUCCESS' : 'WARNING', `Run finished with exit code ${exitCode}`, {
    targets: totals.targets,
    matched: totals.matched,
    deleted: totals.deleted,
    failed: totals.failed,
    acceptedForPurge: totals.acceptedForPurge,
    incompleteTargets: totals.incompleteTargets,
    elapsedMs: report.elapsedMs,
  });
  if (runtime.audit.flush) await runtime.audit.flush();
  logger.debug('purge.run_complete', { runId: context.runId, exitCode });
  return report;
}
