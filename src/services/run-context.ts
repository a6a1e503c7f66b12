import { randomUUID } from 'crypto';
import type { AuditLogPort } from './audit-log.port';
import type { AuditEntry, AuditLevel } from './audit-log.types';
import type { ClockPort } from './ports/clock.port';

export interface RunTotals {
  targets: number;
  matched: number;
  deleted: number;
  failed: number;
  acceptedForPurge: number;
  incompleteTargets: number;
}

const TOTAL_KEYS: Array<keyof RunTotals> = [
  'targets',
  'matched',
  'deleted',
  'failed',
  'acceptedForPurge',
  'incompleteTargets',
];

/**
 * Per-invocation state threaded through the engine.
 * Constructed once at process start; only the totals mutate.
 */
export class RunContext {
  readonly runId: string;
  readonly startedAt: number;
  private readonly runTotals: RunTotals = {
    targets: 0,
    matched: 0,
    deleted: 0,
    failed: 0,
    acceptedForPurge: 0,
    incompleteTargets: 0,
  };

  constructor(
    readonly clock: ClockPort,
    readonly audit: AuditLogPort,
    runId: string = randomUUID()
  ) {
    this.runId = runId;
    this.startedAt = clock.now();
  }

  get totals(): Readonly<RunTotals> {
    return this.runTotals;
  }

  record(delta: Partial<RunTotals>): void {
    for (const key of TOTAL_KEYS) {
      this.runTotals[key] += delta[key] ?? 0;
    }
  }

  elapsedMs(): number {
    return this.clock.now() - this.startedAt;
  }

  async log(level: AuditLevel, message: string, context?: AuditEntry['context']): Promise<void> {
    await this.audit.append({ timestamp: new Date(this.clock.now()), level, message, context });
  }
}
