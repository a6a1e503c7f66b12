import { promises as fs } from 'fs';
import path from 'path';
import type { AuditLogPort } from '../services/audit-log.port';
import type { AuditEntry, AuditLevel } from '../services/audit-log.types';
import { logger, type Logger } from '../utils/logger';

export function auditLogPath(dir: string, runId: string): string {
  return path.join(dir, `mailbox-purge-${runId}.log`);
}

export function formatAuditLine(entry: AuditEntry): string {
  const line: Record<string, unknown> = {
    timestamp: entry.timestamp.toISOString(),
    level: entry.level,
    message: entry.message,
  };
  if (entry.context && Object.keys(entry.context).length > 0) line.context = entry.context;
  return JSON.stringify(line);
}

function mirror(target: Logger, level: AuditLevel, message: string, context?: AuditEntry['context']): void {
  const ctx = { auditLevel: level, ...context };
  if (level === 'ERROR') target.error(message, ctx);
  else if (level === 'WARNING') target.warn(message, ctx);
  else target.info(message, ctx);
}

/**
 * Appends one JSON line per entry to a per-run file.
 * The directory is created on the first append, so a run that fails
 * validation leaves nothing behind.
 */
export class FileAuditLogAdapter implements AuditLogPort {
  readonly filePath: string;
  private ready: Promise<void> | null = null;
  // Serializes appends so lines keep the order they were logged in
  private tail: Promise<void> = Promise.resolve();

  constructor(
    dir: string,
    runId: string,
    private readonly out: Logger = logger
  ) {
    this.filePath = auditLogPath(dir, runId);
  }

  append(entry: AuditEntry): Promise<void> {
    mirror(this.out, entry.level, entry.message, entry.context);
    const write = this.tail.then(async () => {
      await this.ensureDir();
      await fs.appendFile(this.filePath, `${formatAuditLine(entry)}\n`, 'utf8');
    });
    // A failed write must not block later entries; the caller still sees the rejection
    this.tail = write.catch((error: unknown) => {
      logger.error('audit.append_failed', { file: this.filePath, error: error instanceof Error ? error.message : String(error) });
    });
    return write;
  }

  async flush(): Promise<void> {
    await this.tail;
  }

  private ensureDir(): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(path.dirname(this.filePath), { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }
}

/** Keeps entries in memory; used for tests and for inspecting a run programmatically. */
export class MemoryAuditLogAdapter implements AuditLogPort {
  readonly entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }

  messages(level?: AuditLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}
