import type { AuditEntry } from './audit-log.types';

export interface AuditLogPort {
  append(entry: AuditEntry): Promise<void>;
  flush?(): Promise<void>;
}
