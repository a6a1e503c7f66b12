export type AuditLevel = 'INFO' | 'SUCCESS' | 'WARNING' | 'ERROR';

export interface AuditEntry {
  timestamp: Date;
  level: AuditLevel;
  message: string;
  // IDs, counts and statuses only; never message content
  context?: Record<string, string | number | boolean | null>;
}
