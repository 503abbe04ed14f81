/**
 * Audit log interface
 */

/**
 * One parsed audit log line
 */
export interface AuditEntry {
  /** UTC ISO-8601 */
  timestamp: string;
  eventType: string;
  details: string;
}

/**
 * Result of a retention prune
 */
export interface PruneResult {
  /** Lines left in the file */
  kept: number;
  /** Lines removed as older than the cutoff */
  removed: number;
}

/**
 * Operator-visible channel for audit log failures
 */
export type AuditReporter = (
  operation: "append" | "prune",
  error: unknown,
  logFile: string
) => void;

export interface AuditLogOptions {
  /** Defaults to ~/.cache/agent-access-guard/audit.log */
  logFile?: string;
  /** Source of the current time */
  clock?: () => Date;
  /** Where I/O failures are reported. Defaults to a JSON line on stderr. */
  reporter?: AuditReporter;
}

export interface IAuditLog {
  /**
   * Append one entry. Failures are reported, never thrown.
   * @param eventType - e.g. "file_access_denied", "command_blocked", "file_edit"
   * @param details - Free text; line breaks are escaped
   */
  append(eventType: string, details?: string): void;

  /**
   * Drop entries older than maxAgeDays under an exclusive lock.
   * Lines whose timestamp does not parse are always kept.
   * @returns Counts, or null when there was no log file or the prune failed
   */
  prune(maxAgeDays?: number): PruneResult | null;

  /**
   * Path of the backing file
   */
  getLogFile(): string;
}
