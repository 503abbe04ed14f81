/**
 * Audit log
 *
 * Append-only record of access decisions and sensitive operations, one
 * "timestamp | event_type | details" line per entry, in a file readable and
 * writable by its owner only.
 *
 * Appends rely on O_APPEND: each entry is a single write, so concurrent
 * writers (in this process or others) never interleave inside a line.
 * Appends and prunes share an exclusive lock on the file; pruning is a
 * read-modify-write of the whole file and holds it for its entire critical
 * section. An append that cannot get the lock within its retry budget
 * still writes, and the prune picks it up as a late entry.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as lockfile from "proper-lockfile";
import {
  AuditEntry,
  AuditLogOptions,
  AuditReporter,
  IAuditLog,
  PruneResult,
} from "../interfaces/IAuditLog";

export const DEFAULT_AUDIT_LOG_FILE = path.join(
  os.homedir(),
  ".cache",
  "agent-access-guard",
  "audit.log"
);

export const DEFAULT_MAX_AGE_DAYS = 30;

const OWNER_ONLY = 0o600;
const MS_PER_DAY = 24 * 60 * 60 * 1000;
const LOCK_STALE_MS = 10_000;
const LOCK_RETRIES = 50;
const LOCK_RETRY_MS = 20;
const FIELD_SEPARATOR = " | ";
const ISO_TIMESTAMP =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

const defaultReporter: AuditReporter = (operation, error, logFile) => {
  console.error(
    JSON.stringify({
      timestamp: new Date().toISOString(),
      level: "AUDIT_LOG_FAILURE",
      operation,
      logFile,
      error: error instanceof Error ? error.message : String(error),
    })
  );
};

/**
 * Set an existing regular file to owner read/write only
 */
export function setOwnerOnly(filePath: string): void {
  if (fs.existsSync(filePath) && fs.statSync(filePath).isFile()) {
    fs.chmodSync(filePath, OWNER_ONLY);
  }
}

function escapeField(value: string): string {
  return value.replace(/\r\n|\r|\n/g, "\\n");
}

export function formatAuditLine(
  timestamp: Date,
  eventType: string,
  details: string
): string {
  return (
    [timestamp.toISOString(), escapeField(eventType), escapeField(details)].join(
      FIELD_SEPARATOR
    ) + "\n"
  );
}

export function parseAuditLine(line: string): AuditEntry | null {
  const first = line.indexOf(FIELD_SEPARATOR);
  if (first === -1) {
    return null;
  }
  const second = line.indexOf(FIELD_SEPARATOR, first + FIELD_SEPARATOR.length);
  if (second === -1) {
    return null;
  }
  return {
    timestamp: line.slice(0, first),
    eventType: line.slice(first + FIELD_SEPARATOR.length, second),
    details: line.slice(second + FIELD_SEPARATOR.length),
  };
}

/**
 * Epoch milliseconds of a line's leading timestamp, or null when it does
 * not parse as ISO-8601. Timestamps without an offset are read as UTC.
 */
export function parseLineTimestamp(line: string): number | null {
  const raw = (line.split("|", 1)[0] ?? "").trim();
  if (!ISO_TIMESTAMP.test(raw)) {
    return null;
  }
  const hasOffset = /(Z|[+-]\d{2}:?\d{2})$/.test(raw);
  const millis = Date.parse(hasOffset ? raw : raw + "Z");
  return Number.isNaN(millis) ? null : millis;
}

function readFrom(fd: number, position: number): Buffer {
  const size = fs.fstatSync(fd).size;
  if (size <= position) {
    return Buffer.alloc(0);
  }
  const buffer = Buffer.alloc(size - position);
  let offset = 0;
  while (offset < buffer.length) {
    const read = fs.readSync(fd, buffer, offset, buffer.length - offset, position + offset);
    if (read === 0) {
      break;
    }
    offset += read;
  }
  return buffer.subarray(0, offset);
}

function splitLines(text: string): string[] {
  return text.split("\n").filter((line) => line.length > 0);
}

function isLockContention(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ELOCKED"
  );
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

/**
 * Take the exclusive lock on a file, retrying while another holder has it.
 * The sync API of proper-lockfile does not retry on its own.
 */
export function lockWithRetry(
  filePath: string,
  retries: number = LOCK_RETRIES
): () => void {
  for (let attempt = 0; ; attempt++) {
    try {
      return lockfile.lockSync(filePath, {
        realpath: false,
        stale: LOCK_STALE_MS,
      });
    } catch (error) {
      if (!isLockContention(error) || attempt >= retries) {
        throw error;
      }
      sleepSync(LOCK_RETRY_MS);
    }
  }
}

export class AuditLog implements IAuditLog {
  private readonly logFile: string;
  private readonly clock: () => Date;
  private readonly reporter: AuditReporter;

  constructor(options: AuditLogOptions = {}) {
    this.logFile = path.resolve(options.logFile ?? DEFAULT_AUDIT_LOG_FILE);
    this.clock = options.clock ?? (() => new Date());
    this.reporter = options.reporter ?? defaultReporter;
  }

  append(eventType: string, details = ""): void {
    try {
      fs.mkdirSync(path.dirname(this.logFile), { recursive: true, mode: 0o700 });
      const line = formatAuditLine(this.clock(), eventType, details);

      let release: (() => void) | undefined;
      try {
        release = lockWithRetry(this.logFile);
      } catch (error) {
        if (!isLockContention(error)) {
          throw error;
        }
      }
      try {
        this.writeLine(line);
      } finally {
        release?.();
      }
    } catch (error) {
      this.reporter("append", error, this.logFile);
    }
  }

  prune(maxAgeDays: number = DEFAULT_MAX_AGE_DAYS): PruneResult | null {
    if (!Number.isFinite(maxAgeDays) || maxAgeDays < 0) {
      this.reporter(
        "prune",
        new RangeError(`maxAgeDays must be a non-negative number, got ${maxAgeDays}`),
        this.logFile
      );
      return null;
    }
    if (!fs.existsSync(this.logFile)) {
      return null;
    }
    const cutoff = this.clock().getTime() - maxAgeDays * MS_PER_DAY;

    let release: (() => void) | undefined;
    try {
      release = lockWithRetry(this.logFile);
      return this.rewriteWithin(cutoff);
    } catch (error) {
      this.reporter("prune", error, this.logFile);
      return null;
    } finally {
      release?.();
    }
  }

  /**
   * Parsed entries in file order. Lines that do not have the three fields
   * are skipped.
   */
  readEntries(): AuditEntry[] {
    if (!fs.existsSync(this.logFile)) {
      return [];
    }
    return splitLines(fs.readFileSync(this.logFile, "utf-8"))
      .map(parseAuditLine)
      .filter((entry): entry is AuditEntry => entry !== null);
  }

  getLogFile(): string {
    return this.logFile;
  }

  /**
   * Critical section of prune; caller holds the lock
   */
  private rewriteWithin(cutoff: number): PruneResult {
    const fd = fs.openSync(this.logFile, "r+");
    try {
      const snapshot = readFrom(fd, 0);
      let kept = 0;
      let removed = 0;
      const survivors: string[] = [];

      for (const line of splitLines(snapshot.toString("utf-8"))) {
        const timestamp = parseLineTimestamp(line);
        if (timestamp === null || timestamp >= cutoff) {
          survivors.push(line);
          kept++;
        } else {
          removed++;
        }
      }

      // Writers that gave up waiting for the lock may have landed after
      // the snapshot; their entries are new by definition
      const late = splitLines(readFrom(fd, snapshot.length).toString("utf-8"));
      survivors.push(...late);
      kept += late.length;

      // Survivors go through an O_APPEND descriptor: a line that lands
      // between the truncate and this write is kept ahead of them
      fs.ftruncateSync(fd, 0);
      const content = survivors.map((line) => line + "\n").join("");
      if (content) {
        this.writeLine(content);
      }
      this.harden(fd);

      return { kept, removed };
    } finally {
      fs.closeSync(fd);
    }
  }

  private writeLine(text: string): void {
    const fd = fs.openSync(this.logFile, "a", OWNER_ONLY);
    try {
      this.harden(fd);
      fs.writeSync(fd, text);
    } finally {
      fs.closeSync(fd);
    }
  }

  private harden(fd: number): void {
    if (process.platform === "win32") {
      return;
    }
    if ((fs.fstatSync(fd).mode & 0o777) !== OWNER_ONLY) {
      fs.fchmodSync(fd, OWNER_ONLY);
    }
  }
}
