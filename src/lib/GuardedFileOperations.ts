/**
 * Guarded file operations
 *
 * File side of the collaborator contract: every read or write asks the
 * guard first, a denial is audited and raised as a SecurityError carrying
 * the guard's reason. Writes and edits are audited once they have landed,
 * or as failed with the error when they have not.
 */

import * as fs from "fs";
import * as path from "path";
import { IAuditLog } from "../interfaces/IAuditLog";
import { IFileAccessGuard } from "../interfaces/IFileAccessGuard";
import {
  EditResult,
  IGuardedFileOperations,
} from "../interfaces/IGuardedFileOperations";
import { FileSystemError, SecurityError, ValidationError } from "../types";
import { FileAccessGuard } from "./FileAccessGuard";

const MAX_SUGGESTIONS = 3;

function lcsLength(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1]
          ? (previous[j - 1] ?? 0) + 1
          : Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * Similarity in [0, 1]: twice the common subsequence length over the
 * combined length
 */
export function similarity(a: string, b: string): number {
  const total = a.length + b.length;
  return total === 0 ? 1 : (2 * lcsLength(a, b)) / total;
}

/**
 * Phrases of the file with the same word count as the text the model asked
 * to replace, best match first
 */
export function findCloseMatches(
  originalText: string,
  fileText: string,
  limit: number = MAX_SUGGESTIONS
): string[] {
  const words = fileText.split(/\s+/).filter(Boolean);
  const width = originalText.split(/\s+/).filter(Boolean).length;
  if (width === 0 || words.length < width) {
    return [];
  }

  const scored: Array<{ score: number; phrase: string }> = [];
  for (let i = 0; i + width <= words.length; i++) {
    const phrase = words.slice(i, i + width).join(" ");
    scored.push({ score: similarity(originalText, phrase), phrase });
  }

  return scored
    .sort((a, b) => b.score - a.score)
    .slice(0, limit)
    .map((s) => s.phrase);
}

function describeError(error: unknown): string {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}

export interface GuardedFileOperationsOptions {
  auditLog: IAuditLog;
  /** Defaults to a disabled guard */
  guard?: IFileAccessGuard;
}

export class GuardedFileOperations implements IGuardedFileOperations {
  private currentGuard: IFileAccessGuard;
  private readonly auditLog: IAuditLog;

  constructor(options: GuardedFileOperationsOptions) {
    this.auditLog = options.auditLog;
    this.currentGuard = options.guard ?? FileAccessGuard.disabled();
  }

  get guard(): IFileAccessGuard {
    return this.currentGuard;
  }

  setWorkingDirectory(workingDir: string, enabled = true): void {
    this.currentGuard = new FileAccessGuard({ workingDir, enabled });
  }

  readFile(filePath: string): string {
    this.checkAccess(filePath);

    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      throw new FileSystemError(`File not found: ${filePath}`);
    }
    return fs.readFileSync(filePath, "utf-8");
  }

  writeFile(filePath: string, content: string): void {
    this.checkAccess(filePath);

    this.audited("file_write", filePath, () => {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
      fs.writeFileSync(filePath, content, "utf-8");
    });
  }

  editFile(
    filePath: string,
    originalText: string,
    replacementText: string
  ): EditResult {
    this.checkAccess(filePath);

    return this.audited("file_edit", filePath, () => {
      const fileText = this.readExisting(filePath);
      if (!originalText || !fileText.includes(originalText)) {
        const matches = findCloseMatches(originalText, fileText);
        const hint = matches.length
          ? ` Did you mean one of these? ${matches.join(", ")}`
          : "";
        throw new ValidationError(`Original text not found.${hint}`);
      }

      const parts = fileText.split(originalText);
      fs.writeFileSync(filePath, parts.join(replacementText), "utf-8");

      return { path: filePath, replacements: parts.length - 1 };
    });
  }

  /**
   * Run a mutation and record "<event>" after it succeeds, or
   * "<event>_failed" with the error before rethrowing
   */
  private audited<T>(eventType: string, filePath: string, mutate: () => T): T {
    let result: T;
    try {
      result = mutate();
    } catch (error) {
      this.auditLog.append(
        `${eventType}_failed`,
        `path=${filePath} error=${describeError(error)}`
      );
      throw error;
    }
    this.auditLog.append(eventType, `path=${filePath}`);
    return result;
  }

  private readExisting(filePath: string): string {
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      throw new FileSystemError(`File not found: ${filePath}`);
    }
    return fs.readFileSync(filePath, "utf-8");
  }

  private checkAccess(filePath: string): void {
    const decision = this.currentGuard.isPathAllowed(filePath);
    if (!decision.allowed) {
      this.auditLog.append("file_access_denied", decision.reason);
      throw new SecurityError(decision.reason);
    }
  }
}
