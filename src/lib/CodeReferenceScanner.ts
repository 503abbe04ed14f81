/**
 * Protected-reference scanner
 *
 * Flags code or commands that name a protected file before they run. It
 * complements the runtime path guard: "cat .env" is caught here even though
 * the shell, not the guard, would open the file.
 */

import { IFileAccessGuard, ScanResult } from "../interfaces/IFileAccessGuard";

const NOT_FLAGGED: ScanResult = Object.freeze({ flagged: false, reason: "" });

export function scanCode(
  code: string,
  guard: IFileAccessGuard | null | undefined
): ScanResult {
  if (!guard || !guard.enabled || guard.patterns.length === 0) {
    return NOT_FLAGGED;
  }

  for (const pattern of guard.patterns) {
    if (pattern.negated) {
      continue;
    }
    const clean = pattern.normalized;
    if (!clean) {
      continue;
    }

    // "*.key" -> look for ".key"
    if (clean.startsWith("*")) {
      const suffix = clean.slice(1);
      if (suffix && code.includes(suffix)) {
        return {
          flagged: true,
          reason: `Code references protected pattern '${pattern.raw}'`,
        };
      }
    } else if (code.includes(clean)) {
      return {
        flagged: true,
        reason: `Code references protected file/directory '${pattern.raw}'`,
      };
    }
  }

  return NOT_FLAGGED;
}
