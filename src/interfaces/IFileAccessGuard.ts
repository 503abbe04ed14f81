/**
 * File access guard interface
 *
 * The guard confines file access to a working directory and honours the
 * ignore files found at its root. It reports decisions; acting on a denial
 * is the caller's job.
 */

/**
 * A single line from an ignore file
 */
export interface IgnorePattern {
  /** The line as written, e.g. "!important.log" or "secrets/" */
  raw: string;
  /** True when the line starts with "!" */
  negated: boolean;
  /** Pattern without the leading "!" and without trailing "/" */
  normalized: string;
}

/**
 * Result of testing a relative path against an ordered pattern list
 */
export interface IgnoreMatch {
  ignored: boolean;
  /** The last pattern that matched, which decided the outcome */
  pattern: IgnorePattern | null;
}

/**
 * Decision returned by isPathAllowed
 */
export interface AccessDecision {
  allowed: boolean;
  /** Empty when allowed */
  reason: string;
}

/**
 * Result of a protected-reference scan over code text
 */
export interface ScanResult {
  flagged: boolean;
  /** Empty when not flagged */
  reason: string;
}

export interface FileAccessGuardOptions {
  /** Root of the tree the agent may touch. Omit to leave the guard unconfigured. */
  workingDir?: string | null;
  /** Defaults to true */
  enabled?: boolean;
}

export interface IFileAccessGuard {
  /** Resolved working directory, or null when unconfigured */
  readonly workingDir: string | null;
  readonly enabled: boolean;
  /** Patterns from .gitignore followed by .ai-ignore */
  readonly patterns: readonly IgnorePattern[];

  /**
   * Decide whether a path may be read or written.
   * @param filePath - Absolute path, or a path relative to the process cwd
   */
  isPathAllowed(filePath: string): AccessDecision;

  /**
   * Bulleted list of every non-negated pattern, for inclusion in a
   * model-facing prompt. Empty string when there are none.
   */
  getProtectedPatternsText(): string;
}
