/**
 * Command blocklist interface for pre-execution command checks
 */

/**
 * Outcome of a blocklist check
 */
export interface BlockCheckResult {
  /** True when a blocklist pattern matched */
  blocked: boolean;
  /** The pattern as written in the source, or null when nothing matched */
  matchedPattern: string | null;
}

/**
 * A split pipe-chain pattern such as `curl|bash`
 */
export interface PipePattern {
  left: string;
  right: string;
}

export interface ICommandBlocklist {
  /**
   * Check command or script text against the loaded patterns.
   * Patterns are tried in load order and the first match wins.
   * Never throws.
   */
  isBlocked(text: string): BlockCheckResult;

  /**
   * Patterns in load order
   */
  getPatterns(): readonly string[];
}
