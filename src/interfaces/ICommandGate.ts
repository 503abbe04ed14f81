/**
 * Command gate interface - the execution side of the collaborator contract
 */

export interface CommandResult {
  status: "completed" | "blocked" | "failed";
  /** Combined output, or the block reason */
  output: string;
  exitCode: number | null;
}

/**
 * Runs code once the gate has let it through
 */
export interface CommandExecutor {
  execute(language: string, code: string): CommandResult;
}

export interface ICommandGate {
  /**
   * Check code against the blocklist and the protected-reference scanner,
   * then hand it to the executor. A blocked command never reaches the
   * executor.
   */
  run(language: string, code: string): CommandResult;
}
