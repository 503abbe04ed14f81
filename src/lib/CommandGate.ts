/**
 * Command gate
 *
 * Execution side of the collaborator contract. Code is checked against the
 * blocklist and, when a guard is configured, against the protected-reference
 * scanner. Anything blocked is audited and returned as a "blocked" result
 * without ever reaching the executor.
 */

import { spawnSync } from "child_process";
import { IAuditLog } from "../interfaces/IAuditLog";
import { ICommandBlocklist } from "../interfaces/ICommandBlocklist";
import {
  CommandExecutor,
  CommandResult,
  ICommandGate,
} from "../interfaces/ICommandGate";
import { IFileAccessGuard } from "../interfaces/IFileAccessGuard";
import { scanCode } from "./CodeReferenceScanner";

export const DEFAULT_COMMAND_TIMEOUT_MS = 60_000;

/** Interpreter invocation per language; code is passed on the command line */
const INTERPRETERS: Record<string, { command: string; args: string[] }> = {
  shell: { command: "bash", args: ["-c"] },
  bash: { command: "bash", args: ["-c"] },
  sh: { command: "sh", args: ["-c"] },
  python: { command: "python3", args: ["-c"] },
  javascript: { command: "node", args: ["-e"] },
  node: { command: "node", args: ["-e"] },
};

/**
 * Runs code with a local interpreter through spawnSync
 */
export class SpawnCommandExecutor implements CommandExecutor {
  constructor(
    private readonly cwd: string = process.cwd(),
    private readonly timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS
  ) {}

  execute(language: string, code: string): CommandResult {
    const interpreter = INTERPRETERS[language.toLowerCase()];
    if (!interpreter) {
      return {
        status: "failed",
        output: `Unsupported language: ${language}`,
        exitCode: null,
      };
    }

    const result = spawnSync(interpreter.command, [...interpreter.args, code], {
      cwd: this.cwd,
      encoding: "utf-8",
      timeout: this.timeoutMs,
    });

    if (result.error) {
      return { status: "failed", output: result.error.message, exitCode: null };
    }

    return {
      status: result.status === 0 ? "completed" : "failed",
      output: `${result.stdout ?? ""}${result.stderr ?? ""}`,
      exitCode: result.status,
    };
  }
}

export interface CommandGateOptions {
  blocklist: ICommandBlocklist;
  auditLog: IAuditLog;
  executor: CommandExecutor;
  /** Read on every run so a replaced guard takes effect immediately */
  guard?: () => IFileAccessGuard | null;
}

export class CommandGate implements ICommandGate {
  private readonly blocklist: ICommandBlocklist;
  private readonly auditLog: IAuditLog;
  private readonly executor: CommandExecutor;
  private readonly guard: () => IFileAccessGuard | null;

  constructor(options: CommandGateOptions) {
    this.blocklist = options.blocklist;
    this.auditLog = options.auditLog;
    this.executor = options.executor;
    this.guard = options.guard ?? (() => null);
  }

  run(language: string, code: string): CommandResult {
    const check = this.blocklist.isBlocked(code);
    if (check.blocked) {
      this.auditLog.append(
        "command_blocked",
        `pattern=${check.matchedPattern ?? ""} language=${language}`
      );
      return {
        status: "blocked",
        output: `Blocked: command matches blocked pattern '${check.matchedPattern ?? ""}'`,
        exitCode: null,
      };
    }

    const scan = scanCode(code, this.guard());
    if (scan.flagged) {
      this.auditLog.append("protected_access_blocked", scan.reason);
      return {
        status: "blocked",
        output: `Blocked: ${scan.reason}`,
        exitCode: null,
      };
    }

    return this.executor.execute(language, code);
  }
}
