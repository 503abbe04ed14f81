/**
 * Configuration loader for Agent Access Guard
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ValidationError } from "../types";
import { DEFAULT_MAX_AGE_DAYS } from "./AuditLog";
import { DEFAULT_COMMAND_TIMEOUT_MS } from "./CommandGate";

export const CONFIG_FILE_NAME = "agent-access-guard.config.json";

export const GuardConfigSchema = z
  .object({
    /** Root the agent may touch; null leaves the guard unconfigured */
    workingDir: z.string().min(1).nullable().default(null),
    /** Enables the file access guard and the protected-reference scanner */
    safeMode: z.boolean().default(false),
    /** CSV with command/type columns; bundled list when omitted */
    blocklistPath: z.string().min(1).optional(),
    auditLogFile: z.string().min(1).optional(),
    auditMaxAgeDays: z.number().int().nonnegative().default(DEFAULT_MAX_AGE_DAYS),
    pruneOnStartup: z.boolean().default(true),
    commandTimeoutMs: z.number().int().positive().default(DEFAULT_COMMAND_TIMEOUT_MS),
  })
  .strict();

export type GuardConfig = z.infer<typeof GuardConfigSchema>;

function parseBoolean(value: string): boolean {
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export class ConfigLoader {
  /**
   * Load configuration from file or environment
   */
  static loadConfig(env: NodeJS.ProcessEnv = process.env): GuardConfig {
    const configPath =
      env["AGENT_ACCESS_GUARD_CONFIG"] ||
      path.join(process.cwd(), CONFIG_FILE_NAME);

    let raw: Record<string, unknown> = {};
    if (fs.existsSync(configPath)) {
      raw = ConfigLoader.readJson(configPath);
    }

    // Environment overrides the file
    const workingDir = env["AGENT_ACCESS_GUARD_WORKING_DIR"];
    if (workingDir) {
      raw = { ...raw, workingDir };
    }
    const safeMode = env["AGENT_ACCESS_GUARD_SAFE_MODE"];
    if (safeMode) {
      raw = { ...raw, safeMode: parseBoolean(safeMode) };
    }

    return ConfigLoader.parse(raw, configPath);
  }

  static parse(raw: unknown, source = "<inline>"): GuardConfig {
    const result = GuardConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ValidationError(`Invalid configuration in ${source}: ${issues}`);
    }
    return result.data;
  }

  private static readJson(configPath: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (error) {
      throw new ValidationError(
        `Invalid configuration in ${configPath}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new ValidationError(
        `Invalid configuration in ${configPath}: expected a JSON object`
      );
    }
    return { ...parsed };
  }
}
