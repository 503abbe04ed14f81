/**
 * MCP tool definitions for the access guard
 *
 * Provides 9 MCP tools:
 * 1. guard_check_command - Check command text against the blocklist
 * 2. guard_check_path - Check whether a path may be accessed
 * 3. guard_scan_code - Scan code for references to protected files
 * 4. guard_protected_patterns - List protected patterns for the model prompt
 * 5. guard_read_file - Read a file through the guard
 * 6. guard_write_file - Write a file through the guard
 * 7. guard_edit_file - Replace text in a file through the guard
 * 8. guard_run_command - Run code after blocklist and reference checks
 * 9. guard_prune_audit_log - Drop audit entries past retention
 */

import { z } from "zod";
import { IAuditLog } from "../interfaces/IAuditLog";
import { ICommandBlocklist } from "../interfaces/ICommandBlocklist";
import { CommandResult, ICommandGate } from "../interfaces/ICommandGate";
import { IGuardedFileOperations } from "../interfaces/IGuardedFileOperations";
import { ValidationError } from "../types";
import { DEFAULT_MAX_AGE_DAYS } from "./AuditLog";
import { scanCode } from "./CodeReferenceScanner";

export interface ToolSchema {
  name: string;
  description: string;
  inputSchema: z.AnyZodObject;
}

export interface JsonSchemaProperty {
  type: "string" | "number" | "integer" | "boolean";
  description?: string;
  enum?: string[];
}

export interface ToolJsonSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

function describeField(field: z.ZodTypeAny): JsonSchemaProperty {
  let inner = field;
  while (inner instanceof z.ZodOptional || inner instanceof z.ZodDefault) {
    inner = inner instanceof z.ZodOptional ? inner.unwrap() : inner.removeDefault();
  }

  const description = field.description ?? inner.description;
  const base = description ? { description } : {};

  if (inner instanceof z.ZodNumber) {
    return { type: inner.isInt ? "integer" : "number", ...base };
  }
  if (inner instanceof z.ZodBoolean) {
    return { type: "boolean", ...base };
  }
  if (inner instanceof z.ZodEnum) {
    return { type: "string", enum: [...inner.options], ...base };
  }
  return { type: "string", ...base };
}

/**
 * Convert a flat Zod object schema to the JSON Schema MCP clients expect
 */
export function toJsonSchema(schema: z.AnyZodObject): ToolJsonSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    properties[key] = describeField(value);
    if (!value.isOptional()) {
      required.push(key);
    }
  }

  return { type: "object", properties, required };
}

export interface MCPToolsDependencies {
  blocklist: ICommandBlocklist;
  fileOperations: IGuardedFileOperations;
  commandGate: ICommandGate;
  auditLog: IAuditLog;
  auditMaxAgeDays?: number;
}

/**
 * MCP Tools class
 * Provides all tool implementations for the Agent Access Guard server
 */
export class MCPTools {
  private readonly blocklist: ICommandBlocklist;
  private readonly fileOperations: IGuardedFileOperations;
  private readonly commandGate: ICommandGate;
  private readonly auditLog: IAuditLog;
  private readonly auditMaxAgeDays: number;

  constructor(deps: MCPToolsDependencies) {
    this.blocklist = deps.blocklist;
    this.fileOperations = deps.fileOperations;
    this.commandGate = deps.commandGate;
    this.auditLog = deps.auditLog;
    this.auditMaxAgeDays = deps.auditMaxAgeDays ?? DEFAULT_MAX_AGE_DAYS;
  }

  /**
   * Tool 1: guard_check_command
   */
  guardCheckCommand(args: { command: string }): {
    status: string;
    blocked: boolean;
    matchedPattern: string | null;
  } {
    const result = this.blocklist.isBlocked(args.command);
    return { status: "success", ...result };
  }

  static getGuardCheckCommandSchema() {
    return {
      name: "guard_check_command",
      description:
        "Check shell or script text against the dangerous-command blocklist",
      inputSchema: z.object({
        command: z.string().describe("Command or script text to check"),
      }),
    };
  }

  /**
   * Tool 2: guard_check_path
   */
  guardCheckPath(args: { path: string }): {
    status: string;
    path: string;
    allowed: boolean;
    reason: string;
  } {
    const decision = this.fileOperations.guard.isPathAllowed(args.path);
    return { status: "success", path: args.path, ...decision };
  }

  static getGuardCheckPathSchema() {
    return {
      name: "guard_check_path",
      description:
        "Check whether a path is inside the working directory and not excluded by ignore files",
      inputSchema: z.object({
        path: z.string().min(1).describe("Path to check"),
      }),
    };
  }

  /**
   * Tool 3: guard_scan_code
   */
  guardScanCode(args: { code: string }): {
    status: string;
    flagged: boolean;
    reason: string;
  } {
    const result = scanCode(args.code, this.fileOperations.guard);
    return { status: "success", ...result };
  }

  static getGuardScanCodeSchema() {
    return {
      name: "guard_scan_code",
      description: "Scan code for references to protected files or patterns",
      inputSchema: z.object({
        code: z.string().describe("Code or command text to scan"),
      }),
    };
  }

  /**
   * Tool 4: guard_protected_patterns
   */
  guardProtectedPatterns(): {
    status: string;
    workingDir: string | null;
    enabled: boolean;
    patterns: string;
  } {
    const guard = this.fileOperations.guard;
    return {
      status: "success",
      workingDir: guard.workingDir,
      enabled: guard.enabled,
      patterns: guard.getProtectedPatternsText(),
    };
  }

  static getGuardProtectedPatternsSchema() {
    return {
      name: "guard_protected_patterns",
      description:
        "List the ignore patterns the agent must not touch, one per line",
      inputSchema: z.object({}),
    };
  }

  /**
   * Tool 5: guard_read_file
   */
  guardReadFile(args: { path: string }): {
    status: string;
    path: string;
    content: string;
  } {
    const content = this.fileOperations.readFile(args.path);
    return { status: "success", path: args.path, content };
  }

  static getGuardReadFileSchema() {
    return {
      name: "guard_read_file",
      description: "Read a text file inside the working directory",
      inputSchema: z.object({
        path: z.string().min(1).describe("File path"),
      }),
    };
  }

  /**
   * Tool 6: guard_write_file
   */
  guardWriteFile(args: { path: string; content: string }): {
    status: string;
    path: string;
    bytesWritten: number;
  } {
    this.fileOperations.writeFile(args.path, args.content);
    return {
      status: "success",
      path: args.path,
      bytesWritten: Buffer.byteLength(args.content, "utf-8"),
    };
  }

  static getGuardWriteFileSchema() {
    return {
      name: "guard_write_file",
      description: "Write a text file inside the working directory",
      inputSchema: z.object({
        path: z.string().min(1).describe("File path"),
        content: z.string().describe("New file content"),
      }),
    };
  }

  /**
   * Tool 7: guard_edit_file
   */
  guardEditFile(args: {
    path: string;
    originalText: string;
    replacementText: string;
  }): { status: string; path: string; replacements: number } {
    const result = this.fileOperations.editFile(
      args.path,
      args.originalText,
      args.replacementText
    );
    return { status: "success", ...result };
  }

  static getGuardEditFileSchema() {
    return {
      name: "guard_edit_file",
      description:
        "Replace every occurrence of a text fragment in a file inside the working directory",
      inputSchema: z.object({
        path: z.string().min(1).describe("File path"),
        originalText: z.string().min(1).describe("Exact text to replace"),
        replacementText: z.string().describe("Replacement text"),
      }),
    };
  }

  /**
   * Tool 8: guard_run_command
   */
  guardRunCommand(args: { language?: string; code: string }): CommandResult {
    return this.commandGate.run(args.language ?? "shell", args.code);
  }

  static getGuardRunCommandSchema() {
    return {
      name: "guard_run_command",
      description:
        "Run code after checking it against the blocklist and the protected patterns",
      inputSchema: z.object({
        language: z
          .enum(["shell", "bash", "sh", "python", "javascript", "node"])
          .optional()
          .describe("Interpreter (default: shell)"),
        code: z.string().min(1).describe("Code to run"),
      }),
    };
  }

  /**
   * Tool 9: guard_prune_audit_log
   */
  guardPruneAuditLog(args: { maxAgeDays?: number }): {
    status: string;
    logFile: string;
    kept: number;
    removed: number;
  } {
    const result = this.auditLog.prune(args.maxAgeDays ?? this.auditMaxAgeDays);
    return {
      status: result ? "success" : "skipped",
      logFile: this.auditLog.getLogFile(),
      kept: result?.kept ?? 0,
      removed: result?.removed ?? 0,
    };
  }

  static getGuardPruneAuditLogSchema() {
    return {
      name: "guard_prune_audit_log",
      description: "Remove audit log entries older than the retention window",
      inputSchema: z.object({
        maxAgeDays: z
          .number()
          .int()
          .nonnegative()
          .optional()
          .describe("Retention in days (default: configured value)"),
      }),
    };
  }

  /**
   * Validate raw arguments against the tool's schema and invoke it
   */
  callTool(name: string, args: unknown): unknown {
    const input = args ?? {};
    switch (name) {
      case "guard_check_command":
        return this.guardCheckCommand(
          MCPTools.parseArgs(MCPTools.getGuardCheckCommandSchema(), input)
        );
      case "guard_check_path":
        return this.guardCheckPath(
          MCPTools.parseArgs(MCPTools.getGuardCheckPathSchema(), input)
        );
      case "guard_scan_code":
        return this.guardScanCode(
          MCPTools.parseArgs(MCPTools.getGuardScanCodeSchema(), input)
        );
      case "guard_protected_patterns":
        MCPTools.parseArgs(MCPTools.getGuardProtectedPatternsSchema(), input);
        return this.guardProtectedPatterns();
      case "guard_read_file":
        return this.guardReadFile(
          MCPTools.parseArgs(MCPTools.getGuardReadFileSchema(), input)
        );
      case "guard_write_file":
        return this.guardWriteFile(
          MCPTools.parseArgs(MCPTools.getGuardWriteFileSchema(), input)
        );
      case "guard_edit_file":
        return this.guardEditFile(
          MCPTools.parseArgs(MCPTools.getGuardEditFileSchema(), input)
        );
      case "guard_run_command":
        return this.guardRunCommand(
          MCPTools.parseArgs(MCPTools.getGuardRunCommandSchema(), input)
        );
      case "guard_prune_audit_log":
        return this.guardPruneAuditLog(
          MCPTools.parseArgs(MCPTools.getGuardPruneAuditLogSchema(), input)
        );
      default:
        throw new ValidationError(`Unknown tool: ${name}`);
    }
  }

  private static parseArgs<T>(
    schema: { name: string; inputSchema: z.ZodType<T, z.ZodTypeDef, unknown> },
    args: unknown
  ): T {
    const result = schema.inputSchema.safeParse(args);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ValidationError(`Invalid argument for ${schema.name}: ${issues}`);
    }
    return result.data;
  }

  /**
   * Get all tool schemas
   */
  static getAllSchemas(): ToolSchema[] {
    return [
      MCPTools.getGuardCheckCommandSchema(),
      MCPTools.getGuardCheckPathSchema(),
      MCPTools.getGuardScanCodeSchema(),
      MCPTools.getGuardProtectedPatternsSchema(),
      MCPTools.getGuardReadFileSchema(),
      MCPTools.getGuardWriteFileSchema(),
      MCPTools.getGuardEditFileSchema(),
      MCPTools.getGuardRunCommandSchema(),
      MCPTools.getGuardPruneAuditLogSchema(),
    ];
  }
}
