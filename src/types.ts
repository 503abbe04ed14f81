/**
 * Common types for Agent Access Guard
 *
 * Error classes raised by the guarded collaborators and the response shapes
 * returned by the MCP tools. The decision functions themselves
 * (isBlocked, isPathAllowed, scanCode) never throw; only the collaborators
 * that act on a decision do.
 */

/**
 * Security error - a guard decision denied the operation
 *
 * This is the permission-class failure the file and command collaborators
 * raise. The message is the guard's reason text, so callers can show it to
 * the model verbatim.
 *
 * Common causes:
 * - Path outside the working directory
 * - Path matches a .gitignore / .ai-ignore pattern
 * - Command matches a blocklist pattern
 * - Code references a protected file or pattern
 *
 * @example
 * ```typescript
 * throw new SecurityError("Path '/etc/passwd' is outside the allowed working directory.");
 * ```
 */
export class SecurityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SecurityError";
  }
}

/**
 * Validation error - thrown when input validation fails
 *
 * Raised for malformed tool arguments, invalid configuration files and
 * edits whose original text is not present in the target file.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Filesystem error - thrown when an underlying file operation fails
 */
export class FileSystemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FileSystemError";
  }
}

/**
 * MCP error response structure
 *
 * @example
 * ```json
 * {
 *   "error": {
 *     "code": "OUTSIDE_WORKING_DIRECTORY",
 *     "message": "Path '/etc/passwd' is outside the allowed working directory.",
 *     "details": {
 *       "type": "security_violation",
 *       "remediation": "Only paths inside the configured working directory can be accessed"
 *     }
 *   }
 * }
 * ```
 */
export interface MCPErrorResponse {
  error: {
    /** Error code from the ErrorCode enum */
    code: string;
    /** Human-readable error message */
    message: string;
    /** Optional additional error details */
    details?: Record<string, unknown>;
  };
}
