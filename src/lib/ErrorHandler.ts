/**
 * Error handler for Agent Access Guard
 * Provides structured error responses with specific error codes
 */

import {
  SecurityError,
  ValidationError,
  FileSystemError,
  MCPErrorResponse,
} from "../types";
import {
  IGNORED_PATH_REASON,
  OUTSIDE_WORKING_DIR_REASON,
} from "./FileAccessGuard";

const IGNORED_PATH_MESSAGE = / matches ignore pattern '.*' and is blocked\.$/;

/**
 * Error codes for different error types
 */
export enum ErrorCode {
  // Security errors
  SECURITY_ERROR = "SECURITY_ERROR",
  OUTSIDE_WORKING_DIRECTORY = "OUTSIDE_WORKING_DIRECTORY",
  IGNORED_PATH = "IGNORED_PATH",

  // Validation errors
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",
  TEXT_NOT_FOUND = "TEXT_NOT_FOUND",

  // Filesystem errors
  FILESYSTEM_ERROR = "FILESYSTEM_ERROR",
  FILE_NOT_FOUND = "FILE_NOT_FOUND",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  IS_DIRECTORY = "IS_DIRECTORY",
  DISK_FULL = "DISK_FULL",

  // Generic errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Error handler class
 * Converts errors to structured MCP error responses
 */
export class ErrorHandler {
  /**
   * Convert an error to an MCP error response with structured error codes
   */
  static toMCPError(error: unknown): MCPErrorResponse {
    if (error instanceof SecurityError) {
      return this.handleSecurityError(error);
    }

    if (error instanceof ValidationError) {
      return this.handleValidationError(error);
    }

    if (error instanceof FileSystemError) {
      return this.handleFileSystemError(error);
    }

    if (this.isNodeError(error)) {
      return this.handleNodeError(error);
    }

    const err = error instanceof Error ? error : new Error(String(error));
    return {
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: err.message || "An unexpected error occurred",
        details: {
          name: err.name,
          stack:
            process.env["NODE_ENV"] === "development" ? err.stack : undefined,
        },
      },
    };
  }

  /**
   * Security messages are the guard's reason strings; the code is derived
   * from their fixed tail, which follows the user-supplied path
   */
  private static handleSecurityError(error: SecurityError): MCPErrorResponse {
    const message = error.message;

    let code = ErrorCode.SECURITY_ERROR;
    if (message.endsWith(OUTSIDE_WORKING_DIR_REASON)) {
      code = ErrorCode.OUTSIDE_WORKING_DIRECTORY;
    } else if (
      message.endsWith(IGNORED_PATH_REASON) &&
      IGNORED_PATH_MESSAGE.test(message)
    ) {
      code = ErrorCode.IGNORED_PATH;
    }

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "security_violation",
          remediation: this.getSecurityRemediation(code),
        },
      },
    };
  }

  private static handleValidationError(
    error: ValidationError
  ): MCPErrorResponse {
    const message = error.message.toLowerCase();

    let code = ErrorCode.VALIDATION_ERROR;
    if (message.includes("configuration")) {
      code = ErrorCode.INVALID_CONFIGURATION;
    } else if (message.includes("original text not found")) {
      code = ErrorCode.TEXT_NOT_FOUND;
    } else if (message.includes("argument")) {
      code = ErrorCode.INVALID_ARGUMENT;
    }

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "validation_error",
          remediation: "Check the input parameters and try again",
        },
      },
    };
  }

  private static handleFileSystemError(
    error: FileSystemError
  ): MCPErrorResponse {
    const message = error.message.toLowerCase();

    let code = ErrorCode.FILESYSTEM_ERROR;
    if (message.includes("not found") || message.includes("enoent")) {
      code = ErrorCode.FILE_NOT_FOUND;
    } else if (message.includes("permission") || message.includes("eacces")) {
      code = ErrorCode.PERMISSION_DENIED;
    }

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "filesystem_error",
          remediation:
            code === ErrorCode.FILE_NOT_FOUND
              ? "Verify the file path exists"
              : "Check the filesystem and try again",
        },
      },
    };
  }

  /**
   * Handle Node.js system errors (ENOENT, EACCES, etc.)
   */
  private static handleNodeError(
    error: NodeJS.ErrnoException
  ): MCPErrorResponse {
    let code = ErrorCode.FILESYSTEM_ERROR;
    let remediation = "Check the file path and permissions";

    switch (error.code) {
      case "ENOENT":
        code = ErrorCode.FILE_NOT_FOUND;
        remediation = "The specified file or directory does not exist";
        break;
      case "EACCES":
      case "EPERM":
        code = ErrorCode.PERMISSION_DENIED;
        remediation =
          "Insufficient permissions to access the file or directory";
        break;
      case "EISDIR":
        code = ErrorCode.IS_DIRECTORY;
        remediation = "Cannot perform this operation on a directory";
        break;
      case "ENOSPC":
        code = ErrorCode.DISK_FULL;
        remediation = "No space left on device";
        break;
    }

    return {
      error: {
        code,
        message: error.message,
        details: {
          type: "filesystem_error",
          errno: error.errno,
          syscall: error.syscall,
          path: error.path,
          remediation,
        },
      },
    };
  }

  private static isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return (
      error instanceof Error &&
      "code" in error &&
      typeof error.code === "string" &&
      error.code.startsWith("E")
    );
  }

  private static getSecurityRemediation(code: ErrorCode): string {
    switch (code) {
      case ErrorCode.OUTSIDE_WORKING_DIRECTORY:
        return "Only paths inside the configured working directory can be accessed";
      case ErrorCode.IGNORED_PATH:
        return "This path is excluded by .gitignore or .ai-ignore and cannot be accessed";
      default:
        return "Review the security policy and ensure compliance";
    }
  }

  /**
   * Log error for debugging
   */
  static logError(error: Error, context?: Record<string, unknown>): void {
    console.error(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: "ERROR",
        message: error.message,
        name: error.name,
        stack: error.stack,
        context,
      })
    );
  }
}
