/**
 * Core interfaces for Agent Access Guard
 */

export * from "./ICommandBlocklist";
export * from "./IFileAccessGuard";
export * from "./IAuditLog";
export * from "./ICommandGate";
export * from "./IGuardedFileOperations";
