/**
 * Core library exports for Agent Access Guard
 */

export * from "./IgnoreFileParser";
export * from "./PathMatcher";
export * from "./CommandBlocklist";
export * from "./FileAccessGuard";
export * from "./CodeReferenceScanner";
export * from "./AuditLog";
export * from "./GuardedFileOperations";
export * from "./CommandGate";
export * from "./MCPServer";
export * from "./MCPTools";
export * from "./ConfigLoader";
export * from "./ErrorHandler";
