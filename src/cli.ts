#!/usr/bin/env node

/**
 * CLI entry point for the Agent Access Guard MCP server
 */

import { startAgentAccessGuardServer } from "./index";
import { ErrorHandler } from "./lib/ErrorHandler";

process.on("unhandledRejection", (reason) => {
  console.error("[Agent Access Guard] Unhandled promise rejection:", reason);
});

async function main(): Promise<void> {
  try {
    await startAgentAccessGuardServer();
  } catch (error) {
    ErrorHandler.logError(
      error instanceof Error ? error : new Error(String(error)),
      { phase: "startup" }
    );
    process.exit(1);
  }
}

void main();
