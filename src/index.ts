/**
 * Agent Access Guard
 *
 * Access-control and audit layer for AI coding agents: a dangerous-command
 * blocklist, a working-directory file guard honouring .gitignore and
 * .ai-ignore, a protected-reference scanner for generated code, and an
 * owner-only audit log. Agents call into it before spawning processes or
 * touching files.
 */

export * from "./interfaces";
export * from "./lib";
export * from "./types";

import { MCPServer } from "./lib/MCPServer";
import { ConfigLoader } from "./lib/ConfigLoader";

/**
 * Create and start the MCP access guard server
 */
export async function startAgentAccessGuardServer(): Promise<MCPServer> {
  const config = ConfigLoader.loadConfig();
  const server = new MCPServer(config);
  await server.start();
  return server;
}
