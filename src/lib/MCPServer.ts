/**
 * MCP Server exposing the access guard over stdio
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { GuardConfig } from "./ConfigLoader";
import { AuditLog } from "./AuditLog";
import { CommandBlocklist, getDefaultBlocklist } from "./CommandBlocklist";
import { CommandGate, SpawnCommandExecutor } from "./CommandGate";
import { FileAccessGuard } from "./FileAccessGuard";
import { GuardedFileOperations } from "./GuardedFileOperations";
import { MCPTools, toJsonSchema } from "./MCPTools";
import { ErrorHandler } from "./ErrorHandler";

const SERVER_NAME = "agent-access-guard";
const SERVER_VERSION = "0.1.0";
const LOG_PREFIX = "[Agent Access Guard]";

export class MCPServer {
  private server: Server;
  private transport: StdioServerTransport;
  private config: GuardConfig;
  private auditLog: AuditLog;
  private fileOperations: GuardedFileOperations;
  private mcpTools: MCPTools;
  private isRunning = false;

  constructor(config: GuardConfig) {
    this.config = config;

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    const blocklist = config.blocklistPath
      ? CommandBlocklist.load(config.blocklistPath)
      : getDefaultBlocklist();
    this.auditLog = new AuditLog({ logFile: config.auditLogFile });

    const guard = config.workingDir
      ? new FileAccessGuard({
          workingDir: config.workingDir,
          enabled: config.safeMode,
        })
      : FileAccessGuard.disabled();
    this.fileOperations = new GuardedFileOperations({
      auditLog: this.auditLog,
      guard,
    });

    const commandGate = new CommandGate({
      blocklist,
      auditLog: this.auditLog,
      executor: new SpawnCommandExecutor(
        config.workingDir ?? process.cwd(),
        config.commandTimeoutMs
      ),
      guard: () => this.fileOperations.guard,
    });

    this.mcpTools = new MCPTools({
      blocklist,
      fileOperations: this.fileOperations,
      commandGate,
      auditLog: this.auditLog,
      auditMaxAgeDays: config.auditMaxAgeDays,
    });

    this.transport = new StdioServerTransport();

    this.server.onerror = (error) => {
      console.error(`${LOG_PREFIX} Server error:`, error);
    };

    process.on("SIGINT", () => {
      console.error(`${LOG_PREFIX} Received SIGINT, shutting down...`);
      void this.stop();
    });
    process.on("SIGTERM", () => {
      console.error(`${LOG_PREFIX} Received SIGTERM, shutting down...`);
      void this.stop();
    });
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error("Server is already running");
    }

    console.error(`${LOG_PREFIX} Starting ${SERVER_NAME} v${SERVER_VERSION}`);
    const guard = this.fileOperations.guard;
    console.error(
      `${LOG_PREFIX} Working directory: ${guard.workingDir ?? "(none)"}, safe mode: ${
        guard.enabled ? "on" : "off"
      }, ${guard.patterns.length} ignore patterns`
    );

    if (this.config.pruneOnStartup) {
      const pruned = this.auditLog.prune(this.config.auditMaxAgeDays);
      if (pruned) {
        console.error(
          `${LOG_PREFIX} Pruned audit log: kept ${pruned.kept}, removed ${pruned.removed}`
        );
      }
    }

    try {
      this.registerHandlers();
      console.error(
        `${LOG_PREFIX} Registered ${MCPTools.getAllSchemas().length} MCP tools`
      );

      await this.server.connect(this.transport);
      this.isRunning = true;
      console.error(`${LOG_PREFIX} Server started and ready to accept requests`);
    } catch (error) {
      console.error(`${LOG_PREFIX} Failed to start server:`, error);
      throw error;
    }
  }

  /**
   * Register MCP protocol handlers
   */
  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: MCPTools.getAllSchemas().map((schema) => ({
          name: schema.name,
          description: schema.description,
          inputSchema: toJsonSchema(schema.inputSchema),
        })),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      try {
        const result = this.mcpTools.callTool(name, args);
        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(result, null, 2),
            },
          ],
        };
      } catch (error) {
        const errorResponse = ErrorHandler.toMCPError(error);
        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(errorResponse, null, 2),
            },
          ],
          isError: true,
        };
      }
    });
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      console.error(`${LOG_PREFIX} Server is not running, skipping shutdown`);
      return;
    }

    console.error(`${LOG_PREFIX} Shutting down gracefully...`);
    this.isRunning = false;

    try {
      await this.transport.close();
      await this.server.close();
      console.error(`${LOG_PREFIX} Shutdown complete`);
    } catch (error) {
      console.error(`${LOG_PREFIX} Error during shutdown:`, error);
    } finally {
      process.exit(0);
    }
  }

  getServer(): Server {
    return this.server;
  }

  isServerRunning(): boolean {
    return this.isRunning;
  }
}
