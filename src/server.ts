import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { AuthManager } from "./auth/AuthManager.js";
import { AppConfig } from "./config/AppConfig.js";
import { MarkerLabelCache } from "./labels/MarkerLabelCache.js";
import { GmailProvider } from "./provider/GmailProvider.js";
import { MailProvider } from "./provider/MailProvider.js";
import { RuleStore } from "./rules/RuleStore.js";
import { toolDefinitions } from "./tools/definitions/index.js";
import { handleToolCall, ToolArgs, ToolContext, ToolResult } from "./tools/handler.js";
import { SerialQueue } from "./utils/concurrency.js";
import { logger } from "./utils/logger.js";

export interface RetentionMcpServerOptions {
  config: AppConfig;
  authManager?: AuthManager;
  /** Mailbox access; defaults to Gmail through the auth manager. */
  getProvider?: () => Promise<MailProvider>;
}

export class RetentionMcpServer {
  private server: Server;
  private authManager: AuthManager;
  private context: ToolContext;
  private shutdown = new AbortController();
  private provider: MailProvider | null = null;

  constructor(options: RetentionMcpServerOptions) {
    const { config } = options;

    this.server = new Server(
      {
        name: "mail-retention-engine",
        version: "0.1.0",
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.authManager =
      options.authManager ??
      new AuthManager({
        credentialsPath: config.paths.credentials,
        tokenPath: config.paths.token,
      });

    this.context = {
      ruleStore: new RuleStore(config.paths.rules, config.markerPrefix),
      auth: this.authManager,
      getProvider: options.getProvider ?? (() => this.gmailProvider()),
      markerCache: new MarkerLabelCache(),
      processing: {
        pageSize: config.processing.pageSize,
        maxPages: config.processing.maxPages,
        chunkSize: config.processing.chunkSize,
        chunkConcurrency: config.processing.chunkConcurrency,
        ageConversion: config.ageConversion,
      },
      queue: new SerialQueue(),
      signal: this.shutdown.signal,
    };

    this.setupHandlers();
    this.setupErrorHandling();
  }

  listTools(): Tool[] {
    return toolDefinitions;
  }

  callTool(name: string, args: ToolArgs = {}): Promise<ToolResult> {
    return handleToolCall(name, args, this.context);
  }

  private setupHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      logger.debug("Handling list tools request");
      return {
        tools: this.listTools(),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      logger.debug("Handling tool call", { tool: request.params.name });
      return this.callTool(request.params.name, request.params.arguments ?? {});
    });
  }

  private setupErrorHandling() {
    this.server.onerror = (error) => {
      logger.error("MCP Server error:", error);
    };
  }

  private async gmailProvider(): Promise<MailProvider> {
    if (!this.provider) {
      const gmail = await this.authManager.getGmailClient();
      this.provider = new GmailProvider(gmail);
    }
    return this.provider;
  }

  async connect(transport: Transport) {
    await this.server.connect(transport);
    logger.info("Retention MCP server connected to transport");
  }

  /** Cancels a run in progress and closes the transport. */
  async close() {
    this.shutdown.abort();
    await this.server.close();
    logger.info("Retention MCP server closed");
  }
}
