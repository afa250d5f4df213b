#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { fileURLToPath } from "url";
import { loadConfig } from "../../config.js";
import { setLogLevel, setMetricsDir } from "../../logger.js";
import { createProposalContext, type ProposalContext } from "../../orchestrator/context.js";
import { ChangeProposalOrchestrator } from "../../orchestrator/orchestrator.js";
import { registerAuditTools } from "./tools/audit_tools.js";
import { registerProposalTools } from "./tools/proposal_tools.js";
import { registerValidationTools } from "./tools/validation_tools.js";

export class ProposalsServer {
  private server: McpServer;
  private orchestrator: ChangeProposalOrchestrator;

  constructor(private readonly ctx: ProposalContext) {
    this.server = new McpServer({
      name: "iac-proposals",
      version: "0.1.0",
    });
    this.orchestrator = new ChangeProposalOrchestrator(ctx);

    this.setupTools();
  }

  private setupTools() {
    registerValidationTools(this.server, this.orchestrator);
    registerProposalTools(this.server, this.orchestrator);
    registerAuditTools(this.server, this.ctx.audit);
  }

  async run() {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error("Proposals MCP Server running on stdio");
  }
}

export async function startServer(cwd: string = process.cwd()): Promise<ProposalsServer> {
  const config = await loadConfig(cwd);
  setLogLevel(config.logLevel);
  setMetricsDir(config.metricsDir);

  const server = new ProposalsServer(createProposalContext(config));
  await server.run();
  return server;
}

const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);
if (isMainModule) {
  startServer().catch((err) => {
    console.error("Fatal error in Proposals MCP Server:", err);
    process.exit(1);
  });
}
