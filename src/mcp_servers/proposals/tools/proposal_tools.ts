import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ChangeProposalOrchestrator, ProposalOutcome } from "../../../orchestrator/orchestrator.js";
import { InfrastructureRequestShape, PipelineRequestShape } from "../../../orchestrator/requests.js";
import { errorResult, jsonResult } from "./response.js";

const summarize = (outcome: ProposalOutcome) => ({
  proposalUrl: outcome.proposalUrl,
  branchName: outcome.branchName,
  branchExisted: outcome.branchExisted,
  reusedExisting: outcome.reusedExisting,
  artifactsAttached: outcome.artifactsAttached,
  files: outcome.files,
  validation: outcome.reports.map((r) => ({ kind: r.kind, status: r.status, errors: r.errors })),
});

export function registerProposalTools(server: McpServer, orchestrator: ChangeProposalOrchestrator) {
  server.tool(
    "create_infrastructure_proposal",
    "Validates Terraform and/or Helm files, then opens a pull/merge request with the files and the dry-run reports attached.",
    InfrastructureRequestShape,
    async (args) => {
      const result = await orchestrator.proposeInfrastructure({ kind: "infrastructure", ...args });
      return result.ok ? jsonResult(summarize(result.value)) : errorResult(result.error);
    }
  );

  server.tool(
    "create_pipeline_proposal",
    "Validates a CI/CD pipeline file, then opens a pull/merge request with it and the validation report attached.",
    PipelineRequestShape,
    async (args) => {
      const result = await orchestrator.proposePipeline({ kind: "pipeline", ...args });
      return result.ok ? jsonResult(summarize(result.value)) : errorResult(result.error);
    }
  );
}
