import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { reportArtifact, type ChangeProposalOrchestrator } from "../../../orchestrator/orchestrator.js";
import { HelmBundleSchema, TerraformBundleSchema } from "../../../orchestrator/requests.js";
import { errorResult, jsonResult } from "./response.js";

const target = z.string().min(1).describe("Allow-listed repository or scope the files belong to.");

export function registerValidationTools(server: McpServer, orchestrator: ChangeProposalOrchestrator) {
  server.tool(
    "validate_terraform",
    "Runs terraform init and plan against the files in a sandbox and returns the parsed plan report. Nothing is applied.",
    { target, ...TerraformBundleSchema.shape },
    async ({ target, ...bundle }) => {
      const result = await orchestrator.validateTerraform(bundle, target);
      return result.ok ? jsonResult(reportArtifact(result.value)) : errorResult(result.error);
    }
  );

  server.tool(
    "validate_helm",
    "Lints a Helm chart and renders it with a dry-run install in a sandbox; returns manifests, lint results and notes.",
    { target, ...HelmBundleSchema.shape },
    async ({ target, ...bundle }) => {
      const result = await orchestrator.validateHelm(bundle, target);
      if (!result.ok) return errorResult(result.error);
      return jsonResult({ ...reportArtifact(result.value), manifests: result.value.manifests });
    }
  );

  server.tool(
    "validate_pipeline",
    "Checks the YAML syntax of a GitHub Actions or GitLab CI pipeline file and lists its jobs.",
    {
      path: z.string().min(1).describe("Repository path of the pipeline file."),
      content: z.string().describe("Pipeline file content."),
    },
    async ({ path, content }) => {
      const result = await orchestrator.validatePipeline(path, content);
      return result.ok ? jsonResult(reportArtifact(result.value)) : errorResult(result.error);
    }
  );
}
