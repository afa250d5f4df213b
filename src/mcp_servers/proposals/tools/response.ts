import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ProposalError } from "../../../orchestrator/orchestrator.js";

export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
  };
}

export function errorResult(error: ProposalError): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: `Error (${error.stage}, ${error.error.code}): ${error.error.message}`,
      },
    ],
    isError: true,
  };
}
