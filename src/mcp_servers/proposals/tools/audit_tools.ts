import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AuditTrail } from "../../../audit/trail.js";

const dateTime = z.string().datetime({ offset: true });

/** `YYYYMMDD` as a UTC date. */
export function parseDayKey(key: string): Date {
  return new Date(Date.UTC(Number(key.slice(0, 4)), Number(key.slice(4, 6)) - 1, Number(key.slice(6, 8))));
}

export function registerAuditTools(server: McpServer, audit: AuditTrail) {
  server.tool(
    "query_audit",
    "Returns audit entries, newest first.",
    {
      operationType: z.string().optional().describe("Only entries of this operation type."),
      agent: z.string().optional().describe("Only entries written by this agent."),
      status: z.enum(["completed", "failed", "denied"]).optional(),
      since: dateTime.optional().describe("ISO timestamp; defaults to 30 days before `until`."),
      until: dateTime.optional().describe("ISO timestamp; defaults to now."),
      limit: z.number().int().positive().max(1000).default(50),
    },
    async ({ since, until, limit, ...filters }) => {
      const entries = await audit.query(
        {
          ...filters,
          ...(since ? { since: new Date(since) } : {}),
          ...(until ? { until: new Date(until) } : {}),
        },
        limit
      );
      return {
        content: [{ type: "text", text: JSON.stringify(entries, null, 2) }],
      };
    }
  );

  server.tool(
    "audit_stats",
    "Counts audit entries by operation type and agent, for one day or a time range.",
    {
      date: z
        .string()
        .regex(/^\d{8}$/)
        .optional()
        .describe("Day as YYYYMMDD (UTC). Takes precedence over since/until."),
      since: dateTime.optional(),
      until: dateTime.optional(),
    },
    async ({ date, since, until }) => {
      const stats = date
        ? await audit.dailyStats(parseDayKey(date))
        : await audit.statistics({
            ...(since ? { since: new Date(since) } : {}),
            ...(until ? { until: new Date(until) } : {}),
          });
      return {
        content: [{ type: "text", text: JSON.stringify(stats, null, 2) }],
      };
    }
  );
}
