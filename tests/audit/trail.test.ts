import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFile, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { existsSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { AuditTrail, auditFileName, dayKey, type AuditEntry } from "../../src/audit/trail.js";
import { AuditWriteError } from "../../src/errors.js";
import { recordingLogger, type RecordingLogger } from "../test_helpers/recording_logger.js";

describe("AuditTrail", () => {
  let dir: string;
  let current: Date;
  let logger: RecordingLogger;
  let trail: AuditTrail;

  const at = (iso: string) => {
    current = new Date(iso);
  };
  const tick = (ms = 1000) => {
    current = new Date(current.getTime() + ms);
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "audit-test-"));
    at("2024-03-10T12:00:00.000Z");
    logger = recordingLogger();
    trail = new AuditTrail(join(dir, "logs"), { now: () => current, logger });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("appends entries and returns them newest first", async () => {
    const ids: string[] = [];
    for (let i = 0; i < 5; i++) {
      ids.push(await trail.append({ operationType: `op-${i}`, agent: "tester", inputs: { i } }));
      tick();
    }

    const entries = await trail.query();

    expect(entries.map((e) => e.operationType)).toEqual(["op-4", "op-3", "op-2", "op-1", "op-0"]);
    expect(entries.map((e) => e.id)).toEqual([...ids].reverse());
    expect(new Set(ids).size).toBe(5);
    expect(ids.every((id) => /^[0-9a-f]{12}$/.test(id))).toBe(true);
    expect(entries[4]).toEqual({
      id: ids[0],
      timestamp: "2024-03-10T12:00:00.000Z",
      operationType: "op-0",
      agent: "tester",
      inputs: { i: 0 },
      outputs: {},
      citations: [],
      status: "completed",
    });
  });

  it("partitions entries by UTC day", async () => {
    at("2024-03-09T23:59:59.000Z");
    await trail.append({ operationType: "late", agent: "tester" });
    at("2024-03-10T00:00:01.000Z");
    await trail.append({ operationType: "early", agent: "tester" });

    expect(existsSync(join(dir, "logs", "audit_20240309.jsonl"))).toBe(true);
    expect(existsSync(join(dir, "logs", "audit_20240310.jsonl"))).toBe(true);
    expect((await trail.query()).map((e) => e.operationType)).toEqual(["early", "late"]);
  });

  it("filters by type, agent, status and an inclusive time range", async () => {
    await trail.append({ operationType: "terraform_plan", agent: "validator", status: "completed" });
    tick();
    await trail.append({ operationType: "github_publish", agent: "github_publisher", status: "denied" });
    tick();
    await trail.append({ operationType: "terraform_plan", agent: "validator", status: "failed" });

    expect((await trail.query({ operationType: "terraform_plan" })).map((e) => e.status)).toEqual([
      "failed",
      "completed",
    ]);
    expect((await trail.query({ agent: "github_publisher" })).map((e) => e.status)).toEqual(["denied"]);
    expect((await trail.query({ status: "failed" })).map((e) => e.operationType)).toEqual(["terraform_plan"]);

    const window = await trail.query({
      since: new Date("2024-03-10T12:00:01.000Z"),
      until: new Date("2024-03-10T12:00:02.000Z"),
    });
    expect(window.map((e) => e.operationType)).toEqual(["terraform_plan", "github_publish"]);
    expect(await trail.query({}, 1)).toHaveLength(1);
  });

  it("skips malformed lines with a warning", async () => {
    await trail.append({ operationType: "first", agent: "tester" });
    const file = join(dir, "logs", auditFileName(current));
    await appendFile(file, "not json\n" + JSON.stringify({ id: 1 }) + "\n");
    tick();
    await trail.append({ operationType: "second", agent: "tester" });

    const entries = await trail.query();

    expect(entries.map((e) => e.operationType)).toEqual(["second", "first"]);
    expect(logger.lines.filter((l) => l.level === "warn")).toHaveLength(2);
  });

  it("computes daily statistics", async () => {
    await trail.append({ operationType: "terraform_plan", agent: "validator" });
    await trail.append({ operationType: "terraform_plan", agent: "infrastructure" });
    await trail.append({ operationType: "infrastructure_proposal", agent: "infrastructure" });

    expect(await trail.dailyStats()).toEqual({
      date: "20240310",
      totalOperations: 3,
      byType: { terraform_plan: 2, infrastructure_proposal: 1 },
      byAgent: { validator: 1, infrastructure: 2 },
    });
    expect((await trail.dailyStats(new Date("2024-03-01T00:00:00Z"))).totalOperations).toBe(0);
  });

  it("aggregates statistics across days", async () => {
    at("2024-03-09T10:00:00.000Z");
    await trail.append({ operationType: "helm_dry_run", agent: "validator", status: "failed" });
    at("2024-03-10T10:00:00.000Z");
    await trail.append({ operationType: "helm_dry_run", agent: "validator" });
    await trail.append({ operationType: "gitlab_publish", agent: "gitlab_publisher" });

    expect(await trail.statistics()).toEqual({
      totalOperations: 3,
      uniqueAgents: 2,
      byType: { helm_dry_run: 2, gitlab_publish: 1 },
      byAgent: { validator: 2, gitlab_publisher: 1 },
      byStatus: { completed: 2, failed: 1 },
      byDate: { "2024-03-10": 2, "2024-03-09": 1 },
    });
  });

  it("exports to a new file and refuses to overwrite", async () => {
    await trail.append({ operationType: "a", agent: "tester" });
    await trail.append({ operationType: "b", agent: "tester" });
    const out = join(dir, "export.json");

    expect(await trail.export(out)).toBe(2);
    const exported: AuditEntry[] = JSON.parse(await readFile(out, "utf-8"));
    expect(exported.map((e) => e.operationType)).toEqual(["b", "a"]);

    await expect(trail.export(out)).rejects.toThrow(/EEXIST/);
  });

  it("raises AuditWriteError when the log cannot be written", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "not a directory");
    const broken = new AuditTrail(join(blocker, "logs"), { now: () => current, logger: recordingLogger() });

    await expect(broken.append({ operationType: "x", agent: "tester" })).rejects.toBeInstanceOf(AuditWriteError);
  });

  it("keeps every line intact under concurrent appends", async () => {
    const ids = await Promise.all(
      Array.from({ length: 20 }, (_, i) => trail.append({ operationType: "concurrent", agent: `agent-${i}` })),
    );

    const lines = (await readFile(join(dir, "logs", auditFileName(current)), "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(20);
    expect(new Set(lines.map((line) => JSON.parse(line).id))).toEqual(new Set(ids));
    expect((await trail.statistics()).uniqueAgents).toBe(20);
  });
});

describe("dayKey", () => {
  it("uses the UTC calendar day", () => {
    expect(dayKey(new Date("2024-12-31T23:30:00-02:00"))).toBe("20250101");
    expect(auditFileName(new Date("2024-01-05T00:00:00Z"))).toBe("audit_20240105.jsonl");
  });
});
