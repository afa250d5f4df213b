import { describe, it, expect } from "vitest";
import { TerraformPlanParser, parsePlanMessages, parseValidateOutput, summarizePlan } from "../../src/parsers/terraform_plan.js";
import { readFixture, stageResult } from "../test_helpers/sandbox_results.js";

const jsonl = (...messages: object[]) => messages.map((m) => JSON.stringify(m)).join("\n");

describe("TerraformPlanParser", () => {
  const parser = new TerraformPlanParser();
  const init = stageResult({ stage: "init", tool: "terraform", stdout: "Terraform has been successfully initialized!\n" });

  it("reports a plan with changes from exit code 2", () => {
    const report = parser.parse({
      stages: [
        init,
        stageResult({ stage: "plan", tool: "terraform", exitCode: 2, stdout: readFixture("terraform/plan_create.jsonl") }),
      ],
    });

    expect(report.kind).toBe("terraform_plan");
    expect(report.status).toBe("changes_required");
    expect(report.stage).toBe("plan");
    expect(report.exitCode).toBe(2);
    expect(report.summary.add).toBe(1);
    expect(report.summary.change).toBe(0);
    expect(report.summary.destroy).toBe(0);
    expect(report.resourceChanges).toEqual([
      {
        type: "aws_s3_bucket",
        name: "logs",
        address: "aws_s3_bucket.logs",
        provider: "aws",
        action: "create",
      },
    ]);
    expect(report.errors).toEqual([]);
    expect(report.lint.passed).toBe(true);
  });

  it("freezes the report", () => {
    const report = parser.parse(stageResult({ stage: "plan", stdout: readFixture("terraform/plan_create.jsonl"), exitCode: 2 }));

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.summary)).toBe(true);
    expect(Object.isFrozen(report.resourceChanges[0])).toBe(true);
  });

  it("reports no changes on exit code 0", () => {
    const report = parser.parse({
      stages: [init, stageResult({ stage: "plan", stdout: jsonl({ type: "change_summary", "@level": "info" }) })],
    });

    expect(report.status).toBe("no_changes");
    expect(report.resourceChanges).toEqual([]);
  });

  it("collects diagnostics from a failed plan", () => {
    const report = parser.parse({
      stages: [init, stageResult({ stage: "plan", exitCode: 1, stdout: readFixture("terraform/plan_error.jsonl") })],
    });

    expect(report.status).toBe("failed");
    expect(report.errors).toEqual([
      'Reference to undeclared resource: A managed resource "aws_s3_bucket" "missing" has not been declared in the root module.',
    ]);
    expect(report.lint.passed).toBe(false);
    expect(report.lint.errors).toEqual(report.errors);
  });

  it("falls back to stderr when a failing plan has no diagnostics", () => {
    const report = parser.parse(stageResult({ stage: "plan", exitCode: 1, stderr: "Error: backend unreachable\n" }));

    expect(report.status).toBe("failed");
    expect(report.errors).toEqual(["Error: backend unreachable"]);
  });

  it("reports an init failure without a plan", () => {
    const report = parser.parse({
      stages: [
        stageResult({
          stage: "init",
          tool: "terraform",
          exitCode: 1,
          stderr: "Error: Failed to query available provider packages\n",
        }),
      ],
      failedStage: "init",
    });

    expect(report.status).toBe("failed");
    expect(report.stage).toBe("init");
    expect(report.exitCode).toBe(1);
    expect(report.errors).toEqual(["terraform init failed: Error: Failed to query available provider packages"]);
  });

  it("reports a timed out plan", () => {
    const report = parser.parse({
      stages: [
        init,
        stageResult({ stage: "plan", tool: "terraform", exitCode: -1, timedOut: true, durationMs: 500 }),
      ],
    });

    expect(report.status).toBe("failed");
    expect(report.timedOut).toBe(true);
    expect(report.errors).toEqual(["terraform timed out after 500ms"]);
  });

  it("reports validate diagnostics and skips the plan", () => {
    const validateOutput = JSON.stringify({
      format_version: "1.0",
      valid: false,
      error_count: 1,
      warning_count: 1,
      diagnostics: [
        { severity: "error", summary: "Unsupported argument", detail: 'An argument named "acl" is not expected here.' },
        { severity: "warning", summary: "Deprecated attribute" },
      ],
    });

    const report = parser.parse({
      stages: [init, stageResult({ stage: "validate", tool: "terraform", exitCode: 1, stdout: validateOutput })],
      failedStage: "validate",
    });

    expect(report.status).toBe("failed");
    expect(report.stage).toBe("validate");
    expect(report.exitCode).toBe(1);
    expect(report.errors).toEqual([
      'terraform validate failed: Unsupported argument: An argument named "acl" is not expected here.',
    ]);
    expect(report.lint).toEqual({
      passed: false,
      warnings: ["Deprecated attribute"],
      errors: ['Unsupported argument: An argument named "acl" is not expected here.'],
      info: [],
    });
  });

  it("lists unformatted files as lint warnings without failing the plan", () => {
    const report = parser.parse({
      stages: [
        init,
        stageResult({ stage: "validate", tool: "terraform", stdout: '{"valid":true,"diagnostics":[]}' }),
        stageResult({ stage: "fmt", tool: "terraform", exitCode: 3, stdout: "main.tf\nmodules/net/vars.tf\n" }),
        stageResult({ stage: "plan", tool: "terraform", exitCode: 2, stdout: readFixture("terraform/plan_create.jsonl") }),
      ],
    });

    expect(report.status).toBe("changes_required");
    expect(report.errors).toEqual([]);
    expect(report.lint).toEqual({
      passed: true,
      warnings: [
        "main.tf: not in canonical format (terraform fmt)",
        "modules/net/vars.tf: not in canonical format (terraform fmt)",
      ],
      errors: [],
      info: [],
    });
  });

  it("gives the same report for the same run", () => {
    const run = {
      stages: [
        init,
        stageResult({ stage: "plan", tool: "terraform", exitCode: 2, stdout: readFixture("terraform/plan_create.jsonl") }),
      ],
    };

    expect(parser.parse(run)).toEqual(parser.parse(run));
  });

  it("reports a run with no stages", () => {
    const report = parser.parse({ stages: [] });
    expect(report.status).toBe("failed");
    expect(report.errors).toEqual(["no terraform stage was executed"]);
  });
});

describe("parseValidateOutput", () => {
  it("ignores output that is not the validate document", () => {
    expect(parseValidateOutput("Success! The configuration is valid.")).toBeUndefined();
    expect(parseValidateOutput('{"valid":true}')).toEqual({ errors: [], warnings: [] });
  });
});

describe("summarizePlan", () => {
  it("counts a replace as one add and one destroy and keeps drift apart", () => {
    const resource = (addr: string) => ({
      addr,
      resource_type: addr.split(".")[0],
      resource_name: addr.split(".")[1],
      implied_provider: "aws",
    });
    const messages = parsePlanMessages(
      jsonl(
        { type: "planned_change", change: { resource: resource("aws_instance.web"), action: "replace" } },
        { type: "planned_change", change: { resource: resource("aws_iam_role.ci"), action: "update" } },
        { type: "planned_change", change: { resource: resource("aws_vpc.main"), action: "noop" } },
        { type: "resource_drift", change: { resource: resource("aws_sg.db"), action: "update" } },
        { "@level": "warn", "@message": "Warning: Deprecated attribute", type: "diagnostic" },
      ),
    );

    const { summary, resourceChanges, warnings } = summarizePlan(messages);

    expect(summary.add).toBe(1);
    expect(summary.change).toBe(1);
    expect(summary.destroy).toBe(1);
    expect(resourceChanges.map((c) => `${c.action} ${c.address}`)).toEqual([
      "delete aws_instance.web",
      "create aws_instance.web",
      "update aws_iam_role.ci",
    ]);
    expect(summary.otherActions).toEqual([{ address: "aws_vpc.main", action: "noop" }]);
    expect(summary.drift).toEqual([{ type: "aws_sg", name: "db", address: "aws_sg.db", action: "update" }]);
    expect(warnings).toEqual(["Warning: Deprecated attribute"]);
  });

  it("skips blank, malformed and non-object lines", () => {
    const messages = parsePlanMessages('\nnot json\n[1, 2]\n{"type":"version"}\n');
    expect(messages).toHaveLength(1);
    expect(messages[0].type).toBe("version");
  });
});
