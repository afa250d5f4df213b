import { describe, it, expect } from "vitest";
import { validatePipelineSyntax } from "../../src/parsers/pipeline_syntax.js";
import { aliasBomb } from "../test_helpers/alias_bomb.js";

describe("validatePipelineSyntax", () => {
  it("accepts a GitHub Actions workflow", () => {
    const content = [
      "name: CI",
      "on: [push]",
      "jobs:",
      "  build:",
      "    runs-on: ubuntu-latest",
      "    steps:",
      "      - run: npm test",
      "",
    ].join("\n");

    const report = validatePipelineSyntax(".github/workflows/ci.yml", content);

    expect(report.status).toBe("success");
    expect(report.stage).toBe("syntax");
    expect(report.exitCode).toBe(0);
    expect(report.summary).toEqual({ path: ".github/workflows/ci.yml", platform: "github_actions", jobs: ["build"] });
    expect(report.lint).toEqual({ passed: true, warnings: [], errors: [], info: [] });
    expect(report.rawOutput).toBe(content);
  });

  it("lists GitLab jobs and skips reserved keys and hidden templates", () => {
    const content = [
      "stages: [test, deploy]",
      "variables:",
      "  GIT_DEPTH: 1",
      ".defaults:",
      "  script: echo base",
      "test:",
      "  stage: test",
      "  script:",
      "    - make test",
      "deploy:",
      "  trigger: group/downstream",
      "",
    ].join("\n");

    const report = validatePipelineSyntax(".gitlab-ci.yml", content);

    expect(report.status).toBe("success");
    expect(report.summary.platform).toBe("gitlab_ci");
    expect(report.summary.jobs).toEqual(["test", "deploy"]);
  });

  it("recognizes a workflow by its keys", () => {
    const report = validatePipelineSyntax("workflow.yml", "on: push\njobs:\n  lint:\n    runs-on: ubuntu-latest\n");
    expect(report.summary.platform).toBe("github_actions");
    expect(report.summary.jobs).toEqual(["lint"]);
  });

  it("fails a file of unknown shape with no jobs", () => {
    const report = validatePipelineSyntax("ci/pipeline.yml", "foo: bar\n");

    expect(report.status).toBe("failed");
    expect(report.exitCode).toBe(1);
    expect(report.errors).toEqual(["ci/pipeline.yml: no jobs defined"]);
    expect(report.lint.warnings).toEqual(["ci/pipeline.yml: unrecognized pipeline platform"]);
  });

  it("requires a mapping at the top level", () => {
    const report = validatePipelineSyntax(".gitlab-ci.yml", "- build\n- test\n");
    expect(report.errors).toEqual([".gitlab-ci.yml: top level must be a mapping"]);
  });

  it("reports YAML syntax errors", () => {
    const report = validatePipelineSyntax(".gitlab-ci.yml", "test:\n  script: [make\n");
    expect(report.status).toBe("failed");
    expect(report.errors.length).toBeGreaterThan(0);
    expect(report.summary.jobs).toEqual([]);
  });

  it("fails a file whose aliases expand past the limit instead of throwing", () => {
    const content = ["on: push", "jobs:", "  build:", "    runs-on: ubuntu-latest", ...aliasBomb(), ""].join("\n");

    const report = validatePipelineSyntax(".github/workflows/ci.yml", content);

    expect(report.status).toBe("failed");
    expect(report.exitCode).toBe(1);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0]).toMatch(/^\.github\/workflows\/ci\.yml: Excessive alias count/);
    expect(report.summary.jobs).toEqual([]);
  });
});
