import { describe, it, expect } from "vitest";
import { chartPreflight, checkChart } from "../../src/parsers/helm_chart.js";
import { aliasBomb } from "../test_helpers/alias_bomb.js";

const CHART = {
  "Chart.yaml": "apiVersion: v2\nname: web\nversion: 0.1.0\n",
  "values.yaml": "replicaCount: 1\n",
  "templates/service.yaml": "kind: Service\n",
};

describe("checkChart", () => {
  it("accepts a complete chart", () => {
    expect(checkChart(CHART)).toEqual({ errors: [], warnings: [] });
    expect(chartPreflight(CHART)).toBeUndefined();
  });

  it("only warns about a missing values.yaml", () => {
    const { "values.yaml": _values, ...files } = CHART;
    expect(checkChart(files)).toEqual({ errors: [], warnings: ["values.yaml is missing"] });
  });

  it("requires Chart.yaml fields and templates", () => {
    const check = checkChart({ "Chart.yaml": "apiVersion: v2\n", "values.yaml": "" });
    expect(check.errors).toEqual([
      "Chart.yaml is missing 'name'",
      "Chart.yaml is missing 'version'",
      "chart has no templates",
    ]);
  });

  it("rejects a scalar Chart.yaml and a missing one", () => {
    expect(checkChart({ ...CHART, "Chart.yaml": "just text" }).errors).toEqual(["Chart.yaml must be a mapping"]);

    const { "Chart.yaml": _chart, ...rest } = CHART;
    expect(checkChart(rest).errors).toEqual(["Chart.yaml is missing"]);
  });

  it("reports YAML that does not parse", () => {
    const check = checkChart({ ...CHART, "values.yaml": "image: [nginx" });
    expect(check.errors).toHaveLength(1);
    expect(check.errors[0]).toMatch(/^values\.yaml does not parse: /);
  });

  it("reports values whose aliases expand past the limit", () => {
    const check = checkChart({ ...CHART, "values.yaml": aliasBomb().join("\n") + "\n" });
    expect(check.errors).toHaveLength(1);
    expect(check.errors[0]).toMatch(/^values\.yaml does not parse: Excessive alias count/);
  });
});

describe("chartPreflight", () => {
  it("builds a failed preflight report", () => {
    const report = chartPreflight({ "Chart.yaml": "name: web\nversion: 1.0.0\n" });

    expect(report?.status).toBe("failed");
    expect(report?.stage).toBe("preflight");
    expect(report?.exitCode).toBe(-1);
    expect(report?.errors).toEqual(["chart has no templates"]);
    expect(report?.lint.warnings).toEqual(["values.yaml is missing"]);
    expect(report?.summary.totalCount).toBe(0);
  });
});
