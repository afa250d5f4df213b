import { parseDocument } from 'yaml';
import { errorMessage } from '../errors.js';
import type { FileSet } from '../sandbox/types.js';
import { summarizeManifests } from './helm_render.js';
import { deepFreeze, type HelmRenderReport, type LintResult } from './types.js';

export interface ChartCheck {
  errors: string[];
  warnings: string[];
}

function readYaml(content: string): { value?: unknown; error?: string } {
  const doc = parseDocument(content);
  if (doc.errors.length > 0) return { error: doc.errors[0].message };
  try {
    return { value: doc.toJS() };
  } catch (e) {
    return { error: errorMessage(e) };
  }
}

/** Structural checks on a chart before Helm is spawned. */
export function checkChart(files: FileSet): ChartCheck {
  const check: ChartCheck = { errors: [], warnings: [] };

  const chartYaml = files['Chart.yaml'];
  if (chartYaml === undefined) {
    check.errors.push('Chart.yaml is missing');
  } else {
    const { value, error } = readYaml(chartYaml);
    if (error) {
      check.errors.push(`Chart.yaml does not parse: ${error}`);
    } else if (typeof value !== 'object' || value === null) {
      check.errors.push('Chart.yaml must be a mapping');
    } else {
      for (const field of ['name', 'version']) {
        if (!(field in value)) check.errors.push(`Chart.yaml is missing '${field}'`);
      }
    }
  }

  const valuesYaml = files['values.yaml'];
  if (valuesYaml === undefined) {
    check.warnings.push('values.yaml is missing');
  } else {
    const { error } = readYaml(valuesYaml);
    if (error) check.errors.push(`values.yaml does not parse: ${error}`);
  }

  if (!Object.keys(files).some((path) => path.startsWith('templates/'))) {
    check.errors.push('chart has no templates');
  }

  return check;
}

/** A failed `preflight` report, or undefined when the chart may be handed to Helm. */
export function chartPreflight(files: FileSet): HelmRenderReport | undefined {
  const { errors, warnings } = checkChart(files);
  if (errors.length === 0) return undefined;

  const lint: LintResult = { passed: false, warnings, errors, info: [] };
  const report: HelmRenderReport = {
    kind: 'helm_render',
    status: 'failed',
    stage: 'preflight',
    exitCode: -1,
    timedOut: false,
    resourceChanges: [],
    manifests: [],
    lint,
    notes: '',
    rawOutput: '',
    errors: [...errors],
    summary: summarizeManifests([]),
  };
  return deepFreeze(report);
}
