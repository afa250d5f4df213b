import { isMap, parseDocument } from 'yaml';
import { errorMessage } from '../errors.js';
import { deepFreeze, emptyLint, type PipelineSummary, type PipelineSyntaxReport } from './types.js';

// Top-level keys of .gitlab-ci.yml that configure the pipeline rather than name a job.
const GITLAB_RESERVED = new Set([
  'stages',
  'variables',
  'include',
  'default',
  'workflow',
  'image',
  'services',
  'before_script',
  'after_script',
  'cache',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function detectPlatform(path: string, content: Record<string, unknown>): PipelineSummary['platform'] {
  if (path.startsWith('.github/workflows/')) return 'github_actions';
  if (path === '.gitlab-ci.yml' || path.endsWith('/.gitlab-ci.yml')) return 'gitlab_ci';
  // yaml 1.2 keeps `on` as a string key
  if ('on' in content && 'jobs' in content) return 'github_actions';
  return 'unknown';
}

function listJobs(platform: PipelineSummary['platform'], content: Record<string, unknown>): string[] {
  if (platform === 'github_actions') {
    return isRecord(content.jobs) ? Object.keys(content.jobs) : [];
  }
  return Object.entries(content)
    .filter(([name, value]) => {
      if (GITLAB_RESERVED.has(name) || name.startsWith('.')) return false;
      return isRecord(value) && ('script' in value || 'trigger' in value || 'extends' in value);
    })
    .map(([name]) => name);
}

/** Syntax check of one CI/CD pipeline file; no external tool is run. */
export function validatePipelineSyntax(path: string, content: string): PipelineSyntaxReport {
  const errors: string[] = [];
  const warnings: string[] = [];
  let summary: PipelineSummary = { path, platform: 'unknown', jobs: [] };

  const doc = parseDocument(content);
  for (const warning of doc.warnings) warnings.push(warning.message);

  if (doc.errors.length > 0) {
    errors.push(...doc.errors.map((e) => e.message));
  } else if (!isMap(doc.contents)) {
    errors.push(`${path}: top level must be a mapping`);
  } else {
    let value: unknown;
    try {
      value = doc.toJS();
    } catch (e) {
      // alias expansion limits, among others
      errors.push(`${path}: ${errorMessage(e)}`);
    }
    if (errors.length === 0) {
      const mapping = isRecord(value) ? value : {};
      const platform = detectPlatform(path, mapping);
      const jobs = listJobs(platform, mapping);
      summary = { path, platform, jobs };

      if (platform === 'unknown') warnings.push(`${path}: unrecognized pipeline platform`);
      if (jobs.length === 0) errors.push(`${path}: no jobs defined`);
    }
  }

  const report: PipelineSyntaxReport = {
    kind: 'pipeline_syntax',
    status: errors.length === 0 ? 'success' : 'failed',
    stage: 'syntax',
    exitCode: errors.length === 0 ? 0 : 1,
    timedOut: false,
    resourceChanges: [],
    manifests: [],
    lint: { ...emptyLint(errors.length === 0), warnings, errors: [...errors] },
    notes: '',
    rawOutput: content,
    errors,
    summary,
  };
  return deepFreeze(report);
}
