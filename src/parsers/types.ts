import type { SandboxResult, SandboxRun, SandboxStage } from '../sandbox/types.js';

export type ReportStatus = 'success' | 'no_changes' | 'changes_required' | 'failed';

export type ChangeAction = 'create' | 'update' | 'delete';

export interface ResourceChange {
  type: string;
  name: string;
  address: string;
  action: ChangeAction;
  provider: string;
}

export interface DriftRecord {
  type: string;
  name: string;
  address: string;
  action: string;
}

export interface ManifestRecord {
  kind: string;
  namespace: string;
  name: string;
}

export interface LintResult {
  passed: boolean;
  warnings: string[];
  errors: string[];
  info: string[];
}

export interface PlanSummary {
  add: number;
  change: number;
  destroy: number;
  drift: DriftRecord[];
  /** Planned actions that are not counted (noop, read, move, import, forget). */
  otherActions: { address: string; action: string }[];
}

export interface ManifestSummary {
  totalCount: number;
  byKind: Record<string, number>;
  byNamespace: Record<string, number>;
  resourceNames: string[];
  hasSecrets: boolean;
  hasConfigmaps: boolean;
  hasServices: boolean;
  hasIngress: boolean;
}

export interface PipelineSummary {
  path: string;
  platform: 'github_actions' | 'gitlab_ci' | 'unknown';
  jobs: string[];
}

export type ReportStage = SandboxStage | 'preflight' | 'syntax';

interface ReportBase {
  readonly status: ReportStatus;
  /** Stage the status was decided at: the failing stage, or the last one run. */
  readonly stage: ReportStage;
  readonly exitCode: number;
  readonly timedOut: boolean;
  readonly resourceChanges: readonly ResourceChange[];
  readonly manifests: readonly ManifestRecord[];
  readonly lint: LintResult;
  readonly notes: string;
  readonly rawOutput: string;
  readonly errors: readonly string[];
}

export interface TerraformPlanReport extends ReportBase {
  readonly kind: 'terraform_plan';
  readonly summary: PlanSummary;
}

export interface HelmRenderReport extends ReportBase {
  readonly kind: 'helm_render';
  readonly summary: ManifestSummary;
}

export interface PipelineSyntaxReport extends ReportBase {
  readonly kind: 'pipeline_syntax';
  readonly summary: PipelineSummary;
}

/** Normalized result of one validated artifact. Frozen once built. */
export type ValidationReport = TerraformPlanReport | HelmRenderReport | PipelineSyntaxReport;
export type ReportKind = ValidationReport['kind'];

export interface ToolOutputParser<R extends ValidationReport = ValidationReport> {
  /** Never throws: a failed or unreadable tool run is a `failed` report. */
  parse(raw: SandboxResult | SandboxRun): R;
}

export function toRun(raw: SandboxResult | SandboxRun): SandboxRun {
  return 'stages' in raw ? raw : { stages: [raw] };
}

export function emptyLint(passed: boolean): LintResult {
  return { passed, warnings: [], errors: [], info: [] };
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
