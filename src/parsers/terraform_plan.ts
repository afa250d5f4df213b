import { z } from 'zod';
import { describeFailure } from '../sandbox/runner.js';
import type { SandboxResult, SandboxRun } from '../sandbox/types.js';
import {
  deepFreeze,
  toRun,
  type DriftRecord,
  type PlanSummary,
  type ResourceChange,
  type TerraformPlanReport,
  type ToolOutputParser,
} from './types.js';

const ResourceSchema = z
  .object({
    addr: z.string().optional(),
    resource: z.string().optional(),
    resource_type: z.string().optional(),
    resource_name: z.string().optional(),
    implied_provider: z.string().optional(),
    provider_name: z.string().optional(),
  })
  .passthrough();

const PlanMessageSchema = z
  .object({
    '@level': z.string().optional(),
    '@message': z.string().optional(),
    type: z.string().optional(),
    change: z
      .object({
        resource: ResourceSchema.optional(),
        action: z.string().optional(),
      })
      .passthrough()
      .optional(),
    diagnostic: z
      .object({
        severity: z.string().optional(),
        summary: z.string().optional(),
        detail: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const ValidateOutputSchema = z
  .object({
    valid: z.boolean().optional(),
    diagnostics: z
      .array(
        z
          .object({
            severity: z.string().optional(),
            summary: z.string().optional(),
            detail: z.string().optional(),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough();

export type PlanMessage = z.infer<typeof PlanMessageSchema>;
type PlanResource = z.infer<typeof ResourceSchema>;

/** Newline-delimited JSON; blank, malformed or non-object lines are skipped. */
export function parsePlanMessages(output: string): PlanMessage[] {
  const messages: PlanMessage[] = [];
  for (const line of output.split('\n')) {
    if (!line.trim()) continue;
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      continue;
    }
    const parsed = PlanMessageSchema.safeParse(value);
    if (parsed.success) messages.push(parsed.data);
  }
  return messages;
}

const describeResource = (resource: PlanResource | undefined) => ({
  type: resource?.resource_type ?? 'unknown',
  name: resource?.resource_name ?? 'unknown',
  address: resource?.addr ?? resource?.resource ?? '',
  provider: resource?.implied_provider ?? resource?.provider_name ?? '',
});

function formatDiagnostic(diagnostic: { summary?: string; detail?: string } | undefined, fallback: string): string {
  const summary = diagnostic?.summary;
  if (!summary) return fallback;
  return diagnostic?.detail ? `${summary}: ${diagnostic.detail}` : summary;
}

function diagnosticText(message: PlanMessage): string {
  return formatDiagnostic(message.diagnostic, message['@message'] ?? 'unknown error');
}

export interface ConfigChecks {
  errors: string[];
  warnings: string[];
}

/** `terraform validate -json` output; undefined when it is not the JSON document. */
export function parseValidateOutput(output: string): ConfigChecks | undefined {
  let value: unknown;
  try {
    value = JSON.parse(output);
  } catch {
    return undefined;
  }
  const parsed = ValidateOutputSchema.safeParse(value);
  if (!parsed.success) return undefined;

  const checks: ConfigChecks = { errors: [], warnings: [] };
  for (const diagnostic of parsed.data.diagnostics) {
    const text = formatDiagnostic(diagnostic, 'unknown diagnostic');
    if (diagnostic.severity === 'warning') checks.warnings.push(text);
    else checks.errors.push(text);
  }
  return checks;
}

/** Files listed by `terraform fmt -check -list=true`. */
export function unformattedFiles(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

interface PlanAccumulator {
  summary: PlanSummary;
  resourceChanges: ResourceChange[];
  errors: string[];
  warnings: string[];
}

export function summarizePlan(messages: PlanMessage[]): PlanAccumulator {
  const acc: PlanAccumulator = {
    summary: { add: 0, change: 0, destroy: 0, drift: [], otherActions: [] },
    resourceChanges: [],
    errors: [],
    warnings: [],
  };

  for (const message of messages) {
    const level = message['@level'];
    if (level === 'error') {
      acc.errors.push(diagnosticText(message));
      continue;
    }
    if (level === 'warn') {
      acc.warnings.push(diagnosticText(message));
    }

    if (message.type === 'planned_change') {
      const action = message.change?.action ?? 'unknown';
      const resource = describeResource(message.change?.resource);

      switch (action) {
        case 'create':
          acc.summary.add++;
          acc.resourceChanges.push({ ...resource, action: 'create' });
          break;
        case 'update':
          acc.summary.change++;
          acc.resourceChanges.push({ ...resource, action: 'update' });
          break;
        case 'delete':
          acc.summary.destroy++;
          acc.resourceChanges.push({ ...resource, action: 'delete' });
          break;
        case 'replace':
          acc.summary.destroy++;
          acc.summary.add++;
          acc.resourceChanges.push({ ...resource, action: 'delete' }, { ...resource, action: 'create' });
          break;
        default:
          acc.summary.otherActions.push({ address: resource.address, action });
      }
    } else if (message.type === 'resource_drift') {
      const { type, name, address } = describeResource(message.change?.resource);
      const drift: DriftRecord = { type, name, address, action: message.change?.action ?? 'unknown' };
      acc.summary.drift.push(drift);
    }
  }

  return acc;
}

/**
 * Parses an init → validate → fmt → plan chain, or a lone plan. Plan exit code 2
 * is a valid plan with changes; validate and fmt findings land in `lint`.
 */
export class TerraformPlanParser implements ToolOutputParser<TerraformPlanReport> {
  parse(raw: SandboxResult | SandboxRun): TerraformPlanReport {
    const run = toRun(raw);
    const last = run.stages[run.stages.length - 1];

    if (!last) {
      return deepFreeze(this.emptyFailure('no terraform stage was executed'));
    }

    const validateStage = run.stages.find((s) => s.stage === 'validate');
    const checks = (validateStage && parseValidateOutput(validateStage.stdout)) ?? { errors: [], warnings: [] };
    const fmtStage = run.stages.find((s) => s.stage === 'fmt');
    const fmtWarnings = fmtStage
      ? unformattedFiles(fmtStage.stdout).map((file) => `${file}: not in canonical format (terraform fmt)`)
      : [];

    if (run.failedStage !== undefined || last.stage !== 'plan') {
      const failure = describeFailure(last);
      let errors: string[];
      if (!failure && last.stage === 'validate' && checks.errors.length > 0) {
        errors = checks.errors.map((e) => `terraform validate failed: ${e}`);
      } else {
        const detail =
          failure?.message ?? (last.stderr.trim() || `terraform ${last.stage} exited with code ${last.exitCode}`);
        errors = [`terraform ${last.stage} failed: ${detail}`];
      }
      const report: TerraformPlanReport = {
        ...this.emptyFailure(errors[0]),
        stage: last.stage,
        exitCode: last.exitCode,
        timedOut: last.timedOut,
        lint: { passed: false, warnings: [...checks.warnings, ...fmtWarnings], errors: [...checks.errors], info: [] },
        rawOutput: last.stdout,
        errors,
      };
      return deepFreeze(report);
    }

    const { summary, resourceChanges, errors: diagnostics, warnings } = summarizePlan(parsePlanMessages(last.stdout));
    const errors = [...diagnostics];
    const failure = describeFailure(last);
    if (failure) errors.push(failure.message);

    let status: TerraformPlanReport['status'];
    if (errors.length > 0) {
      status = 'failed';
    } else if (last.exitCode === 0) {
      status = 'no_changes';
    } else if (last.exitCode === 2) {
      status = 'changes_required';
    } else {
      status = 'failed';
      errors.push(last.stderr.trim() || `terraform plan exited with code ${last.exitCode}`);
    }

    const lintErrors = [...checks.errors, ...diagnostics];
    const report: TerraformPlanReport = {
      kind: 'terraform_plan',
      status,
      stage: last.stage,
      exitCode: last.exitCode,
      timedOut: last.timedOut,
      resourceChanges,
      manifests: [],
      lint: {
        passed: lintErrors.length === 0,
        warnings: [...checks.warnings, ...fmtWarnings, ...warnings],
        errors: lintErrors,
        info: [],
      },
      notes: '',
      rawOutput: last.stdout,
      errors,
      summary,
    };
    return deepFreeze(report);
  }

  private emptyFailure(error: string): TerraformPlanReport {
    return {
      kind: 'terraform_plan',
      status: 'failed',
      stage: 'plan',
      exitCode: -1,
      timedOut: false,
      resourceChanges: [],
      manifests: [],
      lint: { passed: false, warnings: [], errors: [], info: [] },
      notes: '',
      rawOutput: '',
      errors: [error],
      summary: { add: 0, change: 0, destroy: 0, drift: [], otherActions: [] },
    };
  }
}
