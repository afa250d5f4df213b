/**
 * ChangeProposalOrchestrator
 * guard -> credentials -> file set and scopes -> citations -> validate -> gate
 * -> publish -> attach -> audit. Nothing is published from an unparsed run, and
 * a failed report blocks publishing unless `publishOnFailedValidation` is set.
 */

import { acceptsHashComments, type Citation } from '../citations/tracker.js';
import type { AuditStatus } from '../audit/trail.js';
import {
  AuditWriteError,
  ConfigurationError,
  NotAllowListedError,
  PipelineError,
  PublishError,
  SandboxExecutionError,
  ScopeNotAllowedError,
  ValidationFailedError,
  errorMessage,
} from '../errors.js';
import { chartPreflight } from '../parsers/helm_chart.js';
import { validatePipelineSyntax } from '../parsers/pipeline_syntax.js';
import type {
  HelmRenderReport,
  PipelineSyntaxReport,
  TerraformPlanReport,
  ValidationReport,
} from '../parsers/types.js';
import { branchTimestamp } from '../publishers/format.js';
import type { Artifacts, ProposalPublisher, PublishedProposal } from '../publishers/types.js';
import { err, ok, type Result } from '../result.js';
import { assertSafeFileSet, prefixFileSet } from '../sandbox/file_set.js';
import { assertHelmIdentifiers, helmRenderSandbox, type HelmBundle } from '../sandbox/helm.js';
import { extractProviders, terraformPlanSandbox, type TerraformBundle } from '../sandbox/terraform.js';
import type { FileSet } from '../sandbox/types.js';
import type { ProposalContext } from './context.js';
import { infrastructureBody, pipelineBody } from './proposal_body.js';
import type { InfrastructureRequest, PipelineRequest, ProposalRequest } from './requests.js';

export type ProposalStage = 'authorize' | 'credentials' | 'preflight' | 'validate' | 'publish';

export interface ProposalError {
  stage: ProposalStage;
  error: PipelineError;
  /** Reports produced before the failure, if any. */
  reports: readonly ValidationReport[];
}

export interface ProposalOutcome {
  proposalUrl: string;
  branchName: string;
  branchExisted: boolean;
  reusedExisting: boolean;
  /** False when the PR/MR was opened but the artifact comment could not be posted. */
  artifactsAttached: boolean;
  reports: readonly ValidationReport[];
  citations: readonly Citation[];
  files: string[];
}

export const TERRAFORM_PREFIX = 'infra';
export const HELM_PREFIX = 'deploy/chart';

interface PublishPlan {
  publisher: ProposalPublisher;
  operationType: string;
  agent: string;
  repoUrl: string;
  baseBranch?: string;
  branchName: string;
  title: string;
  body: string;
  files: FileSet;
  artifacts: Artifacts;
  reports: readonly ValidationReport[];
  sources: readonly Citation[];
  inputs: Record<string, unknown>;
}

interface BoundFiles {
  files: Record<string, string>;
  contentHashes: Record<string, string>;
}

const slug = (value: string) =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, '-')
    .replace(/^-+|-+$/g, '');

/** Report fields worth attaching to a proposal; raw tool output stays out. */
export function reportArtifact(report: ValidationReport): Record<string, unknown> {
  return {
    kind: report.kind,
    status: report.status,
    stage: report.stage,
    exitCode: report.exitCode,
    timedOut: report.timedOut,
    errors: report.errors,
    lint: report.lint,
    summary: report.summary,
    ...(report.notes ? { notes: report.notes } : {}),
  };
}

/** `helm_dry_run` or `helm_template`: audit operation and artifact key of a Helm render. */
export const helmOperation = (bundle: Pick<HelmBundle, 'render'>) => `helm_${bundle.render ?? 'dry_run'}`;

function asPipelineError(stage: ProposalStage, e: unknown): PipelineError {
  if (e instanceof PipelineError) return e;
  const message = errorMessage(e);
  if (stage === 'publish') return new PublishError(message, undefined, { cause: e });
  if (stage === 'validate') return new SandboxExecutionError('sandbox', message, { cause: e });
  return new ConfigurationError(message, 'CONFIGURATION', { cause: e });
}

export class ChangeProposalOrchestrator {
  constructor(private readonly ctx: ProposalContext) {}

  propose(request: ProposalRequest): Promise<Result<ProposalOutcome, ProposalError>> {
    switch (request.kind) {
      case 'infrastructure':
        return this.proposeInfrastructure(request);
      case 'pipeline':
        return this.proposePipeline(request);
      default: {
        const unreachable: never = request;
        throw new ConfigurationError(`Unknown proposal request: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  async proposeInfrastructure(request: InfrastructureRequest): Promise<Result<ProposalOutcome, ProposalError>> {
    const operationType = 'infrastructure_proposal';
    const agent = 'infrastructure';
    const sources = request.sources ?? [];
    const inputs = {
      repoUrl: request.repoUrl,
      target: request.target,
      environments: request.environments,
      domain: request.domain,
      terraformFiles: Object.keys(request.terraform?.files ?? {}),
      helmFiles: Object.keys(request.helm?.files ?? {}),
    };

    const prechecked = await this.precheck(operationType, agent, request.repoUrl, inputs, sources, () => {
      if (!request.terraform && !request.helm) {
        throw new ConfigurationError('An infrastructure proposal needs Terraform or Helm files');
      }
      if (request.terraform) this.checkTerraform(request.terraform);
      if (request.helm) this.checkHelm(request.helm);
    });
    if (!prechecked.ok) return prechecked;

    const terraform = request.terraform && { ...request.terraform, ...this.bindFiles(request.terraform.files, sources) };
    const helm = request.helm && { ...request.helm, ...this.bindFiles(request.helm.files, sources) };

    const reports: { terraform?: TerraformPlanReport; helm?: HelmRenderReport } = {};
    try {
      if (terraform) reports.terraform = await this.runTerraform(terraform, request.repoUrl, agent);
      if (helm) reports.helm = await this.runHelm(helm, request.repoUrl, agent);
    } catch (e) {
      return this.fail(operationType, agent, inputs, sources, 'validate', e, collect(reports));
    }

    const all = collect(reports);
    const blocked = await this.gate(operationType, agent, inputs, sources, all);
    if (blocked) return blocked;

    const files: Record<string, string> = {
      ...(terraform ? prefixFileSet(terraform.files, TERRAFORM_PREFIX) : {}),
      ...(helm ? prefixFileSet(helm.files, HELM_PREFIX) : {}),
    };

    return this.publishAndAttach({
      publisher: prechecked.value,
      operationType,
      agent,
      repoUrl: request.repoUrl,
      baseBranch: request.baseBranch,
      branchName: `fops-infrastructure-${slug(request.target)}-${branchTimestamp(this.ctx.now())}`,
      title: `[F-Ops] Add ${request.target} infrastructure configuration`,
      body: infrastructureBody(request, reports, sources),
      files,
      artifacts: {
        ...(reports.terraform ? { terraform_plan: reportArtifact(reports.terraform) } : {}),
        ...(reports.helm && helm ? { [helmOperation(helm)]: reportArtifact(reports.helm) } : {}),
        infrastructure_info: {
          agent,
          target: request.target,
          environments: request.environments,
          domain: request.domain,
          citationsCount: sources.length,
        },
        citations: sources.map((s) => s.sourceId),
      },
      reports: all,
      sources,
      inputs: {
        ...inputs,
        contentHashes: { ...terraform?.contentHashes, ...helm?.contentHashes },
      },
    });
  }

  async proposePipeline(request: PipelineRequest): Promise<Result<ProposalOutcome, ProposalError>> {
    const operationType = 'pipeline_proposal';
    const agent = 'pipeline';
    const sources = request.sources ?? [];
    const inputs = { repoUrl: request.repoUrl, path: request.path };

    const prechecked = await this.precheck(operationType, agent, request.repoUrl, inputs, sources, () =>
      assertSafeFileSet({ [request.path]: request.content }),
    );
    if (!prechecked.ok) return prechecked;

    const bound = this.bindFiles({ [request.path]: request.content }, sources);
    const content = bound.files[request.path];
    const report = await this.runPipelineValidation(request.path, content, agent);

    const blocked = await this.gate(operationType, agent, inputs, sources, [report]);
    if (blocked) return blocked;

    return this.publishAndAttach({
      publisher: prechecked.value,
      operationType,
      agent,
      repoUrl: request.repoUrl,
      baseBranch: request.baseBranch,
      branchName: `fops-pipeline-${branchTimestamp(this.ctx.now())}`,
      title: '[F-Ops] Add CI/CD Pipeline',
      body: pipelineBody(report, sources),
      files: bound.files,
      artifacts: {
        pipeline_validation: reportArtifact(report),
        kb_citations: sources.map((s) => s.sourceId),
        generation_info: {
          agent,
          citationsCount: sources.length,
          validationStatus: report.status,
        },
      },
      reports: [report],
      sources,
      inputs: { ...inputs, contentHashes: bound.contentHashes },
    });
  }

  /** Plan only; nothing is published. `target` is the allow-listed scope the files belong to. */
  async validateTerraform(bundle: TerraformBundle, target: string): Promise<Result<TerraformPlanReport, ProposalError>> {
    try {
      this.ctx.guard.authorize(target);
      this.checkTerraform(bundle);
    } catch (e) {
      return this.validationFailure('terraform_plan', target, 'preflight', e);
    }
    try {
      return ok(await this.runTerraform(bundle, target, 'validator'));
    } catch (e) {
      return this.validationFailure('terraform_plan', target, 'validate', e);
    }
  }

  async validateHelm(bundle: HelmBundle, target: string): Promise<Result<HelmRenderReport, ProposalError>> {
    try {
      this.ctx.guard.authorize(target);
      this.checkHelm(bundle);
    } catch (e) {
      return this.validationFailure(helmOperation(bundle), target, 'preflight', e);
    }
    try {
      return ok(await this.runHelm(bundle, target, 'validator'));
    } catch (e) {
      return this.validationFailure(helmOperation(bundle), target, 'validate', e);
    }
  }

  async validatePipeline(path: string, content: string): Promise<Result<PipelineSyntaxReport, ProposalError>> {
    try {
      assertSafeFileSet({ [path]: content });
    } catch (e) {
      return this.validationFailure('pipeline_validation', path, 'preflight', e);
    }
    return ok(await this.runPipelineValidation(path, content, 'validator'));
  }

  private checkTerraform(bundle: TerraformBundle): void {
    const { guard, config } = this.ctx;
    assertSafeFileSet(bundle.files);
    if (bundle.workspace !== undefined) {
      guard.authorizeScope('workspace', bundle.workspace, config.allowedWorkspaces);
    }
    for (const provider of extractProviders(bundle.files)) {
      guard.authorizeScope('provider', provider, config.allowedProviders);
    }
  }

  private checkHelm(bundle: HelmBundle): void {
    assertSafeFileSet(bundle.files);
    assertHelmIdentifiers(bundle);
    this.ctx.guard.authorizeScope('namespace', bundle.namespace, this.ctx.config.allowedNamespaces);
  }

  private bindFiles(files: FileSet, sources: readonly Citation[]): BoundFiles {
    const bound: BoundFiles = { files: {}, contentHashes: {} };
    for (const [path, content] of Object.entries(files)) {
      const result = this.ctx.citations.bind(content, acceptsHashComments(path) ? sources : []);
      bound.files[path] = result.content;
      bound.contentHashes[path] = result.contentHash;
    }
    return bound;
  }

  private async runTerraform(bundle: TerraformBundle, target: string, agent: string): Promise<TerraformPlanReport> {
    const { files, steps } = terraformPlanSandbox(bundle, this.ctx.config.sandbox);
    const run = await this.ctx.sandbox.run(files, steps, { target });
    const report = this.ctx.parsers.terraform.parse(run);
    await this.recordReport('terraform_plan', agent, report, {
      target,
      files: Object.keys(bundle.files),
      ...(bundle.workspace !== undefined ? { workspace: bundle.workspace } : {}),
    });
    return report;
  }

  private async runHelm(bundle: HelmBundle, target: string, agent: string): Promise<HelmRenderReport> {
    let report = chartPreflight(bundle.files);
    if (!report) {
      const { files, steps } = helmRenderSandbox(bundle, this.ctx.config.sandbox);
      const run = await this.ctx.sandbox.run(files, steps, { target });
      report = this.ctx.parsers.helm.parse(run);
    }
    await this.recordReport(helmOperation(bundle), agent, report, {
      target,
      releaseName: bundle.releaseName,
      namespace: bundle.namespace,
      files: Object.keys(bundle.files),
    });
    return report;
  }

  private async runPipelineValidation(path: string, content: string, agent: string): Promise<PipelineSyntaxReport> {
    const report = validatePipelineSyntax(path, content);
    await this.recordReport('pipeline_validation', agent, report, { path });
    return report;
  }

  private async precheck(
    operationType: string,
    agent: string,
    repoUrl: string,
    inputs: Record<string, unknown>,
    sources: readonly Citation[],
    checks: () => void,
  ): Promise<Result<ProposalPublisher, ProposalError>> {
    try {
      this.ctx.guard.authorize(repoUrl);
    } catch (e) {
      return this.fail(operationType, agent, inputs, sources, 'authorize', e);
    }

    let publisher: ProposalPublisher;
    try {
      publisher = this.ctx.publishers.resolve(repoUrl);
      publisher.assertCredentials();
    } catch (e) {
      return this.fail(operationType, agent, inputs, sources, 'credentials', e);
    }

    try {
      checks();
    } catch (e) {
      return this.fail(operationType, agent, inputs, sources, 'preflight', e);
    }
    return ok(publisher);
  }

  private async gate(
    operationType: string,
    agent: string,
    inputs: Record<string, unknown>,
    sources: readonly Citation[],
    reports: readonly ValidationReport[],
  ): Promise<Result<never, ProposalError> | undefined> {
    const failed = reports.filter((r) => r.status === 'failed');
    if (failed.length === 0) return undefined;

    const kinds = failed.map((r) => r.kind).join(', ');
    if (this.ctx.config.publishOnFailedValidation) {
      this.ctx.logger.warn(`Publishing despite failed validation: ${kinds}`);
      return undefined;
    }
    const error = new ValidationFailedError(`Validation failed: ${kinds}`);
    return this.fail(operationType, agent, inputs, sources, 'validate', error, reports);
  }

  private async publishAndAttach(plan: PublishPlan): Promise<Result<ProposalOutcome, ProposalError>> {
    const { publisher, sources, reports } = plan;
    const citationIds = sources.map((s) => s.sourceId);

    let published: PublishedProposal;
    try {
      published = await publisher.publish({
        repoUrl: plan.repoUrl,
        files: plan.files,
        title: plan.title,
        body: plan.body,
        branchName: plan.branchName,
        baseBranch: plan.baseBranch,
        citations: citationIds,
      });
    } catch (e) {
      return this.fail(plan.operationType, plan.agent, plan.inputs, sources, 'publish', e, reports);
    }

    let artifactsAttached = false;
    try {
      artifactsAttached = await publisher.attach(published.url, plan.artifacts);
    } catch (e) {
      if (e instanceof AuditWriteError) throw e;
      this.ctx.logger.warn(`Proposal ${published.url} opened but artifacts could not be attached: ${errorMessage(e)}`);
    }

    await this.ctx.audit.append({
      operationType: plan.operationType,
      agent: plan.agent,
      inputs: plan.inputs,
      outputs: {
        proposalUrl: published.url,
        branchName: published.branchName,
        branchExisted: published.branchExisted,
        reusedExisting: published.reusedExisting,
        artifactsAttached,
        validation: reports.map((r) => ({ kind: r.kind, status: r.status })),
      },
      citations: citationIds,
      status: 'completed',
    });
    this.ctx.logger.info(`Proposal ready: ${published.url}`);

    return ok({
      proposalUrl: published.url,
      branchName: published.branchName,
      branchExisted: published.branchExisted,
      reusedExisting: published.reusedExisting,
      artifactsAttached,
      reports,
      citations: sources,
      files: published.files,
    });
  }

  private async fail(
    operationType: string,
    agent: string,
    inputs: Record<string, unknown>,
    sources: readonly Citation[],
    stage: ProposalStage,
    e: unknown,
    reports: readonly ValidationReport[] = [],
  ): Promise<Result<never, ProposalError>> {
    if (e instanceof AuditWriteError) throw e;
    const error = asPipelineError(stage, e);
    const denied = error instanceof NotAllowListedError || error instanceof ScopeNotAllowedError;
    const status: AuditStatus = denied ? 'denied' : 'failed';

    this.ctx.logger.error(`${operationType} stopped at ${stage}: ${error.message}`);
    await this.ctx.audit.append({
      operationType,
      agent,
      inputs,
      outputs: {
        stage,
        error: error.message,
        code: error.code,
        validation: reports.map((r) => ({ kind: r.kind, status: r.status })),
      },
      citations: sources.map((s) => s.sourceId),
      status,
    });
    return err({ stage, error, reports });
  }

  private validationFailure(
    operationType: string,
    target: string,
    stage: ProposalStage,
    e: unknown,
  ): Promise<Result<never, ProposalError>> {
    return this.fail(operationType, 'validator', { target }, [], stage, e);
  }

  private async recordReport(
    operationType: string,
    agent: string,
    report: ValidationReport,
    inputs: Record<string, unknown>,
  ): Promise<void> {
    await this.ctx.audit.append({
      operationType,
      agent,
      inputs,
      outputs: {
        status: report.status,
        stage: report.stage,
        exitCode: report.exitCode,
        timedOut: report.timedOut,
        errors: [...report.errors],
        summary: report.summary,
      },
      status: report.status === 'failed' ? 'failed' : 'completed',
    });
  }
}

function collect(reports: { terraform?: TerraformPlanReport; helm?: HelmRenderReport }): ValidationReport[] {
  const all: ValidationReport[] = [];
  if (reports.terraform) all.push(reports.terraform);
  if (reports.helm) all.push(reports.helm);
  return all;
}
