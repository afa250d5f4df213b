/**
 * Proposal-only change validation: sandboxed plan/lint/dry-run of generated
 * infrastructure code, typed reports, cited content, and pull/merge request
 * publishing under an append-only audit trail.
 */
export * from './errors.js';
export * from './result.js';
export { loadConfig, defineConfig, type PipelineConfig, type PipelineConfigInput } from './config.js';
export { createLogger, setLogLevel, setMetricsDir, logMetric, type Logger, type LogLevel } from './logger.js';

export { AccessGuard, authorize, type ScopeKind } from './security/access_guard.js';
export { SandboxRunner, createSafeEnv, describeFailure } from './sandbox/runner.js';
export { terraformPlanSandbox, extractProviders, type TerraformBundle, type BackendConfig } from './sandbox/terraform.js';
export { helmRenderSandbox, type HelmBundle, type HelmRenderMode } from './sandbox/helm.js';
export type { FileSet, SandboxResult, SandboxRun, SandboxStep } from './sandbox/types.js';

export * from './parsers/index.js';

export { CitationTracker, formatCitationList, type Citation, type BoundContent } from './citations/tracker.js';
export { citationsFromSearch, type Generator, type KnowledgeStore, type SearchResult } from './citations/knowledge.js';

export { AuditTrail, type AuditEntry, type AuditFilters, type AuditStatus } from './audit/trail.js';

export { GitHubPublisher } from './publishers/github.js';
export { GitLabPublisher } from './publishers/gitlab.js';
export { PublisherRouter, createPublishers, platformFor } from './publishers/router.js';
export { BranchLocks } from './publishers/branch_locks.js';
export type { ProposalPublisher, PublishRequest, PublishedProposal, Artifacts, Platform } from './publishers/types.js';

export { createProposalContext, type ProposalContext } from './orchestrator/context.js';
export {
  ChangeProposalOrchestrator,
  type ProposalError,
  type ProposalOutcome,
  type ProposalStage,
} from './orchestrator/orchestrator.js';
export {
  type InfrastructureRequest,
  type PipelineRequest,
  type ProposalRequest,
} from './orchestrator/requests.js';
