import type { AxiosInstance } from 'axios';
import { AuditTrail } from '../audit/trail.js';
import { CitationTracker } from '../citations/tracker.js';
import type { PipelineConfig } from '../config.js';
import { createLogger, type Logger } from '../logger.js';
import { createParsers, type ParserSet } from '../parsers/index.js';
import { BranchLocks } from '../publishers/branch_locks.js';
import { PublisherRouter, createPublishers } from '../publishers/router.js';
import { SandboxRunner } from '../sandbox/runner.js';
import { AccessGuard } from '../security/access_guard.js';

/** Everything the orchestrator talks to, passed in explicitly. */
export interface ProposalContext {
  config: PipelineConfig;
  guard: AccessGuard;
  sandbox: SandboxRunner;
  parsers: ParserSet;
  citations: CitationTracker;
  audit: AuditTrail;
  publishers: PublisherRouter;
  logger: Logger;
  now: () => Date;
}

export interface ContextOverrides {
  http?: AxiosInstance;
  now?: () => Date;
  logger?: Logger;
  tmpRoot?: string;
}

export function createProposalContext(config: PipelineConfig, overrides: ContextOverrides = {}): ProposalContext {
  const now = overrides.now ?? (() => new Date());
  const logger = overrides.logger ?? createLogger('Proposals');

  const guard = new AccessGuard({
    allowList: config.allowedRepos,
    requireAllowList: config.requireAllowList,
  });
  const audit = new AuditTrail(config.auditLogDir, { now });
  const publishers = createPublishers({
    config: config.platforms,
    guard,
    audit,
    locks: new BranchLocks(),
    http: overrides.http,
    now,
  });

  return {
    config,
    guard,
    sandbox: new SandboxRunner(guard, {
      killGraceMs: config.sandbox.killGraceMs,
      maxOutputChars: config.sandbox.maxOutputChars,
      tmpRoot: overrides.tmpRoot,
    }),
    parsers: createParsers(),
    citations: new CitationTracker(),
    audit,
    publishers: new PublisherRouter(publishers, config.platforms),
    logger,
    now,
  };
}
