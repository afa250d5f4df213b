import axios, { type AxiosInstance, type Method } from 'axios';
import { z } from 'zod';
import type { AuditStatus, AuditTrail } from '../audit/trail.js';
import type { PlatformConfig } from '../config.js';
import {
  MissingCredentialError,
  NotAllowListedError,
  PublishError,
  ScopeNotAllowedError,
  errorMessage,
} from '../errors.js';
import { createLogger, logMetric, type Logger } from '../logger.js';
import { assertSafeFileSet } from '../sandbox/file_set.js';
import type { AccessGuard } from '../security/access_guard.js';
import { BranchLocks } from './branch_locks.js';
import { branchTimestamp, formatArtifactComment } from './format.js';
import type { Artifacts, Platform, ProposalPublisher, PublishRequest, PublishedProposal } from './types.js';

export interface PublisherDeps {
  config: PlatformConfig;
  guard: AccessGuard;
  audit: AuditTrail;
  /** Share one instance across publishers so a (repo, branch) is serialized process-wide. */
  locks?: BranchLocks;
  http?: AxiosInstance;
  logger?: Logger;
  now?: () => Date;
}

export interface HttpResponse {
  status: number;
  data: unknown;
}

export interface BranchTarget {
  /** Stable repository key, e.g. `owner/repo`. */
  key: string;
  branch: string;
  base: string;
}

export const isSuccess = (status: number) => status >= 200 && status < 300;

const ErrorPayloadSchema = z.object({
  message: z.unknown().optional(),
  error: z.unknown().optional(),
  errors: z.unknown().optional(),
});

const describe = (value: unknown) => (typeof value === 'string' ? value : JSON.stringify(value));

/** Flattens the error payloads of both REST APIs into one line. */
export function responseMessage(data: unknown): string {
  if (typeof data === 'string') return data;
  const payload = ErrorPayloadSchema.safeParse(data);
  if (!payload.success) return '';

  const { message, error, errors } = payload.data;
  return [message, error, errors]
    .filter((value) => value !== undefined)
    .map(describe)
    .join(': ');
}

/**
 * Shared publish/attach flow: guard, credential check, per-branch lock and
 * exactly one audit entry per call. Subclasses speak the platform's REST API.
 */
export abstract class ProposalPublisherBase<Repo extends { key: string }, Target> implements ProposalPublisher {
  abstract readonly platform: Platform;

  protected readonly config: PlatformConfig;
  protected readonly http: AxiosInstance;
  protected readonly logger: Logger;
  private readonly guard: AccessGuard;
  private readonly audit: AuditTrail;
  private readonly locks: BranchLocks;
  private readonly now: () => Date;

  constructor(deps: PublisherDeps) {
    this.config = deps.config;
    this.guard = deps.guard;
    this.audit = deps.audit;
    this.locks = deps.locks ?? new BranchLocks();
    this.http = deps.http ?? axios.create();
    this.logger = deps.logger ?? createLogger('Publisher');
    this.now = deps.now ?? (() => new Date());
  }

  protected abstract get token(): string | undefined;
  protected abstract authHeaders(token: string): Record<string, string>;
  protected abstract parseRepoUrl(url: string): Repo;
  protected abstract parseProposalUrl(url: string): Target;
  protected abstract ensureBranch(repo: Repo, target: BranchTarget): Promise<boolean>;
  protected abstract writeFile(repo: Repo, branch: string, path: string, content: string): Promise<'created' | 'updated'>;
  protected abstract openProposal(
    repo: Repo,
    target: BranchTarget,
    request: PublishRequest,
  ): Promise<{ url: string; reusedExisting: boolean }>;
  protected abstract postComment(target: Target, body: string): Promise<void>;

  assertCredentials(): void {
    this.requireToken();
  }

  async publish(request: PublishRequest): Promise<PublishedProposal> {
    const started = Date.now();
    const branchName = request.branchName ?? `fops-proposal-${branchTimestamp(this.now())}`;
    const inputs = {
      repoUrl: request.repoUrl,
      branchName,
      title: request.title,
      files: Object.keys(request.files),
    };

    let result: PublishedProposal;
    try {
      this.guard.authorize(request.repoUrl);
      this.requireToken();
      const repo = this.parseRepoUrl(request.repoUrl);
      assertSafeFileSet(request.files);

      const target: BranchTarget = {
        key: repo.key,
        branch: branchName,
        base: request.baseBranch ?? this.config.baseBranch,
      };
      // repository paths are case-insensitive on both platforms; branch names are not
      const lockKey = `${this.platform}:${repo.key.toLowerCase()}`;
      result = await this.locks.runExclusive(lockKey, branchName, () =>
        this.publishLocked(repo, target, request),
      );
    } catch (e) {
      await this.record('publish', 'failed', inputs, { error: errorMessage(e) }, request.citations, e);
      throw e;
    }

    await this.record(
      'publish',
      'completed',
      inputs,
      {
        url: result.url,
        branchExisted: result.branchExisted,
        reusedExisting: result.reusedExisting,
      },
      request.citations,
    );
    await logMetric('publisher', 'publish_latency_ms', Date.now() - started, {
      platform: this.platform,
      files: result.files.length,
    });
    return result;
  }

  async attach(proposalUrl: string, artifacts: Artifacts): Promise<true> {
    const inputs = { proposalUrl, artifacts: Object.keys(artifacts) };
    try {
      this.guard.authorize(proposalUrl);
      this.requireToken();
      const target = this.parseProposalUrl(proposalUrl);
      await this.postComment(target, formatArtifactComment(artifacts));
    } catch (e) {
      await this.record('attach', 'failed', inputs, { error: errorMessage(e) }, [], e);
      throw e;
    }

    await this.record('attach', 'completed', inputs, {});
    return true;
  }

  protected requireToken(): string {
    const token = this.token;
    if (!token) throw new MissingCredentialError(this.platform);
    return token;
  }

  protected async call(
    method: Method,
    url: string,
    options: { data?: unknown; params?: Record<string, string> } = {},
  ): Promise<HttpResponse> {
    const token = this.requireToken();
    try {
      const response = await this.http.request<unknown>({
        method,
        url,
        data: options.data,
        params: options.params,
        headers: this.authHeaders(token),
        timeout: this.config.requestTimeoutMs,
        validateStatus: () => true,
      });
      return { status: response.status, data: response.data };
    } catch (e) {
      throw new PublishError(`${this.platform} ${method} ${url} failed: ${errorMessage(e)}`, undefined, { cause: e });
    }
  }

  protected expectOk(response: HttpResponse, action: string): unknown {
    if (!isSuccess(response.status)) {
      const detail = responseMessage(response.data);
      throw new PublishError(
        `${this.platform} ${action} failed (${response.status})${detail ? `: ${detail}` : ''}`,
        response.status,
      );
    }
    return response.data;
  }

  protected read<S extends z.ZodTypeAny>(schema: S, data: unknown, action: string): z.infer<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new PublishError(`${this.platform} ${action} returned an unexpected payload`);
    }
    return parsed.data;
  }

  private async publishLocked(repo: Repo, target: BranchTarget, request: PublishRequest): Promise<PublishedProposal> {
    const branchExisted = await this.ensureBranch(repo, target);
    if (branchExisted) {
      this.logger.warn(`Branch ${target.branch} already exists in ${repo.key}; committing on top of it`);
    }

    const files: string[] = [];
    for (const [path, content] of Object.entries(request.files)) {
      const outcome = await this.writeFile(repo, target.branch, path, content);
      this.logger.debug(`${outcome} ${path} on ${target.branch}`);
      files.push(path);
    }

    const { url, reusedExisting } = await this.openProposal(repo, target, request);
    this.logger.info(`${reusedExisting ? 'Reusing' : 'Opened'} proposal ${url}`);
    return { url, branchName: target.branch, branchExisted, reusedExisting, files };
  }

  private record(
    action: 'publish' | 'attach',
    status: AuditStatus,
    inputs: Record<string, unknown>,
    outputs: Record<string, unknown>,
    citations: readonly string[] = [],
    error?: unknown,
  ): Promise<string> {
    const denied = error instanceof NotAllowListedError || error instanceof ScopeNotAllowedError;
    return this.audit.append({
      operationType: `${this.platform}_${action}`,
      agent: `${this.platform}_publisher`,
      inputs,
      outputs,
      citations,
      status: denied ? 'denied' : status,
    });
  }
}
