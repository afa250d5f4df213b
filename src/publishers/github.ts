import { z } from 'zod';
import { InvalidProposalUrlError, InvalidRepoUrlError } from '../errors.js';
import { ProposalPublisherBase, isSuccess, responseMessage, type BranchTarget } from './base.js';
import { encodePath } from './format.js';
import type { Platform, PublishRequest } from './types.js';

export interface GitHubRepo {
  key: string;
  owner: string;
  repo: string;
}

export interface GitHubPullTarget {
  repo: GitHubRepo;
  number: number;
}

const REPO_URL = /^(?:https:\/\/[^/\s]+\/|git@[^:\s]+:)([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+?)(?:\.git)?\/?$/;
const PULL_URL = /^https:\/\/[^/\s]+\/([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)\/pull\/(\d+)\/?$/;

const RefSchema = z.object({ object: z.object({ sha: z.string() }) });
const ContentSchema = z.object({ sha: z.string() });
const PullSchema = z.object({ html_url: z.string(), number: z.number().optional() });
const PullListSchema = z.array(PullSchema);

const isDotSegment = (segment: string) => segment === '.' || segment === '..';

export function parseGitHubRepoUrl(url: string): GitHubRepo {
  const match = REPO_URL.exec(url.trim());
  if (!match || isDotSegment(match[1]) || isDotSegment(match[2])) throw new InvalidRepoUrlError(url, 'GitHub');
  const [, owner, repo] = match;
  return { key: `${owner}/${repo}`, owner, repo };
}

export function parseGitHubPullUrl(url: string): GitHubPullTarget {
  const match = PULL_URL.exec(url.trim());
  if (!match) throw new InvalidProposalUrlError(url, 'GitHub');
  const [, owner, repo, number] = match;
  return { repo: { key: `${owner}/${repo}`, owner, repo }, number: Number(number) };
}

/** GitHub REST v3: refs, contents and pulls endpoints. */
export class GitHubPublisher extends ProposalPublisherBase<GitHubRepo, GitHubPullTarget> {
  readonly platform: Platform = 'github';

  protected get token(): string | undefined {
    return this.config.githubToken;
  }

  protected authHeaders(token: string): Record<string, string> {
    return {
      Authorization: `Bearer ${token}`,
      Accept: 'application/vnd.github.v3+json',
      'Content-Type': 'application/json',
      'User-Agent': 'iac-proposals',
    };
  }

  protected parseRepoUrl(url: string): GitHubRepo {
    return parseGitHubRepoUrl(url);
  }

  protected parseProposalUrl(url: string): GitHubPullTarget {
    return parseGitHubPullUrl(url);
  }

  private repoApi(repo: GitHubRepo): string {
    return `${this.config.githubApiUrl.replace(/\/+$/, '')}/repos/${repo.owner}/${repo.repo}`;
  }

  protected async ensureBranch(repo: GitHubRepo, target: BranchTarget): Promise<boolean> {
    const api = this.repoApi(repo);
    const baseRef = this.expectOk(await this.call('GET', `${api}/git/ref/heads/${encodePath(target.base)}`), 'read base branch');
    const { object } = this.read(RefSchema, baseRef, 'read base branch');

    const created = await this.call('POST', `${api}/git/refs`, {
      data: { ref: `refs/heads/${target.branch}`, sha: object.sha },
    });
    if (created.status === 422 && /already exists/i.test(responseMessage(created.data))) {
      return true;
    }
    this.expectOk(created, 'create branch');
    return false;
  }

  protected async writeFile(
    repo: GitHubRepo,
    branch: string,
    path: string,
    content: string,
  ): Promise<'created' | 'updated'> {
    const url = `${this.repoApi(repo)}/contents/${encodePath(path)}`;

    const existing = await this.call('GET', url, { params: { ref: branch } });
    let sha: string | undefined;
    if (isSuccess(existing.status)) {
      sha = this.read(ContentSchema, existing.data, `read ${path}`).sha;
    } else if (existing.status !== 404) {
      this.expectOk(existing, `read ${path}`);
    }

    this.expectOk(
      await this.call('PUT', url, {
        data: {
          message: sha ? `Update ${path}` : `Add ${path}`,
          content: Buffer.from(content, 'utf8').toString('base64'),
          branch,
          ...(sha ? { sha } : {}),
        },
      }),
      `write ${path}`,
    );
    return sha ? 'updated' : 'created';
  }

  protected async openProposal(
    repo: GitHubRepo,
    target: BranchTarget,
    request: PublishRequest,
  ): Promise<{ url: string; reusedExisting: boolean }> {
    const api = this.repoApi(repo);
    const created = await this.call('POST', `${api}/pulls`, {
      data: { title: request.title, body: request.body, head: target.branch, base: target.base },
    });

    if (created.status === 422) {
      const open = await this.call('GET', `${api}/pulls`, {
        params: { head: `${repo.owner}:${target.branch}`, state: 'open' },
      });
      if (isSuccess(open.status)) {
        const [existing] = this.read(PullListSchema, open.data, 'list pull requests');
        if (existing) return { url: existing.html_url, reusedExisting: true };
      }
    }

    const pull = this.read(PullSchema, this.expectOk(created, 'open pull request'), 'open pull request');
    return { url: pull.html_url, reusedExisting: false };
  }

  protected async postComment(target: GitHubPullTarget, body: string): Promise<void> {
    this.expectOk(
      await this.call('POST', `${this.repoApi(target.repo)}/issues/${target.number}/comments`, { data: { body } }),
      'post comment',
    );
  }
}
