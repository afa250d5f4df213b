import { z } from 'zod';
import { InvalidProposalUrlError, InvalidRepoUrlError } from '../errors.js';
import { ProposalPublisherBase, isSuccess, responseMessage, type BranchTarget } from './base.js';
import type { Platform, PublishRequest } from './types.js';

export interface GitLabProject {
  /** Full namespace path, e.g. `group/subgroup/project`. */
  key: string;
  id: string;
}

export interface GitLabMergeRequestTarget {
  project: GitLabProject;
  iid: number;
}

const SEGMENT = /^[A-Za-z0-9_.][A-Za-z0-9_.-]*$/;
const MR_PATH = /^(.+)\/-\/merge_requests\/(\d+)\/?$/;

const MergeRequestSchema = z.object({ web_url: z.string(), iid: z.number().optional() });
const MergeRequestListSchema = z.array(MergeRequestSchema);

function projectFromPath(path: string, build: () => Error): GitLabProject {
  const segments = path.replace(/\.git$/, '').replace(/\/+$/, '').split('/');
  const valid = (segment: string) => SEGMENT.test(segment) && segment !== '.' && segment !== '..';
  if (segments.length < 2 || !segments.every(valid)) {
    throw build();
  }
  const key = segments.join('/');
  return { key, id: encodeURIComponent(key) };
}

/** `https://host/group[/subgroup...]/project[.git]` or `git@host:group/project.git`. */
export function parseGitLabRepoUrl(url: string): GitLabProject {
  const trimmed = url.trim();
  const invalid = () => new InvalidRepoUrlError(url, 'GitLab');

  const ssh = /^git@[^:\s]+:(.+)$/.exec(trimmed);
  if (ssh) return projectFromPath(ssh[1], invalid);

  const https = /^https:\/\/[^/\s]+\/(.+)$/.exec(trimmed);
  if (!https || https[1].includes('/-/')) throw invalid();
  return projectFromPath(https[1], invalid);
}

export function parseGitLabMergeRequestUrl(url: string): GitLabMergeRequestTarget {
  const invalid = () => new InvalidProposalUrlError(url, 'GitLab');
  const https = /^https:\/\/[^/\s]+\/(.+)$/.exec(url.trim());
  const match = https ? MR_PATH.exec(https[1]) : null;
  if (!match) throw invalid();
  return { project: projectFromPath(match[1], invalid), iid: Number(match[2]) };
}

/** GitLab REST v4: repository branches/files and merge requests. */
export class GitLabPublisher extends ProposalPublisherBase<GitLabProject, GitLabMergeRequestTarget> {
  readonly platform: Platform = 'gitlab';

  protected get token(): string | undefined {
    return this.config.gitlabToken;
  }

  protected authHeaders(token: string): Record<string, string> {
    return { 'PRIVATE-TOKEN': token, 'Content-Type': 'application/json' };
  }

  protected parseRepoUrl(url: string): GitLabProject {
    return parseGitLabRepoUrl(url);
  }

  protected parseProposalUrl(url: string): GitLabMergeRequestTarget {
    return parseGitLabMergeRequestUrl(url);
  }

  private projectApi(project: GitLabProject): string {
    return `${this.config.gitlabUrl.replace(/\/+$/, '')}/api/v4/projects/${project.id}`;
  }

  protected async ensureBranch(project: GitLabProject, target: BranchTarget): Promise<boolean> {
    const created = await this.call('POST', `${this.projectApi(project)}/repository/branches`, {
      params: { branch: target.branch, ref: target.base },
    });
    if (created.status === 400 && /already exists/i.test(responseMessage(created.data))) {
      return true;
    }
    this.expectOk(created, 'create branch');
    return false;
  }

  protected async writeFile(
    project: GitLabProject,
    branch: string,
    path: string,
    content: string,
  ): Promise<'created' | 'updated'> {
    const url = `${this.projectApi(project)}/repository/files/${encodeURIComponent(path)}`;

    const existing = await this.call('GET', url, { params: { ref: branch } });
    if (!isSuccess(existing.status) && existing.status !== 404) {
      this.expectOk(existing, `read ${path}`);
    }
    const exists = isSuccess(existing.status);

    this.expectOk(
      await this.call(exists ? 'PUT' : 'POST', url, {
        data: {
          branch,
          content,
          encoding: 'text',
          commit_message: exists ? `Update ${path}` : `Add ${path}`,
        },
      }),
      `write ${path}`,
    );
    return exists ? 'updated' : 'created';
  }

  protected async openProposal(
    project: GitLabProject,
    target: BranchTarget,
    request: PublishRequest,
  ): Promise<{ url: string; reusedExisting: boolean }> {
    const api = this.projectApi(project);
    const created = await this.call('POST', `${api}/merge_requests`, {
      data: {
        source_branch: target.branch,
        target_branch: target.base,
        title: request.title,
        description: request.body,
        remove_source_branch: true,
      },
    });

    if (created.status === 409) {
      const open = await this.call('GET', `${api}/merge_requests`, {
        params: { source_branch: target.branch, state: 'opened' },
      });
      if (isSuccess(open.status)) {
        const [existing] = this.read(MergeRequestListSchema, open.data, 'list merge requests');
        if (existing) return { url: existing.web_url, reusedExisting: true };
      }
    }

    const mr = this.read(MergeRequestSchema, this.expectOk(created, 'open merge request'), 'open merge request');
    return { url: mr.web_url, reusedExisting: false };
  }

  protected async postComment(target: GitLabMergeRequestTarget, body: string): Promise<void> {
    this.expectOk(
      await this.call('POST', `${this.projectApi(target.project)}/merge_requests/${target.iid}/notes`, {
        data: { body },
      }),
      'post note',
    );
  }
}
