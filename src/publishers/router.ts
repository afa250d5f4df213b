import type { PlatformConfig } from '../config.js';
import { UnsupportedPlatformError } from '../errors.js';
import { BranchLocks } from './branch_locks.js';
import type { PublisherDeps } from './base.js';
import { GitHubPublisher } from './github.js';
import { GitLabPublisher } from './gitlab.js';
import type { Platform, ProposalPublisher } from './types.js';

export type PublisherMap = Record<Platform, ProposalPublisher>;

/** Platform of a repository or proposal URL, by host substring. */
export function platformFor(
  url: string,
  config: Pick<PlatformConfig, 'githubHosts' | 'gitlabHosts'>,
): Platform {
  if (config.githubHosts.some((host) => url.includes(host))) return 'github';
  if (config.gitlabHosts.some((host) => url.includes(host))) return 'gitlab';
  throw new UnsupportedPlatformError(url);
}

export class PublisherRouter {
  constructor(
    private readonly publishers: PublisherMap,
    private readonly config: Pick<PlatformConfig, 'githubHosts' | 'gitlabHosts'>,
  ) {}

  resolve(url: string): ProposalPublisher {
    return this.publishers[platformFor(url, this.config)];
  }
}

/** Both publishers sharing one branch-lock table. */
export function createPublishers(deps: PublisherDeps): PublisherMap {
  const shared = { ...deps, locks: deps.locks ?? new BranchLocks() };
  return {
    github: new GitHubPublisher(shared),
    gitlab: new GitLabPublisher(shared),
  };
}
