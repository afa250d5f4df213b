import type { FileSet } from '../sandbox/types.js';

export type Platform = 'github' | 'gitlab';

export interface PublishRequest {
  repoUrl: string;
  files: FileSet;
  title: string;
  body: string;
  branchName?: string;
  baseBranch?: string;
  /** Citation ids recorded with the audit entry. */
  citations?: readonly string[];
}

export interface PublishedProposal {
  url: string;
  branchName: string;
  /** The branch was already there; files were committed on top of it. */
  branchExisted: boolean;
  /** An open PR/MR for the branch already existed and was returned as-is. */
  reusedExisting: boolean;
  files: string[];
}

/** Keyed report sections; strings are attached verbatim, anything else as JSON. */
export type Artifacts = Record<string, unknown>;

export interface ProposalPublisher {
  readonly platform: Platform;
  /** Throws MissingCredentialError when no token is configured. Performs no I/O. */
  assertCredentials(): void;
  publish(request: PublishRequest): Promise<PublishedProposal>;
  attach(proposalUrl: string, artifacts: Artifacts): Promise<true>;
}
