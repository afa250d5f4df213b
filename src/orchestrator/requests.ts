import { z } from 'zod';
import type { Citation } from '../citations/tracker.js';
import { FileSetSchema } from '../sandbox/file_set.js';
import type { HelmBundle } from '../sandbox/helm.js';
import type { TerraformBundle } from '../sandbox/terraform.js';

export const CitationSchema = z.object({
  sourceId: z.string().min(1),
  title: z.string().default('Untitled'),
  excerpt: z.string().default(''),
});

const BackendSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('s3'),
    bucket: z.string().optional(),
    key: z.string().optional(),
    region: z.string().optional(),
    dynamodbTable: z.string().optional(),
    encrypt: z.boolean().optional(),
  }),
  z.object({ type: z.literal('local'), path: z.string().optional() }),
]);

export const TerraformBundleSchema = z.object({
  files: FileSetSchema,
  variables: z.record(z.unknown()).optional(),
  backend: BackendSchema.optional(),
  workspace: z.string().optional(),
});

export const HelmBundleSchema = z.object({
  files: FileSetSchema,
  releaseName: z.string(),
  namespace: z.string(),
  values: z.record(z.unknown()).optional(),
  render: z
    .enum(['dry_run', 'template'])
    .optional()
    .describe('dry_run: helm install --dry-run; template: local helm template render.'),
});

export interface InfrastructureRequest {
  kind: 'infrastructure';
  repoUrl: string;
  /** Deployment target, e.g. `k8s` or `serverless`; part of the branch name. */
  target: string;
  environments: string[];
  domain: string;
  terraform?: TerraformBundle;
  helm?: HelmBundle;
  sources?: Citation[];
  baseBranch?: string;
}

export interface PipelineRequest {
  kind: 'pipeline';
  repoUrl: string;
  /** Repository path of the pipeline file, e.g. `.github/workflows/ci.yml`. */
  path: string;
  content: string;
  sources?: Citation[];
  baseBranch?: string;
}

export type ProposalRequest = InfrastructureRequest | PipelineRequest;

export const InfrastructureRequestShape = {
  repoUrl: z.string().min(1).describe('Repository the proposal is opened against.'),
  target: z
    .string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'target must be a simple identifier')
    .describe('Deployment target, e.g. k8s or serverless.'),
  environments: z.array(z.string()).default([]).describe('Environments the configuration covers.'),
  domain: z.string().default('').describe('Application domain.'),
  terraform: TerraformBundleSchema.optional().describe('Terraform files, published under infra/.'),
  helm: HelmBundleSchema.optional().describe('Helm chart files, published under deploy/chart/.'),
  sources: z.array(CitationSchema).default([]).describe('Knowledge-base sources used to generate the files.'),
  baseBranch: z.string().optional().describe('Branch the proposal targets.'),
};

export const PipelineRequestShape = {
  repoUrl: z.string().min(1).describe('Repository the proposal is opened against.'),
  path: z.string().min(1).describe('Repository path of the pipeline file.'),
  content: z.string().describe('Pipeline file content.'),
  sources: z.array(CitationSchema).default([]).describe('Knowledge-base sources used to generate the file.'),
  baseBranch: z.string().optional().describe('Branch the proposal targets.'),
};
