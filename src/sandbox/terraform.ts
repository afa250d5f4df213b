import type { SandboxConfig } from '../config.js';
import { InvalidFileSetError } from '../errors.js';
import type { FileSet, SandboxStep } from './types.js';

export type BackendConfig =
  | {
      type: 's3';
      bucket?: string;
      key?: string;
      region?: string;
      dynamodbTable?: string;
      encrypt?: boolean;
    }
  | { type: 'local'; path?: string };

export interface TerraformBundle {
  files: FileSet;
  variables?: Record<string, unknown>;
  backend?: BackendConfig;
  workspace?: string;
}

export const VARIABLES_FILE = 'terraform.tfvars.json';
export const BACKEND_FILE = 'backend.tf';

const hclString = (value: string) => JSON.stringify(value);

export function renderBackendConfig(backend: BackendConfig): string {
  if (backend.type === 'local') {
    return [
      'terraform {',
      '  backend "local" {',
      `    path = ${hclString(backend.path ?? 'terraform.tfstate')}`,
      '  }',
      '}',
      '',
    ].join('\n');
  }

  const lines = [
    'terraform {',
    '  backend "s3" {',
    `    bucket = ${hclString(backend.bucket ?? 'terraform-state')}`,
    `    key    = ${hclString(backend.key ?? 'terraform.tfstate')}`,
    `    region = ${hclString(backend.region ?? 'us-east-1')}`,
  ];
  if (backend.dynamodbTable) lines.push(`    dynamodb_table = ${hclString(backend.dynamodbTable)}`);
  if (backend.encrypt !== undefined) lines.push(`    encrypt = ${backend.encrypt}`);
  lines.push('  }', '}', '');
  return lines.join('\n');
}

function addGenerated(files: Record<string, string>, path: string, content: string) {
  if (path in files) {
    throw new InvalidFileSetError(path, 'conflicts with a generated sandbox file');
  }
  files[path] = content;
}

// `terraform fmt -check` exits 3 when files need formatting
export const FMT_NEEDS_CHANGES = 3;

/**
 * File set and init → validate → fmt → plan chain for a Terraform plan in the
 * sandbox. The fmt check only reports; it never stops the plan.
 */
export function terraformPlanSandbox(
  bundle: TerraformBundle,
  config: Pick<
    SandboxConfig,
    'terraformBinary' | 'initTimeoutMs' | 'validateTimeoutMs' | 'fmtTimeoutMs' | 'planTimeoutMs'
  >,
): { files: Record<string, string>; steps: SandboxStep[] } {
  const files: Record<string, string> = { ...bundle.files };
  if (bundle.variables && Object.keys(bundle.variables).length > 0) {
    addGenerated(files, VARIABLES_FILE, JSON.stringify(bundle.variables, null, 2));
  }
  if (bundle.backend) {
    addGenerated(files, BACKEND_FILE, renderBackendConfig(bundle.backend));
  }

  const initArgs = ['init', '-input=false', '-no-color'];
  if (!bundle.backend) initArgs.push('-backend=false');
  const tool = config.terraformBinary;

  return {
    files,
    steps: [
      { stage: 'init', tool, args: initArgs, timeoutMs: config.initTimeoutMs },
      { stage: 'validate', tool, args: ['validate', '-json', '-no-color'], timeoutMs: config.validateTimeoutMs },
      {
        stage: 'fmt',
        tool,
        args: ['fmt', '-check', '-list=true', '-recursive', '-no-color'],
        timeoutMs: config.fmtTimeoutMs,
        advisoryExitCodes: [FMT_NEEDS_CHANGES],
      },
      {
        stage: 'plan',
        tool,
        args: ['plan', '-json', '-detailed-exitcode', '-input=false', '-lock=false'],
        timeoutMs: config.planTimeoutMs,
      },
    ],
  };
}

/**
 * Providers referenced by `provider "x"` blocks and `required_providers` entries
 * of the `.tf` files, in first-seen order.
 */
export function extractProviders(files: FileSet): string[] {
  const providers = new Set<string>();
  for (const [path, content] of Object.entries(files)) {
    if (!path.endsWith('.tf')) continue;

    for (const match of content.matchAll(/provider\s+"([^"]+)"/g)) {
      providers.add(match[1]);
    }

    // required_providers entries: `aws = { source = "hashicorp/aws" ... }`
    for (const match of content.matchAll(/(\w[\w-]*)\s*=\s*\{[^}]*source\s*=\s*"[^"]+"/g)) {
      providers.add(match[1]);
    }
  }
  return [...providers];
}
