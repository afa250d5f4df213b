import { stringify } from 'yaml';
import { z } from 'zod';
import type { SandboxConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { prefixFileSet } from './file_set.js';
import type { FileSet, SandboxStep } from './types.js';

export interface HelmBundle {
  /** Chart files relative to the chart root (Chart.yaml, values.yaml, templates/...). */
  files: FileSet;
  releaseName: string;
  namespace: string;
  values?: Record<string, unknown>;
  /**
   * `dry_run` renders through `helm install --dry-run`; `template` renders
   * locally with `helm template`. Defaults to `dry_run`.
   */
  render?: HelmRenderMode;
}

export type HelmRenderMode = 'dry_run' | 'template';

export const CHART_DIR = 'chart';
export const VALUES_FILE = 'custom-values.yaml';

// DNS-1123 label: also keeps a name from being read as a flag by helm.
const dnsLabel = z
  .string()
  .max(53)
  .regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/);

export function assertHelmIdentifiers(bundle: Pick<HelmBundle, 'releaseName' | 'namespace'>): void {
  if (!dnsLabel.safeParse(bundle.releaseName).success) {
    throw new ConfigurationError(`Invalid Helm release name: ${bundle.releaseName}`);
  }
  if (!dnsLabel.safeParse(bundle.namespace).success) {
    throw new ConfigurationError(`Invalid Kubernetes namespace: ${bundle.namespace}`);
  }
}

/** File set and lint → dry_run (or lint → template) chain for a Helm chart in the sandbox. */
export function helmRenderSandbox(
  bundle: HelmBundle,
  config: Pick<SandboxConfig, 'helmBinary' | 'lintTimeoutMs' | 'dryRunTimeoutMs' | 'templateTimeoutMs'>,
): { files: Record<string, string>; steps: SandboxStep[] } {
  assertHelmIdentifiers(bundle);

  const files = prefixFileSet(bundle.files, CHART_DIR);
  const valuesArgs: string[] = [];
  if (bundle.values && Object.keys(bundle.values).length > 0) {
    files[VALUES_FILE] = stringify(bundle.values);
    valuesArgs.push('-f', VALUES_FILE);
  }

  const lint: SandboxStep = {
    stage: 'lint',
    tool: config.helmBinary,
    args: ['lint', CHART_DIR, ...valuesArgs],
    timeoutMs: config.lintTimeoutMs,
  };
  const render: SandboxStep =
    bundle.render === 'template'
      ? {
          stage: 'template',
          tool: config.helmBinary,
          args: ['template', bundle.releaseName, CHART_DIR, '--namespace', bundle.namespace, ...valuesArgs],
          timeoutMs: config.templateTimeoutMs,
        }
      : {
          stage: 'dry_run',
          tool: config.helmBinary,
          args: [
            'install',
            bundle.releaseName,
            CHART_DIR,
            '--dry-run',
            '--debug',
            '--namespace',
            bundle.namespace,
            ...valuesArgs,
          ],
          timeoutMs: config.dryRunTimeoutMs,
        };

  return { files, steps: [lint, render] };
}
