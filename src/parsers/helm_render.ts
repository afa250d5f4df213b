import { parseDocument } from 'yaml';
import { describeFailure } from '../sandbox/runner.js';
import type { SandboxResult, SandboxRun } from '../sandbox/types.js';
import {
  deepFreeze,
  emptyLint,
  toRun,
  type HelmRenderReport,
  type LintResult,
  type ManifestRecord,
  type ManifestSummary,
  type ToolOutputParser,
} from './types.js';

export function parseLintOutput(output: string, exitCode: number, timedOut = false): LintResult {
  const lint: LintResult = emptyLint(false);
  for (const raw of output.split('\n')) {
    const line = raw.trim();
    if (line.includes('[ERROR]')) lint.errors.push(line);
    else if (line.includes('[WARNING]')) lint.warnings.push(line);
    else if (line.includes('[INFO]')) lint.info.push(line);
  }
  lint.passed = lint.errors.length === 0 && exitCode === 0 && !timedOut;
  return lint;
}

type StreamState = 'preamble' | 'document' | 'notes';

const isSeparator = (line: string) => line.startsWith('---') && !line.startsWith('---#');
const isNotesMarker = (line: string) => line.trim() === 'NOTES:';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Splits `helm install --dry-run --debug` output into manifests.
 *
 * preamble --(---)--> document --(---)--> document
 *                          \--(NOTES:)--> notes (terminal)
 */
export class ManifestStreamParser {
  private state: StreamState = 'preamble';
  private buffer: string[] = [];
  private readonly manifests: ManifestRecord[] = [];

  constructor(private readonly defaultNamespace: string) {}

  feed(line: string): void {
    switch (this.state) {
      case 'preamble':
        if (isSeparator(line)) this.state = 'document';
        break;
      case 'document':
        if (isSeparator(line)) {
          this.flush();
        } else if (isNotesMarker(line)) {
          this.flush();
          this.state = 'notes';
        } else {
          this.buffer.push(line);
        }
        break;
      case 'notes':
        break;
    }
  }

  end(): ManifestRecord[] {
    if (this.state === 'document') this.flush();
    this.state = 'notes';
    return [...this.manifests];
  }

  private flush(): void {
    const text = this.buffer.join('\n');
    this.buffer = [];
    if (!text.trim()) return;

    const doc = parseDocument(text);
    if (doc.errors.length > 0) return;

    let value: unknown;
    try {
      value = doc.toJS();
    } catch {
      return;
    }
    if (!isRecord(value) || typeof value.kind !== 'string') return;

    const metadata = isRecord(value.metadata) ? value.metadata : {};
    this.manifests.push({
      kind: value.kind,
      namespace: typeof metadata.namespace === 'string' ? metadata.namespace : this.defaultNamespace,
      name: typeof metadata.name === 'string' ? metadata.name : 'unknown',
    });
  }
}

export function extractManifests(output: string, defaultNamespace = 'default'): ManifestRecord[] {
  const parser = new ManifestStreamParser(defaultNamespace);
  for (const line of output.split('\n')) parser.feed(line);
  return parser.end();
}

export function extractNotes(output: string): string {
  const lines = output.split('\n');
  const start = lines.findIndex((line) => line.includes('NOTES:'));
  if (start === -1) return '';

  const captured: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (line.startsWith('---') || line.startsWith('apiVersion:')) break;
    captured.push(line);
  }
  return captured.join('\n').trim();
}

export function summarizeManifests(manifests: readonly ManifestRecord[]): ManifestSummary {
  const byKind: Record<string, number> = {};
  const byNamespace: Record<string, number> = {};
  for (const manifest of manifests) {
    byKind[manifest.kind] = (byKind[manifest.kind] ?? 0) + 1;
    byNamespace[manifest.namespace] = (byNamespace[manifest.namespace] ?? 0) + 1;
  }

  const kinds = new Set(manifests.map((m) => m.kind));
  return {
    totalCount: manifests.length,
    byKind,
    byNamespace,
    resourceNames: manifests.map((m) => `${m.kind}/${m.name}`),
    hasSecrets: kinds.has('Secret'),
    hasConfigmaps: kinds.has('ConfigMap'),
    hasServices: kinds.has('Service'),
    hasIngress: kinds.has('Ingress'),
  };
}

function namespaceArg(result: SandboxResult | undefined): string | undefined {
  if (!result) return undefined;
  const index = result.args.indexOf('--namespace');
  return index === -1 ? undefined : result.args[index + 1];
}

function failureText(result: SandboxResult): string {
  const failure = describeFailure(result);
  if (failure) return failure.message;
  return result.stderr.trim() || `helm ${result.stage} exited with code ${result.exitCode}`;
}

export interface HelmRenderParserOptions {
  /** Namespace for manifests that declare none; defaults to the dry run's `--namespace`. */
  namespace?: string;
}

/** Parses a `lint → dry_run` Helm chain, or a lone dry run. */
export class HelmRenderParser implements ToolOutputParser<HelmRenderReport> {
  constructor(private readonly options: HelmRenderParserOptions = {}) {}

  parse(raw: SandboxResult | SandboxRun): HelmRenderReport {
    const run = toRun(raw);
    const lintStage = run.stages.find((s) => s.stage === 'lint');
    const renderStage = run.stages.find((s) => s.stage !== 'lint');

    const lint = lintStage
      ? parseLintOutput(lintStage.stdout + '\n' + lintStage.stderr, lintStage.exitCode, lintStage.timedOut)
      : emptyLint(true);

    if (!renderStage) {
      const failed = lintStage;
      const report: HelmRenderReport = {
        kind: 'helm_render',
        status: 'failed',
        stage: failed?.stage ?? 'dry_run',
        exitCode: failed?.exitCode ?? -1,
        timedOut: failed?.timedOut ?? false,
        resourceChanges: [],
        manifests: [],
        lint,
        notes: '',
        rawOutput: failed?.stdout ?? '',
        errors: [failed ? `helm lint failed: ${failureText(failed)}` : 'no helm stage was executed'],
        summary: summarizeManifests([]),
      };
      return deepFreeze(report);
    }

    const namespace = this.options.namespace ?? namespaceArg(renderStage) ?? 'default';
    const manifests = extractManifests(renderStage.stdout, namespace);
    const notes = extractNotes(renderStage.stdout);

    const errors: string[] = [];
    if (lintStage && !lint.passed) {
      errors.push(...(lint.errors.length > 0 ? lint.errors : [`helm lint failed: ${failureText(lintStage)}`]));
    }
    if (renderStage.exitCode !== 0 || describeFailure(renderStage) !== undefined) {
      errors.push(`helm ${renderStage.stage} failed: ${failureText(renderStage)}`);
    }

    const report: HelmRenderReport = {
      kind: 'helm_render',
      status: errors.length === 0 ? 'success' : 'failed',
      stage: renderStage.stage,
      exitCode: renderStage.exitCode,
      timedOut: renderStage.timedOut,
      resourceChanges: [],
      manifests,
      lint,
      notes,
      rawOutput: renderStage.stdout,
      errors,
      summary: summarizeManifests(manifests),
    };
    return deepFreeze(report);
  }
}
