/**
 * SandboxRunner
 * Materializes a file set into an exclusively-owned temp directory, runs an
 * external tool against it with argv (never a shell) and a hard timeout, and
 * always removes the directory afterwards.
 */

import { spawn } from 'child_process';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join, resolve, sep } from 'path';
import type { AccessGuard } from '../security/access_guard.js';
import { InvalidFileSetError, SandboxExecutionError, SandboxTimeoutError } from '../errors.js';
import { createLogger, logMetric, type Logger } from '../logger.js';
import { assertSafeFileSet, pathViolation } from './file_set.js';
import {
  succeeded,
  type ExecuteOptions,
  type FileSet,
  type SandboxResult,
  type SandboxRun,
  type SandboxStep,
} from './types.js';

export interface SandboxRunnerOptions {
  killGraceMs?: number;
  maxOutputChars?: number;
  tmpRoot?: string;
  /** Extra variables for the child, still subject to credential scrubbing. */
  env?: Record<string, string>;
  logger?: Logger;
}

const SENSITIVE_ENV = /(API_KEY$|_KEY$|TOKEN|SECRET|PASSWORD|CREDENTIAL)/i;

const TOOL_ENV: Record<string, string> = {
  TF_IN_AUTOMATION: '1',
  TF_INPUT: '0',
  CHECKPOINT_DISABLE: '1',
};

// Generated content runs here, so nothing credential-shaped reaches the child.
export function createSafeEnv(
  base: NodeJS.ProcessEnv = process.env,
  additionalEnv: Record<string, string> = {},
): Record<string, string> {
  const env: Record<string, string> = {};

  for (const [k, v] of Object.entries(base)) {
    if (!k || v === undefined) continue;
    if (SENSITIVE_ENV.test(k)) continue;
    env[k] = v;
  }

  for (const [k, v] of Object.entries({ ...TOOL_ENV, ...additionalEnv })) {
    if (SENSITIVE_ENV.test(k)) continue;
    env[k] = v;
  }

  return env;
}

/** The error a failed result stands for; undefined when the run exited cleanly or merely non-zero. */
export function describeFailure(
  result: SandboxResult,
  timeoutMs?: number,
): SandboxTimeoutError | SandboxExecutionError | undefined {
  if (result.timedOut) return new SandboxTimeoutError(result.tool, timeoutMs ?? result.durationMs);
  if (result.spawnError !== undefined) return new SandboxExecutionError(result.tool, result.spawnError);
  if (result.truncated) return new SandboxExecutionError(result.tool, 'output exceeded the capture limit');
  return undefined;
}

export class SandboxRunner {
  private readonly killGraceMs: number;
  private readonly maxOutputChars: number;
  private readonly tmpRoot: string;
  private readonly env: Record<string, string>;
  private readonly logger: Logger;

  constructor(
    private readonly guard: AccessGuard,
    options: SandboxRunnerOptions = {},
  ) {
    this.killGraceMs = options.killGraceMs ?? 1000;
    this.maxOutputChars = options.maxOutputChars ?? 5_000_000;
    this.tmpRoot = options.tmpRoot ?? tmpdir();
    this.env = options.env ?? {};
    this.logger = options.logger ?? createLogger('SandboxRunner');
  }

  /** Single invocation in a fresh sandbox. */
  async execute(
    tool: string,
    files: FileSet,
    args: string[],
    options: ExecuteOptions,
  ): Promise<SandboxResult> {
    this.guard.authorize(options.target);
    assertSafeFileSet(files);

    return this.withWorkspace(files, (root) =>
      this.runStep(root, {
        stage: options.stage ?? 'validate',
        tool,
        args,
        timeoutMs: options.timeoutMs,
        cwd: options.cwd,
      }),
    );
  }

  /**
   * Chained invocation sharing one sandbox (init → plan, lint → dry_run).
   * A failing stage that is not the last one stops the chain and is reported as
   * `failedStage`.
   */
  async run(files: FileSet, steps: SandboxStep[], options: { target: string }): Promise<SandboxRun> {
    this.guard.authorize(options.target);
    assertSafeFileSet(files);

    return this.withWorkspace(files, async (root) => {
      const stages: SandboxResult[] = [];
      for (const [index, step] of steps.entries()) {
        const result = await this.runStep(root, step);
        stages.push(result);

        const isLast = index === steps.length - 1;
        if (!isLast && !succeeded(result, step.advisoryExitCodes)) {
          this.logger.warn(`${step.tool} ${step.stage} failed (exit ${result.exitCode}); skipping remaining stages`);
          return { stages, failedStage: step.stage };
        }
      }
      return { stages };
    });
  }

  private async withWorkspace<T>(files: FileSet, action: (root: string) => Promise<T>): Promise<T> {
    const root = await mkdtemp(join(this.tmpRoot, 'proposal-sandbox-'));
    try {
      for (const [path, content] of Object.entries(files)) {
        const dest = resolve(root, path);
        if (!dest.startsWith(root + sep)) {
          throw new InvalidFileSetError(path, 'resolves outside the sandbox');
        }
        await mkdir(dirname(dest), { recursive: true });
        await writeFile(dest, content, 'utf-8');
      }
      return await action(root);
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  }

  private async runStep(root: string, step: SandboxStep): Promise<SandboxResult> {
    let cwd = root;
    if (step.cwd !== undefined) {
      const reason = pathViolation(step.cwd);
      if (reason) throw new InvalidFileSetError(step.cwd, reason);
      cwd = resolve(root, step.cwd);
    }

    this.logger.debug(`Running ${step.tool} ${step.args.join(' ')} (${step.stage}, timeout ${step.timeoutMs}ms)`);
    const result = await this.spawnProcess(cwd, step);

    await logMetric('sandbox', 'duration_ms', result.durationMs, {
      tool: step.tool,
      stage: step.stage,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
    });

    if (result.timedOut) {
      this.logger.warn(`${step.tool} ${step.stage} timed out after ${step.timeoutMs}ms`);
    }
    return result;
  }

  private spawnProcess(cwd: string, step: SandboxStep): Promise<SandboxResult> {
    const started = Date.now();

    return new Promise((resolvePromise) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let truncated = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const child = spawn(step.tool, step.args, {
        cwd,
        env: createSafeEnv(process.env, this.env),
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const terminate = () => {
        child.kill('SIGTERM');
        killTimer = setTimeout(() => child.kill('SIGKILL'), this.killGraceMs);
      };

      const timer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, step.timeoutMs);

      const capture = (current: string, chunk: string): string => {
        if (truncated) return current;
        const next = current + chunk;
        if (next.length <= this.maxOutputChars) return next;
        truncated = true;
        terminate();
        return next.slice(0, this.maxOutputChars);
      };

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout = capture(stdout, chunk);
      });
      child.stderr.on('data', (chunk: string) => {
        stderr = capture(stderr, chunk);
      });

      const finish = (code: number | null, spawnError?: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);

        resolvePromise({
          tool: step.tool,
          stage: step.stage,
          args: [...step.args],
          exitCode: timedOut || code === null ? -1 : code,
          stdout,
          stderr,
          durationMs: Date.now() - started,
          timedOut,
          truncated,
          ...(spawnError !== undefined ? { spawnError } : {}),
        });
      };

      child.on('close', (code) => finish(code));
      child.on('error', (error) => finish(-1, error.message));
    });
  }
}
