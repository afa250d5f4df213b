/** Relative path → file content, as produced by the generator. */
export type FileSet = Readonly<Record<string, string>>;

export type SandboxStage = 'init' | 'validate' | 'fmt' | 'plan' | 'lint' | 'dry_run' | 'template';

export interface SandboxResult {
  tool: string;
  stage: SandboxStage;
  args: string[];
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  truncated: boolean;
  /** Set when the process could not be started at all (e.g. binary not on PATH). */
  spawnError?: string;
}

export interface SandboxStep {
  stage: SandboxStage;
  tool: string;
  args: string[];
  timeoutMs: number;
  /** Working directory relative to the sandbox root. */
  cwd?: string;
  /** Non-zero exit codes that still let the chain continue; timeouts and spawn errors always stop it. */
  advisoryExitCodes?: readonly number[];
}

export interface SandboxRun {
  stages: SandboxResult[];
  /** First non-final stage that failed and stopped the chain. */
  failedStage?: SandboxStage;
}

export interface ExecuteOptions {
  timeoutMs: number;
  /** Repository or scope the files are destined for; checked by the AccessGuard. */
  target: string;
  stage?: SandboxStage;
  cwd?: string;
}

export function succeeded(result: SandboxResult, advisoryExitCodes: readonly number[] = []): boolean {
  const exitOk = result.exitCode === 0 || advisoryExitCodes.includes(result.exitCode);
  return exitOk && !result.timedOut && !result.truncated && result.spawnError === undefined;
}
