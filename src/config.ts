import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { isAbsolute, join } from "path";
import { z } from "zod";
import { createLogger } from "./logger.js";
import { ConfigurationError, errorMessage } from "./errors.js";

const log = createLogger("config");

const listFromEnv = (value: string | undefined): string[] | undefined =>
  value === undefined
    ? undefined
    : value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0);

export const SandboxConfigSchema = z.object({
  terraformBinary: z.string().default("terraform"),
  helmBinary: z.string().default("helm"),
  initTimeoutMs: z.number().int().positive().default(60_000),
  validateTimeoutMs: z.number().int().positive().default(60_000),
  fmtTimeoutMs: z.number().int().positive().default(30_000),
  planTimeoutMs: z.number().int().positive().default(120_000),
  lintTimeoutMs: z.number().int().positive().default(30_000),
  dryRunTimeoutMs: z.number().int().positive().default(60_000),
  templateTimeoutMs: z.number().int().positive().default(60_000),
  killGraceMs: z.number().int().nonnegative().default(1_000),
  maxOutputChars: z.number().int().positive().default(5_000_000),
});

export const PlatformConfigSchema = z.object({
  githubToken: z.string().optional(),
  gitlabToken: z.string().optional(),
  githubApiUrl: z.string().url().default("https://api.github.com"),
  gitlabUrl: z.string().url().default("https://gitlab.com"),
  githubHosts: z.array(z.string()).default(["github.com"]),
  gitlabHosts: z.array(z.string()).default(["gitlab.com"]),
  baseBranch: z.string().default("main"),
  requestTimeoutMs: z.number().int().positive().default(30_000),
});

export const PipelineConfigSchema = z.object({
  allowedRepos: z.array(z.string()).default([]),
  requireAllowList: z.boolean().default(false),
  allowedNamespaces: z.array(z.string()).default(["default", "staging", "prod"]),
  allowedWorkspaces: z.array(z.string()).default(["default", "dev", "staging", "prod"]),
  allowedProviders: z.array(z.string()).default([]),
  auditLogDir: z.string().default("audit_logs"),
  metricsDir: z.string().default(join(".agent", "metrics")),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  publishOnFailedValidation: z.boolean().default(false),
  sandbox: SandboxConfigSchema.default({}),
  platforms: PlatformConfigSchema.default({}),
});

export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;
export type PlatformConfig = z.infer<typeof PlatformConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

const CONFIG_LOCATIONS = [join(".agent", "proposals.json"), "proposals.json"];

async function readConfigFile(cwd: string): Promise<Record<string, unknown>> {
  for (const loc of CONFIG_LOCATIONS) {
    const path = join(cwd, loc);
    if (!existsSync(path)) continue;

    const content = await readFile(path, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (e) {
      throw new ConfigurationError(`Failed to parse config at ${path}: ${errorMessage(e)}`);
    }
    const record = z.record(z.unknown()).safeParse(parsed);
    if (!record.success) {
      throw new ConfigurationError(`Config at ${path} must be a JSON object`);
    }
    log.debug(`Loaded config from ${path}`);
    return record.data;
  }
  return {};
}

function envOverrides(env: NodeJS.ProcessEnv): PipelineConfigInput {
  const overrides: PipelineConfigInput = {};
  const platforms: NonNullable<PipelineConfigInput["platforms"]> = {};

  const allowedRepos = listFromEnv(env.ALLOWED_REPOS);
  if (allowedRepos) overrides.allowedRepos = allowedRepos;
  const namespaces = listFromEnv(env.SCOPED_NAMESPACES);
  if (namespaces) overrides.allowedNamespaces = namespaces;
  if (env.AUDIT_LOG_DIR) overrides.auditLogDir = env.AUDIT_LOG_DIR;
  if (env.REQUIRE_ALLOW_LIST) overrides.requireAllowList = env.REQUIRE_ALLOW_LIST === "true";

  const level = env.LOG_LEVEL?.toLowerCase();
  if (level === "debug" || level === "info" || level === "warn" || level === "error" || level === "silent") {
    overrides.logLevel = level;
  }

  const githubToken = env.GITHUB_TOKEN || env.GH_TOKEN || env.MCP_GITHUB_TOKEN;
  if (githubToken) platforms.githubToken = githubToken;
  const gitlabToken = env.GITLAB_TOKEN || env.MCP_GITLAB_TOKEN;
  if (gitlabToken) platforms.gitlabToken = gitlabToken;
  if (env.GITLAB_URL) platforms.gitlabUrl = env.GITLAB_URL;
  if (env.GITHUB_API_URL) platforms.githubApiUrl = env.GITHUB_API_URL;

  if (Object.keys(platforms).length > 0) overrides.platforms = platforms;
  return overrides;
}

/**
 * Resolve the pipeline configuration: file (first of `.agent/proposals.json`,
 * `proposals.json`), then environment variables, validated as a whole.
 * Relative directories are resolved against `cwd`.
 */
export async function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<PipelineConfig> {
  const fileConfig = await readConfigFile(cwd);
  const overrides = envOverrides(env);

  const fileResult = PipelineConfigSchema.partial().safeParse(fileConfig);
  if (!fileResult.success) {
    throw new ConfigurationError(`Invalid config file: ${fileResult.error.message}`);
  }
  const fileParsed = fileResult.data;
  const merged: PipelineConfigInput = {
    ...fileParsed,
    ...overrides,
    platforms: { ...fileParsed.platforms, ...overrides.platforms },
  };

  const result = PipelineConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${result.error.message}`);
  }
  const config = result.data;
  if (!isAbsolute(config.auditLogDir)) config.auditLogDir = join(cwd, config.auditLogDir);
  if (!isAbsolute(config.metricsDir)) config.metricsDir = join(cwd, config.metricsDir);
  return config;
}

export function defineConfig(input: PipelineConfigInput = {}): PipelineConfig {
  return PipelineConfigSchema.parse(input);
}
