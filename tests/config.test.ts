import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { loadConfig, defineConfig } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";
import { writeFile, rm, mkdir, mkdtemp } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

describe("Config Loader", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "proposals-config-"));
    await mkdir(join(testDir, ".agent"), { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("applies defaults when no file or env is present", async () => {
    const loaded = await loadConfig(testDir, {});
    expect(loaded.allowedRepos).toEqual([]);
    expect(loaded.allowedNamespaces).toEqual(["default", "staging", "prod"]);
    expect(loaded.platforms.baseBranch).toBe("main");
    expect(loaded.sandbox.planTimeoutMs).toBe(120_000);
    expect(loaded.sandbox.validateTimeoutMs).toBe(60_000);
    expect(loaded.sandbox.fmtTimeoutMs).toBe(30_000);
    expect(loaded.sandbox.templateTimeoutMs).toBe(60_000);
    expect(loaded.auditLogDir).toBe(join(testDir, "audit_logs"));
  });

  it("loads .agent/proposals.json before proposals.json", async () => {
    await writeFile(join(testDir, ".agent", "proposals.json"), JSON.stringify({ allowedRepos: ["org/a"] }));
    await writeFile(join(testDir, "proposals.json"), JSON.stringify({ allowedRepos: ["org/b"] }));

    const loaded = await loadConfig(testDir, {});
    expect(loaded.allowedRepos).toEqual(["org/a"]);
  });

  it("lets environment variables override the file", async () => {
    await writeFile(
      join(testDir, "proposals.json"),
      JSON.stringify({ allowedRepos: ["org/a"], platforms: { baseBranch: "develop" } }),
    );

    const loaded = await loadConfig(testDir, {
      ALLOWED_REPOS: "org/x, org/y ,",
      SCOPED_NAMESPACES: "dev",
      GITHUB_TOKEN: "test-secret",
      AUDIT_LOG_DIR: "/var/tmp/audit",
    });

    expect(loaded.allowedRepos).toEqual(["org/x", "org/y"]);
    expect(loaded.allowedNamespaces).toEqual(["dev"]);
    expect(loaded.platforms.githubToken).toBe("test-secret");
    expect(loaded.platforms.baseBranch).toBe("develop");
    expect(loaded.auditLogDir).toBe("/var/tmp/audit");
  });

  it("rejects a config file that is not JSON", async () => {
    await writeFile(join(testDir, "proposals.json"), "{ not json");
    await expect(loadConfig(testDir, {})).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("rejects values of the wrong type", async () => {
    await writeFile(join(testDir, "proposals.json"), JSON.stringify({ allowedRepos: "org/a" }));
    await expect(loadConfig(testDir, {})).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("defineConfig fills nested defaults", () => {
    const config = defineConfig({ platforms: { gitlabToken: "test-secret" } });
    expect(config.platforms.gitlabToken).toBe("test-secret");
    expect(config.platforms.gitlabUrl).toBe("https://gitlab.com");
    expect(config.sandbox.helmBinary).toBe("helm");
  });
});
