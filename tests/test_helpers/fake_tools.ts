import { chmod, writeFile } from "fs/promises";
import { join } from "path";
import { fileURLToPath } from "url";

/** Absolute path of a file under tests/fixtures. */
export function fixturePath(relative: string): string {
  return fileURLToPath(new URL(`../fixtures/${relative}`, import.meta.url));
}

/**
 * Writes an executable script run by the current node binary. `body` is
 * CommonJS and sees the tool's argv in `process.argv.slice(2)`.
 */
export async function writeFakeTool(dir: string, name: string, body: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, `#!${process.execPath}\n${body}\n`, "utf-8");
  await chmod(path, 0o755);
  return path;
}

export interface FakeTerraformOptions {
  /** Files `fmt -check` lists as unformatted; it then exits 3. */
  unformatted?: string[];
  /** How long `plan` sleeps before printing. */
  planDelayMs?: number;
}

/**
 * A terraform stand-in: `init` and `validate` succeed, `fmt` lists
 * `unformatted`, `plan` prints the given fixture and exits with `planExit`.
 */
export function fakeTerraform(
  dir: string,
  planFixture: string,
  planExit: number,
  options: FakeTerraformOptions = {},
): Promise<string> {
  const unformatted = options.unformatted ?? [];
  return writeFakeTool(
    dir,
    "terraform",
    `
const fs = require("fs");
const [command] = process.argv.slice(2);
if (command === "init") {
  process.stdout.write("Terraform has been successfully initialized!\\n");
  process.exit(0);
}
if (command === "validate") {
  process.stdout.write(JSON.stringify({ format_version: "1.0", valid: true, error_count: 0, warning_count: 0, diagnostics: [] }));
  process.exit(0);
}
if (command === "fmt") {
  const files = ${JSON.stringify(unformatted)};
  process.stdout.write(files.map((f) => f + "\\n").join(""));
  process.exit(files.length > 0 ? 3 : 0);
}
if (command === "plan") {
  setTimeout(() => {
    process.stdout.write(fs.readFileSync(${JSON.stringify(fixturePath(planFixture))}, "utf-8"));
    process.exit(${planExit});
  }, ${options.planDelayMs ?? 0});
} else {
  process.stderr.write("unexpected command " + command + "\\n");
  process.exit(2);
}
`,
  );
}

/** A helm stand-in: `lint` prints lint_ok.txt, `install` and `template` print the given render fixture. */
export function fakeHelm(dir: string, dryRunFixture: string): Promise<string> {
  return writeFakeTool(
    dir,
    "helm",
    `
const fs = require("fs");
const [command] = process.argv.slice(2);
if (command === "lint") {
  process.stdout.write(fs.readFileSync(${JSON.stringify(fixturePath("helm/lint_ok.txt"))}, "utf-8"));
  process.exit(0);
}
if (command === "install" || command === "template") {
  process.stdout.write(fs.readFileSync(${JSON.stringify(fixturePath(dryRunFixture))}, "utf-8"));
  process.exit(0);
}
process.exit(2);
`,
  );
}
