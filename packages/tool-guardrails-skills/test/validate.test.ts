import { describe, it, expect, afterEach } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { LINT_FAILURE_HEADER, lintFile, runValidate, type LinterCommand } from "../src/validate.js";

const createdDirs: string[] = [];

afterEach(async () => {
  while (createdDirs.length > 0) {
    const dir = createdDirs.pop();
    if (dir) await fs.rm(dir, { recursive: true, force: true });
  }
});

// `node -e <script> <file>` stands in for a real linter.
function nodeLinter(script: string, rootMarkers?: string[]): LinterCommand {
  return { command: process.execPath, args: ["-e", script], rootMarkers };
}

async function makeFixture() {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "tg-validate-"));
  createdDirs.push(root);
  const skillsDir = path.join(root, "skills");
  const workspace = path.join(root, "workspace");
  await fs.mkdir(path.join(skillsDir, "core"), { recursive: true });
  await fs.mkdir(path.join(skillsDir, "lint"), { recursive: true });
  await fs.mkdir(path.join(workspace, "cmd"), { recursive: true });
  await fs.writeFile(path.join(skillsDir, "core", "base.md"), "Base rules\n", "utf8");
  await fs.writeFile(path.join(skillsDir, "core", "notes.txt"), "not a skill\n", "utf8");
  await fs.writeFile(path.join(skillsDir, "lint", "style.md"), "Style rules\n", "utf8");
  await fs.writeFile(
    path.join(skillsDir, "manifest.json"),
    JSON.stringify({ extensions: { ".py": ["lint/style.md", "core/base.md"] } }),
    "utf8",
  );
  await fs.writeFile(path.join(workspace, "app.py"), "print('hi')\n", "utf8");
  await fs.writeFile(path.join(workspace, "cmd", "main.go"), "package main\n", "utf8");
  return { skillsDir, workspace };
}

describe("lintFile", () => {
  it("reports a clean run", async () => {
    const { workspace } = await makeFixture();
    const outcome = await lintFile("app.py", { cwd: workspace, linters: { py: [nodeLinter("process.exit(0)")] } });
    expect(outcome).toEqual({ status: "passed", linter: process.execPath });
  });

  it("falls back to the next linter when one is not installed", async () => {
    const { workspace } = await makeFixture();
    const outcome = await lintFile("app.py", {
      cwd: workspace,
      linters: { py: [{ command: "tool-guardrails-missing-linter", args: [] }, nodeLinter("process.exit(0)")] },
    });
    expect(outcome).toEqual({ status: "passed", linter: process.execPath });
  });

  it("runs from the nearest project root and keeps the linter output", async () => {
    const { workspace } = await makeFixture();
    await fs.writeFile(path.join(workspace, "go.mod"), "module example.test/app\n", "utf8");
    const outcome = await lintFile("cmd/main.go", {
      cwd: workspace,
      linters: { go: [nodeLinter("process.stdout.write(process.cwd()); process.exitCode = 1", ["go.mod"])] },
    });
    expect(outcome).toEqual({ status: "failed", linter: process.execPath, output: await fs.realpath(workspace) });
  });

  it("skips a linter whose project root cannot be found", async () => {
    const { workspace } = await makeFixture();
    const outcome = await lintFile("cmd/main.go", {
      cwd: workspace,
      linters: { go: [nodeLinter("process.exitCode = 1", ["tool-guardrails-no-such-marker"])] },
    });
    expect(outcome).toEqual({ status: "skipped", reason: "no linter installed" });
  });

  it("skips extensions without a linter", async () => {
    const { workspace } = await makeFixture();
    expect(await lintFile("notes.txt", { cwd: workspace })).toEqual({
      status: "skipped",
      reason: "no linter for extension",
    });
  });
});

describe("runValidate", () => {
  const write = (workspace: string, filePath: string) =>
    JSON.stringify({ tool_name: "Write", tool_input: { file_path: filePath }, cwd: workspace });

  it("prints the linter output and the style skills when linting fails", async () => {
    const { skillsDir, workspace } = await makeFixture();
    const res = await runValidate(write(workspace, "app.py"), {
      skillsDir,
      linters: { py: [nodeLinter("process.stdout.write('app.py:1:1: E999 bad\\n'); process.exitCode = 1")] },
    });
    expect(res.exitCode).toBe(1);
    expect(res.stderr).toBe("Lint check failed for: app.py\n");
    expect(res.stdout).toBe(`app.py:1:1: E999 bad\n${LINT_FAILURE_HEADER}Base rules\n\nStyle rules\n\n`);
  });

  it("stays quiet when linting passes", async () => {
    const { skillsDir, workspace } = await makeFixture();
    const res = await runValidate(write(workspace, "app.py"), {
      skillsDir,
      linters: { py: [nodeLinter("process.exit(0)")] },
    });
    expect(res).toEqual({
      exitCode: 0,
      stdout: "",
      stderr: "",
      outcome: { status: "passed", linter: process.execPath },
    });
  });

  it("ignores shell payloads", async () => {
    const { skillsDir } = await makeFixture();
    const res = await runValidate(JSON.stringify({ tool_name: "Bash", tool_input: { command: "ls" } }), { skillsDir });
    expect(res.exitCode).toBe(0);
    expect(res.outcome).toEqual({ status: "skipped", reason: "not a file edit" });
  });

  it("exits 0 on malformed input", async () => {
    const { skillsDir } = await makeFixture();
    const res = await runValidate("{not json", { skillsDir });
    expect(res.exitCode).toBe(0);
    expect(res.stderr.startsWith("Error parsing JSON input: ")).toBe(true);
  });
});
