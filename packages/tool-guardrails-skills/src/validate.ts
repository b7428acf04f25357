import path from "node:path";
import fs from "node:fs/promises";
import { minimatch } from "minimatch";
import {
  InputParseError,
  defaultPolicy,
  normalizeInvocation,
  parsePayload,
  runCommand,
  type ToolCommand,
} from "tool-guardrails-hook";
import { ManifestError } from "./manifest.js";
import { resolveSkills } from "./resolve.js";

export type LinterCommand = ToolCommand & {
  // Run from the nearest ancestor holding one of these; skipped when there is none.
  rootMarkers?: string[];
};

const ESLINT: LinterCommand[] = [
  { command: "eslint", args: [] },
  { command: "npx", args: ["eslint"], rootMarkers: ["package.json"] },
];

// Keyed by extension without the dot. The first installed linter of each list runs.
export const DEFAULT_LINTERS: Record<string, LinterCommand[]> = {
  py: [{ command: "uvx", args: ["ruff", "check"] }],
  pyi: [{ command: "uvx", args: ["ruff", "check"] }],
  ts: ESLINT,
  tsx: ESLINT,
  js: ESLINT,
  jsx: ESLINT,
  go: [
    { command: "golangci-lint", args: ["run"], rootMarkers: [".golangci.yml", ".golangci.yaml", "go.mod"] },
    { command: "go", args: ["vet"] },
  ],
};

export const LINT_TIMEOUT_MS = 60_000;

export type LintOutcome =
  | { status: "skipped"; reason: string }
  | { status: "passed"; linter: string }
  | { status: "failed"; linter: string; output: string }
  | { status: "timeout"; linter: string }
  | { status: "error"; linter: string; message: string };

export type ValidateOptions = {
  skillsDir: string;
  cwd?: string;
  linters?: Record<string, LinterCommand[]>;
  timeoutMs?: number;
};

async function exists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function findProjectRoot(startDir: string, markers: string[]): Promise<string | null> {
  let dir = path.resolve(startDir);
  for (;;) {
    for (const marker of markers) {
      if (await exists(path.join(dir, marker))) return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Lint one written file with the first available linter for its extension.
 */
export async function lintFile(filePath: string, options: Omit<ValidateOptions, "skillsDir"> = {}): Promise<LintOutcome> {
  const cwd = options.cwd ?? process.cwd();
  const target = path.resolve(cwd, filePath);
  const ext = path.extname(target).slice(1).toLowerCase();
  const candidates = (options.linters ?? DEFAULT_LINTERS)[ext];
  if (!candidates || candidates.length === 0) return { status: "skipped", reason: "no linter for extension" };

  for (const linter of candidates) {
    let runIn = cwd;
    if (linter.rootMarkers) {
      const root = await findProjectRoot(path.dirname(target), linter.rootMarkers);
      if (!root) continue;
      runIn = root;
    }

    const res = await runCommand(linter, target, runIn, options.timeoutMs ?? LINT_TIMEOUT_MS);
    switch (res.kind) {
      case "missing":
        continue;
      case "timeout":
        return { status: "timeout", linter: linter.command };
      case "error":
        return { status: "error", linter: linter.command, message: res.message };
      case "exited":
        if (res.code === 0) return { status: "passed", linter: linter.command };
        return { status: "failed", linter: linter.command, output: res.stdout + res.stderr };
    }
  }
  return { status: "skipped", reason: "no linter installed" };
}

async function coreSkills(skillsDir: string): Promise<string[]> {
  const dir = path.join(skillsDir, "core");
  try {
    const entries = await fs.readdir(dir);
    return entries
      .filter((name) => minimatch(name, "*.md"))
      .sort()
      .map((name) => path.join(dir, name));
  } catch {
    return [];
  }
}

export const LINT_FAILURE_HEADER = "---\n# Lint Failure - Review Style Guidelines\n---\n";

/**
 * The reminder printed after a failed lint: the header, then every core
 * skill and every skill resolved for the file, each followed by a blank line.
 */
export async function renderLintFailure(
  filePath: string,
  options: ValidateOptions,
): Promise<{ stdout: string; stderr: string }> {
  let stderr = "";
  let resolved: string[] = [];
  try {
    resolved = await resolveSkills(filePath, { skillsDir: options.skillsDir, cwd: options.cwd });
  } catch (err) {
    if (!(err instanceof ManifestError)) throw err;
    stderr += `${err.message}\n`;
  }

  let stdout = LINT_FAILURE_HEADER;
  for (const file of new Set([...(await coreSkills(options.skillsDir)), ...resolved])) {
    try {
      stdout += `${await fs.readFile(file, "utf8")}\n`;
    } catch {
      continue;
    }
  }
  return { stdout, stderr };
}

export type ValidateResult = {
  // 1 only when the linter reported problems.
  exitCode: 0 | 1;
  stdout: string;
  stderr: string;
  outcome: LintOutcome;
};

/**
 * Post-write hook: lint the file an Edit/Write touched and, on failure,
 * put the style skills for it back in front of the agent.
 */
export async function runValidate(raw: string, options: ValidateOptions): Promise<ValidateResult> {
  let filePath: string;
  let cwd: string | undefined;
  try {
    const payload = parsePayload(raw);
    const invocation = normalizeInvocation(payload, defaultPolicy().tools);
    if (!invocation || invocation.kind === "shell_command") {
      return { exitCode: 0, stdout: "", stderr: "", outcome: { status: "skipped", reason: "not a file edit" } };
    }
    filePath = invocation.targetPath;
    cwd = options.cwd ?? payload.cwd;
  } catch (err) {
    if (!(err instanceof InputParseError)) throw err;
    return {
      exitCode: 0,
      stdout: "",
      stderr: `Error parsing JSON input: ${err.message}\n`,
      outcome: { status: "skipped", reason: "invalid payload" },
    };
  }

  const outcome = await lintFile(filePath, { ...options, cwd });
  switch (outcome.status) {
    case "skipped":
    case "passed":
      return { exitCode: 0, stdout: "", stderr: "", outcome };
    case "timeout":
      return { exitCode: 0, stdout: "", stderr: `Lint timeout: ${filePath}\n`, outcome };
    case "error":
      return { exitCode: 0, stdout: "", stderr: `Lint error: ${outcome.message}\n`, outcome };
    case "failed": {
      const reminder = await renderLintFailure(filePath, { ...options, cwd });
      return {
        exitCode: 1,
        stdout: outcome.output + reminder.stdout,
        stderr: `Lint check failed for: ${filePath}\n${reminder.stderr}`,
        outcome,
      };
    }
  }
}
