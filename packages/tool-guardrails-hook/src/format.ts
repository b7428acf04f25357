import path from "node:path";
import fs from "node:fs/promises";
import { InputParseError } from "./errors.js";
import { normalizeInvocation, parsePayload } from "./normalize.js";
import { defaultPolicy, type ToolNames } from "./policy.js";
import { runCommand, type ToolCommand } from "./run-command.js";

const PRETTIER: ToolCommand = { command: "npx", args: ["prettier", "--write"] };

// Keyed by lowercase extension, dot included.
export const DEFAULT_FORMATTERS: Record<string, ToolCommand> = {
  ".ts": PRETTIER,
  ".tsx": PRETTIER,
  ".js": PRETTIER,
  ".jsx": PRETTIER,
  ".json": PRETTIER,
  ".css": PRETTIER,
  ".scss": PRETTIER,
  ".md": PRETTIER,
  ".yaml": PRETTIER,
  ".yml": PRETTIER,
  ".go": { command: "gofmt", args: ["-w"] },
  ".py": { command: "black", args: [] },
};

// Path segments that are never formatted.
export const SKIP_SEGMENTS = ["node_modules", ".git", "vendor", "__pycache__", ".next", "dist", "build"];

export const FORMAT_TIMEOUT_MS = 30_000;

export type FormatOutcome =
  | { status: "skipped"; reason: string }
  | { status: "formatted"; filePath: string }
  | { status: "failed"; filePath: string; stderr: string }
  | { status: "timeout"; filePath: string }
  | { status: "error"; filePath: string; message: string };

export type FormatOptions = {
  formatters?: Record<string, ToolCommand>;
  timeoutMs?: number;
  // Directory relative paths are resolved against; defaults to the process cwd.
  cwd?: string;
  tools?: ToolNames;
};

export function formatterFor(filePath: string, formatters: Record<string, ToolCommand>): ToolCommand | null {
  const ext = path.extname(filePath).toLowerCase();
  return formatters[ext] ?? null;
}

export function isSkippedPath(filePath: string): boolean {
  const segments = filePath.replace(/\\/g, "/").split("/");
  return segments.some((segment) => SKIP_SEGMENTS.includes(segment));
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

/**
 * Format one edited file with the formatter registered for its extension.
 * Every problem becomes an outcome; nothing here throws.
 */
export async function formatFile(filePath: string, options: FormatOptions = {}): Promise<FormatOutcome> {
  const formatters = options.formatters ?? DEFAULT_FORMATTERS;
  const cwd = options.cwd ?? process.cwd();

  if (isSkippedPath(filePath)) return { status: "skipped", reason: "excluded path" };

  const target = path.resolve(cwd, filePath);
  if (!(await isFile(target))) return { status: "skipped", reason: "file not found" };

  const formatter = formatterFor(filePath, formatters);
  if (!formatter) return { status: "skipped", reason: "no formatter for extension" };

  const res = await runCommand(formatter, target, cwd, options.timeoutMs ?? FORMAT_TIMEOUT_MS);
  switch (res.kind) {
    case "missing":
      return { status: "skipped", reason: `${formatter.command} not installed` };
    case "timeout":
      return { status: "timeout", filePath };
    case "error":
      return { status: "error", filePath, message: res.message };
    case "exited":
      return res.code === 0 ? { status: "formatted", filePath } : { status: "failed", filePath, stderr: res.stderr };
  }
}

export type FormatHookResult = {
  // Formatting never blocks the tool call.
  exitCode: 0;
  stdout: string;
  stderr: string;
  outcome: FormatOutcome;
};

export function describeOutcome(outcome: FormatOutcome): { stdout: string; stderr: string } {
  switch (outcome.status) {
    case "skipped":
      return { stdout: "", stderr: "" };
    case "formatted":
      return { stdout: `Formatted: ${outcome.filePath}\n`, stderr: "" };
    case "failed":
      return { stdout: "", stderr: `Format warning: ${outcome.stderr}\n` };
    case "timeout":
      return { stdout: "", stderr: `Format timeout: ${outcome.filePath}\n` };
    case "error":
      return { stdout: "", stderr: `Format error: ${outcome.message}\n` };
  }
}

/**
 * Post-edit hook: raw payload in, formatter run, messages out.
 */
export async function runFormatHook(raw: string, options: FormatOptions = {}): Promise<FormatHookResult> {
  let outcome: FormatOutcome;
  try {
    const payload = parsePayload(raw);
    const invocation = normalizeInvocation(payload, options.tools ?? defaultPolicy().tools);
    if (!invocation || invocation.kind === "shell_command") {
      outcome = { status: "skipped", reason: "not a file edit" };
    } else {
      outcome = await formatFile(invocation.targetPath, { ...options, cwd: options.cwd ?? payload.cwd });
    }
  } catch (err) {
    if (!(err instanceof InputParseError)) throw err;
    return {
      exitCode: 0,
      stdout: "",
      stderr: `Error parsing JSON input: ${err.message}\n`,
      outcome: { status: "skipped", reason: "invalid payload" },
    };
  }

  return { exitCode: 0, ...describeOutcome(outcome), outcome };
}
