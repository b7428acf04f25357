import { spawn } from "node:child_process";

export type ToolCommand = {
  command: string;
  args: string[];
};

export type CommandResult =
  | { kind: "exited"; code: number | null; stdout: string; stderr: string }
  | { kind: "timeout" }
  | { kind: "missing" }
  | { kind: "error"; message: string };

/**
 * Run `tool` on one file and collect its output. A binary that is not
 * installed resolves to `missing`; nothing here rejects.
 */
export function runCommand(tool: ToolCommand, target: string, cwd: string, timeoutMs: number): Promise<CommandResult> {
  return new Promise((resolve) => {
    const child = spawn(tool.command, [...tool.args, target], {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);

    child.on("error", (err: NodeJS.ErrnoException) => {
      clearTimeout(timer);
      resolve(err.code === "ENOENT" ? { kind: "missing" } : { kind: "error", message: err.message });
    });
    child.on("close", (code) => {
      clearTimeout(timer);
      resolve(timedOut ? { kind: "timeout" } : { kind: "exited", code, stdout, stderr });
    });
  });
}
