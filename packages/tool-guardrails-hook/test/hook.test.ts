import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { resolveWorkspaceRoot, runHook } from "../src/hook.js";

async function makeTempWorkspace(policy?: unknown): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "tg-hook-"));
  if (policy !== undefined) {
    await fs.writeFile(
      path.join(dir, "tool-guardrails.policy.json"),
      typeof policy === "string" ? policy : JSON.stringify(policy),
      "utf8",
    );
  }
  return dir;
}

function bash(root: string, command: string): string {
  return JSON.stringify({ tool_name: "Bash", tool_input: { command }, cwd: root });
}

describe("runHook", () => {
  it("exits 1 on an empty payload", async () => {
    const res = await runHook("", { env: {} });
    expect(res).toEqual({ exitCode: 1, stderr: "Error parsing JSON input: empty payload\n", decisions: [] });
  });

  it("exits 1 on a broken policy file, never 2", async () => {
    const root = await makeTempWorkspace("{ broken");
    const res = await runHook(bash(root, "kubectl delete pod foo"), { env: {} });
    expect(res.exitCode).toBe(1);
    expect(res.stderr.startsWith(`Invalid policy file ${path.join(root, "tool-guardrails.policy.json")}: `)).toBe(true);
  });

  it("applies the policy found in the payload's workspace", async () => {
    const root = await makeTempWorkspace({ branchPrefix: { requiredPrefix: "team/" } });
    expect((await runHook(bash(root, "git checkout -b team/feat/x"), { env: {} })).exitCode).toBe(0);
    expect((await runHook(bash(root, "git checkout -b mriley/feat/x"), { env: {} })).exitCode).toBe(2);
  });

  it("uses an explicit policy without reading files", async () => {
    const root = await makeTempWorkspace("{ broken");
    const res = await runHook(bash(root, "ls"), {
      env: {},
      policy: {
        tools: { shell: ["Bash"], edit: [], write: [] },
        disabledDomains: [],
        enforcement: {},
        branchPrefix: { requiredPrefix: "x/", allowedBranches: [] },
        kubectl: { bootstrapNamespaces: [] },
        protectedFiles: { allow: [], protect: [] },
      },
    });
    expect(res.exitCode).toBe(0);
    expect(res.decisions).toHaveLength(4);
  });
});

describe("resolveWorkspaceRoot", () => {
  it("prefers the payload cwd, then the project dir, then the process cwd", () => {
    expect(resolveWorkspaceRoot({ cwd: "/a" }, { CLAUDE_PROJECT_DIR: "/b" }, "/c")).toBe("/a");
    expect(resolveWorkspaceRoot({}, { CLAUDE_PROJECT_DIR: "/b" }, "/c")).toBe("/b");
    expect(resolveWorkspaceRoot({ cwd: "  " }, {}, "/c")).toBe("/c");
  });
});
