import { describe, it, expect } from "vitest";
import { dispatch } from "../src/dispatch.js";
import { defaultPolicy } from "../src/policy.js";
import { BANNER } from "../src/render.js";

const bash = (command: string) => ({ tool_name: "Bash", tool_input: { command } });

describe("dispatch", () => {
  it("stops at the first block", () => {
    const res = dispatch(bash("git checkout -b feature-x && git commit -m x"), defaultPolicy());
    expect(res.exitCode).toBe(2);
    expect(res.decisions.map((d) => d.domain)).toEqual(["branch-prefix"]);
    expect(res.stderr.split("\n").slice(0, 3)).toEqual([
      BANNER,
      "BRANCH CREATION BLOCKED - PREFIX REQUIRED",
      BANNER,
    ]);
  });

  it("accumulates warnings in domain order and exits 0", () => {
    const res = dispatch(bash('git commit -m "wip" && rm -rf dist'), defaultPolicy());
    expect(res.exitCode).toBe(0);
    expect(res.decisions.map((d) => d.verdict)).toEqual(["ALLOW", "WARN", "WARN", "ALLOW"]);
    const commitAt = res.stderr.indexOf("REMINDER: USE SAFE-COMMIT FOR COMMITS");
    const destroyAt = res.stderr.indexOf("DESTRUCTIVE COMMAND WARNING");
    expect(commitAt).toBeGreaterThan(0);
    expect(destroyAt).toBeGreaterThan(commitAt);
  });

  it("prints earlier warnings before the block", () => {
    const res = dispatch(bash("kubectl delete pod foo"), defaultPolicy());
    expect(res.exitCode).toBe(2);
    expect(res.decisions.map((d) => `${d.domain}:${d.verdict}`)).toEqual([
      "branch-prefix:ALLOW",
      "commit-gate:ALLOW",
      "destructive-command:WARN",
      "kubectl-mutation:BLOCK",
    ]);
    expect(res.stderr.indexOf("DESTRUCTIVE COMMAND WARNING")).toBeLessThan(
      res.stderr.indexOf("KUBECTL MUTATION BLOCKED - GITOPS REQUIRED"),
    );
  });

  it("runs only the file domain for edits", () => {
    const res = dispatch({ tool_name: "Edit", tool_input: { file_path: ".env" } }, defaultPolicy());
    expect(res.exitCode).toBe(2);
    expect(res.invocation?.kind).toBe("file_edit");
    expect(res.decisions.map((d) => d.domain)).toEqual(["protected-file"]);
  });

  it("reads the path key for writes", () => {
    const res = dispatch({ tool_name: "Write", tool_input: { path: "yarn.lock" } }, defaultPolicy());
    expect(res.exitCode).toBe(2);
    expect(res.invocation?.kind).toBe("file_write");
  });

  it("allows tools it does not gate", () => {
    const res = dispatch({ tool_name: "Read", tool_input: { file_path: ".env" } }, defaultPolicy());
    expect(res).toEqual({ exitCode: 0, stderr: "", invocation: null, decisions: [] });
  });

  it("skips disabled domains", () => {
    const policy = defaultPolicy();
    policy.disabledDomains = ["kubectl-mutation"];
    const res = dispatch(bash("kubectl delete pod foo"), policy);
    expect(res.exitCode).toBe(0);
    expect(res.decisions.map((d) => d.domain)).toEqual(["branch-prefix", "commit-gate", "destructive-command"]);
  });
});
