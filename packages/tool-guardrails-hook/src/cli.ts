#!/usr/bin/env tsx
import { runHook } from "./hook.js";

/**
 * Tool Guardrails gate (PreToolUse hook).
 *
 * The host pipes one tool-use event as JSON on stdin and reads the exit code:
 *  - 0: allowed (a warning may have been printed)
 *  - 1: the hook itself failed (bad input or policy file)
 *  - 2: blocked by policy; stderr explains why and what to do instead
 *
 * IMPORTANT: nothing goes to stdout. Explanations and logs use stderr.
 */

async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString("utf8");
}

function debugEnabled(): boolean {
  const v = process.env.TOOL_GUARDRAILS_DEBUG;
  return v === "1" || v === "true";
}

async function main(): Promise<void> {
  const raw = await readAllStdin();
  const result = await runHook(raw);

  if (debugEnabled()) {
    for (const d of result.decisions) {
      const via = d.exception ? `${d.rule?.id} + ${d.exception.id}` : (d.rule?.id ?? "no rule");
      console.error(`[tool-guardrails] ${d.domain}: ${d.verdict} (${via})`);
    }
  }

  if (result.stderr) process.stderr.write(result.stderr);
  process.exitCode = result.exitCode;
}

main().catch((err) => {
  console.error("tool-guardrails hook fatal:", err);
  process.exit(1);
});
