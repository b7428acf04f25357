#!/usr/bin/env tsx
import { runFormatHook } from "./format.js";

// PostToolUse hook: formats the file an Edit/Write just touched. Always exits 0.

async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString("utf8");
}

async function main(): Promise<void> {
  const result = await runFormatHook(await readAllStdin());
  if (result.stdout) process.stdout.write(result.stdout);
  if (result.stderr) process.stderr.write(result.stderr);
  process.exitCode = result.exitCode;
}

main().catch((err) => {
  console.error("tool-guardrails format fatal:", err);
  process.exitCode = 0;
});
