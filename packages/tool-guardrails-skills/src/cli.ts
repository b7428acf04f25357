#!/usr/bin/env tsx
import { Command } from "commander";
import { registerSkillsCli } from "./program.js";

async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString("utf8");
}

const program = new Command();
program.name("tool-guardrails-skills").description("Resolve, inject and enforce skill documents for a workspace");
registerSkillsCli(program, { readStdin: readAllStdin });

program.parseAsync(process.argv).catch((err) => {
  console.error("tool-guardrails-skills fatal:", err);
  process.exit(1);
});
