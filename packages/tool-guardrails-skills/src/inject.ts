import path from "node:path";
import fs from "node:fs/promises";
import { InputParseError, defaultPolicy, normalizeInvocation, parsePayload } from "tool-guardrails-hook";
import { ManifestError } from "./manifest.js";
import { resolveSkills } from "./resolve.js";

export function skillName(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Skill documents as one context block: a `# name` header between rules,
 * then the document, then a blank line. Files that vanished are left out.
 */
export async function renderSkillContext(files: string[]): Promise<string> {
  let out = "";
  for (const file of files) {
    let content: string;
    try {
      content = await fs.readFile(file, "utf8");
    } catch {
      continue;
    }
    out += `---\n# ${skillName(file)}\n---\n${content}\n`;
  }
  return out;
}

export type InjectOptions = {
  skillsDir: string;
  cwd?: string;
  // Only inject for targets with this extension (without the dot).
  ext?: string;
};

export type InjectResult = {
  // Injection never blocks the tool call.
  exitCode: 0;
  stdout: string;
  stderr: string;
};

/**
 * Pre-write hook: print the skills that apply to the file an Edit/Write targets.
 */
export async function runInject(raw: string, options: InjectOptions): Promise<InjectResult> {
  try {
    const payload = parsePayload(raw);
    const invocation = normalizeInvocation(payload, defaultPolicy().tools);
    if (!invocation || invocation.kind === "shell_command") {
      return { exitCode: 0, stdout: "", stderr: "" };
    }

    const target = invocation.targetPath;
    if (options.ext && path.extname(target).toLowerCase() !== `.${options.ext.toLowerCase()}`) {
      return { exitCode: 0, stdout: "", stderr: "" };
    }

    const files = await resolveSkills(target, { skillsDir: options.skillsDir, cwd: options.cwd ?? payload.cwd });
    return { exitCode: 0, stdout: await renderSkillContext(files), stderr: "" };
  } catch (err) {
    if (err instanceof InputParseError) {
      return { exitCode: 0, stdout: "", stderr: `Error parsing JSON input: ${err.message}\n` };
    }
    if (err instanceof ManifestError) {
      return { exitCode: 0, stdout: "", stderr: `${err.message}\n` };
    }
    throw err;
  }
}
