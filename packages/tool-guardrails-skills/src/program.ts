import path from "node:path";
import type { Command } from "commander";
import { detectProject, renderDetection } from "./detect.js";
import { runInject } from "./inject.js";
import { ManifestError } from "./manifest.js";
import { resolveSkills } from "./resolve.js";
import { runValidate } from "./validate.js";

export type SkillsCliIo = {
  readStdin: () => Promise<string>;
  env?: NodeJS.ProcessEnv;
  cwd?: () => string;
};

export function resolveSkillsDir(flag: string | undefined, env: NodeJS.ProcessEnv, cwd: string): string {
  const fromEnv = env.TOOL_GUARDRAILS_SKILLS_DIR?.trim();
  return path.resolve(cwd, flag ?? (fromEnv || path.join(".claude", "skills")));
}

export function registerSkillsCli(program: Command, io: SkillsCliIo) {
  const env = io.env ?? process.env;
  const cwd = io.cwd ?? (() => process.cwd());

  program.option("--skills-dir <dir>", "Skills directory (default: $TOOL_GUARDRAILS_SKILLS_DIR or .claude/skills)");

  program
    .command("resolve")
    .description("Print the skill documents that apply to a file, one per line")
    .argument("<file>", "Target file path")
    .action(async (file: string) => {
      const opts = program.opts<{ skillsDir?: string }>();
      const skillsDir = resolveSkillsDir(opts.skillsDir, env, cwd());
      try {
        for (const skill of await resolveSkills(file, { skillsDir, cwd: cwd() })) {
          console.log(skill);
        }
      } catch (err) {
        if (!(err instanceof ManifestError)) throw err;
        console.error(err.message);
        process.exitCode = 1;
      }
    });

  program
    .command("inject")
    .description("Read a hook payload on stdin and print the context of the skills for its file")
    .option("--ext <ext>", "Only inject for files with this extension")
    .action(async (opts: { ext?: string }) => {
      const globals = program.opts<{ skillsDir?: string }>();
      const skillsDir = resolveSkillsDir(globals.skillsDir, env, cwd());
      const result = await runInject(await io.readStdin(), { skillsDir, ext: opts.ext });
      if (result.stdout) process.stdout.write(result.stdout);
      if (result.stderr) process.stderr.write(result.stderr);
      process.exitCode = result.exitCode;
    });

  program
    .command("validate")
    .description("Read a hook payload on stdin, lint its file and print the style skills when linting fails")
    .action(async () => {
      const globals = program.opts<{ skillsDir?: string }>();
      const skillsDir = resolveSkillsDir(globals.skillsDir, env, cwd());
      const result = await runValidate(await io.readStdin(), { skillsDir });
      if (result.stdout) process.stdout.write(result.stdout);
      if (result.stderr) process.stderr.write(result.stderr);
      process.exitCode = result.exitCode;
    });

  program
    .command("detect")
    .description("Print the project types found in a directory and the skills they suggest")
    .argument("[dir]", "Project root (default: current directory)")
    .action(async (dir: string | undefined) => {
      const text = renderDetection(await detectProject(path.resolve(cwd(), dir ?? ".")));
      if (text) process.stdout.write(text);
    });
}
