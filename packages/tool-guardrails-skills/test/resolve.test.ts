import { describe, it, expect, vi, afterEach } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { Command } from "commander";
import { ManifestError, loadManifest, type SkillManifest } from "../src/manifest.js";
import { pathKeyToRegExp, resolveSkills } from "../src/resolve.js";
import { registerSkillsCli, resolveSkillsDir } from "../src/program.js";

const createdDirs: string[] = [];

afterEach(async () => {
  vi.restoreAllMocks();
  while (createdDirs.length > 0) {
    const dir = createdDirs.pop();
    if (dir) await fs.rm(dir, { recursive: true, force: true });
  }
});

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const file = path.join(root, rel);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content, "utf8");
  }
}

async function makeFixture(manifest?: unknown) {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "tg-skills-"));
  createdDirs.push(root);
  const skillsDir = path.join(root, "skills");
  const workspace = path.join(root, "workspace");

  await writeFiles(skillsDir, {
    "core/base.md": "Base rules\n",
    "lint/style.md": "Style rules\n",
    "shared.md": "Shared\n",
    "services/api.md": "Service API rules\n",
    "services/notes.txt": "not a skill\n",
    "web/fastapi.md": "FastAPI rules\n",
  });
  if (manifest !== undefined) {
    await writeFiles(skillsDir, {
      "manifest.json": typeof manifest === "string" ? manifest : JSON.stringify(manifest),
    });
  }
  await writeFiles(workspace, {
    "services/app.py": "import fastapi\n\napp = fastapi.FastAPI()\n",
  });
  return { skillsDir, workspace };
}

const skill = (skillsDir: string, rel: string) => path.join(skillsDir, rel);

describe("resolveSkills", () => {
  it("unions the extension and path rules, deduplicated and sorted", async () => {
    const { skillsDir, workspace } = await makeFixture();
    const manifest: SkillManifest = {
      always: [],
      extensions: { ".py": ["lint/style.md", "shared.md"] },
      paths: { "services/*": ["services/*", "shared.md"] },
      content_hints: {},
    };

    expect(await resolveSkills("services/app.py", { skillsDir, cwd: workspace, manifest })).toEqual([
      skill(skillsDir, "lint/style.md"),
      skill(skillsDir, "services/api.md"),
      skill(skillsDir, "shared.md"),
    ]);
  });

  it("applies all four selections from manifest.json", async () => {
    const { skillsDir, workspace } = await makeFixture({
      always: ["core/*.md"],
      extensions: { ".py": ["lint/style.md"] },
      paths: { "services/*": ["shared.md"] },
      content_hints: { "import\\s+fastapi": ["web/fastapi.md"], "([": ["never.md"] },
    });

    expect(await resolveSkills("services/app.py", { skillsDir, cwd: workspace })).toEqual([
      skill(skillsDir, "core/base.md"),
      skill(skillsDir, "lint/style.md"),
      skill(skillsDir, "shared.md"),
      skill(skillsDir, "web/fastapi.md"),
    ]);
  });

  it("matches path globs against absolute targets relative to cwd", async () => {
    const { skillsDir, workspace } = await makeFixture();
    const manifest: SkillManifest = {
      always: [],
      extensions: {},
      paths: { "services/*": ["shared.md"] },
      content_hints: {},
    };
    const target = path.join(workspace, "services", "app.py");
    expect(await resolveSkills(target, { skillsDir, cwd: workspace, manifest })).toEqual([
      skill(skillsDir, "shared.md"),
    ]);
  });

  it("lets a star in a path key match nested directories", async () => {
    const { skillsDir, workspace } = await makeFixture();
    const manifest: SkillManifest = {
      always: [],
      extensions: {},
      paths: { "services/*": ["shared.md"] },
      content_hints: {},
    };
    expect(await resolveSkills("services/v1/app.py", { skillsDir, cwd: workspace, manifest })).toEqual([
      skill(skillsDir, "shared.md"),
    ]);
  });

  it("supports single-character and bracket wildcards in path keys", async () => {
    const { skillsDir, workspace } = await makeFixture();
    const manifest: SkillManifest = {
      always: [],
      extensions: {},
      paths: {
        "services/ap?.py": ["lint/style.md"],
        "services/app.p[xy]": ["core/base.md"],
        "services/[!a]pp.py": ["shared.md"],
      },
      content_hints: {},
    };
    expect(await resolveSkills("services/app.py", { skillsDir, cwd: workspace, manifest })).toEqual([
      skill(skillsDir, "core/base.md"),
      skill(skillsDir, "lint/style.md"),
    ]);
  });

  it("accepts extension keys without the dot and skips content hints for missing files", async () => {
    const { skillsDir, workspace } = await makeFixture();
    const manifest: SkillManifest = {
      always: [],
      extensions: { py: ["lint/style.md"] },
      paths: {},
      content_hints: { ".": ["web/fastapi.md"] },
    };
    expect(await resolveSkills("new_module.py", { skillsDir, cwd: workspace, manifest })).toEqual([
      skill(skillsDir, "lint/style.md"),
    ]);
  });

  it("ignores literal patterns that do not exist", async () => {
    const { skillsDir, workspace } = await makeFixture();
    const manifest: SkillManifest = { always: ["missing.md", "services/notes.txt"], extensions: {}, paths: {}, content_hints: {} };
    expect(await resolveSkills("x.go", { skillsDir, cwd: workspace, manifest })).toEqual([]);
  });

  it("treats a missing manifest as empty", async () => {
    const { skillsDir, workspace } = await makeFixture();
    expect(await resolveSkills("services/app.py", { skillsDir, cwd: workspace })).toEqual([]);
  });
});

describe("pathKeyToRegExp", () => {
  it("matches the whole path and escapes regex characters", () => {
    expect(pathKeyToRegExp("docs/*.md").test("docs/guide/intro.md")).toBe(true);
    expect(pathKeyToRegExp("docs/*.md").test("docs/intro.mdx")).toBe(false);
    expect(pathKeyToRegExp("a+b.txt").test("a+b.txt")).toBe(true);
    expect(pathKeyToRegExp("a+b.txt").test("aab.txt")).toBe(false);
  });

  it("treats an unclosed bracket as a literal", () => {
    expect(pathKeyToRegExp("v[1.txt").test("v[1.txt")).toBe(true);
  });
});

describe("loadManifest", () => {
  it("fills absent sections", async () => {
    const { skillsDir } = await makeFixture({ always: ["core/*.md"] });
    expect(await loadManifest(skillsDir)).toEqual({
      always: ["core/*.md"],
      extensions: {},
      paths: {},
      content_hints: {},
    });
  });

  it("rejects an invalid manifest", async () => {
    const { skillsDir } = await makeFixture({ always: "core/*.md" });
    const err = await loadManifest(skillsDir).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ManifestError);
    expect(err instanceof Error && err.message).toBe(
      `Invalid skills manifest ${path.join(skillsDir, "manifest.json")}: always: Expected array, received string`,
    );
  });
});

describe("skills CLI", () => {
  it("prints one resolved path per line", async () => {
    const { skillsDir, workspace } = await makeFixture({ extensions: { ".py": ["lint/style.md", "shared.md"] } });

    const logs: string[] = [];
    vi.spyOn(console, "log").mockImplementation((...args) => {
      logs.push(args.map(String).join(" "));
    });

    const program = new Command();
    program.exitOverride();
    registerSkillsCli(program, { readStdin: async () => "", env: {}, cwd: () => workspace });
    await program.parseAsync(["--skills-dir", skillsDir, "resolve", "services/app.py"], { from: "user" });

    expect(logs).toEqual([skill(skillsDir, "lint/style.md"), skill(skillsDir, "shared.md")]);
  });

  it("finds the skills directory from the flag, the environment, then the workspace", () => {
    expect(resolveSkillsDir("/opt/skills", { TOOL_GUARDRAILS_SKILLS_DIR: "/env/skills" }, "/ws")).toBe("/opt/skills");
    expect(resolveSkillsDir(undefined, { TOOL_GUARDRAILS_SKILLS_DIR: "/env/skills" }, "/ws")).toBe("/env/skills");
    expect(resolveSkillsDir(undefined, {}, "/ws")).toBe(path.join("/ws", ".claude", "skills"));
  });
});
