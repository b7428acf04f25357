import path from "node:path";
import fs, { type FileHandle } from "node:fs/promises";
import { minimatch } from "minimatch";
import { loadManifest, type SkillManifest } from "./manifest.js";

export const CONTENT_SAMPLE_CHARS = 2000;

const SKILL_EXTENSION = ".md";

export type ResolveOptions = {
  skillsDir: string;
  // Base for relative targets and for matching path globs; defaults to the process cwd.
  cwd?: string;
  // Skip reading manifest.json and use this one.
  manifest?: SkillManifest;
};

function toPosix(p: string): string {
  return p.split(path.sep).join("/").replace(/\\/g, "/");
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

/**
 * Expands manifest patterns to files under the skills directory.
 * The directory is listed once, on the first glob.
 */
class SkillFiles {
  private listing: Promise<string[]> | null = null;

  constructor(private readonly skillsDir: string) {}

  private list(): Promise<string[]> {
    if (!this.listing) {
      this.listing = fs
        .readdir(this.skillsDir, { recursive: true })
        .then((entries) => entries.map(toPosix))
        .catch(() => []);
    }
    return this.listing;
  }

  async expand(patterns: string[]): Promise<string[]> {
    const out: string[] = [];
    for (const pattern of patterns) {
      if (pattern.includes("*")) {
        const entries = await this.list();
        for (const rel of entries.filter((entry) => minimatch(entry, pattern))) {
          const abs = path.resolve(this.skillsDir, rel);
          if (await isFile(abs)) out.push(abs);
        }
      } else {
        const abs = path.resolve(this.skillsDir, pattern);
        if (await isFile(abs)) out.push(abs);
      }
    }
    return out.filter((file) => path.extname(file) === SKILL_EXTENSION);
  }
}

function extensionPatterns(manifest: SkillManifest, targetPath: string): string[] {
  const ext = path.extname(targetPath).toLowerCase();
  if (!ext) return [];
  return [...(manifest.extensions[ext] ?? []), ...(manifest.extensions[ext.slice(1)] ?? [])];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

// `[seq]` / `[!seq]` starting at `open`, or null when it never closes (then "[" is literal).
function bracketClass(pattern: string, open: number): { source: string; close: number } | null {
  let j = open + 1;
  if (pattern.charAt(j) === "!") j++;
  if (pattern.charAt(j) === "]") j++;
  const close = pattern.indexOf("]", j);
  if (close === -1) return null;

  let body = pattern.slice(open + 1, close);
  const negate = body.startsWith("!");
  if (negate) body = body.slice(1);
  body = body.replace(/[\\\]]/g, "\\$&").replace(/^\^/, "\\^");
  return { source: `[${negate ? "^" : ""}${body}]`, close };
}

/**
 * Shell-style pattern for manifest path keys. Unlike the skill globs, `*`
 * and `?` also match "/", so "services/*" covers nested files too.
 */
export function pathKeyToRegExp(pattern: string): RegExp {
  let source = "";
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);
    if (ch === "*") {
      if (!source.endsWith(".*")) source += ".*";
    } else if (ch === "?") {
      source += ".";
    } else if (ch === "[") {
      const cls = bracketClass(pattern, i);
      if (cls) {
        source += cls.source;
        i = cls.close;
      } else {
        source += "\\[";
      }
    } else {
      source += escapeRegExp(ch);
    }
  }
  return new RegExp(`^${source}$`, "s");
}

function pathPatterns(manifest: SkillManifest, targetPath: string, cwd: string): string[] {
  const asGiven = toPosix(targetPath);
  const relative = toPosix(path.relative(cwd, path.resolve(cwd, targetPath)));
  const candidates = asGiven === relative ? [asGiven] : [asGiven, relative];

  return Object.entries(manifest.paths)
    .filter(([key]) => {
      const re = pathKeyToRegExp(key);
      return candidates.some((candidate) => re.test(candidate));
    })
    .flatMap(([, patterns]) => patterns);
}

/**
 * The first characters of the target, or "" when it is missing or unreadable.
 */
export async function readContentSample(filePath: string, maxChars = CONTENT_SAMPLE_CHARS): Promise<string> {
  let handle: FileHandle | null = null;
  try {
    handle = await fs.open(filePath, "r");
    // UTF-8 takes at most 4 bytes per character.
    const buf = Buffer.alloc(maxChars * 4);
    const { bytesRead } = await handle.read(buf, 0, buf.length, 0);
    return buf.subarray(0, bytesRead).toString("utf8").slice(0, maxChars);
  } catch {
    return "";
  } finally {
    await handle?.close();
  }
}

function contentPatterns(manifest: SkillManifest, content: string): string[] {
  if (!content) return [];
  const out: string[] = [];
  for (const [source, patterns] of Object.entries(manifest.content_hints)) {
    let re: RegExp;
    try {
      re = new RegExp(source, "i");
    } catch (err) {
      // Invalid hint regexes are skipped.
      if (err instanceof SyntaxError) continue;
      throw err;
    }
    if (re.test(content)) out.push(...patterns);
  }
  return out;
}

/**
 * Skill documents that apply to a file: the union of the always, extension,
 * path and content-hint selections. Absolute paths, deduplicated and sorted.
 */
export async function resolveSkills(targetPath: string, options: ResolveOptions): Promise<string[]> {
  const cwd = options.cwd ?? process.cwd();
  const manifest = options.manifest ?? (await loadManifest(options.skillsDir));
  const files = new SkillFiles(options.skillsDir);
  const content = await readContentSample(path.resolve(cwd, targetPath));

  const patterns = [
    ...manifest.always,
    ...extensionPatterns(manifest, targetPath),
    ...pathPatterns(manifest, targetPath, cwd),
    ...contentPatterns(manifest, content),
  ];

  const resolved = new Set(await files.expand(patterns));
  return [...resolved].sort();
}
