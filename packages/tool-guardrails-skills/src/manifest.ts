import path from "node:path";
import fs from "node:fs/promises";
import { z } from "zod";

export const MANIFEST_FILE = "manifest.json";

const PatternListSchema = z.array(z.string().min(1));

/**
 * Which skill documents to load for a file. Every list holds patterns relative
 * to the skills directory: a glob when it contains `*`, else a literal file.
 */
export const ManifestSchema = z.object({
  always: PatternListSchema.default([]),
  // Keyed by extension, with or without the leading dot.
  extensions: z.record(PatternListSchema).default({}),
  // Keyed by a glob over the target path.
  paths: z.record(PatternListSchema).default({}),
  // Keyed by a regex over the start of the target's content.
  content_hints: z.record(PatternListSchema).default({}),
});

export type SkillManifest = z.infer<typeof ManifestSchema>;

export class ManifestError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Invalid skills manifest ${filePath}: ${message}`);
    this.name = "ManifestError";
    this.filePath = filePath;
  }
}

export function emptyManifest(): SkillManifest {
  return { always: [], extensions: {}, paths: {}, content_hints: {} };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function loadManifest(skillsDir: string): Promise<SkillManifest> {
  const filePath = path.join(skillsDir, MANIFEST_FILE);

  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return emptyManifest();
    throw new ManifestError(filePath, err instanceof Error ? err.message : String(err));
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ManifestError(filePath, err instanceof Error ? err.message : String(err));
  }

  const result = ManifestSchema.safeParse(json);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ManifestError(filePath, detail);
  }
  return result.data;
}
