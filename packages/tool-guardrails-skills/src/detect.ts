import path from "node:path";
import fs from "node:fs/promises";

/**
 * One project type recognised from files in the workspace root. Markers
 * ending in "/" are directories. Order in PROJECT_RULES is output order.
 */
export type ProjectRule = {
  type: string;
  skills: string[];
  markers: string[];
  // Which existing markers are reported as key files.
  keyFiles: "first" | "all" | "none";
  // Only counts when this type was already detected.
  requires?: string;
  // Only counts when the file's content matches.
  contains?: { file: string; pattern: RegExp };
};

export const PROJECT_RULES: ProjectRule[] = [
  { type: "go", skills: ["setup-go", "control-flow-check"], markers: ["go.mod"], keyFiles: "first" },
  { type: "python", skills: ["setup-python"], markers: ["pyproject.toml", "requirements.txt"], keyFiles: "first" },
  { type: "nodejs", skills: ["setup-node"], markers: ["package.json"], keyFiles: "first" },
  {
    type: "typescript",
    skills: ["type-safety-audit"],
    markers: ["tsconfig.json"],
    keyFiles: "first",
    requires: "nodejs",
  },
  {
    type: "vendure",
    skills: ["vendure-developing", "vendure-plugin-writing"],
    markers: ["package.json"],
    keyFiles: "none",
    contains: { file: "package.json", pattern: /@vendure/ },
  },
  {
    type: "playwright",
    skills: ["playwright-writing", "playwright-reviewing"],
    markers: ["package.json"],
    keyFiles: "none",
    contains: { file: "package.json", pattern: /@playwright\/test/ },
  },
  {
    type: "mantine",
    skills: ["mantine-developing"],
    markers: ["package.json"],
    keyFiles: "none",
    contains: { file: "package.json", pattern: /@mantine/ },
  },
  { type: "rust", skills: [], markers: ["Cargo.toml"], keyFiles: "first" },
  {
    type: "obs-plugin",
    skills: ["obs-plugin-developing", "obs-cross-compiling"],
    markers: ["CMakeLists.txt"],
    keyFiles: "first",
    contains: { file: "CMakeLists.txt", pattern: /libobs|obs-frontend-api|OBS_PLUGIN/ },
  },
  { type: "helm", skills: ["helm-chart-writing", "gitops-apply"], markers: ["Chart.yaml"], keyFiles: "first" },
  {
    type: "kubernetes",
    skills: ["gitops-apply", "gitops-audit"],
    markers: ["k8s/", "manifests/", "kubernetes/"],
    keyFiles: "all",
  },
];

export type ProjectDetection = {
  types: string[];
  skills: string[];
  keyFiles: string[];
};

async function markerExists(root: string, marker: string): Promise<boolean> {
  const isDir = marker.endsWith("/");
  try {
    const stat = await fs.stat(path.join(root, marker));
    return isDir ? stat.isDirectory() : stat.isFile();
  } catch {
    return false;
  }
}

async function fileMatches(root: string, file: string, pattern: RegExp): Promise<boolean> {
  try {
    return pattern.test(await fs.readFile(path.join(root, file), "utf8"));
  } catch {
    return false;
  }
}

function addUnique(list: string[], items: string[]): void {
  for (const item of items) {
    if (!list.includes(item)) list.push(item);
  }
}

export async function detectProject(root: string, rules: ProjectRule[] = PROJECT_RULES): Promise<ProjectDetection> {
  const found: ProjectDetection = { types: [], skills: [], keyFiles: [] };

  for (const rule of rules) {
    if (rule.requires && !found.types.includes(rule.requires)) continue;

    const present: string[] = [];
    for (const marker of rule.markers) {
      if (await markerExists(root, marker)) present.push(marker);
    }
    if (present.length === 0) continue;

    if (rule.keyFiles === "first") addUnique(found.keyFiles, present.slice(0, 1));
    if (rule.keyFiles === "all") addUnique(found.keyFiles, present);

    if (rule.contains && !(await fileMatches(root, rule.contains.file, rule.contains.pattern))) continue;

    addUnique(found.types, [rule.type]);
    addUnique(found.skills, rule.skills);
  }
  return found;
}

/**
 * Session-start summary, or "" when nothing was recognised.
 */
export function renderDetection(detection: ProjectDetection): string {
  if (detection.types.length === 0) return "";
  const list = (items: string[]) => `[${items.join(", ")}]`;
  return [
    "Project Detection:",
    `- Types: ${list(detection.types)}`,
    `- Suggested skills: ${list(detection.skills)}`,
    `- Key files: ${list(detection.keyFiles)}`,
    "",
  ].join("\n");
}
