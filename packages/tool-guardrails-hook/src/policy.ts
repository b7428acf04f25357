import path from "node:path";
import fs from "node:fs/promises";
import { z } from "zod";
import { PolicyConfigError } from "./errors.js";
import type { DomainId, EnforcementLevel } from "./types.js";

export type ProtectedGlob = {
  pattern: string;
  reason: string;
};

export type ToolNames = {
  shell: string[];
  edit: string[];
  write: string[];
};

export type GuardrailPolicy = {
  // Host tool names recognized for each operation kind.
  tools: ToolNames;

  disabledDomains: DomainId[];

  // Per-domain override of the built-in enforcement level.
  // Commit and destructive domains warn by default, the others block.
  enforcement: Partial<Record<DomainId, EnforcementLevel>>;

  branchPrefix: {
    requiredPrefix: string;
    // Names that never need the prefix.
    allowedBranches: string[];
  };

  kubectl: {
    // Namespaces whose mutations are a bootstrap exception (warn instead of block).
    bootstrapNamespaces: string[];
  };

  protectedFiles: {
    // Globs matched against the normalized target path. Prefix with **/ to match at any depth.
    allow: string[];
    protect: ProtectedGlob[];
  };
};

export function defaultPolicy(): GuardrailPolicy {
  return {
    tools: {
      shell: ["Bash"],
      edit: ["Edit", "MultiEdit"],
      write: ["Write"],
    },
    disabledDomains: [],
    enforcement: {},
    branchPrefix: {
      requiredPrefix: "mriley/",
      allowedBranches: ["main", "master", "develop", "dev"],
    },
    kubectl: {
      bootstrapNamespaces: ["argocd", "argo-cd", "argocd-system"],
    },
    protectedFiles: {
      allow: [],
      protect: [],
    },
  };
}

const DomainIdSchema = z.enum([
  "branch-prefix",
  "commit-gate",
  "destructive-command",
  "kubectl-mutation",
  "protected-file",
]);

const EnforcementLevelSchema = z.enum(["warn", "block"]);

const NameListSchema = z.array(z.string().min(1));

export const PolicyFileSchema = z.object({
  tools: z
    .object({
      shell: NameListSchema,
      edit: NameListSchema,
      write: NameListSchema,
    })
    .partial()
    .optional(),
  disabledDomains: z.array(DomainIdSchema).optional(),
  enforcement: z
    .object({
      "branch-prefix": EnforcementLevelSchema,
      "commit-gate": EnforcementLevelSchema,
      "destructive-command": EnforcementLevelSchema,
      "kubectl-mutation": EnforcementLevelSchema,
      "protected-file": EnforcementLevelSchema,
    })
    .partial()
    .optional(),
  branchPrefix: z
    .object({
      requiredPrefix: z.string().min(1),
      allowedBranches: NameListSchema,
    })
    .partial()
    .optional(),
  kubectl: z
    .object({
      bootstrapNamespaces: NameListSchema,
    })
    .partial()
    .optional(),
  protectedFiles: z
    .object({
      allow: NameListSchema,
      protect: z.array(
        z.object({
          pattern: z.string().min(1),
          reason: z.string().min(1).default("Protected by workspace policy"),
        }),
      ),
    })
    .partial()
    .optional(),
});

export type PolicyFile = z.infer<typeof PolicyFileSchema>;

export function mergePolicy(base: GuardrailPolicy, fromFile: PolicyFile): GuardrailPolicy {
  return {
    tools: {
      shell: fromFile.tools?.shell ?? base.tools.shell,
      edit: fromFile.tools?.edit ?? base.tools.edit,
      write: fromFile.tools?.write ?? base.tools.write,
    },
    disabledDomains: fromFile.disabledDomains ?? base.disabledDomains,
    enforcement: {
      ...base.enforcement,
      ...fromFile.enforcement,
    },
    branchPrefix: {
      requiredPrefix: fromFile.branchPrefix?.requiredPrefix ?? base.branchPrefix.requiredPrefix,
      allowedBranches: fromFile.branchPrefix?.allowedBranches ?? base.branchPrefix.allowedBranches,
    },
    kubectl: {
      bootstrapNamespaces: fromFile.kubectl?.bootstrapNamespaces ?? base.kubectl.bootstrapNamespaces,
    },
    protectedFiles: {
      allow: fromFile.protectedFiles?.allow ?? base.protectedFiles.allow,
      protect: fromFile.protectedFiles?.protect ?? base.protectedFiles.protect,
    },
  };
}

export function policyCandidatePaths(workspaceRoot: string, env: NodeJS.ProcessEnv): string[] {
  const envPath = env.TOOL_GUARDRAILS_POLICY_PATH?.trim();
  const candidates = [
    path.join(workspaceRoot, ".claude", "tool-guardrails", "policy.json"),
    path.join(workspaceRoot, "tool-guardrails.policy.json"),
  ];
  return envPath ? [path.resolve(workspaceRoot, envPath), ...candidates] : candidates;
}

export async function findPolicyFile(workspaceRoot: string, env: NodeJS.ProcessEnv): Promise<string | null> {
  for (const p of policyCandidatePaths(workspaceRoot, env)) {
    try {
      await fs.access(p);
      return p;
    } catch {
      // not there, try the next one
    }
  }
  return null;
}

export function parsePolicyFile(filePath: string, raw: string): PolicyFile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new PolicyConfigError(filePath, err instanceof Error ? err.message : String(err));
  }

  const result = PolicyFileSchema.safeParse(json);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new PolicyConfigError(filePath, detail);
  }
  return result.data;
}

/**
 * Load the workspace policy merged over the defaults.
 * No policy file means defaults; a file that cannot be used throws PolicyConfigError.
 */
export async function loadPolicy(
  workspaceRoot: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<GuardrailPolicy> {
  const base = defaultPolicy();
  const filePath = await findPolicyFile(workspaceRoot, env);
  if (!filePath) return base;

  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new PolicyConfigError(filePath, err instanceof Error ? err.message : String(err));
  }

  return mergePolicy(base, parsePolicyFile(filePath, raw));
}
