import { minimatch } from "minimatch";
import type { GuardrailPolicy } from "./policy.js";
import type {
  DomainId,
  EnforcementLevel,
  OperationKind,
  PatternRule,
  PolicyDomain,
  RuleCategory,
} from "./types.js";

/**
 * Static rule tables for the five policy domains.
 *
 * Rules are plain records consumed by the one classification routine in
 * classify.ts. Order inside each list is significant: the first match of a
 * category wins. Patterns are case-insensitive and never global, except the
 * branch-prefix ones: git branch names are case-sensitive.
 */

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function rule(
  id: string,
  category: RuleCategory,
  source: string,
  reason: string,
  target: "command" | "verb" = "command",
): PatternRule {
  return { id, category, pattern: new RegExp(source, "i"), reason, target };
}

function caseSensitive(r: PatternRule): PatternRule {
  return { ...r, pattern: new RegExp(r.pattern.source) };
}

function segmentScoped(r: PatternRule): PatternRule {
  return { ...r, scope: "segment" };
}

function isShell(kind: OperationKind): boolean {
  switch (kind) {
    case "shell_command":
      return true;
    case "file_edit":
    case "file_write":
      return false;
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

function isFileChange(kind: OperationKind): boolean {
  return !isShell(kind);
}

function levelFor(policy: GuardrailPolicy, id: DomainId, fallbackLevel: EnforcementLevel): EnforcementLevel {
  return policy.enforcement[id] ?? fallbackLevel;
}

// ---------------------------------------------------------------------------
// branch-prefix
// ---------------------------------------------------------------------------

const BRANCH_NAME = "[^\\s;&|]+";

export function branchPrefixDomain(policy: GuardrailPolicy): PolicyDomain {
  const { requiredPrefix, allowedBranches } = policy.branchPrefix;
  const prefix = escapeRegExp(requiredPrefix);

  const escapeRules: PatternRule[] = [];
  if (allowedBranches.length > 0) {
    const names = allowedBranches.map(escapeRegExp).join("|");
    escapeRules.push(
      rule(
        "branch.allow-listed",
        "escape",
        `\\bgit\\s+(?:checkout\\s+-b|switch\\s+-c|branch)\\s+(?:${names})(?=$|[\\s;&|])`,
        "Branch name is allow-listed",
      ),
    );
  }

  return {
    id: "branch-prefix",
    appliesTo: isShell,
    enforcement: levelFor(policy, "branch-prefix", "block"),
    escapeRules: escapeRules.map(caseSensitive),
    safeRules: [],
    gatedRules: [
      rule(
        "branch.checkout-b",
        "mutation",
        `\\bgit\\s+checkout\\s+-b\\s+(?!${prefix})(${BRANCH_NAME})`,
        `Branch name must start with '${requiredPrefix}'`,
      ),
      rule(
        "branch.switch-c",
        "mutation",
        `\\bgit\\s+switch\\s+-c\\s+(?!${prefix})(${BRANCH_NAME})`,
        `Branch name must start with '${requiredPrefix}'`,
      ),
      // `git branch -d x`, `git branch --list` and friends take a flag first and create nothing.
      rule(
        "branch.branch",
        "mutation",
        `\\bgit\\s+branch\\s+(?!-|${prefix})(${BRANCH_NAME})`,
        `Branch name must start with '${requiredPrefix}'`,
      ),
    ].map(caseSensitive),
    exceptionRules: [],
    vars: { prefix: requiredPrefix },
    messages: {
      block: {
        title: "BRANCH CREATION BLOCKED - PREFIX REQUIRED",
        subject: { label: "Branch", value: "{token}" },
        sections: [
          {
            heading: "Reason",
            lines: ["{reason}.", "Expected format: {prefix}<type>/<description>"],
          },
          {
            heading: "Remediation",
            lines: ["1. Recreate the branch with the required prefix", "2. Or use the manage-branch skill: /manage-branch"],
          },
          {
            heading: "Examples",
            lines: ["{prefix}feat/new-feature", "{prefix}fix/bug-description", "{prefix}refactor/cleanup"],
          },
        ],
      },
      warn: {
        title: "BRANCH PREFIX WARNING",
        subject: { label: "Branch", value: "{token}" },
        sections: [
          {
            heading: "Reason",
            lines: ["{reason}.", "Expected format: {prefix}<type>/<description>"],
          },
          {
            heading: "Remediation",
            lines: ["Rename it before pushing: git branch -m {token} {prefix}<type>/<description>"],
          },
          {
            heading: "Examples",
            lines: ["{prefix}feat/new-feature", "{prefix}fix/bug-description"],
          },
        ],
      },
    },
  };
}

// ---------------------------------------------------------------------------
// commit-gate
// ---------------------------------------------------------------------------

export function commitGateDomain(policy: GuardrailPolicy): PolicyDomain {
  return {
    id: "commit-gate",
    appliesTo: isShell,
    enforcement: levelFor(policy, "commit-gate", "warn"),
    escapeRules: [
      rule("commit.dry-run", "escape", "--dry-run\\b", "Dry runs create no commit"),
      rule("commit.no-commit", "escape", "--no-commit\\b", "Merge without committing"),
    ],
    safeRules: [
      rule("commit.log", "read_only", "\\bgit\\s+log\\b.*commit", "Viewing commits"),
      rule("commit.show", "read_only", "\\bgit\\s+show\\b.*commit", "Showing commits"),
      rule("commit.rev-parse", "read_only", "\\bgit\\s+rev-parse\\b", "Parsing commit refs"),
    ],
    gatedRules: [
      rule("commit.direct", "mutation", "\\b(git\\s+commit)\\b", "Direct git commit skips the safe-commit checks"),
      rule("commit.chained", "mutation", "\\bgit\\s+.*\\b(commit)\\b", "Command runs a git commit"),
    ],
    exceptionRules: [],
    vars: {},
    messages: {
      block: {
        title: "DIRECT COMMIT BLOCKED - USE SAFE-COMMIT",
        subject: { label: "Command", value: "{command}" },
        sections: [
          {
            heading: "Reason",
            lines: ["{reason}.", "Commits must pass the security scan, quality check, and tests first."],
          },
          {
            heading: "Remediation",
            lines: ["1. Use the safe-commit skill for commits", "2. Let it stage, verify and commit the changes"],
          },
          {
            heading: "Examples",
            lines: ["'Use safe-commit skill to commit these changes'", "git commit --dry-run (allowed)"],
          },
        ],
      },
      warn: {
        title: "REMINDER: USE SAFE-COMMIT FOR COMMITS",
        subject: { label: "Command", value: "{command}" },
        sections: [
          {
            heading: "Reason",
            lines: ["{reason}.", "The safe-commit skill runs the security scan, quality check, and tests."],
          },
          {
            heading: "Remediation",
            lines: ["Make sure this commit was made through the safe-commit skill."],
          },
          {
            heading: "Examples",
            lines: ["'Use safe-commit skill to commit these changes'"],
          },
        ],
      },
    },
  };
}

// ---------------------------------------------------------------------------
// destructive-command
// ---------------------------------------------------------------------------

const DESTRUCTIVE_PATTERNS: Array<[id: string, source: string, reason: string]> = [
  ["git.reset-hard", "\\bgit\\s+reset\\s+--hard\\b", "git reset --hard destroys uncommitted changes"],
  ["git.clean", "\\bgit\\s+clean\\s+-[fd]+\\b", "git clean permanently deletes untracked files"],
  ["git.checkout-discard", "\\bgit\\s+checkout\\s+--\\s+\\.", "git checkout -- . discards all changes"],
  ["git.restore-all", "\\bgit\\s+restore\\s+\\.", "git restore . discards all changes"],
  ["git.push-force", "\\bgit\\s+push\\s+.*--force\\b", "git push --force can overwrite remote history"],
  ["git.push-f", "\\bgit\\s+push\\s+.*-f\\b", "git push -f can overwrite remote history"],
  ["fs.rm-rf", "\\brm\\s+-rf\\b", "rm -rf permanently deletes files"],
  ["fs.rm-fr", "\\brm\\s+-fr\\b", "rm -fr permanently deletes files"],
  ["fs.rm-r-f", "\\brm\\s+.*-r.*-f\\b", "rm with -r and -f permanently deletes files"],
  ["docker.system-prune", "\\bdocker\\s+system\\s+prune\\b", "docker system prune removes unused data"],
  ["docker.volume-prune", "\\bdocker\\s+volume\\s+prune\\b", "docker volume prune removes volumes"],
  ["kubectl.delete", "\\bkubectl\\s+delete\\b", "kubectl delete removes resources"],
];

export function destructiveCommandDomain(policy: GuardrailPolicy): PolicyDomain {
  return {
    id: "destructive-command",
    appliesTo: isShell,
    enforcement: levelFor(policy, "destructive-command", "warn"),
    // Scoped so a dry-run flag on another command in the chain does not excuse this one.
    escapeRules: [
      rule("destroy.dry-run", "escape", "--dry-run\\b", "Dry run"),
      rule("destroy.dry-run-short", "escape", "(?:^|\\s)-n(?=\\s|$)", "Dry run (short flag)"),
    ].map(segmentScoped),
    safeRules: [],
    gatedRules: DESTRUCTIVE_PATTERNS.map(([id, source, reason]) => rule(id, "destructive", source, reason)),
    exceptionRules: [],
    vars: {},
    messages: {
      block: {
        title: "DESTRUCTIVE COMMAND BLOCKED",
        subject: { label: "Command", value: "{command}" },
        sections: [
          { heading: "Reason", lines: ["{reason}."] },
          {
            heading: "Remediation",
            lines: [
              "1. Use the safe-destroy skill to confirm what will be lost",
              "2. Preview with a dry run where the tool supports one",
              "3. Run the command once the operator has confirmed",
            ],
          },
          {
            heading: "Examples",
            lines: ["git clean -n", "kubectl delete pod nginx --dry-run=server"],
          },
        ],
      },
      warn: {
        title: "DESTRUCTIVE COMMAND WARNING",
        subject: { label: "Command", value: "{command}" },
        sections: [
          { heading: "Reason", lines: ["{reason}."] },
          {
            heading: "Remediation",
            lines: ["Ensure the safe-destroy skill was used for confirmation."],
          },
          {
            heading: "Examples",
            lines: ["git clean -n", "kubectl delete pod nginx --dry-run=server"],
          },
        ],
      },
    },
  };
}

// ---------------------------------------------------------------------------
// kubectl-mutation
// ---------------------------------------------------------------------------

// Global flags that take their value as the next token (`-n prod`), so the value is not read as the verb.
const KUBECTL_VALUE_FLAGS = [
  "-n",
  "-s",
  "--namespace",
  "--context",
  "--cluster",
  "--user",
  "--kubeconfig",
  "--server",
  "--token",
  "--as",
  "--as-group",
  "--request-timeout",
  "--cache-dir",
];

// A flag value never starts with "-", and a bare flag has one reading, so each token parses one way.
const KUBECTL_FLAG = `(?:${KUBECTL_VALUE_FLAGS.map(escapeRegExp).join("|")})\\s+[^\\s|;&-][^\\s|;&]*|-[^\\s|;&]+`;

// kubectl at the start, after a pipe/separator or on a new line, its flags, then a verb phrase of up to two bare words.
const KUBECTL_VERB_WINDOW = new RegExp(
  `(?:^|[|;&\\n]\\s*)kubectl(?:\\s+(?:${KUBECTL_FLAG}))*\\s+([a-z][a-z-]*(?:[ \\t]+[a-z][a-z-]*)?)`,
  "gi",
);

const KUBECTL_READ_ONLY_VERBS = [
  "get",
  "describe",
  "logs",
  "explain",
  "diff",
  "api-resources",
  "api-versions",
  "version",
  "cluster-info",
  "top",
  "wait",
];

const KUBECTL_MUTATION_VERBS = [
  "apply",
  "create",
  "edit",
  "patch",
  "delete",
  "replace",
  "scale",
  "autoscale",
  "set",
  "label",
  "annotate",
  "expose",
  "run",
  "drain",
  "cordon",
  "uncordon",
  "taint",
  "attach",
  "exec",
  "cp",
  "port-forward",
];

const END_OF_WORD = "(?![\\w-])";

export function kubectlMutationDomain(policy: GuardrailPolicy): PolicyDomain {
  const exceptionRules: PatternRule[] = [];
  const namespaces = policy.kubectl.bootstrapNamespaces;
  if (namespaces.length > 0) {
    const ns = namespaces.map(escapeRegExp).join("|");
    exceptionRules.push(
      rule("bootstrap.namespace-short", "exception", `(?:^|\\s)-n\\s*(?:${ns})${END_OF_WORD}`, "Targets a bootstrap namespace"),
      rule("bootstrap.namespace-long", "exception", `--namespace[=\\s]+(?:${ns})${END_OF_WORD}`, "Targets a bootstrap namespace"),
    );
  }
  exceptionRules.push(
    rule("bootstrap.application-crd", "exception", "applications?\\.argoproj\\.io", "ArgoCD Application CRD"),
    rule("bootstrap.applicationset-crd", "exception", "applicationsets?\\.argoproj\\.io", "ArgoCD ApplicationSet CRD"),
    rule("bootstrap.appproject-crd", "exception", "appprojects?\\.argoproj\\.io", "ArgoCD AppProject CRD"),
    rule("bootstrap.argocd-path", "exception", "argocd/", "Manifest path under argocd/"),
  );

  return {
    id: "kubectl-mutation",
    appliesTo: isShell,
    enforcement: levelFor(policy, "kubectl-mutation", "block"),
    verbWindow: KUBECTL_VERB_WINDOW,
    escapeRules: [rule("kubectl.dry-run", "escape", "--dry-run(?:=(?:client|server|none))?\\b", "Dry run")],
    safeRules: [
      rule(
        "kubectl.read-only",
        "read_only",
        `^(?:${KUBECTL_READ_ONLY_VERBS.join("|")})${END_OF_WORD}`,
        "Read-only kubectl verb",
        "verb",
      ),
      rule("kubectl.auth-can-i", "read_only", `^auth\\s+can-i${END_OF_WORD}`, "Permission check", "verb"),
      rule("kubectl.config-view", "read_only", `^config\\s+view${END_OF_WORD}`, "View config only", "verb"),
      rule(
        "kubectl.rollout-read",
        "read_only",
        `^rollout\\s+(?:status|history)${END_OF_WORD}`,
        "Rollout status or history",
        "verb",
      ),
    ],
    gatedRules: [
      ...KUBECTL_MUTATION_VERBS.map((verb) =>
        rule(`kubectl.${verb}`, "mutation", `^${verb}${END_OF_WORD}`, `kubectl ${verb} changes cluster state`, "verb"),
      ),
      rule(
        "kubectl.rollout-write",
        "mutation",
        `^rollout\\s+(?:restart|undo|pause|resume)${END_OF_WORD}`,
        "kubectl rollout changes cluster state",
        "verb",
      ),
      rule("kubectl.force", "mutation", "\\bkubectl\\s+.*--force\\b", "Forced kubectl operation"),
      rule("kubectl.grace-period-zero", "mutation", "\\bkubectl\\s+.*--grace-period=0\\b", "Immediate deletion"),
      rule("kubectl.now", "mutation", "\\bkubectl\\s+.*--now\\b", "Immediate kubectl operation"),
    ],
    exceptionRules,
    vars: {},
    messages: {
      block: {
        title: "KUBECTL MUTATION BLOCKED - GITOPS REQUIRED",
        subject: { label: "Command", value: "kubectl {token}" },
        sections: [
          {
            heading: "Reason",
            lines: [
              "Direct kubectl mutations are FORBIDDEN in this environment.",
              "All cluster changes MUST go through GitOps workflow.",
              "",
              "WHY: GitOps ensures:",
              "  - Auditable change history (git log)",
              "  - Peer review (pull requests)",
              "  - Rollback capability (git revert)",
              "  - Disaster recovery (git clone)",
              "  - Infrastructure as Code (declarative manifests)",
            ],
          },
          {
            heading: "Remediation",
            lines: [
              "1. Use the gitops-apply skill",
              "2. Update manifest in git repository",
              "3. Commit changes with conventional format",
              "4. ArgoCD/Flux will sync to cluster",
              "",
              "To proceed with GitOps workflow, say:",
              "  'Use gitops-apply skill to make this change'",
            ],
          },
          {
            heading: "Examples",
            lines: [
              "READ-ONLY OPERATIONS (allowed):",
              "  kubectl get, describe, logs, explain, diff, top, etc.",
              "",
              "DRY-RUN OPERATIONS (allowed):",
              "  kubectl apply --dry-run=client",
              "  kubectl create --dry-run=server",
            ],
          },
        ],
      },
      warn: {
        title: "KUBECTL MUTATION WARNING - GITOPS EXPECTED",
        subject: { label: "Command", value: "kubectl {token}" },
        sections: [
          {
            heading: "Reason",
            lines: ["{reason}.", "Cluster changes are expected to go through the GitOps workflow."],
          },
          {
            heading: "Remediation",
            lines: ["Move this change into a manifest and let ArgoCD/Flux sync it."],
          },
          {
            heading: "Examples",
            lines: ["kubectl apply --dry-run=client", "kubectl diff -f manifest.yaml"],
          },
        ],
      },
      exception: {
        title: "ARGOCD BOOTSTRAP DETECTED - OVERRIDE AVAILABLE",
        subject: { label: "Command", value: "kubectl {token}" },
        sections: [
          {
            heading: "Reason",
            lines: ["Direct kubectl mutations normally require the GitOps workflow."],
          },
          {
            heading: "Exception",
            lines: ["ArgoCD cannot sync itself - bootstrap exception applies.", "Matched: {exception}"],
          },
          {
            heading: "Remediation",
            lines: [
              "QUESTION: Is this a one-off or needed for future deployments?",
              "",
              "ONE-OFF (debugging, temporary, won't repeat):",
              "  Say \"one-off bootstrap\" to proceed with kubectl directly",
              "",
              "RECOVERY-NEEDED (new clusters, disaster recovery, repeatable):",
              "  1. Add command to scripts/bootstrap.sh (initial setup)",
              "  2. Add command to scripts/bootstrap-idempotent.sh (re-runnable)",
              "  3. Commit the bootstrap script changes",
              "  4. Then say \"bootstrap updated\" to proceed with kubectl",
            ],
          },
          {
            heading: "Examples",
            lines: [
              "kubectl apply -f argocd/install.yaml || true",
              "kubectl wait --for=condition=available deployment/argocd-server \\",
              "  -n argocd --timeout=300s",
            ],
          },
        ],
      },
    },
  };
}

// ---------------------------------------------------------------------------
// protected-file
// ---------------------------------------------------------------------------

const PROTECTED_PATTERNS: Array<[id: string, source: string, reason: string]> = [
  ["env.any", "\\.env(?:$|\\.)", "Environment files contain secrets"],
  ["env.local", "\\.env\\.local$", "Local environment files contain secrets"],
  ["env.variant", "\\.env\\..*$", "Environment files contain secrets"],
  ["lock.npm", "package-lock\\.json$", "Lock file is auto-generated"],
  ["lock.yarn", "yarn\\.lock$", "Lock file is auto-generated"],
  ["lock.pnpm", "pnpm-lock\\.yaml$", "Lock file is auto-generated"],
  ["lock.cargo", "Cargo\\.lock$", "Lock file is auto-generated"],
  ["lock.poetry", "poetry\\.lock$", "Lock file is auto-generated"],
  ["lock.go", "go\\.sum$", "Lock file is auto-generated"],
  ["lock.gemfile", "Gemfile\\.lock$", "Lock file is auto-generated"],
  ["git.internals", "\\.git/", "Git internal files should not be edited"],
  ["git.dir", "\\.git$", "Git internal files should not be edited"],
  ["ssh.dir", "\\.ssh/", "SSH keys are sensitive"],
  ["ssh.id-rsa", "id_rsa", "SSH private keys are sensitive"],
  ["cert.pem", "\\.pem$", "Certificate files are sensitive"],
  ["cert.key", "\\.key$", "Key files are sensitive"],
];

const TEMPLATE_ENV_FILES = ["example", "sample", "template"];

function globRule(id: string, category: RuleCategory, glob: string, reason: string): PatternRule | null {
  const re = minimatch.makeRe(glob, { dot: true, nocase: true });
  if (!re) return null;
  return { id, category, pattern: new RegExp(re.source, "i"), reason, target: "command" };
}

export function protectedFileDomain(policy: GuardrailPolicy): PolicyDomain {
  const escapeRules: PatternRule[] = TEMPLATE_ENV_FILES.map((suffix) =>
    rule(`env.${suffix}`, "escape", `\\.env\\.${suffix}$`, "Template env files hold no secrets"),
  );
  policy.protectedFiles.allow.forEach((glob, i) => {
    const r = globRule(`policy.allow.${i}`, "escape", glob, `Allowed by policy glob ${glob}`);
    if (r) escapeRules.push(r);
  });

  const gatedRules = PROTECTED_PATTERNS.map(([id, source, reason]) => rule(id, "protected", source, reason));
  policy.protectedFiles.protect.forEach((entry, i) => {
    const r = globRule(`policy.protect.${i}`, "protected", entry.pattern, entry.reason);
    if (r) gatedRules.push(r);
  });

  return {
    id: "protected-file",
    appliesTo: isFileChange,
    enforcement: levelFor(policy, "protected-file", "block"),
    escapeRules,
    safeRules: [],
    gatedRules,
    exceptionRules: [],
    vars: {},
    messages: {
      block: {
        title: "PROTECTED FILE MODIFICATION BLOCKED",
        subject: { label: "File", value: "{file}" },
        sections: [
          { heading: "Reason", lines: ["{reason}."] },
          {
            heading: "Remediation",
            lines: [
              "If you need to edit this file:",
              "  1. Consider if it's truly necessary",
              "  2. Edit manually outside of the agent session",
              "  3. Or request explicit override",
            ],
          },
          {
            heading: "Examples",
            lines: ["Template files stay editable: .env.example, .env.sample, .env.template"],
          },
        ],
      },
      warn: {
        title: "PROTECTED FILE MODIFICATION WARNING",
        subject: { label: "File", value: "{file}" },
        sections: [
          { heading: "Reason", lines: ["{reason}."] },
          {
            heading: "Remediation",
            lines: ["Double-check this change; the file is normally protected."],
          },
          {
            heading: "Examples",
            lines: ["Template files stay editable: .env.example, .env.sample, .env.template"],
          },
        ],
      },
    },
  };
}

/**
 * All domains in dispatch order, built fresh from the policy.
 */
export function buildDomains(policy: GuardrailPolicy): PolicyDomain[] {
  return [
    branchPrefixDomain(policy),
    commitGateDomain(policy),
    destructiveCommandDomain(policy),
    kubectlMutationDomain(policy),
    protectedFileDomain(policy),
  ];
}
