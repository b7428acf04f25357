export type OperationKind = "shell_command" | "file_edit" | "file_write";

export type Invocation =
  | {
      kind: "shell_command";
      toolName: string;
      // The full command string.
      rawText: string;
    }
  | {
      kind: "file_edit" | "file_write";
      toolName: string;
      // Target path with separators normalized to "/".
      rawText: string;
      targetPath: string;
    };

export type RuleCategory = "escape" | "read_only" | "mutation" | "destructive" | "protected" | "exception";

export type PatternRule = {
  id: string;
  pattern: RegExp;
  category: RuleCategory;
  reason: string;
  // "command" (default) tests the whole raw text, "verb" the phrase cut out by the domain's verb window.
  target?: "command" | "verb";
  // Escape rules only: "segment" tests the shell segment holding the gated match instead of the whole text.
  scope?: "text" | "segment";
};

export type DomainId =
  | "branch-prefix"
  | "commit-gate"
  | "destructive-command"
  | "kubectl-mutation"
  | "protected-file";

export type EnforcementLevel = "warn" | "block";

export type Verdict = "ALLOW" | "WARN" | "BLOCK";

export type MessageSection = {
  heading: string;
  lines: string[];
};

/**
 * Operator-facing text for one outcome of a domain. Every string may carry
 * `{key}` slots that the renderer fills from the decision context.
 */
export type MessageTemplate = {
  title: string;
  subject: { label: string; value: string };
  sections: MessageSection[];
};

export type DomainMessages = {
  block: MessageTemplate;
  warn: MessageTemplate;
  // Used instead of `warn` when an exception rule downgraded the verdict.
  exception?: MessageTemplate;
};

export type PolicyDomain = {
  id: DomainId;
  appliesTo: (kind: OperationKind) => boolean;
  enforcement: EnforcementLevel;
  // Global regex source; group 1 is the verb phrase. Absent: the whole text is the only subject.
  verbWindow?: RegExp;
  escapeRules: PatternRule[];
  safeRules: PatternRule[];
  gatedRules: PatternRule[];
  exceptionRules: PatternRule[];
  vars: Record<string, string>;
  messages: DomainMessages;
};

export type Decision = {
  domain: DomainId;
  verdict: Verdict;
  rule: PatternRule | null;
  exception: PatternRule | null;
  context: Record<string, string>;
};
