import type { Decision, Invocation, PatternRule, PolicyDomain, Verdict } from "./types.js";

/**
 * What one rule is tested against: the whole raw text, plus the verb phrase
 * when the domain cuts one out (one subject per `kubectl` segment).
 */
type Subject = {
  command: string;
  verb?: string;
};

type RuleMatch = {
  rule: PatternRule;
  match: RegExpMatchArray;
};

type GatedOutcome = { kind: "gated"; hit: RuleMatch } | { kind: "escaped"; rule: PatternRule } | null;

const SEVERITY: Record<Verdict, number> = { ALLOW: 0, WARN: 1, BLOCK: 2 };

function testRule(rule: PatternRule, subject: Subject): RegExpExecArray | null {
  const target = rule.target === "verb" ? subject.verb : subject.command;
  if (target === undefined) return null;
  return rule.pattern.exec(target);
}

function firstMatch(rules: PatternRule[], subject: Subject): RuleMatch | null {
  for (const rule of rules) {
    const match = testRule(rule, subject);
    if (match) return { rule, match };
  }
  return null;
}

const SEGMENT_BREAK = /[;&|\n]/;

// The stretch of shell text around `index` that no `;`, `&`, `|` or newline interrupts.
function segmentAt(text: string, index: number): string {
  let start = index;
  while (start > 0 && !SEGMENT_BREAK.test(text.charAt(start - 1))) start--;
  let end = index;
  while (end < text.length && !SEGMENT_BREAK.test(text.charAt(end))) end++;
  return text.slice(start, end);
}

function globalCopy(re: RegExp): RegExp {
  return new RegExp(re.source, re.flags.includes("g") ? re.flags : `${re.flags}g`);
}

/**
 * The first gated match whose own segment no segment-scoped escape rule
 * excuses. Without such escape rules this is simply the first gated match.
 */
function gatedMatch(domain: PolicyDomain, subject: Subject, scopedEscapes: PatternRule[]): GatedOutcome {
  if (scopedEscapes.length === 0) {
    const hit = firstMatch(domain.gatedRules, subject);
    return hit ? { kind: "gated", hit } : null;
  }

  let escapedBy: PatternRule | null = null;
  for (const rule of domain.gatedRules) {
    const target = rule.target === "verb" ? subject.verb : subject.command;
    if (target === undefined) continue;
    for (const match of target.matchAll(globalCopy(rule.pattern))) {
      const segment = rule.target === "verb" ? subject.command : segmentAt(target, match.index ?? 0);
      const escape = scopedEscapes.find((e) => e.pattern.test(segment));
      if (!escape) return { kind: "gated", hit: { rule, match } };
      escapedBy ??= escape;
    }
  }
  return escapedBy ? { kind: "escaped", rule: escapedBy } : null;
}

function subjectsFor(domain: PolicyDomain, text: string): Subject[] {
  if (!domain.verbWindow) return [{ command: text }];

  return Array.from(text.matchAll(globalCopy(domain.verbWindow)), (m) => ({ command: text, verb: m[1] ?? "" }));
}

// The verb for verb rules, else the rule's first capture, else the segment's verb, else the whole match.
function tokenOf({ rule, match }: RuleMatch, subject: Subject): string {
  if (rule.target === "verb") return match[0].trim();
  return (match[1] ?? subject.verb ?? match[0]).trim();
}

function gatedDecision(
  domain: PolicyDomain,
  subject: Subject,
  gated: RuleMatch,
  baseContext: Record<string, string>,
): Decision {
  const context = {
    ...baseContext,
    token: tokenOf(gated, subject),
    reason: gated.rule.reason,
  };

  const exception = firstMatch(domain.exceptionRules, { command: subject.command });
  if (exception) {
    return {
      domain: domain.id,
      verdict: "WARN",
      rule: gated.rule,
      exception: exception.rule,
      context: { ...context, exception: exception.match[0].trim() },
    };
  }

  return {
    domain: domain.id,
    verdict: domain.enforcement === "block" ? "BLOCK" : "WARN",
    rule: gated.rule,
    exception: null,
    context,
  };
}

/**
 * Classify one invocation against one domain.
 *
 * Escape rules win over everything, safe rules over gated rules, and an
 * exception rule only downgrades a gated match to WARN. Nothing matching
 * means ALLOW. A segment-scoped escape rule excuses only the gated matches
 * in its own shell segment.
 */
export function classify(domain: PolicyDomain, invocation: Invocation): Decision {
  const text = invocation.rawText;
  const baseContext: Record<string, string> = {
    ...domain.vars,
    [invocation.kind === "shell_command" ? "command" : "file"]: text,
  };

  const allow = (rule: PatternRule | null): Decision => ({
    domain: domain.id,
    verdict: "ALLOW",
    rule,
    exception: null,
    context: baseContext,
  });

  if (!domain.appliesTo(invocation.kind)) return allow(null);

  const textEscapes = domain.escapeRules.filter((r) => r.scope !== "segment");
  const scopedEscapes = domain.escapeRules.filter((r) => r.scope === "segment");

  const escape = firstMatch(textEscapes, { command: text });
  if (escape) return allow(escape.rule);

  let escapedRule: PatternRule | null = null;
  let safeRule: PatternRule | null = null;
  let worst: Decision | null = null;

  for (const subject of subjectsFor(domain, text)) {
    const safe = firstMatch(domain.safeRules, subject);
    if (safe) {
      if (!safeRule) safeRule = safe.rule;
      continue;
    }

    const gated = gatedMatch(domain, subject, scopedEscapes);
    if (!gated) continue;
    if (gated.kind === "escaped") {
      escapedRule ??= gated.rule;
      continue;
    }

    const decision = gatedDecision(domain, subject, gated.hit, baseContext);
    if (!worst || SEVERITY[decision.verdict] > SEVERITY[worst.verdict]) worst = decision;
    if (worst.verdict === "BLOCK") break;
  }

  return worst ?? allow(escapedRule ?? safeRule);
}
