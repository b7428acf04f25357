import type { Decision, MessageTemplate, PolicyDomain } from "./types.js";

export const BANNER = "=".repeat(70);

export type Rendered = {
  // 2 is reserved for "blocked by policy"; 1 means the engine itself failed and is never produced here.
  exitCode: 0 | 2;
  text: string;
};

export function interpolate(template: string, context: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => context[key] ?? whole);
}

export function renderTemplate(template: MessageTemplate, context: Record<string, string>): string {
  const fill = (s: string) => interpolate(s, context);
  const lines = [
    BANNER,
    fill(template.title),
    BANNER,
    "",
    `${template.subject.label}: ${fill(template.subject.value)}`,
  ];

  for (const section of template.sections) {
    lines.push("", `${section.heading}:`);
    for (const line of section.lines) {
      lines.push(line.length > 0 ? `  ${fill(line)}` : "");
    }
  }

  lines.push("", BANNER);
  return `${lines.join("\n")}\n`;
}

function templateFor(decision: Decision, domain: PolicyDomain): MessageTemplate | null {
  switch (decision.verdict) {
    case "ALLOW":
      return null;
    case "WARN":
      return decision.exception && domain.messages.exception ? domain.messages.exception : domain.messages.warn;
    case "BLOCK":
      return domain.messages.block;
  }
}

/**
 * Turn a decision into the exit code and stderr text the host sees.
 * Allowed invocations are silent, whether or not a rule matched.
 */
export function render(decision: Decision, domain: PolicyDomain): Rendered {
  const template = templateFor(decision, domain);
  if (!template) return { exitCode: 0, text: "" };
  return {
    exitCode: decision.verdict === "BLOCK" ? 2 : 0,
    text: renderTemplate(template, decision.context),
  };
}
