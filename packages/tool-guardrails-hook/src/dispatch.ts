import { classify } from "./classify.js";
import { buildDomains } from "./domains.js";
import { normalizeInvocation, type HookPayload } from "./normalize.js";
import type { GuardrailPolicy } from "./policy.js";
import { render } from "./render.js";
import type { Decision, Invocation, PolicyDomain } from "./types.js";

export type DispatchResult = {
  exitCode: 0 | 2;
  stderr: string;
  invocation: Invocation | null;
  // One entry per domain that ran, in order; stops after the first BLOCK.
  decisions: Decision[];
};

export function applicableDomains(policy: GuardrailPolicy, invocation: Invocation): PolicyDomain[] {
  return buildDomains(policy).filter(
    (domain) => domain.appliesTo(invocation.kind) && !policy.disabledDomains.includes(domain.id),
  );
}

/**
 * Run every applicable domain over one tool-use payload.
 * Warnings accumulate; the first BLOCK ends the run with exit code 2.
 */
export function dispatch(payload: HookPayload, policy: GuardrailPolicy): DispatchResult {
  const invocation = normalizeInvocation(payload, policy.tools);
  if (!invocation) {
    return { exitCode: 0, stderr: "", invocation: null, decisions: [] };
  }

  const decisions: Decision[] = [];
  let stderr = "";

  for (const domain of applicableDomains(policy, invocation)) {
    const decision = classify(domain, invocation);
    decisions.push(decision);

    const { exitCode, text } = render(decision, domain);
    stderr += text;
    if (exitCode === 2) {
      return { exitCode, stderr, invocation, decisions };
    }
  }

  return { exitCode: 0, stderr, invocation, decisions };
}
