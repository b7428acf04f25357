import { dispatch } from "./dispatch.js";
import { InputParseError, PolicyConfigError } from "./errors.js";
import { parsePayload, type HookPayload } from "./normalize.js";
import { loadPolicy, type GuardrailPolicy } from "./policy.js";
import type { Decision } from "./types.js";

export type HookOptions = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  // Skip policy file lookup and use this policy as is.
  policy?: GuardrailPolicy;
};

export type HookResult = {
  exitCode: 0 | 1 | 2;
  stderr: string;
  decisions: Decision[];
};

export function resolveWorkspaceRoot(payload: HookPayload, env: NodeJS.ProcessEnv, cwd: string): string {
  const fromPayload = payload.cwd?.trim();
  if (fromPayload) return fromPayload;
  const fromEnv = env.CLAUDE_PROJECT_DIR?.trim();
  if (fromEnv) return fromEnv;
  return cwd;
}

function failure(message: string): HookResult {
  return { exitCode: 1, stderr: `${message}\n`, decisions: [] };
}

/**
 * One gate run: raw stdin in, exit code and stderr text out.
 * Input and configuration problems exit 1 and never look like a policy block.
 */
export async function runHook(raw: string, options: HookOptions = {}): Promise<HookResult> {
  const env = options.env ?? process.env;

  let payload: HookPayload;
  try {
    payload = parsePayload(raw);
  } catch (err) {
    if (err instanceof InputParseError) return failure(`Error parsing JSON input: ${err.message}`);
    throw err;
  }

  let policy: GuardrailPolicy;
  if (options.policy) {
    policy = options.policy;
  } else {
    const root = resolveWorkspaceRoot(payload, env, options.cwd ?? process.cwd());
    try {
      policy = await loadPolicy(root, env);
    } catch (err) {
      if (err instanceof PolicyConfigError) return failure(err.message);
      throw err;
    }
  }

  const { exitCode, stderr, decisions } = dispatch(payload, policy);
  return { exitCode, stderr, decisions };
}
