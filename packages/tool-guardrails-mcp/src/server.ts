import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  PolicyConfigError,
  buildDomains,
  dispatch,
  loadPolicy,
  type Decision,
  type GuardrailPolicy,
  type OperationKind,
  type Verdict,
} from "tool-guardrails-hook";
import { ManifestError, resolveSkills, resolveSkillsDir } from "tool-guardrails-skills";

export const SERVER_NAME = "tool-guardrails";
export const SERVER_VERSION = "0.1.0";

const OPERATION_KINDS: OperationKind[] = ["shell_command", "file_edit", "file_write"];

const SEVERITY: Record<Verdict, number> = { ALLOW: 0, WARN: 1, BLOCK: 2 };

export type GuardrailsServerOptions = {
  // Use this policy instead of loading the workspace policy file.
  policy?: GuardrailPolicy;
  skillsDir?: string;
  // Workspace root; defaults to $TOOL_GUARDRAILS_WORKSPACE_ROOT, then the process cwd.
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

function text(value: unknown) {
  return { content: [{ type: "text" as const, text: typeof value === "string" ? value : JSON.stringify(value, null, 2) }] };
}

function failure(message: string) {
  return { ...text(message), isError: true };
}

function overallVerdict(decisions: Decision[]): Verdict {
  return decisions.reduce<Verdict>((worst, d) => (SEVERITY[d.verdict] > SEVERITY[worst] ? d.verdict : worst), "ALLOW");
}

/**
 * MCP server that lets an agent ask the guardrails before it acts.
 * Nothing here executes the previewed command or touches the target file.
 */
export function createGuardrailsServer(options: GuardrailsServerOptions = {}): McpServer {
  const env = options.env ?? process.env;

  const workspaceRoot = (): string => {
    if (options.cwd) return options.cwd;
    const fromEnv = env.TOOL_GUARDRAILS_WORKSPACE_ROOT?.trim();
    return fromEnv || process.cwd();
  };

  const policyFor = async (): Promise<GuardrailPolicy> => options.policy ?? loadPolicy(workspaceRoot(), env);

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "guardrails_preview_action",
    {
      description:
        "Preview the guardrail verdict for a tool call without running it. Returns the exit code the hook would use (0 allow, 2 block) and the operator message.",
      inputSchema: {
        tool_name: z.string().min(1).describe("Host tool name, e.g. Bash, Edit, Write."),
        command: z.string().optional().describe("Shell command, for shell tools."),
        file_path: z.string().optional().describe("Target file, for edit/write tools."),
      },
    },
    async ({ tool_name, command, file_path }) => {
      let policy: GuardrailPolicy;
      try {
        policy = await policyFor();
      } catch (err) {
        if (err instanceof PolicyConfigError) return failure(err.message);
        throw err;
      }

      const toolInput: Record<string, unknown> = {};
      if (command !== undefined) toolInput.command = command;
      if (file_path !== undefined) toolInput.file_path = file_path;

      const res = dispatch({ tool_name, tool_input: toolInput }, policy);
      return text({
        exitCode: res.exitCode,
        verdict: overallVerdict(res.decisions),
        decisions: res.decisions.map((d) => ({
          domain: d.domain,
          verdict: d.verdict,
          rule: d.rule?.id ?? null,
          token: d.context.token ?? null,
        })),
        message: res.stderr,
      });
    },
  );

  server.registerTool(
    "guardrails_list_domains",
    {
      description: "List the policy domains in dispatch order with their enforcement level and rule counts.",
      inputSchema: {},
    },
    async () => {
      let policy: GuardrailPolicy;
      try {
        policy = await policyFor();
      } catch (err) {
        if (err instanceof PolicyConfigError) return failure(err.message);
        throw err;
      }

      const domains = buildDomains(policy).map((d) => ({
        id: d.id,
        enforcement: d.enforcement,
        enabled: !policy.disabledDomains.includes(d.id),
        operationKinds: OPERATION_KINDS.filter((kind) => d.appliesTo(kind)),
        rules: {
          escape: d.escapeRules.length,
          safe: d.safeRules.length,
          gated: d.gatedRules.length,
          exception: d.exceptionRules.length,
        },
      }));
      return text({ domains });
    },
  );

  server.registerTool(
    "guardrails_resolve_skills",
    {
      description: "Resolve the skill documents that apply to a file (absolute paths, sorted).",
      inputSchema: {
        file_path: z.string().min(1),
      },
    },
    async ({ file_path }) => {
      const root = workspaceRoot();
      const skillsDir = options.skillsDir ?? resolveSkillsDir(undefined, env, root);
      try {
        return text({ skills: await resolveSkills(file_path, { skillsDir, cwd: root }) });
      } catch (err) {
        if (err instanceof ManifestError) return failure(err.message);
        throw err;
      }
    },
  );

  return server;
}
