import { z } from "zod";
import { InputParseError } from "./errors.js";
import type { ToolNames } from "./policy.js";
import type { Invocation } from "./types.js";

/**
 * Tool-use payload as the host sends it on stdin. Hosts differ in key casing,
 * so both spellings are accepted; unknown keys are kept.
 */
const HookPayloadSchema = z
  .object({
    tool_name: z.string().optional(),
    toolName: z.string().optional(),
    tool_input: z.record(z.unknown()).optional(),
    toolInput: z.record(z.unknown()).optional(),
    cwd: z.string().optional(),
  })
  .passthrough();

export type HookPayload = z.infer<typeof HookPayloadSchema>;

const PATH_KEYS = ["file_path", "filePath", "path"];

export function parsePayload(raw: string): HookPayload {
  const text = raw.trim();
  if (text.length === 0) {
    throw new InputParseError("empty payload");
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new InputParseError(err instanceof Error ? err.message : String(err));
  }

  const result = HookPayloadSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new InputParseError(`${where}${issue?.message ?? "payload must be a JSON object"}`);
  }
  return result.data;
}

export function payloadToolName(payload: HookPayload): string {
  return payload.tool_name ?? payload.toolName ?? "";
}

function payloadToolInput(payload: HookPayload): Record<string, unknown> {
  return payload.tool_input ?? payload.toolInput ?? {};
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

function extractPath(input: Record<string, unknown>): string | null {
  for (const key of PATH_KEYS) {
    const val = nonEmptyString(input[key]);
    if (val) return val;
  }
  return null;
}

/**
 * Map a payload onto an invocation the policy domains understand.
 * Returns null for tool names or inputs that no domain gates.
 */
export function normalizeInvocation(payload: HookPayload, tools: ToolNames): Invocation | null {
  const toolName = payloadToolName(payload);
  if (!toolName) return null;
  const input = payloadToolInput(payload);

  if (tools.shell.includes(toolName)) {
    const command = nonEmptyString(input.command);
    return command ? { kind: "shell_command", toolName, rawText: command } : null;
  }

  const isEdit = tools.edit.includes(toolName);
  const isWrite = tools.write.includes(toolName);
  if (isEdit || isWrite) {
    const filePath = extractPath(input);
    if (!filePath) return null;
    return {
      kind: isWrite ? "file_write" : "file_edit",
      toolName,
      rawText: filePath.replace(/\\/g, "/"),
      targetPath: filePath,
    };
  }

  return null;
}
