import type { LLMProvider, ToolDefinition, StructuredResponse, ChatTurn } from "./types.js";

/** Extract JSON from an LLM response that may include markdown fences or prose. */
export function extractJSON(raw: string): string {
  const fenceMatch = raw.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (fenceMatch) return fenceMatch[1].trim();

  const jsonMatch = raw.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
  if (jsonMatch) return jsonMatch[1].trim();

  return raw.trim();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Fallback implementation of chatWithTools for providers that don't have
 * native tool-calling support. Augments the prompt with the tool schemas and
 * tries to parse the response. With several tools the model must wrap its
 * choice as {"tool": name, "args": {...}}.
 */
export async function textFallbackChatWithTools(
  provider: LLMProvider,
  systemPrompt: string,
  messages: ChatTurn[],
  tools: ToolDefinition[],
  signal?: AbortSignal,
): Promise<StructuredResponse> {
  const single = tools.length === 1;
  const schemaHint = single
    ? `\n\nRespond with ONLY valid JSON matching this schema (no markdown, no code fences):\n${JSON.stringify(tools[0].parameters, null, 2)}`
    : `\n\nRespond with ONLY valid JSON of the form {"tool": <name>, "args": <object>} (no markdown, no code fences), choosing one of these tools:\n${tools
        .map((t) => `- ${t.name}: ${t.description}\n  args schema: ${JSON.stringify(t.parameters)}`)
        .join("\n")}`;

  const raw = await provider.chat(systemPrompt + schemaHint, messages, signal);

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSON(raw));
  } catch {
    return { type: "text", text: raw };
  }
  if (!isRecord(parsed)) return { type: "text", text: raw };

  if (single) {
    return { type: "tool_call", call: { name: tools[0].name, args: parsed } };
  }
  const name = parsed.tool;
  const args = parsed.args ?? {};
  if (typeof name === "string" && tools.some((t) => t.name === name) && isRecord(args)) {
    return { type: "tool_call", call: { name, args } };
  }
  return { type: "text", text: raw };
}
