// --- Tool Calling Types ---

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>; // JSON Schema object
}

export type StructuredResponse =
  | { type: "tool_call"; call: { name: string; args: Record<string, unknown> } }
  | { type: "text"; text: string };

export type ChatTurn = { role: "user" | "assistant"; content: string };

// --- Provider Interface ---

export interface LLMProvider {
  chat(systemPrompt: string, messages: ChatTurn[], signal?: AbortSignal): Promise<string>;

  /**
   * With a single tool the provider is forced to call it; with several it
   * must call one of them.
   */
  chatWithTools(
    systemPrompt: string,
    messages: ChatTurn[],
    tools: ToolDefinition[],
    signal?: AbortSignal,
  ): Promise<StructuredResponse>;
}

// --- Text generation capability used by the negotiation engine ---

export interface GenerationPrompt {
  system: string;
  user: string;
}

export interface TextGenerator {
  /** Rejects with GenerationTimeoutError or GenerationFailureError. */
  generate(prompt: GenerationPrompt): Promise<string>;
}
