import type { LLMConfig } from "../types.js";
import type { LLMProvider, ToolDefinition, StructuredResponse, ChatTurn } from "./types.js";

export class AnthropicProvider implements LLMProvider {
  private apiKey: string;
  private model: string;
  private temperature: number;
  private maxTokens: number;
  private baseUrl: string;

  constructor(config: LLMConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
    this.baseUrl = config.baseUrl ?? "https://api.anthropic.com";
  }

  async chat(systemPrompt: string, messages: ChatTurn[], signal?: AbortSignal): Promise<string> {
    const response = await this.callAPI(systemPrompt, messages, undefined, signal);
    const data = (await response.json()) as {
      content?: Array<{ type: string; text?: string }>;
    };
    const textBlock = data.content?.find((block) => block.type === "text");
    if (!textBlock?.text) {
      throw new Error("No text content in Anthropic response");
    }
    return textBlock.text;
  }

  async chatWithTools(
    systemPrompt: string,
    messages: ChatTurn[],
    tools: ToolDefinition[],
    signal?: AbortSignal,
  ): Promise<StructuredResponse> {
    const anthropicTools = tools.map((t) => ({
      name: t.name,
      description: t.description,
      input_schema: t.parameters,
    }));

    const toolChoice = tools.length === 1
      ? { type: "tool" as const, name: tools[0].name }
      : { type: "any" as const };

    const response = await this.callAPI(systemPrompt, messages, {
      tools: anthropicTools,
      tool_choice: toolChoice,
    }, signal);

    const data = (await response.json()) as {
      content?: Array<{ type: string; text?: string; name?: string; input?: Record<string, unknown> }>;
    };

    const toolBlock = data.content?.find((block) => block.type === "tool_use");
    if (toolBlock?.name && toolBlock.input) {
      return { type: "tool_call", call: { name: toolBlock.name, args: toolBlock.input } };
    }

    const textBlock = data.content?.find((block) => block.type === "text");
    return { type: "text", text: textBlock?.text ?? "" };
  }

  private async callAPI(
    systemPrompt: string,
    messages: ChatTurn[],
    extra?: { tools?: unknown[]; tool_choice?: unknown },
    signal?: AbortSignal,
  ): Promise<Response> {
    const body: Record<string, unknown> = {
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      system: systemPrompt,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
    };
    if (extra?.tools) body.tools = extra.tools;
    if (extra?.tool_choice) body.tool_choice = extra.tool_choice;

    const response = await fetch(`${this.baseUrl}/v1/messages`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new Error(`Anthropic API error ${response.status}: ${errorBody}`);
    }

    return response;
  }
}
