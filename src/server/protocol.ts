import type { ClientMessage } from "./types.js";
import { isRecord } from "./llm/utils.js";

/** Validate one WebSocket frame from the dashboard. Returns null for anything malformed. */
export function parseClientMessage(raw: string): ClientMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(data)) return null;

  switch (data.type) {
    case "command":
    case "prompt":
      return typeof data.text === "string" ? { type: data.type, text: data.text } : null;
    case "cancel":
    case "list_negotiations":
    case "get_settings":
      return { type: data.type };
    case "save_setting":
      return typeof data.key === "string" && typeof data.value === "string"
        ? { type: "save_setting", key: data.key, value: data.value }
        : null;
    default:
      return null;
  }
}
