import express from "express";
import { WebSocketServer, WebSocket } from "ws";
import { createServer } from "node:http";
import { MCPClient } from "./mcp-client.js";
import { MarketplaceBrowser, type MarketplaceChatHandle } from "./marketplace.js";
import { createProvider } from "./llm/router.js";
import { LLMTextGenerator } from "./llm/text-generator.js";
import { NegotiationStore } from "./negotiation-store.js";
import { NegotiationEngine } from "./negotiation-engine.js";
import { ControllerLoop } from "./controller.js";
import { parseCommand } from "./commands.js";
import { parseClientMessage } from "./protocol.js";
import { applySettings, loadConfig, parsePersona, parseStrategy, SETTING_PERSONA, SETTING_STRATEGY } from "./config.js";
import { resolveStrategy } from "./escalation.js";
import { createLog } from "./log.js";
import type { ClientMessage, CommandResult, ServerMessage } from "./types.js";

const log = createLog("Server");

const config = loadConfig();

const app = express();
app.use(express.json());

const server = createServer(app);
const wss = new WebSocketServer({ server, path: "/ws" });

const store = new NegotiationStore(config.dbPath);
const mcpClient = new MCPClient();
const llm = createProvider(config.llm);
const generator = new LLMTextGenerator(llm, config.llmTimeoutMs);
const marketplace = new MarketplaceBrowser(mcpClient, llm, { baseUrl: config.marketplaceUrl });
const clients = new Set<WebSocket>();

// --- Broadcast to all connected dashboard clients ---
function broadcast(msg: ServerMessage): void {
  const data = JSON.stringify(msg);
  for (const ws of clients) {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(data);
    }
  }
}

const controller = new ControllerLoop<MarketplaceChatHandle>({
  listingSource: marketplace,
  chatChannel: marketplace,
  store,
  llm,
  config: config.negotiation,
  sendToUI: broadcast,
  // Read settings per session so dashboard changes apply to the next negotiation
  createEngine: () => {
    const effective = applySettings(config.negotiation, store.getAllSettings());
    return new NegotiationEngine(generator, {
      strategy: resolveStrategy(effective.strategy),
      persona: effective.persona,
    });
  },
});

async function runCommandLine(text: string): Promise<CommandResult> {
  const parsed = parseCommand(text);
  if (!parsed.ok) return { ok: false, message: parsed.error };
  return controller.execute(parsed.command);
}

async function negotiationsList() {
  return [...(await store.loadAll()).values()];
}

// --- WebSocket handling ---
wss.on("connection", (ws) => {
  clients.add(ws);
  log("ws", `Client connected (${clients.size} total)`);
  ws.send(JSON.stringify({ type: "status_update", state: controller.getState() } satisfies ServerMessage));

  ws.on("message", async (raw) => {
    const msg = parseClientMessage(String(raw));
    if (!msg) {
      ws.send(JSON.stringify({ type: "error", message: "Malformed message" } satisfies ServerMessage));
      return;
    }
    try {
      await handleClientMessage(msg);
    } catch (err) {
      log("ws", "Error handling message", String(err));
      ws.send(JSON.stringify({ type: "error", message: err instanceof Error ? err.message : String(err) } satisfies ServerMessage));
    }
  });

  ws.on("close", () => {
    clients.delete(ws);
    log("ws", `Client disconnected (${clients.size} total)`);
  });
});

// --- Client message handler ---
async function handleClientMessage(msg: ClientMessage): Promise<void> {
  switch (msg.type) {
    case "command": {
      const result = await runCommandLine(msg.text);
      broadcast({ type: "command_result", result });
      break;
    }

    case "prompt": {
      const result = await controller.run(msg.text);
      broadcast({ type: "command_result", result });
      break;
    }

    case "cancel": {
      const cancelled = controller.cancel();
      if (!cancelled) broadcast({ type: "error", message: "No negotiation is running" });
      break;
    }

    case "list_negotiations": {
      broadcast({ type: "negotiations_update", negotiations: await negotiationsList() });
      break;
    }

    case "get_settings": {
      broadcast({ type: "settings_loaded", settings: store.getAllSettings() });
      break;
    }

    case "save_setting": {
      // Validate before persisting so a bad value never reaches the next session
      if (msg.key === SETTING_STRATEGY) parseStrategy(msg.key, msg.value);
      else if (msg.key === SETTING_PERSONA) parsePersona(msg.key, msg.value);
      store.setSetting(msg.key, msg.value);
      broadcast({ type: "settings_loaded", settings: store.getAllSettings() });
      break;
    }
  }
}

// --- REST endpoints ---
app.get("/api/status", (_req, res) => {
  res.json({ state: controller.getState(), busy: controller.isBusy() });
});

app.get("/api/negotiations", async (_req, res) => {
  res.json(await negotiationsList());
});

app.post("/api/cmd", async (req, res) => {
  const body: unknown = req.body;
  const command = typeof body === "object" && body !== null && "command" in body ? body.command : undefined;
  if (typeof command !== "string") {
    res.status(400).json({ ok: false, message: 'Expected JSON body {"command": "..."}' });
    return;
  }
  const result = await runCommandLine(command);
  broadcast({ type: "command_result", result });
  res.status(result.ok ? 200 : 422).json(result);
});

app.post("/api/cancel", (_req, res) => {
  res.json({ ok: controller.cancel() });
});

// --- Shutdown ---
async function shutdown(signal: string): Promise<void> {
  log("shutdown", `${signal} received`);
  controller.cancel();
  try {
    await mcpClient.disconnect();
  } catch (err) {
    log("shutdown", "Browser disconnect failed", String(err));
  }
  store.close();
  server.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      log("shutdown", "Shutdown failed", String(err));
      process.exit(1);
    });
  });
}

// --- Start server ---
async function main(): Promise<void> {
  await store.init();
  await mcpClient.connect(config.browser, "default");
  server.listen(config.port, () => {
    log("start", `Server running on http://localhost:${config.port}`);
    log("start", `WebSocket available at ws://localhost:${config.port}/ws`);
    log("start", `LLM ${config.llm.provider}/${config.llm.model}, marketplace ${config.marketplaceUrl}`);
  });
}

main().catch((err) => {
  log("fatal", "Startup failed", String(err));
  process.exit(1);
});
