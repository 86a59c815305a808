import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { resolve, join } from "node:path";
import { existsSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import type { BrowserConfig } from "./types.js";
import { createLog } from "./log.js";

const log = createLog("MCP");

const BROWSER_DATA_DIR = join(homedir(), ".lowballer", "browser-data");

/**
 * The one live browser page, passed explicitly to whichever component needs
 * it (the marketplace adapter) instead of being shared through module state.
 */
export interface BrowserSession {
  navigate(url: string): Promise<void>;
  snapshot(): Promise<string>;
  click(ref: string): Promise<void>;
  type(ref: string, text: string): Promise<void>;
  pressKey(key: string): Promise<void>;
}

function findMcpBin(): { command: string; baseArgs: string[] } {
  // Prefer the locally installed binary over npx to avoid version mismatches and download delays
  const localBin = resolve("node_modules", ".bin", "playwright-mcp");
  if (existsSync(localBin)) {
    return { command: localBin, baseArgs: [] };
  }
  return { command: "npx", baseArgs: ["@playwright/mcp"] };
}

function envWithDisplay(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [k, v] of Object.entries(process.env)) {
    if (v !== undefined) env[k] = v;
  }
  // Ensure headed mode works on Linux
  env.DISPLAY = process.env.DISPLAY || ":0";
  return env;
}

export class MCPClient implements BrowserSession {
  private client: Client | null = null;
  private transport: StdioClientTransport | null = null;

  async connect(config: BrowserConfig, profile: string): Promise<void> {
    const { command, baseArgs } = findMcpBin();
    const args: string[] = [...baseArgs];

    if (config.mode === "cdp" && config.cdpEndpoint) {
      args.push("--cdp-endpoint", config.cdpEndpoint);
    }
    // Launch mode: persistent profile so the marketplace login survives restarts
    if (config.mode === "launch") {
      const profileDir = join(BROWSER_DATA_DIR, profile);
      mkdirSync(profileDir, { recursive: true });
      args.push("--user-data-dir", profileDir);
      if (config.headless) {
        args.push("--headless");
      }
    }

    log("connect", `Spawning: ${command} ${args.join(" ")}`);

    this.transport = new StdioClientTransport({
      command,
      args,
      stderr: "inherit",
      env: envWithDisplay(),
    });

    this.client = new Client(
      { name: "lowballer", version: "0.1.0" },
    );

    await this.client.connect(this.transport);
    log("connect", "Connected successfully");
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.transport = null;
    }
  }

  private ensureConnected(): Client {
    if (!this.client) {
      throw new Error("MCP client is not connected");
    }
    return this.client;
  }

  async navigate(url: string): Promise<void> {
    const client = this.ensureConnected();
    await client.callTool({ name: "browser_navigate", arguments: { url } });
  }

  async snapshot(): Promise<string> {
    const client = this.ensureConnected();
    const result = await client.callTool({ name: "browser_snapshot", arguments: {} });
    const content: unknown = result.content;
    if (Array.isArray(content)) {
      return content
        .map((block: unknown) =>
          typeof block === "object" && block !== null && "type" in block && block.type === "text" &&
          "text" in block && typeof block.text === "string"
            ? block.text
            : null,
        )
        .filter((text): text is string => text !== null)
        .join("\n");
    }
    return String(content);
  }

  async click(ref: string): Promise<void> {
    const client = this.ensureConnected();
    await client.callTool({ name: "browser_click", arguments: { element: "chat element", ref } });
  }

  async type(ref: string, text: string): Promise<void> {
    const client = this.ensureConnected();
    await client.callTool({ name: "browser_type", arguments: { element: "chat input", ref, text } });
  }

  async pressKey(key: string): Promise<void> {
    const client = this.ensureConnected();
    await client.callTool({ name: "browser_press_key", arguments: { key } });
  }
}
