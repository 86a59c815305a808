import Database from "better-sqlite3";
import type { NegotiationRepository } from "./capabilities.js";
import { dirname } from "node:path";
import { mkdirSync } from "node:fs";
import type { Listing, Message, Negotiation, NegotiationStatus } from "./types.js";
import { isRecord } from "./llm/utils.js";

interface NegotiationRow {
  key: string;
  listing: string;
  messages: string;
  current_round: number;
  status: string;
  final_price: number | null;
  started_at: number;
  updated_at: number;
}

const STATUSES: readonly NegotiationStatus[] = ["active", "accepted", "walked_away"];

function parseStatus(value: string): NegotiationStatus {
  const status = STATUSES.find((s) => s === value);
  if (!status) throw new Error(`Unknown negotiation status "${value}"`);
  return status;
}

function parseListing(json: string): Listing {
  const v: unknown = JSON.parse(json);
  if (
    isRecord(v) &&
    typeof v.title === "string" &&
    typeof v.price === "number" &&
    typeof v.sellerId === "string" &&
    typeof v.sourceUrl === "string" &&
    typeof v.channelReference === "string"
  ) {
    return { title: v.title, price: v.price, sellerId: v.sellerId, sourceUrl: v.sourceUrl, channelReference: v.channelReference };
  }
  throw new Error("Malformed listing column");
}

function parseMessages(json: string): Message[] {
  const v: unknown = JSON.parse(json);
  if (!Array.isArray(v)) throw new Error("Malformed messages column");
  return v.map((m: unknown): Message => {
    if (!isRecord(m) || (m.role !== "buyer" && m.role !== "seller") || typeof m.content !== "string" || typeof m.timestamp !== "number") {
      throw new Error("Malformed message in messages column");
    }
    return {
      role: m.role,
      content: m.content,
      timestamp: m.timestamp,
      ...(typeof m.offerPrice === "number" ? { offerPrice: m.offerPrice } : {}),
      ...(typeof m.round === "number" ? { round: m.round } : {}),
      ...(m.undelivered === true ? { undelivered: true } : {}),
    };
  });
}

function fromRow(row: NegotiationRow): Negotiation {
  const negotiation: Negotiation = {
    key: row.key,
    listing: parseListing(row.listing),
    messages: parseMessages(row.messages),
    currentRound: row.current_round,
    status: parseStatus(row.status),
    startedAt: row.started_at,
    updatedAt: row.updated_at,
  };
  if (row.final_price !== null) negotiation.finalPrice = row.final_price;
  return negotiation;
}

/**
 * Durable negotiation records keyed by `sellerId_title`. Each save replaces
 * the whole record in one transaction; with WAL, readers in other processes
 * (dashboard, report script) always see the last committed snapshot.
 */
export class NegotiationStore implements NegotiationRepository {
  private db!: Database.Database;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  async init(): Promise<void> {
    if (this.dbPath !== ":memory:") {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    this.db = new Database(this.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS negotiations (
        key TEXT PRIMARY KEY,
        listing TEXT NOT NULL,
        messages TEXT NOT NULL,
        current_round INTEGER NOT NULL,
        status TEXT NOT NULL,
        final_price REAL,
        started_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      )
    `);
  }

  close(): void {
    this.db.close();
  }

  getSetting(key: string): string | null {
    const row = this.db.prepare<[string], { value: string }>("SELECT value FROM settings WHERE key = ?").get(key);
    return row?.value ?? null;
  }

  getAllSettings(): Record<string, string> {
    const rows = this.db.prepare<[], { key: string; value: string }>("SELECT key, value FROM settings").all();
    const result: Record<string, string> = {};
    for (const row of rows) result[row.key] = row.value;
    return result;
  }

  setSetting(key: string, value: string): void {
    this.db.prepare("INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)").run(key, value);
  }

  async save(negotiation: Negotiation): Promise<void> {
    if ((negotiation.status === "accepted") !== (negotiation.finalPrice !== undefined)) {
      throw new Error(`Refusing to save ${negotiation.key}: finalPrice must be set exactly when accepted`);
    }
    const stmt = this.db.prepare(
      `INSERT OR REPLACE INTO negotiations
       (key, listing, messages, current_round, status, final_price, started_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const write = this.db.transaction((n: Negotiation) => {
      stmt.run(
        n.key,
        JSON.stringify(n.listing),
        JSON.stringify(n.messages),
        n.currentRound,
        n.status,
        n.finalPrice ?? null,
        n.startedAt,
        n.updatedAt,
      );
    });
    write(negotiation);
  }

  async load(key: string): Promise<Negotiation | null> {
    const row = this.db.prepare<[string], NegotiationRow>("SELECT * FROM negotiations WHERE key = ?").get(key);
    return row ? fromRow(row) : null;
  }

  async loadAll(): Promise<Map<string, Negotiation>> {
    const rows = this.db
      .prepare<[], NegotiationRow>("SELECT * FROM negotiations ORDER BY updated_at DESC")
      .all();
    return new Map(rows.map((row) => [row.key, fromRow(row)]));
  }
}
