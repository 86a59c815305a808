import { NegotiationStore } from "../src/server/negotiation-store.js";
import { describeNegotiation } from "../src/server/controller.js";
import { formatTranscript, summarize } from "../src/server/report.js";
import { formatPrice } from "../src/server/escalation.js";

// Usage: tsx scripts/negotiation-report.ts [--db path] [--transcripts]
const args = process.argv.slice(2);
const dbFlag = args.indexOf("--db");
const dbPath = dbFlag >= 0 && args[dbFlag + 1] ? args[dbFlag + 1] : process.env.DB_PATH || "data/lowballer.db";

const store = new NegotiationStore(dbPath);
await store.init();
const all = [...(await store.loadAll()).values()];
store.close();

if (all.length === 0) {
  console.log(`No negotiations in ${dbPath}.`);
  process.exit(0);
}

const s = summarize(all);
console.log(`Negotiations: ${s.total} (${s.accepted} accepted, ${s.walkedAway} walked away, ${s.active} active)`);
if (s.averageDiscountPct !== null) {
  console.log(`Average discount on deals: ${s.averageDiscountPct}% (saved $${formatPrice(s.totalSaved)} in total)`);
}
console.log("");
for (const n of all) console.log(describeNegotiation(n));

if (args.includes("--transcripts")) {
  for (const n of all) console.log(`\n${formatTranscript(n)}`);
}
