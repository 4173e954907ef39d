/**
 * Append one hand-entered record to the ledger.
 * Usage: npx tsx src/scripts/log-record.ts '<json>' [--allow-duplicate]
 * Example:
 *   npx tsx src/scripts/log-record.ts '{"date":"2025-12-11","game_id":"BOS@MIL",
 *     "pick_type":"spread_big_edge","edge_points":4.5,"model_line":-7.1,"market_line":-2.6,
 *     "result_correct":true,"variance_flag":"normal","injury_flag":"major","notes":"starter out"}'
 */
import { CsvLedgerStore } from '../ledger/csv-store.js';
import { logManualRecord } from '../pipeline/manual-entry.js';
import { ValidationError } from '../errors.js';
import { config } from '../config.js';

const [json, ...flags] = process.argv.slice(2);
if (!json) {
  console.error("Usage: log-record '<json>' [--allow-duplicate]");
  process.exit(1);
}

let candidate: unknown;
try {
  candidate = JSON.parse(json);
} catch {
  console.error('Record must be valid JSON');
  process.exit(1);
}

try {
  const result = await logManualRecord(candidate, new CsvLedgerStore(config.LEDGER_PATH), {
    allowDuplicate: flags.includes('--allow-duplicate'),
  });
  const { gameId, pickType, confidenceBand } = result.record;
  if (result.status === 'duplicate') {
    console.error(`${gameId} ${pickType} is already in the ledger (use --allow-duplicate to append anyway)`);
    process.exit(3);
  }
  console.log(`Logged ${gameId} ${pickType} (${confidenceBand})`);
} catch (err) {
  if (err instanceof ValidationError) {
    console.error(err.message);
    process.exit(1);
  }
  throw err;
}
