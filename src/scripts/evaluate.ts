/**
 * Evaluate one date's picks and append the results to the ledger.
 * Usage: npx tsx src/scripts/evaluate.ts [YYYY-MM-DD | today | yesterday]
 * Default: yesterday
 */
import { evaluateDate, formatSummary } from '../pipeline/evaluator.js';
import { createEvaluationDeps } from '../pipeline/context.js';
import { resolveDateArg } from '../utils/date.js';
import { logger } from '../utils/logger.js';

const date = resolveDateArg(process.argv[2]);
if (date === null) {
  console.error(`Invalid date: ${process.argv[2]} (expected YYYY-MM-DD, today or yesterday)`);
  process.exit(1);
}

try {
  const summary = await evaluateDate(date, createEvaluationDeps());
  console.log(formatSummary(summary));
  for (const s of summary.skipped) {
    console.log(`    ${s.gameId} ${s.pickType ?? '-'}: ${s.reason} (${s.detail})`);
  }
  process.exit(summary.failed.length > 0 ? 2 : 0);
} catch (err) {
  logger.fatal({ err, date }, 'Evaluation aborted');
  process.exit(1);
}
