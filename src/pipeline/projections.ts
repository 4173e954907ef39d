import type { GameOutcome } from '../types/result.js';
import type { Prediction } from '../types/prediction.js';
import { SkipReason, type SkippedPrediction } from '../types/skip.js';
import type { ProjectionGame } from './prediction-loader.js';
import { classifySpreadPick, classifyTotalPick } from './classifier.js';

/**
 * Turns one projected game into spread and total picks by measuring the model's
 * lines against the closing lines. A market without a model line yields no pick.
 * Edges stay unrounded so the threshold sees the exact difference.
 */
export function expandProjection(
  game: ProjectionGame,
  outcome: GameOutcome,
  date: string,
): { predictions: Prediction[]; skipped: SkippedPrediction[] } {
  const predictions: Prediction[] = [];
  const skipped: SkippedPrediction[] = [];
  const base = { date, gameId: game.gameId, injuryImpact: game.injuryImpact, notes: '' };

  if (game.modelSpread !== null) {
    if (outcome.closingSpread === null) {
      skipped.push({
        gameId: game.gameId,
        pickType: null,
        reason: SkipReason.UnresolvableOutcome,
        detail: `No closing spread available for ${game.gameId}`,
      });
    } else {
      const edge = Math.abs(outcome.closingSpread - game.modelSpread);
      predictions.push({
        ...base,
        family: 'spread',
        pickType: classifySpreadPick(edge, game.modelSpread, outcome.closingSpread),
        edgePoints: edge,
        modelLine: game.modelSpread,
      });
    }
  }

  if (game.modelTotal !== null) {
    if (outcome.closingTotal === null) {
      skipped.push({
        gameId: game.gameId,
        pickType: null,
        reason: SkipReason.UnresolvableOutcome,
        detail: `No closing total available for ${game.gameId}`,
      });
    } else {
      const edge = Math.abs(game.modelTotal - outcome.closingTotal);
      predictions.push({
        ...base,
        family: 'total',
        pickType: classifyTotalPick(edge, game.modelTotal, outcome.closingTotal),
        edgePoints: edge,
        modelLine: game.modelTotal,
      });
    }
  }

  return { predictions, skipped };
}
