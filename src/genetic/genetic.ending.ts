import type { EndingCriterion } from '../methods/ending';
import { GeneticConfigError } from './genetic.errors';
import type { Score } from './genetic.types';

/** Number of best scores the BEST_SCORE criterion compares. */
export const BEST_SCORE_WINDOW = 10;

/**
 * Decide whether evolution is over after a generation was scored.
 *
 * - MAX_SCORE fires when `bestScore >= criterion.score`.
 * - BEST_SCORE appends `bestScore` to `history`. Until the buffer holds more
 *   than {@link BEST_SCORE_WINDOW} entries it never fires; past that the oldest
 *   entry is evicted and the criterion fires when no retained entry is above
 *   the oldest retained one, i.e. the best score did not improve over the window.
 * - NEVER_STOP never fires.
 *
 * @param criterion Ending descriptor.
 * @param bestScore Best score of the generation just scored.
 * @param history Score history buffer, modified in place (BEST_SCORE only).
 * @returns `true` when the run should end.
 * @throws GeneticConfigError for an unknown descriptor.
 */
export function isEvolutionOver(
  criterion: EndingCriterion,
  bestScore: Score,
  history: Score[]
): boolean {
  switch (criterion.name) {
    case 'MAX_SCORE':
      return bestScore >= criterion.score;
    case 'BEST_SCORE': {
      history.push(bestScore);
      if (history.length <= BEST_SCORE_WINDOW) return false;
      history.shift();
      const oldest = history[0];
      return !history.some((score) => score > oldest);
    }
    case 'NEVER_STOP':
      return false;
    default:
      return unknownEnding(criterion);
  }
}

function unknownEnding(criterion: never): never {
  throw new GeneticConfigError(
    `Unknown ending criterion: ${JSON.stringify(criterion)}`
  );
}
