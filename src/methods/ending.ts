/** Stop once the best score reaches a threshold. */
export interface MaxScoreEnding {
  name: 'MAX_SCORE';
  /** Threshold the best score must reach (inclusive). */
  score: number;
}

/** Stop once the best score stops improving. */
export interface BestScoreEnding {
  name: 'BEST_SCORE';
}

/** Never stop on its own; the caller ends the run with `stop()`. */
export interface NeverStopEnding {
  name: 'NEVER_STOP';
}

/** Any supported ending criterion descriptor. */
export type EndingCriterion = MaxScoreEnding | BestScoreEnding | NeverStopEnding;

/**
 * Ending criteria deciding, generation after generation, when evolution stops.
 *
 * - `MAX_SCORE`: ends as soon as the best chromosome scores at least `score`.
 *   Use it when the optimum is known (e.g. "all digits match").
 * - `BEST_SCORE`: ends when the best score has not improved over the last ten
 *   generations. It needs eleven generations of history before it can fire.
 * - `NEVER_STOP`: for interactive front ends that poll `best()` and call
 *   `stop()` themselves.
 */
export const ending: {
  MAX_SCORE: MaxScoreEnding;
  BEST_SCORE: BestScoreEnding;
  NEVER_STOP: NeverStopEnding;
} = {
  MAX_SCORE: {
    name: 'MAX_SCORE',
    score: 0,
  },
  BEST_SCORE: {
    name: 'BEST_SCORE',
  },
  NEVER_STOP: {
    name: 'NEVER_STOP',
  },
};
