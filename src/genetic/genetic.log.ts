import { config } from '../config';
import type { EndReason, LogSink, Score } from './genetic.types';

const REASON_TEXT: Record<EndReason, string> = {
  ending: 'ending criterion matched',
  stopped: 'stopped by caller',
};

/**
 * Turn the `log` run option into a sink: `true` → `console.log`, a function →
 * itself, anything else → no logging.
 */
export function resolveLogSink(log?: boolean | LogSink): LogSink | undefined {
  if (typeof log === 'function') return log;
  // eslint-disable-next-line no-console
  if (log === true) return (line) => console.log(line);
  return undefined;
}

/** `[evogen] Generation 3: best fitness score is 2 (163)` */
export function generationLine(
  generation: number,
  score: Score,
  rendered: string
): string {
  return `${config.logPrefix} Generation ${generation}: best fitness score is ${score} (${rendered})`;
}

/** `[evogen] Evolution over (ending criterion matched). Best fitness score is 3 (163)` */
export function endLine(reason: EndReason, score: Score, rendered: string): string {
  return `${config.logPrefix} Evolution over (${REASON_TEXT[reason]}). Best fitness score is ${score} (${rendered})`;
}
