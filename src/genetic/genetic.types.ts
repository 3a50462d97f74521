/**
 * Shared structural types for the genetic engine modules.
 *
 * Kept free of runtime code so operator modules, the engine class and user code
 * can all import them without pulling in each other.
 */
import type { RandomSource } from '../utils/random';
import type { SelectionMethod } from '../methods/selection';
import type { EndingCriterion } from '../methods/ending';

/** A candidate solution: an ordered sequence of user-defined genes. */
export type Chromosome<G> = G[];

/** Fitness of a chromosome; higher is better, any sign allowed. */
export type Score = number;

/** One entry of the fitness-sorted population. */
export interface ScoredChromosome<G> {
  score: Score;
  chromosome: Chromosome<G>;
}

/**
 * Capabilities the user supplies for a concrete problem.
 *
 * @example
 * const digits: GeneticProblem<number> = {
 *   randomGene: (random) => random.int(0, 9),
 *   score: (c) => c.filter((d, i) => d === target[i]).length,
 *   print: (c) => c.join(''),
 * };
 */
export interface GeneticProblem<G> {
  /**
   * Produce a fresh random gene. The engine's random source is passed in so
   * seeded runs stay reproducible; ignoring it is allowed.
   */
  randomGene(random: RandomSource): G;
  /** Fitness of a chromosome. Called exactly once per chromosome per generation. */
  score(chromosome: readonly G[]): Score;
  /** Human-readable rendering used in log lines only. */
  print?(chromosome: readonly G[]): string;
}

/** Inclusive bounds on generated chromosome length. */
export interface ChromosomeSize {
  min: number;
  max: number;
}

/** Snapshot handed to the schedule hook after a generation was scored. */
export interface GenerationStats<G> {
  /** Index of the generation just scored (0-based). */
  generation: number;
  /** Best chromosome recorded so far in this run. */
  best: Chromosome<G>;
  /** Score of `best`. */
  score: Score;
  /** Mean score of the generation just scored. */
  average: Score;
}

/** Periodic callback, invoked every `generations` generations (0 included). */
export interface ScheduleOptions<G> {
  generations: number;
  function: (stats: GenerationStats<G>) => void;
}

/** Fully hydrated engine options. */
export interface GeneticOptions<G> {
  /** Number of chromosomes per generation. */
  populationSize: number;
  /** Per-chromosome probability of a mutation event. */
  mutationProbability: number;
  /** Criterion deciding when the run ends. */
  ending: EndingCriterion;
  /** Parent selection strategy. */
  selection: SelectionMethod;
  /** Length bounds for chromosomes created while seeding. */
  chromosomeSize: ChromosomeSize;
  /** Source of every random draw made by the engine and its operators. */
  random: RandomSource;
  /** Optional periodic hook. */
  schedule?: ScheduleOptions<G>;
}

/** Options accepted by the engine constructor; missing fields get defaults. */
export interface GeneticOptionsInput<G>
  extends Partial<Omit<GeneticOptions<G>, 'random'>> {
  /** A source, a seed, or nothing for the process-wide generator. */
  random?: RandomSource | string | number;
}

/** Receives run log lines. */
export type LogSink = (line: string) => void;

/** Options of a single `run()` call. */
export interface RunOptions {
  /** `true` (default): return at termination. `false`: return a task at once. */
  blocking?: boolean;
  /** `true` logs to `console.log`; a function receives each line instead. */
  log?: boolean | LogSink;
}

/** `run()` options that select blocking mode. */
export interface BlockingRunOptions extends RunOptions {
  blocking?: true;
}

/** `run()` options that select background mode. */
export interface BackgroundRunOptions extends RunOptions {
  blocking: false;
}

/** Why a run ended. */
export type EndReason = 'ending' | 'stopped';

/** Outcome of a finished run. */
export interface RunResult<G> {
  best: Chromosome<G>;
  score: Score;
  /** Generation counter at termination (index of the last scored generation). */
  generation: number;
  reason: EndReason;
}

/** Handle of a background run. */
export interface EvolutionTask<G> {
  /** Settles once the run is idle again; rejects if a callback threw. */
  readonly done: Promise<RunResult<G>>;
  /** Request termination at the next generation boundary. */
  stop(): void;
}

/** Lifecycle of an engine instance. */
export type RunState = 'idle' | 'running';
