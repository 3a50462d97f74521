import type { EndingCriterion } from './methods/ending';
import type { SelectionMethod } from './methods/selection';
import { PopulationStore } from './genetic/genetic.population';
import { select } from './genetic/genetic.selection';
import { cross } from './genetic/genetic.crossover';
import { mutate, type MutationSpan } from './genetic/genetic.mutation';
import { isEvolutionOver } from './genetic/genetic.ending';
import { breed, scorePopulation } from './genetic/genetic.evolve';
import {
  randomChromosome,
  render,
  seedPopulation,
} from './genetic/genetic.helpers';
import { hydrateOptions, validateOptions } from './genetic/genetic.options';
import { endLine, generationLine, resolveLogSink } from './genetic/genetic.log';
import type {
  BackgroundRunOptions,
  BlockingRunOptions,
  Chromosome,
  EndReason,
  EvolutionTask,
  GeneticOptions,
  GeneticOptionsInput,
  GeneticProblem,
  LogSink,
  RunOptions,
  RunResult,
  RunState,
  Score,
  ScoredChromosome,
} from './genetic/genetic.types';

/**
 * Generic genetic algorithm over chromosomes of user-defined genes.
 *
 * The engine owns the run lifecycle; the operators themselves live in
 * `src/genetic/*` as plain functions and are re-exposed here as thin methods
 * bound to the engine's problem, options and current population.
 *
 * @example
 * const target = [1, 6, 3];
 * const ga = new GeneticAlgorithm<number>(
 *   {
 *     randomGene: (random) => random.int(0, 9),
 *     score: (c) => c.filter((d, i) => d === target[i]).length,
 *     print: (c) => c.join(''),
 *   },
 *   {
 *     populationSize: 50,
 *     chromosomeSize: { min: 3, max: 3 },
 *     ending: { name: 'MAX_SCORE', score: 3 },
 *   }
 * );
 * const { best } = ga.run({ log: true });
 */
export default class GeneticAlgorithm<G> {
  problem: GeneticProblem<G>;
  options: GeneticOptions<G>;
  /** Index of the generation being (or last) scored in the current run. */
  generation: number = 0;

  private _population: Chromosome<G>[] = [];
  private _store: PopulationStore<G> = new PopulationStore<G>();
  /** Best entry recorded during the current (or last) run. */
  private _best?: ScoredChromosome<G>;
  /** BEST_SCORE history buffer. */
  private _history: Score[] = [];
  private _state: RunState = 'idle';
  private _stopRequested: boolean = false;
  /** Incremented per run so a stale task handle cannot stop a later run. */
  private _runId: number = 0;
  private _log?: LogSink;

  /**
   * @param problem Gene factory, fitness function and optional printer.
   * @param options Engine options; missing fields get their defaults. They are
   *   validated when a run starts.
   */
  constructor(problem: GeneticProblem<G>, options: GeneticOptionsInput<G> = {}) {
    this.problem = problem;
    this.options = hydrateOptions(options);
  }

  /** Current lifecycle state. */
  get state(): RunState {
    return this._state;
  }

  isRunning(): boolean {
    return this._state === 'running';
  }

  /** Store of the most recently scored generation (empty before the first one). */
  get population(): PopulationStore<G> {
    return this._store;
  }

  /**
   * Evolve until the ending criterion fires or {@link stop} is called.
   *
   * Blocking mode (default) runs every generation before returning. With
   * `{ blocking: false }` the configuration is validated and the population
   * seeded synchronously, then one generation runs per macrotask and a task
   * handle is returned at once.
   *
   * @throws GeneticConfigError when the options are invalid (in both modes).
   * @throws Error when a run is already in progress.
   */
  run(options?: BlockingRunOptions): RunResult<G>;
  run(options: BackgroundRunOptions): EvolutionTask<G>;
  run(options: RunOptions): RunResult<G> | EvolutionTask<G>;
  run(options: RunOptions = {}): RunResult<G> | EvolutionTask<G> {
    this._begin(options);
    return options.blocking === false
      ? this._runInBackground()
      : this._runBlocking();
  }

  /**
   * Ask the current run to end. The generation in progress completes and the
   * run finishes at its next end check with reason `stopped`. No effect when
   * idle.
   */
  stop(): void {
    if (this._state === 'running') this._stopRequested = true;
  }

  /** Best chromosome of the current (or last) run; `undefined` before any generation was scored. */
  best(): Chromosome<G> | undefined {
    return this._best?.chromosome.slice();
  }

  /** Score of {@link best}. */
  bestScore(): Score | undefined {
    return this._best?.score;
  }

  /** Set population size and mutation probability. */
  setMainParameters(populationSize: number, mutationProbability: number): void {
    this._assertIdle();
    this.options.populationSize = populationSize;
    this.options.mutationProbability = mutationProbability;
  }

  setEndingCriterion(criterion: EndingCriterion): void {
    this._assertIdle();
    this.options.ending = criterion;
  }

  setSelection(method: SelectionMethod): void {
    this._assertIdle();
    this.options.selection = method;
  }

  setChromosomeSize(min: number, max: number): void {
    this._assertIdle();
    this.options.chromosomeSize = { min, max };
  }

  /** Run the configured selection strategy once against the current store. */
  select(): Chromosome<G>[] {
    return select(this._store, this.options.selection, this.options.random);
  }

  /** Recombine two parents with the engine's random source. */
  cross(first: readonly G[], second: readonly G[]): [Chromosome<G>, Chromosome<G>] {
    return cross(first, second, this.options.random);
  }

  /** Apply the configured mutation chance to `chromosome` in place. */
  mutate(chromosome: Chromosome<G>): MutationSpan | undefined {
    return mutate(
      chromosome,
      this.options.mutationProbability,
      () => this.problem.randomGene(this.options.random),
      this.options.random
    );
  }

  /**
   * Evaluate the ending criterion against the best score of the last scored
   * generation. Like the check made each generation, this feeds the
   * BEST_SCORE history.
   * @throws Error when no generation has been scored yet.
   */
  isEvolutionOver(): boolean {
    if (!this._store.size) throw new Error('No generation has been scored yet');
    return isEvolutionOver(
      this.options.ending,
      this._store.best().score,
      this._history
    );
  }

  randomChromosome(): Chromosome<G> {
    return randomChromosome(
      this.problem,
      this.options.chromosomeSize,
      this.options.random
    );
  }

  private _assertIdle(): void {
    if (this._state === 'running')
      throw new Error('Cannot change parameters while evolution is running');
  }

  private _begin(options: RunOptions): void {
    if (this._state === 'running')
      throw new Error('Evolution is already running');
    validateOptions(this.options);

    this._state = 'running';
    this._stopRequested = false;
    this._runId++;
    this._log = resolveLogSink(options.log);
    this._history = [];
    this._best = undefined;
    this._store = new PopulationStore<G>();
    this.generation = 0;
    try {
      this._population = seedPopulation(this.problem, this.options);
    } catch (err) {
      this._state = 'idle';
      throw err;
    }
  }

  private _runBlocking(): RunResult<G> {
    try {
      for (;;) {
        const result = this._step();
        if (result) return result;
      }
    } catch (err) {
      this._state = 'idle';
      throw err;
    }
  }

  private _runInBackground(): EvolutionTask<G> {
    const runId = this._runId;
    const done = new Promise<RunResult<G>>((resolve, reject) => {
      const tick = (): void => {
        try {
          const result = this._step();
          if (result) resolve(result);
          else setImmediate(tick);
        } catch (err) {
          this._state = 'idle';
          reject(err);
        }
      };
      setImmediate(tick);
    });
    return {
      done,
      stop: () => {
        if (this._runId === runId) this.stop();
      },
    };
  }

  /**
   * Run one generation.
   * @returns The run result when the run ended at this generation's end check.
   */
  private _step(): RunResult<G> | undefined {
    const store = scorePopulation(this._population, this.problem);
    this._store = store;
    const top = store.best();
    if (!this._best || top.score >= this._best.score) this._best = top;
    const best = this._best;

    this._log?.(
      generationLine(this.generation, top.score, render(this.problem, top.chromosome))
    );
    const schedule = this.options.schedule;
    if (schedule && this.generation % schedule.generations === 0)
      schedule.function({
        generation: this.generation,
        best: best.chromosome.slice(),
        score: best.score,
        average: store.averageScore(),
      });

    if (this._stopRequested) return this._finish('stopped');
    if (isEvolutionOver(this.options.ending, top.score, this._history))
      return this._finish('ending');

    this._population = breed(store, this.problem, this.options);
    this.generation++;
    return undefined;
  }

  private _finish(reason: EndReason): RunResult<G> {
    // Always set: _finish is only reached after a generation was scored.
    const best = this._best ?? this._store.best();
    this._state = 'idle';
    this._log?.(endLine(reason, best.score, render(this.problem, best.chromosome)));
    return {
      best: best.chromosome.slice(),
      score: best.score,
      generation: this.generation,
      reason,
    };
  }
}

export { GeneticAlgorithm };
