import GeneticAlgorithm from './genetic';
import * as methods from './methods/methods';
import { config } from './config';

export { GeneticAlgorithm, methods, config };
export { selection, ending } from './methods/methods';
export type {
  SelectionMethod,
  RouletteWheelSelection,
  StochasticUniversalSelection,
  TournamentSelection,
  EndingCriterion,
  MaxScoreEnding,
  BestScoreEnding,
  NeverStopEnding,
} from './methods/methods';
export { PopulationStore } from './genetic/genetic.population';
export { GeneticConfigError } from './genetic/genetic.errors';
export { Random, resolveRandom } from './utils/random';
export type { RandomSource, RandomState } from './utils/random';
export type { MutationSpan } from './genetic/genetic.mutation';
export type {
  Chromosome,
  Score,
  ScoredChromosome,
  GeneticProblem,
  ChromosomeSize,
  GenerationStats,
  ScheduleOptions,
  GeneticOptions,
  GeneticOptionsInput,
  LogSink,
  RunOptions,
  BlockingRunOptions,
  BackgroundRunOptions,
  EndReason,
  RunResult,
  EvolutionTask,
  RunState,
} from './genetic/genetic.types';

export default GeneticAlgorithm;
