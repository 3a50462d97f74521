export { selection } from './selection';
export { ending } from './ending';
export type {
  SelectionMethod,
  RouletteWheelSelection,
  StochasticUniversalSelection,
  TournamentSelection,
} from './selection';
export type {
  EndingCriterion,
  MaxScoreEnding,
  BestScoreEnding,
  NeverStopEnding,
} from './ending';
