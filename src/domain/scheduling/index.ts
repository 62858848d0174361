export type {
  QuizSession,
  RankedQuestion,
  ScheduleOptions,
  SchedulerConfig,
  SelectionMode,
  SessionFilterSet,
  SessionFilters,
} from './types';
export { DEFAULT_SCHEDULER_CONFIG } from './types';
export type { RandomSource } from './random';
export { createSeededRandom, drawSeed, shuffle, uniform } from './random';
export { computePriority, incorrectnessSignal, rankCandidates, recencyFactor } from './recencyScorer';
export type { ResolveOptions } from './dependencyResolver';
export { activeConstraints, findDependencyCycles, resolveDependencies } from './dependencyResolver';
export { filterCandidates, listTags, matchesFilters } from './filters';
export { generateSessionId, preselect, schedule } from './sessionScheduler';
