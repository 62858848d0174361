export {
  normalizeAnswer,
  matchVariants,
  findMatchingGroup,
  removeNoCreditSlots,
  removeNoCreditLines,
  matchUnordered,
  matchOrdered,
} from './answerMatcher';
export type { ListMatch, MatchOutcome } from './answerMatcher';
export { timeoutMultiplier, slotRatio, classifyScore } from './gradingPolicy';
export type { ScoreOutcome } from './gradingPolicy';
export { grade } from './grade';
export { presentChoices } from './presentChoices';
export type { ChoicePresentation, GradeOptions, GradeResult, Submission } from './types';
