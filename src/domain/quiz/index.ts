export type { Explanation, Question, QuestionInput, QuestionKind, Quiz, VariantGroup } from './types';
export { QUESTION_KINDS, isQuestionKind, isListKind, isSingleAnswerKind, isGradedKind } from './types';
export { MalformedQuestionError, DependencyCycleError } from './errors';
export type { MalformedQuestionCode } from './errors';
export { validateQuestion, validateQuiz } from './validateQuiz';
export { expandQuestionJson, loadQuizFromJson, flipFlashcards } from './loadQuiz';
