export { createQuizController, clampQuestionCount } from './api/quizController';
export type { QuizController, QuizControllerOptions } from './api/quizController';
export { createEvaluationEngine, evaluateQuizAnswer, normalizeAnswer } from './api/evaluateQuizAnswer';
export type { EvaluationEngine } from './api/evaluateQuizAnswer';
export { DEFAULT_QUIZ_CONFIG, loadQuizConfig } from './config';
export type { QuizConfig } from './config';
export {
  createQuizSessionStore,
  selectAggregateScore,
  selectCurrentQuestion,
  selectIsFinished,
  selectResponses,
} from './context/quizSession';
export type { QuizSessionState, QuizSessionStore } from './context/quizSession';
export { getTopicLabel, isTopicId, PROBLEM_TOPICS, QUESTION_TEMPLATES } from './utils/problemGenerator';
export type { TemplateRegistry } from './utils/problemGenerator';
export { EvaluationInternalError, UnknownTopicOrKindError } from './utils/errors';
export { parseInteger, parseIntegerList, parsePairList, parseYesNo } from './utils/answerParser';
export type { ParseResult } from './utils/answerParser';
export { raceAlgorithms } from './utils/raceAlgorithms';
export type { RaceEntry, RaceOutcome } from './utils/raceAlgorithms';
export { createRandomSource, seededRng } from './utils/random';
export { areSimilar } from './utils/stringMatching';

export * from './topics/nQueens/algorithms';
export * from './topics/hanoi/algorithms';
export * from './topics/graphColoring/algorithms';
export * from './topics/knightsTour/algorithms';
export * from './topics/minimax/algorithms';

export type * from './types/problem';
export type * from './types/quiz';
