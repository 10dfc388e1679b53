import type { AnswerKey, EvaluationOutcome, EvaluationResult, Question, RaceAnswerKey } from '../types/quiz';
import { parseInteger, parseYesNo } from './answerParser';
import { formatSeconds } from './formatters';
import { areSimilar } from './stringMatching';

const freezeResult = (result: EvaluationResult): EvaluationResult =>
  Object.freeze({ ...result, feedback: Object.freeze([...result.feedback]) });

const rejected = (
  question: Question,
  outcome: Extract<EvaluationOutcome, 'malformed-answer' | 'shape-mismatch' | 'semantic-violation'>,
  feedback: readonly string[],
): EvaluationResult =>
  freezeResult({
    score: 0,
    feedback,
    isCorrect: false,
    outcome,
    referenceSolution: question.referenceSolution,
  });

export const malformedAnswer = (question: Question, reason: string): EvaluationResult =>
  rejected(question, 'malformed-answer', [
    reason,
    `Expected format: ${question.answerFormat}`,
  ]);

export const shapeMismatch = (question: Question, reason: string): EvaluationResult =>
  rejected(question, 'shape-mismatch', [reason]);

export const semanticViolation = (question: Question, feedback: readonly string[]): EvaluationResult =>
  rejected(question, 'semantic-violation', feedback);

/** Correct at or above `passThreshold`; any other non-zero score is partial credit. */
export const scoredResult = (
  question: Question,
  score: number,
  feedback: readonly string[],
  passThreshold = 100,
): EvaluationResult => {
  const rounded = Math.round(Math.min(100, Math.max(0, score)));
  const isCorrect = rounded >= passThreshold;

  let outcome: EvaluationOutcome = 'incorrect';
  if (isCorrect) {
    outcome = 'correct';
  } else if (rounded > 0) {
    outcome = 'partial';
  }

  return freezeResult({
    score: rounded,
    feedback,
    isCorrect,
    outcome,
    referenceSolution: question.referenceSolution,
  });
};

export const internalErrorResult = (question: Question): EvaluationResult =>
  freezeResult({
    score: 0,
    feedback: ['An internal error occurred while grading this answer. It has been logged.'],
    isCorrect: false,
    outcome: 'internal-error',
    referenceSolution: question.referenceSolution,
  });

const isKeyOfKind = <K extends AnswerKey['kind']>(
  key: AnswerKey,
  kind: K,
): key is Extract<AnswerKey, { kind: K }> => key.kind === kind;

const expectKey = <K extends AnswerKey['kind']>(
  question: Question,
  kind: K,
): Extract<AnswerKey, { kind: K }> => {
  const key = question.answerKey;
  if (isKeyOfKind(key, kind)) {
    return key;
  }
  throw new Error(
    `Question ${question.id} carries a "${question.answerKey.kind}" answer key, expected "${kind}"`,
  );
};

export const WEIGHT_PER_CONCEPT = 20;

/** Case-insensitive keyword hits, 20 points each, capped at 100. */
export const evaluateKeywordAnswer = (question: Question, answer: string): EvaluationResult => {
  const { concepts, passThreshold, suggestions } = expectKey(question, 'keywords');
  if (answer.length === 0) {
    return malformedAnswer(question, 'The answer is empty.');
  }

  const text = answer.toLowerCase();
  const covered = concepts.filter((concept) => text.includes(concept.keyword.toLowerCase()));
  const missing = concepts.filter((concept) => !covered.includes(concept));
  const score = Math.min(100, covered.length * WEIGHT_PER_CONCEPT);

  const feedback = [`Concepts covered: ${covered.length} of ${concepts.length}.`];
  covered.forEach((concept) => feedback.push(`Covered: ${concept.description}`));
  missing.forEach((concept) => feedback.push(`Missing: ${concept.description}`));
  if (score < passThreshold) {
    feedback.push(...suggestions);
  }

  return scoredResult(question, score, feedback, passThreshold);
};

export const evaluateIntegerAnswer = (question: Question, answer: string): EvaluationResult => {
  const { expected, explanation } = expectKey(question, 'integer');
  const parsed = parseInteger(answer);
  if (!parsed.ok) {
    return malformedAnswer(question, parsed.error);
  }

  if (parsed.value === expected) {
    return scoredResult(question, 100, [`Correct! The answer is ${expected}.`, explanation]);
  }
  return scoredResult(question, 0, [`Incorrect. The correct answer is ${expected}, not ${parsed.value}.`, explanation]);
};

export const evaluateYesNoAnswer = (question: Question, answer: string): EvaluationResult => {
  const { expected, reason } = expectKey(question, 'yes-no');
  const parsed = parseYesNo(answer);
  if (!parsed.ok) {
    return malformedAnswer(question, parsed.error);
  }

  const verdict = expected ? 'Yes' : 'No';
  if (parsed.value === expected) {
    return scoredResult(question, 100, [`Correct! The answer is ${verdict}.`, reason]);
  }
  return scoredResult(question, 0, [`Incorrect. The answer is ${verdict}.`, reason]);
};

/** Fuzzy term match; a zero distance budget demands an exact, case-insensitive match. */
export const matchesTerm = (answer: string, accepted: readonly string[], maxDistance: number): boolean =>
  accepted.some((term) =>
    maxDistance === 0 ? answer.trim().toLowerCase() === term.toLowerCase() : areSimilar(answer, term, maxDistance),
  );

export const evaluateTermAnswer = (question: Question, answer: string): EvaluationResult => {
  const { expected, accepted, maxDistance, explanation } = expectKey(question, 'term');
  if (answer.length === 0) {
    return malformedAnswer(question, 'The answer is empty.');
  }

  if (matchesTerm(answer, accepted, maxDistance)) {
    return scoredResult(question, 100, [`Correct! The answer is ${expected}.`, explanation]);
  }
  return scoredResult(question, 0, [`Your answer was '${answer}'. The correct answer is ${expected}.`, explanation]);
};

export const describeRaceTimings = (key: RaceAnswerKey): string[] =>
  key.timings.map(
    (timing) => `${timing.name}: ${formatSeconds(timing.durationMs)}${timing.succeeded ? '' : ' (no result)'}`,
  );

/** The winner is the measurement taken when the question was generated. */
export const evaluateRaceAnswer = (question: Question, answer: string): EvaluationResult => {
  const key = expectKey(question, 'race');
  if (answer.length === 0) {
    return malformedAnswer(question, 'The answer is empty.');
  }

  const named = key.algorithms.find((algorithm) => areSimilar(answer, algorithm, 2));
  if (named === undefined) {
    return shapeMismatch(question, `'${answer}' is not one of the compared algorithms: ${key.algorithms.join(', ')}.`);
  }

  const timings = ['Measured timings:', ...describeRaceTimings(key), key.note];
  if (named === key.winner) {
    return scoredResult(question, 100, [`Correct! ${key.winner} finished first.`, ...timings]);
  }
  return scoredResult(question, 0, [`Not this time: ${key.winner} finished first, not ${named}.`, ...timings]);
};
