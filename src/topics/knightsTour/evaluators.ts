import type { EvaluationResult, Question } from '../../types/quiz';
import { parsePairList } from '../../utils/answerParser';
import { malformedAnswer, scoredResult, semanticViolation, shapeMismatch } from '../../utils/answerEvaluators';
import { formatSquare } from '../../utils/formatters';
import { findTourViolation, type TourViolation } from './algorithms';

export const describeTourViolation = (violation: TourViolation): string => {
  switch (violation.kind) {
    case 'wrong-length':
      return `A full tour visits ${violation.expected} squares, but the path has ${violation.actual}.`;
    case 'off-board':
      return `Square ${formatSquare(violation.square)} at step ${violation.index + 1} is off the board.`;
    case 'wrong-start':
      return `The tour must start at ${formatSquare(violation.expected)}, not ${formatSquare(violation.actual)}.`;
    case 'revisited':
      return `Square ${formatSquare(violation.square)} is visited more than once (again at step ${violation.index + 1}).`;
    case 'illegal-move':
      return `Step ${violation.index + 1} from ${formatSquare(violation.from)} to ${formatSquare(violation.to)} is not a knight move.`;
  }
};

export const evaluateKnightsTour = (question: Question, answer: string): EvaluationResult => {
  const { instance } = question;
  if (instance.topic !== 'knights-tour') {
    throw new Error(`Question ${question.id} does not hold a knight's tour instance`);
  }

  const parsed = parsePairList(answer);
  if (!parsed.ok) {
    return malformedAnswer(question, parsed.error);
  }

  const violation = findTourViolation(instance, parsed.value, instance.start);
  if (violation === null) {
    return scoredResult(question, 100, [
      `Correct! The knight visits all ${instance.rows * instance.cols} squares exactly once.`,
    ]);
  }

  const feedback = describeTourViolation(violation);
  return violation.kind === 'wrong-length' || violation.kind === 'off-board'
    ? shapeMismatch(question, feedback)
    : semanticViolation(question, [feedback]);
};
