import type { EvaluationResult, Question } from '../../types/quiz';
import { parseIntegerList } from '../../utils/answerParser';
import { malformedAnswer, scoredResult, semanticViolation, shapeMismatch } from '../../utils/answerEvaluators';
import { formatLiteral } from '../../utils/formatters';
import { findQueenConflicts, type QueenConflict } from './algorithms';

export const describeQueenConflict = ({ kind, columns, rows }: QueenConflict): string =>
  kind === 'row'
    ? `Queens in columns ${columns[0]} and ${columns[1]} attack each other along row ${rows[0]}.`
    : `Queens in columns ${columns[0]} and ${columns[1]} (rows ${rows[0]} and ${rows[1]}) attack each other along a diagonal.`;

/** Grades a row list where index = column and value = row. */
export const evaluateQueensPlacement = (question: Question, answer: string): EvaluationResult => {
  const { instance } = question;
  if (instance.topic !== 'n-queens') {
    throw new Error(`Question ${question.id} does not hold an N-Queens board`);
  }

  const parsed = parseIntegerList(answer);
  if (!parsed.ok) {
    return malformedAnswer(question, parsed.error);
  }

  const n = instance.size;
  const placement = parsed.value;
  if (placement.length !== n) {
    return shapeMismatch(question, `Expected ${n} rows, one per column, but got ${placement.length}.`);
  }

  const outOfRange = placement.findIndex((row) => row < 0 || row >= n);
  if (outOfRange >= 0) {
    return shapeMismatch(
      question,
      `Row ${placement[outOfRange]} in column ${outOfRange} is outside the board (0 to ${n - 1}).`,
    );
  }

  const conflicts = findQueenConflicts(placement);
  if (conflicts.length > 0) {
    return semanticViolation(question, [
      `Invalid placement: ${conflicts.length} pair(s) of queens attack each other.`,
      ...conflicts.map(describeQueenConflict),
    ]);
  }

  const feedback = [`Correct! This is a valid solution for the ${n}x${n} board.`];
  const { answerKey } = question;
  if (answerKey.kind === 'placement' && answerKey.knownSolutions.length > 0) {
    const key = formatLiteral(placement);
    const known = answerKey.knownSolutions.some((solution) => formatLiteral(solution) === key);
    feedback.push(
      known
        ? 'It matches one of the reference solutions.'
        : 'It differs from the reference solutions found for this board.',
    );
  }

  return scoredResult(question, 100, feedback);
};
