import type { EvaluationResult, Question } from '../../types/quiz';
import { parsePairList } from '../../utils/answerParser';
import { malformedAnswer, scoredResult, semanticViolation, shapeMismatch } from '../../utils/answerEvaluators';
import { formatCount } from '../../utils/formatters';
import { createPegState, frameStewartMoveCount, replayHanoiMoves, type HanoiMoveCheck } from './algorithms';

export const describeIllegalMove = (
  moveNumber: number,
  check: Exclude<HanoiMoveCheck, { valid: true }>,
): string =>
  check.reason === 'empty-source'
    ? `Move ${moveNumber} takes a disk from peg ${check.from}, which is empty.`
    : `Move ${moveNumber} places disk ${check.disk} on top of the smaller disk ${check.onto}.`;

/**
 * Full credit at the optimum (2^n - 1 with three pegs, Frame-Stewart with more),
 * 80 within 1.5x of it, 50 for any longer legal solution.
 */
export const scoreHanoiSolution = (moveCount: number, optimal: number): number => {
  if (moveCount === optimal) {
    return 100;
  }
  if (moveCount <= optimal * 1.5) {
    return 80;
  }
  return 50;
};

export const evaluateHanoiMoves = (question: Question, answer: string): EvaluationResult => {
  const { instance } = question;
  if (instance.topic !== 'hanoi') {
    throw new Error(`Question ${question.id} does not hold a Tower of Hanoi instance`);
  }

  const parsed = parsePairList(answer);
  if (!parsed.ok) {
    return malformedAnswer(question, parsed.error);
  }

  const moves = parsed.value;
  const { disks, pegs, source, target } = instance;
  if (moves.length === 0) {
    return shapeMismatch(question, 'The move list is empty.');
  }

  for (let index = 0; index < moves.length; index += 1) {
    const [from, to] = moves[index];
    if ([from, to].some((peg) => peg < 0 || peg >= pegs)) {
      return shapeMismatch(question, `Move ${index + 1} uses a peg outside 0 to ${pegs - 1}.`);
    }
    if (from === to) {
      return shapeMismatch(question, `Move ${index + 1} goes from peg ${from} to itself.`);
    }
  }

  const replay = replayHanoiMoves(createPegState(disks, pegs, source), moves);
  if (!replay.ok) {
    return semanticViolation(question, [describeIllegalMove(replay.moveIndex + 1, replay.check)]);
  }

  if (replay.finalState[target].length !== disks) {
    return semanticViolation(question, [
      `After ${moves.length} moves only ${replay.finalState[target].length} of ${disks} disks are on peg ${target}.`,
    ]);
  }

  const optimal = frameStewartMoveCount(disks, pegs);
  const score = scoreHanoiSolution(moves.length, optimal);
  const feedback =
    score === 100
      ? [`Correct! ${formatCount(moves.length)} moves is optimal.`]
      : [`Valid solution in ${formatCount(moves.length)} moves; the minimum is ${formatCount(optimal)}.`];

  return scoredResult(question, score, feedback, 80);
};
