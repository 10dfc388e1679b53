import type { HanoiInstance } from '../../types/problem';
import type { KeywordConcept, QuestionTemplate } from '../../types/quiz';
import {
  evaluateIntegerAnswer,
  evaluateKeywordAnswer,
  evaluateRaceAnswer,
  evaluateTermAnswer,
  evaluateYesNoAnswer,
} from '../../utils/answerEvaluators';
import { formatCount, formatLiteral, formatPegState, pegLabel } from '../../utils/formatters';
import { createQuestion, keywordKey, raceAnswerKey } from '../../utils/questionBuilder';
import { rngInt, rngSample } from '../../utils/random';
import {
  checkHanoiMove,
  frameStewartMoveCount,
  solveHanoiBinaryPattern,
  solveHanoiFrameStewart,
  solveHanoiIterative,
  solveHanoiMemoized,
  solveHanoiRecursive,
} from './algorithms';
import { describeIllegalMove, evaluateHanoiMoves } from './evaluators';
import { generateHanoiInstance, generateHanoiMoveScenario } from './generators';

const threePegTower = (disks: number): HanoiInstance => ({
  topic: 'hanoi',
  disks,
  pegs: 3,
  source: 0,
  target: 2,
});

const complexityConcepts = (pegs: number): KeywordConcept[] => [
  { keyword: '2^n', description: 'the exponential growth of the move count' },
  { keyword: 'O(2^n)', description: 'the O(2^n) time complexity' },
  { keyword: 'recursive', description: 'the recursive solution' },
  { keyword: 'optimal', description: 'why the solution is optimal' },
  { keyword: `${pegs} pegs`, description: `the effect of having ${pegs} pegs` },
];

export const hanoiSolutionTemplate: QuestionTemplate = {
  id: 'hanoi-solution',
  topicId: 'hanoi',
  kind: 'solution',
  name: 'Generalized Hanoi Steps',
  generate: async ({ rng }) => {
    const instance = generateHanoiInstance(rng);
    const { disks, pegs, source, target } = instance;

    return createQuestion(hanoiSolutionTemplate, {
      problemText: `Solve the Tower of Hanoi with ${disks} disks and ${pegs} pegs. Move all disks from peg ${source} to peg ${target}.`,
      answerFormat: `A list of [from, to] moves with pegs numbered 0 to ${pegs - 1}, e.g. [[0, 2], [0, 1], [2, 1]]`,
      instance,
      answerKey: { kind: 'hanoi-moves', optimalMoveCount: frameStewartMoveCount(disks, pegs) },
      referenceSolution: formatLiteral(solveHanoiFrameStewart(disks, pegs, source, target)),
    });
  },
  evaluate: evaluateHanoiMoves,
};

export const hanoiComplexityTemplate: QuestionTemplate = {
  id: 'hanoi-complexity',
  topicId: 'hanoi',
  kind: 'complexity',
  name: 'Generalized Hanoi Complexity',
  generate: async ({ rng }) => {
    const instance = generateHanoiInstance(rng);
    const { disks, pegs } = instance;

    return createQuestion(hanoiComplexityTemplate, {
      problemText: `For the Tower of Hanoi with ${disks} disks and ${pegs} pegs:\n1. What is the minimum number of moves required?\n2. What is the time complexity for ${disks} disks?`,
      answerFormat: 'Minimum Moves: ...\nTime Complexity: O(...)\nExplanation: ...',
      instance,
      answerKey: keywordKey(complexityConcepts(pegs), 80, [
        'Describe how the number of moves grows with n.',
        'Explain why the growth is exponential.',
        'Discuss how additional pegs change the solution.',
      ]),
      referenceSolution: String(frameStewartMoveCount(disks, pegs)),
    });
  },
  evaluate: evaluateKeywordAnswer,
};

export const hanoiMinimumMovesTemplate: QuestionTemplate = {
  id: 'hanoi-minimum-moves',
  topicId: 'hanoi',
  kind: 'theory',
  name: 'Minimum Hanoi Moves',
  generate: async ({ rng }) => {
    const instance = generateHanoiInstance(rng);
    const { disks, pegs } = instance;
    const expected = frameStewartMoveCount(disks, pegs);
    const explanation =
      pegs === 3
        ? `With 3 pegs the minimum is 2^${disks} - 1 = ${formatCount(expected)}.`
        : `With ${pegs} pegs the Frame-Stewart strategy needs ${formatCount(expected)} moves, against ${formatCount(2 ** disks - 1)} with three pegs.`;

    return createQuestion(hanoiMinimumMovesTemplate, {
      problemText: `What is the minimum number of moves required to solve the Tower of Hanoi with ${disks} disks and ${pegs} pegs?`,
      answerFormat: 'A single integer, e.g. 7',
      instance,
      answerKey: { kind: 'integer', expected, explanation },
      referenceSolution: String(expected),
    });
  },
  evaluate: evaluateIntegerAnswer,
};

export const hanoiRecursiveStepTemplate: QuestionTemplate = {
  id: 'hanoi-recursive-step',
  topicId: 'hanoi',
  kind: 'theory',
  name: 'First Recursive Step',
  generate: async ({ rng }) => {
    const disks = rngInt(rng, 5, 10);

    return createQuestion(hanoiRecursiveStepTemplate, {
      problemText: `In the optimal recursive solution for moving ${disks} disks from Peg A to Peg C (using Peg B as auxiliary), where must the top ${disks - 1} disks be moved first?`,
      answerFormat: "The destination peg: 'A', 'B' or 'C'",
      instance: threePegTower(disks),
      answerKey: {
        kind: 'term',
        expected: 'B (the auxiliary peg)',
        accepted: ['B', 'Peg B', 'auxiliary', 'auxiliary peg'],
        maxDistance: 0,
        explanation: `The three steps are: move ${disks - 1} disks from A to B, move the largest disk from A to C, then move the ${disks - 1} disks from B to C.`,
      },
      referenceSolution: 'B',
    });
  },
  evaluate: evaluateTermAnswer,
};

export const hanoiMoveValidationTemplate: QuestionTemplate = {
  id: 'hanoi-move-validation',
  topicId: 'hanoi',
  kind: 'validation',
  name: 'Validate a Hanoi Move',
  generate: async ({ rng }) => {
    const instance = generateHanoiMoveScenario(rng, rng() < 0.5);
    const pegState = instance.pegState ?? [];
    const [from, to] = instance.move ?? [0, 1];
    const check = checkHanoiMove(pegState, from, to);

    return createQuestion(hanoiMoveValidationTemplate, {
      problemText: `The pegs hold these disks, bottom to top (1 is the smallest): ${formatPegState(pegState)}. Is it a valid move to take the top disk from peg ${pegLabel(from)} and place it on peg ${pegLabel(to)}?`,
      answerFormat: 'yes or no',
      instance,
      answerKey: {
        kind: 'yes-no',
        expected: check.valid,
        reason: check.valid
          ? `The top disk of peg ${pegLabel(from)} is smaller than anything on peg ${pegLabel(to)}.`
          : describeIllegalMove(1, check),
      },
      referenceSolution: check.valid ? 'yes' : 'no',
    });
  },
  evaluate: evaluateYesNoAnswer,
};

export const hanoiFourthPegTemplate: QuestionTemplate = {
  id: 'hanoi-fourth-peg',
  topicId: 'hanoi',
  kind: 'theory',
  name: 'Effect of a Fourth Peg',
  generate: async ({ rng }) => {
    const disks = rngInt(rng, 20, 64);

    return createQuestion(hanoiFourthPegTemplate, {
      problemText: `Compared to the 3-peg problem, what effect does adding a 4th peg have on the minimum number of moves required to move ${disks} disks?`,
      answerFormat: "'Increases', 'Decreases' or 'No effect'",
      instance: { topic: 'hanoi', disks, pegs: 4, source: 0, target: 3 },
      answerKey: {
        kind: 'term',
        expected: 'Decreases',
        accepted: ['decreases', 'decrease', 'fewer', 'reduces'],
        maxDistance: 1,
        explanation: `Three pegs take 2^${disks} - 1 moves; the Frame-Stewart strategy on four pegs needs only ${formatCount(frameStewartMoveCount(disks, 4))}.`,
      },
      referenceSolution: 'Decreases',
    });
  },
  evaluate: evaluateTermAnswer,
};

export const hanoiRaceTemplate: QuestionTemplate = {
  id: 'hanoi-race',
  topicId: 'hanoi',
  kind: 'race',
  name: 'Hanoi Algorithm Race',
  generate: async ({ rng }) => {
    const disks = rngInt(rng, 12, 16);
    const moveCount = 2 ** disks - 1;

    const racers = rngSample(
      rng,
      [
        { name: 'Recursive', run: () => solveHanoiRecursive(disks).length === moveCount },
        { name: 'Iterative', run: () => solveHanoiIterative(disks).length === moveCount },
        { name: 'Binary Pattern', run: () => solveHanoiBinaryPattern(disks).length === moveCount },
        { name: 'Memoized Recursive', run: () => solveHanoiMemoized(disks).length === moveCount },
      ],
      rngInt(rng, 2, 4),
    );
    const answerKey = await raceAnswerKey(racers);
    const names = racers.map((racer) => racer.name);

    return createQuestion(hanoiRaceTemplate, {
      problemText: `To generate all ${formatCount(moveCount)} moves for a ${disks}-disk, 3-peg Hanoi problem, which algorithm will finish first: ${names.join(' vs ')}?`,
      answerFormat: `One of: ${names.join(', ')}`,
      instance: threePegTower(disks),
      answerKey,
      referenceSolution: answerKey.winner,
    });
  },
  evaluate: evaluateRaceAnswer,
};

export const HANOI_TEMPLATES: QuestionTemplate[] = [
  hanoiSolutionTemplate,
  hanoiComplexityTemplate,
  hanoiMinimumMovesTemplate,
  hanoiRecursiveStepTemplate,
  hanoiMoveValidationTemplate,
  hanoiFourthPegTemplate,
  hanoiRaceTemplate,
];
