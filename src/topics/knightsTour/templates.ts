import type { KeywordConcept, QuestionTemplate } from '../../types/quiz';
import {
  evaluateKeywordAnswer,
  evaluateRaceAnswer,
  evaluateTermAnswer,
  evaluateYesNoAnswer,
} from '../../utils/answerEvaluators';
import { formatLiteral, formatSquare } from '../../utils/formatters';
import { createQuestion, forkRng, keywordKey, raceAnswerKey } from '../../utils/questionBuilder';
import {
  isLegalNextSquare,
  isLShapeMove,
  isOnBoard,
  solveTourBacktracking,
  solveTourRandomWalk,
  solveTourWarnsdorff,
} from './algorithms';
import { evaluateKnightsTour } from './evaluators';
import { generateNextMoveScenario, generateTourInstance } from './generators';

const STRATEGY_CONCEPTS: readonly KeywordConcept[] = [
  { keyword: 'warnsdorff', description: "Warnsdorff's rule" },
  { keyword: 'heuristic', description: 'the heuristic approach' },
  { keyword: 'backtrack', description: 'backtracking out of dead ends' },
  { keyword: 'closed', description: 'closed versus open tours' },
  { keyword: 'degree', description: 'choosing squares by onward degree' },
];

export const knightsTourSolutionTemplate: QuestionTemplate = {
  id: 'knights-tour-solution',
  topicId: 'knights-tour',
  kind: 'solution',
  name: "Find a Knight's Tour",
  generate: async ({ rng, config }) => {
    const instance = generateTourInstance(rng);
    const { rows, cols } = instance;
    const reference = solveTourWarnsdorff(instance, { start: instance.start, maxSteps: config.tourStepBudget });

    return createQuestion(knightsTourSolutionTemplate, {
      problemText: `Find a knight's tour on a ${rows}x${cols} board starting at (0, 0). The knight must visit every square exactly once.`,
      answerFormat: 'A list of [row, col] squares in visiting order, e.g. [[0,0],[1,2],[2,4],...]',
      instance,
      answerKey: { kind: 'tour' },
      referenceSolution: reference.status === 'found' ? formatLiteral(reference.value) : null,
    });
  },
  evaluate: evaluateKnightsTour,
};

export const knightsTourStrategyTemplate: QuestionTemplate = {
  id: 'knights-tour-strategy',
  topicId: 'knights-tour',
  kind: 'strategy',
  name: "Knight's Tour Strategy",
  generate: async ({ rng }) => {
    const instance = generateTourInstance(rng);

    return createQuestion(knightsTourStrategyTemplate, {
      problemText: `Describe a strategy for finding a knight's tour on a ${instance.rows}x${instance.cols} board. How do you choose the next square, and what do you do at a dead end?`,
      answerFormat: 'Strategy: ...\nHeuristic: ...\nExplanation: ...',
      instance,
      answerKey: keywordKey(STRATEGY_CONCEPTS, 60, [
        'Name a heuristic for picking the next square.',
        'Explain how the search recovers from a dead end.',
        'Say whether the tour must return to its starting square.',
      ]),
    });
  },
  evaluate: evaluateKeywordAnswer,
};

export const knightsTourHeuristicTemplate: QuestionTemplate = {
  id: 'knights-tour-heuristic',
  topicId: 'knights-tour',
  kind: 'theory',
  name: "Name the Knight's Tour Heuristic",
  generate: async ({ rng }) =>
    createQuestion(knightsTourHeuristicTemplate, {
      problemText:
        "In a knight's tour search, which rule always moves the knight to the square with the fewest onward moves?",
      answerFormat: "The rule's name, e.g. 'Euler's Method'",
      instance: generateTourInstance(rng),
      answerKey: {
        kind: 'term',
        expected: "Warnsdorff's Rule",
        accepted: ["Warnsdorff's Rule", 'Warnsdorff', 'Warnsdorffs Rule'],
        maxDistance: 3,
        explanation: 'Visiting the most constrained square first leaves the easier squares for later.',
      },
      referenceSolution: "Warnsdorff's Rule",
    }),
  evaluate: evaluateTermAnswer,
};

export const knightsTourNextMoveTemplate: QuestionTemplate = {
  id: 'knights-tour-next-move',
  topicId: 'knights-tour',
  kind: 'validation',
  name: 'Validate the Next Knight Move',
  generate: async ({ rng }) => {
    const instance = generateNextMoveScenario(rng, rng() < 0.5);
    const path = instance.path ?? [];
    const next = instance.nextSquare ?? [0, 0];
    const board = { rows: instance.rows, cols: instance.cols };
    const legal = isLegalNextSquare(board, path, next);
    const last = path[path.length - 1];

    let reason = `${formatSquare(next)} is one knight move from ${formatSquare(last)} and has not been visited.`;
    if (!isOnBoard(board, next)) {
      reason = `${formatSquare(next)} is off the board.`;
    } else if (path.some(([row, col]) => row === next[0] && col === next[1])) {
      reason = `${formatSquare(next)} has already been visited.`;
    } else if (!isLShapeMove(last[0], last[1], next[0], next[1])) {
      reason = `${formatSquare(next)} is not a knight move away from ${formatSquare(last)}.`;
    }

    return createQuestion(knightsTourNextMoveTemplate, {
      problemText: `On a ${instance.rows}x${instance.cols} board the knight has visited ${formatLiteral(path)} in that order. Is ${formatSquare(next)} a legal next square?`,
      answerFormat: 'yes or no',
      instance,
      answerKey: { kind: 'yes-no', expected: legal, reason },
      referenceSolution: legal ? 'yes' : 'no',
    });
  },
  evaluate: evaluateYesNoAnswer,
};

export const knightsTourRaceTemplate: QuestionTemplate = {
  id: 'knights-tour-race',
  topicId: 'knights-tour',
  kind: 'race',
  name: "Knight's Tour Algorithm Race",
  generate: async ({ rng, config }) => {
    const instance = generateTourInstance(rng);
    const board = { rows: instance.rows, cols: instance.cols };
    const walkRng = forkRng(rng);
    const maxSteps = config.tourStepBudget;

    const racers = [
      { name: 'Backtracking', run: () => solveTourBacktracking(board, { maxSteps }).status === 'found' },
      { name: 'Warnsdorff', run: () => solveTourWarnsdorff(board, { maxSteps }).status === 'found' },
      { name: 'Random Walk', run: () => solveTourRandomWalk(board, walkRng).status === 'found' },
    ];
    const answerKey = await raceAnswerKey(racers);
    const names = racers.map((racer) => racer.name);

    return createQuestion(knightsTourRaceTemplate, {
      problemText: `On a ${board.rows}x${board.cols} board starting at (0, 0), which algorithm will find a full knight's tour first: ${names.join(' vs ')}?`,
      answerFormat: `One of: ${names.join(', ')}`,
      instance,
      answerKey,
      referenceSolution: answerKey.winner,
    });
  },
  evaluate: evaluateRaceAnswer,
};

export const KNIGHTS_TOUR_TEMPLATES: QuestionTemplate[] = [
  knightsTourSolutionTemplate,
  knightsTourStrategyTemplate,
  knightsTourHeuristicTemplate,
  knightsTourNextMoveTemplate,
  knightsTourRaceTemplate,
];
