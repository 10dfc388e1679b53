import type { KeywordConcept, QuestionTemplate } from '../../types/quiz';
import {
  evaluateKeywordAnswer,
  evaluateRaceAnswer,
  evaluateYesNoAnswer,
} from '../../utils/answerEvaluators';
import { formatLiteral } from '../../utils/formatters';
import { createQuestion, forkRng, keywordKey, raceAnswerKey } from '../../utils/questionBuilder';
import { rngInt, rngSample } from '../../utils/random';
import {
  findNQueensSolutionsMultiStart,
  findQueenConflicts,
  solveNQueensBacktracking,
  solveNQueensHillClimbing,
  solveNQueensSimulatedAnnealing,
} from './algorithms';
import { describeQueenConflict, evaluateQueensPlacement } from './evaluators';
import { generateNQueensInstance, generateQueensPlacementInstance } from './generators';

const PLACEMENT_FORMAT = 'A list of row positions, one per column, e.g. [1,3,0,2]';

const firstSolution = (n: number): number[] | null => {
  const result = solveNQueensBacktracking(n);
  return result.status === 'found' ? result.value : null;
};

const complexityConcepts = (n: number): KeywordConcept[] => [
  { keyword: 'O(N!)', description: 'the O(N!) worst-case time complexity' },
  { keyword: 'recursive', description: 'the recursive structure of the search' },
  { keyword: 'backtrack', description: 'backtracking out of dead ends' },
  { keyword: `${n}!`, description: `the ${n}! bound for this board` },
  { keyword: 'solutions', description: 'how many solutions the board has' },
];

export const nQueensSolutionTemplate: QuestionTemplate = {
  id: 'n-queens-solution',
  topicId: 'n-queens',
  kind: 'solution',
  name: 'Place N Queens',
  generate: async ({ rng, config }) => {
    const instance = generateNQueensInstance(rng);
    const { solutions, timedOut } = await findNQueensSolutionsMultiStart(instance.size, {
      maxSolutions: config.nQueensMaxSolutions,
      timeoutMs: config.nQueensSearchTimeoutMs,
    });

    if (solutions.length === 0 && timedOut) {
      console.warn(`No N-Queens solutions discovered for N=${instance.size} within ${config.nQueensSearchTimeoutMs}ms`);
    }

    const reference = solutions[0] ?? firstSolution(instance.size);

    return createQuestion(nQueensSolutionTemplate, {
      problemText: `Place ${instance.size} queens on a ${instance.size}x${instance.size} board so that no two attack each other. Give the row of the queen in each column.`,
      answerFormat: PLACEMENT_FORMAT,
      instance,
      answerKey: { kind: 'placement', knownSolutions: solutions },
      referenceSolution: reference ? formatLiteral(reference) : null,
    });
  },
  evaluate: evaluateQueensPlacement,
};

export const nQueensComplexityTemplate: QuestionTemplate = {
  id: 'n-queens-complexity',
  topicId: 'n-queens',
  kind: 'complexity',
  name: 'N-Queens Complexity',
  generate: async ({ rng }) => {
    const instance = generateNQueensInstance(rng);
    const n = instance.size;

    return createQuestion(nQueensComplexityTemplate, {
      problemText: `For the ${n}-Queens problem, analyze the backtracking solution:\n1. What is its worst-case time complexity?\n2. How does the search space grow for N = ${n}?`,
      answerFormat: 'Time Complexity: O(...)\nExplanation: ...',
      instance,
      answerKey: keywordKey(complexityConcepts(n), 80, [
        'Explain why the bound is factorial.',
        'Describe how placing one queen per column prunes the search.',
        'Mention how many distinct solutions exist.',
      ]),
    });
  },
  evaluate: evaluateKeywordAnswer,
};

export const nQueensValidationTemplate: QuestionTemplate = {
  id: 'n-queens-validation',
  topicId: 'n-queens',
  kind: 'validation',
  name: 'Validate a Queens Placement',
  generate: async ({ rng }) => {
    const instance = generateQueensPlacementInstance(rng, rng() < 0.5);
    const placement = instance.placement ?? [];
    const conflicts = findQueenConflicts(placement);
    const valid = conflicts.length === 0;

    return createQuestion(nQueensValidationTemplate, {
      problemText: `On a ${instance.size}x${instance.size} board the queens stand at rows ${formatLiteral(placement)} (index = column, value = row). Is this a valid N-Queens solution?`,
      answerFormat: 'yes or no',
      instance,
      answerKey: {
        kind: 'yes-no',
        expected: valid,
        reason: valid ? 'No two queens share a row or a diagonal.' : describeQueenConflict(conflicts[0]),
      },
      referenceSolution: valid ? 'yes' : 'no',
    });
  },
  evaluate: evaluateYesNoAnswer,
};

export const nQueensRaceTemplate: QuestionTemplate = {
  id: 'n-queens-race',
  topicId: 'n-queens',
  kind: 'race',
  name: 'N-Queens Algorithm Race',
  generate: async ({ rng }) => {
    const instance = generateNQueensInstance(rng, 6, 8);
    const n = instance.size;
    const hillRng = forkRng(rng);
    const annealingRng = forkRng(rng);

    const racers = rngSample(
      rng,
      [
        { name: 'Backtracking', run: () => solveNQueensBacktracking(n).status === 'found' },
        { name: 'Hill Climbing', run: () => solveNQueensHillClimbing(n, hillRng).status === 'found' },
        {
          name: 'Simulated Annealing',
          run: () => solveNQueensSimulatedAnnealing(n, annealingRng).status === 'found',
        },
      ],
      rngInt(rng, 2, 3),
    );
    const answerKey = await raceAnswerKey(racers);
    const names = racers.map((racer) => racer.name);

    return createQuestion(nQueensRaceTemplate, {
      problemText: `For a ${n}x${n} board, which algorithm will find a single valid placement first: ${names.join(' vs ')}?`,
      answerFormat: `One of: ${names.join(', ')}`,
      instance,
      answerKey,
      referenceSolution: answerKey.winner,
    });
  },
  evaluate: evaluateRaceAnswer,
};

export const N_QUEENS_TEMPLATES: QuestionTemplate[] = [
  nQueensSolutionTemplate,
  nQueensComplexityTemplate,
  nQueensValidationTemplate,
  nQueensRaceTemplate,
];
