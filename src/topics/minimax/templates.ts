import type { QuestionTemplate } from '../../types/quiz';
import { evaluateIntegerAnswer } from '../../utils/answerEvaluators';
import { formatTree } from '../../utils/formatters';
import { createQuestion } from '../../utils/questionBuilder';
import { alphaBeta, countLeaves } from './algorithms';
import { generateMinimaxInstance } from './generators';

const TREE_NOTE =
  'Nested lists are the children of a node; numbers are leaf values. The maximizer moves at the root and the players alternate by level.';

export const minimaxValueTemplate: QuestionTemplate = {
  id: 'minimax-root-value',
  topicId: 'minimax',
  kind: 'computation',
  name: 'Minimax Root Value',
  generate: async ({ rng, config }) => {
    const instance = generateMinimaxInstance(rng, config.minimaxMaxDepth);
    const { value } = alphaBeta(instance.tree);

    return createQuestion(minimaxValueTemplate, {
      problemText: `What is the minimax value of the root of this game tree?\n${formatTree(instance.tree)}\n${TREE_NOTE}`,
      answerFormat: 'A single integer, e.g. 7',
      instance,
      answerKey: {
        kind: 'integer',
        expected: value,
        explanation: `With both players playing optimally the root is worth ${value}.`,
      },
      referenceSolution: String(value),
    });
  },
  evaluate: evaluateIntegerAnswer,
};

export const minimaxVisitedLeavesTemplate: QuestionTemplate = {
  id: 'minimax-visited-leaves',
  topicId: 'minimax',
  kind: 'computation',
  name: 'Alpha-Beta Visited Leaves',
  generate: async ({ rng, config }) => {
    const instance = generateMinimaxInstance(rng, config.minimaxMaxDepth);
    const { visitedLeaves } = alphaBeta(instance.tree);
    const total = countLeaves(instance.tree);
    const visited = visitedLeaves.length;

    return createQuestion(minimaxVisitedLeavesTemplate, {
      problemText: `Run alpha-beta pruning left to right on this game tree. How many leaf nodes are evaluated?\n${formatTree(instance.tree)}\n${TREE_NOTE}`,
      answerFormat: 'A single integer, e.g. 5',
      instance,
      answerKey: {
        kind: 'integer',
        expected: visited,
        explanation: `Alpha-beta evaluates the leaves [${visitedLeaves.join(', ')}] and prunes ${total - visited} of ${total}.`,
      },
      referenceSolution: String(visited),
    });
  },
  evaluate: evaluateIntegerAnswer,
};

export const MINIMAX_TEMPLATES: QuestionTemplate[] = [minimaxValueTemplate, minimaxVisitedLeavesTemplate];
