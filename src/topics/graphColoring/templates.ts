import type { GraphColoringInstance, GraphFamily } from '../../types/problem';
import type { AnswerKey, KeywordConcept, QuestionTemplate } from '../../types/quiz';
import {
  evaluateIntegerAnswer,
  evaluateKeywordAnswer,
  evaluateRaceAnswer,
  evaluateTermAnswer,
  evaluateYesNoAnswer,
} from '../../utils/answerEvaluators';
import { formatEdges, formatLiteral } from '../../utils/formatters';
import { createQuestion, keywordKey, raceAnswerKey } from '../../utils/questionBuilder';
import { rngChoice } from '../../utils/random';
import {
  checkColoring,
  isValidColoring,
  solveChromaticNumber,
  solveGreedyColoring,
  solveWelshPowellColoring,
} from './algorithms';
import { evaluateColoring } from './evaluators';
import { generateColoringScenario, generateGraphColoringInstance } from './generators';

const STRATEGY_CONCEPTS: readonly KeywordConcept[] = [
  { keyword: 'greedy', description: 'the greedy approach' },
  { keyword: 'degree', description: 'ordering vertices by degree' },
  { keyword: 'welsh-powell', description: 'the Welsh-Powell algorithm' },
  { keyword: 'backtrack', description: 'backtracking for an exact answer' },
  { keyword: 'chromatic', description: 'the chromatic number' },
];

const describeGraph = ({ graph }: GraphColoringInstance): string =>
  `a graph with ${graph.vertexCount} vertices (0 to ${graph.vertexCount - 1}) and edges ${formatEdges(graph.edges)}`;

const explainChromaticNumber = (family: GraphFamily, n: number, expected: number): string => {
  switch (family) {
    case 'complete':
      return `K${n} needs ${n} colors because every vertex is adjacent to every other.`;
    case 'cycle':
      return n % 2 === 0
        ? `An even cycle C${n} alternates between 2 colors.`
        : `An odd cycle C${n} cannot alternate 2 colors all the way round, so it needs 3.`;
    case 'bipartite':
      return 'A bipartite graph with at least one edge needs exactly 2 colors, one per side.';
    case 'random':
      return `An exhaustive search finds no proper coloring with fewer than ${expected} colors.`;
  }
};

/** The answer key for "what is the chromatic number of this graph". */
export const chromaticNumberAnswerKey = (
  instance: GraphColoringInstance,
): Extract<AnswerKey, { kind: 'integer' }> => {
  const { graph, family } = instance;
  const expected = instance.chromaticNumber ?? solveChromaticNumber(graph).chromaticNumber;

  return {
    kind: 'integer',
    expected,
    explanation: explainChromaticNumber(family, graph.vertexCount, expected),
  };
};

export const graphColoringSolutionTemplate: QuestionTemplate = {
  id: 'graph-coloring-solution',
  topicId: 'graph-coloring',
  kind: 'solution',
  name: 'Graph Coloring Solution',
  generate: async ({ rng }) => {
    const instance = generateGraphColoringInstance(rng);
    const budget = instance.colorBudget;

    return createQuestion(graphColoringSolutionTemplate, {
      problemText: `Color ${describeGraph(instance)} using at most ${budget} colors, so that no two adjacent vertices share a color.`,
      answerFormat: `A list of colors, one per vertex, each from 0 to ${budget - 1}, e.g. [0,1,0,2]`,
      instance,
      answerKey: { kind: 'coloring' },
      referenceSolution: formatLiteral(solveChromaticNumber(instance.graph).coloring),
    });
  },
  evaluate: evaluateColoring,
};

export const graphColoringStrategyTemplate: QuestionTemplate = {
  id: 'graph-coloring-strategy',
  topicId: 'graph-coloring',
  kind: 'strategy',
  name: 'Graph Coloring Strategy',
  generate: async ({ rng }) => {
    const instance = generateGraphColoringInstance(rng);

    return createQuestion(graphColoringStrategyTemplate, {
      problemText: `Describe a strategy for coloring ${describeGraph(instance)} with as few colors as possible. Which algorithms would you use, and how would you order the vertices?`,
      answerFormat: 'Strategy: ...\nAlgorithm: ...\nExplanation: ...',
      instance,
      answerKey: keywordKey(STRATEGY_CONCEPTS, 60, [
        'Compare different coloring algorithms.',
        'Explain how to choose a vertex ordering.',
        'Weigh the trade-offs between fast heuristics and exact search.',
      ]),
    });
  },
  evaluate: evaluateKeywordAnswer,
};

export const graphColoringDefinitionTemplate: QuestionTemplate = {
  id: 'graph-coloring-definition',
  topicId: 'graph-coloring',
  kind: 'theory',
  name: 'Chromatic Number Definition',
  generate: async ({ rng }) =>
    createQuestion(graphColoringDefinitionTemplate, {
      problemText:
        "Consider a graph G. The 'minimum number of colors needed to color the vertices of G so that no two adjacent vertices share the same color' is known by what name?",
      answerFormat: "The name, e.g. 'Color Count'",
      instance: generateGraphColoringInstance(rng),
      answerKey: {
        kind: 'term',
        expected: 'the Chromatic Number',
        accepted: ['Chromatic Number'],
        maxDistance: 3,
        explanation: 'The chromatic number is usually written χ(G).',
      },
      referenceSolution: 'Chromatic Number',
    }),
  evaluate: evaluateTermAnswer,
};

export const graphColoringChromaticNumberTemplate: QuestionTemplate = {
  id: 'graph-coloring-chromatic-number',
  topicId: 'graph-coloring',
  kind: 'computation',
  name: 'Find the Chromatic Number',
  generate: async ({ rng }) => {
    const instance = generateGraphColoringInstance(rng, {
      family: rngChoice(rng, ['complete', 'cycle', 'bipartite'] as const),
    });
    const answerKey = chromaticNumberAnswerKey(instance);

    return createQuestion(graphColoringChromaticNumberTemplate, {
      problemText: `What is the chromatic number of ${describeGraph(instance)}?`,
      answerFormat: 'A single integer, e.g. 3',
      instance,
      answerKey,
      referenceSolution: String(answerKey.expected),
    });
  },
  evaluate: evaluateIntegerAnswer,
};

export const graphColoringValidationTemplate: QuestionTemplate = {
  id: 'graph-coloring-validation',
  topicId: 'graph-coloring',
  kind: 'validation',
  name: 'Validate a Coloring',
  generate: async ({ rng }) => {
    const instance = generateColoringScenario(rng, rng() < 0.5);
    const coloring = instance.coloring ?? [];
    const check = checkColoring(instance.graph, coloring);

    let reason = 'Every edge joins two differently colored vertices.';
    if (!check.valid) {
      reason =
        check.reason === 'adjacent-same-color'
          ? `Vertices ${check.u} and ${check.v} are adjacent but share color ${check.color}.`
          : `Vertex ${check.vertex} has no color.`;
    }

    return createQuestion(graphColoringValidationTemplate, {
      problemText: `For ${describeGraph(instance)}, is the coloring ${formatLiteral(coloring)} valid? (index = vertex, value = color)`,
      answerFormat: 'yes or no',
      instance,
      answerKey: { kind: 'yes-no', expected: check.valid, reason },
      referenceSolution: check.valid ? 'yes' : 'no',
    });
  },
  evaluate: evaluateYesNoAnswer,
};

export const graphColoringRaceTemplate: QuestionTemplate = {
  id: 'graph-coloring-race',
  topicId: 'graph-coloring',
  kind: 'race',
  name: 'Graph Coloring Algorithm Race',
  generate: async ({ rng }) => {
    const instance = generateGraphColoringInstance(rng, { family: 'random', minVertices: 8, maxVertices: 12 });
    const { graph } = instance;
    const racers = [
      { name: 'Simple Greedy', run: () => isValidColoring(graph, solveGreedyColoring(graph)) },
      { name: 'Welsh-Powell', run: () => isValidColoring(graph, solveWelshPowellColoring(graph)) },
    ];
    const answerKey = await raceAnswerKey(racers);

    return createQuestion(graphColoringRaceTemplate, {
      problemText: `For ${describeGraph(instance)}, which algorithm will find a valid coloring first: Simple Greedy or Welsh-Powell (largest degree first)?`,
      answerFormat: 'One of: Simple Greedy, Welsh-Powell',
      instance,
      answerKey,
      referenceSolution: answerKey.winner,
    });
  },
  evaluate: evaluateRaceAnswer,
};

export const GRAPH_COLORING_TEMPLATES: QuestionTemplate[] = [
  graphColoringSolutionTemplate,
  graphColoringStrategyTemplate,
  graphColoringDefinitionTemplate,
  graphColoringChromaticNumberTemplate,
  graphColoringValidationTemplate,
  graphColoringRaceTemplate,
];
