import type { EvaluationResult, Question } from '../../types/quiz';
import { parseIntegerList } from '../../utils/answerParser';
import { malformedAnswer, scoredResult, semanticViolation, shapeMismatch } from '../../utils/answerEvaluators';
import { checkColoring, countColors, solveChromaticNumber } from './algorithms';

/** 100 with the minimum number of colors, 90 for any other proper coloring within budget. */
export const evaluateColoring = (question: Question, answer: string): EvaluationResult => {
  const { instance } = question;
  if (instance.topic !== 'graph-coloring') {
    throw new Error(`Question ${question.id} does not hold a graph coloring instance`);
  }

  const parsed = parseIntegerList(answer);
  if (!parsed.ok) {
    return malformedAnswer(question, parsed.error);
  }

  const { graph, colorBudget } = instance;
  const coloring = parsed.value;
  if (coloring.length !== graph.vertexCount) {
    return shapeMismatch(
      question,
      `Expected one color for each of the ${graph.vertexCount} vertices, but got ${coloring.length}.`,
    );
  }

  const outOfRange = coloring.findIndex((color) => color < 0 || color >= colorBudget);
  if (outOfRange >= 0) {
    return shapeMismatch(
      question,
      `Color ${coloring[outOfRange]} for vertex ${outOfRange} is outside 0 to ${colorBudget - 1}.`,
    );
  }

  const check = checkColoring(graph, coloring);
  if (!check.valid) {
    return semanticViolation(question, [
      check.reason === 'adjacent-same-color'
        ? `Vertices ${check.u} and ${check.v} are adjacent but share color ${check.color}.`
        : `Vertex ${check.vertex} has no color.`,
    ]);
  }

  const chromaticNumber = instance.chromaticNumber ?? solveChromaticNumber(graph).chromaticNumber;
  const used = countColors(coloring);
  if (used === chromaticNumber) {
    return scoredResult(question, 100, [`Correct! A valid coloring with the minimum of ${used} colors.`]);
  }
  return scoredResult(
    question,
    90,
    [`Valid coloring with ${used} colors; this graph can be colored with ${chromaticNumber}.`],
    90,
  );
};
