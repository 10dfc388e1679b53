import type { QuizQuestionResponse } from '../types/quiz';

export interface QuizAggregatedStats {
  answeredCount: number;
  correctCount: number;
  averageScore: number;
}

const clampScore = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0;
  }

  if (value < 0) {
    return 0;
  }

  if (value > 100) {
    return 100;
  }

  return value;
};

export const aggregateQuizStats = (
  responses: readonly QuizQuestionResponse[],
): QuizAggregatedStats => {
  if (responses.length === 0) {
    return {
      answeredCount: 0,
      correctCount: 0,
      averageScore: 0,
    };
  }

  const scores = responses.map((response) => clampScore(response.evaluation.score));
  const sumScores = scores.reduce((total, value) => total + value, 0);
  const correctCount = responses.filter((response) => response.evaluation.isCorrect).length;

  return {
    answeredCount: responses.length,
    correctCount,
    averageScore: sumScores / scores.length,
  };
};
