import { describe, expect, it } from 'vitest';
import type { EvaluationResult, QuizQuestionResponse } from '../types/quiz';
import { createQuestion } from './questionBuilder';
import { aggregateQuizStats } from './quizStatsAggregator';

const question = createQuestion(
  { id: 'minimax-root-value', topicId: 'minimax', kind: 'computation', name: 'Minimax Root Value' },
  {
    problemText: 'Root value?',
    answerFormat: 'A single integer, e.g. 7',
    instance: { topic: 'minimax', depth: 1, tree: { kind: 'leaf', value: 4 } },
    answerKey: { kind: 'integer', expected: 4, explanation: '' },
  },
);

const response = (score: number, isCorrect: boolean): QuizQuestionResponse => {
  const evaluation: EvaluationResult = {
    score,
    feedback: [],
    isCorrect,
    outcome: isCorrect ? 'correct' : 'partial',
    referenceSolution: '4',
  };
  return { question, userAnswer: '4', evaluation };
};

describe('aggregateQuizStats', () => {
  it('returns zeros without responses', () => {
    expect(aggregateQuizStats([])).toEqual({ answeredCount: 0, correctCount: 0, averageScore: 0 });
  });

  it('averages scores and counts correct answers', () => {
    expect(aggregateQuizStats([response(100, true), response(80, true), response(30, false)])).toEqual({
      answeredCount: 3,
      correctCount: 2,
      averageScore: 70,
    });
  });
});
