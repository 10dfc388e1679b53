import { describe, expect, it } from 'vitest';
import { minimaxValueTemplate } from '../topics/minimax/templates';
import type { EvaluationResult, Question } from '../types/quiz';
import { createQuestion } from '../utils/questionBuilder';
import {
  createQuizSessionStore,
  selectAggregateScore,
  selectCurrentQuestion,
  selectIsFinished,
  selectResponses,
} from './quizSession';

const makeQuestion = (expected: number): Question =>
  createQuestion(minimaxValueTemplate, {
    problemText: `Tree worth ${expected}`,
    answerFormat: 'A single integer, e.g. 7',
    instance: {
      topic: 'minimax',
      depth: 2,
      tree: { kind: 'branch', children: [{ kind: 'leaf', value: expected }, { kind: 'leaf', value: 1 }] },
    },
    answerKey: { kind: 'integer', expected, explanation: '' },
    referenceSolution: String(expected),
  });

const result = (score: number): EvaluationResult => ({
  score,
  feedback: [],
  isCorrect: score === 100,
  outcome: score === 100 ? 'correct' : 'incorrect',
  referenceSolution: null,
});

describe('quiz session store', () => {
  it('starts in setup with nothing to answer', () => {
    const store = createQuizSessionStore();
    expect(store.getState().phase).toBe('setup');
    expect(selectCurrentQuestion(store.getState())).toBeNull();
    expect(selectIsFinished(store.getState())).toBe(false);
    expect(selectAggregateScore(store.getState())).toBe(0);
  });

  it('walks through grading and recording each response', () => {
    const store = createQuizSessionStore();
    const questions = [makeQuestion(5), makeQuestion(9)];
    store.getState().startSession(questions);

    expect(store.getState().phase).toBe('inProgress');
    expect(selectCurrentQuestion(store.getState())).toBe(questions[0]);

    store.getState().beginGrading();
    expect(store.getState().phase).toBe('grading');
    store.getState().recordResponse(0, '5', result(100));

    expect(store.getState().phase).toBe('inProgress');
    expect(selectCurrentQuestion(store.getState())).toBe(questions[1]);

    store.getState().beginGrading();
    store.getState().recordResponse(1, '3', result(0));

    expect(store.getState().phase).toBe('review');
    expect(selectCurrentQuestion(store.getState())).toBeNull();
    expect(selectIsFinished(store.getState())).toBe(true);
    expect(selectResponses(store.getState()).map((response) => response.userAnswer)).toEqual(['5', '3']);
    expect(selectAggregateScore(store.getState())).toBe(50);
  });

  it('only grades while a question is open', () => {
    const store = createQuizSessionStore();
    expect(() => store.getState().beginGrading()).toThrow('Cannot grade an answer while the quiz is in the "setup" phase');
  });

  it('returns to the open question when grading is abandoned', () => {
    const store = createQuizSessionStore();
    store.getState().startSession([makeQuestion(4)]);
    store.getState().beginGrading();
    store.getState().abortGrading();
    expect(store.getState().phase).toBe('inProgress');
    expect(store.getState().currentIndex).toBe(0);
  });

  it('discards the previous session on start and reset', () => {
    const store = createQuizSessionStore();
    store.getState().startSession([makeQuestion(4)]);
    store.getState().beginGrading();
    store.getState().recordResponse(0, '4', result(100));

    store.getState().startSession([makeQuestion(6), makeQuestion(2)]);
    expect(store.getState().responses).toEqual({});
    expect(store.getState().currentIndex).toBe(0);

    store.getState().reset();
    expect(store.getState().phase).toBe('setup');
    expect(store.getState().questions).toEqual([]);
  });

  it('rejects a response for a question that does not exist', () => {
    const store = createQuizSessionStore();
    store.getState().startSession([makeQuestion(4)]);
    expect(() => store.getState().recordResponse(3, '4', result(100))).toThrow('No question at index 3');
  });
});
