import { describe, expect, it } from 'vitest';
import { createEvaluationEngine } from '../api/evaluateQuizAnswer';
import { DEFAULT_QUIZ_CONFIG } from '../config';
import type { Question } from '../types/quiz';
import { getTopicLabel, isTopicId, PROBLEM_TOPICS, QUESTION_TEMPLATES } from './problemGenerator';
import { seededRng } from './random';

const engine = createEvaluationEngine(QUESTION_TEMPLATES);

const bestAnswer = (question: Question): string | null => {
  if (question.answerKey.kind === 'keywords') {
    return question.answerKey.concepts.map((concept) => concept.keyword).join(', ');
  }
  return question.referenceSolution;
};

describe('QUESTION_TEMPLATES', () => {
  it('has templates for every topic', () => {
    PROBLEM_TOPICS.forEach((topic) => {
      expect(QUESTION_TEMPLATES[topic.id].length).toBeGreaterThan(0);
    });
  });

  it('uses unique kebab-case template ids', () => {
    const ids = Object.values(QUESTION_TEMPLATES).flatMap((templates) => templates.map((template) => template.id));
    expect(new Set(ids).size).toBe(ids.length);
    ids.forEach((id) => expect(id).toMatch(/^[a-z]+(-[a-z]+)*$/));
  });

  describe.each(PROBLEM_TOPICS.map((topic) => topic.id))('%s', (topicId) => {
    it('generates questions whose reference answer earns full marks', async () => {
      const rng = seededRng(topicId.length * 97);

      for (const template of QUESTION_TEMPLATES[topicId]) {
        const question = await template.generate({ rng, config: DEFAULT_QUIZ_CONFIG });
        expect(question.templateId).toBe(template.id);
        expect(question.topicId).toBe(topicId);
        expect(question.instance.topic).toBe(topicId);

        const answer = bestAnswer(question);
        expect(answer).not.toBeNull();
        if (answer !== null) {
          const result = engine.evaluate(question, answer);
          expect(result.score, `${template.id}: ${result.feedback.join(' ')}`).toBe(100);
          expect(result.isCorrect).toBe(true);
        }
      }
    });
  });

  it('records a race winner that took part in the race', async () => {
    const rng = seededRng(5);
    const races = Object.values(QUESTION_TEMPLATES)
      .flat()
      .filter((template) => template.kind === 'race');

    for (const template of races) {
      const { answerKey } = await template.generate({ rng, config: DEFAULT_QUIZ_CONFIG });
      expect(answerKey.kind).toBe('race');
      if (answerKey.kind === 'race') {
        expect(answerKey.algorithms).toContain(answerKey.winner);
        expect(answerKey.timings.map((timing) => timing.name)).toEqual(answerKey.algorithms);
      }
    }
  });
});

describe('isTopicId', () => {
  it('accepts only registered topics', () => {
    expect(isTopicId('hanoi')).toBe(true);
    expect(isTopicId('sudoku')).toBe(false);
  });
});

describe('getTopicLabel', () => {
  it('returns the label for known topics', () => {
    expect(getTopicLabel('knights-tour')).toBe("Knight's Tour");
  });

  it('title-cases unknown ids and passes through empty ones', () => {
    expect(getTopicLabel('tic-tac-toe')).toBe('Tic Tac Toe');
    expect(getTopicLabel(null)).toBeNull();
    expect(getTopicLabel('')).toBeNull();
  });
});
