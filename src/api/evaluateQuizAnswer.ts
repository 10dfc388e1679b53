import type { EvaluationResult, Question, QuestionTemplate } from '../types/quiz';
import { internalErrorResult } from '../utils/answerEvaluators';
import { EvaluationInternalError, UnknownTopicOrKindError } from '../utils/errors';
import { QUESTION_TEMPLATES, type TemplateRegistry } from '../utils/problemGenerator';

export interface EvaluationEngine {
  evaluate: (question: Question, rawAnswer: string) => EvaluationResult;
  findTemplate: (question: Question) => QuestionTemplate;
}

export const normalizeAnswer = (rawAnswer: string): string => rawAnswer.trim().replace(/\s+/g, ' ');

const indexTemplates = (registry: TemplateRegistry): Map<string, QuestionTemplate> => {
  const templates = new Map<string, QuestionTemplate>();

  for (const [topicId, entries] of Object.entries(registry)) {
    for (const template of entries) {
      if (template.topicId !== topicId) {
        throw new UnknownTopicOrKindError(
          template.topicId,
          template.kind,
          `template "${template.id}" is registered under "${topicId}"`,
        );
      }
      if (templates.has(template.id)) {
        throw new UnknownTopicOrKindError(template.topicId, template.kind, `duplicate template id "${template.id}"`);
      }
      templates.set(template.id, template);
    }
  }

  return templates;
};

/**
 * Dispatches answers to the evaluator of the template that built the question.
 * Unknown templates raise `UnknownTopicOrKindError`; anything an evaluator throws
 * is logged and reported as an internal-error result.
 */
export const createEvaluationEngine = (registry: TemplateRegistry = QUESTION_TEMPLATES): EvaluationEngine => {
  const templates = indexTemplates(registry);

  const findTemplate = (question: Question): QuestionTemplate => {
    const template = templates.get(question.templateId);
    if (!template) {
      throw new UnknownTopicOrKindError(question.topicId, question.kind, `unknown template "${question.templateId}"`);
    }
    if (template.topicId !== question.topicId || template.kind !== question.kind) {
      throw new UnknownTopicOrKindError(
        question.topicId,
        question.kind,
        `template "${template.id}" serves "${template.topicId}" / "${template.kind}"`,
      );
    }
    return template;
  };

  const evaluate = (question: Question, rawAnswer: string): EvaluationResult => {
    const template = findTemplate(question);
    const answer = normalizeAnswer(rawAnswer);

    try {
      return template.evaluate(question, answer);
    } catch (error) {
      console.error('Failed to evaluate quiz answer', new EvaluationInternalError(question.id, error));
      return internalErrorResult(question);
    }
  };

  return { evaluate, findTemplate };
};

let defaultEngine: EvaluationEngine | null = null;

/** Grades against the built-in registry. */
export const evaluateQuizAnswer = (question: Question, rawAnswer: string): EvaluationResult => {
  if (!defaultEngine) {
    defaultEngine = createEvaluationEngine();
  }
  return defaultEngine.evaluate(question, rawAnswer);
};
