import type { QuestionKind, TopicId } from '../types/problem';

/** A question or template that the registry cannot dispatch. Always a wiring defect. */
export class UnknownTopicOrKindError extends Error {
  constructor(
    readonly topicId: TopicId | string,
    readonly kind: QuestionKind | string,
    detail?: string,
  ) {
    super(
      `No evaluator is registered for topic "${topicId}" and kind "${kind}"${detail ? `: ${detail}` : ''}`,
    );
    this.name = 'UnknownTopicOrKindError';
  }
}

/** Wraps an unexpected exception raised while grading an answer. */
export class EvaluationInternalError extends Error {
  constructor(
    readonly questionId: string,
    cause: unknown,
  ) {
    super(
      `Evaluation of question ${questionId} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'EvaluationInternalError';
  }
}
