import type { QuizConfig } from '../config';
import type { ProblemInstance, QuestionKind, RandomSource, TopicId } from './problem';

export type QuizPhase = 'setup' | 'inProgress' | 'grading' | 'review';

export interface KeywordConcept {
  keyword: string;
  description: string;
}

export interface RaceTiming {
  name: string;
  durationMs: number;
  succeeded: boolean;
}

export type AnswerKey =
  | { kind: 'placement'; knownSolutions: ReadonlyArray<readonly number[]> }
  | { kind: 'hanoi-moves'; optimalMoveCount: number }
  | { kind: 'coloring' }
  | { kind: 'tour' }
  | {
      kind: 'keywords';
      concepts: readonly KeywordConcept[];
      passThreshold: number;
      suggestions: readonly string[];
    }
  | { kind: 'integer'; expected: number; explanation: string }
  | { kind: 'yes-no'; expected: boolean; reason: string }
  | {
      kind: 'term';
      expected: string;
      accepted: readonly string[];
      maxDistance: number;
      explanation: string;
    }
  | {
      kind: 'race';
      algorithms: readonly string[];
      winner: string;
      timings: readonly RaceTiming[];
      note: string;
    };

export type RaceAnswerKey = Extract<AnswerKey, { kind: 'race' }>;

export interface Question {
  id: string;
  templateId: string;
  topicId: TopicId;
  kind: QuestionKind;
  name: string;
  problemText: string;
  answerFormat: string;
  instance: ProblemInstance;
  answerKey: AnswerKey;
  referenceSolution: string | null;
}

export type EvaluationOutcome =
  | 'correct'
  | 'partial'
  | 'incorrect'
  | 'malformed-answer'
  | 'shape-mismatch'
  | 'semantic-violation'
  | 'internal-error';

export interface EvaluationResult {
  score: number;
  feedback: readonly string[];
  isCorrect: boolean;
  outcome: EvaluationOutcome;
  referenceSolution: string | null;
}

export interface GenerationContext {
  rng: RandomSource;
  config: QuizConfig;
}

export type AnswerEvaluator = (question: Question, answer: string) => EvaluationResult;

export interface QuestionTemplate {
  id: string;
  topicId: TopicId;
  kind: QuestionKind;
  name: string;
  generate: (context: GenerationContext) => Promise<Question>;
  evaluate: AnswerEvaluator;
}

export interface QuizQuestionResponse {
  question: Question;
  userAnswer: string;
  evaluation: EvaluationResult;
}

export interface QuizQuestionView {
  index: number;
  total: number;
  problemText: string;
  answerFormat: string;
}
