import { loadQuizConfig, type QuizConfig } from '../config';
import {
  createQuizSessionStore,
  selectAggregateScore,
  selectCurrentQuestion,
  type QuizSessionStore,
} from '../context/quizSession';
import type { ProblemTopic, RandomSource, TopicId } from '../types/problem';
import type { EvaluationResult, Question, QuestionTemplate, QuizQuestionView } from '../types/quiz';
import { UnknownTopicOrKindError } from '../utils/errors';
import { QUESTION_TEMPLATES, PROBLEM_TOPICS, isTopicId, type TemplateRegistry } from '../utils/problemGenerator';
import { yieldToEventLoop } from '../utils/raceAlgorithms';
import { createRandomSource, rngChoice } from '../utils/random';
import { createEvaluationEngine, type EvaluationEngine } from './evaluateQuizAnswer';

export interface QuizControllerOptions {
  registry?: TemplateRegistry;
  config?: QuizConfig;
  rng?: RandomSource;
  store?: QuizSessionStore;
}

export interface QuizController {
  store: QuizSessionStore;
  listTopics: () => ProblemTopic[];
  /** An empty list selects every topic; an unregistered topic rejects with `UnknownTopicOrKindError`. */
  startQuiz: (topics: readonly string[], count?: number) => Promise<boolean>;
  nextQuestion: () => QuizQuestionView | null;
  submitAnswer: (rawAnswer: string, onComplete?: (result: EvaluationResult) => void) => Promise<EvaluationResult>;
  getAggregateScore: () => number;
}

export const clampQuestionCount = (value: number, config: QuizConfig): number => {
  if (!Number.isFinite(value)) {
    return config.defaultQuestionCount;
  }
  return Math.min(config.maxQuestions, Math.max(config.minQuestions, Math.floor(value)));
};

export const createQuizController = ({
  registry = QUESTION_TEMPLATES,
  config = loadQuizConfig(),
  rng = createRandomSource(config.seed),
  store = createQuizSessionStore(),
}: QuizControllerOptions = {}): QuizController => {
  const engine: EvaluationEngine = createEvaluationEngine(registry);

  const listTopics = () => PROBLEM_TOPICS.filter((topic) => registry[topic.id].length > 0);

  const generateQuestion = async (template: QuestionTemplate): Promise<Question | null> => {
    try {
      return await template.generate({ rng, config });
    } catch (generationError) {
      console.error(`Failed to generate a "${template.id}" question`, generationError);
      return null;
    }
  };

  const startQuiz = async (topics: readonly string[], count = config.defaultQuestionCount): Promise<boolean> => {
    const unknownTopic = topics.find((topic) => !isTopicId(topic));
    if (unknownTopic !== undefined) {
      throw new UnknownTopicOrKindError(unknownTopic, 'any', 'not a known topic');
    }

    const selected: readonly TopicId[] = topics.length > 0 ? topics.filter(isTopicId) : listTopics().map((topic) => topic.id);
    const pool = selected.flatMap((topicId) => registry[topicId]);
    if (pool.length === 0) {
      return false;
    }

    const templates = Array.from({ length: clampQuestionCount(count, config) }, () => rngChoice(rng, pool));
    const generated = await Promise.all(templates.map(generateQuestion));
    const questions = generated.filter((question): question is Question => question !== null);

    if (questions.length === 0) {
      store.getState().reset();
      return false;
    }

    store.getState().startSession(questions);
    return true;
  };

  const nextQuestion = (): QuizQuestionView | null => {
    const state = store.getState();
    const question = selectCurrentQuestion(state);
    if (!question) {
      return null;
    }

    return {
      index: state.currentIndex,
      total: state.questions.length,
      problemText: question.problemText,
      answerFormat: question.answerFormat,
    };
  };

  const submitAnswer = async (
    rawAnswer: string,
    onComplete?: (result: EvaluationResult) => void,
  ): Promise<EvaluationResult> => {
    const state = store.getState();
    const question = selectCurrentQuestion(state);
    if (!question || state.phase !== 'inProgress') {
      throw new Error('There is no question waiting for an answer');
    }

    const index = state.currentIndex;
    state.beginGrading();
    await yieldToEventLoop();

    let evaluation: EvaluationResult;
    try {
      evaluation = engine.evaluate(question, rawAnswer);
    } catch (evaluationError) {
      store.getState().abortGrading();
      throw evaluationError;
    }

    store.getState().recordResponse(index, rawAnswer, evaluation);
    onComplete?.(evaluation);
    return evaluation;
  };

  const getAggregateScore = () => selectAggregateScore(store.getState());

  return { store, listTopics, startQuiz, nextQuestion, submitAnswer, getAggregateScore };
};
