import { config as loadEnv } from 'dotenv';

export interface QuizConfig {
  defaultQuestionCount: number;
  minQuestions: number;
  maxQuestions: number;
  nQueensSearchTimeoutMs: number;
  nQueensMaxSolutions: number;
  tourStepBudget: number;
  minimaxMaxDepth: number;
  seed: number | null;
}

export const DEFAULT_QUIZ_CONFIG: QuizConfig = {
  defaultQuestionCount: 10,
  minQuestions: 1,
  maxQuestions: 20,
  nQueensSearchTimeoutMs: 5000,
  nQueensMaxSolutions: 4,
  tourStepBudget: 2_000_000,
  minimaxMaxDepth: 4,
  seed: null,
};

type EnvSource = Record<string, string | undefined>;

const readPositiveInt = (value: string | undefined, fallback: number): number => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return fallback;
  }

  const parsed = Number.parseInt(value.trim(), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const readSeed = (value: string | undefined): number | null => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return null;
  }

  const parsed = Number.parseInt(value.trim(), 10);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * Reads quiz settings from the environment. A `.env` file in the working
 * directory is loaded first when `env` is `process.env`.
 */
export const loadQuizConfig = (env: EnvSource = process.env): QuizConfig => {
  if (env === process.env) {
    loadEnv();
  }

  const minQuestions = readPositiveInt(env.QUIZ_MIN_QUESTIONS, DEFAULT_QUIZ_CONFIG.minQuestions);
  const maxQuestions = Math.max(
    minQuestions,
    readPositiveInt(env.QUIZ_MAX_QUESTIONS, DEFAULT_QUIZ_CONFIG.maxQuestions),
  );
  const defaultQuestionCount = Math.min(
    maxQuestions,
    Math.max(
      minQuestions,
      readPositiveInt(env.QUIZ_QUESTION_COUNT, DEFAULT_QUIZ_CONFIG.defaultQuestionCount),
    ),
  );

  return {
    defaultQuestionCount,
    minQuestions,
    maxQuestions,
    nQueensSearchTimeoutMs: readPositiveInt(
      env.QUIZ_NQUEENS_TIMEOUT_MS,
      DEFAULT_QUIZ_CONFIG.nQueensSearchTimeoutMs,
    ),
    nQueensMaxSolutions: readPositiveInt(
      env.QUIZ_NQUEENS_MAX_SOLUTIONS,
      DEFAULT_QUIZ_CONFIG.nQueensMaxSolutions,
    ),
    tourStepBudget: readPositiveInt(env.QUIZ_TOUR_STEP_BUDGET, DEFAULT_QUIZ_CONFIG.tourStepBudget),
    minimaxMaxDepth: Math.max(
      3,
      readPositiveInt(env.QUIZ_MINIMAX_MAX_DEPTH, DEFAULT_QUIZ_CONFIG.minimaxMaxDepth),
    ),
    seed: readSeed(env.QUIZ_SEED),
  };
};
