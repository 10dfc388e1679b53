import { createStore, type StoreApi } from 'zustand/vanilla';
import type { EvaluationResult, Question, QuizPhase, QuizQuestionResponse } from '../types/quiz';
import { aggregateQuizStats } from '../utils/quizStatsAggregator';

export interface QuizSessionState {
  phase: QuizPhase;
  questions: readonly Question[];
  currentIndex: number;
  responses: Readonly<Record<number, QuizQuestionResponse>>;
  startSession: (questions: readonly Question[]) => void;
  beginGrading: () => void;
  abortGrading: () => void;
  recordResponse: (index: number, userAnswer: string, evaluation: EvaluationResult) => void;
  reset: () => void;
}

export type QuizSessionStore = StoreApi<QuizSessionState>;

const EMPTY_SESSION = {
  phase: 'setup',
  questions: [],
  currentIndex: 0,
  responses: {},
} satisfies Pick<QuizSessionState, 'phase' | 'questions' | 'currentIndex' | 'responses'>;

export const createQuizSessionStore = (): QuizSessionStore =>
  createStore<QuizSessionState>((set, get) => ({
    ...EMPTY_SESSION,
    startSession: (questions) =>
      set({
        phase: questions.length > 0 ? 'inProgress' : 'setup',
        questions: [...questions],
        currentIndex: 0,
        responses: {},
      }),
    beginGrading: () => {
      if (get().phase !== 'inProgress') {
        throw new Error(`Cannot grade an answer while the quiz is in the "${get().phase}" phase`);
      }
      set({ phase: 'grading' });
    },
    abortGrading: () => {
      if (get().phase === 'grading') {
        set({ phase: 'inProgress' });
      }
    },
    recordResponse: (index, userAnswer, evaluation) => {
      const { questions, responses } = get();
      const question = questions[index];
      if (!question) {
        throw new Error(`No question at index ${index}`);
      }

      const nextIndex = index + 1;
      set({
        responses: { ...responses, [index]: { question, userAnswer, evaluation } },
        currentIndex: nextIndex,
        phase: nextIndex >= questions.length ? 'review' : 'inProgress',
      });
    },
    reset: () => set({ ...EMPTY_SESSION }),
  }));

export const selectCurrentQuestion = (state: QuizSessionState): Question | null =>
  state.phase === 'inProgress' || state.phase === 'grading' ? (state.questions[state.currentIndex] ?? null) : null;

export const selectIsFinished = (state: QuizSessionState): boolean =>
  state.questions.length > 0 && state.currentIndex >= state.questions.length;

export const selectResponses = (state: QuizSessionState): QuizQuestionResponse[] =>
  Object.keys(state.responses)
    .map(Number)
    .sort((a, b) => a - b)
    .map((index) => state.responses[index]);

/** Mean score of the recorded responses, 0 before any answer. */
export const selectAggregateScore = (state: QuizSessionState): number =>
  aggregateQuizStats(selectResponses(state)).averageScore;
