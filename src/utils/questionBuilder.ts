import { randomUUID } from 'node:crypto';
import type { ProblemInstance, RandomSource } from '../types/problem';
import type { AnswerKey, KeywordConcept, Question, QuestionTemplate, RaceAnswerKey } from '../types/quiz';
import { raceAlgorithms, type RaceEntry } from './raceAlgorithms';
import { rngInt, seededRng } from './random';

export const createQuestionId = () => `quiz-question-${randomUUID()}`;

type TemplateIdentity = Pick<QuestionTemplate, 'id' | 'topicId' | 'kind' | 'name'>;

export interface QuestionContent {
  problemText: string;
  answerFormat: string;
  instance: ProblemInstance;
  answerKey: AnswerKey;
  referenceSolution?: string | null;
}

export const createQuestion = (template: TemplateIdentity, content: QuestionContent): Question =>
  Object.freeze({
    id: createQuestionId(),
    templateId: template.id,
    topicId: template.topicId,
    kind: template.kind,
    name: template.name,
    problemText: content.problemText,
    answerFormat: content.answerFormat,
    instance: content.instance,
    answerKey: content.answerKey,
    referenceSolution: content.referenceSolution ?? null,
  });

export const keywordKey = (
  concepts: readonly KeywordConcept[],
  passThreshold: number,
  suggestions: readonly string[],
): AnswerKey => ({ kind: 'keywords', concepts, passThreshold, suggestions });

export const RACE_NOTE = 'Timings were measured when this question was generated and vary from run to run.';

/** Independent random stream per racer so no solver consumes another's draws. */
export const forkRng = (rng: RandomSource): RandomSource => seededRng(rngInt(rng, 1, 2_147_483_646));

/** Runs the racers once and records the measurement as the answer key. */
export const raceAnswerKey = async (entries: readonly RaceEntry[]): Promise<RaceAnswerKey> => {
  const { winner, timings } = await raceAlgorithms(entries);
  return {
    kind: 'race',
    algorithms: entries.map((entry) => entry.name),
    winner,
    timings,
    note: RACE_NOTE,
  };
};
