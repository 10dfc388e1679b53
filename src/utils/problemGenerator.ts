import { GRAPH_COLORING_TEMPLATES } from '../topics/graphColoring/templates';
import { HANOI_TEMPLATES } from '../topics/hanoi/templates';
import { KNIGHTS_TOUR_TEMPLATES } from '../topics/knightsTour/templates';
import { MINIMAX_TEMPLATES } from '../topics/minimax/templates';
import { N_QUEENS_TEMPLATES } from '../topics/nQueens/templates';
import type { ProblemTopic, TopicId } from '../types/problem';
import type { QuestionTemplate } from '../types/quiz';

export const PROBLEM_TOPICS: ProblemTopic[] = [
  {
    id: 'n-queens',
    label: 'N-Queens',
    description: 'Place N queens on an NxN board so that no two attack each other.',
  },
  {
    id: 'hanoi',
    label: 'Tower of Hanoi',
    description: 'Move a stack of disks between pegs without placing a larger disk on a smaller one.',
  },
  {
    id: 'graph-coloring',
    label: 'Graph Coloring',
    description: 'Color the vertices of a graph so that adjacent vertices differ.',
  },
  {
    id: 'knights-tour',
    label: "Knight's Tour",
    description: 'Move a knight so that it visits every square of the board exactly once.',
  },
  {
    id: 'minimax',
    label: 'Minimax & Alpha-Beta',
    description: 'Evaluate game trees with minimax and count what alpha-beta pruning visits.',
  },
];

export type TemplateRegistry = Readonly<Record<TopicId, readonly QuestionTemplate[]>>;

export const QUESTION_TEMPLATES: TemplateRegistry = {
  'n-queens': N_QUEENS_TEMPLATES,
  hanoi: HANOI_TEMPLATES,
  'graph-coloring': GRAPH_COLORING_TEMPLATES,
  'knights-tour': KNIGHTS_TOUR_TEMPLATES,
  minimax: MINIMAX_TEMPLATES,
};

export const isTopicId = (value: string): value is TopicId =>
  PROBLEM_TOPICS.some((topic) => topic.id === value);

export const getTopicLabel = (topicId: string | null | undefined): string | null => {
  if (!topicId) {
    return null;
  }

  const topic = PROBLEM_TOPICS.find((item) => item.id === topicId);
  if (topic) {
    return topic.label;
  }

  return topicId
    .split('-')
    .map((segment) => segment.charAt(0).toUpperCase() + segment.slice(1))
    .join(' ');
};
