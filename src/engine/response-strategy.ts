/**
 * Response planning: which answer shape fits the query type, and which
 * entities the answer should focus on or steer away from.
 */

import { QueryType, ResponseStrategy } from '../config/types';
import { containsPhrase } from '../extraction/text';
import { MemorySnapshot } from '../memory/types';
import { RetrievalHints } from './types';

const HOW_TO = /^\s*(how (do|can|should|would) (i|we)|what steps|what should (i|we) do)\b/i;

export function planStrategy(queryType: QueryType, query: string): ResponseStrategy {
  switch (queryType) {
    case 'initial':
      return HOW_TO.test(query) ? 'actionable_steps' : 'strategic_advice';
    case 'deepen':
    case 'clarify':
      return 'depth';
    case 'expand':
      return 'breadth';
    case 'compare':
      return 'compare';
    case 'new_topic':
      return 'strategic_advice';
  }
}

export const STRATEGY_INSTRUCTIONS: Record<ResponseStrategy, string> = {
  breadth:
    'Give a wide overview of several options. Cover three to five different entities with a short description of each.',
  depth:
    'Go deep on the specific topic or entity. Include background, track record, concrete examples and nuanced insight.',
  compare:
    'Compare the named entities side by side and make the key differences explicit.',
  strategic_advice:
    'Give strategic advice: weigh the options, explain why each matters and recommend where to start.',
  actionable_steps:
    'Lay out concrete, numbered next steps the user can act on, with names and specifics where known.',
};

export type EntityPlan = RetrievalHints;

/** Entity names from the snapshot's covered set that `query` mentions. */
function coveredIn(query: string, snapshot: MemorySnapshot): string[] {
  return snapshot.coveredEntities.filter((name) => containsPhrase(query, name));
}

/**
 * Which entities to include and exclude for a query:
 * compare focuses on the compared entities, deepen on the drill target,
 * expand avoids everything covered, the rest avoid the last two turns.
 */
export function planEntities(
  queryType: QueryType,
  query: string,
  queryEntities: string[],
  snapshot: MemorySnapshot,
): EntityPlan {
  const named = [...new Set([...coveredIn(query, snapshot), ...queryEntities])];

  switch (queryType) {
    case 'compare':
      return {
        include: named,
        exclude: snapshot.coveredEntities.filter((name) => !named.includes(name)),
      };
    case 'deepen': {
      const lastTurn = snapshot.shortTerm[snapshot.shortTerm.length - 1];
      const target = named[0] ?? lastTurn?.entities[0];
      if (!target) return { include: [], exclude: [...snapshot.coveredEntities] };
      return {
        include: [target],
        exclude: snapshot.coveredEntities.filter((name) => name !== target),
      };
    }
    case 'expand':
      return { include: [], exclude: [...snapshot.coveredEntities] };
    default: {
      const recent = snapshot.shortTerm.slice(-2).flatMap((entry) => entry.entities);
      return { include: named, exclude: [...new Set(recent)].filter((name) => !named.includes(name)) };
    }
  }
}
