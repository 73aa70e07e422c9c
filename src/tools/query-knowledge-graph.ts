/**
 * query_knowledge_graph
 *
 * Read-only Cypher against the knowledge graph, bounded in size and shape.
 */

import { QueryTooComplexError } from '@/core/errors';
import { defineTool, ok } from '@/core/tools';
import { toToolFailure } from './failures';
import type { GraphQueryLimits, ToolDependencies } from './types';

const MATCH_CLAUSE = /\bMATCH\b/gi;
/** `[*]`, `[r:T*]`, `[*2..]`, `[*..]`: variable-length with no upper bound */
const UNBOUNDED_PATTERN = /\*\s*(?:\d+\s*\.\.\s*|\.\.\s*)?\]/;

/**
 * @throws QueryTooComplexError
 */
export function checkQueryComplexity(query: string, limits: GraphQueryLimits): void {
  if (query.length > limits.maxQueryLength) {
    throw new QueryTooComplexError(
      'LENGTH',
      `Query is ${query.length} characters; the limit is ${limits.maxQueryLength}`
    );
  }

  const matches = query.match(MATCH_CLAUSE)?.length ?? 0;
  if (matches > limits.maxMatchClauses) {
    throw new QueryTooComplexError(
      'MATCH_CLAUSES',
      `Query has ${matches} MATCH clauses; the limit is ${limits.maxMatchClauses}`
    );
  }

  if (UNBOUNDED_PATTERN.test(query)) {
    throw new QueryTooComplexError(
      'UNBOUNDED_PATTERN',
      'Variable-length patterns need an upper bound, e.g. [*1..3]'
    );
  }
}

export function queryKnowledgeGraphTool(deps: ToolDependencies) {
  const limits = deps.graphQuery;

  return defineTool({
    name: 'query_knowledge_graph',
    description:
      'Run a read-only Cypher query against the patient knowledge graph. Nodes carry ' +
      'the label ClinicalRecord plus one of Patient, Condition, Medication, Symptom, ' +
      'Encounter, LabResult, with properties patientId and key. Relationships: ' +
      'HAS_CONDITION, TAKES_MEDICATION, HAS_SYMPTOM, HAD_ENCOUNTER, HAS_LAB_RESULT, ' +
      'RECORDED_SYMPTOM, TREATS, MAY_INDICATE. Filter on patientId.',
    argumentSchema: {
      query: {
        type: 'string',
        required: true,
        description: 'Cypher query',
        constraints: { minLength: 1 }
      }
    },
    async handler({ query }, { signal }) {
      try {
        checkQueryComplexity(query, limits);
        const rows = await deps.graphStore.query(query, {}, { signal });
        return ok({
          rows: rows.slice(0, limits.maxRows),
          rowCount: rows.length,
          truncated: rows.length > limits.maxRows
        });
      } catch (error) {
        return toToolFailure(error);
      }
    }
  });
}
