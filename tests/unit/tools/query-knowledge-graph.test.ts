/**
 * query_knowledge_graph Tests
 */

import { describe, expect, test } from 'vitest';
import { QueryTooComplexError } from '@/core/errors';
import { GraphClientError } from '@/providers/graph/types';
import { checkQueryComplexity } from '@/tools';
import { createToolHarness, toolContext } from '@tests/helpers/tools';

const limits = { maxQueryLength: 60, maxMatchClauses: 2, maxRows: 10 };

describe('checkQueryComplexity', () => {
  test('accepts bounded queries', () => {
    expect(() => checkQueryComplexity('MATCH (p)-[*1..3]->(c) RETURN c', limits)).not.toThrow();
    expect(() => checkQueryComplexity('MATCH (p)-[*2]->(c) RETURN c', limits)).not.toThrow();
  });

  test('rejects long queries', () => {
    expect(() => checkQueryComplexity(`MATCH (n) RETURN n ${' '.repeat(60)}`, limits)).toThrow(
      'Query is 79 characters; the limit is 60'
    );
  });

  test('rejects too many MATCH clauses', () => {
    expect(() => checkQueryComplexity('MATCH (a) MATCH (b) match (c) RETURN a', limits)).toThrow(
      'Query has 3 MATCH clauses; the limit is 2'
    );
  });

  test('rejects unbounded variable-length patterns', () => {
    for (const pattern of ['[*]', '[r:TREATS*]', '[*2..]', '[* ..]']) {
      expect(() => checkQueryComplexity(`MATCH (a)-${pattern}->(b) RETURN b`, limits)).toThrow(
        QueryTooComplexError
      );
    }
  });
});

describe('query_knowledge_graph', () => {
  test('returns rows with a count', async () => {
    const { backend, registry } = createToolHarness();
    backend.readRows = [{ name: 'asthma' }, { name: 'gout' }];

    const result = await registry.invoke(
      'query_knowledge_graph',
      { query: 'MATCH (c:Condition {patientId: 1}) RETURN c.key AS name' },
      toolContext()
    );

    expect(result).toEqual({
      ok: true,
      data: { rows: [{ name: 'asthma' }, { name: 'gout' }], rowCount: 2, truncated: false }
    });
  });

  test('truncates to maxRows', async () => {
    const { backend, registry } = createToolHarness({ maxRows: 1 });
    backend.readRows = [{ n: 1 }, { n: 2 }, { n: 3 }];

    const result = await registry.invoke('query_knowledge_graph', { query: 'MATCH (n) RETURN n' }, toolContext());

    expect(result).toEqual({ ok: true, data: { rows: [{ n: 1 }], rowCount: 3, truncated: true } });
  });

  test('too complex queries fail without reaching the graph', async () => {
    const { backend, registry } = createToolHarness();

    const result = await registry.invoke(
      'query_knowledge_graph',
      { query: 'MATCH (a) MATCH (b) MATCH (c) RETURN a' },
      toolContext()
    );

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'QUERY_TOO_COMPLEX',
        message: 'Query has 3 MATCH clauses; the limit is 2',
        details: { reason: 'MATCH_CLAUSES' }
      }
    });
    expect(backend.reads).toHaveLength(0);
  });

  test('syntax errors come back verbatim', async () => {
    const { backend, registry } = createToolHarness();
    backend.readFailures.push(new GraphClientError("Invalid input 'MATC'", 'QUERY_SYNTAX_ERROR'));

    const result = await registry.invoke('query_knowledge_graph', { query: 'MATC (n) RETURN n' }, toolContext());

    expect(result).toEqual({
      ok: false,
      error: { code: 'QUERY_SYNTAX_ERROR', message: "Invalid input 'MATC'" }
    });
  });
});
