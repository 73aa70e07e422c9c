import { DanglingEdgeError, DuplicateNodeError } from '../errors';
import type { Subgraph } from './types';

/**
 * Reject a subgraph with repeated node ids or edges whose endpoints are
 * not part of the same batch.
 *
 * @throws DuplicateNodeError
 * @throws DanglingEdgeError
 */
export function assertSubgraphConsistent(subgraph: Subgraph): void {
  const ids = new Set<string>();
  for (const node of subgraph.nodes) {
    if (ids.has(node.id)) throw new DuplicateNodeError(node.id);
    ids.add(node.id);
  }

  for (const edge of subgraph.edges) {
    if (!ids.has(edge.fromId)) throw new DanglingEdgeError(edge.type, edge.fromId);
    if (!ids.has(edge.toId)) throw new DanglingEdgeError(edge.type, edge.toId);
  }
}
