import type { ForeignKeyEdgeRow } from './schema-prober.js';
import type { RelationshipGraph } from './types/metadata.types.js';

/**
 * Group foreign-key edges by source table. Tables without outgoing keys get no entry,
 * and edges keep their discovery order (duplicates included).
 */
export function buildRelationshipGraph(edges: ForeignKeyEdgeRow[]): RelationshipGraph {
  const graph: RelationshipGraph = {};

  for (const edge of edges) {
    const outgoing = graph[edge.fromTable] ?? [];
    outgoing.push({ fromColumn: edge.fromColumn, toTable: edge.toTable, toColumn: edge.toColumn });
    graph[edge.fromTable] = outgoing;
  }

  return graph;
}
