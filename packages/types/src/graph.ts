/**
 * Dependency graph types
 */

/**
 * Anything the graph can store: it only needs a stable, unique identifier.
 */
export interface GraphNode {
  readonly identifier: string;
}

/**
 * Graph operations accept either a node or its identifier.
 */
export type NodeRef<N extends GraphNode> = N | string;

export type EdgeEntry<N extends GraphNode, E> = readonly [source: N, destination: N, attribute: E];

export type NeighborEntry<N extends GraphNode, E> = readonly [attribute: E, neighbor: N];

/**
 * Combines the attribute of an existing edge with the attribute of a new one.
 */
export type MergeAttributes<E> = (existing: E, incoming: E) => E;

export interface GraphStats {
  nodeCount: number;
  edgeCount: number;
  rootCount: number;
}
