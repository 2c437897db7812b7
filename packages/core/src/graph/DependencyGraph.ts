/**
 * DependencyGraph - identifier-keyed directed graph with attributed edges
 *
 * Nodes are caller-owned values exposing a stable `identifier`. Storage is an
 * arena: nodes live in a dense array and everything else refers to them by
 * index. Each ordered pair of nodes has at most one edge; a second add either
 * fails or merges attributes through a caller-supplied function.
 *
 * The graph only grows: there is no removal of nodes, edges or roots.
 *
 * Not safe for concurrent mutation. Build it from one writer, then share it
 * for read-only traversal.
 */

import type {
  EdgeEntry,
  GraphNode,
  GraphStats,
  MergeAttributes,
  NeighborEntry,
  NodeRef,
} from '@depweave/types';
import {
  DuplicateEdgeError,
  DuplicateNodeError,
  NodeNotFoundError,
  NoSuchEdgeError,
} from '../errors/DepweaveError.js';

/**
 * Edge attribute holder, shared by the outgoing and incoming tables so a
 * merge updates both directions at once.
 */
interface EdgeSlot<E> {
  value: E;
}

type EdgeTable<E> = Map<number, Map<number, EdgeSlot<E>>>;

function tableFor<E>(table: EdgeTable<E>, index: number): Map<number, EdgeSlot<E>> {
  let row = table.get(index);
  if (!row) {
    row = new Map();
    table.set(index, row);
  }
  return row;
}

function identifierOf<N extends GraphNode>(ref: NodeRef<N>): string {
  return typeof ref === 'string' ? ref : ref.identifier;
}

export class DependencyGraph<N extends GraphNode, E = unknown> {
  private readonly nodeList: N[] = [];
  private readonly indexById = new Map<string, number>();
  private readonly rootIndexes = new Set<number>();
  /** source index -> destination index -> attribute */
  private readonly outEdges: EdgeTable<E> = new Map();
  /** destination index -> source index -> attribute (mirror of outEdges) */
  private readonly inEdges: EdgeTable<E> = new Map();
  private edgeCount = 0;

  // ========================================
  // Mutation
  // ========================================

  /**
   * @throws DuplicateNodeError if a node with the same identifier exists
   */
  addNode(node: N): void {
    if (this.indexById.has(node.identifier)) {
      throw new DuplicateNodeError(
        `Already have node with identifier '${node.identifier}'`,
        { identifier: node.identifier },
      );
    }
    this.indexById.set(node.identifier, this.nodeList.length);
    this.nodeList.push(node);
  }

  /**
   * Mark an existing node as a root. Marking a root again is a no-op.
   *
   * @throws NodeNotFoundError if the node is absent
   */
  addRoot(ref: NodeRef<N>): void {
    this.rootIndexes.add(this.requireIndex(ref, 'Root'));
  }

  /**
   * Add a directed edge. When the edge exists, `merge` decides the new
   * attribute; without `merge` the second add fails.
   *
   * @throws NodeNotFoundError if either endpoint is absent
   * @throws DuplicateEdgeError if the edge exists and no merge function is given
   */
  addEdge(source: NodeRef<N>, destination: NodeRef<N>, attribute: E, merge?: MergeAttributes<E>): void {
    const from = this.requireIndex(source, 'Source');
    const to = this.requireIndex(destination, 'Destination');

    const existing = this.outEdges.get(from)?.get(to);
    if (existing) {
      if (!merge) {
        const src = this.nodeList[from].identifier;
        const dst = this.nodeList[to].identifier;
        throw new DuplicateEdgeError(
          `Edge between '${src}' and '${dst}' already exists`,
          { source: src, destination: dst },
          'Pass a merge function to combine edge attributes',
        );
      }
      existing.value = merge(existing.value, attribute);
      return;
    }

    const slot: EdgeSlot<E> = { value: attribute };
    tableFor(this.outEdges, from).set(to, slot);
    tableFor(this.inEdges, to).set(from, slot);
    this.edgeCount++;
  }

  // ========================================
  // Lookup
  // ========================================

  findNode(ref: NodeRef<N>): N | undefined {
    const index = this.indexById.get(identifierOf(ref));
    return index === undefined ? undefined : this.nodeList[index];
  }

  hasNode(ref: NodeRef<N>): boolean {
    return this.indexById.has(identifierOf(ref));
  }

  isRoot(ref: NodeRef<N>): boolean {
    const index = this.indexById.get(identifierOf(ref));
    return index !== undefined && this.rootIndexes.has(index);
  }

  /**
   * Attribute stored on the edge source -> destination.
   *
   * @throws NodeNotFoundError if either endpoint is absent
   * @throws NoSuchEdgeError if both exist but are not linked
   */
  edgeData(source: NodeRef<N>, destination: NodeRef<N>): E {
    const from = this.requireIndex(source, 'Source');
    const to = this.requireIndex(destination, 'Destination');
    const slot = this.outEdges.get(from)?.get(to);
    if (!slot) {
      const src = this.nodeList[from].identifier;
      const dst = this.nodeList[to].identifier;
      throw new NoSuchEdgeError(`There is no edge between '${src}' and '${dst}'`, { source: src, destination: dst });
    }
    return slot.value;
  }

  stats(): GraphStats {
    return {
      nodeCount: this.nodeList.length,
      edgeCount: this.edgeCount,
      rootCount: this.rootIndexes.size,
    };
  }

  toString(): string {
    const { nodeCount, edgeCount, rootCount } = this.stats();
    return `<DependencyGraph with ${rootCount} roots, ${nodeCount} nodes and ${edgeCount} edges>`;
  }

  // ========================================
  // Iteration (fresh generator per call)
  // ========================================

  /** Roots in the order they were first marked */
  *roots(): Generator<N> {
    for (const index of this.rootIndexes) {
      yield this.nodeList[index];
    }
  }

  *nodes(): Generator<N> {
    yield* this.nodeList;
  }

  *edges(): Generator<EdgeEntry<N, E>> {
    for (const [from, targets] of this.outEdges) {
      for (const [to, slot] of targets) {
        yield [this.nodeList[from], this.nodeList[to], slot.value];
      }
    }
  }

  /**
   * [attribute, destination] for each edge leaving `source`.
   * Yields nothing when the node is absent; callers that need to tell
   * "no node" from "no edges" must check hasNode() first.
   */
  *outgoing(source: NodeRef<N>): Generator<NeighborEntry<N, E>> {
    const index = this.indexById.get(identifierOf(source));
    if (index === undefined) return;
    for (const [to, slot] of this.outEdges.get(index) ?? []) {
      yield [slot.value, this.nodeList[to]];
    }
  }

  /**
   * [attribute, source] for each edge entering `destination`.
   * Same permissive contract as outgoing().
   */
  *incoming(destination: NodeRef<N>): Generator<NeighborEntry<N, E>> {
    const index = this.indexById.get(identifierOf(destination));
    if (index === undefined) return;
    for (const [from, slot] of this.inEdges.get(index) ?? []) {
      yield [slot.value, this.nodeList[from]];
    }
  }

  /**
   * Depth-first reachability, each node yielded once, before anything
   * reachable only through it.
   *
   * Without `start`, walks from every root in turn, sharing one visited set.
   * With `start`, yields the closure of that node.
   *
   * @throws NodeNotFoundError immediately if `start` is given and absent
   */
  iterGraph(start?: NodeRef<N>): Generator<N> {
    const starts = start === undefined
      ? [...this.rootIndexes]
      : [this.requireIndex(start, 'Start node')];
    return this.walk(starts);
  }

  // ========================================
  // Internals
  // ========================================

  /**
   * Preorder DFS with an explicit stack of neighbor iterators.
   */
  private *walk(starts: number[]): Generator<N> {
    const visited = new Set<number>();

    for (const start of starts) {
      if (visited.has(start)) continue;
      visited.add(start);
      yield this.nodeList[start];

      const stack: Iterator<number>[] = [this.successors(start)];
      while (stack.length > 0) {
        const next = stack[stack.length - 1].next();
        if (next.done) {
          stack.pop();
          continue;
        }
        const index = next.value;
        if (visited.has(index)) continue;
        visited.add(index);
        yield this.nodeList[index];
        stack.push(this.successors(index));
      }
    }
  }

  private successors(index: number): Iterator<number> {
    return (this.outEdges.get(index) ?? new Map<number, EdgeSlot<E>>()).keys();
  }

  private requireIndex(ref: NodeRef<N>, role: string): number {
    const identifier = identifierOf(ref);
    const index = this.indexById.get(identifier);
    if (index === undefined) {
      throw new NodeNotFoundError(`${role} '${identifier}' not found`, { identifier });
    }
    return index;
  }
}
