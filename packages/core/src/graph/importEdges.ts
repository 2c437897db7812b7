/**
 * Edge attributes for module dependency graphs.
 *
 * One edge links an importing module to an imported one. Several import
 * statements between the same pair collapse into a single edge whose
 * attribute is merged with mergeImportEdges().
 */

import type { ImportRecord } from '@depweave/types';

export interface ImportEdge {
  /** Names pulled in through `from ... import` lists */
  readonly names: ReadonlySet<string>;
  readonly hasStarImport: boolean;
  /** True only while every import behind this edge sits in a function body */
  readonly isConditional: boolean;
}

export function importEdgeFromRecord(record: ImportRecord): ImportEdge {
  return {
    names: new Set(record.names),
    hasStarImport: record.hasStarImport,
    isConditional: record.isConditional,
  };
}

/**
 * Merge function for DependencyGraph.addEdge().
 *
 * An unconditional import anywhere makes the whole relationship unconditional.
 */
export function mergeImportEdges(existing: ImportEdge, incoming: ImportEdge): ImportEdge {
  return {
    names: new Set([...existing.names, ...incoming.names]),
    hasStarImport: existing.hasStarImport || incoming.hasStarImport,
    isConditional: existing.isConditional && incoming.isConditional,
  };
}
