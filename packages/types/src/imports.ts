/**
 * Import analysis result types
 */

/**
 * Scope a compiled unit executes in.
 *
 * Determines whether its bindings and lookups touch the module namespace.
 */
export type ScopeKind = 'module' | 'function' | 'class';

export interface ImportRecord {
  /** Dotted module name as written ("a.b.c"); empty for `from . import x` */
  readonly module: string;
  /** Relative-import depth, 0 = absolute */
  readonly level: number;
  /** Names from an explicit `from ... import` list, never containing "*" */
  readonly names: ReadonlySet<string>;
  readonly hasStarImport: boolean;
  /**
   * True when the import sits in a function body (directly or nested), so it
   * may run zero or many times instead of exactly once at load time.
   */
  readonly isConditional: boolean;
}

export interface AnalysisResult {
  /** Discovery order: parent unit before children, siblings in constant-pool order */
  imports: ImportRecord[];
  globalsWritten: Set<string>;
  globalsRead: Set<string>;
}
