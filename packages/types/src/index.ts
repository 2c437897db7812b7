/**
 * @depweave/types - Type definitions for depweave
 */

// Compiled unit model
export type {
  NameForm,
  LoadConstInstruction,
  ImportNameInstruction,
  StoreNameInstruction,
  LoadNameInstruction,
  MakeFunctionInstruction,
  BuildClassInstruction,
  OtherInstruction,
  Instruction,
  InstructionOp,
  ConstantValue,
  CompiledUnit,
} from './bytecode.js';
export { isCompiledUnit, isConstTuple } from './bytecode.js';

// Analysis results
export type { ScopeKind, ImportRecord, AnalysisResult } from './imports.js';

// Graph
export type {
  GraphNode,
  NodeRef,
  EdgeEntry,
  NeighborEntry,
  MergeAttributes,
  GraphStats,
} from './graph.js';
