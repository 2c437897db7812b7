/**
 * @depweave/core - Bytecode import analysis and dependency graphs
 */

// Error types
export {
  DepweaveError,
  StructuralViolationError,
  UnitDecodeError,
  DuplicateNodeError,
  DuplicateEdgeError,
  NodeNotFoundError,
  NoSuchEdgeError,
  ConfigError,
} from './errors/DepweaveError.js';
export type { ErrorContext, ErrorSeverity, DepweaveErrorJSON } from './errors/DepweaveError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  formatMessage,
  isLogLevel,
  LOG_LEVELS,
} from './logging/Logger.js';
export type { Logger, LogLevel, LogContext } from './logging/Logger.js';

// Config
export {
  loadConfig,
  DEFAULT_CONFIG,
  validateConfig,
  validateVersion,
  validateVirtualenv,
} from './config/index.js';
export type { DepweaveConfig } from './config/index.js';

// Version
export { DEPWEAVE_VERSION, getSchemaVersion } from './version.js';

// Project context
export { createAnalysisContext } from './AnalysisContext.js';
export type { AnalysisContext, AnalysisContextOptions } from './AnalysisContext.js';

// Bytecode analysis
export { InstructionAnalyzer, analyzeBytecode } from './bytecode/InstructionAnalyzer.js';
export type { InstructionAnalyzerOptions } from './bytecode/InstructionAnalyzer.js';
export { decodeUnit, decodeInstruction, loadUnitFile } from './bytecode/decodeUnit.js';

// Dependency graph
export { DependencyGraph } from './graph/DependencyGraph.js';
export { importEdgeFromRecord, mergeImportEdges } from './graph/importEdges.js';
export type { ImportEdge } from './graph/importEdges.js';

// Paths
export { createPathAdjuster } from './paths/VirtualenvPathAdjuster.js';
export type { VirtualenvLayout, PathAdjuster } from './paths/VirtualenvPathAdjuster.js';

// Shared types
export type {
  AnalysisResult,
  CompiledUnit,
  ConstantValue,
  EdgeEntry,
  GraphNode,
  GraphStats,
  ImportRecord,
  Instruction,
  MergeAttributes,
  NeighborEntry,
  NodeRef,
  ScopeKind,
} from '@depweave/types';
export { isCompiledUnit, isConstTuple } from '@depweave/types';
