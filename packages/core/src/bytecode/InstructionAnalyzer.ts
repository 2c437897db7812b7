/**
 * InstructionAnalyzer - import and global-name extraction from compiled units
 *
 * Walks a root unit and every unit nested in its constant pool, breadth-first
 * through an explicit work queue, and reports:
 * - every import statement (module, level, from-list, star, conditional)
 * - global names written from module-level code
 * - global names read from module-level, class-level and function code
 *
 * Operands of IMPORT_NAME and MAKE_FUNCTION are not carried by the instruction
 * itself; they are the constants loaded by the instructions right before it:
 *
 *   LOAD_CONST level ; LOAD_CONST fromlist ; IMPORT_NAME module
 *   LOAD_BUILD_CLASS ; LOAD_CONST <unit> ; LOAD_CONST qualname ; MAKE_FUNCTION
 *
 * Anything that breaks this layout raises StructuralViolationError.
 */

import type {
  AnalysisResult,
  CompiledUnit,
  ConstantValue,
  ImportRecord,
  Instruction,
  ScopeKind,
} from '@depweave/types';
import { isCompiledUnit, isConstTuple } from '@depweave/types';
import { StructuralViolationError } from '../errors/DepweaveError.js';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';

const STAR = '*';

/**
 * A unit waiting in the work queue, with the scope it executes in.
 */
interface PendingUnit {
  unit: CompiledUnit;
  scope: ScopeKind;
  /** Inside a function body, directly or through any ancestor */
  conditional: boolean;
  /** Dotted path of unit names from the root, for diagnostics */
  path: string;
}

/**
 * Per-unit partial result
 */
interface UnitScan {
  imports: ImportRecord[];
  globalsWritten: Set<string>;
  globalsRead: Set<string>;
  /** Scope of nested units turned into functions/classes, by constant index */
  definitions: Map<number, ScopeKind>;
}

export interface InstructionAnalyzerOptions {
  logger?: Logger;
}

export class InstructionAnalyzer {
  private readonly logger: Logger;

  constructor(options: InstructionAnalyzerOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger('warnings');
  }

  /**
   * Analyze a root unit and everything nested in it.
   *
   * @throws StructuralViolationError on malformed instruction streams
   */
  analyze(root: CompiledUnit): AnalysisResult {
    const result: AnalysisResult = {
      imports: [],
      globalsWritten: new Set(),
      globalsRead: new Set(),
    };

    const queue: PendingUnit[] = [{ unit: root, scope: 'module', conditional: false, path: root.name }];
    let head = 0;

    while (head < queue.length) {
      const pending = queue[head++];
      const scan = this.scanUnit(pending);

      result.imports.push(...scan.imports);
      for (const name of scan.globalsWritten) result.globalsWritten.add(name);
      for (const name of scan.globalsRead) result.globalsRead.add(name);

      this.logger.trace('Scanned unit', {
        unit: pending.path,
        scope: pending.scope,
        conditional: pending.conditional,
        imports: scan.imports.length,
      });

      pending.unit.consts.forEach((constant, index) => {
        if (!isCompiledUnit(constant)) return;
        const scope = scan.definitions.get(index) ?? (pending.conditional ? 'function' : 'module');
        queue.push({
          unit: constant,
          scope,
          conditional: pending.conditional || scope === 'function',
          path: `${pending.path}.${constant.name}`,
        });
      });
    }

    this.logger.debug('Bytecode analysis complete', {
      unit: root.name,
      units: queue.length,
      imports: result.imports.length,
      globalsWritten: result.globalsWritten.size,
      globalsRead: result.globalsRead.size,
    });

    return result;
  }

  private scanUnit(pending: PendingUnit): UnitScan {
    const { unit, scope } = pending;
    const scan: UnitScan = {
      imports: [],
      globalsWritten: new Set(),
      globalsRead: new Set(),
      definitions: new Map(),
    };
    const instructions = unit.instructions;

    for (let offset = 0; offset < instructions.length; offset++) {
      const inst = instructions[offset];

      switch (inst.op) {
        case 'import-name': {
          const level = this.precedingConst(pending, offset, 2);
          const fromlist = this.precedingConst(pending, offset, 1);
          const record = this.importRecord(pending, offset, this.nameAt(pending, offset, inst.arg), level, fromlist);
          scan.imports.push(record);
          // `from X import Y` at module level binds Y in the module namespace
          if (scope === 'module') {
            for (const name of record.names) scan.globalsWritten.add(name);
          }
          break;
        }

        case 'store-name':
          if (scope === 'class') break;
          scan.globalsWritten.add(this.nameAt(pending, offset, inst.arg));
          break;

        case 'load-name':
          if (scope === 'class' && inst.form === 'name') break;
          scan.globalsRead.add(this.nameAt(pending, offset, inst.arg));
          break;

        case 'make-function': {
          const index = this.precedingConstIndex(pending, offset, 2);
          if (!isCompiledUnit(unit.consts[index])) {
            throw this.violation(pending, offset, 'make-function is not preceded by a compiled unit constant');
          }
          const isClassBody = offset >= 3 && instructions[offset - 3].op === 'build-class';
          scan.definitions.set(index, isClassBody ? 'class' : 'function');
          break;
        }

        case 'load-const':
        case 'build-class':
        case 'other':
          break;

        default:
          return assertNever(inst);
      }
    }

    return scan;
  }

  private importRecord(
    pending: PendingUnit,
    offset: number,
    module: string,
    level: ConstantValue,
    fromlist: ConstantValue,
  ): ImportRecord {
    if (typeof level !== 'number' || !Number.isInteger(level) || level < 0) {
      throw this.violation(pending, offset, `import level must be a non-negative integer, got ${describeConstant(level)}`);
    }

    const names = new Set<string>();
    let hasStarImport = false;

    if (fromlist !== null) {
      if (!isConstTuple(fromlist)) {
        throw this.violation(pending, offset, `import fromlist must be a tuple or None, got ${describeConstant(fromlist)}`);
      }
      for (const entry of fromlist) {
        if (typeof entry !== 'string') {
          throw this.violation(pending, offset, `import fromlist entries must be strings, got ${describeConstant(entry)}`);
        }
        if (entry === STAR) {
          hasStarImport = true;
        } else {
          names.add(entry);
        }
      }
    }

    return {
      module,
      level,
      names,
      hasStarImport,
      isConditional: pending.conditional,
    };
  }

  /**
   * Constant-pool index loaded by the instruction `distance` slots before `offset`.
   */
  private precedingConstIndex(pending: PendingUnit, offset: number, distance: number): number {
    const position = offset - distance;
    const inst: Instruction | undefined = position >= 0 ? pending.unit.instructions[position] : undefined;
    if (inst?.op !== 'load-const') {
      const found = inst ? describeInstruction(inst) : 'start of unit';
      throw this.violation(pending, offset, `expected load-const ${distance} instruction(s) earlier, found ${found}`);
    }
    if (inst.arg < 0 || inst.arg >= pending.unit.consts.length) {
      throw this.violation(pending, position, `constant index ${inst.arg} out of range`);
    }
    return inst.arg;
  }

  private precedingConst(pending: PendingUnit, offset: number, distance: number): ConstantValue {
    return pending.unit.consts[this.precedingConstIndex(pending, offset, distance)];
  }

  private nameAt(pending: PendingUnit, offset: number, index: number): string {
    const name: string | undefined = pending.unit.names[index];
    if (name === undefined) {
      throw this.violation(pending, offset, `names index ${index} out of range`);
    }
    return name;
  }

  private violation(pending: PendingUnit, offset: number, detail: string): StructuralViolationError {
    return new StructuralViolationError(
      `Malformed instruction stream in ${pending.path} at offset ${offset}: ${detail}`,
      { unit: pending.path, offset },
      'The unit was produced by an unsupported compiler or decoded incorrectly',
    );
  }
}

/**
 * Analyze a root unit with a one-off analyzer.
 */
export function analyzeBytecode(root: CompiledUnit, logger?: Logger): AnalysisResult {
  return new InstructionAnalyzer({ logger }).analyze(root);
}

function describeInstruction(inst: Instruction): string {
  return inst.op === 'other' ? inst.opname : inst.op;
}

function describeConstant(value: ConstantValue | undefined): string {
  if (value === undefined) return 'nothing';
  if (isCompiledUnit(value)) return `<unit ${value.name}>`;
  if (isConstTuple(value)) return `tuple(${value.length})`;
  return JSON.stringify(value);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled instruction: ${JSON.stringify(value)}`);
}
