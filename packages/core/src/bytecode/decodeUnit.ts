/**
 * Decoding of disassembly dumps into CompiledUnits.
 *
 * Loaders that run next to the compiler dump each code object as JSON:
 *
 * ```json
 * {
 *   "name": "<module>",
 *   "names": ["os"],
 *   "consts": [0, null, ["path"], { "name": "f", "names": [], "consts": [], "instructions": [] }],
 *   "instructions": [{ "opname": "LOAD_CONST", "arg": 0 }, { "opname": "IMPORT_NAME", "arg": 0 }]
 * }
 * ```
 *
 * Arrays in `consts` are tuples, objects are nested units. Mnemonics are mapped
 * to instruction variants here, once, so the analyzer never compares strings.
 */

import { readFileSync } from 'fs';
import type { CompiledUnit, ConstantValue, Instruction } from '@depweave/types';
import { UnitDecodeError } from '../errors/DepweaveError.js';

type KnownMnemonic =
  | 'LOAD_CONST'
  | 'IMPORT_NAME'
  | 'STORE_NAME'
  | 'STORE_GLOBAL'
  | 'LOAD_NAME'
  | 'LOAD_GLOBAL'
  | 'MAKE_FUNCTION'
  | 'LOAD_BUILD_CLASS';

const MNEMONICS: Record<KnownMnemonic, (arg: number) => Instruction> = {
  LOAD_CONST: arg => ({ op: 'load-const', arg }),
  IMPORT_NAME: arg => ({ op: 'import-name', arg }),
  STORE_NAME: arg => ({ op: 'store-name', arg, form: 'name' }),
  STORE_GLOBAL: arg => ({ op: 'store-name', arg, form: 'global' }),
  LOAD_NAME: arg => ({ op: 'load-name', arg, form: 'name' }),
  LOAD_GLOBAL: arg => ({ op: 'load-name', arg, form: 'global' }),
  MAKE_FUNCTION: arg => ({ op: 'make-function', arg }),
  LOAD_BUILD_CLASS: () => ({ op: 'build-class' }),
};

/** Mnemonics that carry no operand */
const NO_ARG: ReadonlySet<KnownMnemonic> = new Set(['LOAD_BUILD_CLASS']);

function isKnownMnemonic(opname: string): opname is KnownMnemonic {
  return Object.hasOwn(MNEMONICS, opname);
}

/**
 * Pending constant: decode `raw` and store it at `target[slot]`.
 */
interface DecodeTask {
  raw: unknown;
  path: string;
  target: ConstantValue[];
  slot: number;
}

function decodeError(path: string, detail: string): UnitDecodeError {
  return new UnitDecodeError(`Invalid unit dump at ${path}: ${detail}`, 'ERR_UNIT_DECODE', { path });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOperand(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

export function decodeInstruction(raw: unknown, path: string): Instruction {
  if (!isRecord(raw)) {
    throw decodeError(path, 'instruction must be an object');
  }
  const { opname, arg } = raw;
  if (typeof opname !== 'string' || opname.length === 0) {
    throw decodeError(path, 'opname must be a non-empty string');
  }
  if (arg !== undefined && arg !== null && !isOperand(arg)) {
    throw decodeError(path, `arg of ${opname} must be a non-negative integer`);
  }

  if (!isKnownMnemonic(opname)) {
    return isOperand(arg) ? { op: 'other', opname, arg } : { op: 'other', opname };
  }
  if (NO_ARG.has(opname)) {
    return MNEMONICS[opname](0);
  }
  if (!isOperand(arg)) {
    throw decodeError(path, `${opname} requires an arg`);
  }
  return MNEMONICS[opname](arg);
}

/**
 * Create a unit shell whose consts are filled in by later tasks.
 */
function decodeUnitShell(raw: Record<string, unknown>, path: string, tasks: DecodeTask[]): CompiledUnit {
  const { name, names, consts, instructions } = raw;

  if (typeof name !== 'string') {
    throw decodeError(path, 'name must be a string');
  }
  if (!Array.isArray(names) || !names.every((entry): entry is string => typeof entry === 'string')) {
    throw decodeError(path, 'names must be an array of strings');
  }
  if (!Array.isArray(consts)) {
    throw decodeError(path, 'consts must be an array');
  }
  if (!Array.isArray(instructions)) {
    throw decodeError(path, 'instructions must be an array');
  }

  const decodedConsts: ConstantValue[] = new Array<ConstantValue>(consts.length).fill(null);
  consts.forEach((entry: unknown, slot) => {
    tasks.push({ raw: entry, path: `${path}.consts[${slot}]`, target: decodedConsts, slot });
  });

  return {
    name,
    names: [...names],
    consts: decodedConsts,
    instructions: instructions.map((entry: unknown, i) => decodeInstruction(entry, `${path}.instructions[${i}]`)),
  };
}

/**
 * Decode a JSON disassembly dump into a CompiledUnit tree.
 *
 * Nesting is handled with an explicit task stack, so deeply nested
 * definitions do not grow the call stack.
 *
 * @throws UnitDecodeError (ERR_UNIT_DECODE) with the JSON path of the bad value
 */
export function decodeUnit(raw: unknown): CompiledUnit {
  if (!isRecord(raw)) {
    throw decodeError('$', 'root must be a unit object');
  }

  const tasks: DecodeTask[] = [];
  const root = decodeUnitShell(raw, '$', tasks);

  while (tasks.length > 0) {
    const task = tasks.pop();
    if (!task) break;
    const { raw: value, path, target, slot } = task;

    if (value === null || typeof value === 'boolean' || typeof value === 'string') {
      target[slot] = value;
    } else if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw decodeError(path, 'numeric constants must be finite');
      }
      target[slot] = value;
    } else if (Array.isArray(value)) {
      const items: ConstantValue[] = new Array<ConstantValue>(value.length).fill(null);
      value.forEach((item: unknown, i) => {
        tasks.push({ raw: item, path: `${path}[${i}]`, target: items, slot: i });
      });
      target[slot] = items;
    } else if (isRecord(value)) {
      target[slot] = decodeUnitShell(value, path, tasks);
    } else {
      throw decodeError(path, `unsupported constant of type ${typeof value}`);
    }
  }

  return root;
}

/**
 * Read and decode a unit dump from disk.
 *
 * @throws UnitDecodeError (ERR_UNIT_UNREADABLE) when the file cannot be read or parsed
 */
export function loadUnitFile(filePath: string): CompiledUnit {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw new UnitDecodeError(
      `Cannot read unit dump ${filePath}: ${error.message}`,
      'ERR_UNIT_UNREADABLE',
      { filePath },
    );
  }
  return decodeUnit(parsed);
}
