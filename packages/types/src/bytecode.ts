/**
 * Compiled unit model
 *
 * A compiled unit is one module, function or class body worth of decoded
 * instructions, with the constant pool and names table those instructions
 * index into. Units nest: functions, classes and comprehensions appear as
 * constants of the unit that defines them.
 */

/**
 * Binding form of name-oriented instructions.
 *
 * - name: resolved through the enclosing lexical namespace (STORE_NAME / LOAD_NAME)
 * - global: resolved directly against the module namespace (STORE_GLOBAL / LOAD_GLOBAL)
 */
export type NameForm = 'name' | 'global';

export interface LoadConstInstruction {
  readonly op: 'load-const';
  /** Index into the unit's constant pool */
  readonly arg: number;
}

export interface ImportNameInstruction {
  readonly op: 'import-name';
  /** Index into the unit's names table (the imported module) */
  readonly arg: number;
}

export interface StoreNameInstruction {
  readonly op: 'store-name';
  readonly arg: number;
  readonly form: NameForm;
}

export interface LoadNameInstruction {
  readonly op: 'load-name';
  readonly arg: number;
  readonly form: NameForm;
}

export interface MakeFunctionInstruction {
  readonly op: 'make-function';
  /** Flag bits (defaults, closure, annotations) */
  readonly arg: number;
}

export interface BuildClassInstruction {
  readonly op: 'build-class';
}

/**
 * Any instruction the analyzer does not interpret.
 * Keeps its mnemonic so positional checks and diagnostics still see it.
 */
export interface OtherInstruction {
  readonly op: 'other';
  readonly opname: string;
  readonly arg?: number;
}

export type Instruction =
  | LoadConstInstruction
  | ImportNameInstruction
  | StoreNameInstruction
  | LoadNameInstruction
  | MakeFunctionInstruction
  | BuildClassInstruction
  | OtherInstruction;

export type InstructionOp = Instruction['op'];

/**
 * Constant pool entry. Arrays are tuples.
 */
export type ConstantValue =
  | null
  | boolean
  | number
  | string
  | readonly ConstantValue[]
  | CompiledUnit;

export interface CompiledUnit {
  /** Diagnostic name (e.g. "<module>", "handler", "Config") */
  readonly name: string;
  readonly instructions: readonly Instruction[];
  readonly consts: readonly ConstantValue[];
  readonly names: readonly string[];
}

export function isCompiledUnit(value: ConstantValue | undefined): value is CompiledUnit {
  return typeof value === 'object' && value !== null && 'instructions' in value;
}

export function isConstTuple(value: ConstantValue | undefined): value is readonly ConstantValue[] {
  return Array.isArray(value);
}
