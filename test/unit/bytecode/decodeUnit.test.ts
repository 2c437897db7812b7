/**
 * Unit dump decoding tests
 *
 * Tests:
 * - Mnemonic mapping (name/global forms, build-class, unknown opcodes)
 * - Constant decoding: scalars, tuples, nested units
 * - UnitDecodeError paths for malformed dumps
 * - loadUnitFile reading from disk
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import {
  decodeUnit,
  decodeInstruction,
  loadUnitFile,
  analyzeBytecode,
  isCompiledUnit,
  UnitDecodeError,
  MultiLogger,
} from '@depweave/core';

function assertDecodeError(fn: () => unknown, code: string, path: string) {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof UnitDecodeError, 'should be UnitDecodeError');
    assert.strictEqual(err.code, code);
    assert.strictEqual(err.context.path, path);
    return true;
  });
}

describe('decodeInstruction', () => {
  it('should map name and global forms of stores and loads', () => {
    assert.deepStrictEqual(decodeInstruction({ opname: 'STORE_NAME', arg: 1 }, '$'), { op: 'store-name', arg: 1, form: 'name' });
    assert.deepStrictEqual(decodeInstruction({ opname: 'STORE_GLOBAL', arg: 1 }, '$'), { op: 'store-name', arg: 1, form: 'global' });
    assert.deepStrictEqual(decodeInstruction({ opname: 'LOAD_NAME', arg: 2 }, '$'), { op: 'load-name', arg: 2, form: 'name' });
    assert.deepStrictEqual(decodeInstruction({ opname: 'LOAD_GLOBAL', arg: 2 }, '$'), { op: 'load-name', arg: 2, form: 'global' });
  });

  it('should decode LOAD_BUILD_CLASS without an operand', () => {
    assert.deepStrictEqual(decodeInstruction({ opname: 'LOAD_BUILD_CLASS' }, '$'), { op: 'build-class' });
  });

  it('should keep unknown opcodes as other', () => {
    assert.deepStrictEqual(decodeInstruction({ opname: 'RETURN_VALUE', arg: null }, '$'), { op: 'other', opname: 'RETURN_VALUE' });
    assert.deepStrictEqual(decodeInstruction({ opname: 'STORE_FAST', arg: 3 }, '$'), { op: 'other', opname: 'STORE_FAST', arg: 3 });
  });

  it('should require an operand for known opcodes that take one', () => {
    assertDecodeError(() => decodeInstruction({ opname: 'IMPORT_NAME' }, '$.instructions[4]'), 'ERR_UNIT_DECODE', '$.instructions[4]');
  });

  it('should reject negative operands', () => {
    assert.throws(
      () => decodeInstruction({ opname: 'LOAD_CONST', arg: -1 }, '$.instructions[0]'),
      { message: 'Invalid unit dump at $.instructions[0]: arg of LOAD_CONST must be a non-negative integer' }
    );
  });

  it('should not treat inherited object keys as mnemonics', () => {
    assert.deepStrictEqual(decodeInstruction({ opname: 'toString', arg: 0 }, '$'), { op: 'other', opname: 'toString', arg: 0 });
  });
});

describe('decodeUnit', () => {
  it('should decode scalars, tuples and nested units', () => {
    const unit = decodeUnit({
      name: '<module>',
      names: ['os', 'f'],
      consts: [0, null, ['path', 'sep'], true, 'f', { name: 'f', names: [], consts: [], instructions: [] }],
      instructions: [
        { opname: 'LOAD_CONST', arg: 0 },
        { opname: 'LOAD_CONST', arg: 2 },
        { opname: 'IMPORT_NAME', arg: 0 },
      ],
    });

    assert.strictEqual(unit.name, '<module>');
    assert.deepStrictEqual(unit.names, ['os', 'f']);
    assert.deepStrictEqual(unit.consts.slice(0, 5), [0, null, ['path', 'sep'], true, 'f']);
    assert.deepStrictEqual(unit.consts[5], { name: 'f', names: [], consts: [], instructions: [] });
    assert.ok(isCompiledUnit(unit.consts[5]));
    assert.deepStrictEqual(unit.instructions[2], { op: 'import-name', arg: 0 });
  });

  it('should report the JSON path of a bad nested constant', () => {
    const dump = {
      name: '<module>',
      names: [],
      consts: [{ name: 'f', names: [], consts: [[1, { bad: true }]], instructions: [] }],
      instructions: [],
    };

    assertDecodeError(() => decodeUnit(dump), 'ERR_UNIT_DECODE', '$.consts[0].consts[0][1]');
  });

  it('should report the path of a bad instruction in a nested unit', () => {
    const dump = {
      name: '<module>',
      names: [],
      consts: [{ name: 'f', names: [], consts: [], instructions: [{ opname: '' }] }],
      instructions: [],
    };

    assert.throws(() => decodeUnit(dump), {
      message: 'Invalid unit dump at $.consts[0].instructions[0]: opname must be a non-empty string',
    });
  });

  it('should reject a root that is not an object', () => {
    assertDecodeError(() => decodeUnit([]), 'ERR_UNIT_DECODE', '$');
  });

  it('should reject non-string names', () => {
    assert.throws(
      () => decodeUnit({ name: 'm', names: [1], consts: [], instructions: [] }),
      { message: 'Invalid unit dump at $: names must be an array of strings' }
    );
  });

  it('should reject non-finite numeric constants', () => {
    assertDecodeError(
      () => decodeUnit({ name: 'm', names: [], consts: [Infinity], instructions: [] }),
      'ERR_UNIT_DECODE',
      '$.consts[0]'
    );
  });

  it('should decode deeply nested units without recursion', () => {
    let dump: Record<string, unknown> = { name: 'f0', names: [], consts: [], instructions: [] };
    for (let i = 1; i < 5000; i++) {
      dump = { name: `f${i}`, names: [], consts: [dump], instructions: [] };
    }

    const unit = decodeUnit(dump);

    assert.strictEqual(unit.name, 'f4999');
  });

  it('should produce units the analyzer accepts', () => {
    const unit = decodeUnit({
      name: '<module>',
      names: ['os'],
      consts: [0, null],
      instructions: [
        { opname: 'LOAD_CONST', arg: 0 },
        { opname: 'LOAD_CONST', arg: 1 },
        { opname: 'IMPORT_NAME', arg: 0 },
        { opname: 'STORE_NAME', arg: 0 },
      ],
    });

    const result = analyzeBytecode(unit, new MultiLogger([]));

    assert.deepStrictEqual(result.imports.map(r => r.module), ['os']);
    assert.deepStrictEqual(result.globalsWritten, new Set(['os']));
  });
});

describe('loadUnitFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'depweave-units-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read and decode a dump from disk', () => {
    const filePath = join(tempDir, 'mod.json');
    writeFileSync(filePath, JSON.stringify({ name: 'mod', names: [], consts: [], instructions: [] }));

    assert.deepStrictEqual(loadUnitFile(filePath), { name: 'mod', names: [], consts: [], instructions: [] });
  });

  it('should raise ERR_UNIT_UNREADABLE for a missing file', () => {
    const filePath = join(tempDir, 'missing.json');

    assert.throws(() => loadUnitFile(filePath), (err: unknown) => {
      assert.ok(err instanceof UnitDecodeError);
      assert.strictEqual(err.code, 'ERR_UNIT_UNREADABLE');
      assert.strictEqual(err.context.filePath, filePath);
      return true;
    });
  });

  it('should raise ERR_UNIT_UNREADABLE for invalid JSON', () => {
    const filePath = join(tempDir, 'broken.json');
    writeFileSync(filePath, '{ not json');

    assert.throws(() => loadUnitFile(filePath), (err: unknown) => {
      assert.ok(err instanceof UnitDecodeError);
      assert.strictEqual(err.code, 'ERR_UNIT_UNREADABLE');
      return true;
    });
  });
});
