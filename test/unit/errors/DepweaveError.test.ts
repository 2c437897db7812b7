/**
 * DepweaveError Tests
 *
 * Tests:
 * - Codes and severities of each error class
 * - instanceof chains (Error, DepweaveError, concrete class)
 * - context, suggestion and toJSON()
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  DepweaveError,
  StructuralViolationError,
  UnitDecodeError,
  DuplicateNodeError,
  DuplicateEdgeError,
  NodeNotFoundError,
  NoSuchEdgeError,
  ConfigError,
} from '@depweave/core';

describe('DepweaveError', () => {
  // ===========================================================================
  // TESTS: Codes and severities
  // ===========================================================================

  describe('codes and severities', () => {
    const cases: Array<[DepweaveError, string, string]> = [
      [new StructuralViolationError('bad stream'), 'ERR_STRUCTURAL_VIOLATION', 'fatal'],
      [new UnitDecodeError('bad dump', 'ERR_UNIT_DECODE'), 'ERR_UNIT_DECODE', 'fatal'],
      [new DuplicateNodeError('dup'), 'ERR_DUPLICATE_NODE', 'error'],
      [new DuplicateEdgeError('dup'), 'ERR_DUPLICATE_EDGE', 'error'],
      [new NodeNotFoundError('missing'), 'ERR_NODE_NOT_FOUND', 'error'],
      [new NoSuchEdgeError('missing'), 'ERR_NO_SUCH_EDGE', 'error'],
      [new ConfigError('bad config'), 'ERR_CONFIG_INVALID', 'fatal'],
    ];

    for (const [error, code, severity] of cases) {
      it(`${error.name} should have code ${code} and severity ${severity}`, () => {
        assert.strictEqual(error.code, code);
        assert.strictEqual(error.severity, severity);
      });
    }
  });

  describe('instanceof', () => {
    it('should be an Error, a DepweaveError and its own class', () => {
      const error = new NodeNotFoundError("Root 'x' not found", { identifier: 'x' });

      assert.ok(error instanceof Error);
      assert.ok(error instanceof DepweaveError);
      assert.ok(error instanceof NodeNotFoundError);
      assert.ok(!(error instanceof NoSuchEdgeError));
      assert.strictEqual(error.name, 'NodeNotFoundError');
    });

    it('should carry a stack trace', () => {
      const error = new StructuralViolationError('bad stream');

      assert.ok(error.stack?.includes('StructuralViolationError'));
    });
  });

  // ===========================================================================
  // TESTS: Context and serialization
  // ===========================================================================

  describe('context and toJSON', () => {
    it('should default context to an empty object', () => {
      const error = new DuplicateNodeError('dup');

      assert.deepStrictEqual(error.context, {});
      assert.strictEqual(error.suggestion, undefined);
    });

    it('should serialize code, severity, message, context and suggestion', () => {
      const error = new StructuralViolationError(
        'Malformed instruction stream in <module> at offset 4: names index 9 out of range',
        { unit: '<module>', offset: 4 },
        'Regenerate the unit dump',
      );

      assert.deepStrictEqual(error.toJSON(), {
        code: 'ERR_STRUCTURAL_VIOLATION',
        severity: 'fatal',
        message: 'Malformed instruction stream in <module> at offset 4: names index 9 out of range',
        context: { unit: '<module>', offset: 4 },
        suggestion: 'Regenerate the unit dump',
      });
    });

    it('should keep the code given to UnitDecodeError', () => {
      const error = new UnitDecodeError('Cannot read unit dump x.json: gone', 'ERR_UNIT_UNREADABLE', { filePath: 'x.json' });

      assert.strictEqual(error.toJSON().code, 'ERR_UNIT_UNREADABLE');
      assert.strictEqual(error.context.filePath, 'x.json');
    });
  });
});
