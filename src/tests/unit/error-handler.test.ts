import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  formatErrorDetails,
  handleInitializationError,
  handleMigrationError,
  isDuplicateObjectError,
  isMissingTableError,
} from '../../utils/error-handler.js';

describe('formatErrorDetails', () => {
  it('should describe Error instances by class', () => {
    const details = formatErrorDetails(new TypeError('bad value'));
    assert.strictEqual(details.message, 'bad value');
    assert.strictEqual(details.errorType, 'TypeError');
    assert.ok(details.stack?.includes('bad value'));
  });

  it('should stringify values that are not errors', () => {
    assert.deepStrictEqual(formatErrorDetails('plain'), { message: 'plain', errorType: 'string' });
    assert.deepStrictEqual(formatErrorDetails(42), { message: '42', errorType: 'number' });
  });
});

describe('error classification', () => {
  it('should recognise missing tables on every engine', () => {
    assert.strictEqual(isMissingTableError(new Error('SQLITE_ERROR: no such table: indexes')), true);
    assert.strictEqual(isMissingTableError(new Error("Table 'oci.indexes' doesn't exist")), true);
    assert.strictEqual(isMissingTableError(new Error('relation "indexes" does not exist')), true);
    assert.strictEqual(isMissingTableError(new Error('FOREIGN KEY constraint failed')), false);
  });

  it('should recognise objects that already exist', () => {
    assert.strictEqual(isDuplicateObjectError(new Error('index idx_manifests_image_id already exists')), true);
    assert.strictEqual(isDuplicateObjectError(new Error("Duplicate key name 'idx_manifests_image_id'")), true);
    assert.strictEqual(isDuplicateObjectError('no such table: manifests'), false);
  });
});

describe('handleMigrationError', () => {
  it('should prefix the context and keep the original as cause', () => {
    const original = new Error('FOREIGN KEY constraint failed');
    const wrapped = handleMigrationError('Step manifests:copy-rows', original);

    assert.strictEqual(wrapped.message, 'Step manifests:copy-rows failed: FOREIGN KEY constraint failed');
    assert.strictEqual(wrapped.cause, original);
  });

  it('should wrap thrown values that are not errors', () => {
    assert.strictEqual(handleMigrationError('Migration', 'lock timeout').message, 'Migration failed: lock timeout');
  });
});

describe('handleInitializationError', () => {
  it('should return the message to report', () => {
    assert.strictEqual(handleInitializationError(new Error('SQLITE_CANTOPEN')), 'SQLITE_CANTOPEN');
  });
});
