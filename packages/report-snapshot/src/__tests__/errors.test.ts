/**
 * Tests for snapshot errors
 */

import { describe, it, expect } from 'vitest';
import {
  DatasetMismatchError,
  DeserializationError,
  IncompatibleFormatError,
  SnapshotError,
  isSnapshotError,
} from '../errors.js';

describe('snapshot errors', () => {
  it('should prefix the cause message on DeserializationError', () => {
    const cause = new SyntaxError('Unexpected end of JSON input');
    const error = new DeserializationError(cause);

    expect(error.message).toBe('Failed to load data: Unexpected end of JSON input');
    expect(error.code).toBe('SNAPSHOT_DECODE_FAILED');
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('DeserializationError');
  });

  it('should stringify non-Error causes', () => {
    expect(new DeserializationError('bad bytes').message).toBe('Failed to load data: bad bytes');
  });

  it('should keep the failed checks on IncompatibleFormatError', () => {
    const error = new IncompatibleFormatError(['title: Expected string, received number']);

    expect(error.code).toBe('SNAPSHOT_INCOMPATIBLE_FORMAT');
    expect(error.failures).toEqual(['title: Expected string, received number']);
  });

  it('should recognize every snapshot error', () => {
    expect(isSnapshotError(new DatasetMismatchError('a', 'b'))).toBe(true);
    expect(isSnapshotError(new IncompatibleFormatError([]))).toBe(true);
    expect(new DatasetMismatchError(null, 'b')).toBeInstanceOf(SnapshotError);
    expect(isSnapshotError(new Error('other'))).toBe(false);
  });
});
