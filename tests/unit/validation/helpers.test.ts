/**
 * Unit Tests for Validation Helper Functions
 *
 * Tests validateInput, describeIssues and the shared base schemas
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  DatabaseOpenInput,
  MaxContentLength,
  SqlIdentifier,
  ValidationError,
  describeIssues,
  validateInput,
} from '../../../src/utils/validation.js';

describe('validateInput', () => {
  it('should return validated data for valid input', () => {
    const result = validateInput(DatabaseOpenInput, { path: '/tmp/project' });
    expect(result.path).toBe('/tmp/project');
  });

  it('should throw ValidationError for invalid input', () => {
    expect(() => validateInput(DatabaseOpenInput, { path: '' })).toThrow(ValidationError);
  });

  it('should include field path in error message', () => {
    expect(() => validateInput(DatabaseOpenInput, { path: '' })).toThrow('path: Path is required');
  });
});

describe('describeIssues', () => {
  it('joins every issue with its path', () => {
    const result = z.object({ a: z.string(), b: z.number() }).safeParse({ a: 1 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(describeIssues(result.error)).toBe(
        'a: Expected string, received number; b: Required'
      );
    }
  });

  it('omits the path for root issues', () => {
    const result = z.string().safeParse(5);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(describeIssues(result.error)).toBe('Expected string, received number');
    }
  });
});

describe('SqlIdentifier', () => {
  it('accepts plain names', () => {
    expect(SqlIdentifier.safeParse('documents_v2').success).toBe(true);
  });

  it('rejects anything that would need quoting', () => {
    for (const name of ['', '1abc', 'has space', 'semi;colon', 'dash-name']) {
      expect(SqlIdentifier.safeParse(name).success, name).toBe(false);
    }
  });
});

describe('MaxContentLength', () => {
  it('accepts omitted, null, zero and positive integers', () => {
    for (const value of [undefined, null, 0, 1, 400]) {
      expect(MaxContentLength.safeParse(value).success, String(value)).toBe(true);
    }
  });

  it('rejects negatives and fractions', () => {
    expect(MaxContentLength.safeParse(-5).success).toBe(false);
    expect(MaxContentLength.safeParse(2.5).success).toBe(false);
  });
});
