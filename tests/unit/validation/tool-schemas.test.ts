/**
 * Unit Tests for Tool Input Schemas
 */

import { describe, it, expect } from 'vitest';
import { ExtractInput, SqlQueryInput, validateInput } from '../../../src/utils/validation.js';

describe('SqlQueryInput', () => {
  it('trims the query and keeps an explicit null limit', () => {
    const input = validateInput(SqlQueryInput, { query: '  SELECT 1  ', max_content_length: null });
    expect(input).toEqual({ query: 'SELECT 1', max_content_length: null });
  });

  it('leaves the limit undefined when omitted', () => {
    const input = validateInput(SqlQueryInput, { query: 'SELECT 1' });
    expect(input.max_content_length).toBeUndefined();
  });

  it('rejects a non-string query', () => {
    expect(() => validateInput(SqlQueryInput, { query: 42 })).toThrow(
      'query: Expected string, received number'
    );
  });
});

describe('ExtractInput', () => {
  it('accepts a key alone', () => {
    expect(validateInput(ExtractInput, { key: ' abc ' })).toEqual({ key: 'abc' });
  });

  it('accepts a title with a table restriction', () => {
    expect(validateInput(ExtractInput, { title: 'SSH', table: 'discussions' })).toEqual({
      title: 'SSH',
      table: 'discussions',
    });
  });

  it('rejects requests with neither key nor title', () => {
    expect(() => validateInput(ExtractInput, { save_to_file: true })).toThrow(
      'key: Provide key or title (or both)'
    );
  });

  it('rejects blank keys', () => {
    expect(() => validateInput(ExtractInput, { key: '   ' })).toThrow(/^key: /);
  });

  it('accepts file options', () => {
    const input = validateInput(ExtractInput, { key: 'k', save_to_file: true, output_dir: '/tmp/out' });
    expect(input.save_to_file).toBe(true);
    expect(input.output_dir).toBe('/tmp/out');
  });
});
