/**
 * Unit Tests for Extraction MCP Tools
 *
 * Tests handleExtract in src/tools/extract.ts against real memory-bank
 * databases, including the file written for save_to_file.
 *
 * @module tests/unit/tools/extract
 */

import { describe, it, expect, beforeEach, afterEach, afterAll } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { extractTools, handleExtract } from '../../../src/tools/extract.js';
import { handleSqlQuery } from '../../../src/tools/query.js';
import { openDatabase, resetState, updateConfig } from '../../../src/server/state.js';
import {
  cleanupAllTempDirs,
  createMemoryBank,
  createTempDir,
  insertRecords,
  wordText,
} from '../database/helpers.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

interface ToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: { category: string; message: string };
}

function parseResponse(response: { content: Array<{ type: string; text: string }> }): ToolResponse {
  return JSON.parse(response.content[0].text);
}

const BODY = wordText(1200);

function openSeededDatabase(omit: Array<'artifacts'> = []): string {
  const dbPath = createMemoryBank(createTempDir('tools-extract'), omit);
  insertRecords(dbPath, 'discussions', [
    { uuid: 'c0ffee00-1111', title: 'Updated SSH Access', content: BODY, updated_at: '2024-01-01' },
  ]);
  openDatabase(dbPath);
  return dbPath;
}

afterAll(() => {
  cleanupAllTempDirs();
});

beforeEach(() => {
  resetState();
});

afterEach(() => {
  resetState();
});

describe('extractTools exports', () => {
  it('exports recall_extract', () => {
    expect(Object.keys(extractTools)).toEqual(['recall_extract']);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// handleExtract TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('handleExtract', () => {
  it('returns DATABASE_NOT_SELECTED when nothing is open', async () => {
    const result = parseResponse(await handleExtract({ key: 'k1' }));
    expect(result.error?.category).toBe('DATABASE_NOT_SELECTED');
  });

  it('requires a key or a title', async () => {
    openSeededDatabase();

    const result = parseResponse(await handleExtract({ table: 'discussions' }));

    expect(result.error?.category).toBe('VALIDATION_ERROR');
    expect(result.error?.message).toBe('key: Provide key or title (or both)');
  });

  it('returns the full record for a title fragment', async () => {
    openSeededDatabase();

    const result = parseResponse(await handleExtract({ title: 'SSH access' }));

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      found: true,
      tables_tried: ['documents_v2', 'discussions'],
      table: 'discussions',
      icon: '💭',
      key: 'c0ffee00-1111',
      title: 'Updated SSH Access',
      content: BODY,
      content_length: 1200,
      safe_name: 'updated_ssh_access_c0ffee00',
      match_kind: 'FUZZY_TITLE',
      modified_at: '2024-01-01',
    });
  });

  it('follows a suggestion from a truncated query back to the full record', async () => {
    openSeededDatabase();

    const query = parseResponse(
      await handleSqlQuery({ query: 'SELECT uuid, summary, content FROM discussions' })
    );
    const suggestions = query.data?.suggestions;
    expect(Array.isArray(suggestions)).toBe(true);
    if (!Array.isArray(suggestions)) return;
    const instruction: string = suggestions[0].rendered_instruction;
    const args = JSON.parse(instruction.slice(instruction.indexOf('{'), instruction.lastIndexOf('}') + 1));

    const result = parseResponse(await handleExtract(args));

    expect(args).toEqual({ key: 'c0ffee00-1111', table: 'discussions' });
    expect(result.data?.content).toBe(BODY);
    expect(result.data?.match_kind).toBe('EXACT_KEY');
  });

  it('reports not found with the tables tried and next steps', async () => {
    openSeededDatabase(['artifacts']);

    const result = parseResponse(await handleExtract({ key: 'ffffffff' }));

    expect(result.success).toBe(true);
    expect(result.data?.found).toBe(false);
    expect(result.data?.tables_tried).toEqual(['documents_v2', 'discussions']);
    expect(result.data?.tables_skipped).toEqual(['artifacts']);
    expect(result.data?.next_steps).toEqual([
      { tool: 'recall_db_tables', description: 'Check which source tables exist' },
      { tool: 'recall_sql_query', description: 'Search titles with a LIKE query' },
    ]);
  });

  it('returns SOURCE_TABLE_UNKNOWN for an unconfigured table', async () => {
    openSeededDatabase();

    const result = parseResponse(await handleExtract({ key: 'c0ffee00', table: 'users' }));

    expect(result.error?.category).toBe('SOURCE_TABLE_UNKNOWN');
    expect(result.error?.message).toBe(
      '"users" is not a configured source table. Configured: documents_v2, discussions, artifacts'
    );
  });

  describe('writing files', () => {
    it('writes to output_dir', async () => {
      openSeededDatabase();
      const dir = join(createTempDir('tools-extract'), 'out');

      const result = parseResponse(await handleExtract({ key: 'c0ffee00', output_dir: dir }));

      const expectedPath = join(dir, 'updated_ssh_access_c0ffee00.md');
      expect(result.data?.file).toEqual({
        file_path: expectedPath,
        bytes: Buffer.byteLength(readFileSync(expectedPath, 'utf-8'), 'utf-8'),
      });
      expect(readFileSync(expectedPath, 'utf-8')).toBe(
        '# Updated SSH Access\n\n- Source: 💭 discussions\n- Key: c0ffee00-1111\n- Match: PREFIX_KEY\n- Modified: 2024-01-01\n\n---\n\n' +
          BODY
      );
    });

    it('writes to the configured directory for save_to_file', async () => {
      openSeededDatabase();
      const dir = createTempDir('tools-extract');
      updateConfig({ extractOutputDir: dir });

      await handleExtract({ title: 'Updated SSH Access', save_to_file: true });

      expect(existsSync(join(dir, 'updated_ssh_access_c0ffee00.md'))).toBe(true);
    });

    it('does not write without save_to_file or output_dir', async () => {
      openSeededDatabase();
      const dir = createTempDir('tools-extract');
      updateConfig({ extractOutputDir: dir });

      const result = parseResponse(await handleExtract({ key: 'c0ffee00-1111' }));

      expect(result.data?.file).toBeUndefined();
      expect(existsSync(join(dir, 'updated_ssh_access_c0ffee00.md'))).toBe(false);
    });

    it('reports a file system error when the directory cannot be created', async () => {
      openSeededDatabase();
      const blocker = join(createTempDir('tools-extract'), 'blocker');
      writeFileSync(blocker, 'a file, not a directory');

      const result = parseResponse(
        await handleExtract({ key: 'c0ffee00', output_dir: join(blocker, 'out') })
      );

      expect(result.success).toBe(false);
      expect(result.error?.category).toBe('PATH_NOT_FOUND');
    });
  });
});
