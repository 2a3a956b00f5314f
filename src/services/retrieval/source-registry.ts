/**
 * Source Table Registry
 *
 * Immutable, priority-ordered list of the content tables the search
 * coordinator walks. Built once at startup from static configuration and
 * passed explicitly to everything that needs it.
 *
 * FAIL FAST: An empty registry, a descriptor with missing or malformed
 * fields, or a duplicate name/rank is a CONFIGURATION_ERROR.
 *
 * @module services/retrieval/source-registry
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { configurationError } from '../../server/errors.js';
import { SqlIdentifier, describeIssues } from '../../utils/validation.js';
import type { SourceTableDescriptor } from './types.js';

const SourceTableSchema = z.object({
  name: SqlIdentifier,
  title_field: SqlIdentifier,
  content_field: SqlIdentifier,
  key_field: SqlIdentifier,
  modified_field: SqlIdentifier.nullable().default(null),
  icon: z.string().min(1).default('📄'),
  priority_rank: z.number().int('priority_rank must be an integer'),
});

const SourceRegistrySchema = z
  .array(SourceTableSchema)
  .min(1, 'At least one source table must be configured')
  .superRefine((tables, ctx) => {
    const names = new Set<string>();
    const ranks = new Set<number>();
    tables.forEach((table, index) => {
      if (names.has(table.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'name'],
          message: `Duplicate source table "${table.name}"`,
        });
      }
      if (ranks.has(table.priority_rank)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'priority_rank'],
          message: `Duplicate priority_rank ${table.priority_rank}; priority order must be total`,
        });
      }
      names.add(table.name);
      ranks.add(table.priority_rank);
    });
  });

/**
 * Default registry: structured documents, then discussions, then generated artifacts
 */
export const DEFAULT_SOURCE_TABLES: readonly SourceTableDescriptor[] = [
  {
    name: 'documents_v2',
    title_field: 'title',
    content_field: 'content',
    key_field: 'uuid',
    modified_field: 'updated_at',
    icon: '📄',
    priority_rank: 1,
  },
  {
    name: 'discussions',
    title_field: 'summary',
    content_field: 'content',
    key_field: 'uuid',
    modified_field: 'updated_at',
    icon: '💭',
    priority_rank: 2,
  },
  {
    name: 'artifacts',
    title_field: 'title',
    content_field: 'content',
    key_field: 'uuid',
    modified_field: 'updated_at',
    icon: '🧩',
    priority_rank: 3,
  },
];

export class SourceRegistry {
  /** Descriptors sorted by priority_rank ascending */
  readonly tables: readonly SourceTableDescriptor[];

  private constructor(tables: SourceTableDescriptor[]) {
    this.tables = Object.freeze(
      [...tables]
        .sort((a, b) => a.priority_rank - b.priority_rank)
        .map((table) => Object.freeze({ ...table }))
    );
  }

  /**
   * Validate descriptors and build the registry
   * @throws MCPError CONFIGURATION_ERROR when the configuration is unusable
   */
  static create(descriptors: unknown): SourceRegistry {
    const result = SourceRegistrySchema.safeParse(descriptors);
    if (!result.success) {
      throw configurationError(`Invalid source table configuration: ${describeIssues(result.error)}`);
    }
    return new SourceRegistry(result.data);
  }

  static default(): SourceRegistry {
    return SourceRegistry.create(DEFAULT_SOURCE_TABLES);
  }

  /**
   * Load descriptors from a JSON file holding an array of descriptors
   * @throws MCPError CONFIGURATION_ERROR if the file is missing, unparsable or invalid
   */
  static fromFile(filePath: string): SourceRegistry {
    if (!existsSync(filePath)) {
      throw configurationError(`Source table file not found: ${filePath}`, { filePath });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw configurationError(
        `Source table file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        { filePath }
      );
    }
    return SourceRegistry.create(parsed);
  }

  get(name: string): SourceTableDescriptor | undefined {
    return this.tables.find((table) => table.name === name);
  }

  names(): string[] {
    return this.tables.map((table) => table.name);
  }

  /** Distinct content column names, used to recognise content-focused queries */
  contentFields(): string[] {
    return [...new Set(this.tables.map((table) => table.content_field))];
  }
}
