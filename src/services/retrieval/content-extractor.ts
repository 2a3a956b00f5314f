/**
 * Content Extractor - Assemble a full record from a search match
 *
 * Extraction never truncates: the returned content is exactly what storage
 * holds. The derived safe name is bounded; the content is not.
 *
 * @module services/retrieval/content-extractor
 */

import { writeFile } from 'fs/promises';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { ExtractedRecord, MatchResult } from './types.js';
import { characterLength } from './truncation.js';

export const DEFAULT_SAFE_NAME_MAX_LENGTH = 50;

/** Characters of the slugged key appended to the safe name */
const KEY_SUFFIX_LENGTH = 8;

function slug(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Filesystem-safe name: lowercase, non-alphanumeric runs collapsed to "_",
 * title part bounded to maxLength, followed by a short key suffix.
 *
 * @example deriveSafeName('Updated SSH Access', 'abc12345-ffff') => 'updated_ssh_access_abc12345'
 */
export function deriveSafeName(
  title: string,
  key: string,
  maxLength: number = DEFAULT_SAFE_NAME_MAX_LENGTH
): string {
  const titlePart = slug(title).slice(0, Math.max(1, maxLength)).replace(/_+$/, '') || 'untitled';
  const keyPart = slug(key).slice(0, KEY_SUFFIX_LENGTH).replace(/_+$/, '');
  return keyPart ? `${titlePart}_${keyPart}` : titlePart;
}

export interface BuildExtractionOptions {
  safeNameMaxLength?: number;
}

/**
 * Build the extraction payload for a match
 */
export function buildExtraction(
  match: MatchResult,
  options: BuildExtractionOptions = {}
): ExtractedRecord {
  return {
    table: match.table.name,
    icon: match.table.icon,
    key: match.key,
    title: match.title,
    content: match.content,
    content_length: characterLength(match.content),
    safe_name: deriveSafeName(match.title, match.key, options.safeNameMaxLength),
    match_kind: match.match_kind,
    modified_at: match.modified_at,
  };
}

/**
 * Markdown file body: a short source header, then the stored content unchanged
 */
export function renderExtractionFile(record: ExtractedRecord): string {
  const header = [
    `# ${record.title || record.safe_name}`,
    '',
    `- Source: ${record.icon} ${record.table}`,
    `- Key: ${record.key}`,
    `- Match: ${record.match_kind}`,
    ...(record.modified_at !== null ? [`- Modified: ${record.modified_at}`] : []),
    '',
    '---',
  ];
  return `${header.join('\n')}\n\n${record.content}`;
}

export interface WrittenExtraction {
  file_path: string;
  bytes: number;
}

/**
 * Write <outputDir>/<safe_name>.md, creating the directory if needed
 */
export async function writeExtraction(
  record: ExtractedRecord,
  outputDir: string
): Promise<WrittenExtraction> {
  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }
  const filePath = join(outputDir, `${record.safe_name}.md`);
  const body = renderExtractionFile(record);
  await writeFile(filePath, body, 'utf-8');
  return { file_path: filePath, bytes: Buffer.byteLength(body, 'utf-8') };
}
