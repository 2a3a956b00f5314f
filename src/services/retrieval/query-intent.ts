/**
 * Query Intent Classifier - Pick a truncation strategy for a query
 *
 * Pure heuristic classification over the query text. Content-focused rules
 * are checked first and win ties against overview rules, so queries that read
 * bodies get the generous limit even when they also count or bound rows.
 *
 * Never fails: a query matching nothing is BALANCED.
 *
 * @module services/retrieval/query-intent
 */

import type { QueryIntent, TruncationPolicy } from './types.js';

/**
 * Default character limit per strategy
 */
export const DEFAULT_LIMITS: Readonly<Record<QueryIntent, number>> = {
  CONTENT_FOCUSED: 400,
  OVERVIEW: 80,
  BALANCED: 150,
};

const STRATEGY_REASONS: Readonly<Record<QueryIntent, string>> = {
  CONTENT_FOCUSED: 'Content-focused query detected - high character limit',
  OVERVIEW: 'Overview/metadata query detected - low character limit',
  BALANCED: 'No content or overview pattern detected - medium character limit',
};

const DEFAULT_CONTENT_FIELDS = ['content'];

interface IntentRule {
  label: string;
  pattern: RegExp;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Rules recognising queries that select or filter on a body column.
 * Built from the registry's content field names.
 */
function buildContentRules(contentFields: readonly string[]): IntentRule[] {
  const fields = (contentFields.length > 0 ? contentFields : DEFAULT_CONTENT_FIELDS)
    .map(escapeRegExp)
    .join('|');
  return [
    {
      label: 'content:select_content',
      pattern: new RegExp(`\\bSELECT\\b.*\\b(?:${fields})\\b.*\\bFROM\\b`, 'is'),
    },
    {
      label: 'content:filter_content',
      pattern: new RegExp(`\\bWHERE\\b.*\\b(?:${fields})\\b.*\\b(?:LIKE|GLOB|MATCH|REGEXP)\\b`, 'is'),
    },
    {
      label: 'content:fts_match',
      pattern: new RegExp(`\\b(?:${fields})\\b\\s+MATCH\\b`, 'i'),
    },
    {
      label: 'content:discussion_summary',
      pattern: /\bSELECT\b.*\bsummary\b.*\bFROM\b.*\bdiscussions\b/is,
    },
  ];
}

/** Counts, schema inspection, full-row selections and small bounded result sets */
const OVERVIEW_RULES: IntentRule[] = [
  { label: 'overview:count', pattern: /\bCOUNT\s*\(/i },
  { label: 'overview:pragma', pattern: /^\s*PRAGMA\b/i },
  { label: 'overview:schema', pattern: /\bsqlite_(?:master|schema)\b/i },
  { label: 'overview:select_all', pattern: /\bSELECT\s+(?:DISTINCT\s+)?(?:\w+\.)?\*/i },
  { label: 'overview:small_limit', pattern: /\bLIMIT\s+[1-5]\b(?!\s*,)/i },
];

const DEFAULT_CONTENT_RULES = buildContentRules(DEFAULT_CONTENT_FIELDS);

export interface ClassifyOptions {
  /**
   * Explicit limit. undefined keeps the strategy default;
   * null or 0 disables truncation.
   */
  maxContentLength?: number | null;
  /** Content column names to recognise (default: ["content"]) */
  contentFields?: readonly string[];
}

/**
 * Classify a query and produce the truncation policy for its results.
 *
 * @param query - The literal query text
 * @returns Policy with strategy label, effective limit and diagnostics
 */
export function classifyQuery(query: string, options: ClassifyOptions = {}): TruncationPolicy {
  const contentRules = options.contentFields
    ? buildContentRules(options.contentFields)
    : DEFAULT_CONTENT_RULES;

  const contentHits = contentRules.filter((rule) => rule.pattern.test(query)).map((r) => r.label);
  const overviewHits = OVERVIEW_RULES.filter((rule) => rule.pattern.test(query)).map((r) => r.label);

  let strategy: QueryIntent = 'BALANCED';
  if (contentHits.length > 0) {
    strategy = 'CONTENT_FOCUSED';
  } else if (overviewHits.length > 0) {
    strategy = 'OVERVIEW';
  }

  const detected = [...contentHits, ...overviewHits];
  const override = options.maxContentLength;

  if (override === undefined) {
    return {
      strategy,
      limit: DEFAULT_LIMITS[strategy],
      overridden: false,
      reason: STRATEGY_REASONS[strategy],
      detected_patterns: detected,
    };
  }

  const unlimited = override === null || override <= 0;
  return {
    strategy,
    limit: unlimited ? null : override,
    overridden: true,
    reason: unlimited ? 'User disabled truncation' : `User specified: ${override} chars`,
    detected_patterns: detected,
  };
}
