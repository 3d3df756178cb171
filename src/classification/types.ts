/**
 * Classification Type Definitions
 *
 * - CATEGORIES: the fixed, ordered category vocabulary
 * - KeywordTableSchema: Zod schema validating keywords.json at load time
 * - KEYWORD_TABLE: ordered (category, keywords) pairs driving both stages
 * - DEFAULT_CATEGORY: label returned when neither stage finds a match
 * - ClassificationOutcome: category plus the stage that decided it
 *
 * Declaration order matters: the filename stage returns the first category
 * with a hit, and the content stage breaks score ties the same way.
 */

import { z } from 'zod';
import keywordData from './keywords.json' with { type: 'json' };

// ---------------------------------------------------------------------------
// Categories
// ---------------------------------------------------------------------------

/** All categories, in declaration order */
export const CATEGORIES = [
  'University Docs',
  'Technical Work',
  'Capstone Work',
] as const;

/** A category label; also the name of the folder documents are moved into */
export type Category = typeof CATEGORIES[number];

/** Returned when the filename and content stages are both inconclusive */
export const DEFAULT_CATEGORY: Category = 'Technical Work';

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Keyword Table
// ---------------------------------------------------------------------------

export const KeywordEntrySchema = z
  .object({
    category: z.enum(CATEGORIES),
    keywords: z.array(z.string().min(1)).min(1).readonly(),
  })
  .readonly();

/** One row of the keyword table */
export type KeywordEntry = z.infer<typeof KeywordEntrySchema>;

/** Ordered sequence of keyword entries */
export type KeywordTable = readonly KeywordEntry[];

export const KeywordTableSchema = z
  .array(KeywordEntrySchema)
  .refine(
    (entries) =>
      entries.length === CATEGORIES.length &&
      entries.every((entry, i) => entry.category === CATEGORIES[i]),
    { message: `Keyword table must list each category once, in order: ${CATEGORIES.join(', ')}` },
  )
  .refine(
    (entries) => entries.every((entry) => entry.keywords.every((kw) => kw === kw.toLowerCase())),
    { message: 'Keywords must be lowercase' },
  )
  .readonly();

/**
 * The keyword table shipped with the package, validated once at import.
 * Parsing freezes the table, every entry and every keyword list.
 */
export const KEYWORD_TABLE: KeywordTable = KeywordTableSchema.parse(keywordData);

// ---------------------------------------------------------------------------
// Classification Outcome
// ---------------------------------------------------------------------------

/** Which stage produced the decision */
export type ClassificationStage = 'filename' | 'content' | 'fallback';

/** Per-category keyword counts, iterated in table order */
export type CategoryScores = Map<Category, number>;

export interface ClassificationOutcome {
  category: Category;
  stage: ClassificationStage;
  /** Content scores when the content stage ran, otherwise null */
  scores: CategoryScores | null;
}
