// ============================================================================
// Classification Module — Barrel Export
// ============================================================================
//
// Public API of the classification engine. Movers and the CLI import from
// this barrel rather than individual files.
//
// Provides:
// - Category vocabulary, keyword table, default category
// - Text normalization
// - Keyword scoring and best-category selection
// - Classifier (filename stage, content stage, fallback)

// Types (type-only exports)
export type {
  Category,
  CategoryScores,
  ClassificationOutcome,
  ClassificationStage,
  KeywordEntry,
  KeywordTable,
} from './types.js';

// Constants
export {
  CATEGORIES,
  DEFAULT_CATEGORY,
  KEYWORD_TABLE,
  KeywordTableSchema,
  isCategory,
} from './types.js';

// Normalizer
export { normalizeText } from './normalize.js';

// Scorer
export { scoreText, bestCategory } from './scorer.js';

// Classifier
export {
  classifyByFilename,
  classifyByText,
  classifyFile,
  explainClassification,
} from './classifier.js';
