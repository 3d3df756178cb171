/**
 * Keyword Scorer
 *
 * Counts, per category, how many distinct keywords occur in a text, and picks
 * the winning category. Ties go to the category declared first in the table;
 * a zero maximum is never a match.
 */

import { normalizeText } from './normalize.js';
import { KEYWORD_TABLE } from './types.js';
import type { Category, CategoryScores, KeywordTable } from './types.js';

/**
 * Scores text against every category of the table.
 * Each keyword contributes at most 1, however often it occurs.
 */
export function scoreText(text: string, table: KeywordTable = KEYWORD_TABLE): CategoryScores {
  const normalized = normalizeText(text);
  const scores: CategoryScores = new Map();

  for (const { category, keywords } of table) {
    let count = 0;
    for (const keyword of keywords) {
      if (normalized.includes(keyword)) count++;
    }
    scores.set(category, count);
  }

  return scores;
}

/**
 * Returns the first category (in map order) holding the maximum score,
 * or null when every score is zero.
 */
export function bestCategory(scores: CategoryScores): Category | null {
  let best: Category | null = null;
  let bestScore = 0;

  for (const [category, score] of scores) {
    if (score > bestScore) {
      best = category;
      bestScore = score;
    }
  }

  return best;
}
