/**
 * Document Classifier — keyword matching on filename, then content
 *
 * Stages, strictly in order:
 * 1. Filename: first keyword hit wins, scanning categories then keywords in
 *    table order. This is not a scored comparison.
 * 2. Content: extract text, score every category, take the best non-zero
 *    score (ties go to the first-declared category).
 * 3. Fallback: DEFAULT_CATEGORY.
 *
 * Classification is total: any string argument yields a category. Extraction
 * failures arrive here as empty text.
 *
 * Consumers: desktop mover, drive mover, CLI
 */

import path from 'node:path';
import { extractText } from '../extraction/index.js';
import { normalizeText } from './normalize.js';
import { bestCategory, scoreText } from './scorer.js';
import { DEFAULT_CATEGORY, KEYWORD_TABLE } from './types.js';
import type { Category, ClassificationOutcome, KeywordTable } from './types.js';

// ---------------------------------------------------------------------------
// Stage 1: Filename
// ---------------------------------------------------------------------------

/**
 * Matches keywords against the file's stem and full base name.
 * Works on bare names as well as paths; never touches the filesystem.
 */
export function classifyByFilename(
  pathOrName: string,
  table: KeywordTable = KEYWORD_TABLE,
): Category | null {
  const { name: stem, base } = path.parse(pathOrName);
  const nameText = normalizeText(`${stem} ${base}`);

  for (const { category, keywords } of table) {
    for (const keyword of keywords) {
      if (nameText.includes(keyword)) return category;
    }
  }

  return null;
}

// ---------------------------------------------------------------------------
// Stage 2: Content
// ---------------------------------------------------------------------------

/** Scores raw text and returns the winning category, or null on all-zero scores. */
export function classifyByText(text: string, table: KeywordTable = KEYWORD_TABLE): Category | null {
  return bestCategory(scoreText(text, table));
}

async function readContent(filePath: string): Promise<string> {
  try {
    return await extractText(filePath);
  } catch (err) {
    // Adapters contain their own failures; this only guards the dispatcher.
    console.warn(
      `[classify] Content read failed for "${path.basename(filePath)}": ` +
        (err instanceof Error ? err.message : String(err)),
    );
    return '';
  }
}

// ---------------------------------------------------------------------------
// Orchestration
// ---------------------------------------------------------------------------

/**
 * Runs all stages and reports which one decided.
 *
 * @param pathOrName - Filesystem path (enables the content stage) or bare name
 */
export async function explainClassification(pathOrName: string): Promise<ClassificationOutcome> {
  const byName = classifyByFilename(pathOrName);
  if (byName) {
    return { category: byName, stage: 'filename', scores: null };
  }

  const content = await readContent(pathOrName);
  if (content) {
    const scores = scoreText(content);
    const byContent = bestCategory(scores);
    if (byContent) {
      return { category: byContent, stage: 'content', scores };
    }
    return { category: DEFAULT_CATEGORY, stage: 'fallback', scores };
  }

  return { category: DEFAULT_CATEGORY, stage: 'fallback', scores: null };
}

/**
 * Classifies a file into one of the fixed categories. Never rejects.
 *
 * @param pathOrName - Filesystem path, or a bare name for filename-only use
 */
export async function classifyFile(pathOrName: string): Promise<Category> {
  const outcome = await explainClassification(pathOrName);
  return outcome.category;
}
