// ============================================================================
// Extraction Module — Barrel Export
// ============================================================================
//
// Maps file extensions to format adapters. Dispatch is on the extension only
// (case-insensitive); content is never sniffed to pick an adapter. Unsupported
// extensions resolve to '' without touching the file.
//
// Adding a format is one entry in EXTRACTORS.

import path from 'node:path';
import { extractDocxText } from './docx.js';
import { extractPdfText } from './pdf.js';
import { extractPlainText } from './plain-text.js';
import { extractPptxText } from './pptx.js';
import { extractSpreadsheetText } from './spreadsheet.js';
import type { Extractor } from './types.js';

export type { Extractor } from './types.js';
export { extractDocxText } from './docx.js';
export { extractPdfText } from './pdf.js';
export { extractPlainText } from './plain-text.js';
export { extractPptxText } from './pptx.js';
export { extractSpreadsheetText } from './spreadsheet.js';

export const EXTRACTORS: ReadonlyMap<string, Extractor> = new Map<string, Extractor>([
  ['.txt', extractPlainText],
  ['.md', extractPlainText],
  ['.pdf', extractPdfText],
  ['.docx', extractDocxText],
  ['.pptx', extractPptxText],
  ['.xlsx', extractSpreadsheetText],
  ['.xls', extractSpreadsheetText],
]);

export const SUPPORTED_EXTENSIONS: readonly string[] = [...EXTRACTORS.keys()];

export function isSupportedExtension(filePath: string): boolean {
  return EXTRACTORS.has(path.extname(filePath).toLowerCase());
}

/** Extracts a document's text, or '' when the format is unsupported or unreadable. */
export async function extractText(filePath: string): Promise<string> {
  const extractor = EXTRACTORS.get(path.extname(filePath).toLowerCase());
  if (!extractor) return '';
  return extractor(filePath);
}
