/**
 * PDF text extraction (pdf.js, legacy build for Node).
 *
 * Pages are read one at a time; a page whose text layer cannot be read is
 * skipped and the rest of the document is kept. The loading task is always
 * destroyed so the parser releases the document.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { containFailure } from './contain.js';

export function extractPdfText(filePath: string): Promise<string> {
  return containFailure('pdf', filePath, async () => {
    const data = new Uint8Array(await readFile(filePath));
    const loadingTask = getDocument({
      data,
      isEvalSupported: false,
      disableFontFace: true,
      verbosity: 0,
    });

    try {
      const doc = await loadingTask.promise;
      const pages: string[] = [];

      for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
        try {
          const page = await doc.getPage(pageNumber);
          const content = await page.getTextContent();
          pages.push(
            content.items
              .map((item) => ('str' in item ? item.str + (item.hasEOL ? '\n' : '') : ''))
              .join(''),
          );
        } catch (err) {
          console.warn(
            `[extract] Skipping page ${pageNumber} of "${path.basename(filePath)}": ` +
              (err instanceof Error ? err.message : String(err)),
          );
        }
      }

      return pages.join('\n');
    } finally {
      await loadingTask.destroy();
    }
  });
}
