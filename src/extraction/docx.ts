import mammoth from 'mammoth';
import { containFailure } from './contain.js';

/**
 * Extracts paragraph text from a .docx file, one paragraph per line.
 * mammoth separates paragraphs with a blank line; collapse that to one newline.
 */
export function extractDocxText(filePath: string): Promise<string> {
  return containFailure('docx', filePath, async () => {
    const result = await mammoth.extractRawText({ path: filePath });
    return result.value.split('\n\n').join('\n');
  });
}
