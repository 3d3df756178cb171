import { readFile } from 'node:fs/promises';
import { containFailure } from './contain.js';

/** Reads a .txt/.md file as UTF-8, dropping bytes that do not decode. */
export function extractPlainText(filePath: string): Promise<string> {
  return containFailure('text', filePath, async () => {
    const buffer = await readFile(filePath);
    return buffer.toString('utf-8').replace(/\uFFFD/g, '');
  });
}
