/**
 * Spreadsheet (.xlsx / .xls) text extraction with SheetJS.
 *
 * Every non-empty cell is stringified, sheet by sheet, row by row. Formulas
 * are not parsed (cellFormula: false); a formula cell yields the value the
 * workbook last computed for it.
 *
 * SheetJS sniffs content and will happily read arbitrary bytes as CSV, so the
 * container signature is checked first: a zip (.xlsx) or OLE2 (.xls) header is
 * required under either extension.
 */

import { readFile } from 'node:fs/promises';
import { read, utils } from 'xlsx';
import { containFailure } from './contain.js';

const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const OLE2_SIGNATURE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

function hasSignature(buffer: Buffer, signature: Buffer): boolean {
  return buffer.subarray(0, signature.length).equals(signature);
}

export function extractSpreadsheetText(filePath: string): Promise<string> {
  return containFailure('spreadsheet', filePath, async () => {
    const buffer = await readFile(filePath);
    if (!hasSignature(buffer, ZIP_SIGNATURE) && !hasSignature(buffer, OLE2_SIGNATURE)) {
      throw new Error('Not a workbook container');
    }

    const workbook = read(buffer, {
      type: 'buffer',
      dense: true,
      cellFormula: false,
      cellHTML: false,
      cellStyles: false,
    });

    const parts: string[] = [];
    for (const sheetName of workbook.SheetNames) {
      const sheet = workbook.Sheets[sheetName];
      if (!sheet) continue;

      const rows = utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, blankrows: false });
      for (const row of rows) {
        for (const cell of row) {
          if (cell === null || cell === undefined || cell === '') continue;
          parts.push(String(cell));
        }
      }
    }

    return parts.join('\n');
  });
}
