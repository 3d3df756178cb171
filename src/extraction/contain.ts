import path from 'node:path';

/**
 * Runs one adapter and turns any failure into empty text.
 * Only the file's base name is logged, never its content.
 */
export async function containFailure(
  format: string,
  filePath: string,
  run: () => Promise<string>,
): Promise<string> {
  try {
    return await run();
  } catch (err) {
    console.warn(
      `[extract] ${format} extraction failed for "${path.basename(filePath)}": ` +
        (err instanceof Error ? err.message : String(err)),
    );
    return '';
  }
}
