/**
 * Shared contract for format adapters: resolve to the document's text,
 * or to '' when the document cannot be read. Never rejects.
 */
export type Extractor = (filePath: string) => Promise<string>;
