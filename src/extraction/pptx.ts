/**
 * PowerPoint (.pptx) text extraction.
 *
 * A .pptx is a zip of DrawingML parts. Each slide lives at
 * ppt/slides/slideN.xml; every shape (<p:sp>) with a text body contributes
 * its paragraphs. Slides are read in slide-number order, shapes in document
 * order. Shapes without a text body (pictures, connectors) are skipped.
 */

import { readFile } from 'node:fs/promises';
import JSZip from 'jszip';
import { containFailure } from './contain.js';

const SLIDE_PATH = /^ppt\/slides\/slide(\d+)\.xml$/;
const SHAPE = /<p:sp\b[\s\S]*?<\/p:sp>/g;
const PARAGRAPH = /<a:p\b[^>]*?(?:\/>|>([\s\S]*?)<\/a:p>)/g;
const RUN_OR_BREAK = /<a:t(?:\s[^>]*)?>([\s\S]*?)<\/a:t>|<a:t\s*\/>|<a:br\b[^>]*\/?>/g;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

export function decodeXmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-z]+);/g, (match, entity: string) => {
    if (entity.startsWith('#x')) return String.fromCodePoint(parseInt(entity.slice(2), 16));
    if (entity.startsWith('#')) return String.fromCodePoint(parseInt(entity.slice(1), 10));
    return NAMED_ENTITIES[entity] ?? match;
  });
}

/** Returns the text of each shape on one slide, paragraphs joined by newlines. */
export function shapeTexts(slideXml: string): string[] {
  const texts: string[] = [];

  for (const [shapeXml] of slideXml.matchAll(SHAPE)) {
    if (!shapeXml.includes('<p:txBody')) continue;

    const paragraphs: string[] = [];
    for (const paragraph of shapeXml.matchAll(PARAGRAPH)) {
      const body = paragraph[1] ?? '';
      let line = '';
      for (const run of body.matchAll(RUN_OR_BREAK)) {
        if (run[0].startsWith('<a:br')) {
          line += '\n';
        } else {
          line += decodeXmlEntities(run[1] ?? '');
        }
      }
      paragraphs.push(line);
    }

    texts.push(paragraphs.join('\n'));
  }

  return texts;
}

export function extractPptxText(filePath: string): Promise<string> {
  return containFailure('pptx', filePath, async () => {
    const zip = await JSZip.loadAsync(await readFile(filePath));

    const slides = Object.keys(zip.files)
      .map((name) => ({ name, match: SLIDE_PATH.exec(name) }))
      .filter((entry): entry is { name: string; match: RegExpExecArray } => entry.match !== null)
      .sort((a, b) => Number(a.match[1]) - Number(b.match[1]));

    const texts: string[] = [];
    for (const { name } of slides) {
      const file = zip.file(name);
      if (!file) continue;
      texts.push(...shapeTexts(await file.async('string')));
    }

    return texts.join('\n');
  });
}
