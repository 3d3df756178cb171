/**
 * Tests for Text Normalization
 */

import { describe, it, expect } from 'vitest';
import { normalizeText } from '../normalize.js';

describe('normalizeText', () => {
  it('lowercases and collapses punctuation runs into one space', () => {
    expect(normalizeText('Course-Code: CS_101!!')).toBe('course code cs 101 ');
  });

  it('keeps leading and trailing separators as a single space', () => {
    expect(normalizeText('  --Hello--  ')).toBe(' hello ');
  });

  it('turns newlines and tabs into spaces', () => {
    expect(normalizeText('line one\n\tline two')).toBe('line one line two');
  });

  it('maps non-ASCII letters to spaces', () => {
    expect(normalizeText('Café Déjà vu')).toBe('caf d j vu');
  });

  it('returns empty string for empty input', () => {
    expect(normalizeText('')).toBe('');
  });

  it('is idempotent', () => {
    const samples = ['', 'Semester_Report (final).PDF', '  a b\r\nc  ', 'ÄÖÜ 123 ~~~', 'ci/cd pipeline'];
    for (const sample of samples) {
      const once = normalizeText(sample);
      expect(normalizeText(once)).toBe(once);
    }
  });
});
