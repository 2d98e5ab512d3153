/**
 * Tests for Buckwalter transliteration
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  toTransliteration,
  toSource,
  isSourceChar,
  isTransliterationChar,
  SOURCE_TO_TRANSLITERATION,
  TRANSLITERATION_TO_SOURCE,
} from '../src/transliterator.js';

describe('mapping table', () => {
  it('is a bijection', () => {
    const sources = Object.keys(SOURCE_TO_TRANSLITERATION);
    const targets = Object.values(SOURCE_TO_TRANSLITERATION);

    expect(sources).toHaveLength(49);
    expect(new Set(targets).size).toBe(sources.length);
    expect(Object.keys(TRANSLITERATION_TO_SOURCE)).toHaveLength(sources.length);
  });

  it('maps every source character to a single ASCII character', () => {
    for (const target of Object.values(SOURCE_TO_TRANSLITERATION)) {
      expect(target).toMatch(/^[\x21-\x7e]$/);
    }
  });

  it('round-trips every character in the table', () => {
    for (const letter of Object.keys(SOURCE_TO_TRANSLITERATION)) {
      expect(toSource(toTransliteration(letter))).toBe(letter);
    }
    for (const symbol of Object.keys(TRANSLITERATION_TO_SOURCE)) {
      expect(toTransliteration(toSource(symbol))).toBe(symbol);
    }
  });

  it('round-trips any text built from table characters', () => {
    fc.assert(
      fc.property(
        fc.array(fc.constantFrom(...Object.keys(SOURCE_TO_TRANSLITERATION)), { maxLength: 40 }),
        chars => {
          const text = chars.join('');
          expect(toSource(toTransliteration(text))).toBe(text);
        }
      )
    );
  });
});

describe('toTransliteration', () => {
  it('transliterates letters and diacritics', () => {
    expect(toTransliteration('بِسْمِ')).toBe('bisomi');
    expect(toTransliteration('قَالَ')).toBe('qaAla');
    expect(toTransliteration('رَحْمَةٌ')).toBe('raHomapN');
    expect(toTransliteration('ٱللَّهِ')).toBe('{lla~hi');
  });

  it('passes unmapped characters through', () => {
    expect(toTransliteration('قال 42!')).toBe('qAl 42!');
    expect(toTransliteration('')).toBe('');
  });
});

describe('toSource', () => {
  it('converts transliteration back to Arabic', () => {
    expect(toSource('kitaAbN')).toBe('كِتَابٌ');
  });

  it('passes characters outside the table through', () => {
    expect(toSource('bc 7')).toBe('بc 7');
  });

  it('does not round-trip mixed-script input containing table symbols', () => {
    const mixed = 'ب b';
    expect(toSource(toTransliteration(mixed))).toBe('ب ب');
  });
});

describe('membership', () => {
  it('classifies characters by table', () => {
    expect(isSourceChar('ب')).toBe(true);
    expect(isSourceChar('b')).toBe(false);
    expect(isTransliterationChar('b')).toBe(true);
    expect(isTransliterationChar('c')).toBe(false);
  });
});
