/**
 * Buckwalter transliteration between Arabic script and ASCII.
 *
 * Only characters in the table are touched in either direction; everything
 * else passes through, so mixed-script input does not round-trip.
 */

import { TransliterationError, describeError } from './errors.js';

export const SOURCE_TO_TRANSLITERATION: Readonly<Record<string, string>> = Object.freeze({
  // Letters
  'ء': "'", // hamza
  'آ': '|', // alef with madda
  'أ': '>', // alef with hamza above
  'ؤ': '&', // waw with hamza
  'إ': '<', // alef with hamza below
  'ئ': '}', // yeh with hamza
  'ا': 'A', // alef
  'ب': 'b',
  'ة': 'p', // taa marbuta
  'ت': 't',
  'ث': 'v',
  'ج': 'j',
  'ح': 'H',
  'خ': 'x',
  'د': 'd',
  'ذ': '*',
  'ر': 'r',
  'ز': 'z',
  'س': 's',
  'ش': '$',
  'ص': 'S',
  'ض': 'D',
  'ط': 'T',
  'ظ': 'Z',
  'ع': 'E',
  'غ': 'g',
  'ـ': '_', // tatweel
  'ف': 'f',
  'ق': 'q',
  'ك': 'k',
  'ل': 'l',
  'م': 'm',
  'ن': 'n',
  'ه': 'h',
  'و': 'w',
  'ى': 'Y', // alef maksura
  'ي': 'y',

  // Diacritics
  '\u064B': 'F', // fathatan
  '\u064C': 'N', // dammatan
  '\u064D': 'K', // kasratan
  '\u064E': 'a', // fatha
  '\u064F': 'u', // damma
  '\u0650': 'i', // kasra
  '\u0651': '~', // shadda
  '\u0652': 'o', // sukun
  '\u0653': '^', // maddah
  '\u0654': '#', // hamza above
  '\u0670': '`', // superscript alef

  'ٱ': '{', // alef wasla
});

function invert(table: Readonly<Record<string, string>>): Readonly<Record<string, string>> {
  const reverse: Record<string, string> = {};
  for (const [source, target] of Object.entries(table)) {
    if (Object.hasOwn(reverse, target)) {
      throw new TransliterationError(
        `Transliteration table is not a bijection: "${target}" is produced by both ` +
          `U+${reverse[target].codePointAt(0)?.toString(16).toUpperCase()} and ` +
          `U+${source.codePointAt(0)?.toString(16).toUpperCase()}`
      );
    }
    reverse[target] = source;
  }
  return Object.freeze(reverse);
}

export const TRANSLITERATION_TO_SOURCE = invert(SOURCE_TO_TRANSLITERATION);

function mapText(text: string, table: Readonly<Record<string, string>>, direction: string): string {
  if (!text) return text;
  try {
    let out = '';
    for (const ch of text) {
      out += Object.hasOwn(table, ch) ? table[ch] : ch;
    }
    return out;
  } catch (error) {
    throw new TransliterationError(`Failed to convert ${direction}: ${describeError(error)}`, { cause: error });
  }
}

export function toTransliteration(text: string): string {
  return mapText(text, SOURCE_TO_TRANSLITERATION, 'to transliteration');
}

export function toSource(text: string): string {
  return mapText(text, TRANSLITERATION_TO_SOURCE, 'from transliteration');
}

export function isSourceChar(ch: string): boolean {
  return Object.hasOwn(SOURCE_TO_TRANSLITERATION, ch);
}

export function isTransliterationChar(ch: string): boolean {
  return Object.hasOwn(TRANSLITERATION_TO_SOURCE, ch);
}
