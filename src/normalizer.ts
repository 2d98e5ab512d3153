/**
 * Character-level canonicalization of Arabic text.
 */

import { NormalizationError, describeError } from './errors.js';

/** Harakat, tanween, shadda, sukun, maddah, hamza marks, and superscript alef. */
export const DIACRITICS: ReadonlySet<string> = new Set([
  '\u064B', // fathatan
  '\u064C', // dammatan
  '\u064D', // kasratan
  '\u064E', // fatha
  '\u064F', // damma
  '\u0650', // kasra
  '\u0651', // shadda
  '\u0652', // sukun
  '\u0653', // maddah above
  '\u0654', // hamza above
  '\u0655', // hamza below
  '\u0656', // subscript alef
  '\u0657', // inverted damma
  '\u0658', // noon ghunna mark
  '\u0670', // superscript alef
]);

export const HAMZA_FOLDS: Readonly<Record<string, string>> = Object.freeze({
  'أ': 'ا', // alef with hamza above
  'إ': 'ا', // alef with hamza below
  'آ': 'ا', // alef with madda
  'ؤ': 'و', // waw with hamza
  'ئ': 'ي', // yeh with hamza
});

export const ALEF_FOLDS: Readonly<Record<string, string>> = Object.freeze({
  'أ': 'ا',
  'إ': 'ا',
  'آ': 'ا',
  'ٱ': 'ا', // alef wasla
});

export const TAA_MARBUTA = 'ة';
export const HEH = 'ه';

export interface NormalizeOptions {
  removeDiacritics?: boolean;
  foldHamza?: boolean;
  foldAlef?: boolean;
  foldTaaMarbuta?: boolean;
}

type Step = 'removeDiacritics' | 'foldHamza' | 'foldAlef' | 'foldTaaMarbuta';

const STEP_LABELS: Record<Step, string> = {
  removeDiacritics: 'diacritic removal',
  foldHamza: 'hamza folding',
  foldAlef: 'alef folding',
  foldTaaMarbuta: 'taa marbuta folding',
};

function runStep(step: Step, text: string, apply: (text: string) => string): string {
  try {
    return apply(text);
  } catch (error) {
    throw new NormalizationError(`Failed during ${STEP_LABELS[step]}: ${describeError(error)}`, { cause: error });
  }
}

function mapChars(text: string, map: (ch: string) => string): string {
  let out = '';
  for (const ch of text) out += map(ch);
  return out;
}

export function removeDiacritics(text: string): string {
  return runStep('removeDiacritics', text, t => mapChars(t, ch => (DIACRITICS.has(ch) ? '' : ch)));
}

export function foldHamza(text: string): string {
  return runStep('foldHamza', text, t => mapChars(t, ch => HAMZA_FOLDS[ch] ?? ch));
}

export function foldAlef(text: string): string {
  return runStep('foldAlef', text, t => mapChars(t, ch => ALEF_FOLDS[ch] ?? ch));
}

export function foldTaaMarbuta(text: string): string {
  return runStep('foldTaaMarbuta', text, t => mapChars(t, ch => (ch === TAA_MARBUTA ? HEH : ch)));
}

/**
 * Apply the enabled steps in fixed order: diacritics, hamza, alef, taa marbuta.
 * Every step is enabled unless switched off.
 */
export function normalize(text: string, options: NormalizeOptions = {}): string {
  if (!text) return text;

  let out = text;
  if (options.removeDiacritics ?? true) out = removeDiacritics(out);
  if (options.foldHamza ?? true) out = foldHamza(out);
  if (options.foldAlef ?? true) out = foldAlef(out);
  if (options.foldTaaMarbuta ?? true) out = foldTaaMarbuta(out);
  return out;
}
