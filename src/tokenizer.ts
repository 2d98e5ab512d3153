/**
 * Splits verse text into ordered word tokens.
 */

import { WORD_DELIMITER } from './config.js';
import { TokenizationError, describeError } from './errors.js';

/** ASCII punctuation plus the Arabic question mark and comma. */
export const BOUNDARY_CHARS: ReadonlySet<string> = new Set('!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~؟،');

export interface PositionedToken {
  token: string;
  position: number;
}

function trimBoundary(piece: string): string {
  const chars = Array.from(piece);
  let start = 0;
  let end = chars.length;
  while (start < end && BOUNDARY_CHARS.has(chars[start])) start++;
  while (end > start && BOUNDARY_CHARS.has(chars[end - 1])) end--;
  return chars.slice(start, end).join('');
}

/**
 * Split on the delimiter, trim boundary punctuation from each piece, and drop
 * pieces left empty. Order follows the source text.
 */
export function tokenize(text: string, delimiter: string = WORD_DELIMITER): string[] {
  if (!text) return [];
  if (!delimiter) {
    throw new TokenizationError('Failed to tokenize: delimiter cannot be empty');
  }

  try {
    const tokens: string[] = [];
    for (const piece of text.split(delimiter)) {
      const token = trimBoundary(piece);
      if (token) tokens.push(token);
    }
    return tokens;
  } catch (error) {
    throw new TokenizationError(`Failed to tokenize: ${describeError(error)}`, { cause: error });
  }
}

export function tokenizeWithPositions(text: string, delimiter: string = WORD_DELIMITER): PositionedToken[] {
  return tokenize(text, delimiter).map((token, position) => ({ token, position }));
}

/** Word count after full tokenization. */
export function countWords(text: string, delimiter: string = WORD_DELIMITER): number {
  return tokenize(text, delimiter).length;
}
