/**
 * Chainable, immutable word queries.
 */

import { type Word, isValidChapterIndex } from './entities.js';
import { FilterError, describeError } from './errors.js';

export interface TextMatchOptions {
  /** Match against the normalized form instead of the raw text. */
  normalized?: boolean;
}

export class WordFilter {
  private readonly words: readonly Word[];

  constructor(words: readonly Word[]) {
    this.words = Object.isFrozen(words) ? words : Object.freeze([...words]);
  }

  private where(predicate: (word: Word) => boolean): WordFilter {
    return new WordFilter(this.words.filter(predicate));
  }

  byChapter(chapter: number): WordFilter {
    if (!isValidChapterIndex(chapter)) {
      throw new FilterError(`Invalid chapter index: ${chapter}`);
    }
    return this.where(word => word.chapter === chapter);
  }

  byVerse(chapter: number, verse: number): WordFilter {
    if (!isValidChapterIndex(chapter)) {
      throw new FilterError(`Invalid chapter index: ${chapter}`);
    }
    if (!Number.isInteger(verse) || verse < 1) {
      throw new FilterError(`Invalid verse index: ${verse}`);
    }
    return this.where(word => word.chapter === chapter && word.verse === verse);
  }

  byExactText(text: string, options: TextMatchOptions = {}): WordFilter {
    return options.normalized
      ? this.where(word => word.normalized === text)
      : this.where(word => word.text === text);
  }

  byTextContains(substring: string, options: TextMatchOptions = {}): WordFilter {
    return options.normalized
      ? this.where(word => word.normalized.includes(substring))
      : this.where(word => word.text.includes(substring));
  }

  byRoot(root: string): WordFilter {
    return this.where(word => word.root === root);
  }

  byLemma(lemma: string): WordFilter {
    return this.where(word => word.lemma === lemma);
  }

  /**
   * Keep words the predicate accepts. A throwing predicate surfaces as FilterError.
   */
  byPredicate(predicate: (word: Word) => boolean): WordFilter {
    try {
      return this.where(predicate);
    } catch (error) {
      throw new FilterError(`Custom filter failed: ${describeError(error)}`, { cause: error });
    }
  }

  get(): readonly Word[] {
    return this.words;
  }

  count(): number {
    return this.words.length;
  }

  first(): Word | null {
    return this.words.length > 0 ? this.words[0] : null;
  }

  last(): Word | null {
    return this.words.length > 0 ? this.words[this.words.length - 1] : null;
  }
}
