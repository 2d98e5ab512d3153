/**
 * Chapter, Verse and Word records.
 *
 * Records are plain frozen objects built by validating factories. A factory
 * either returns a complete, valid record or throws DataValidationError.
 */

import { TOTAL_CHAPTERS } from './config.js';
import { DataValidationError } from './errors.js';

export interface Verse {
  readonly chapter: number;
  readonly index: number;
  readonly text: string;
  /** Global position across the whole corpus, when the source provides it. */
  readonly sequence: number | null;
}

export interface Chapter {
  readonly index: number;
  readonly name: string;
  readonly verses: readonly Verse[];
  readonly englishName: string | null;
  readonly revelationType: string | null;
}

export interface Word {
  readonly chapter: number;
  readonly verse: number;
  /** Zero-based position within the verse. */
  readonly position: number;
  readonly text: string;
  readonly normalized: string;
  readonly transliterated: string;
  readonly root: string | null;
  readonly lemma: string | null;
}

export interface VerseInit {
  chapter: number;
  index: number;
  text: string;
  sequence?: number | null;
}

export interface ChapterInit {
  index: number;
  name: string;
  verses: readonly Verse[];
  englishName?: string | null;
  revelationType?: string | null;
}

export interface WordInit {
  chapter: number;
  verse: number;
  position: number;
  text: string;
  normalized: string;
  transliterated: string;
  root?: string | null;
  lemma?: string | null;
}

export function isValidChapterIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 1 && index <= TOTAL_CHAPTERS;
}

function requireChapterIndex(index: number, what: string): void {
  if (!isValidChapterIndex(index)) {
    throw new DataValidationError(`Invalid ${what}: ${index}`);
  }
}

export function createVerse(init: VerseInit): Verse {
  requireChapterIndex(init.chapter, 'chapter index');
  if (!Number.isInteger(init.index) || init.index < 1) {
    throw new DataValidationError(`Invalid verse index: ${init.index}`);
  }
  if (!init.text) {
    throw new DataValidationError('Verse text cannot be empty');
  }
  const sequence = init.sequence ?? null;
  if (sequence !== null && (!Number.isInteger(sequence) || sequence < 1)) {
    throw new DataValidationError(`Invalid verse sequence number: ${sequence}`);
  }

  return Object.freeze({
    chapter: init.chapter,
    index: init.index,
    text: init.text,
    sequence,
  });
}

export function createChapter(init: ChapterInit): Chapter {
  requireChapterIndex(init.index, 'chapter index');
  if (!init.name) {
    throw new DataValidationError('Chapter name cannot be empty');
  }
  if (init.verses.length === 0) {
    throw new DataValidationError('Chapter must contain at least one verse');
  }
  for (const verse of init.verses) {
    if (verse.chapter !== init.index) {
      throw new DataValidationError(
        `Verse chapter index ${verse.chapter} does not match chapter index ${init.index}`
      );
    }
  }

  return Object.freeze({
    index: init.index,
    name: init.name,
    verses: Object.freeze([...init.verses]),
    englishName: init.englishName ?? null,
    revelationType: init.revelationType ?? null,
  });
}

export function createWord(init: WordInit): Word {
  requireChapterIndex(init.chapter, 'chapter index');
  if (!Number.isInteger(init.verse) || init.verse < 1) {
    throw new DataValidationError(`Invalid verse index: ${init.verse}`);
  }
  if (!Number.isInteger(init.position) || init.position < 0) {
    throw new DataValidationError(`Invalid word position: ${init.position}`);
  }
  if (!init.text) {
    throw new DataValidationError('Word text cannot be empty');
  }
  if (!init.normalized) {
    throw new DataValidationError(`Normalized text cannot be empty (word "${init.text}")`);
  }
  if (!init.transliterated) {
    throw new DataValidationError(`Transliterated text cannot be empty (word "${init.text}")`);
  }

  return Object.freeze({
    chapter: init.chapter,
    verse: init.verse,
    position: init.position,
    text: init.text,
    normalized: init.normalized,
    transliterated: init.transliterated,
    root: init.root ?? null,
    lemma: init.lemma ?? null,
  });
}

/**
 * Stable identity of a word: `chapter:verse:position`.
 */
export function wordKey(word: Pick<Word, 'chapter' | 'verse' | 'position'>): string {
  return `${word.chapter}:${word.verse}:${word.position}`;
}

export function wordsEqual(a: Word, b: Word): boolean {
  return (
    a.chapter === b.chapter &&
    a.verse === b.verse &&
    a.position === b.position &&
    a.text === b.text &&
    a.normalized === b.normalized &&
    a.transliterated === b.transliterated &&
    a.root === b.root &&
    a.lemma === b.lemma
  );
}

export function versesEqual(a: Verse, b: Verse): boolean {
  return a.chapter === b.chapter && a.index === b.index && a.text === b.text && a.sequence === b.sequence;
}

export function chaptersEqual(a: Chapter, b: Chapter): boolean {
  return (
    a.index === b.index &&
    a.name === b.name &&
    a.englishName === b.englishName &&
    a.revelationType === b.revelationType &&
    a.verses.length === b.verses.length &&
    a.verses.every((verse, i) => versesEqual(verse, b.verses[i]))
  );
}

export function getVerse(chapter: Chapter, index: number): Verse | null {
  return chapter.verses.find(verse => verse.index === index) ?? null;
}

/**
 * Whitespace-split word count. Only an approximation: the tokenizer also
 * trims punctuation and drops pieces that end up empty.
 */
export function approximateWordCount(verse: Verse): number {
  return verse.text.split(/\s+/).filter(Boolean).length;
}

/** Sum of the verses' approximate word counts. */
export function approximateChapterWordCount(chapter: Chapter): number {
  return chapter.verses.reduce((total, verse) => total + approximateWordCount(verse), 0);
}
