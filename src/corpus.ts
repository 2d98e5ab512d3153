/**
 * The authoritative word list, built from the chapter documents.
 */

import { TOTAL_CHAPTERS } from './config.js';
import { createWord, getVerse, type Chapter, type Verse, type Word } from './entities.js';
import { CorpusError, CorpusNotBuiltError, describeError } from './errors.js';
import { WordFilter } from './filter.js';
import { ChapterLoader } from './loader.js';
import { getDefaultLogger, type Logger } from './logger.js';
import { normalize } from './normalizer.js';
import { tokenize } from './tokenizer.js';
import { toTransliteration } from './transliterator.js';

const MODULE = 'corpus';

export interface ChapterRange {
  start: number;
  end: number;
}

export interface CorpusOptions {
  /** Inclusive chapter range to build; all chapters by default. */
  range?: ChapterRange;
  logger?: Logger;
}

interface BuiltState {
  chapters: readonly Chapter[];
  words: readonly Word[];
}

/**
 * Turn one verse into its words. Root and lemma stay absent: no
 * morphological analysis happens here.
 */
export function wordsOfVerse(verse: Verse): Word[] {
  return tokenize(verse.text).map((text, position) =>
    createWord({
      chapter: verse.chapter,
      verse: verse.index,
      position,
      text,
      normalized: normalize(text),
      transliterated: toTransliteration(text),
      root: null,
      lemma: null,
    })
  );
}

/**
 * Two-phase corpus: construct, then `build()`. Queries before a successful
 * build throw CorpusNotBuiltError.
 */
export class Corpus {
  private readonly loader: ChapterLoader;
  private readonly range: ChapterRange;
  private readonly logger: Logger;
  private state: BuiltState | null = null;

  constructor(dataPath: string, options: CorpusOptions = {}) {
    this.logger = options.logger ?? getDefaultLogger();
    this.loader = new ChapterLoader(dataPath, { logger: this.logger });
    this.range = options.range ?? { start: 1, end: TOTAL_CHAPTERS };
  }

  get isBuilt(): boolean {
    return this.state !== null;
  }

  private built(): BuiltState {
    if (!this.state) throw new CorpusNotBuiltError();
    return this.state;
  }

  /**
   * Load every chapter in range and derive the word list. All or nothing:
   * on failure the corpus is left unbuilt.
   */
  build(): void {
    this.state = null;
    this.logger.info(MODULE, 'Building corpus', { ...this.range, dataPath: this.loader.dataPath });

    try {
      const chapters = this.loader.loadAll(this.range.start, this.range.end);
      const words: Word[] = [];
      for (const chapter of chapters) {
        for (const verse of chapter.verses) {
          words.push(...wordsOfVerse(verse));
        }
      }
      this.state = {
        chapters: Object.freeze(chapters),
        words: Object.freeze(words),
      };
    } catch (error) {
      this.logger.error(MODULE, 'Corpus build failed', error);
      throw new CorpusError(`Failed to build corpus: ${describeError(error)}`, { cause: error });
    }

    this.logger.info(MODULE, 'Corpus built', {
      chapters: this.totalChapters(),
      verses: this.totalVerses(),
      words: this.totalWords(),
    });
  }

  get chapters(): readonly Chapter[] {
    return this.built().chapters;
  }

  get words(): readonly Word[] {
    return this.built().words;
  }

  getChapter(index: number): Chapter | null {
    return this.built().chapters.find(chapter => chapter.index === index) ?? null;
  }

  getVerse(chapterIndex: number, verseIndex: number): Verse | null {
    const chapter = this.getChapter(chapterIndex);
    return chapter ? getVerse(chapter, verseIndex) : null;
  }

  /** A fresh filter over every word. */
  filterWords(): WordFilter {
    return new WordFilter(this.built().words);
  }

  totalChapters(): number {
    return this.built().chapters.length;
  }

  totalVerses(): number {
    return this.built().chapters.reduce((total, chapter) => total + chapter.verses.length, 0);
  }

  totalWords(): number {
    return this.built().words.length;
  }

  /** Word count per chapter index, in chapter order. */
  wordCountByChapter(): Map<number, number> {
    const counts = new Map<number, number>();
    for (const chapter of this.built().chapters) {
      counts.set(chapter.index, this.filterWords().byChapter(chapter.index).count());
    }
    return counts;
  }
}
