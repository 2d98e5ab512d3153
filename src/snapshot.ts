/**
 * JSON snapshots of a built corpus.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { EXPORT_FORMAT_VERSION } from './config.js';
import type { Corpus } from './corpus.js';
import type { Word } from './entities.js';
import { ExportError, describeError } from './errors.js';

export interface SnapshotMetadata {
  formatVersion: string;
  exportedAt: string;
  totalChapters: number;
  totalVerses: number;
  totalWords: number;
}

export interface SerializedWord {
  chapter?: number;
  verse?: number;
  position?: number;
  text?: string;
  normalized?: string;
  transliterated?: string;
  root?: string;
  lemma?: string;
}

export interface SerializeOptions {
  includeLocation?: boolean;
  includeText?: boolean;
  includeNormalized?: boolean;
  includeTransliterated?: boolean;
}

export interface FullSnapshot {
  metadata: SnapshotMetadata;
  wordCountsByChapter: Record<string, number>;
  words?: SerializedWord[];
}

export interface ChapterSummary {
  chapter: number;
  name: string;
  englishName: string | null;
  revelationType: string | null;
  verseCount: number;
  wordCount: number;
  words: SerializedWord[];
}

export interface FilteredWordsExport {
  metadata: {
    exportedAt: string;
    wordCount: number;
    description: string | null;
  };
  words: SerializedWord[];
}

export interface SnapshotExporterOptions {
  /** Clock for the export timestamps. */
  now?: () => Date;
}

export function serializeWords(words: readonly Word[], options: SerializeOptions = {}): SerializedWord[] {
  return words.map(word => {
    const out: SerializedWord = {};
    if (options.includeLocation ?? true) {
      out.chapter = word.chapter;
      out.verse = word.verse;
      out.position = word.position;
    }
    if (options.includeText ?? true) out.text = word.text;
    if (options.includeNormalized ?? true) out.normalized = word.normalized;
    if (options.includeTransliterated ?? true) out.transliterated = word.transliterated;
    if (word.root !== null) out.root = word.root;
    if (word.lemma !== null) out.lemma = word.lemma;
    return out;
  });
}

function writeJson(outputPath: string, value: unknown): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, JSON.stringify(value, null, 2), 'utf-8');
}

export class SnapshotExporter {
  private readonly corpus: Corpus;
  private readonly now: () => Date;

  constructor(corpus: Corpus, options: SnapshotExporterOptions = {}) {
    this.corpus = corpus;
    this.now = options.now ?? (() => new Date());
  }

  metadata(): SnapshotMetadata {
    return {
      formatVersion: EXPORT_FORMAT_VERSION,
      exportedAt: this.now().toISOString(),
      totalChapters: this.corpus.totalChapters(),
      totalVerses: this.corpus.totalVerses(),
      totalWords: this.corpus.totalWords(),
    };
  }

  fullSnapshot(options: { includeWords?: boolean } = {}): FullSnapshot {
    const snapshot: FullSnapshot = {
      metadata: this.metadata(),
      wordCountsByChapter: Object.fromEntries(
        [...this.corpus.wordCountByChapter()].map(([index, count]) => [String(index), count])
      ),
    };
    if (options.includeWords) snapshot.words = serializeWords(this.corpus.words);
    return snapshot;
  }

  chapterSummary(index: number): ChapterSummary {
    const chapter = this.corpus.getChapter(index);
    if (!chapter) {
      throw new ExportError(`Chapter ${index} not found`);
    }
    const words = this.corpus.filterWords().byChapter(index).get();
    return {
      chapter: chapter.index,
      name: chapter.name,
      englishName: chapter.englishName,
      revelationType: chapter.revelationType,
      verseCount: chapter.verses.length,
      wordCount: words.length,
      words: serializeWords(words),
    };
  }

  filteredWords(words: readonly Word[], description: string | null = null): FilteredWordsExport {
    return {
      metadata: {
        exportedAt: this.now().toISOString(),
        wordCount: words.length,
        description,
      },
      words: serializeWords(words),
    };
  }

  writeFullSnapshot(outputPath: string, options: { includeWords?: boolean } = {}): void {
    this.write('snapshot', outputPath, () => this.fullSnapshot(options));
  }

  writeChapterSummary(index: number, outputPath: string): void {
    this.write('chapter summary', outputPath, () => this.chapterSummary(index));
  }

  writeFilteredWords(words: readonly Word[], outputPath: string, description: string | null = null): void {
    this.write('filtered words', outputPath, () => this.filteredWords(words, description));
  }

  private write(what: string, outputPath: string, build: () => unknown): void {
    try {
      writeJson(outputPath, build());
    } catch (error) {
      if (error instanceof ExportError) throw error;
      throw new ExportError(`Failed to export ${what}: ${describeError(error)}`, { cause: error });
    }
  }
}
