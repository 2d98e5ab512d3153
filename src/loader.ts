/**
 * Reads chapter documents and materializes Chapter/Verse records.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import { TOTAL_CHAPTERS, chapterFileName } from './config.js';
import { createChapter, createVerse, isValidChapterIndex, type Chapter } from './entities.js';
import { CorpusError, DataLoadError, DataValidationError, describeError } from './errors.js';
import { getDefaultLogger, type Logger } from './logger.js';
import { chapterDocumentSchema, describeSchemaIssue, type ChapterDocument } from './schema.js';

const MODULE = 'loader';

export type ChapterStatus =
  | { index: number; status: 'valid'; verseCount: number }
  | { index: number; status: 'invalid'; reason: string }
  | { index: number; status: 'missing' };

export interface VerificationReport {
  /** One entry per chapter index, ascending. */
  chapters: ChapterStatus[];
  validChapters: number;
  totalVerses: number;
  missing: number[];
  invalid: Array<{ index: number; reason: string }>;
}

export interface ChapterLoaderOptions {
  logger?: Logger;
}

export class ChapterLoader {
  readonly dataPath: string;
  private readonly logger: Logger;

  constructor(dataPath: string, options: ChapterLoaderOptions = {}) {
    if (!existsSync(dataPath)) {
      throw new DataLoadError(`Data path does not exist: ${dataPath}`);
    }
    if (!statSync(dataPath).isDirectory()) {
      throw new DataLoadError(`Data path is not a directory: ${dataPath}`);
    }
    this.dataPath = dataPath;
    this.logger = options.logger ?? getDefaultLogger();
  }

  /**
   * Path of the document for a chapter index.
   */
  chapterPath(index: number): string {
    return join(this.dataPath, chapterFileName(index));
  }

  /**
   * Load and validate a single chapter.
   */
  loadChapter(index: number): Chapter {
    if (!isValidChapterIndex(index)) {
      throw new DataLoadError(`Invalid chapter index: ${index}`);
    }

    const filePath = this.chapterPath(index);
    if (!existsSync(filePath)) {
      throw new DataLoadError(`Chapter file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new DataLoadError(`Invalid JSON in ${filePath}: ${error.message}`, { cause: error });
      }
      throw new DataLoadError(`Failed to read ${filePath}: ${describeError(error)}`, { cause: error });
    }

    const document = this.validate(raw, index, filePath);
    const chapter = this.toChapter(document, index, filePath);
    this.logger.debug(MODULE, `Loaded chapter ${index}`, { verses: chapter.verses.length });
    return chapter;
  }

  /**
   * Load an inclusive range of chapters in ascending order. Any failure fails the whole call.
   */
  loadAll(start = 1, end = TOTAL_CHAPTERS): Chapter[] {
    if (!isValidChapterIndex(start)) {
      throw new DataLoadError(`Invalid start chapter index: ${start}`);
    }
    if (!isValidChapterIndex(end)) {
      throw new DataLoadError(`Invalid end chapter index: ${end}`);
    }
    if (start > end) {
      throw new DataLoadError(`Start (${start}) must be <= end (${end})`);
    }

    const chapters: Chapter[] = [];
    for (let index = start; index <= end; index++) {
      chapters.push(this.loadChapter(index));
    }
    return chapters;
  }

  /**
   * Classify every chapter as valid, invalid or missing without stopping at the first problem.
   */
  verify(): VerificationReport {
    const report: VerificationReport = {
      chapters: [],
      validChapters: 0,
      totalVerses: 0,
      missing: [],
      invalid: [],
    };

    for (let index = 1; index <= TOTAL_CHAPTERS; index++) {
      if (!existsSync(this.chapterPath(index))) {
        report.chapters.push({ index, status: 'missing' });
        report.missing.push(index);
        continue;
      }

      try {
        const chapter = this.loadChapter(index);
        report.chapters.push({ index, status: 'valid', verseCount: chapter.verses.length });
        report.validChapters++;
        report.totalVerses += chapter.verses.length;
      } catch (error) {
        if (!(error instanceof CorpusError)) throw error;
        report.chapters.push({ index, status: 'invalid', reason: error.message });
        report.invalid.push({ index, reason: error.message });
        this.logger.warn(MODULE, `Chapter ${index} is invalid`, { reason: error.message });
      }
    }

    if (report.missing.length > 0) {
      this.logger.warn(MODULE, `${report.missing.length} chapter file(s) missing`, { dataPath: this.dataPath });
    }
    return report;
  }

  private validate(raw: unknown, index: number, filePath: string): ChapterDocument {
    const parsed = chapterDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DataValidationError(`Invalid chapter document ${filePath}: ${describeSchemaIssue(parsed.error)}`, {
        cause: parsed.error,
      });
    }
    if (parsed.data.number !== index) {
      throw new DataValidationError(`Chapter index mismatch: expected ${index}, got ${parsed.data.number}`);
    }
    return parsed.data;
  }

  private toChapter(document: ChapterDocument, index: number, filePath: string): Chapter {
    try {
      const verses = document.ayahs.map(entry =>
        createVerse({
          chapter: index,
          index: entry.numberInSurah,
          text: entry.text,
          sequence: entry.number ?? null,
        })
      );
      return createChapter({
        index,
        name: document.name,
        verses,
        englishName: document.englishName ?? null,
        revelationType: document.revelationType ?? null,
      });
    } catch (error) {
      if (error instanceof DataValidationError) {
        throw new DataValidationError(`Invalid chapter document ${filePath}: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }
}
