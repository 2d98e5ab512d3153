/**
 * Conversion of the Tanzil XML distribution into chapter documents.
 *
 * Expected input:
 *
 *   <quran>
 *     <sura index="1" name="...">
 *       <aya index="1" text="..." />
 *     </sura>
 *   </quran>
 */

import { XMLParser } from 'fast-xml-parser';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { chapterFileName } from './config.js';
import { DataValidationError } from './errors.js';
import type { ChapterDocument } from './schema.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readIndex(element: Record<string, unknown>, what: string): number {
  const raw = element['@_index'];
  const index = typeof raw === 'string' && /^\d+$/.test(raw.trim()) ? parseInt(raw, 10) : NaN;
  if (!Number.isInteger(index) || index < 1) {
    throw new DataValidationError(`${what} has an invalid index: ${String(raw)}`);
  }
  return index;
}

function readString(element: Record<string, unknown>, attribute: string, what: string): string {
  const value = element[`@_${attribute}`];
  if (typeof value !== 'string' || !value.trim()) {
    throw new DataValidationError(`${what} is missing its ${attribute}`);
  }
  return value;
}

/**
 * Parse Tanzil XML into one document per chapter. Verses get a global
 * sequence number in document order.
 */
export function parseTanzilXml(xml: string): ChapterDocument[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseAttributeValue: false,
    trimValues: false, // Preserve whitespace inside verse text
    isArray: name => name === 'sura' || name === 'aya',
  });

  const doc: unknown = parser.parse(xml);
  const root = isRecord(doc) ? doc['quran'] : undefined;
  if (!isRecord(root)) {
    throw new DataValidationError('Missing <quran> root element');
  }

  const suras = Array.isArray(root['sura']) ? root['sura'] : [];
  const documents: ChapterDocument[] = [];
  let sequence = 1;

  for (const sura of suras) {
    if (!isRecord(sura)) continue;

    const number = readIndex(sura, 'sura');
    const name = readString(sura, 'name', `sura ${number}`);
    const ayas = Array.isArray(sura['aya']) ? sura['aya'] : [];

    const ayahs: ChapterDocument['ayahs'] = [];
    for (const aya of ayas) {
      if (!isRecord(aya)) continue;
      const numberInSurah = readIndex(aya, `aya in sura ${number}`);
      const text = readString(aya, 'text', `aya ${number}:${numberInSurah}`);
      ayahs.push({ numberInSurah, text, number: sequence++ });
    }

    if (ayahs.length === 0) {
      throw new DataValidationError(`sura ${number} has no verses`);
    }
    documents.push({ number, name, ayahs });
  }

  return documents;
}

/**
 * Write each document as `surah_<n>.json` under the directory.
 */
export function writeChapterDocuments(documents: readonly ChapterDocument[], directory: string): string[] {
  mkdirSync(directory, { recursive: true });
  return documents.map(document => {
    const filePath = join(directory, chapterFileName(document.number));
    writeFileSync(filePath, JSON.stringify(document, null, 2), 'utf-8');
    return filePath;
  });
}
