/**
 * Import script for the Tanzil XML text.
 *
 * Converts a local Tanzil XML file into one JSON document per chapter.
 *
 * Usage: npx tsx scripts/import.ts <quran.xml> [outDir]
 */

import { readFile } from 'fs/promises';
import { join, dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { parseTanzilXml, writeChapterDocuments } from '../src/tanzil.js';
import { TOTAL_CHAPTERS } from '../src/config.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const ROOT_DIR = join(__dirname, '..');
const DATA_DIR = join(ROOT_DIR, 'data', 'surah');

async function main(): Promise<void> {
  console.log('Tanzil XML Importer');
  console.log('===================\n');

  const [xmlArg, outArg] = process.argv.slice(2);
  if (!xmlArg) {
    console.error('Usage: npx tsx scripts/import.ts <quran.xml> [outDir]');
    process.exit(1);
  }
  const outDir = outArg ? resolve(outArg) : DATA_DIR;

  try {
    const xml = await readFile(resolve(xmlArg), 'utf-8');
    const documents = parseTanzilXml(xml);

    if (documents.length !== TOTAL_CHAPTERS) {
      console.warn(`  ! Expected ${TOTAL_CHAPTERS} chapters, found ${documents.length}`);
    }

    const written = writeChapterDocuments(documents, outDir);
    const totalVerses = documents.reduce((total, document) => total + document.ayahs.length, 0);

    console.log(`\n✓ Imported ${written.length} chapters (${totalVerses} verses) to ${outDir}`);
  } catch (error) {
    console.error('Import failed:', error);
    process.exit(1);
  }
}

main().catch(console.error);
