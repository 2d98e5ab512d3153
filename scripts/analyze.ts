/**
 * Builds the corpus and prints its statistics.
 *
 * Usage: npx tsx scripts/analyze.ts [--data-path <dir>] [--snapshot <file>] [--include-words]
 */

import { parseArgs } from 'util';
import { resolve } from 'path';
import { resolveDataPath } from '../src/config.js';
import { Corpus } from '../src/corpus.js';
import { GraphBuilder } from '../src/graph.js';
import { clusterByConnectivity, clusterStatistics } from '../src/clustering.js';
import { SnapshotExporter } from '../src/snapshot.js';

function main(): void {
  const { values } = parseArgs({
    options: {
      'data-path': { type: 'string' },
      snapshot: { type: 'string' },
      'include-words': { type: 'boolean', default: false },
    },
  });

  const dataPath = values['data-path'] ? resolve(values['data-path']) : resolveDataPath();
  console.log(`Building corpus from ${dataPath}...`);

  const corpus = new Corpus(dataPath);
  corpus.build();

  console.log(`\nChapters: ${corpus.totalChapters()}`);
  console.log(`Verses:   ${corpus.totalVerses()}`);
  console.log(`Words:    ${corpus.totalWords()}`);

  console.log('\nWords per chapter (first 10):');
  const counts = corpus.wordCountByChapter();
  for (const chapter of corpus.chapters.slice(0, 10)) {
    const count = counts.get(chapter.index) ?? 0;
    console.log(`  ${String(chapter.index).padStart(3)}  ${chapter.name.padEnd(20)} ${String(count).padStart(5)}`);
  }

  const firstChapter = corpus.chapters[0];
  if (firstChapter) {
    const words = corpus.filterWords().byChapter(firstChapter.index).get();
    const graph = new GraphBuilder().buildFromWords(words);
    const stats = clusterStatistics(clusterByConnectivity(graph));
    console.log(`\nChapter ${firstChapter.index} graph: ${graph.nodeCount()} nodes, ${graph.edgeCount()} edges`);
    console.log(`  Clusters: ${stats.clusterCount} (largest ${stats.maxSize})`);
  }

  if (values.snapshot) {
    const outputPath = resolve(values.snapshot);
    new SnapshotExporter(corpus).writeFullSnapshot(outputPath, { includeWords: values['include-words'] });
    console.log(`\n✓ Snapshot written to ${outputPath}`);
  }
}

try {
  main();
} catch (error) {
  console.error('Analysis failed:', error);
  process.exit(1);
}
