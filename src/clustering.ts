/**
 * Grouping words by graph connectivity or by a shared feature.
 */

import type { Word } from './entities.js';
import { wordKey } from './entities.js';
import type { WordGraph } from './graph.js';

export interface ClusterStatistics {
  clusterCount: number;
  totalWords: number;
  averageSize: number;
  maxSize: number;
  minSize: number;
}

/**
 * Connected components with at least `minClusterSize` members. Components
 * come out in the order their first node was registered.
 */
export function clusterByConnectivity(graph: WordGraph, minClusterSize = 2): Word[][] {
  const adjacency = new Map<string, string[]>();
  const wordsByKey = new Map<string, Word>();
  for (const node of graph.nodes()) {
    const key = wordKey(node.word);
    adjacency.set(key, []);
    wordsByKey.set(key, node.word);
  }
  for (const edge of graph.edges()) {
    const a = wordKey(edge.source);
    const b = wordKey(edge.target);
    adjacency.get(a)?.push(b);
    adjacency.get(b)?.push(a);
  }

  const seen = new Set<string>();
  const clusters: Word[][] = [];
  for (const start of adjacency.keys()) {
    if (seen.has(start)) continue;
    seen.add(start);

    const component: Word[] = [];
    const stack = [start];
    while (stack.length > 0) {
      const key = stack.pop();
      if (key === undefined) break;
      const word = wordsByKey.get(key);
      if (word) component.push(word);
      for (const next of adjacency.get(key) ?? []) {
        if (!seen.has(next)) {
          seen.add(next);
          stack.push(next);
        }
      }
    }

    if (component.length >= minClusterSize) clusters.push(component);
  }
  return clusters;
}

function clusterBy<K>(words: readonly Word[], feature: (word: Word) => K | null): Map<K, Word[]> {
  const clusters = new Map<K, Word[]>();
  for (const word of words) {
    const value = feature(word);
    if (value === null) continue;
    const cluster = clusters.get(value);
    if (cluster) cluster.push(word);
    else clusters.set(value, [word]);
  }
  return clusters;
}

export function clusterByRoot(words: readonly Word[]): Map<string, Word[]> {
  return clusterBy(words, word => word.root);
}

export function clusterByLemma(words: readonly Word[]): Map<string, Word[]> {
  return clusterBy(words, word => word.lemma);
}

export function clusterByChapter(words: readonly Word[]): Map<number, Word[]> {
  return clusterBy(words, word => word.chapter);
}

export function clusterStatistics(clusters: Iterable<readonly Word[]>): ClusterStatistics {
  const sizes = Array.from(clusters, cluster => cluster.length);
  if (sizes.length === 0) {
    return { clusterCount: 0, totalWords: 0, averageSize: 0, maxSize: 0, minSize: 0 };
  }
  const totals = sizes.reduce(
    (acc, size) => ({
      totalWords: acc.totalWords + size,
      maxSize: Math.max(acc.maxSize, size),
      minSize: Math.min(acc.minSize, size),
    }),
    { totalWords: 0, maxSize: 0, minSize: Number.POSITIVE_INFINITY }
  );
  return {
    clusterCount: sizes.length,
    totalWords: totals.totalWords,
    averageSize: totals.totalWords / sizes.length,
    maxSize: totals.maxSize,
    minSize: totals.minSize,
  };
}
