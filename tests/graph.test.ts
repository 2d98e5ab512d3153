/**
 * Tests for the word graph and clustering
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { WordGraph, GraphBuilder } from '../src/graph.js';
import { RelationBuilder, createRelation, type Relation } from '../src/relations.js';
import {
  clusterByConnectivity,
  clusterByRoot,
  clusterByLemma,
  clusterByChapter,
  clusterStatistics,
} from '../src/clustering.js';
import { Corpus } from '../src/corpus.js';
import { wordKey, type Word } from '../src/entities.js';
import { silentLogger } from '../src/logger.js';
import { makeWord } from './helpers/words.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const a = makeWord(1, 1, 0, { root: 'ktb', lemma: 'kitaAb', normalized: 'كتاب' });
const b = makeWord(1, 1, 1, { root: 'ktb', lemma: 'kitaAb', normalized: 'كتاب' });
const c = makeWord(1, 2, 0, { root: 'ktb' });
const d = makeWord(2, 1, 0, { root: 'qwl' });
const e = makeWord(2, 1, 1, { root: 'qwl' });
const f = makeWord(3, 1, 0);

const sortedKeys = (words: readonly Word[]): string[] => words.map(wordKey).sort();

describe('WordGraph', () => {
  it('starts empty', () => {
    const graph = new WordGraph();

    expect(graph.nodeCount()).toBe(0);
    expect(graph.edgeCount()).toBe(0);
    expect(graph.neighbors(a)).toEqual([]);
    expect(graph.getNode(a)).toBeNull();
  });

  it('keeps the first registration of a node', () => {
    const graph = new WordGraph();
    graph.addNode(a, { label: 'first' });
    graph.addNode(makeWord(1, 1, 0), { label: 'second' });

    expect(graph.nodeCount()).toBe(1);
    expect(graph.getNode(a)?.attributes).toEqual({ label: 'first' });
  });

  it('registers edge endpoints as nodes', () => {
    const graph = new WordGraph();
    graph.addEdge(a, b, 0.5, 'custom');

    expect(graph.hasNode(a)).toBe(true);
    expect(graph.hasNode(b)).toBe(true);
    expect(graph.edges()).toEqual([{ source: a, target: b, weight: 0.5, kind: 'custom' }]);
  });

  it('defaults edge weight and kind', () => {
    const graph = new WordGraph();
    graph.addEdge(a, b);

    expect(graph.edges()[0].weight).toBe(1);
    expect(graph.edges()[0].kind).toBe('unknown');
  });

  it('is undirected', () => {
    const graph = new WordGraph();
    graph.addEdge(a, b);

    expect(graph.neighbors(a)).toEqual([b]);
    expect(graph.neighbors(b)).toEqual([a]);
  });

  it('lists a neighbor once per edge and counts degree in edges', () => {
    const graph = new WordGraph();
    graph.addEdge(a, b, 1, 'shared_root');
    graph.addEdge(a, b, 0.5, 'shared_lemma');
    graph.addEdge(a, c);

    expect(graph.neighbors(a)).toEqual([b, b, c]);
    expect(graph.degree(a)).toBe(3);
    expect(graph.degree(b)).toBe(2);
    expect(graph.edgesFor(c)).toHaveLength(1);
    expect(graph.degree(f)).toBe(0);
  });

  it('induces subgraphs on the given words', () => {
    const graph = new WordGraph();
    graph.addNode(a, { label: 'a' });
    graph.addEdge(a, b);
    graph.addEdge(b, c);
    graph.addEdge(a, c);

    const sub = graph.subgraph([a, b, f]);

    expect(sortedKeys(sub.nodes().map(node => node.word))).toEqual(['1:1:0', '1:1:1']);
    expect(sub.edgeCount()).toBe(1);
    expect(sub.getNode(a)?.attributes).toEqual({ label: 'a' });
  });

  it('keeps exactly the edges whose endpoints are both selected', () => {
    const pool = [a, b, c, d, e, f];
    const pairs = fc.tuple(fc.nat({ max: 5 }), fc.nat({ max: 5 }));

    fc.assert(
      fc.property(fc.array(pairs, { maxLength: 12 }), fc.subarray(pool), (edges, selected) => {
        const graph = new WordGraph();
        for (const word of pool) graph.addNode(word);
        for (const [i, j] of edges) graph.addEdge(pool[i], pool[j]);

        const sub = graph.subgraph(selected);
        const keys = new Set(selected.map(wordKey));
        const expected = graph.edges().filter(edge => keys.has(wordKey(edge.source)) && keys.has(wordKey(edge.target)));

        expect(sub.nodeCount()).toBe(selected.length);
        expect(sub.edges()).toEqual(expected);
      })
    );
  });
});

describe('GraphBuilder', () => {
  it('builds an empty graph from no relations', () => {
    const graph = new GraphBuilder().buildFromRelations([]);

    expect(graph.nodeCount()).toBe(0);
    expect(graph.edgeCount()).toBe(0);
  });

  it('adds one edge per relation', () => {
    const relations: Relation[] = [
      createRelation({ source: a, target: b, kind: 'shared_root' }),
      createRelation({ source: a, target: b, kind: 'shared_lemma', weight: 0.5 }),
      createRelation({ source: d, target: e, kind: 'shared_root' }),
    ];
    const builder = new GraphBuilder();
    const graph = builder.buildFromRelations(relations);

    expect(graph.edgeCount()).toBe(3);
    expect(graph.nodeCount()).toBe(4);
    expect(builder.getGraph()).toBe(graph);
  });

  it('starts a fresh graph on every build', () => {
    const builder = new GraphBuilder();
    builder.buildFromRelations([createRelation({ source: a, target: b, kind: 'x' })]);
    const second = builder.buildFromRelations([createRelation({ source: d, target: e, kind: 'x' })]);

    expect(second.hasNode(a)).toBe(false);
    expect(second.edgeCount()).toBe(1);
  });

  it('runs the selected relation passes', () => {
    const words = [a, b, c, d, e, f];
    const builder = new GraphBuilder();

    // roots: ktb gives 3 pairs, qwl gives 1; lemma kitaAb gives 1; normalized كتاب gives 1
    expect(builder.buildFromWords(words).edgeCount()).toBe(6);
    expect(builder.buildFromWords(words, { useLemmas: false, useNormalized: false }).edgeCount()).toBe(4);
    expect(builder.buildFromWords(words, { useRoots: false }).edgeCount()).toBe(2);
    expect(builder.buildFromWords(words, { useRoots: false, useLemmas: false, useNormalized: false }).nodeCount()).toBe(0);
  });

  it('adds no self-loops for a word listed twice', () => {
    const graph = new GraphBuilder().buildFromWords([a, b, a], { useLemmas: false, useNormalized: false });

    expect(graph.edgeCount()).toBe(1);
    expect(graph.degree(a)).toBe(1);
    expect(graph.neighbors(a)).toEqual([b]);
  });

  it('matches a relation builder run by hand', () => {
    const relations = new RelationBuilder();
    relations.buildRootRelations([a, b, c, d, e, f]);

    const graph = new GraphBuilder().buildFromWords([a, b, c, d, e, f], { useLemmas: false, useNormalized: false });

    expect(graph.edgeCount()).toBe(relations.count());
  });

  it('links repeated surface forms in the fixture corpus', () => {
    const corpus = new Corpus(join(__dirname, 'fixtures', 'surah'), {
      range: { start: 1, end: 3 },
      logger: silentLogger,
    });
    corpus.build();

    const graph = new GraphBuilder().buildFromWords(corpus.words);

    expect(graph.nodeCount()).toBe(3);
    expect(graph.edgeCount()).toBe(3);
    expect(sortedKeys(graph.nodes().map(node => node.word))).toEqual(['1:2:0', '1:2:2', '3:1:0']);
  });
});

describe('clustering', () => {
  const graph = new GraphBuilder().buildFromWords([a, b, c, d, e, f], { useLemmas: false, useNormalized: false });

  it('finds connected components', () => {
    const clusters = clusterByConnectivity(graph);

    expect(clusters.map(sortedKeys)).toEqual([
      ['1:1:0', '1:1:1', '1:2:0'],
      ['2:1:0', '2:1:1'],
    ]);
  });

  it('drops components below the minimum size', () => {
    graph.addNode(f);

    expect(clusterByConnectivity(graph, 3).map(sortedKeys)).toEqual([['1:1:0', '1:1:1', '1:2:0']]);
    expect(clusterByConnectivity(graph, 1)).toHaveLength(3);
  });

  it('groups by root, lemma and chapter', () => {
    const words = [a, b, c, d, e, f];

    expect([...clusterByRoot(words).keys()]).toEqual(['ktb', 'qwl']);
    expect(clusterByRoot(words).get('ktb')).toEqual([a, b, c]);
    expect([...clusterByLemma(words)]).toEqual([['kitaAb', [a, b]]]);
    expect([...clusterByChapter(words)].map(([chapter, members]) => [chapter, members.length])).toEqual([
      [1, 3],
      [2, 2],
      [3, 1],
    ]);
  });

  it('summarizes cluster sizes', () => {
    expect(clusterStatistics(clusterByRoot([a, b, c, d, e, f]).values())).toEqual({
      clusterCount: 2,
      totalWords: 5,
      averageSize: 2.5,
      maxSize: 3,
      minSize: 2,
    });
    const many = Array.from({ length: 500_000 }, (_, i) => (i === 7 ? [a, b, c] : [a]));
    expect(clusterStatistics(many)).toEqual({
      clusterCount: 500_000,
      totalWords: 500_002,
      averageSize: 500_002 / 500_000,
      maxSize: 3,
      minSize: 1,
    });
    expect(clusterStatistics([])).toEqual({
      clusterCount: 0,
      totalWords: 0,
      averageSize: 0,
      maxSize: 0,
      minSize: 0,
    });
  });
});
