/**
 * Word graph: nodes are words (keyed by identity), edges are relations.
 */

import { type Word, wordKey } from './entities.js';
import { GraphBuildError, describeError } from './errors.js';
import { RelationBuilder, type Relation } from './relations.js';

export type NodeAttributes = Readonly<Record<string, unknown>>;

export interface GraphNode {
  readonly word: Word;
  readonly attributes: NodeAttributes;
}

export interface GraphEdge {
  readonly source: Word;
  readonly target: Word;
  readonly weight: number;
  readonly kind: string;
}

export class WordGraph {
  private readonly nodeMap = new Map<string, GraphNode>();
  private readonly edgeList: GraphEdge[] = [];

  /** Register a word. The first registration's attributes are kept. */
  addNode(word: Word, attributes: Record<string, unknown> = {}): void {
    const key = wordKey(word);
    if (!this.nodeMap.has(key)) {
      this.nodeMap.set(key, Object.freeze({ word, attributes: Object.freeze({ ...attributes }) }));
    }
  }

  /** Add an edge, registering both endpoints. Parallel edges are kept. */
  addEdge(source: Word, target: Word, weight = 1.0, kind = 'unknown'): void {
    this.addNode(source);
    this.addNode(target);
    this.edgeList.push(Object.freeze({ source, target, weight, kind }));
  }

  hasNode(word: Word): boolean {
    return this.nodeMap.has(wordKey(word));
  }

  getNode(word: Word): GraphNode | null {
    return this.nodeMap.get(wordKey(word)) ?? null;
  }

  nodes(): GraphNode[] {
    return [...this.nodeMap.values()];
  }

  edges(): readonly GraphEdge[] {
    return [...this.edgeList];
  }

  /**
   * One entry per incident edge, so a word related twice to the same
   * neighbor lists it twice.
   */
  neighbors(word: Word): Word[] {
    const key = wordKey(word);
    const result: Word[] = [];
    for (const edge of this.edgeList) {
      if (wordKey(edge.source) === key) result.push(edge.target);
      else if (wordKey(edge.target) === key) result.push(edge.source);
    }
    return result;
  }

  edgesFor(word: Word): GraphEdge[] {
    const key = wordKey(word);
    return this.edgeList.filter(edge => wordKey(edge.source) === key || wordKey(edge.target) === key);
  }

  nodeCount(): number {
    return this.nodeMap.size;
  }

  edgeCount(): number {
    return this.edgeList.length;
  }

  /** Number of incident edges, not distinct neighbors. */
  degree(word: Word): number {
    return this.edgesFor(word).length;
  }

  /**
   * Induced subgraph: the given words that are nodes here, and every edge
   * with both endpoints among them.
   */
  subgraph(words: Iterable<Word>): WordGraph {
    const keys = new Set<string>();
    const sub = new WordGraph();

    for (const word of words) {
      const node = this.getNode(word);
      if (!node) continue;
      keys.add(wordKey(word));
      sub.addNode(node.word, node.attributes);
    }

    for (const edge of this.edgeList) {
      if (keys.has(wordKey(edge.source)) && keys.has(wordKey(edge.target))) {
        sub.addEdge(edge.source, edge.target, edge.weight, edge.kind);
      }
    }
    return sub;
  }
}

export interface BuildFromWordsOptions {
  useRoots?: boolean;
  useLemmas?: boolean;
  useNormalized?: boolean;
}

export class GraphBuilder {
  private graph = new WordGraph();

  /**
   * A fresh graph with exactly one edge per relation.
   */
  buildFromRelations(relations: readonly Relation[]): WordGraph {
    try {
      const graph = new WordGraph();
      for (const relation of relations) {
        graph.addEdge(relation.source, relation.target, relation.weight, relation.kind);
      }
      this.graph = graph;
      return graph;
    } catch (error) {
      throw new GraphBuildError(`Failed to build graph: ${describeError(error)}`, { cause: error });
    }
  }

  /**
   * Run the selected relation passes over the words, then build from the result.
   */
  buildFromWords(words: readonly Word[], options: BuildFromWordsOptions = {}): WordGraph {
    let relations: readonly Relation[];
    try {
      const builder = new RelationBuilder();
      if (options.useRoots ?? true) builder.buildRootRelations(words);
      if (options.useLemmas ?? true) builder.buildLemmaRelations(words);
      if (options.useNormalized ?? true) builder.buildNormalizedTextRelations(words);
      relations = builder.getAll();
    } catch (error) {
      throw new GraphBuildError(`Failed to build graph from words: ${describeError(error)}`, { cause: error });
    }
    return this.buildFromRelations(relations);
  }

  /** The most recently built graph. */
  getGraph(): WordGraph {
    return this.graph;
  }
}
