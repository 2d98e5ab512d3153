/**
 * Weighted, symmetric links between words that share a feature.
 */

import { RELATION_WEIGHTS } from './config.js';
import { type Word, wordKey } from './entities.js';
import { DataValidationError } from './errors.js';

export const RELATION_KINDS = {
  sharedRoot: 'shared_root',
  sharedLemma: 'shared_lemma',
  identicalNormalized: 'identical_normalized',
} as const;

export type RelationMetadata = Readonly<Record<string, string>>;

export interface Relation {
  readonly source: Word;
  readonly target: Word;
  readonly kind: string;
  /** In [0, 1]. */
  readonly weight: number;
  readonly metadata: RelationMetadata | null;
}

export interface RelationInit {
  source: Word;
  target: Word;
  kind: string;
  weight?: number;
  metadata?: Record<string, string> | null;
}

export function createRelation(init: RelationInit): Relation {
  const weight = init.weight ?? 1.0;
  if (Number.isNaN(weight) || weight < 0 || weight > 1) {
    throw new DataValidationError(`Weight must be between 0.0 and 1.0, got ${weight}`);
  }
  if (!init.kind) {
    throw new DataValidationError('Relation kind cannot be empty');
  }

  return Object.freeze({
    source: init.source,
    target: init.target,
    kind: init.kind,
    weight,
    metadata: init.metadata ? Object.freeze({ ...init.metadata }) : null,
  });
}

export function involvesWord(relation: Relation, word: Word): boolean {
  const key = wordKey(word);
  return wordKey(relation.source) === key || wordKey(relation.target) === key;
}

/**
 * The member of the relation that is not `word`, or null when `word` is not a member.
 */
export function otherWord(relation: Relation, word: Word): Word | null {
  const key = wordKey(word);
  if (wordKey(relation.source) === key) return relation.target;
  if (wordKey(relation.target) === key) return relation.source;
  return null;
}

/**
 * Group by feature value. A word listed more than once joins its group once.
 */
function groupBy(words: readonly Word[], feature: (word: Word) => string | null): Map<string, Word[]> {
  const groups = new Map<string, Word[]>();
  const seen = new Set<string>();
  for (const word of words) {
    const value = feature(word);
    if (value === null) continue;
    const key = wordKey(word);
    if (seen.has(key)) continue;
    seen.add(key);
    const group = groups.get(value);
    if (group) group.push(word);
    else groups.set(value, [word]);
  }
  return groups;
}

/**
 * Accumulates relations across any combination of passes.
 *
 * Each pass groups words by a feature and relates every unordered pair in a
 * group, so a group of n words yields n(n-1)/2 relations. That is quadratic in
 * group size; very common surface forms produce large groups.
 */
export class RelationBuilder {
  private relations: Relation[] = [];

  addRelation(init: RelationInit): Relation {
    const relation = createRelation(init);
    this.relations.push(relation);
    return relation;
  }

  private relateGroups(
    groups: Map<string, Word[]>,
    kind: string,
    weight: number,
    metadataKey: string
  ): void {
    for (const [value, group] of groups) {
      for (let i = 0; i < group.length; i++) {
        for (let j = i + 1; j < group.length; j++) {
          this.addRelation({
            source: group[i],
            target: group[j],
            kind,
            weight,
            metadata: { [metadataKey]: value },
          });
        }
      }
    }
  }

  /** Words with the same non-absent root. */
  buildRootRelations(words: readonly Word[], weight: number = RELATION_WEIGHTS.sharedRoot): void {
    this.relateGroups(groupBy(words, word => word.root), RELATION_KINDS.sharedRoot, weight, 'root');
  }

  /** Words with the same non-absent lemma. */
  buildLemmaRelations(words: readonly Word[], weight: number = RELATION_WEIGHTS.sharedLemma): void {
    this.relateGroups(groupBy(words, word => word.lemma), RELATION_KINDS.sharedLemma, weight, 'lemma');
  }

  /** Words whose normalized text is identical. */
  buildNormalizedTextRelations(
    words: readonly Word[],
    weight: number = RELATION_WEIGHTS.identicalNormalized
  ): void {
    this.relateGroups(
      groupBy(words, word => word.normalized),
      RELATION_KINDS.identicalNormalized,
      weight,
      'normalizedText'
    );
  }

  getAll(): readonly Relation[] {
    return [...this.relations];
  }

  count(): number {
    return this.relations.length;
  }

  clear(): void {
    this.relations = [];
  }
}
