/**
 * Tests for word relations
 */

import { describe, it, expect } from 'vitest';
import {
  RelationBuilder,
  RELATION_KINDS,
  createRelation,
  involvesWord,
  otherWord,
} from '../src/relations.js';
import { wordKey } from '../src/entities.js';
import { DataValidationError } from '../src/errors.js';
import { makeWord } from './helpers/words.js';

const a = makeWord(1, 1, 0, { root: 'ktb', lemma: 'kataba', normalized: 'كتب' });
const b = makeWord(1, 1, 1, { root: 'ktb', lemma: 'kitaAb', normalized: 'كتاب' });
const c = makeWord(1, 2, 0, { root: 'ktb', lemma: 'kitaAb', normalized: 'كتاب' });
const d = makeWord(2, 1, 0, { root: 'qwl', normalized: 'قال' });
const e = makeWord(2, 1, 1, { normalized: 'قال' });

describe('createRelation', () => {
  it('defaults weight to 1 and metadata to null', () => {
    const relation = createRelation({ source: a, target: b, kind: 'custom' });

    expect(relation.weight).toBe(1);
    expect(relation.metadata).toBeNull();
    expect(Object.isFrozen(relation)).toBe(true);
  });

  it('accepts the weight bounds', () => {
    expect(createRelation({ source: a, target: b, kind: 'custom', weight: 0 }).weight).toBe(0);
    expect(createRelation({ source: a, target: b, kind: 'custom', weight: 1 }).weight).toBe(1);
  });

  it('rejects weights outside [0, 1]', () => {
    expect(() => createRelation({ source: a, target: b, kind: 'custom', weight: 1.5 })).toThrow(
      'Weight must be between 0.0 and 1.0, got 1.5'
    );
    expect(() => createRelation({ source: a, target: b, kind: 'custom', weight: -0.1 })).toThrow(DataValidationError);
    expect(() => createRelation({ source: a, target: b, kind: 'custom', weight: Number.NaN })).toThrow(
      DataValidationError
    );
  });

  it('rejects an empty kind', () => {
    expect(() => createRelation({ source: a, target: b, kind: '' })).toThrow('Relation kind cannot be empty');
  });
});

describe('membership helpers', () => {
  const relation = createRelation({ source: a, target: b, kind: 'custom' });

  it('finds the other member', () => {
    expect(otherWord(relation, a)).toBe(b);
    expect(otherWord(relation, b)).toBe(a);
    expect(otherWord(relation, c)).toBeNull();
  });

  it('checks membership by location', () => {
    expect(involvesWord(relation, a)).toBe(true);
    expect(involvesWord(relation, makeWord(1, 1, 1))).toBe(true);
    expect(involvesWord(relation, d)).toBe(false);
  });
});

describe('RelationBuilder', () => {
  it('relates every pair of words sharing a root', () => {
    const builder = new RelationBuilder();
    builder.buildRootRelations([a, b, c, d, e]);
    const relations = builder.getAll();

    expect(relations).toHaveLength(3);
    expect(relations.map(r => [wordKey(r.source), wordKey(r.target)])).toEqual([
      ['1:1:0', '1:1:1'],
      ['1:1:0', '1:2:0'],
      ['1:1:1', '1:2:0'],
    ]);
    expect(relations.every(r => r.kind === RELATION_KINDS.sharedRoot)).toBe(true);
    expect(relations.every(r => r.weight === 1)).toBe(true);
    expect(relations[0].metadata).toEqual({ root: 'ktb' });
  });

  it('never relates a word to itself', () => {
    const builder = new RelationBuilder();
    builder.buildRootRelations([a, b, c, d, e]);
    builder.buildLemmaRelations([a, b, c, d, e]);
    builder.buildNormalizedTextRelations([a, b, c, d, e]);

    expect(builder.getAll().every(r => wordKey(r.source) !== wordKey(r.target))).toBe(true);
  });

  it('relates a repeated word only once and never to itself', () => {
    const builder = new RelationBuilder();
    builder.buildRootRelations([a, b, a]);
    builder.buildLemmaRelations([b, c, makeWord(1, 2, 0, { lemma: 'kitaAb' })]);
    builder.buildNormalizedTextRelations([d, d]);
    const relations = builder.getAll();

    expect(relations.map(r => [wordKey(r.source), wordKey(r.target), r.kind])).toEqual([
      ['1:1:0', '1:1:1', RELATION_KINDS.sharedRoot],
      ['1:1:1', '1:2:0', RELATION_KINDS.sharedLemma],
    ]);
    expect(relations.every(r => wordKey(r.source) !== wordKey(r.target))).toBe(true);
  });

  it('relates shared lemmas at half weight', () => {
    const builder = new RelationBuilder();
    builder.buildLemmaRelations([a, b, c, d, e]);

    expect(builder.getAll()).toEqual([
      {
        source: b,
        target: c,
        kind: RELATION_KINDS.sharedLemma,
        weight: 0.5,
        metadata: { lemma: 'kitaAb' },
      },
    ]);
  });

  it('relates identical normalized text, including words without roots', () => {
    const builder = new RelationBuilder();
    builder.buildNormalizedTextRelations([a, b, c, d, e]);
    const relations = builder.getAll();

    expect(relations).toHaveLength(2);
    expect(relations.map(r => r.metadata)).toEqual([{ normalizedText: 'كتاب' }, { normalizedText: 'قال' }]);
    expect(relations.every(r => r.weight === 0.8)).toBe(true);
  });

  it('takes a custom weight and accumulates across passes', () => {
    const builder = new RelationBuilder();
    builder.buildRootRelations([a, b], 0.3);
    builder.buildLemmaRelations([b, c]);

    expect(builder.count()).toBe(2);
    expect(builder.getAll()[0].weight).toBe(0.3);
  });

  it('rejects a custom weight outside [0, 1]', () => {
    expect(() => new RelationBuilder().buildRootRelations([a, b], 2)).toThrow(DataValidationError);
  });

  it('produces nothing for words without shared features', () => {
    const builder = new RelationBuilder();
    builder.buildRootRelations([d, e]);
    builder.buildLemmaRelations([d, e]);

    expect(builder.count()).toBe(0);
  });

  it('returns a copy and can be cleared', () => {
    const builder = new RelationBuilder();
    builder.addRelation({ source: a, target: d, kind: 'custom', weight: 0.2 });
    const snapshot = builder.getAll();

    builder.clear();

    expect(snapshot).toHaveLength(1);
    expect(builder.count()).toBe(0);
    expect(builder.getAll()).toEqual([]);
  });
});
