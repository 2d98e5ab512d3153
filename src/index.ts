/**
 * quran-word-graph
 *
 * Word-level model of the Quranic text built from per-chapter JSON documents,
 * with relations between words and a graph over them.
 */

export * from './config.js';
export * from './errors.js';
export * from './logger.js';
export * from './entities.js';
export * from './normalizer.js';
export * from './transliterator.js';
export * from './tokenizer.js';
export * from './schema.js';
export * from './loader.js';
export * from './filter.js';
export * from './corpus.js';
export * from './relations.js';
export * from './graph.js';
export * from './clustering.js';
export * from './snapshot.js';
export * from './tanzil.js';
