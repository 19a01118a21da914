import { describe, expect, it } from 'vitest';

import {
  EchoTextGenerator,
  HashingEmbeddingModel,
  InMemoryGraphStore,
  InMemoryVectorStore,
  StaticPageExtractor
} from '../src/index';

const payload = (sentence: string, order: number) => ({
  original_document_id: 'doc-1',
  source_url: 'http://example.test/a',
  sentence_text: sentence,
  sentence_order: order,
  model_name: 'test-model',
  processed_at_ms: 1_700_000_000_000,
});

describe('StaticPageExtractor', () => {
  it('returns known page text and empty text otherwise', async () => {
    const extractor = new StaticPageExtractor({ 'http://example.test/a': 'Hello world.' });

    expect(await extractor.extract('http://example.test/a')).toBe('Hello world.');
    expect(await extractor.extract('http://example.test/missing')).toBe('');
  });
});

describe('HashingEmbeddingModel', () => {
  it('returns one normalised vector per sentence of the configured dimension', async () => {
    const model = new HashingEmbeddingModel({ dimension: 64, modelName: 'test-model' });

    const [first, second, third] = await model.embed(['Cats purr.', 'cats PURR', 'Dogs bark.']);

    expect(model.modelName).toBe('test-model');
    expect(first).toHaveLength(64);
    expect(first).toEqual(second);
    expect(third).not.toEqual(first);
    const norm = Math.sqrt((first ?? []).reduce((sum, v) => sum + v * v, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it('rejects a non-positive dimension', () => {
    expect(() => new HashingEmbeddingModel({ dimension: 0 })).toThrow(
      'Embedding dimension must be a positive integer, got 0'
    );
  });
});

describe('EchoTextGenerator', () => {
  it('cycles prompt words up to max length', async () => {
    const generator = new EchoTextGenerator();

    expect(await generator.generate('a b', 5)).toBe('a b a b a');
    expect(await generator.generate(null, 3)).toBe('the quick brown');
  });
});

describe('InMemoryGraphStore', () => {
  it('stores documents by original id', async () => {
    const store = new InMemoryGraphStore();
    const document = {
      original_id: 'doc-1',
      source_url: 'http://example.test/a',
      tokens: ['Hi.'],
      sentences: ['Hi.'],
      timestamp_ms: 1,
    };

    await store.saveDocument(document);

    expect(store.size).toBe(1);
    expect(store.get('doc-1')).toEqual(document);
  });
});

describe('InMemoryVectorStore', () => {
  it('ranks points by cosine similarity and honours the limit', async () => {
    const store = new InMemoryVectorStore();
    await store.ensureCollection(2);
    await store.upsert([
      { id: 'p1', vector: [1, 0], payload: payload('east', 0) },
      { id: 'p2', vector: [0, 1], payload: payload('north', 1) },
      { id: 'p3', vector: [1, 1], payload: payload('north-east', 2) },
    ]);

    const results = await store.search([1, 0], 2);

    expect(results.map((r) => r.id)).toEqual(['p1', 'p3']);
    expect(results[0]?.score).toBeCloseTo(1, 10);
    expect(results[1]?.score).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it('rejects vectors of the wrong dimension', async () => {
    const store = new InMemoryVectorStore();
    await store.ensureCollection(3);

    await expect(store.search([1, 0], 1)).rejects.toThrow(
      'Vector dimension 2 does not match collection dimension 3'
    );
  });
});
