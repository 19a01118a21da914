import { EMBEDDING_DEFAULTS, VECTOR_STORE_DEFAULTS, type EmbeddingModel } from '@synapse/core';

export interface HashingEmbeddingModelOptions {
    modelName?: string;
    dimension?: number;
}

/**
 * Deterministic bag-of-words embedding: every lowercased word is hashed into
 * one bucket and the vector is L2-normalised. Same text, same vector.
 */
export class HashingEmbeddingModel implements EmbeddingModel {
    public readonly modelName: string;
    public readonly dimension: number;

    constructor(options: HashingEmbeddingModelOptions = {}) {
        this.modelName = options.modelName ?? EMBEDDING_DEFAULTS.MODEL_NAME;
        this.dimension = options.dimension ?? VECTOR_STORE_DEFAULTS.VECTOR_DIMENSION;
        if (!Number.isInteger(this.dimension) || this.dimension < 1) {
            throw new Error(`Embedding dimension must be a positive integer, got ${this.dimension}`);
        }
    }

    public async embed(sentences: string[]): Promise<number[][]> {
        return sentences.map((sentence) => this.embedOne(sentence));
    }

    private embedOne(sentence: string): number[] {
        const vector = new Array<number>(this.dimension).fill(0);
        for (const word of sentence.toLowerCase().split(/\W+/u)) {
            if (!word) continue;
            const bucket = fnv1a(word) % this.dimension;
            vector[bucket] = (vector[bucket] ?? 0) + 1;
        }

        const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
        return norm === 0 ? vector : vector.map((value) => value / norm);
    }
}

function fnv1a(text: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < text.length; i++) {
        hash ^= text.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}
