import type { ScoredPoint, VectorPoint, VectorStore } from '@synapse/core';

/**
 * Brute-force cosine similarity over every stored point.
 */
export class InMemoryVectorStore implements VectorStore {
    private readonly points = new Map<string, VectorPoint>();
    private dimension: number | null = null;

    public async ensureCollection(dimension: number): Promise<void> {
        if (this.dimension !== null && this.dimension !== dimension) {
            throw new Error(`Collection already exists with dimension ${this.dimension}, requested ${dimension}`);
        }
        this.dimension = dimension;
    }

    public async upsert(points: VectorPoint[]): Promise<void> {
        for (const point of points) {
            this.assertDimension(point.vector);
            this.points.set(point.id, point);
        }
    }

    public async search(vector: number[], limit: number): Promise<ScoredPoint[]> {
        this.assertDimension(vector);
        return [...this.points.values()]
            .map((point) => ({ id: point.id, score: cosine(vector, point.vector), payload: point.payload }))
            .sort((a, b) => b.score - a.score)
            .slice(0, limit);
    }

    public get size(): number {
        return this.points.size;
    }

    private assertDimension(vector: number[]): void {
        if (this.dimension !== null && vector.length !== this.dimension) {
            throw new Error(`Vector dimension ${vector.length} does not match collection dimension ${this.dimension}`);
        }
    }
}

function cosine(a: number[], b: number[]): number {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dot += x * y;
        normA += x * x;
        normB += y * y;
    }
    if (normA === 0 || normB === 0) return 0;
    return dot / Math.sqrt(normA * normB);
}
