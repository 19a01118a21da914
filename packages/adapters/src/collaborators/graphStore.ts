import type { GraphStore, TokenizedText } from '@synapse/core';

export class InMemoryGraphStore implements GraphStore {
    private readonly documents = new Map<string, TokenizedText>();

    public async saveDocument(document: TokenizedText): Promise<void> {
        this.documents.set(document.original_id, document);
    }

    public get(originalId: string): TokenizedText | undefined {
        return this.documents.get(originalId);
    }

    public get size(): number {
        return this.documents.size;
    }
}
