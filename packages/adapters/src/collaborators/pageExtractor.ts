import type { PageExtractor } from '@synapse/core';

/**
 * Serves page text from a fixed url -> text map. Unknown urls extract to ''.
 */
export class StaticPageExtractor implements PageExtractor {
    private readonly pages: Map<string, string>;

    constructor(pages: Record<string, string> = {}) {
        this.pages = new Map(Object.entries(pages));
    }

    public setPage(url: string, text: string): void {
        this.pages.set(url, text);
    }

    public async extract(url: string): Promise<string> {
        return this.pages.get(url) ?? '';
    }
}
