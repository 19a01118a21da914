import type { TextGenerator } from '@synapse/core';

const DEFAULT_SEED = 'the quick brown fox jumps over the lazy dog';

/**
 * Repeats the prompt's words (or a fixed seed) until `maxLength` words have
 * been produced.
 */
export class EchoTextGenerator implements TextGenerator {
    constructor(private readonly seed: string = DEFAULT_SEED) { }

    public async generate(prompt: string | null, maxLength: number): Promise<string> {
        const words = (prompt?.trim() || this.seed).split(/\s+/u);
        const output: string[] = [];
        for (let i = 0; i < maxLength; i++) {
            output.push(words[i % words.length] ?? '');
        }
        return output.join(' ');
    }
}
