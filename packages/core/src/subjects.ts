/**
 * Bus subjects shared by every service. Names are part of the wire contract.
 */
export const SUBJECTS = {
  perceiveUrl: 'tasks.perceive.url',
  rawTextDiscovered: 'data.raw_text.discovered',
  textTokenized: 'data.processed_text.tokenized',
  textWithEmbeddings: 'data.text.with_embeddings',
  generateText: 'tasks.generation.text',
  textGenerated: 'events.text.generated',
  embeddingForQuery: 'tasks.embedding.for_query',
  semanticSearch: 'tasks.search.semantic.request',
} as const;

export type Subject = (typeof SUBJECTS)[keyof typeof SUBJECTS];

export const INBOX_PREFIX = '_INBOX';
