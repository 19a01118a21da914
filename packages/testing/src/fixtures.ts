import type {
  GenerateTextTask,
  GeneratedText,
  PointPayload,
  QueryEmbeddingResult,
  RawText,
  ResultItem,
  SearchResult,
  TextWithEmbeddings,
  TokenizedText,
} from "@synapse/core";

export const TEST_URL = "http://example.test/articles/1";
export const TEST_TIMESTAMP_MS = 1_767_225_600_000;
export const TEST_MODEL_NAME = "test-embedding-model";

export function createRawText(overrides?: Partial<RawText>): RawText {
  return {
    id: "raw-1",
    source_url: TEST_URL,
    raw_text: "Cats purr. Dogs bark!",
    timestamp_ms: TEST_TIMESTAMP_MS,
    ...overrides,
  };
}

export function createTokenizedText(overrides?: Partial<TokenizedText>): TokenizedText {
  return {
    original_id: "raw-1",
    source_url: TEST_URL,
    tokens: ["Cats", "purr.", "Dogs", "bark!"],
    sentences: ["Cats purr.", "Dogs bark!"],
    timestamp_ms: TEST_TIMESTAMP_MS,
    ...overrides,
  };
}

export function createTextWithEmbeddings(overrides?: Partial<TextWithEmbeddings>): TextWithEmbeddings {
  return {
    original_id: "raw-1",
    source_url: TEST_URL,
    embeddings_data: [
      { sentence_text: "Cats purr.", embedding: [1, 0] },
      { sentence_text: "Dogs bark!", embedding: [0, 1] },
    ],
    model_name: TEST_MODEL_NAME,
    timestamp_ms: TEST_TIMESTAMP_MS,
    ...overrides,
  };
}

export function createGenerateTextTask(overrides?: Partial<GenerateTextTask>): GenerateTextTask {
  return {
    task_id: "task-1",
    prompt: "once upon a time",
    max_length: 8,
    ...overrides,
  };
}

export function createGeneratedText(overrides?: Partial<GeneratedText>): GeneratedText {
  return {
    original_task_id: "task-1",
    generated_text: "once upon a time",
    timestamp_ms: TEST_TIMESTAMP_MS,
    ...overrides,
  };
}

export function createPointPayload(overrides?: Partial<PointPayload>): PointPayload {
  return {
    original_document_id: "raw-1",
    source_url: TEST_URL,
    sentence_text: "Cats purr.",
    sentence_order: 0,
    model_name: TEST_MODEL_NAME,
    processed_at_ms: TEST_TIMESTAMP_MS,
    ...overrides,
  };
}

export function createResultItem(overrides?: Partial<ResultItem>): ResultItem {
  return {
    qdrant_point_id: "point-1",
    score: 0.9,
    payload: createPointPayload(),
    ...overrides,
  };
}

export function createQueryEmbeddingResult(overrides?: Partial<QueryEmbeddingResult>): QueryEmbeddingResult {
  return {
    request_id: "req-1",
    embedding: [0.1, 0.2, 0.3],
    model_name: TEST_MODEL_NAME,
    error_message: null,
    ...overrides,
  };
}

export function createSearchResult(overrides?: Partial<SearchResult>): SearchResult {
  return {
    request_id: "req-1",
    results: [createResultItem()],
    error_message: null,
    ...overrides,
  };
}
