const SENTENCE_TERMINATORS = new Set(['.', '?', '!']);

/** Collapses every run of whitespace to one space and trims the ends. */
export function cleanText(raw: string): string {
  return raw.split(/\s+/u).filter((part) => part !== '').join(' ');
}

/**
 * Cuts after every `.`, `?` or `!`. Runs of terminators therefore yield
 * one-character sentences ("Wait..." -> "Wait.", ".", "."), and trailing
 * text without a terminator becomes the last sentence.
 */
export function splitSentences(cleaned: string): string[] {
  const sentences: string[] = [];
  let start = 0;

  for (let i = 0; i < cleaned.length; i++) {
    if (SENTENCE_TERMINATORS.has(cleaned.charAt(i))) {
      sentences.push(cleaned.slice(start, i + 1).trim());
      start = i + 1;
    }
  }

  const remainder = cleaned.slice(start).trim();
  if (remainder !== '') {
    sentences.push(remainder);
  }
  return sentences;
}

export function tokenize(cleaned: string): string[] {
  return cleaned === '' ? [] : cleaned.split(' ');
}
