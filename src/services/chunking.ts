/**
 * Chunking Service
 * Splits extracted document text into overlapping chunks for embedding
 */

export interface Chunk {
  text: string;
  position: number;
  tokens: number;
}

/**
 * Simple token estimator (approximation: 1 token ≈ 4 characters)
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function normalizeText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Splits text into chunks of at most `maxTokens`, preferring paragraph and
 * word boundaries. Consecutive chunks share up to `overlapTokens` of text.
 */
export function chunkText(content: string, maxTokens = 400, overlapTokens = 50): Chunk[] {
  const text = normalizeText(content);
  if (!text) return [];

  const maxChars = Math.max(1, maxTokens * 4);
  const overlapChars = Math.max(0, Math.min(overlapTokens * 4, Math.floor(maxChars / 3)));
  const chunks: Chunk[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + maxChars, text.length);

    if (end < text.length) {
      const window = text.slice(start, end);
      const paragraphBreak = window.lastIndexOf('\n\n');
      const wordBreak = window.lastIndexOf(' ');
      if (paragraphBreak > maxChars / 2) {
        end = start + paragraphBreak;
      } else if (wordBreak > 0) {
        end = start + wordBreak;
      }
    }

    const piece = text.slice(start, end).trim();
    if (piece.length > 0) {
      chunks.push({ text: piece, position: chunks.length, tokens: estimateTokens(piece) });
    }

    if (end >= text.length) break;

    // Overlap starts on a word boundary
    let next = end - overlapChars;
    if (next > 0 && !/\s/.test(text[next - 1])) {
      const boundary = text.indexOf(' ', next);
      if (boundary !== -1 && boundary < end) next = boundary + 1;
    }
    start = next > start ? next : end;
  }

  return chunks;
}
