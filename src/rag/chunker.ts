/**
 * Token-bounded sliding-window chunking.
 */
import type { Tokenizer } from "./tokenizer.js";

export interface TokenSpan {
  start: number;
  end: number;
}

export interface TextChunk extends TokenSpan {
  text: string;
}

/** Number of chunks `chunkTokens` yields for `n` tokens. */
export function expectedChunkCount(n: number, size: number, overlap: number): number {
  if (n === 0) return 0;
  if (n <= size) return 1;
  return Math.ceil((n - overlap) / (size - overlap));
}

/**
 * Spans of at most `size` tokens, each starting `size - overlap` after
 * the previous one. The last span ends at `n`.
 */
export function chunkTokens(n: number, size: number, overlap: number): TokenSpan[] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new RangeError(`Chunk overlap must be in [0, ${size}), got ${overlap}`);
  }

  const spans: TokenSpan[] = [];
  for (let start = 0; start < n; start += size - overlap) {
    const end = Math.min(start + size, n);
    spans.push({ start, end });
    if (end >= n) break;
  }
  return spans;
}

/** Join the paragraphs of an article and split it into token chunks. */
export function chunkBlog(
  paragraphs: string[],
  tokenizer: Tokenizer,
  size: number,
  overlap: number,
): TextChunk[] {
  const tokens = tokenizer.encode(paragraphs.join(" "));
  return chunkTokens(tokens.length, size, overlap).map(({ start, end }) => ({
    start,
    end,
    text: tokenizer.decode(tokens.slice(start, end)),
  }));
}
