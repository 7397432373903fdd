/**
 * Term-frequency sparse vectors over hashed term ids. The vector store
 * applies IDF, so only log-scaled term frequencies are computed here.
 */

export interface SparseVector {
  indices: number[];
  values: number[];
}

export function tokenizeTerms(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, " ")
    .split(/\s+/)
    .filter((term) => term.length > 2);
}

/** FNV-1a, folded to a non-negative 31-bit id. */
export function termId(term: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < term.length; i++) {
    hash ^= term.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0) & 0x7fffffff;
}

export function sparseVector(text: string): SparseVector {
  const tf = new Map<number, number>();
  for (const term of tokenizeTerms(text)) {
    const id = termId(term);
    tf.set(id, (tf.get(id) ?? 0) + 1);
  }
  const entries = [...tf.entries()].sort((a, b) => a[0] - b[0]);
  return {
    indices: entries.map(([id]) => id),
    values: entries.map(([, count]) => Math.log(1 + count)),
  };
}
