import type { EmbeddingService } from "./embeddings.js";
import type { HybridWeights, SearchHit, VectorStore } from "./vector-store.js";

export type SearchMode = "dense" | "sparse" | "hybrid";

export interface SearchDeps {
  embedder: EmbeddingService;
  store: VectorStore;
}

/** Top `k` article chunks for a free-text query. */
export async function searchArticles(
  deps: SearchDeps,
  query: string,
  k = 5,
  mode: SearchMode = "hybrid",
  weights?: HybridWeights,
): Promise<SearchHit[]> {
  const text = query.trim();
  if (text === "") return [];
  if (mode === "sparse") return deps.store.searchSparse(text, k);
  const vector = await deps.embedder.embed(text);
  return mode === "dense"
    ? deps.store.searchDense(vector, k)
    : deps.store.hybridSearch(text, vector, k, weights);
}
