import OpenAI from "openai";

export interface EmbeddingService {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

const MODEL_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
};

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model?: string;
  /** Required for models outside the built-in table. */
  dimensions?: number;
  client?: OpenAI;
}

export class OpenAIEmbeddingService implements EmbeddingService {
  readonly dimensions: number;
  private client: OpenAI;
  private model: string;

  constructor(options: OpenAIEmbeddingOptions) {
    this.model = options.model ?? "text-embedding-3-small";
    const dimensions = options.dimensions ?? MODEL_DIMENSIONS[this.model];
    if (dimensions === undefined) {
      throw new Error(`Unknown dimensions for embedding model ${this.model}`);
    }
    this.dimensions = dimensions;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
  }

  async embed(text: string): Promise<number[]> {
    const res = await this.client.embeddings.create({ model: this.model, input: text });
    const first = res.data[0];
    if (!first) throw new Error(`No embedding returned by ${this.model}`);
    return first.embedding;
  }
}
