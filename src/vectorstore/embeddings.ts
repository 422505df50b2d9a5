/**
 * embeddings.ts - Voyage AI embedding implementation
 *
 * What this file does:
 * Implements the EmbeddingFunction interface using Voyage AI's embedding API.
 * Voyage AI turns text into vectors that capture semantic meaning for
 * similarity search.
 *
 * How it works:
 * 1. Text strings go in (chunk texts at ingestion, one query at search time)
 * 2. Voyage AI's API returns one vector per string
 * 3. Similar texts produce similar vectors (close in cosine distance)
 * 4. These vectors get stored in the vector database for similarity search
 *
 * Voyage distinguishes "document" and "query" inputs; passing the right
 * input type measurably improves retrieval, so callers say which they embed.
 */

import { VoyageAIClient } from "voyageai";
import { ConfigError } from "../errors";
import type { EmbeddingFunction, EmbeddingPurpose } from "./types";

/**
 * Default embedding model. The corpus is mostly code and technical prose,
 * which is what voyage-code-3 is trained for. Override with VOYAGE_MODEL.
 */
export const DEFAULT_EMBEDDING_MODEL = "voyage-code-3";

/** Texts sent per embed request */
const MAX_TEXTS_PER_REQUEST = 128;

/**
 * Embedding function that uses Voyage AI's API to convert text to vectors.
 *
 * Usage:
 *   const embedder = new VoyageEmbedding({ apiKey: config.voyageApiKey });
 *   const vectors = await embedder.embed(["token refresh", "retry backoff"]);
 *   // vectors[0] = [0.012, -0.034, ...]
 */
export class VoyageEmbedding implements EmbeddingFunction {
  private readonly client: VoyageAIClient;
  private readonly model: string;

  /**
   * Creates a new Voyage AI embedding function.
   *
   * @param options - Configuration options
   * @param options.apiKey - Voyage AI API key (VOYAGE_API_KEY, via loadConfig)
   * @param options.model - Model to use. Defaults to "voyage-code-3".
   * @throws ConfigError when no API key is given
   */
  constructor(options: { apiKey?: string; model?: string }) {
    if (!options.apiKey) {
      throw new ConfigError(
        "Voyage AI API key is required. Set the VOYAGE_API_KEY environment variable."
      );
    }

    this.client = new VoyageAIClient({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
  }

  /**
   * Converts text strings into embedding vectors using Voyage AI.
   *
   * Large inputs are split into requests of at most MAX_TEXTS_PER_REQUEST
   * texts, sent one after another.
   *
   * @param texts - Array of text strings to embed
   * @param purpose - "document" for stored chunks, "query" for search text
   * @returns Array of embedding vectors (one per input text)
   * @throws Error if the API call fails or returns unexpected data
   */
  async embed(
    texts: string[],
    purpose: EmbeddingPurpose = "document"
  ): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += MAX_TEXTS_PER_REQUEST) {
      const slice = texts.slice(i, i + MAX_TEXTS_PER_REQUEST);
      vectors.push(...(await this.embedRequest(slice, purpose)));
    }
    return vectors;
  }

  private async embedRequest(
    texts: string[],
    purpose: EmbeddingPurpose
  ): Promise<number[][]> {
    const response = await this.client.embed({
      input: texts,
      model: this.model,
      inputType: purpose,
    });

    // The API returns { data: [{ embedding: number[], index: number }, ...] }
    if (!response.data || response.data.length !== texts.length) {
      throw new Error(
        `Voyage AI returned ${response.data?.length ?? 0} embeddings for ${texts.length} texts`
      );
    }

    // Sort by index to ensure order matches input order
    const sorted = [...response.data].sort(
      (a, b) => (a.index ?? 0) - (b.index ?? 0)
    );

    return sorted.map((item) => {
      if (!item.embedding) {
        throw new Error("Voyage AI returned an embedding without vector data");
      }
      return item.embedding;
    });
  }
}
