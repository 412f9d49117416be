export type EmbeddingProviderId = "openai" | "ollama";

export interface EmbeddingModel {
  name: string;
  /** Native output size; some models can be asked for fewer. */
  dimension: number;
  provider: EmbeddingProviderId;
}

/**
 * Turns text into dense vectors. `embedBatch` returns one vector per input,
 * in input order, and is the call the semantic backend relies on.
 */
export interface EmbeddingProvider {
  readonly provider: EmbeddingProviderId;
  readonly model: string;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
  availableModels(): EmbeddingModel[];
}
