export type ProviderCallOptions = {
  signal?: AbortSignal;
  requestId?: string;
};

/** Narrow contract to the external embedding and text-generation service. */
export interface EmbeddingGenerationProvider {
  readonly name: string;
  embed(text: string, options?: ProviderCallOptions): Promise<number[]>;
  generate(promptContext: string, question: string, options?: ProviderCallOptions): Promise<string>;
}
