/**
 * LLM completion contract consumed by refinement and deep analysis.
 */
export interface LLMOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLMProvider {
  readonly id: string;
  complete(prompt: string, options?: LLMOptions): Promise<string>;
  /** Same as complete, but asks the model for a single JSON object. */
  completeJSON(prompt: string, options?: LLMOptions): Promise<string>;
}
