import type { LLMProvider } from "../llm/provider.js";
import { renderClassifierPrompt } from "../prompt/renderer.js";
import type { ClassifyContext } from "../types/intent.js";

/**
 * The natural-language boundary. Returns whatever the model produced;
 * parsing and retry policy live in the adapter.
 */
export interface ClassifierBackend {
  classify(text: string, context: ClassifyContext, signal: AbortSignal): Promise<unknown>;
}

export class LlmClassifierBackend implements ClassifierBackend {
  constructor(private provider: LLMProvider, private model: string) {}

  async classify(text: string, context: ClassifyContext, signal: AbortSignal): Promise<unknown> {
    const out = await this.provider.complete({
      model: this.model,
      messages: renderClassifierPrompt(text, context),
      temperature: 0,
      max_tokens: 600,
      response_format: { type: "json_object" },
      signal,
    });
    return out.content;
  }
}
