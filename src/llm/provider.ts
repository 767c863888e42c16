import type { CompletionArgs, CompletionOut } from "../types/llm.js";

export interface LLMProvider {
  complete(args: CompletionArgs): Promise<CompletionOut>;
}

/** Non-2xx reply from a completion endpoint. */
export class LlmHttpError extends Error {
  readonly name = "LlmHttpError";

  constructor(public readonly status: number, public readonly body: string) {
    super(`LLM HTTP ${status}: ${body.slice(0, 200)}`);
  }
}
