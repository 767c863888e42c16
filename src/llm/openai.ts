import { z } from "zod";
import type { CompletionArgs, CompletionOut } from "../types/llm.js";
import { LlmHttpError, type LLMProvider } from "./provider.js";

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .default([]),
  usage: z
    .object({ prompt_tokens: z.number(), completion_tokens: z.number(), total_tokens: z.number() })
    .optional(),
});

const FINISH_REASONS = ["stop", "length", "content_filter"] as const;
type FinishReason = (typeof FINISH_REASONS)[number];

function isFinishReason(value: unknown): value is FinishReason {
  return FINISH_REASONS.some(r => r === value);
}

export class OpenAIChatCompletions implements LLMProvider {
  constructor(
    private apiKey: string,
    private baseUrl: string = 'https://api.openai.com/v1'
  ) {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;

    const body = {
      model: args.model,
      messages: args.messages.map(m => ({ role: m.role, content: m.content })),
      temperature: args.temperature ?? 0,
      max_tokens: args.max_tokens ?? 800,
      response_format: args.response_format || undefined
    };

    const res = await fetch(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'authorization': `Bearer ${this.apiKey}`
      },
      body: JSON.stringify(body),
      signal: args.signal
    });
    if (!res.ok) {
      throw new LlmHttpError(res.status, await res.text());
    }
    const data = chatResponseSchema.parse(await res.json());
    const choice = data.choices[0];
    const reason = choice?.finish_reason;

    return {
      content: choice?.message?.content ?? '',
      finish_reason: isFinishReason(reason) ? reason : undefined,
      usage: data.usage
    };
  }
}
