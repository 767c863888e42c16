import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { WorkflowPolicy } from "./orchestrator/workflow.js";

const ms = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const ratio = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const envSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  MODEL: z.string().min(1).default("gpt-4o-mini"),
  ACCEPT_THRESHOLD: ratio(0.8),
  CLARIFY_THRESHOLD: ratio(0.4),
  MAX_CLARIFICATION_ROUNDS: z.coerce.number().int().min(0).default(3),
  CLASSIFIER_TIMEOUT_MS: ms(15_000),
  DISPATCH_TIMEOUT_MS: ms(20_000),
  COMMAND_TIMEOUT_MS: ms(60_000),
  CONFIRM_TIMEOUT_MS: ms(60_000),
  VALIDATION_MODE: z.enum(["strict", "lenient"]).default("strict"),
  MAX_STEPS: z.coerce.number().int().positive().default(5),
  FS_ROOT: z.string().min(1).default("."),
  CANVAS_BASE_URL: z.string().url().optional(),
  CANVAS_TOKEN: z.string().optional(),
});

export interface AppConfig {
  llm: { apiKey?: string; baseUrl: string; model: string };
  classifierTimeoutMs: number;
  policy: WorkflowPolicy;
  fs: { root: string };
  canvas?: { baseUrl: string; token: string };
}

/** Reads configuration from the environment (after dotenv has loaded .env). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank entries in .env mean "use the default".
  const blanksRemoved = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));
  const parsed = envSchema.safeParse(blanksRemoved);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;

  if (e.CLARIFY_THRESHOLD > e.ACCEPT_THRESHOLD) {
    throw new ConfigError(`CLARIFY_THRESHOLD (${e.CLARIFY_THRESHOLD}) must not exceed ACCEPT_THRESHOLD (${e.ACCEPT_THRESHOLD})`);
  }
  if (e.DISPATCH_TIMEOUT_MS >= e.COMMAND_TIMEOUT_MS) {
    throw new ConfigError(`DISPATCH_TIMEOUT_MS (${e.DISPATCH_TIMEOUT_MS}) must be below COMMAND_TIMEOUT_MS (${e.COMMAND_TIMEOUT_MS})`);
  }
  if ((e.CANVAS_BASE_URL === undefined) !== (e.CANVAS_TOKEN === undefined)) {
    throw new ConfigError("CANVAS_BASE_URL and CANVAS_TOKEN must be set together");
  }

  return {
    llm: { apiKey: e.OPENAI_API_KEY, baseUrl: e.OPENAI_BASE_URL, model: e.MODEL },
    classifierTimeoutMs: e.CLASSIFIER_TIMEOUT_MS,
    policy: {
      acceptThreshold: e.ACCEPT_THRESHOLD,
      clarifyThreshold: e.CLARIFY_THRESHOLD,
      maxClarificationRounds: e.MAX_CLARIFICATION_ROUNDS,
      validationMode: e.VALIDATION_MODE,
      dispatchTimeoutMs: e.DISPATCH_TIMEOUT_MS,
      commandTimeoutMs: e.COMMAND_TIMEOUT_MS,
      confirmTimeoutMs: e.CONFIRM_TIMEOUT_MS,
      maxSteps: e.MAX_STEPS,
    },
    fs: { root: e.FS_ROOT },
    canvas: e.CANVAS_BASE_URL && e.CANVAS_TOKEN ? { baseUrl: e.CANVAS_BASE_URL, token: e.CANVAS_TOKEN } : undefined,
  };
}
