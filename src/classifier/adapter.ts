import { ClassifierUnavailableError, errorMessage } from "../errors.js";
import { LlmHttpError } from "../llm/provider.js";
import { fmtMs, log } from "../log.js";
import type { ClassifyContext, IntentCandidate } from "../types/intent.js";
import { isCancellation, isDeadline, withDeadline } from "../util/deadline.js";
import type { ClassifierBackend } from "./backend.js";
import { parseCandidates } from "./parse.js";

export type ClassifyResult =
  | { status: "ok"; candidates: IntentCandidate[] }
  | { status: "unavailable"; error: ClassifierUnavailableError }
  | { status: "cancelled" };

export interface ClassifierAdapterOptions {
  timeoutMs: number;
  /** Confidence given to candidates that arrive without one. */
  defaultConfidence?: number;
}

const NETWORK_CODES = new Set([
  "ECONNRESET", "ECONNREFUSED", "ECONNABORTED", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN", "EPIPE",
  "UND_ERR_SOCKET", "UND_ERR_CONNECT_TIMEOUT", "UND_ERR_HEADERS_TIMEOUT",
]);

/** Network-level failures are worth one more attempt; semantic ones are not. */
export function isTransientBackendError(err: unknown): boolean {
  if (isDeadline(err)) return true;
  if (err instanceof LlmHttpError) return err.status === 408 || err.status === 429 || err.status >= 500;
  if (!(err instanceof Error)) return false;
  const code = errorCode(err) ?? errorCode(err.cause);
  if (code && NETWORK_CODES.has(code)) return true;
  // undici reports connection failures as TypeError("fetch failed")
  return err instanceof TypeError && err.message === "fetch failed";
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

/**
 * Wraps a ClassifierBackend: per-attempt timeout, exactly one retry for
 * transient failures, and normalization of whatever comes back.
 */
export class ClassifierAdapter {
  static readonly MAX_ATTEMPTS = 2;

  constructor(private backend: ClassifierBackend, private opts: ClassifierAdapterOptions) {}

  async classify(text: string, context: ClassifyContext, signal?: AbortSignal): Promise<ClassifyResult> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= ClassifierAdapter.MAX_ATTEMPTS; attempt++) {
      if (signal?.aborted) return { status: "cancelled" };
      const t0 = Date.now();
      try {
        const raw = await withDeadline(s => this.backend.classify(text, context, s), {
          label: "classifier",
          timeoutMs: this.opts.timeoutMs,
          signal,
        });
        log.debug(`classifier replied in ${fmtMs(Date.now() - t0)}`, raw);
        return { status: "ok", candidates: parseCandidates(raw, text, this.opts.defaultConfidence) };
      } catch (err) {
        if (isCancellation(err) || signal?.aborted) return { status: "cancelled" };
        lastError = err;
        const transient = isTransientBackendError(err);
        log.debug(`classifier attempt ${attempt} failed (${transient ? "transient" : "final"})`, errorMessage(err));
        if (!transient) {
          return { status: "unavailable", error: unavailable(err, attempt) };
        }
      }
    }
    return { status: "unavailable", error: unavailable(lastError, ClassifierAdapter.MAX_ATTEMPTS) };
  }
}

function unavailable(cause: unknown, attempts: number): ClassifierUnavailableError {
  return new ClassifierUnavailableError(
    `Intent classifier unavailable after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${errorMessage(cause)}`,
    attempts,
    { cause }
  );
}
