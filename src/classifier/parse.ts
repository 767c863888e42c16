import { z } from "zod";
import { paramValueSchema } from "../intent/params.js";
import type { IntentCandidate, Parameters } from "../types/intent.js";

// Confidence assumed when the backend omits one and the caller has no
// policy-derived value; see defaultConfidenceFor.
export const DEFAULT_CONFIDENCE = 0.5;

/** Midway between the thresholds: worth completing, never dispatched unasked. */
export function defaultConfidenceFor(policy: { acceptThreshold: number; clarifyThreshold: number }): number {
  return (policy.acceptThreshold + policy.clarifyThreshold) / 2;
}

// JSON-mode replies often send null for a field they have nothing for, and
// numbers as strings.
const confidenceSchema = z.preprocess(
  v => (typeof v === "string" ? numberOrUndefined(v) : v),
  z.number().nullish(),
);

const rawCandidateSchema = z
  .object({
    module: z.string().nullish(),
    action: z.string().nullish(),
    intent: z.string().nullish(),
    parameters: z.record(paramValueSchema.nullable()).nullish(),
    params: z.record(paramValueSchema.nullable()).nullish(),
    confidence: confidenceSchema,
    missingFields: z.array(z.string()).nullish(),
    ambiguousFields: z.array(z.string()).nullish(),
    question: z.string().nullish(),
    remainder: z.string().nullish(),
  })
  .refine(c => Boolean(c.module || c.action || c.intent), "neither module nor action given");

type RawCandidate = z.infer<typeof rawCandidateSchema>;

const envelopeSchema = z.object({ candidates: z.array(z.unknown()) });

/**
 * Turns raw backend output into candidates. Output that is not the expected
 * shape becomes a single zero-confidence candidate with module and action
 * marked ambiguous, so the caller always sees something to reason about.
 */
export function parseCandidates(
  raw: unknown,
  rawInput: string,
  defaultConfidence = DEFAULT_CONFIDENCE,
): IntentCandidate[] {
  let value = raw;
  if (typeof value === "string") {
    try { value = JSON.parse(stripFences(value)); }
    catch { return [unparseable(rawInput)]; }
  }
  const list = readList(value);
  if (!list) return [unparseable(rawInput)];
  return list.map(c => toCandidate(c, rawInput, defaultConfidence));
}

// Items are checked one by one so a malformed candidate does not take its
// neighbours down with it. Undefined means nothing usable was found.
function readList(value: unknown): RawCandidate[] | undefined {
  const envelope = envelopeSchema.safeParse(value);
  if (envelope.success) {
    const items = envelope.data.candidates;
    const kept = validItems(items);
    return kept.length || !items.length ? kept : undefined;
  }
  if (Array.isArray(value)) {
    const kept = validItems(value);
    return kept.length ? kept : undefined;
  }
  const single = rawCandidateSchema.safeParse(value);
  return single.success ? [single.data] : undefined;
}

function validItems(items: unknown[]): RawCandidate[] {
  const kept: RawCandidate[] = [];
  for (const item of items) {
    const parsed = rawCandidateSchema.safeParse(item);
    if (parsed.success) kept.push(parsed.data);
  }
  return kept;
}

function toCandidate(c: RawCandidate, rawInput: string, defaultConfidence: number): IntentCandidate {
  const parameters: Parameters = {};
  const missing = new Set(c.missingFields ?? []);
  for (const [k, v] of Object.entries(c.parameters ?? c.params ?? {})) {
    if (v === null) missing.add(k);
    else parameters[k] = v;
  }
  const action = (c.action ?? c.intent ?? "").trim();
  const module = (c.module ?? "").trim();
  const ambiguous = new Set(c.ambiguousFields ?? []);
  if (!module) ambiguous.add("module");
  if (!action) ambiguous.add("action");

  return {
    intent: { module, action, parameters, rawInput },
    confidence: clamp(c.confidence ?? defaultConfidence),
    missingFields: [...missing],
    ambiguousFields: [...ambiguous].filter(f => !missing.has(f)),
    question: c.question?.trim() || undefined,
    remainder: c.remainder?.trim() || undefined,
  };
}

function unparseable(rawInput: string): IntentCandidate {
  return {
    intent: { module: "", action: "", parameters: {}, rawInput },
    confidence: 0,
    missingFields: [],
    ambiguousFields: ["module", "action"],
  };
}

function numberOrUndefined(text: string): number | undefined {
  const n = Number(text);
  return text.trim() !== "" && Number.isFinite(n) ? n : undefined;
}

function clamp(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

function stripFences(text: string): string {
  const m = text.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return m ? m[1] : text;
}
