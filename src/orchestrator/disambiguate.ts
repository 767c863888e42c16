import { IntentUnresolvedError } from "../errors.js";
import { describeIntent, type ClarificationRequest, type IntentCandidate } from "../types/intent.js";

export interface DisambiguationPolicy {
  /** Minimum confidence to dispatch a complete candidate without asking. */
  acceptThreshold: number;
  /** Minimum confidence for a candidate to be worth completing. */
  clarifyThreshold: number;
  maxClarificationRounds: number;
}

export type Resolution =
  | { kind: "resolved"; candidate: IntentCandidate }
  | { kind: "clarify"; request: ClarificationRequest; candidate: IntentCandidate; choices: Record<string, IntentCandidate> }
  | { kind: "unresolved"; error: IntentUnresolvedError };

const MAX_OPTIONS = 4;

export function rankCandidates(candidates: readonly IntentCandidate[]): IntentCandidate[] {
  return candidates
    .map((c, i) => ({ c, i }))
    .sort((a, b) =>
      b.c.confidence - a.c.confidence ||
      a.c.missingFields.length - b.c.missingFields.length ||
      a.i - b.i
    )
    .map(x => x.c);
}

export function isComplete(c: IntentCandidate): boolean {
  return c.missingFields.length === 0 && c.ambiguousFields.length === 0;
}

/**
 * Decides between dispatching, asking, and giving up. Pure: the same
 * candidates, policy and round count always give the same answer.
 *
 * `choices` maps each offered option label to the candidate it selects,
 * so a front end answer matching a label resolves without reclassifying.
 */
export function resolve(
  candidates: readonly IntentCandidate[],
  policy: DisambiguationPolicy,
  clarificationRounds = 0
): Resolution {
  const ranked = rankCandidates(candidates);
  const top = ranked[0];
  if (!top || top.confidence < policy.clarifyThreshold) {
    return unresolved(top, top ? `best guess '${label(top)}' is too uncertain` : "no interpretation found");
  }
  if (top.confidence >= policy.acceptThreshold && isComplete(top)) {
    return { kind: "resolved", candidate: top };
  }
  if (clarificationRounds >= policy.maxClarificationRounds) {
    return unresolved(top, `still ambiguous after ${clarificationRounds} clarification round(s)`);
  }

  if (!isComplete(top)) {
    const fields = unique([...top.missingFields, ...top.ambiguousFields]);
    const choices = fields.length === 1 ? valueChoices(top, ranked, fields[0], policy) : {};
    const options = Object.keys(choices);
    return {
      kind: "clarify",
      candidate: top,
      choices,
      request: {
        question: top.question ?? fieldQuestion(top, fields),
        fields,
        options: options.length ? options : undefined,
        context: top.intent,
      },
    };
  }

  // Complete but not confident enough: confirm which interpretation is meant.
  const contenders = ranked.filter(c => isComplete(c) && c.confidence >= policy.clarifyThreshold).slice(0, MAX_OPTIONS);
  const choices: Record<string, IntentCandidate> = {};
  for (const c of contenders) {
    const key = label(c);
    if (!(key in choices)) choices[key] = c;
  }
  return {
    kind: "clarify",
    candidate: top,
    choices,
    request: {
      question: top.question ?? (contenders.length > 1 ? "Which of these did you mean?" : `Did you mean: ${label(top)}?`),
      fields: [],
      options: Object.keys(choices),
      context: top.intent,
    },
  };
}

/**
 * For a single asked field, other candidates for the same module/action
 * that did fill it offer their values as options.
 */
function valueChoices(
  top: IntentCandidate,
  ranked: IntentCandidate[],
  field: string,
  policy: DisambiguationPolicy
): Record<string, IntentCandidate> {
  const choices: Record<string, IntentCandidate> = {};
  for (const c of ranked) {
    if (c === top || c.confidence < policy.clarifyThreshold) continue;
    if (c.intent.module !== top.intent.module || c.intent.action !== top.intent.action) continue;
    const value = c.intent.parameters[field];
    if (value === undefined || typeof value === "object") continue;
    const key = String(value);
    if (key in choices) continue;
    choices[key] = {
      ...top,
      intent: { ...top.intent, parameters: { ...top.intent.parameters, [field]: value } },
      missingFields: top.missingFields.filter(f => f !== field),
      ambiguousFields: top.ambiguousFields.filter(f => f !== field),
    };
    if (Object.keys(choices).length >= MAX_OPTIONS) break;
  }
  return choices;
}

function fieldQuestion(c: IntentCandidate, fields: string[]): string {
  if (fields.includes("module") || fields.includes("action")) {
    return "I couldn't tell what you want to do. Could you rephrase the command?";
  }
  const what = c.intent.module && c.intent.action ? ` for ${c.intent.module}.${c.intent.action}` : "";
  return `Please provide ${fields.map(f => `'${f}'`).join(", ")}${what}.`;
}

function label(c: IntentCandidate): string {
  return describeIntent(c.intent);
}

function unresolved(best: IntentCandidate | undefined, why: string): Resolution {
  return { kind: "unresolved", error: new IntentUnresolvedError(`Could not resolve the command: ${why}`, best) };
}

function unique(xs: string[]): string[] {
  return [...new Set(xs)];
}
