export type ParamValue = string | number | boolean | { [key: string]: ParamValue };

export type Parameters = Record<string, ParamValue>;

export interface Intent {
  module: string;
  action: string;
  parameters: Parameters;
  rawInput: string;
}

export interface IntentCandidate {
  intent: Intent;
  confidence: number;
  missingFields: string[];
  ambiguousFields: string[];
  /** Clarifying question proposed by the backend, if any. */
  question?: string;
  /** Unparsed tail of a compound command, classified as the next step. */
  remainder?: string;
}

export interface ClarificationRequest {
  question: string;
  /** Parameter names the answer should fill; empty when confirming the whole interpretation. */
  fields: string[];
  options?: string[];
  context: Intent;
}

export type ParamType = "string" | "number" | "boolean" | "object";

export interface ParamSchema {
  type: ParamType;
  required?: boolean;
  description?: string;
  enum?: readonly string[];
}

export interface ActionSchema {
  description: string;
  parameters: Record<string, ParamSchema>;
}

export interface CapabilityDescriptor {
  name: string;
  description: string;
  actions: Record<string, ActionSchema>;
  destructiveActions: readonly string[];
  idempotentActions: readonly string[];
}

export interface CapabilitySummary {
  module: string;
  description: string;
  actions: Array<{ name: string; description: string; parameters: Record<string, ParamSchema>; destructive: boolean }>;
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface ExecutionResult {
  summary: string;
  output: unknown;
  facts?: Record<string, ParamValue>;
  followUp?: { text: string };
}

export interface SessionContext {
  sessionId: string;
  cwd?: string;
  [key: string]: unknown;
}

export interface ClarificationAnswer {
  question: string;
  fields: string[];
  answer: string;
}

/** Everything the classifier may see besides the text itself. */
export interface ClassifyContext {
  session: SessionContext;
  facts: Record<string, ParamValue>;
  history: Array<{ module: string; action: string; summary: string }>;
  clarifications: ClarificationAnswer[];
  partialIntent?: Intent;
  capabilities: CapabilitySummary[];
}

export function describeIntent(intent: Pick<Intent, "module" | "action" | "parameters">): string {
  const params = Object.entries(intent.parameters)
    .map(([k, v]) => `${k}=${typeof v === "object" ? JSON.stringify(v) : String(v)}`)
    .join(" ");
  return `${intent.module}.${intent.action}${params ? " " + params : ""}`;
}
