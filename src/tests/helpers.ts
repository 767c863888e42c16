import { ClassifierAdapter } from "../classifier/adapter.js";
import type { ClassifierBackend } from "../classifier/backend.js";
import { Mcp } from "../orchestrator/mcp.js";
import type { WorkflowPolicy } from "../orchestrator/workflow.js";
import { CapabilityRegistry } from "../registry/capabilities.js";
import type { Frontend } from "../types/frontend.js";
import type {
  CapabilityDescriptor,
  ClarificationRequest,
  ClassifyContext,
  ExecutionResult,
  IntentCandidate,
  Parameters,
} from "../types/intent.js";
import type { CapabilityModule, ExecutionContext } from "../types/modules.js";

export const testPolicy: WorkflowPolicy = {
  acceptThreshold: 0.8,
  clarifyThreshold: 0.4,
  maxClarificationRounds: 3,
  validationMode: "strict",
  dispatchTimeoutMs: 200,
  commandTimeoutMs: 5_000,
  confirmTimeoutMs: 200,
  maxSteps: 5,
};

export function candidate(
  module: string,
  action: string,
  parameters: Parameters,
  confidence: number,
  extra: Partial<IntentCandidate> = {}
): IntentCandidate {
  return {
    intent: { module, action, parameters, rawInput: "test input" },
    confidence,
    missingFields: [],
    ambiguousFields: [],
    ...extra,
  };
}

type BackendReply = (signal: AbortSignal, text: string) => unknown;

/** A backend reply that returns `value` as-is. */
export function reply(value: unknown): BackendReply {
  return () => value;
}

/** Replies in order; the last reply repeats once the script runs out. */
export class ScriptedBackend implements ClassifierBackend {
  readonly calls: Array<{ text: string; context: ClassifyContext }> = [];

  constructor(private replies: BackendReply[]) {}

  async classify(text: string, context: ClassifyContext, signal: AbortSignal): Promise<unknown> {
    this.calls.push({ text, context });
    const next = this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)];
    return next(signal, text);
  }
}

export function never(): Promise<never> {
  return new Promise<never>(() => undefined);
}

export function delay(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}

type Handler = (params: Parameters, ctx: ExecutionContext) => Promise<ExecutionResult>;

export class FakeModule implements CapabilityModule {
  readonly calls: Array<{ action: string; params: Parameters }> = [];

  constructor(readonly descriptor: CapabilityDescriptor, private handlers: Record<string, Handler> = {}) {}

  async execute(action: string, params: Parameters, ctx: ExecutionContext): Promise<ExecutionResult> {
    this.calls.push({ action, params });
    const handler = this.handlers[action];
    if (handler) return handler(params, ctx);
    return { summary: `${action} ok`, output: params };
  }
}

export function fsLikeDescriptor(): CapabilityDescriptor {
  return {
    name: "fs",
    description: "files",
    actions: {
      list_dir: { description: "list", parameters: { path: { type: "string" } } },
      read_file: { description: "read", parameters: { path: { type: "string", required: true } } },
      delete_file: { description: "delete", parameters: { path: { type: "string", required: true } } },
      head: {
        description: "first lines",
        parameters: { path: { type: "string", required: true }, lines: { type: "number", required: true } },
      },
    },
    destructiveActions: ["delete_file"],
    idempotentActions: ["list_dir", "read_file", "head"],
  };
}

export class ScriptedFrontend implements Frontend {
  readonly questions: ClarificationRequest[] = [];
  readonly confirmations: string[] = [];

  constructor(
    private answers: Array<string | ((signal: AbortSignal) => Promise<string>)> = [],
    private confirm: boolean | ((signal: AbortSignal) => Promise<boolean>) = true
  ) {}

  async askUser(request: ClarificationRequest, signal: AbortSignal): Promise<string> {
    this.questions.push(request);
    const answer = this.answers[this.questions.length - 1];
    if (answer === undefined) throw new Error(`unexpected question: ${request.question}`);
    return typeof answer === "function" ? answer(signal) : answer;
  }

  async confirmDestructive(description: string, signal: AbortSignal): Promise<boolean> {
    this.confirmations.push(description);
    return typeof this.confirm === "function" ? this.confirm(signal) : this.confirm;
  }
}

export function setup(opts: {
  replies: BackendReply[];
  modules: CapabilityModule[];
  frontend?: ScriptedFrontend;
  policy?: Partial<WorkflowPolicy>;
  classifierTimeoutMs?: number;
}) {
  const registry = new CapabilityRegistry();
  for (const m of opts.modules) registry.register(m);
  registry.close();
  const backend = new ScriptedBackend(opts.replies);
  const frontend = opts.frontend ?? new ScriptedFrontend();
  const mcp = new Mcp({
    registry,
    classifier: new ClassifierAdapter(backend, { timeoutMs: opts.classifierTimeoutMs ?? 100 }),
    frontend,
    policy: { ...testPolicy, ...opts.policy },
  });
  return { registry, backend, frontend, mcp };
}

export const session = { sessionId: "test-session" };
