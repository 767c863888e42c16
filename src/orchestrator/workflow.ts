// src/orchestrator/workflow.ts
// One user command as an explicit state machine. All state lives in a plain
// WorkflowState object owned by this instance; steps run strictly in order.

import type { ClassifierAdapter } from "../classifier/adapter.js";
import {
  type AgentError,
  CommandTimeoutError,
  errorMessage,
  IntentUnresolvedError,
  InvalidIntentError,
  ModuleError,
  ModuleExecutionError,
  ValidationError,
  type FieldError,
} from "../errors.js";
import { freezeIntent, validateIntent, type ValidationMode } from "../intent/validate.js";
import { COLOR, fmtMs, log } from "../log.js";
import type { CapabilityRegistry } from "../registry/capabilities.js";
import type { Frontend } from "../types/frontend.js";
import {
  describeIntent,
  type ClarificationAnswer,
  type ClarificationRequest,
  type ClassifyContext,
  type ExecutionResult,
  type Intent,
  type IntentCandidate,
  type JsonValue,
  type SessionContext,
} from "../types/intent.js";
import { isCancellation, isDeadline, withDeadline } from "../util/deadline.js";
import { toJsonValue } from "../util/json.js";
import { createFactStore, latestFacts, writeFact, type FactStore } from "./context.js";
import { resolve, type DisambiguationPolicy } from "./disambiguate.js";

export type Phase =
  | "submitted"
  | "classifying"
  | "disambiguating"
  | "validating"
  | "confirm_pending"
  | "dispatching"
  | "step_complete"
  | "done"
  | "failed"
  | "cancelled"
  | "uncertain";

const TRANSITIONS: Record<Phase, readonly Phase[]> = {
  submitted: ["classifying", "failed", "cancelled"],
  classifying: ["disambiguating", "failed", "cancelled"],
  disambiguating: ["classifying", "validating", "failed", "cancelled"],
  validating: ["disambiguating", "confirm_pending", "dispatching", "failed", "cancelled"],
  confirm_pending: ["dispatching", "failed", "cancelled"],
  dispatching: ["step_complete", "failed", "cancelled", "uncertain"],
  step_complete: ["classifying", "done", "failed", "cancelled"],
  done: [],
  failed: [],
  cancelled: [],
  uncertain: [],
};

export interface WorkflowPolicy extends DisambiguationPolicy {
  validationMode: ValidationMode;
  /** Per-call limit for module execution; must be below commandTimeoutMs. */
  dispatchTimeoutMs: number;
  /** Budget for the non-interactive work of one command (classification + dispatch). */
  commandTimeoutMs: number;
  confirmTimeoutMs: number;
  maxSteps: number;
}

export interface StepRecord {
  index: number;
  intent: Intent;
  /** Output is stored as plain data so the state stays cloneable. */
  result: ExecutionResult & { output: JsonValue };
  attempts: number;
  durationMs: number;
}

export type PendingStep =
  | { kind: "intent"; intent: Intent }
  | { kind: "clarification"; request: ClarificationRequest }
  | { kind: "confirmation"; intent: Intent; description: string };

export interface WorkflowState {
  id: string;
  phase: Phase;
  /** Text being classified for the current step. */
  text: string;
  steps: StepRecord[];
  pendingStep: PendingStep | null;
  cumulativeContext: FactStore;
  /** Clarification rounds spent on the current step. */
  clarificationRounds: number;
  clarifications: ClarificationAnswer[];
  startedAt: string;
  /** Time spent classifying and dispatching, excluding waits on the user. */
  machineMs: number;
  error?: { code: string; message: string };
}

export type CommandOutcome =
  | { status: "done"; steps: StepRecord[]; skippedFollowUp?: string; state: WorkflowState }
  | { status: "failed"; error: AgentError; state: WorkflowState }
  | { status: "cancelled"; reason: string; state: WorkflowState }
  | { status: "uncertain"; intent: Intent; detail: string; state: WorkflowState };

export interface WorkflowDeps {
  registry: CapabilityRegistry;
  classifier: ClassifierAdapter;
  frontend: Frontend;
  policy: WorkflowPolicy;
}

type Resolved = { kind: "resolved"; intent: Intent; candidate: IntentCandidate };
type Dispatched = { kind: "dispatched"; result: ExecutionResult; attempts: number; durationMs: number };

export class InvalidTransitionError extends Error {
  readonly name = "InvalidTransitionError";
}

export class Workflow {
  private readonly state: WorkflowState;

  constructor(
    id: string,
    text: string,
    private readonly session: SessionContext,
    private readonly deps: WorkflowDeps,
    private readonly signal: AbortSignal
  ) {
    this.state = {
      id,
      phase: "submitted",
      text,
      steps: [],
      pendingStep: null,
      cumulativeContext: createFactStore(),
      clarificationRounds: 0,
      clarifications: [],
      startedAt: new Date().toISOString(),
      machineMs: 0,
    };
  }

  get id(): string {
    return this.state.id;
  }

  snapshot(): WorkflowState {
    return structuredClone(this.state);
  }

  async run(): Promise<CommandOutcome> {
    let text = this.state.text.trim();
    if (!text) return this.failed(new IntentUnresolvedError("Empty command", undefined));

    for (;;) {
      this.beginStep(text);
      const resolved = await this.resolveIntent(text);
      if (resolved.kind !== "resolved") return resolved.outcome;
      const { intent, candidate } = resolved;

      if (this.deps.registry.isDestructive(intent.module, intent.action)) {
        const stopped = await this.confirm(intent);
        if (stopped) return stopped;
      } else {
        this.transition("dispatching");
      }

      const dispatched = await this.dispatch(intent);
      if (dispatched.kind !== "dispatched") return dispatched.outcome;

      const next = this.completeStep(intent, dispatched, candidate);
      if (!next) {
        this.transition("done");
        log.done(this.id, `done after ${this.state.steps.length} step(s) ${COLOR.gray("(" + fmtMs(this.state.machineMs) + ")")}`);
        return { status: "done", steps: this.state.steps, state: this.snapshot() };
      }
      if (this.state.steps.length >= this.deps.policy.maxSteps) {
        log.warn(`command ${this.id} reached ${this.deps.policy.maxSteps} steps; not running '${next}'`);
        this.transition("done");
        return { status: "done", steps: this.state.steps, skippedFollowUp: next, state: this.snapshot() };
      }
      text = next;
    }
  }

  private beginStep(text: string) {
    this.state.text = text;
    this.state.clarificationRounds = 0;
    this.state.clarifications = [];
    this.state.pendingStep = null;
  }

  // classifying ⇄ disambiguating → validating
  private async resolveIntent(text: string): Promise<Resolved | { kind: "end"; outcome: CommandOutcome }> {
    const { policy } = this.deps;
    let partial: Intent | undefined;

    for (;;) {
      this.transition("classifying");
      const budget = this.remainingBudget();
      if (budget <= 0) return end(this.failed(new CommandTimeoutError(policy.commandTimeoutMs)));

      const t0 = Date.now();
      const classified = await this.deps.classifier.classify(text, this.classifyContext(partial), this.signal);
      this.state.machineMs += Date.now() - t0;
      if (classified.status === "cancelled") return end(this.cancelled("cancelled during classification"));
      if (classified.status === "unavailable") return end(this.failed(classified.error));

      let candidates = classified.candidates;
      this.transition("disambiguating");

      for (;;) {
        const resolution = resolve(candidates, policy, this.state.clarificationRounds);
        if (resolution.kind === "unresolved") return end(this.failed(resolution.error));

        let chosen: IntentCandidate;
        if (resolution.kind === "clarify") {
          const answer = await this.ask(resolution.request);
          if (answer.kind === "cancelled") return end(this.cancelled(answer.reason));
          const picked = pickOption(resolution.choices, resolution.request.options, answer.text);
          if (!picked) {
            partial = resolution.request.context;
            break;
          }
          chosen = picked;
        } else {
          chosen = resolution.candidate;
        }

        this.transition("validating");
        const descriptor = this.deps.registry.lookup(chosen.intent.module);
        const checked = validateIntent(chosen.intent, descriptor, policy.validationMode);
        if (checked.ok) {
          log.step(this.id, `resolved ${COLOR.cyan(describeIntent(checked.intent))}`);
          return { kind: "resolved", intent: checked.intent, candidate: chosen };
        }
        if (checked.errors.some(e => !e.recoverable)) {
          const message = checked.errors.filter(e => !e.recoverable).map(e => e.message).join("; ");
          return end(this.failed(new InvalidIntentError(`Invalid intent: ${message}`, checked.errors)));
        }
        log.debug(`validation sent ${describeIntent(chosen.intent)} back for clarification`, checked.errors);
        candidates = [retarget(chosen, new ValidationError(checked.errors))];
        this.transition("disambiguating");
      }
    }
  }

  private async ask(request: ClarificationRequest): Promise<{ kind: "answer"; text: string } | { kind: "cancelled"; reason: string }> {
    this.state.clarificationRounds += 1;
    this.state.pendingStep = { kind: "clarification", request };
    log.step(this.id, `asking: ${request.question}`);
    try {
      const text = (await withDeadline(s => this.deps.frontend.askUser(request, s), { label: "clarification", signal: this.signal })).trim();
      this.state.clarifications.push({ question: request.question, fields: request.fields, answer: text });
      this.state.pendingStep = null;
      return { kind: "answer", text };
    } catch (err) {
      if (isCancellation(err)) return { kind: "cancelled", reason: "cancelled while waiting for an answer" };
      return { kind: "cancelled", reason: `front end stopped answering: ${errorMessage(err)}` };
    }
  }

  /** Returns an outcome when the command ends here, undefined to proceed. */
  private async confirm(intent: Intent): Promise<CommandOutcome | undefined> {
    this.transition("confirm_pending");
    const description = `${describeIntent(intent)} (cannot be undone)`;
    this.state.pendingStep = { kind: "confirmation", intent, description };
    let approved: boolean;
    try {
      approved = await withDeadline(s => this.deps.frontend.confirmDestructive(description, s), {
        label: "confirmation",
        timeoutMs: this.deps.policy.confirmTimeoutMs,
        signal: this.signal,
      });
    } catch (err) {
      if (isCancellation(err)) return this.cancelled("cancelled while waiting for confirmation");
      if (isDeadline(err)) return this.cancelled("confirmation timed out");
      return this.cancelled(`front end stopped answering: ${errorMessage(err)}`);
    }
    if (approved !== true) return this.cancelled(`declined: ${describeIntent(intent)}`);
    this.transition("dispatching");
    return undefined;
  }

  private async dispatch(intent: Intent): Promise<Dispatched | { kind: "end"; outcome: CommandOutcome }> {
    const { registry, policy } = this.deps;
    const module = registry.moduleFor(intent.module);
    if (!module) {
      return end(this.failed(new InvalidIntentError(`unknown module '${intent.module}'`, [])));
    }
    const destructive = registry.isDestructive(intent.module, intent.action);
    const retryable = !destructive && registry.isIdempotent(intent.module, intent.action);
    const maxAttempts = retryable ? 2 : 1;
    const label = `${intent.module}.${intent.action}`;
    this.state.pendingStep = { kind: "intent", intent };

    for (let attempt = 1; ; attempt++) {
      const remaining = this.remainingBudget();
      if (remaining <= 0) return end(this.failed(new CommandTimeoutError(policy.commandTimeoutMs)));

      log.step(this.id, `dispatch ${COLOR.yellow(label)}${attempt > 1 ? ` (retry ${attempt - 1})` : ""}`);
      const t0 = Date.now();
      try {
        const result = await withDeadline(
          s => module.execute(intent.action, { ...intent.parameters }, {
            signal: s,
            session: this.session,
            facts: latestFacts(this.state.cumulativeContext),
          }),
          { label, timeoutMs: Math.min(policy.dispatchTimeoutMs, remaining), signal: this.signal }
        );
        const durationMs = Date.now() - t0;
        this.state.machineMs += durationMs;
        return { kind: "dispatched", result, attempts: attempt, durationMs };
      } catch (err) {
        this.state.machineMs += Date.now() - t0;
        if (isCancellation(err) || this.signal.aborted) {
          return end(destructive
            ? this.uncertain(intent, `cancelled while ${label} was running; check whether it took effect`)
            : this.cancelled(`cancelled during ${label}`));
        }
        if (destructive && isDeadline(err)) {
          return end(this.uncertain(intent, `${errorMessage(err)}; check whether it took effect`));
        }
        const transient = isDeadline(err) || (err instanceof ModuleError && err.transient);
        if (retryable && transient && attempt < maxAttempts) {
          log.debug(`${label} failed transiently, retrying once`, errorMessage(err));
          continue;
        }
        return end(this.failed(new ModuleExecutionError(
          `${label} failed: ${errorMessage(err)}`,
          intent.module,
          intent.action,
          attempt,
          errorMessage(err),
          { cause: err }
        )));
      }
    }
  }

  /** Records the step and returns the text of the next step, if any. */
  private completeStep(intent: Intent, dispatched: Dispatched, candidate: IntentCandidate): string | undefined {
    this.transition("step_complete");
    const index = this.state.steps.length;
    const { result } = dispatched;
    this.state.steps.push({
      index,
      intent,
      result: { ...result, output: toJsonValue(result.output) },
      attempts: dispatched.attempts,
      durationMs: dispatched.durationMs,
    });
    for (const [key, value] of Object.entries(result.facts ?? {})) {
      writeFact(this.state.cumulativeContext, key, value, index);
    }
    this.state.pendingStep = null;
    log.step(this.id, `${COLOR.green(intent.module + "." + intent.action)} ${result.summary} ${COLOR.gray("(" + fmtMs(dispatched.durationMs) + ")")}`);
    return result.followUp?.text.trim() || candidate.remainder?.trim() || undefined;
  }

  private classifyContext(partial: Intent | undefined): ClassifyContext {
    return {
      session: this.session,
      facts: latestFacts(this.state.cumulativeContext),
      history: this.state.steps.map(s => ({ module: s.intent.module, action: s.intent.action, summary: s.result.summary })),
      clarifications: [...this.state.clarifications],
      partialIntent: partial,
      capabilities: this.deps.registry.summaries(),
    };
  }

  private remainingBudget(): number {
    return this.deps.policy.commandTimeoutMs - this.state.machineMs;
  }

  private transition(to: Phase) {
    const from = this.state.phase;
    if (!TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError(`workflow ${this.id}: ${from} → ${to} is not allowed`);
    }
    this.state.phase = to;
  }

  private failed(error: AgentError): CommandOutcome {
    this.transition("failed");
    this.state.error = { code: error.code, message: error.message };
    log.error(`${this.id.slice(0, 8)} ${error.message}`);
    return { status: "failed", error, state: this.snapshot() };
  }

  private cancelled(reason: string): CommandOutcome {
    this.transition("cancelled");
    this.state.pendingStep = null;
    log.done(this.id, `cancelled: ${reason}`);
    return { status: "cancelled", reason, state: this.snapshot() };
  }

  private uncertain(intent: Intent, detail: string): CommandOutcome {
    this.transition("uncertain");
    log.warn(`${this.id.slice(0, 8)} outcome uncertain for ${describeIntent(intent)}: ${detail}`);
    return { status: "uncertain", intent, detail, state: this.snapshot() };
  }
}

function end(outcome: CommandOutcome): { kind: "end"; outcome: CommandOutcome } {
  return { kind: "end", outcome };
}

/**
 * An answer selects an option by its label (any case) or by its 1-based
 * number. Numbers are read as values, not positions, when any label is
 * itself a number.
 */
function pickOption(
  choices: Record<string, IntentCandidate>,
  options: string[] | undefined,
  answer: string
): IntentCandidate | undefined {
  if (!options?.length) return undefined;
  const numericLabels = options.some(o => o.trim() !== "" && Number.isFinite(Number(o)));
  const n = Number(answer);
  const byNumber = !numericLabels && Number.isInteger(n) && n >= 1 && n <= options.length ? options[n - 1] : undefined;
  const byLabel = options.find(o => o.toLowerCase() === answer.toLowerCase());
  const key = byLabel ?? byNumber;
  if (key === undefined || !Object.hasOwn(choices, key)) return undefined;
  return choices[key];
}

/** Points a validated-but-flawed candidate's clarification at exactly the bad fields. */
function retarget(candidate: IntentCandidate, problem: ValidationError): IntentCandidate {
  const missing = problem.errors.filter((e: FieldError) => e.code === "missing").map(e => e.field);
  const malformed = problem.errors.filter((e: FieldError) => e.code === "malformed").map(e => e.field);
  const parameters = { ...candidate.intent.parameters };
  for (const f of malformed) delete parameters[f];
  return {
    ...candidate,
    intent: freezeIntent({ ...candidate.intent, parameters }),
    missingFields: missing,
    ambiguousFields: malformed,
    question: `${capitalize(problem.message)}. Please provide ${[...missing, ...malformed].map(f => `'${f}'`).join(", ")}.`,
  };
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}
