import type { IntentCandidate } from "./types/intent.js";

export type ErrorCode =
  | "CLASSIFIER_UNAVAILABLE"
  | "INTENT_UNRESOLVED"
  | "INVALID_INTENT"
  | "VALIDATION_FAILED"
  | "MODULE_EXECUTION_FAILED"
  | "REGISTRATION_CLOSED"
  | "REGISTRATION_INVALID"
  | "REGISTRY_NOT_READY"
  | "COMMAND_TIMEOUT"
  | "CONFIG_INVALID";

export type FieldErrorCode = "unknown_module" | "unknown_action" | "missing" | "malformed" | "unknown_parameter";

export interface FieldError {
  field: string;
  code: FieldErrorCode;
  message: string;
  recoverable: boolean;
}

export abstract class AgentError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly recoverable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ClassifierUnavailableError extends AgentError {
  readonly code = "CLASSIFIER_UNAVAILABLE";
  readonly recoverable = true;

  constructor(message: string, public readonly attempts: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class IntentUnresolvedError extends AgentError {
  readonly code = "INTENT_UNRESOLVED";
  readonly recoverable = true;

  constructor(message: string, public readonly bestCandidate: IntentCandidate | undefined) {
    super(message);
  }
}

export class InvalidIntentError extends AgentError {
  readonly code = "INVALID_INTENT";
  readonly recoverable = false;

  constructor(message: string, public readonly errors: FieldError[]) {
    super(message);
  }
}

/** Fixable field-level problems. Routed back into clarification, never surfaced raw. */
export class ValidationError extends AgentError {
  readonly code = "VALIDATION_FAILED";
  readonly recoverable = true;

  constructor(public readonly errors: FieldError[]) {
    super(errors.map(e => e.message).join("; "));
  }
}

export class ModuleExecutionError extends AgentError {
  readonly code = "MODULE_EXECUTION_FAILED";
  readonly recoverable = false;

  constructor(
    message: string,
    public readonly module: string,
    public readonly action: string,
    public readonly attempts: number,
    public readonly detail: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class RegistrationClosedError extends AgentError {
  readonly code = "REGISTRATION_CLOSED";
  readonly recoverable = false;

  constructor(public readonly module: string) {
    super(`Cannot register module '${module}': registration phase is closed`);
  }
}

export class RegistrationError extends AgentError {
  readonly code = "REGISTRATION_INVALID";
  readonly recoverable = false;
}

export class RegistryNotReadyError extends AgentError {
  readonly code = "REGISTRY_NOT_READY";
  readonly recoverable = false;

  constructor() {
    super("Capability registry used before registration was closed");
  }
}

export class CommandTimeoutError extends AgentError {
  readonly code = "COMMAND_TIMEOUT";
  readonly recoverable = true;

  constructor(public readonly budgetMs: number) {
    super(`Command exceeded its ${budgetMs}ms budget`);
  }
}

export class ConfigError extends AgentError {
  readonly code = "CONFIG_INVALID";
  readonly recoverable = false;
}

/**
 * Thrown by modules. `transient` marks failures worth one retry
 * (network blips, rate limits); everything else is final.
 */
export class ModuleError extends Error {
  readonly name = "ModuleError";

  constructor(message: string, public readonly transient = false, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Abort reason when the user or caller cancels a command. */
export class CommandCancelledError extends Error {
  readonly name = "CommandCancelledError";

  constructor(reason = "cancelled by user") {
    super(reason);
  }
}

/** Abort reason when a guarded call runs past its deadline. */
export class DeadlineExceededError extends Error {
  readonly name = "DeadlineExceededError";

  constructor(public readonly label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
