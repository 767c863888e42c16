import type { CapabilityDescriptor, ExecutionResult, Parameters, ParamValue, SessionContext } from "./intent.js";

export interface ExecutionContext {
  signal: AbortSignal;
  session: SessionContext;
  facts: Record<string, ParamValue>;
}

/**
 * Contract every capability module implements. The orchestrator only ever
 * talks to modules through this interface.
 */
export interface CapabilityModule {
  readonly descriptor: CapabilityDescriptor;
  execute(action: string, parameters: Parameters, ctx: ExecutionContext): Promise<ExecutionResult>;
}
