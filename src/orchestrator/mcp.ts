import { randomUUID } from "node:crypto";
import { CommandCancelledError, RegistryNotReadyError } from "../errors.js";
import { log } from "../log.js";
import type { SessionContext } from "../types/intent.js";
import { Workflow, type CommandOutcome, type WorkflowDeps, type WorkflowState } from "./workflow.js";

export interface CommandHandle {
  id: string;
  done: Promise<CommandOutcome>;
}

interface InFlight {
  workflow: Workflow;
  controller: AbortController;
}

/**
 * Master Control Program: the surface the front end talks to. Each submitted
 * command gets its own Workflow and AbortController; nothing is shared
 * between commands except the (read-only) registry.
 */
export class Mcp {
  private readonly inflight = new Map<string, InFlight>();

  constructor(private readonly deps: WorkflowDeps) {}

  submitCommand(text: string, session: SessionContext): CommandHandle {
    if (!this.deps.registry.isClosed) throw new RegistryNotReadyError();
    const id = randomUUID();
    const controller = new AbortController();
    const workflow = new Workflow(id, text, session, this.deps, controller.signal);
    this.inflight.set(id, { workflow, controller });
    log.step(id, `command: ${JSON.stringify(text)}`);

    const done = workflow.run().finally(() => {
      this.inflight.delete(id);
    });
    return { id, done };
  }

  /** Snapshot of a running command; undefined once it has finished. */
  getStatus(id: string): WorkflowState | undefined {
    return this.inflight.get(id)?.workflow.snapshot();
  }

  cancel(id: string, reason?: string): boolean {
    const entry = this.inflight.get(id);
    if (!entry) return false;
    entry.controller.abort(new CommandCancelledError(reason));
    return true;
  }

  inFlight(): string[] {
    return [...this.inflight.keys()];
  }
}
