import type { ClarificationRequest } from "./intent.js";

/**
 * The user-facing side of a command. Both calls may take arbitrarily long;
 * implementations should stop waiting when `signal` aborts.
 */
export interface Frontend {
  askUser(request: ClarificationRequest, signal: AbortSignal): Promise<string>;
  confirmDestructive(description: string, signal: AbortSignal): Promise<boolean>;
}
