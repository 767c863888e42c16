// Terminal front end: asks clarification and confirmation questions on stdin/stdout.
import readline from "node:readline";
import { CommandCancelledError } from "../errors.js";
import { COLOR } from "../log.js";
import type { Frontend } from "../types/frontend.js";
import type { ClarificationRequest } from "../types/intent.js";

export interface TerminalFrontendOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Answer yes to every destructive-action confirmation. */
  assumeYes?: boolean;
}

export class TerminalFrontend implements Frontend {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(private opts: TerminalFrontendOptions = {}) {
    this.input = opts.input ?? process.stdin;
    this.output = opts.output ?? process.stdout;
  }

  async askUser(request: ClarificationRequest, signal: AbortSignal): Promise<string> {
    const lines = [COLOR.cyan("? ") + request.question];
    (request.options ?? []).forEach((o, i) => lines.push(`  ${i + 1}) ${o}`));
    this.output.write(lines.join("\n") + "\n");
    return this.question("> ", signal);
  }

  async confirmDestructive(description: string, signal: AbortSignal): Promise<boolean> {
    if (this.opts.assumeYes) {
      this.output.write(COLOR.yellow(`! ${description}: confirmed by --yes`) + "\n");
      return true;
    }
    const answer = await this.question(COLOR.yellow(`! ${description}. Proceed? [y/N] `), signal);
    return /^y(es)?$/i.test(answer.trim());
  }

  private question(prompt: string, signal: AbortSignal): Promise<string> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    return new Promise<string>((resolve, reject) => {
      let settled = false;
      const finish = (fn: () => void) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener("abort", onAbort);
        rl.close();
        fn();
      };
      const onAbort = () => finish(() => reject(signal.reason ?? new CommandCancelledError()));
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener("abort", onAbort, { once: true });
      rl.on("close", () => finish(() => reject(new Error("input closed"))));
      rl.question(prompt, answer => finish(() => resolve(answer)));
    });
  }
}
