// Console logging shared by the orchestrator and the CLI.
// QUIET=1 silences everything, LOG_STEPS=0 hides phase lines, LOG_DEBUG=1 adds detail.

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string): string => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string): string => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string): string => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string): string => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string): string => `\x1b[31m${s}${COLOR.reset}`,
  magenta: (s: string): string => `\x1b[35m${s}${COLOR.reset}`,
};

const quiet = () => process.env.QUIET === "1";
const logSteps = () => !quiet() && (process.env.LOG_STEPS ?? "1") !== "0";
const logDebug = () => !quiet() && (process.env.LOG_DEBUG ?? "0") === "1";

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export const log = {
  step(commandId: string, message: string) {
    if (logSteps()) console.log(`${COLOR.cyan("▶")} ${COLOR.gray(commandId.slice(0, 8))} ${message}`);
  },
  done(commandId: string, message: string) {
    if (logSteps()) console.log(`${COLOR.green("✓")} ${COLOR.gray(commandId.slice(0, 8))} ${message}`);
  },
  debug(message: string, detail?: unknown) {
    if (!logDebug()) return;
    const suffix = detail === undefined ? "" : " " + COLOR.gray(preview(detail));
    console.log(`${COLOR.magenta("·")} ${message}${suffix}`);
  },
  warn(message: string) {
    if (!quiet()) console.warn(COLOR.yellow(`[warn] ${message}`));
  },
  error(message: string) {
    if (!quiet()) console.error(COLOR.red(`[error] ${message}`));
  },
};

function preview(value: unknown): string {
  let text: string;
  try { text = typeof value === "string" ? value : JSON.stringify(value); }
  catch { text = String(value); }
  return text.length > 140 ? text.slice(0, 140) + "…" : text;
}
