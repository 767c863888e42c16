import type { Message } from "../types/llm.js";
import type { ClassifyContext } from "../types/intent.js";

const EXAMPLES = [
  `User: "List all files in src"`,
  `{"candidates":[{"module":"fs","action":"list_dir","parameters":{"path":"src"},"confidence":0.95}]}`,
  `User: "Find TODO comments in pkg/"`,
  `{"candidates":[{"module":"fs","action":"find_pattern","parameters":{"pattern":"TODO","path":"pkg"},"confidence":0.9}]}`,
  `User: "delete it"  (nothing in context says what "it" is)`,
  `{"candidates":[{"module":"fs","action":"delete_file","parameters":{"path":null},"confidence":0.85,"missingFields":["path"],"question":"Which file should be deleted?"}]}`,
];

export function renderClassifierPrompt(text: string, ctx: ClassifyContext): Message[] {
  const sys: Message = {
    role: "system",
    content: [
      "You parse user commands into JSON intents. Output only JSON.",
      `Shape: {"candidates":[{"module":string,"action":string,"parameters":object,"confidence":number 0..1,` +
        `"missingFields":string[],"ambiguousFields":string[],"question"?:string,"remainder"?:string}]}`,
      "Rank candidates best first. Use only the modules and actions listed under CAPABILITIES.",
      "Use null for a parameter you cannot fill and list it in missingFields; never guess.",
      "If the command has several parts, parse the first and put the rest, verbatim, in remainder.",
      "",
      "EXAMPLES:",
      ...EXAMPLES,
    ].join("\n"),
  };

  const capabilityLines: string[] = [];
  for (const cap of ctx.capabilities) {
    capabilityLines.push(`- ${cap.module}: ${cap.description}`);
    for (const a of cap.actions) {
      const params = Object.entries(a.parameters)
        .map(([k, p]) => `${k}${p.required ? "" : "?"}:${p.enum?.length ? p.enum.join("|") : p.type}`)
        .join(", ");
      capabilityLines.push(`    ${a.name}(${params})${a.destructive ? " [destructive]" : ""}: ${a.description}`);
    }
  }

  const factLines = Object.entries(ctx.facts).map(([k, v]) => `- ${k}: ${JSON.stringify(v)}`);
  const historyLines = ctx.history.map(h => `- ${h.module}.${h.action}: ${h.summary}`);
  const clarificationLines = ctx.clarifications.map(c => `- Q: ${c.question}\n  A: ${c.answer}`);

  const user: Message = {
    role: "user",
    content: [
      "CAPABILITIES:",
      ...capabilityLines,
      "",
      "KNOWN FACTS:",
      ...(factLines.length ? factLines : ["(none)"]),
      "",
      "EARLIER STEPS:",
      ...(historyLines.length ? historyLines : ["(none)"]),
      ...(ctx.partialIntent
        ? ["", "PARTIAL INTENT BEING COMPLETED:", JSON.stringify({
            module: ctx.partialIntent.module,
            action: ctx.partialIntent.action,
            parameters: ctx.partialIntent.parameters,
          })]
        : []),
      ...(clarificationLines.length ? ["", "USER ANSWERS TO YOUR QUESTIONS:", ...clarificationLines] : []),
      "",
      "COMMAND:",
      "---",
      text,
      "---",
    ].join("\n"),
  };

  return [sys, user];
}
