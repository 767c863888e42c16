#!/usr/bin/env node
import 'dotenv/config';
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ClassifierAdapter } from './classifier/adapter.js';
import { LlmClassifierBackend } from './classifier/backend.js';
import { defaultConfidenceFor } from './classifier/parse.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { TerminalFrontend } from './frontend/terminal.js';
import { OpenAIChatCompletions } from './llm/openai.js';
import { COLOR, log } from './log.js';
import { buildModules, buildRegistry } from './modules/registry.js';
import { Mcp } from './orchestrator/mcp.js';
import type { CommandOutcome } from './orchestrator/workflow.js';

const USAGE = 'Usage: marco [--json] [--yes] <command text...>';

export interface CliArgs {
  text: string;
  json: boolean;
  yes: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const words: string[] = [];
  let json = false;
  let yes = false;
  for (const a of argv) {
    if (a === '--json') json = true;
    else if (a === '--yes' || a === '-y') yes = true;
    else words.push(a);
  }
  return { text: words.join(' ').trim(), json, yes };
}

export function exitCodeFor(outcome: CommandOutcome): number {
  switch (outcome.status) {
    case 'done':
    case 'cancelled':
      return 0;
    case 'failed':
      return 1;
    case 'uncertain':
      return 3;
  }
}

function printOutcome(outcome: CommandOutcome, json: boolean) {
  if (json) {
    const { state, ...rest } = outcome;
    const payload = outcome.status === 'failed'
      ? { status: 'failed', code: outcome.error.code, message: outcome.error.message, steps: state.steps }
      : { ...rest, steps: state.steps };
    console.log(JSON.stringify(payload, null, 2));
    return;
  }
  switch (outcome.status) {
    case 'done':
      for (const step of outcome.steps) {
        console.log(`${COLOR.green('•')} ${step.intent.module}.${step.intent.action}: ${step.result.summary}`);
        console.log(typeof step.result.output === 'string' ? step.result.output : JSON.stringify(step.result.output, null, 2));
      }
      if (outcome.skippedFollowUp) console.log(COLOR.yellow(`(not run: ${outcome.skippedFollowUp})`));
      break;
    case 'cancelled':
      console.log(COLOR.gray(`Cancelled: ${outcome.reason}`));
      break;
    case 'failed':
      console.error(COLOR.red(`${outcome.error.code}: ${outcome.error.message}`));
      break;
    case 'uncertain':
      console.error(COLOR.yellow(`Outcome unknown: ${outcome.detail}. Please verify the current state manually.`));
      break;
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.text) {
    console.error(USAGE);
    process.exit(2);
  }

  const config = loadConfig();
  if (!config.llm.apiKey) {
    log.warn('OPENAI_API_KEY not set. Intent classification will fail.');
  }

  const provider = new OpenAIChatCompletions(config.llm.apiKey || 'DUMMY', config.llm.baseUrl);
  const classifier = new ClassifierAdapter(new LlmClassifierBackend(provider, config.llm.model), {
    timeoutMs: config.classifierTimeoutMs,
    defaultConfidence: defaultConfidenceFor(config.policy)
  });
  const registry = buildRegistry(buildModules(config));
  const mcp = new Mcp({
    registry,
    classifier,
    frontend: new TerminalFrontend({ assumeYes: args.yes }),
    policy: config.policy
  });

  const handle = mcp.submitCommand(args.text, { sessionId: `cli-${process.pid}`, cwd: process.cwd() });
  const onSigint = () => { mcp.cancel(handle.id, 'interrupted'); };
  process.once('SIGINT', onSigint);
  const outcome = await handle.done;
  process.off('SIGINT', onSigint);

  printOutcome(outcome, args.json);
  process.exitCode = exitCodeFor(outcome);
}

function isEntrypoint(): boolean {
  if (!process.argv[1]) return false;
  try {
    return realpathSync(process.argv[1]) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  main().catch(err => {
    console.error('[fatal]', errorMessage(err));
    process.exit(1);
  });
}
