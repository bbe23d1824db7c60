#!/usr/bin/env node
/**
 * agentweave CLI: run and validate JSON workflow files.
 *
 * Usage:
 *   agentweave run <workflow.json> [options]
 *   agentweave validate <workflow.json>
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import {
  WorkflowEngine,
  InMemoryWorkflowStore,
  createConsoleLogger,
  createDefaultDispatcher,
  loadSettings,
  normalizeNodeType,
  validateOrRaise,
  validateWorkflow,
} from "./engine/index.js";
import type {
  CompletionProvider,
  DataMap,
  EngineEvent,
  Execution,
  Logger,
  WorkflowGraph,
} from "./engine/index.js";
import { AnthropicCompletionProvider } from "./llm/index.js";
import { HttpProtocolClient } from "./collaborators/index.js";
import type { ProtocolServerConfig } from "./collaborators/index.js";
import {
  formatDuration,
  renderBanner,
  renderDiagnostic,
  renderSummary,
  renderText,
  Spinner,
} from "./cli-renderer.js";

export type CliArgs = Record<string, string | boolean>;

type Writable = { write(chunk: string): unknown };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export const USAGE = `
agentweave: AI-agent workflow runner

Usage:
  agentweave run <workflow.json> [options]   Run a workflow
  agentweave validate <workflow.json>        Validate a workflow

Run options:
  --input <json>         Input data as a JSON object
  --input-file <path>    Read input data from a JSON file
  --model <model>        Default model for LLM nodes (env: AGENTWEAVE_MODEL)
  --verbose              Print every engine event

Environment:
  ANTHROPIC_API_KEY      Required by workflows with LLM nodes
  AGENTWEAVE_LOG_LEVEL   debug | info | warn | error | silent (default: warn)
`.trim();

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const key = arg.slice(2);
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        args[key] = next;
        i++;
      } else {
        args[key] = true;
      }
    } else {
      positional.push(arg);
    }
  }

  if (positional[0]) args._command = positional[0];
  if (positional[1]) args._file = positional[1];

  return args;
}

function stringArg(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

function isDataMap(value: unknown): value is DataMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readWorkflowFile(filePath: string): Promise<unknown> {
  if (!filePath.toLowerCase().endsWith(".json")) {
    throw new Error("Only .json workflow files are supported.");
  }
  const text = await readFile(resolve(filePath), "utf-8");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Input data from --input, else --input-file, else empty. */
export async function readInput(args: CliArgs): Promise<DataMap> {
  const inline = stringArg(args, "input");
  const file = stringArg(args, "input-file");
  const text = inline ?? (file !== undefined ? await readFile(resolve(file), "utf-8") : undefined);
  if (text === undefined) return {};

  const parsed: unknown = JSON.parse(text);
  if (!isDataMap(parsed)) {
    throw new Error("Workflow input must be a JSON object");
  }
  return parsed;
}

const ProtocolServers = Type.Array(
  Type.Object({
    id: Type.String({ minLength: 1 }),
    url: Type.String({ minLength: 1 }),
    headers: Type.Optional(Type.Record(Type.String(), Type.String())),
  }),
);

/** MCP servers declared under the workflow's `metadata.mcpServers`. */
export function protocolServers(graph: WorkflowGraph): ProtocolServerConfig[] {
  const declared = graph.metadata?.mcpServers;
  return Value.Check(ProtocolServers, declared) ? declared : [];
}

function usesCompletion(graph: WorkflowGraph): boolean {
  return graph.nodes.some((n) => normalizeNodeType(n.type) === "agent.llm");
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export async function cmdValidate(filePath: string, out: Writable = process.stdout): Promise<number> {
  const print = (line = "") => out.write(`${line}\n`);
  const raw = await readWorkflowFile(filePath);
  const diagnostics = validateWorkflow(raw, createDefaultDispatcher());
  const errors = diagnostics.filter((d) => d.severity === "error");
  const warnings = diagnostics.filter((d) => d.severity === "warning");

  if (diagnostics.length === 0) {
    const graph = validateOrRaise(raw);
    print(`✅ ${filePath}: valid (${graph.nodes.length} nodes, ${graph.orchestration})`);
    return 0;
  }

  for (const d of diagnostics) print(renderDiagnostic(d));
  print();
  print(`${errors.length} error(s), ${warnings.length} warning(s)`);
  return errors.length > 0 ? 1 : 0;
}

export type RunDeps = {
  /** Replaces the Anthropic provider built from ANTHROPIC_API_KEY. */
  completion?: CompletionProvider;
  fetch?: typeof fetch;
  env?: NodeJS.ProcessEnv;
  out?: Writable;
};

function createCompletion(
  graph: WorkflowGraph,
  model: string | undefined,
  env: NodeJS.ProcessEnv,
  logger: Logger,
  fetchImpl: typeof fetch | undefined,
): CompletionProvider | undefined {
  const apiKey = env.ANTHROPIC_API_KEY;
  if (apiKey) {
    return new AnthropicCompletionProvider({ apiKey, defaultModel: model, fetch: fetchImpl });
  }
  if (usesCompletion(graph)) {
    logger.warn("ANTHROPIC_API_KEY is not set; LLM nodes will fail");
  }
  return undefined;
}

/**
 * Run a workflow file to completion. Returns the process exit code:
 * 0 completed, 1 failed, 130 cancelled.
 */
export async function cmdRun(filePath: string, args: CliArgs, deps: RunDeps = {}): Promise<number> {
  const out = deps.out ?? process.stdout;
  const print = (line = "") => out.write(`${line}\n`);
  const env = deps.env ?? process.env;
  const verbose = args.verbose === true;

  const settings = loadSettings(env);
  const model = stringArg(args, "model") ?? settings.model;
  const logger = createConsoleLogger("agentweave", verbose ? "debug" : settings.logLevel);

  const graph = validateOrRaise(await readWorkflowFile(filePath));
  const input = await readInput(args);
  const servers = protocolServers(graph);

  const engine = new WorkflowEngine({
    workflows: new InMemoryWorkflowStore([graph]),
    completion: deps.completion ?? createCompletion(graph, model, env, logger, deps.fetch),
    protocol: servers.length > 0 ? new HttpProtocolClient(servers, { fetch: deps.fetch }) : undefined,
    settings: { ...settings, model },
    logger,
  });

  print(
    renderBanner({
      workflow: graph.name || graph.id,
      orchestration: graph.orchestration,
      model: model ?? "provider default",
      nodeCount: graph.nodes.length,
    }),
  );

  const spinner = new Spinner(out);
  let spinnerStep: string | null = null;

  const onEvent = (event: EngineEvent) => {
    if (verbose) {
      print(`  · ${event.kind.padEnd(16)} ${JSON.stringify(event.data)}`);
      return;
    }
    switch (event.kind) {
      case "step_started":
        if (!spinner.isRunning()) {
          spinner.start(event.data.step.nodeName);
          spinnerStep = event.data.step.id;
        }
        break;
      case "step_completed": {
        const { step } = event.data;
        if (spinnerStep === step.id && spinner.isRunning()) {
          spinner.stop("success");
          spinnerStep = null;
        } else {
          print(`  ✔ ${step.nodeName}`);
        }
        break;
      }
      case "execution_error": {
        const { error } = event.data;
        if (error.stepId !== undefined && spinnerStep === error.stepId && spinner.isRunning()) {
          spinner.stop("fail", error.message);
          spinnerStep = null;
        } else {
          print(`  ✘ ${error.nodeId ?? error.kind}: ${error.message}`);
        }
        break;
      }
      case "status_changed":
        if (event.data.to === "cancelled" && spinner.isRunning()) {
          spinner.stop("cancelled");
          spinnerStep = null;
        }
        break;
    }
  };
  const unsubscribe = engine.subscribe(onEvent);

  let executionId: string | undefined;
  const onSignal = () => {
    if (executionId !== undefined && engine.stopExecution(executionId)) {
      print("\n  Cancelling at the next step boundary…");
    }
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const startTime = Date.now();
  let execution: Execution | undefined;
  try {
    executionId = await engine.startExecution(graph.id, input);
    execution = await engine.waitForExecution(executionId);
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    unsubscribe();
    if (spinner.isRunning()) spinner.stop("fail");
  }
  if (!execution) {
    throw new Error(`Execution ${executionId} has no record`);
  }

  print(renderSummary(execution, Date.now() - startTime));

  const response = execution.outputData.response;
  if (typeof response === "string" && response.length > 0) {
    print();
    print(renderText(response));
  } else if (Object.keys(execution.outputData).length > 0) {
    print();
    print(`  Output: ${JSON.stringify(execution.outputData, null, 2)}`);
  }

  switch (execution.status) {
    case "completed":
      logger.debug(`finished in ${formatDuration(Date.now() - startTime)}`);
      return 0;
    case "cancelled":
      return 130;
    default:
      return 1;
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function usageError(message: string): number {
  console.error(`Error: ${message}`);
  console.error(USAGE);
  return 1;
}

export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  const file = stringArg(args, "_file");

  switch (args._command) {
    case "run":
      if (file === undefined) return usageError("run requires a workflow file path");
      return cmdRun(file, args);
    case "validate":
      if (file === undefined) return usageError("validate requires a workflow file path");
      return cmdValidate(file);
    default:
      console.log(USAGE);
      return args._command === undefined || args.help === true ? 0 : 1;
  }
}

const isDirectRun = process.argv[1] != null && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isDirectRun) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    },
  );
}
