/**
 * Terminal output for the agentweave CLI: banner, step spinner, markdown
 * rendering of agent responses and the end-of-run summary.
 */

import { marked } from "marked";
import TerminalRenderer from "marked-terminal";
import type { Diagnostic, Execution } from "./engine/index.js";

// ---------------------------------------------------------------------------
// ANSI helpers
// ---------------------------------------------------------------------------

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
} as const;

export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*[A-Za-z]/g, "");
}

// ---------------------------------------------------------------------------
// Markdown rendering
// ---------------------------------------------------------------------------

marked.setOptions({ renderer: new TerminalRenderer() });

const MARKDOWN_HINT_RE = /[#*`[\]\n]/;

/**
 * Render a markdown string to ANSI-formatted terminal output.
 * Falls back to raw text if rendering fails.
 */
export function renderMarkdown(text: string): string {
  try {
    const rendered = marked.parse(text);
    if (typeof rendered === "string") {
      return rendered.replace(/\n{3,}/g, "\n\n").trimEnd();
    }
    return text;
  } catch (_err) {
    return text;
  }
}

/** Markdown for text that looks like it, the text unchanged otherwise. */
export function renderText(text: string): string {
  return MARKDOWN_HINT_RE.test(text) ? renderMarkdown(text) : text;
}

// ---------------------------------------------------------------------------
// Banner
// ---------------------------------------------------------------------------

/**
 * Render the startup banner. Every row has the same visible width.
 */
export function renderBanner(opts: {
  workflow: string;
  orchestration: string;
  model: string;
  nodeCount: number;
}): string {
  const innerWidth = 52;

  const pad = (text: string): string => {
    const truncated = text.length > innerWidth ? text.slice(0, innerWidth - 1) + "…" : text;
    return truncated + " ".repeat(Math.max(0, innerWidth - truncated.length));
  };
  const row = (visible: string) => `  │ ${pad(visible)} │`;

  return [
    "",
    `  ┌${"─".repeat(innerWidth + 2)}┐`,
    row("agentweave"),
    `  ├${"─".repeat(innerWidth + 2)}┤`,
    row(opts.workflow),
    row(""),
    row(`Orchestration: ${opts.orchestration}`),
    row(`Model:         ${opts.model}`),
    row(`Nodes:         ${opts.nodeCount}`),
    `  └${"─".repeat(innerWidth + 2)}┘`,
    "",
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Spinner
// ---------------------------------------------------------------------------

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

type Writable = { write(chunk: string): unknown };

/**
 * A terminal spinner with elapsed time, redrawn in place.
 */
export class Spinner {
  private _frame = 0;
  private _interval: ReturnType<typeof setInterval> | null = null;
  private _startTime = 0;
  private _message = "";
  private _out: Writable;

  constructor(out: Writable = process.stdout) {
    this._out = out;
  }

  isRunning(): boolean {
    return this._interval !== null;
  }

  start(message: string): void {
    this._message = message;
    this._startTime = Date.now();
    this._frame = 0;
    this._render();

    this._interval = setInterval(() => {
      this._frame = (this._frame + 1) % SPINNER_FRAMES.length;
      this._render();
    }, 80);
  }

  private _render(): void {
    this._out.write(
      `\r  ${ANSI.cyan}${SPINNER_FRAMES[this._frame]}${ANSI.reset} ${this._message} ${ANSI.dim}${this._elapsed()}${ANSI.reset}`,
    );
  }

  private _elapsed(): string {
    return formatDuration(Date.now() - this._startTime);
  }

  /** Stop and print the final line for the step. */
  stop(status: "success" | "fail" | "cancelled", detail?: string): void {
    if (this._interval) {
      clearInterval(this._interval);
      this._interval = null;
    }

    const elapsed = `${ANSI.dim}${this._elapsed()}${ANSI.reset}`;
    this._out.write("\r\x1b[K");

    if (status === "success") {
      this._out.write(`  ${ANSI.green}✔${ANSI.reset} ${this._message} ${elapsed}\n`);
    } else if (status === "fail") {
      const reason = detail ? ` ${ANSI.dim}(${detail})${ANSI.reset}` : "";
      this._out.write(`  ${ANSI.red}✘${ANSI.reset} ${this._message} ${elapsed}${reason}\n`);
    } else {
      this._out.write(`  ${ANSI.yellow}⊘${ANSI.reset} ${this._message} ${elapsed}\n`);
    }
  }
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

function statusLabel(status: Execution["status"]): string {
  switch (status) {
    case "completed":
      return `${ANSI.green}✔ completed${ANSI.reset}`;
    case "cancelled":
      return `${ANSI.yellow}⊘ cancelled${ANSI.reset}`;
    case "failed":
      return `${ANSI.red}✘ failed${ANSI.reset}`;
    default:
      return status;
  }
}

/**
 * End-of-run summary: status, time, the steps taken and any recorded errors.
 */
export function renderSummary(execution: Execution, elapsedMs: number): string {
  const path = execution.steps.map((s) => s.nodeName).join(` ${ANSI.dim}→${ANSI.reset} `);

  const lines = [
    "",
    `  Status: ${statusLabel(execution.status)}`,
    `  Time:   ${ANSI.dim}${formatDuration(elapsedMs)}${ANSI.reset}`,
    `  Steps:  ${path || "(none)"}`,
    `  Id:     ${ANSI.dim}${execution.id}${ANSI.reset}`,
  ];

  if (execution.errors.length > 0) {
    lines.push("", `  ${ANSI.red}${ANSI.bold}Errors${ANSI.reset}`);
    for (const error of execution.errors) {
      const where = error.nodeId ? ` ${error.nodeId}:` : "";
      lines.push(`  ${ANSI.red}✘${ANSI.reset} [${error.kind}]${where} ${error.message}`);
    }
  }

  return lines.join("\n");
}

function severityIcon(severity: Diagnostic["severity"]): string {
  switch (severity) {
    case "error":
      return "❌";
    case "warning":
      return "⚠️ ";
    case "info":
      return "ℹ️ ";
  }
}

export function renderDiagnostic(d: Diagnostic): string {
  const location = d.nodeId
    ? ` (node: ${d.nodeId})`
    : d.connectionId
      ? ` (connection: ${d.connectionId})`
      : d.stepId
        ? ` (step: ${d.stepId})`
        : "";
  return `${severityIcon(d.severity)} [${d.rule}]${location}: ${d.message}`;
}

/**
 * Format milliseconds into a human-readable duration.
 */
export function formatDuration(ms: number): string {
  const secs = Math.floor(ms / 1000);
  if (secs < 60) return `${secs}s`;
  const mins = Math.floor(secs / 60);
  const remainSecs = secs % 60;
  if (mins < 60) return `${mins}m ${remainSecs}s`;
  const hours = Math.floor(mins / 60);
  const remainMins = mins % 60;
  return `${hours}h ${remainMins}m ${remainSecs}s`;
}
