/**
 * Test Utilities
 *
 * In-process stand-ins for the terminal, the provider CLIs and the backend.
 */

import { vi } from "vitest";
import type { IOutputService } from "../interfaces/output.interface";
import type { IPromptService } from "../interfaces/prompt.interface";
import type { IShellService, ShellResult } from "../interfaces/shell.interface";
import type { FetchFn } from "../backend/registration-client";

// =============================================================================
// Output
// =============================================================================

export interface OutputLine {
  level: "header" | "step" | "info" | "success" | "warn" | "error" | "dim" | "json" | "spinner";
  text: string;
}

export class RecordingOutput implements IOutputService {
  readonly lines: OutputLine[] = [];
  readonly printedJson: unknown[] = [];

  header(title: string): void { this.lines.push({ level: "header", text: title }); }
  step(message: string): void { this.lines.push({ level: "step", text: message }); }
  info(message: string): void { this.lines.push({ level: "info", text: message }); }
  success(message: string): void { this.lines.push({ level: "success", text: message }); }
  warn(message: string): void { this.lines.push({ level: "warn", text: message }); }
  error(message: string): void { this.lines.push({ level: "error", text: message }); }
  dim(message: string): void { this.lines.push({ level: "dim", text: message }); }
  newline(): void {}
  json(value: unknown): void {
    this.printedJson.push(value);
    this.lines.push({ level: "json", text: JSON.stringify(value) });
  }
  startSpinner(message: string): void { this.lines.push({ level: "spinner", text: message }); }
  succeedSpinner(message?: string): void {
    if (message) this.lines.push({ level: "success", text: message });
  }
  failSpinner(message?: string): void {
    if (message) this.lines.push({ level: "error", text: message });
  }
  stopSpinner(): void {}

  textAt(level: OutputLine["level"]): string[] {
    return this.lines.filter((line) => line.level === level).map((line) => line.text);
  }
}

// =============================================================================
// Prompts
// =============================================================================

/**
 * Answers prompts from a fixed script, in order. Running out of answers
 * fails the test instead of blocking.
 */
export class ScriptedPrompt implements IPromptService {
  readonly questions: string[] = [];

  constructor(
    private readonly answers: string[] = [],
    private readonly interactive = true
  ) {}

  isInteractive(): boolean {
    return this.interactive;
  }

  async input(message: string): Promise<string> {
    return this.next(message);
  }

  async secret(message: string): Promise<string> {
    return this.next(message);
  }

  private next(message: string): string {
    this.questions.push(message);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`Unexpected prompt: ${message}`);
    }
    return answer.trim();
  }
}

// =============================================================================
// Shell
// =============================================================================

interface ShellRule {
  prefix: string;
  result: ShellResult | ((args: string[]) => ShellResult | Promise<ShellResult>);
}

/**
 * Provider CLI stand-in. Rules match on the start of "command arg1 arg2 ...";
 * the most recently added matching rule wins. Unmatched commands succeed
 * with empty output.
 */
export class FakeShell implements IShellService {
  readonly calls: string[][] = [];
  readonly interactiveCalls: string[][] = [];
  private readonly rules: ShellRule[] = [];
  private readonly missing = new Set<string>();
  interactiveExitCode = 0;

  on(prefix: string, result: Partial<ShellResult> | ((args: string[]) => ShellResult | Promise<ShellResult>)): this {
    this.rules.unshift({
      prefix,
      result: typeof result === "function" ? result : { stdout: "", stderr: "", exitCode: 0, ...result },
    });
    return this;
  }

  markMissing(command: string): this {
    this.missing.add(command);
    return this;
  }

  async run(command: string, args: string[]): Promise<ShellResult> {
    this.calls.push([command, ...args]);
    const line = [command, ...args].join(" ");
    const rule = this.rules.find((r) => line.startsWith(r.prefix));
    if (!rule) {
      return { stdout: "", stderr: "", exitCode: 0 };
    }
    return typeof rule.result === "function" ? rule.result(args) : rule.result;
  }

  async runInteractive(command: string, args: string[]): Promise<number> {
    this.interactiveCalls.push([command, ...args]);
    return this.interactiveExitCode;
  }

  async commandExists(command: string): Promise<boolean> {
    return !this.missing.has(command);
  }

  commandLines(): string[] {
    return this.calls.map((call) => call.join(" "));
  }
}

// =============================================================================
// HTTP
// =============================================================================

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * fetch stand-in that answers every request with the given status and body.
 */
export function createFetchStub(responses: Array<{ status: number; body: string }>) {
  const requests: RecordedRequest[] = [];
  const queue = [...responses];

  const fetchFn = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const headers: Record<string, string> = {};
    if (init?.headers && !Array.isArray(init.headers) && !(init.headers instanceof Headers)) {
      Object.assign(headers, init.headers);
    }
    requests.push({
      url: String(input),
      method: init?.method ?? "GET",
      headers,
      body: typeof init?.body === "string" ? init.body : undefined,
    });

    const next = queue.shift() ?? { status: 500, body: "no response scripted" };
    return new Response(next.status === 204 ? null : next.body, { status: next.status });
  });

  return { fetchFn: fetchFn satisfies FetchFn, requests };
}
