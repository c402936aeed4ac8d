/**
 * Adapter: TerminalInteraction
 *
 * Interaction implementation over a line-oriented input (stdin by default)
 * with node:readline. One readline interface lives as long as the adapter;
 * lines that arrive before the next question are queued for it, so piped
 * answers are consumed one per question. End of input answers with the
 * default (confirm) or an empty string (ask).
 *
 * Call `close()` once the command is finished.
 */

import { createInterface, type Interface } from "node:readline";
import type { Plan } from "../../domain/entities/plan.ts";
import type { Interaction } from "../../domain/ports/interaction.ts";
import { formatPlan } from "./formatter.ts";

export type TerminalStreams = {
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
};

export function parseYesNo(
  answer: string | null,
  defaultValue: boolean,
): boolean | null {
  if (answer === null) return defaultValue;
  const normalized = answer.trim().toLowerCase();
  if (normalized === "") return defaultValue;
  if (normalized === "y" || normalized === "yes") return true;
  if (normalized === "n" || normalized === "no") return false;
  return null;
}

export class TerminalInteraction implements Interaction {
  private readonly rl: Interface;
  private readonly pending: string[] = [];
  private readonly waiting: ((line: string | null) => void)[] = [];
  private ended = false;

  constructor(
    private readonly streams: TerminalStreams = {
      input: process.stdin,
      output: process.stdout,
    },
  ) {
    this.rl = createInterface({
      input: streams.input,
      output: streams.output,
    });
    this.rl.on("line", (line) => {
      const next = this.waiting.shift();
      if (next) {
        next(line);
      } else {
        this.pending.push(line);
      }
    });
    this.rl.on("close", () => {
      this.ended = true;
      for (const next of this.waiting.splice(0)) {
        next(null);
      }
    });
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const hint = defaultValue ? "[Y/n]" : "[y/N]";
    for (;;) {
      const answer = await this.question(`${message} ${hint}: `);
      const parsed = parseYesNo(answer, defaultValue);
      if (parsed !== null) return parsed;
      this.streams.output.write("Please answer y or n.\n");
    }
  }

  async ask(message: string): Promise<string> {
    const answer = await this.question(`${message}: `);
    return answer ?? "";
  }

  presentPlan(plan: Plan, title: string): void {
    this.streams.output.write(`\n${formatPlan(plan, title)}\n\n`);
  }

  close(): void {
    if (!this.ended) this.rl.close();
  }

  private question(query: string): Promise<string | null> {
    if (this.ended) {
      this.streams.output.write(query);
    } else {
      this.rl.setPrompt(query);
      this.rl.prompt();
    }

    const line = this.pending.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }
}
