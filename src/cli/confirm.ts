import { stdin as input, stdout as output } from "node:process";
import { createInterface, type Interface } from "node:readline/promises";

import pLimit from "p-limit";

import { DECLINING_PROMPTER, type Prompter } from "../app/pipeline/ports.js";

// =============================================================================
// CONSOLE PROMPTER
// =============================================================================

// Questions from concurrent pipelines are asked one at a time.
export class ConsolePrompter implements Prompter {
  private readonly queue = pLimit(1);
  private rl: Interface | null = null;

  confirm(question: string): Promise<boolean> {
    return this.queue(async () => {
      const answer = await this.interface().question(`${question.trim()} [y/N] `);
      return parseConfirmation(answer);
    });
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  private interface(): Interface {
    if (!this.rl) this.rl = createInterface({ input, output });
    return this.rl;
  }
}

export function parseConfirmation(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

export type ClosablePrompter = Prompter & { close(): void };

// Without a terminal nobody can answer, so every question is declined.
export function createPrompter(interactive: boolean = Boolean(input.isTTY)): ClosablePrompter {
  if (interactive) return new ConsolePrompter();
  return { confirm: (question) => DECLINING_PROMPTER.confirm(question), close: () => undefined };
}
