/**
 * Pipeline ports define the boundary between the migration engine and its adapters.
 * Purpose: make subprocess, prompt, clock and log dependencies replaceable in tests.
 * Assumptions: ports stay small; all external effects go through `runner`.
 * Usage: the migrate command wires real adapters; tests pass fakes.
 */

import type { CommandRunner } from "../../core/command-runner.js";
import type { EventLog } from "../../core/logger.js";

// =============================================================================
// PORTS
// =============================================================================

export interface Prompter {
  confirm(question: string): Promise<boolean>;
}

export interface Clock {
  now(): Date;
}

export type PipelinePorts = {
  runner: CommandRunner;
  prompter: Prompter;
  clock: Clock;
  log: EventLog;
};

export const SYSTEM_CLOCK: Clock = { now: () => new Date() };

// Used when proposals are auto-published or when no terminal is attached.
export const DECLINING_PROMPTER: Prompter = { confirm: async () => false };
