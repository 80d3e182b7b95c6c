import type { BatchObserver } from "../app/pipeline/batch-scheduler.js";
import {
  targetLabel,
  type RepositoryOutcome,
  type RepositoryTarget,
  type StageResult,
} from "../app/pipeline/types.js";
import {
  createAnsiFormatter,
  resolveColorEnabled,
  type AnsiFormatter,
} from "../core/error-format.js";
import type { EventLog, LogEventInput } from "../core/logger.js";
import { formatDuration } from "../core/utils.js";

// =============================================================================
// CONSOLE REPORTER
// =============================================================================

export type ConsoleReporterOptions = {
  verbose: boolean;
  write?: (line: string) => void;
  useColor?: boolean;
};

// Progress lines for the operator. Verbose mode adds stage results and the commands being run.
export class ConsoleReporter implements BatchObserver, EventLog {
  private readonly write: (line: string) => void;
  private readonly format: AnsiFormatter;

  constructor(private readonly options: ConsoleReporterOptions) {
    this.write = options.write ?? ((line) => console.log(line));
    this.format = createAnsiFormatter(
      resolveColorEnabled({ stream: process.stdout, useColor: options.useColor }),
    );
  }

  onStart(target: RepositoryTarget): void {
    this.write(`${this.format("start", ["cyan"])}   ${targetLabel(target)}`);
  }

  onStageComplete(target: RepositoryTarget, result: StageResult): void {
    if (!this.options.verbose) return;
    const marker =
      result.outcome === "failed"
        ? this.format(result.fatal ? "failed" : "warn", [result.fatal ? "red" : "yellow"])
        : result.outcome;
    this.write(`  ${targetLabel(target)} [${result.stage}] ${marker}: ${result.message}`);
  }

  onComplete(outcome: RepositoryOutcome): void {
    const label = targetLabel(outcome.target);
    const took = formatDuration(outcome.durationMs);
    switch (outcome.status) {
      case "succeeded":
        this.write(`${this.format("done", ["green"])}    ${label} (${took})`);
        return;
      case "failed":
        this.write(
          `${this.format("failed", ["red", "bold"])}  ${label} at ` +
            `${outcome.firstFailure?.stage ?? "unknown"}: ${outcome.firstFailure?.message ?? ""}`,
        );
        return;
      case "skipped":
        this.write(
          `${this.format("skipped", ["yellow"])} ${label}: ` +
            (outcome.skipReasons ?? []).join("; "),
        );
        return;
    }
  }

  log(event: LogEventInput): void {
    if (!this.options.verbose || event.type !== "command.start") return;
    const command = event.payload?.command;
    if (typeof command !== "string") return;
    const scope = event.repo ? `${event.repo} ` : "";
    this.write(this.format(`  ${scope}$ ${command}`, ["dim"]));
  }
}
