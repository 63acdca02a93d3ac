/**
 * Verdict Reporter
 *
 * Writes one line per verdict:
 *
 *   [<chordIndex>] <PASS|FAIL> <chord symbol|unidentified>[ <rule>,<rule>...]
 *
 * Each line is written as soon as its verdict arrives.
 */

import type { Writable } from "node:stream";
import type { IVerdictSink, Verdict } from "@progcheck/contracts";
import { SinkClosedError } from "@progcheck/contracts";

export function formatVerdict(verdict: Verdict): string {
  const parts = [
    `[${verdict.chordIndex}]`,
    verdict.passed ? "PASS" : "FAIL",
    verdict.identity?.symbol ?? "unidentified",
  ];
  if (verdict.violatedRules.length > 0) {
    parts.push(verdict.violatedRules.join(","));
  }
  return parts.join(" ");
}

export interface VerdictReporterOptions {
  /**
   * Follow each line with the verdict message, indented.
   * @default false
   */
  details?: boolean;
}

export class VerdictReporter implements IVerdictSink {
  readonly id = "reporter";

  private output: Writable;
  private details: boolean;
  private failure: Error | null = null;

  constructor(output: Writable, options: VerdictReporterOptions = {}) {
    this.output = output;
    this.details = options.details ?? false;
    // Surfaced on the next report instead of crashing the process
    output.on("error", (err: Error) => {
      if (!this.failure) this.failure = err;
    });
  }

  report(verdict: Verdict): Promise<void> {
    if (this.failure) {
      return Promise.reject(
        new SinkClosedError(`Output failed: ${this.failure.message}`, { cause: this.failure })
      );
    }
    if (this.output.destroyed || this.output.writableEnded) {
      return Promise.reject(new SinkClosedError("Output stream is closed"));
    }

    let text = formatVerdict(verdict) + "\n";
    if (this.details && verdict.message !== "ok") {
      text += `    ${verdict.message}\n`;
    }

    return new Promise((resolve, reject) => {
      this.output.write(text, (err) => {
        if (err) {
          reject(new SinkClosedError(`Output failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }
}
