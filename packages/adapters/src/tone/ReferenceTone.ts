/**
 * Reference tone through the ALSA audio utility.
 *
 * Fire-and-forget: the process is detached and never awaited. A missing
 * utility is reported through `onError` and otherwise ignored.
 */

import { spawn, type SpawnOptions } from "node:child_process";
import type { Hz } from "@progcheck/contracts";

/**
 * The part of a child process this module touches.
 */
export interface SpawnedProcess {
  on(event: "error", listener: (err: Error) => void): unknown;
  unref(): void;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => SpawnedProcess;

export interface ReferenceToneOptions {
  frequency: Hz;

  /**
   * Audio utility to run.
   * @default "speaker-test"
   */
  command?: string;

  /** Injected for tests */
  spawnProcess?: SpawnFn;

  onError?: (err: Error) => void;
}

export function playReferenceTone(options: ReferenceToneOptions): SpawnedProcess {
  const spawnProcess: SpawnFn = options.spawnProcess ?? spawn;
  const command = options.command ?? "speaker-test";

  // One loop of a sine wave at the requested frequency
  const args = ["-t", "sine", "-f", String(Math.round(options.frequency)), "-l", "1"];

  const child = spawnProcess(command, args, { detached: true, stdio: "ignore" });
  child.on("error", (err) => options.onError?.(err));
  child.unref();
  return child;
}
