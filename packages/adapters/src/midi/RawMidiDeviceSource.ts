/**
 * Live MIDI input from an ALSA raw-MIDI port (e.g. /dev/snd/midiC1D0).
 *
 * Bytes arrive asynchronously from the device and are parsed as they come;
 * `events()` hands them to the consumer one pull at a time. Each message is
 * timestamped against the session clock when its chunk is read.
 */

import { open, type FileHandle } from "node:fs/promises";
import { performance } from "node:perf_hooks";
import type {
  IMidiEventSource,
  RawInput,
  SourceId,
  StreamId,
  Ms,
} from "@progcheck/contracts";
import { DeviceUnavailableError, ValidatorError } from "@progcheck/contracts";

import { MidiByteParser } from "./MidiByteParser";
import { PushQueue } from "./PushQueue";

/**
 * Configuration for the raw-MIDI device source.
 */
export interface RawMidiDeviceSourceConfig {
  /** Path of the raw-MIDI character device */
  devicePath: string;

  /**
   * Stream identifier for provenance.
   * @default the device path
   */
  streamId?: StreamId;

  /**
   * Clock in milliseconds.
   * @default performance.now
   */
  clock?: () => number;

  /**
   * Clock reading at session start. Event timestamps are relative to it.
   * @default the clock reading when events() opens the port
   */
  sessionStart?: number;
}

export class RawMidiDeviceSource implements IMidiEventSource {
  readonly source: SourceId = "midi-device";
  readonly stream: StreamId;

  private config: RawMidiDeviceSourceConfig;
  private clock: () => number;

  constructor(config: RawMidiDeviceSourceConfig) {
    this.config = config;
    this.stream = config.streamId ?? config.devicePath;
    this.clock = config.clock ?? (() => performance.now());
  }

  async *events(signal?: AbortSignal): AsyncGenerator<RawInput> {
    if (signal?.aborted) return;

    const path = this.config.devicePath;
    let handle: FileHandle;
    try {
      handle = await open(path, "r");
    } catch (err) {
      throw new DeviceUnavailableError(
        `Cannot open MIDI port ${path}: ${describe(err)}`,
        { cause: err }
      );
    }

    const sessionStart = this.config.sessionStart ?? this.clock();
    const parser = new MidiByteParser();
    const queue = new PushQueue<RawInput>();

    // autoClose: the handle is closed when the stream ends or is destroyed
    const stream = handle.createReadStream();

    stream.on("data", (chunk: Buffer | string) => {
      const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      const t: Ms = this.clock() - sessionStart;
      try {
        for (const input of parser.push(bytes, t)) {
          queue.push(input);
        }
      } catch (err) {
        queue.fail(err);
        stream.destroy();
      }
    });
    stream.on("end", () => queue.end());
    stream.on("error", (err: Error) => {
      queue.fail(
        err instanceof ValidatorError
          ? err
          : new DeviceUnavailableError(`MIDI port ${path} failed: ${err.message}`, {
              cause: err,
            })
      );
    });

    const onAbort = (): void => {
      queue.end();
      stream.destroy();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
    // Aborted while the port was opening
    if (signal?.aborted) onAbort();

    try {
      yield* queue;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      stream.destroy();
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
