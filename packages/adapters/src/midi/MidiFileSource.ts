/**
 * Recorded MIDI input from a Standard MIDI File.
 *
 * All tracks are merged into one time-ordered sequence. Ticks are converted
 * to milliseconds through the file's tempo map, or its SMPTE division.
 * The sequence is finite and restartable: every call to `events()` reads
 * the file again.
 */

import { readFile } from "node:fs/promises";
import { parseMidi, type MidiData, type MidiEvent } from "midi-file";
import type {
  IMidiEventSource,
  RawInput,
  SourceId,
  StreamId,
  Ms,
} from "@progcheck/contracts";
import { DeviceUnavailableError, MalformedStreamError } from "@progcheck/contracts";

/** 120 BPM, the MIDI default until a tempo event says otherwise */
const DEFAULT_MICROSECONDS_PER_BEAT = 500_000;

export interface MidiFileSourceConfig {
  filePath: string;

  /**
   * Stream identifier for provenance.
   * @default the file path
   */
  streamId?: StreamId;
}

export class MidiFileSource implements IMidiEventSource {
  readonly source: SourceId = "midi-file";
  readonly stream: StreamId;

  private filePath: string;

  constructor(config: MidiFileSourceConfig) {
    this.filePath = config.filePath;
    this.stream = config.streamId ?? config.filePath;
  }

  async *events(signal?: AbortSignal): AsyncGenerator<RawInput> {
    if (signal?.aborted) return;

    const inputs = await this.load();
    for (const input of inputs) {
      if (signal?.aborted) return;
      yield input;
    }
  }

  /**
   * Read and parse the whole file.
   */
  async load(): Promise<RawInput[]> {
    let bytes: Buffer;
    try {
      bytes = await readFile(this.filePath);
    } catch (err) {
      throw new DeviceUnavailableError(
        `Cannot read MIDI file ${this.filePath}: ${describe(err)}`,
        { cause: err }
      );
    }

    let data: MidiData;
    try {
      data = parseMidi(bytes);
    } catch (err) {
      throw new MalformedStreamError(
        `${this.filePath} is not a valid MIDI file: ${describe(err)}`,
        { cause: err }
      );
    }

    return midiDataToRawInputs(data);
  }
}

interface TimedEvent {
  tick: number;
  seq: number;
  event: MidiEvent;
}

/**
 * Flatten parsed MIDI tracks into time-ordered raw input.
 *
 * At equal ticks, tempo changes come first, then note-offs, then everything
 * else, then note-ons, so a chord change on one tick releases the old chord
 * before the new one sounds.
 */
export function midiDataToRawInputs(data: MidiData): RawInput[] {
  const msPerTick = createTickClock(data);

  const timed: TimedEvent[] = [];
  let seq = 0;
  for (const track of data.tracks) {
    let tick = 0;
    for (const event of track) {
      tick += event.deltaTime;
      timed.push({ tick, seq: seq++, event });
    }
  }

  timed.sort(
    (a, b) => a.tick - b.tick || eventRank(a.event) - eventRank(b.event) || a.seq - b.seq
  );

  const inputs: RawInput[] = [];
  let microsecondsPerBeat = DEFAULT_MICROSECONDS_PER_BEAT;
  let lastTick = 0;
  let t: Ms = 0;

  for (const { tick, event } of timed) {
    t += (tick - lastTick) * msPerTick(microsecondsPerBeat);
    lastTick = tick;

    switch (event.type) {
      case "setTempo":
        microsecondsPerBeat = event.microsecondsPerBeat;
        break;
      case "noteOn":
        inputs.push(
          event.velocity > 0
            ? {
                type: "midi_note_on",
                t,
                note: event.noteNumber,
                velocity: event.velocity,
                channel: event.channel,
              }
            : { type: "midi_note_off", t, note: event.noteNumber, channel: event.channel }
        );
        break;
      case "noteOff":
        inputs.push({
          type: "midi_note_off",
          t,
          note: event.noteNumber,
          channel: event.channel,
        });
        break;
      case "controller":
        inputs.push({
          type: "midi_cc",
          t,
          controller: event.controllerType,
          value: event.value,
          channel: event.channel,
        });
        break;
      default:
        // Meta and other channel events carry no notes
        break;
    }
  }

  return inputs;
}

function createTickClock(data: MidiData): (microsecondsPerBeat: number) => Ms {
  const { ticksPerBeat, framesPerSecond, ticksPerFrame } = data.header;

  if (framesPerSecond !== undefined && ticksPerFrame !== undefined) {
    if (framesPerSecond <= 0 || ticksPerFrame <= 0) {
      throw new MalformedStreamError("SMPTE division must be positive");
    }
    // SMPTE time ignores tempo
    const ms = 1000 / (framesPerSecond * ticksPerFrame);
    return () => ms;
  }

  if (ticksPerBeat === undefined || ticksPerBeat <= 0) {
    throw new MalformedStreamError("MIDI header has no usable time division");
  }
  const division = ticksPerBeat;
  return (microsecondsPerBeat) => microsecondsPerBeat / division / 1000;
}

function eventRank(event: MidiEvent): number {
  switch (event.type) {
    case "setTempo":
      return 0;
    case "noteOff":
      return 1;
    case "noteOn":
      return event.velocity > 0 ? 3 : 1;
    default:
      return 2;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
