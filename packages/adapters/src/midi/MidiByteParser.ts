/**
 * MIDI Byte Parser
 *
 * Incremental parser for a raw MIDI byte stream (as read from an ALSA
 * raw-MIDI port). Emits protocol-level events without musical
 * interpretation.
 *
 * Handles running status, real-time bytes interleaved anywhere (ignored),
 * SysEx blocks (skipped) and system-common messages (skipped, they cancel
 * running status).
 */

import type {
  RawInput,
  MidiNoteOn,
  MidiNoteOff,
  MidiCC,
  Ms,
} from "@progcheck/contracts";
import { MalformedStreamError } from "@progcheck/contracts";

/** Data bytes that follow each system-common status byte */
const SYSTEM_COMMON_LENGTH: Partial<Record<number, number>> = {
  0xf1: 1, // MTC quarter frame
  0xf2: 2, // song position
  0xf3: 1, // song select
  0xf6: 0, // tune request
  0xf7: 0, // stray end of exclusive
};

export class MidiByteParser {
  private runningStatus: number | null = null;
  private pending: number[] = [];
  private inSysex = false;
  private skipBytes = 0;

  /** False until the first status byte; earlier data bytes are a partial message */
  private synced = false;

  /**
   * Feed a chunk of bytes received at time `t`.
   * @throws MalformedStreamError if the bytes are not valid MIDI
   */
  push(bytes: Uint8Array, t: Ms): RawInput[] {
    const inputs: RawInput[] = [];

    for (const byte of bytes) {
      // Real-time messages may appear between any two bytes
      if (byte >= 0xf8) continue;

      if (byte & 0x80) {
        this.handleStatus(byte);
        continue;
      }

      if (this.inSysex) continue;

      if (this.skipBytes > 0) {
        this.skipBytes--;
        continue;
      }

      if (this.runningStatus === null) {
        if (!this.synced) continue;
        throw new MalformedStreamError(
          `Data byte 0x${hex(byte)} at ${Math.round(t)}ms has no status byte`
        );
      }

      this.pending.push(byte);
      if (this.pending.length === dataLength(this.runningStatus)) {
        const input = this.decode(this.runningStatus, this.pending, t);
        this.pending = [];
        if (input) inputs.push(input);
      }
    }

    return inputs;
  }

  /**
   * Clear all state. Useful when a port is reopened.
   */
  reset(): void {
    this.runningStatus = null;
    this.pending = [];
    this.inSysex = false;
    this.skipBytes = 0;
    this.synced = false;
  }

  private handleStatus(status: number): void {
    this.synced = true;
    this.pending = [];
    this.skipBytes = 0;

    // Any status byte ends a SysEx block
    this.inSysex = false;

    if (status < 0xf0) {
      this.runningStatus = status;
      return;
    }

    this.runningStatus = null;

    if (status === 0xf0) {
      this.inSysex = true;
      return;
    }

    const length = SYSTEM_COMMON_LENGTH[status];
    if (length === undefined) {
      throw new MalformedStreamError(`Undefined status byte 0x${hex(status)}`);
    }
    this.skipBytes = length;
  }

  private decode(status: number, data: number[], t: Ms): RawInput | null {
    const command = status >> 4;
    const channel = status & 0x0f;
    const [data1, data2] = data;

    // Note On (0x9) with velocity > 0
    if (command === 0x9 && data2 > 0) {
      const noteOn: MidiNoteOn = {
        type: "midi_note_on",
        t,
        note: data1,
        velocity: data2,
        channel,
      };
      return noteOn;
    }

    // Note Off (0x8) or Note On with velocity 0
    if (command === 0x8 || command === 0x9) {
      const noteOff: MidiNoteOff = {
        type: "midi_note_off",
        t,
        note: data1,
        channel,
      };
      return noteOff;
    }

    // Control Change (0xB)
    if (command === 0xb) {
      const cc: MidiCC = {
        type: "midi_cc",
        t,
        controller: data1,
        value: data2,
        channel,
      };
      return cc;
    }

    // Aftertouch, program change, pitch bend: parsed, not reported
    return null;
  }
}

function dataLength(status: number): number {
  const command = status >> 4;
  return command === 0xc || command === 0xd ? 1 : 2;
}

function hex(byte: number): string {
  return byte.toString(16).padStart(2, "0");
}
