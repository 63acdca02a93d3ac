/**
 * Raw Input Types
 *
 * Protocol-level input from MIDI event sources. These types represent what
 * a source can observe without temporal accumulation or musical
 * interpretation.
 */

import type { Ms } from "../core/time";
import type { MidiNote, Velocity } from "../primitives/primitives";

/**
 * MIDI note-on protocol event.
 */
export interface MidiNoteOn {
  type: "midi_note_on";
  t: Ms;
  note: MidiNote;
  velocity: Velocity; // 1-127, velocity 0 arrives as MidiNoteOff
  channel: number;
}

/**
 * MIDI note-off protocol event.
 */
export interface MidiNoteOff {
  type: "midi_note_off";
  t: Ms;
  note: MidiNote;
  channel: number;
}

/**
 * MIDI continuous controller event.
 */
export interface MidiCC {
  type: "midi_cc";
  t: Ms;
  controller: number;
  value: number;
  channel: number;
}

/**
 * Union of all raw input types from event sources.
 */
export type RawInput = MidiNoteOn | MidiNoteOff | MidiCC;
