/**
 * Musical Types
 *
 * Musical abstractions built from raw input: notes with duration, chords
 * grouped from overlapping notes, and the key context chords are read in.
 */

import type { Ms, Confidence } from "../core/time";
import type {
  MidiNote,
  PitchClass,
  Velocity,
  ChordQuality,
} from "../primitives/primitives";

/**
 * A played note. Created on note-on; `duration` is filled in when the
 * matching note-off arrives and stays null while the note is held.
 */
export interface NoteEvent {
  pitch: MidiNote;
  velocity: Velocity;
  onset: Ms;
  duration: Ms | null;
  channel: number;
}

/**
 * Half-open time interval [start, end).
 */
export interface TimeWindow {
  start: Ms;
  end: Ms;
}

export type KeyMode = "major" | "minor";

/**
 * Key signature used to read chords: tonic, mode and the seven scale
 * pitch classes (natural minor for minor keys).
 */
export interface KeyContext {
  tonic: PitchClass;
  mode: KeyMode;
  /** Display name, e.g. "C major", "F# minor" */
  name: string;
  scale: readonly PitchClass[];
}

/**
 * Which chord tone sits in the bass.
 * "other" covers basses beyond the seventh (e.g. the ninth).
 */
export type Inversion = "root" | "first" | "second" | "third" | "other";

/**
 * Scale degree of a chord root, 1 (tonic) .. 7 (leading tone).
 */
export type ScaleDegree = 1 | 2 | 3 | 4 | 5 | 6 | 7;

/**
 * A resolved chord name.
 */
export interface ChordIdentity {
  root: PitchClass;
  quality: ChordQuality;
  inversion: Inversion;
  bass: PitchClass;
  confidence: Confidence;
  /** Chord symbol, e.g. "Dm7", "C/E" */
  symbol: string;
  /** Degree of the root in the key it was identified in, null if chromatic */
  degree: ScaleDegree | null;
  /** Roman numeral in that key, e.g. "V7", "ii", "bVI" */
  numeral: string;
}

/**
 * A group of overlapping notes closed by the note aggregator.
 * `identity` is null until the identifier has run, and stays null when no
 * interpretation is confident enough ("unidentified").
 */
export interface Chord {
  index: number;
  /** Sorted unique pitch classes, never empty */
  pitchSet: readonly PitchClass[];
  /** Sorted unique MIDI notes contributing to the pitch set */
  pitches: readonly MidiNote[];
  bass: PitchClass;
  window: TimeWindow;
  notes: readonly NoteEvent[];
  identity: ChordIdentity | null;
}
