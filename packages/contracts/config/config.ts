import type { Ms } from "../core/time";
import type { MidiNote } from "../primitives/primitives";
import type { RuleId } from "../validation/validation";

/**
 * Note naming used in chord symbols.
 * - english: C, Db, F#
 * - french: Do, Ré#, Fa#
 */
export type Notation = "english" | "french";

/**
 * Staves of a piano score checked against the played notes:
 * right is the first part (or staff 1), left the second (or staff 2).
 */
export type Hand = "left" | "right" | "both";

export interface AggregationConfig {
  /** Gap after the last event of a window that closes it on the next note-on */
  silenceThresholdMs: Ms;

  /** Onsets closer than this belong to the same window regardless of order */
  simultaneityEpsilonMs: Ms;

  /** Minimum overlap for a note to count towards the pitch set (0 = off) */
  minOverlapMs: Ms;
}

/**
 * Resolved run configuration.
 */
export interface ValidatorConfig {
  /** Starting key, e.g. "C major", "A minor" */
  key: string;

  /** Enabled rules, in evaluation and reporting order */
  rules: RuleId[];

  aggregation: AggregationConfig;

  /** Minimum chord-identification confidence (0..1) */
  confidenceThreshold: number;

  /** Expected chord symbols, one per chord index */
  expectedChords: string[];

  /** Expected MIDI notes, one group per chord index */
  expectedNotes: MidiNote[][];

  /** MusicXML score whose measures replace `expectedNotes` */
  score: string | null;

  hand: Hand;

  notation: Notation;

  /** Sound the key tonic through the ALSA audio utility at start */
  referenceTone: boolean;
}
