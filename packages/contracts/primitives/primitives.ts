export type MidiNote = number;   // 0..127
export type Velocity = number;   // 0..127
export type PitchClass = 0|1|2|3|4|5|6|7|8|9|10|11; // C=0..B=11

export type ChordQuality =
  | "maj" | "min" | "dim" | "aug"
  | "sus2" | "sus4"
  | "maj7" | "min7" | "dom7" | "hdim7" | "dim7"
  | "6" | "min6" | "9" | "maj9" | "min9" | "add9";

/**
 * Narrow an integer to a pitch class (wraps negatives and values above 11).
 */
export function toPitchClass(n: number): PitchClass {
  const pcs: readonly PitchClass[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11];
  return pcs[((n % 12) + 12) % 12];
}
