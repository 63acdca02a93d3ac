/**
 * Key signatures, scale degrees and note spelling.
 * Uses Tonal.js for key scales and note names.
 */

import * as Tonal from "tonal";
import type {
  ChordQuality,
  Hz,
  KeyContext,
  KeyMode,
  MidiNote,
  Notation,
  PitchClass,
  ScaleDegree,
} from "@progcheck/contracts";
import { InvalidConfigError, toPitchClass } from "@progcheck/contracts";

const KEY_PATTERN = /^([A-Ga-g])([#b]*)\s*([A-Za-z]*)$/;

/** Conventional tonic spellings (fewest accidentals) */
const MAJOR_TONICS = ["C", "Db", "D", "Eb", "E", "F", "F#", "G", "Ab", "A", "Bb", "B"];
const MINOR_TONICS = ["C", "C#", "D", "Eb", "E", "F", "F#", "G", "G#", "A", "Bb", "B"];

const FRENCH_NAMES = ["Do", "Do#", "Ré", "Ré#", "Mi", "Fa", "Fa#", "Sol", "Sol#", "La", "La#", "Si"];

const NUMERALS = ["I", "II", "III", "IV", "V", "VI", "VII"];

const MINOR_QUALITIES: ReadonlySet<ChordQuality> = new Set<ChordQuality>([
  "min", "dim", "min7", "hdim7", "dim7", "min6", "min9",
]);

const NUMERAL_SUFFIX: Record<ChordQuality, string> = {
  maj: "",
  min: "",
  dim: "°",
  aug: "+",
  sus2: "sus2",
  sus4: "sus4",
  maj7: "maj7",
  min7: "7",
  dom7: "7",
  hdim7: "ø7",
  dim7: "°7",
  "6": "6",
  min6: "6",
  "9": "9",
  maj9: "maj9",
  min9: "9",
  add9: "add9",
};

/**
 * Pitch class of a note name ("Eb", "f#"), or null if it is not one.
 */
export function noteChroma(name: string): PitchClass | null {
  const note = Tonal.Note.get(name);
  const chroma: number | undefined = note.chroma;
  if (note.empty || chroma === undefined || Number.isNaN(chroma)) return null;
  return toPitchClass(chroma);
}

/**
 * Parse a key name: "C major", "A Minor", "F#m", "Bb", "eb minor".
 * @throws InvalidConfigError if the name is not a key
 */
export function parseKey(name: string): KeyContext {
  const match = KEY_PATTERN.exec(name.trim());
  if (!match) {
    throw new InvalidConfigError("key", `"${name}" is not a key (e.g. "C major", "F# minor")`);
  }

  const [, letter, accidentals, modeName] = match;
  const tonicName = letter.toUpperCase() + accidentals;
  const mode = parseMode(modeName);
  if (!mode) {
    throw new InvalidConfigError("key", `"${name}" has an unknown mode "${modeName}"`);
  }

  const tonic = noteChroma(tonicName);
  if (tonic === null) {
    throw new InvalidConfigError("key", `"${name}" has no valid tonic`);
  }

  return createKey(tonicName, mode);
}

/**
 * "M" and "m" are case-sensitive; spelled-out modes are not.
 */
function parseMode(name: string): KeyMode | null {
  if (name === "" || name === "M") return "major";
  if (name === "m") return "minor";
  switch (name.toLowerCase()) {
    case "major":
    case "maj":
      return "major";
    case "minor":
    case "min":
      return "minor";
    default:
      return null;
  }
}

/**
 * Key on a tonic pitch class, spelled conventionally.
 */
export function keyFromTonic(tonic: PitchClass, mode: KeyMode): KeyContext {
  return createKey((mode === "major" ? MAJOR_TONICS : MINOR_TONICS)[tonic], mode);
}

function createKey(tonicName: string, mode: KeyMode): KeyContext {
  const scaleNames =
    mode === "major"
      ? Tonal.Key.majorKey(tonicName).scale
      : Tonal.Key.minorKey(tonicName).natural.scale;

  const scale: PitchClass[] = [];
  for (const note of scaleNames) {
    const pc = noteChroma(note);
    if (pc !== null) scale.push(pc);
  }

  const tonic = noteChroma(tonicName) ?? scale[0];
  return { tonic, mode, name: `${tonicName} ${mode}`, scale };
}

/**
 * Scale degree of a pitch class. In minor keys the raised sixth and
 * seventh also count as degrees 6 and 7.
 */
export function degreeOf(pc: PitchClass, key: KeyContext): ScaleDegree | null {
  const index = key.scale.indexOf(pc);
  if (index >= 0) return toDegree(index + 1);

  if (key.mode === "minor") {
    const interval = (pc - key.tonic + 12) % 12;
    if (interval === 9) return 6;
    if (interval === 11) return 7;
  }
  return null;
}

export function isInKey(pc: PitchClass, key: KeyContext): boolean {
  return degreeOf(pc, key) !== null;
}

/**
 * Roman numeral for a chord root and quality: "V7", "ii", "vii°", "bVI".
 * Chromatic roots are named from the scale degree a semitone away.
 */
export function romanNumeral(root: PitchClass, quality: ChordQuality, key: KeyContext): string {
  let prefix = "";
  let degree = degreeOf(root, key);

  if (degree === null) {
    const above = degreeOf(toPitchClass(root + 1), key);
    if (above !== null) {
      prefix = "b";
      degree = above;
    } else {
      prefix = "#";
      degree = degreeOf(toPitchClass(root - 1), key) ?? 1;
    }
  }

  const base = NUMERALS[degree - 1];
  const numeral = MINOR_QUALITIES.has(quality) ? base.toLowerCase() : base;
  return prefix + numeral + NUMERAL_SUFFIX[quality];
}

/**
 * Name of a pitch class, spelled with the key's accidentals.
 */
export function spellPitchClass(pc: PitchClass, key: KeyContext, notation: Notation = "english"): string {
  if (notation === "french") return FRENCH_NAMES[pc];
  return Tonal.Midi.midiToNoteName(60 + pc, { pitchClass: true, sharps: usesSharps(key) });
}

/**
 * Name of a MIDI note with its octave: "C4", or "Do4" in French notation.
 */
export function formatMidiNote(note: MidiNote, notation: Notation = "english"): string {
  if (notation === "french") {
    return `${FRENCH_NAMES[toPitchClass(note)]}${Math.floor(note / 12) - 1}`;
  }
  return Tonal.Midi.midiToNoteName(note, { sharps: true });
}

/**
 * Frequency of the key tonic in the octave above middle C.
 */
export function tonicFrequency(key: KeyContext): Hz {
  return Tonal.Midi.midiToFreq(60 + key.tonic);
}

function usesSharps(key: KeyContext): boolean {
  const tonicName = key.name.split(" ")[0];
  if (tonicName.includes("b")) return false;
  if (tonicName.includes("#")) return true;
  // Natural tonics: sharp keys are G, D, A, E, B major and E, B minor
  const sharpTonics = key.mode === "major" ? [7, 2, 9, 4, 11] : [4, 11];
  return sharpTonics.includes(key.tonic);
}

function toDegree(n: number): ScaleDegree {
  const degrees: readonly ScaleDegree[] = [1, 2, 3, 4, 5, 6, 7];
  return degrees[Math.min(Math.max(n, 1), 7) - 1];
}
