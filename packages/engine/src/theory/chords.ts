/**
 * Chord templates and chord symbols.
 */

import * as Tonal from "tonal";
import type { ChordQuality, KeyContext, Notation, PitchClass } from "@progcheck/contracts";
import { noteChroma, spellPitchClass } from "./key";

/**
 * Tie-break rank when two readings fit equally well: plain triads are
 * preferred over sevenths, sevenths over suspended chords, suspended
 * chords over sixths, ninths and added tones.
 */
export type TemplateRank = 0 | 1 | 2 | 3;

export interface ChordTemplate {
  quality: ChordQuality;
  /** Semitones above the root, stacked in thirds: index 1 is the third, 2 the fifth */
  intervals: readonly number[];
  rank: TemplateRank;
  /** Symbol suffix after the root name */
  suffix: string;
}

export const CHORD_TEMPLATES: readonly ChordTemplate[] = [
  { quality: "maj", intervals: [0, 4, 7], rank: 0, suffix: "" },
  { quality: "min", intervals: [0, 3, 7], rank: 0, suffix: "m" },
  { quality: "dim", intervals: [0, 3, 6], rank: 0, suffix: "dim" },
  { quality: "aug", intervals: [0, 4, 8], rank: 0, suffix: "aug" },
  { quality: "maj7", intervals: [0, 4, 7, 11], rank: 1, suffix: "maj7" },
  { quality: "min7", intervals: [0, 3, 7, 10], rank: 1, suffix: "m7" },
  { quality: "dom7", intervals: [0, 4, 7, 10], rank: 1, suffix: "7" },
  { quality: "hdim7", intervals: [0, 3, 6, 10], rank: 1, suffix: "m7b5" },
  { quality: "dim7", intervals: [0, 3, 6, 9], rank: 1, suffix: "dim7" },
  { quality: "sus2", intervals: [0, 2, 7], rank: 2, suffix: "sus2" },
  { quality: "sus4", intervals: [0, 5, 7], rank: 2, suffix: "sus4" },
  { quality: "6", intervals: [0, 4, 7, 9], rank: 3, suffix: "6" },
  { quality: "min6", intervals: [0, 3, 7, 9], rank: 3, suffix: "m6" },
  { quality: "9", intervals: [0, 4, 7, 10, 2], rank: 3, suffix: "9" },
  { quality: "maj9", intervals: [0, 4, 7, 11, 2], rank: 3, suffix: "maj9" },
  { quality: "min9", intervals: [0, 3, 7, 10, 2], rank: 3, suffix: "m9" },
  { quality: "add9", intervals: [0, 4, 7, 2], rank: 3, suffix: "add9" },
];

const TEMPLATE_BY_QUALITY = new Map(CHORD_TEMPLATES.map((t) => [t.quality, t]));

export function templateFor(quality: ChordQuality): ChordTemplate {
  const template = TEMPLATE_BY_QUALITY.get(quality);
  if (!template) throw new Error(`No chord template for ${quality}`);
  return template;
}

/** Alternative spellings accepted when reading chord symbols */
const SUFFIX_ALIASES: Record<string, ChordQuality> = {
  M: "maj",
  maj: "maj",
  min: "min",
  "-": "min",
  "°": "dim",
  o: "dim",
  "+": "aug",
  M7: "maj7",
  "Δ7": "maj7",
  min7: "min7",
  "-7": "min7",
  dom7: "dom7",
  "ø": "hdim7",
  "ø7": "hdim7",
  "°7": "dim7",
  o7: "dim7",
  sus: "sus4",
  M9: "maj9",
};

const SYMBOL_PATTERN = /^([A-Ga-g][#b]?)(.*?)(?:\/([A-Ga-g][#b]?))?$/;

export interface ParsedChordSymbol {
  root: PitchClass;
  quality: ChordQuality;
  /** Slash bass, null when the symbol has none */
  bass: PitchClass | null;
}

/**
 * Read a chord symbol such as "Am", "G7", "Bbmaj7" or "C/E".
 * Returns null if the symbol names no known chord.
 */
export function parseChordSymbol(symbol: string): ParsedChordSymbol | null {
  const match = SYMBOL_PATTERN.exec(symbol.trim());
  if (!match) return null;

  const [, rootName, suffix, bassName] = match;
  const root = noteChroma(rootName.charAt(0).toUpperCase() + rootName.slice(1));
  if (root === null) return null;

  const bass = bassName ? noteChroma(bassName.charAt(0).toUpperCase() + bassName.slice(1)) : null;
  if (bassName && bass === null) return null;

  const quality =
    CHORD_TEMPLATES.find((t) => t.suffix === suffix)?.quality ??
    SUFFIX_ALIASES[suffix] ??
    qualityFromTonal(suffix);
  if (!quality) return null;

  return { root, quality, bass };
}

/**
 * Fall back on Tonal's chord dictionary for less common spellings.
 */
function qualityFromTonal(suffix: string): ChordQuality | null {
  const chord = Tonal.Chord.get(`C${suffix}`);
  if (chord.empty) return null;

  const typeMapping: Record<string, ChordQuality> = {
    major: "maj",
    minor: "min",
    diminished: "dim",
    augmented: "aug",
    "suspended second": "sus2",
    "suspended fourth": "sus4",
    "major seventh": "maj7",
    "minor seventh": "min7",
    "dominant seventh": "dom7",
    "half-diminished": "hdim7",
    "diminished seventh": "dim7",
    sixth: "6",
    "minor sixth": "min6",
    "dominant ninth": "9",
    "major ninth": "maj9",
    "minor ninth": "min9",
  };
  return typeMapping[chord.type] ?? null;
}

/**
 * Chord symbol in the key's spelling: "Dm7", "G/B", "Solm" in French.
 */
export function formatChordSymbol(
  root: PitchClass,
  quality: ChordQuality,
  bass: PitchClass,
  key: KeyContext,
  notation: Notation = "english"
): string {
  const name = spellPitchClass(root, key, notation) + templateFor(quality).suffix;
  return bass === root ? name : `${name}/${spellPitchClass(bass, key, notation)}`;
}
