/**
 * Chord Identifier
 *
 * Names a pitch-class set by matching it against chord templates on every
 * root present in the set. Each reading is scored by how many tones it
 * leaves unexplained or missing, with a small penalty for tones outside
 * the key; the cheapest reading wins.
 *
 * Ties are broken by template rank (triad, seventh, suspended, extended)
 * and then by the lowest root, so the result is deterministic.
 */

import type {
  Chord,
  ChordIdentity,
  Confidence,
  IChordIdentifier,
  Inversion,
  KeyContext,
  Notation,
  PitchClass,
} from "@progcheck/contracts";
import { toPitchClass } from "@progcheck/contracts";
import { CHORD_TEMPLATES, formatChordSymbol, type ChordTemplate } from "../theory/chords";
import { degreeOf, isInKey, romanNumeral } from "../theory/key";

export interface ChordIdentifierConfig {
  /**
   * Readings below this confidence are reported as unidentified.
   * @default 0.6
   */
  confidenceThreshold?: number;

  /** @default "english" */
  notation?: Notation;

  /** @default CHORD_TEMPLATES */
  templates?: readonly ChordTemplate[];
}

const DEFAULT_CONFIG: Required<ChordIdentifierConfig> = {
  confidenceThreshold: 0.6,
  notation: "english",
  templates: CHORD_TEMPLATES,
};

/** Readings must explain at least this many played pitch classes */
const MIN_MATCHED = 2;

const INVERSIONS: readonly Inversion[] = ["root", "first", "second", "third"];

/**
 * One way of reading a pitch-class set.
 */
export interface ChordCandidate {
  root: PitchClass;
  template: ChordTemplate;
  /** Played pitch classes that belong to the chord */
  matched: number;
  /** Chord tones that were not played */
  missing: number;
  /** Played pitch classes outside the chord */
  nonChord: number;
  /** Chord tones outside the key */
  accidentals: number;
  cost: number;
  confidence: Confidence;
}

export class ChordIdentifier implements IChordIdentifier {
  readonly id = "chord-identifier";

  private config: Required<ChordIdentifierConfig>;

  constructor(config: ChordIdentifierConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  identify(pitchSet: readonly PitchClass[], bass: PitchClass, key: KeyContext): ChordIdentity | null {
    const [best] = this.candidates(pitchSet, key);
    if (!best || best.confidence < this.config.confidenceThreshold) {
      return null;
    }

    const { root, template } = best;
    return {
      root,
      quality: template.quality,
      inversion: inversionOf(template, toPitchClass(bass - root)),
      bass,
      confidence: best.confidence,
      symbol: formatChordSymbol(root, template.quality, bass, key, this.config.notation),
      degree: degreeOf(root, key),
      numeral: romanNumeral(root, template.quality, key),
    };
  }

  /**
   * All readings of a pitch-class set, best first.
   */
  candidates(pitchSet: readonly PitchClass[], key: KeyContext): ChordCandidate[] {
    const played = new Set(pitchSet);
    const candidates: ChordCandidate[] = [];

    for (const root of played) {
      for (const template of this.config.templates) {
        const tones = template.intervals.map((interval) => toPitchClass(root + interval));
        const matched = tones.filter((pc) => played.has(pc)).length;
        if (matched < MIN_MATCHED) continue;

        const missing = tones.length - matched;
        const nonChord = played.size - matched;
        const accidentals = tones.filter((pc) => !isInKey(pc, key)).length;

        candidates.push({
          root,
          template,
          matched,
          missing,
          nonChord,
          accidentals,
          cost: 2 * (nonChord + missing) + accidentals,
          confidence: matched / (played.size + missing),
        });
      }
    }

    const order = this.config.templates;
    return candidates.sort(
      (a, b) =>
        a.cost - b.cost ||
        a.template.rank - b.template.rank ||
        a.root - b.root ||
        order.indexOf(a.template) - order.indexOf(b.template)
    );
  }
}

function inversionOf(template: ChordTemplate, bassInterval: number): Inversion {
  const position = template.intervals.indexOf(bassInterval);
  return INVERSIONS[position] ?? "other";
}

/**
 * Pipeline stage: attach an identity to each chord. The key is read per
 * chord so a modulation applies from the next chord on.
 */
export async function* identifyChords(
  chords: AsyncIterable<Chord>,
  identifier: IChordIdentifier,
  currentKey: () => KeyContext
): AsyncGenerator<Chord> {
  for await (const chord of chords) {
    yield { ...chord, identity: identifier.identify(chord.pitchSet, chord.bass, currentKey()) };
  }
}
