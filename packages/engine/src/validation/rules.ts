/**
 * Progression rules.
 *
 * Each rule is a pure predicate over (previous chord, current chord, key).
 * Rules that read the chord identity declare `requiresIdentity`; the
 * validator fails them for unidentified chords without evaluating them.
 * Transition rules pass when there is no identified previous chord.
 */

import type {
  ChordIdentity,
  KeyContext,
  MidiNote,
  Notation,
  ProgressionRule,
  RuleContext,
  RuleId,
  RuleOutcome,
  ScaleDegree,
} from "@progcheck/contracts";
import { toPitchClass } from "@progcheck/contracts";
import { parseChordSymbol } from "../theory/chords";
import {
  degreeOf,
  formatMidiNote,
  isInKey,
  keyFromTonic,
  romanNumeral,
  spellPitchClass,
} from "../theory/key";

export const RULE_IDS = [
  "identified",
  "in-key",
  "diatonic-root",
  "no-v-to-ii",
  "no-v-to-iv",
  "functional-progression",
  "dominant-resolution",
  "no-repetition",
  "no-parallel-fifths",
  "no-parallel-octaves",
  "leading-tone-resolution",
  "expected-chord",
  "expected-notes",
  "modulation",
] as const satisfies readonly RuleId[];

export const DEFAULT_RULES: readonly RuleId[] = [
  "identified",
  "in-key",
  "no-v-to-ii",
  "dominant-resolution",
  "no-parallel-fifths",
  "no-parallel-octaves",
  "modulation",
];

export interface RuleOptions {
  /** Chord symbols for `expected-chord`, one per chord index */
  expectedChords?: readonly string[];

  /** Note groups for `expected-notes`, one per chord index */
  expectedNotes?: readonly (readonly MidiNote[])[];

  /** Note naming in rule messages */
  notation?: Notation;
}

type HarmonicFunction = "tonic" | "predominant" | "dominant";

const FUNCTION_OF_DEGREE: Record<ScaleDegree, HarmonicFunction> = {
  1: "tonic",
  2: "predominant",
  3: "tonic",
  4: "predominant",
  5: "dominant",
  6: "tonic",
  7: "dominant",
};

const PASS: RuleOutcome = { passed: true };

function fail(message: string): RuleOutcome {
  return { passed: false, message };
}

/**
 * Run `check` only when both chords of a transition are identified.
 */
function transition(
  ctx: RuleContext,
  check: (previous: ChordIdentity, current: ChordIdentity) => RuleOutcome
): RuleOutcome {
  if (!ctx.previousIdentity || !ctx.identity) return PASS;
  return check(ctx.previousIdentity, ctx.identity);
}

/**
 * Degree of a chord root in the key being validated. The previous chord's
 * stored degree may belong to the key before a modulation.
 */
function degree(identity: ChordIdentity, key: KeyContext): ScaleDegree | null {
  return degreeOf(identity.root, key);
}

function numeral(identity: ChordIdentity, key: KeyContext): string {
  return romanNumeral(identity.root, identity.quality, key);
}

// ============================================================================
// Rule factories
// ============================================================================

type RuleFactory = (options: RuleOptions) => ProgressionRule;

const RULES: Record<RuleId, RuleFactory> = {
  identified: () => ({
    id: "identified",
    description: "Every chord can be named",
    requiresIdentity: true,
    evaluate: () => PASS,
  }),

  "in-key": ({ notation }) => ({
    id: "in-key",
    description: "Every pitch belongs to the key",
    requiresIdentity: false,
    evaluate: ({ chord, key }) => {
      const outside = chord.pitchSet.filter((pc) => !isInKey(pc, key));
      if (outside.length === 0) return PASS;
      const names = outside.map((pc) => spellPitchClass(pc, key, notation)).join(", ");
      return fail(`${names} outside ${key.name}`);
    },
  }),

  "diatonic-root": () => ({
    id: "diatonic-root",
    description: "Chord roots are scale degrees of the key",
    requiresIdentity: true,
    evaluate: ({ identity, key }) => {
      if (!identity || degree(identity, key) !== null) return PASS;
      return fail(`${identity.symbol} has a chromatic root in ${key.name}`);
    },
  }),

  "no-v-to-ii": () => ({
    id: "no-v-to-ii",
    description: "V does not move to ii",
    requiresIdentity: true,
    evaluate: (ctx) =>
      transition(ctx, (prev, cur) =>
        degree(prev, ctx.key) === 5 && degree(cur, ctx.key) === 2
          ? fail(`V moves to ii (${prev.symbol} → ${cur.symbol})`)
          : PASS
      ),
  }),

  "no-v-to-iv": () => ({
    id: "no-v-to-iv",
    description: "V does not move to IV",
    requiresIdentity: true,
    evaluate: (ctx) =>
      transition(ctx, (prev, cur) =>
        degree(prev, ctx.key) === 5 && degree(cur, ctx.key) === 4
          ? fail(`V moves to IV (${prev.symbol} → ${cur.symbol})`)
          : PASS
      ),
  }),

  "functional-progression": () => ({
    id: "functional-progression",
    description: "Dominant harmony does not fall back to predominant harmony",
    requiresIdentity: true,
    evaluate: (ctx) =>
      transition(ctx, (prev, cur) => {
        const from = degree(prev, ctx.key);
        const to = degree(cur, ctx.key);
        if (from === null || to === null) return PASS;
        if (FUNCTION_OF_DEGREE[from] === "dominant" && FUNCTION_OF_DEGREE[to] === "predominant") {
          return fail(
            `dominant ${numeral(prev, ctx.key)} moves back to predominant ${numeral(cur, ctx.key)}`
          );
        }
        return PASS;
      }),
  }),

  "dominant-resolution": () => ({
    id: "dominant-resolution",
    description: "V7 resolves to I or vi",
    requiresIdentity: true,
    evaluate: (ctx) =>
      transition(ctx, (prev, cur) => {
        if (prev.quality !== "dom7" || degree(prev, ctx.key) !== 5) return PASS;
        const to = degree(cur, ctx.key);
        if (to === 1 || to === 6) return PASS;
        return fail(`${prev.symbol} resolves to ${cur.symbol} instead of I or vi`);
      }),
  }),

  "no-repetition": () => ({
    id: "no-repetition",
    description: "A chord is not repeated",
    requiresIdentity: true,
    evaluate: (ctx) =>
      transition(ctx, (prev, cur) =>
        prev.root === cur.root && prev.quality === cur.quality
          ? fail(`${cur.symbol} repeated`)
          : PASS
      ),
  }),

  "no-parallel-fifths": () => ({
    id: "no-parallel-fifths",
    description: "Outer voices do not move in parallel fifths",
    requiresIdentity: false,
    evaluate: (ctx) => parallelMotion(ctx, 7, "fifths"),
  }),

  "no-parallel-octaves": () => ({
    id: "no-parallel-octaves",
    description: "Outer voices do not move in parallel octaves",
    requiresIdentity: false,
    evaluate: (ctx) => parallelMotion(ctx, 0, "octaves"),
  }),

  "leading-tone-resolution": ({ notation }) => ({
    id: "leading-tone-resolution",
    description: "A leading tone in the top voice rises to the tonic",
    requiresIdentity: false,
    evaluate: ({ chord, previous, key }) => {
      if (!previous) return PASS;
      const from = soprano(previous.pitches);
      const to = soprano(chord.pitches);
      if (toPitchClass(from) !== toPitchClass(key.tonic + 11)) return PASS;
      if (to > from && toPitchClass(to) === key.tonic) return PASS;
      return fail(
        `leading tone ${formatMidiNote(from, notation)} moves to ${formatMidiNote(to, notation)}`
      );
    },
  }),

  "expected-chord": ({ expectedChords = [] }) => ({
    id: "expected-chord",
    description: "Chords match the expected progression",
    requiresIdentity: true,
    evaluate: ({ index, identity }) => {
      if (!identity) return PASS;
      const symbol = expectedChords[index];
      if (symbol === undefined) return fail(`no chord expected at position ${index}`);
      const expected = parseChordSymbol(symbol);
      if (!expected) return fail(`cannot read expected chord "${symbol}"`);
      if (expected.root === identity.root && expected.quality === identity.quality) return PASS;
      return fail(`expected ${symbol}, played ${identity.symbol}`);
    },
  }),

  "expected-notes": ({ expectedNotes = [], notation }) => ({
    id: "expected-notes",
    description: "Chords contain the expected notes",
    requiresIdentity: false,
    evaluate: ({ index, chord }) => {
      const expected = expectedNotes[index];
      if (expected === undefined) return fail(`no notes expected at position ${index}`);
      const missing = [...new Set(expected)].filter((note) => !chord.pitches.includes(note));
      if (missing.length === 0) return PASS;
      return fail(`missing ${missing.map((note) => formatMidiNote(note, notation)).join(", ")}`);
    },
  }),

  modulation: () => ({
    id: "modulation",
    description: "A dominant seventh resolving to a new tonic changes the key",
    requiresIdentity: false,
    evaluate: (ctx) =>
      transition(ctx, (prev, cur) => {
        const resolves = prev.quality === "dom7" && toPitchClass(prev.root + 5) === cur.root;
        if (!resolves || cur.root === ctx.key.tonic) return PASS;
        if (cur.quality !== "maj" && cur.quality !== "min") return PASS;

        const keyChange = keyFromTonic(cur.root, cur.quality === "min" ? "minor" : "major");
        return { passed: true, message: `modulates to ${keyChange.name}`, keyChange };
      }),
  }),
};

// ============================================================================
// Voice leading
// ============================================================================

function bassVoice(pitches: readonly MidiNote[]): MidiNote {
  return pitches[0];
}

function soprano(pitches: readonly MidiNote[]): MidiNote {
  return pitches[pitches.length - 1];
}

/**
 * Outer voices forming the same perfect interval (7 = fifth, 0 = octave or
 * unison compound) in both chords while moving in the same direction.
 */
function parallelMotion(ctx: RuleContext, intervalClass: number, label: string): RuleOutcome {
  const { chord, previous } = ctx;
  if (!previous || previous.pitches.length < 2 || chord.pitches.length < 2) return PASS;

  const fromBass = bassVoice(previous.pitches);
  const fromTop = soprano(previous.pitches);
  const toBass = bassVoice(chord.pitches);
  const toTop = soprano(chord.pitches);

  const isPerfect = (interval: number): boolean => interval > 0 && interval % 12 === intervalClass;
  if (!isPerfect(fromTop - fromBass) || !isPerfect(toTop - toBass)) return PASS;

  const bassMotion = Math.sign(toBass - fromBass);
  const topMotion = Math.sign(toTop - fromTop);
  if (bassMotion === 0 || bassMotion !== topMotion) return PASS;

  return fail(`parallel ${label} between bass and top voice`);
}

// ============================================================================
// Rule sets
// ============================================================================

export function createRule(id: RuleId, options: RuleOptions = {}): ProgressionRule {
  return RULES[id](options);
}

/**
 * Build rules in the given order, which is also the reporting order.
 */
export function createRuleSet(ids: readonly RuleId[], options: RuleOptions = {}): ProgressionRule[] {
  return ids.map((id) => createRule(id, options));
}
