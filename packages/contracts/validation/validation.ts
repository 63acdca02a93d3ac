/**
 * Progression Validation Types
 *
 * Rules are evaluated once per chord against the previous chord and the
 * current key. Each chord produces exactly one Verdict.
 */

import type { Chord, ChordIdentity, KeyContext } from "../musical/musical";

export type RuleId =
  | "identified"
  | "in-key"
  | "diatonic-root"
  | "no-v-to-ii"
  | "no-v-to-iv"
  | "functional-progression"
  | "dominant-resolution"
  | "no-repetition"
  | "no-parallel-fifths"
  | "no-parallel-octaves"
  | "leading-tone-resolution"
  | "expected-chord"
  | "expected-notes"
  | "modulation";

/**
 * Everything a rule may look at for one step.
 */
export interface RuleContext {
  index: number;
  chord: Chord;
  identity: ChordIdentity | null;
  previous: Chord | null;
  previousIdentity: ChordIdentity | null;
  key: KeyContext;
}

export interface RuleOutcome {
  passed: boolean;
  message?: string;
  /** New key for the chords that follow (modulation) */
  keyChange?: KeyContext;
}

export interface ProgressionRule {
  readonly id: RuleId;
  readonly description: string;

  /**
   * Rules that read the chord identity. They fail automatically for an
   * unidentified chord and are not evaluated.
   */
  readonly requiresIdentity: boolean;

  evaluate(ctx: RuleContext): RuleOutcome;
}

/**
 * Result of validating one chord. Never mutated after creation.
 */
export interface Verdict {
  chordIndex: number;
  passed: boolean;
  /** Violated rule ids, in rule configuration order */
  violatedRules: readonly RuleId[];
  message: string;
  identity: ChordIdentity | null;
  /** Key the chord was validated in */
  key: KeyContext;
  /** Key adopted for later chords, if a rule changed it */
  keyChange: KeyContext | null;
}
