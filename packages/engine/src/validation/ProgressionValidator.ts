/**
 * Progression Validator
 *
 * Evaluates the configured rules against each chord and its predecessor.
 * State between steps is the previous chord and the current key; a rule
 * may change the key for the chords that follow (modulation).
 *
 * Every chord produces exactly one Verdict, including the first.
 */

import type {
  Chord,
  KeyContext,
  ProgressionRule,
  RuleContext,
  RuleId,
  Verdict,
} from "@progcheck/contracts";

export interface ValidatorState {
  previous: Chord | null;
  key: KeyContext;
}

export class ProgressionValidator {
  readonly id = "progression-validator";

  private rules: readonly ProgressionRule[];
  private initialKey: KeyContext;
  private state: ValidatorState;

  constructor(rules: readonly ProgressionRule[], initialKey: KeyContext) {
    this.rules = rules;
    this.initialKey = initialKey;
    this.state = { previous: null, key: initialKey };
  }

  /** Key the next chord will be validated in */
  get key(): KeyContext {
    return this.state.key;
  }

  getState(): Readonly<ValidatorState> {
    return this.state;
  }

  reset(): void {
    this.state = { previous: null, key: this.initialKey };
  }

  step(chord: Chord): Verdict {
    const { previous, key } = this.state;
    const ctx: RuleContext = {
      index: chord.index,
      chord,
      identity: chord.identity,
      previous,
      previousIdentity: previous?.identity ?? null,
      key,
    };

    const violatedRules: RuleId[] = [];
    const messages: string[] = [];
    let keyChange: KeyContext | null = null;

    for (const rule of this.rules) {
      if (rule.requiresIdentity && chord.identity === null) {
        violatedRules.push(rule.id);
        messages.push(`${rule.id}: unidentified chord`);
        continue;
      }

      const outcome = rule.evaluate(ctx);
      if (!outcome.passed) {
        violatedRules.push(rule.id);
        messages.push(`${rule.id}: ${outcome.message ?? rule.description}`);
      }
      // First key change wins
      if (outcome.keyChange && keyChange === null) {
        keyChange = outcome.keyChange;
      }
    }

    this.state = { previous: chord, key: keyChange ?? key };

    let message = messages.join("; ");
    if (keyChange) {
      const modulation = `modulates to ${keyChange.name}`;
      message = message ? `${message}; ${modulation}` : modulation;
    }

    return Object.freeze({
      chordIndex: chord.index,
      passed: violatedRules.length === 0,
      violatedRules: Object.freeze(violatedRules),
      message: message || "ok",
      identity: chord.identity,
      key,
      keyChange,
    });
  }

  /**
   * Pipeline stage: one verdict per chord, in order.
   */
  async *validate(chords: AsyncIterable<Chord>): AsyncGenerator<Verdict> {
    for await (const chord of chords) {
      yield this.step(chord);
    }
  }
}
