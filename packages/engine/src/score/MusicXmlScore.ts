/**
 * Expected notes from a MusicXML score.
 *
 * Reads an uncompressed partwise score (.musicxml / .xml) and collects the
 * pitched notes of each measure, chords and every voice included. The
 * measures of the selected hands are merged by measure number; measures
 * without notes are skipped.
 *
 * Piano scores come either as two parts (right hand first) or as one part
 * with two staves (right hand on staff 1).
 */

import { readFile } from "node:fs/promises";
import { DOMParser } from "@xmldom/xmldom";
import * as Tonal from "tonal";
import type { Hand, MidiNote, ValidatorConfig } from "@progcheck/contracts";
import { InvalidConfigError } from "@progcheck/contracts";

/** Part (or staff) index of each hand */
const HAND_STAVES: Record<Hand, readonly number[]> = {
  right: [0],
  left: [1],
  both: [0, 1],
};

/**
 * Expected notes of each measure, in measure order.
 * @throws InvalidConfigError if the text is not a partwise score, or the
 * hand has no notes in it
 */
export function parseMusicXml(xml: string, hand: Hand = "both"): MidiNote[][] {
  const root = parseDocument(xml);
  const parts = elements(root, "part");
  const measures = new Map<number, MidiNote[]>();

  for (const staffIndex of HAND_STAVES[hand]) {
    if (parts.length === 1) {
      readPart(parts[0], String(staffIndex + 1), measures);
    } else if (staffIndex < parts.length) {
      readPart(parts[staffIndex], null, measures);
    }
  }

  const expected = [...measures.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, notes]) => notes)
    .filter((notes) => notes.length > 0);

  if (expected.length === 0) {
    throw new InvalidConfigError("hand", `The score has no notes for the ${hand} hand`);
  }
  return expected;
}

/**
 * Read a score file.
 */
export async function loadScoreNotes(path: string, hand: Hand = "both"): Promise<MidiNote[][]> {
  let xml: string;
  try {
    xml = await readFile(path, "utf8");
  } catch (err) {
    throw new InvalidConfigError("score", `Cannot read score ${path}`, { cause: err });
  }
  return parseMusicXml(xml, hand);
}

/**
 * Check the run against the score: its measures become the expected notes,
 * and `expected-notes` is enabled if it is not already.
 */
export function applyScore(config: ValidatorConfig, measures: MidiNote[][]): ValidatorConfig {
  return {
    ...config,
    expectedNotes: measures.map((notes) => [...notes]),
    rules: config.rules.includes("expected-notes")
      ? [...config.rules]
      : [...config.rules, "expected-notes"],
  };
}

// ============================================================================
// XML
// ============================================================================

function parseDocument(xml: string): Element {
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (message: string) => errors.push(message),
      fatalError: (message: string) => errors.push(message),
    },
  });

  let root: Element | null;
  try {
    root = parser.parseFromString(xml, "text/xml").documentElement;
  } catch (err) {
    throw new InvalidConfigError("score", "The score is not valid XML", { cause: err });
  }

  if (errors.length > 0 || !root) {
    throw new InvalidConfigError("score", `The score is not valid XML: ${errors[0] ?? "empty document"}`);
  }
  if (root.tagName !== "score-partwise") {
    throw new InvalidConfigError("score", `Expected a partwise MusicXML score, found <${root.tagName}>`);
  }
  return root;
}

/**
 * Add the notes of one part to `measures`. With `staff` set, only notes on
 * that staff count; notes without a staff element are on staff 1.
 */
function readPart(part: Element, staff: string | null, measures: Map<number, MidiNote[]>): void {
  elements(part, "measure").forEach((measure, position) => {
    const number = Number.parseInt(measure.getAttribute("number") ?? "", 10);
    const key = Number.isNaN(number) ? position + 1 : number;
    const notes = measures.get(key) ?? [];

    for (const note of elements(measure, "note")) {
      if (staff !== null && (childText(note, "staff") ?? "1") !== staff) continue;

      const pitch = note.getElementsByTagName("pitch").item(0);
      // Rests and unpitched percussion
      if (!pitch) continue;
      notes.push(pitchToMidi(pitch, key));
    }

    measures.set(key, notes);
  });
}

function pitchToMidi(pitch: Element, measure: number): MidiNote {
  const step = childText(pitch, "step") ?? "";
  const alter = Math.round(Number(childText(pitch, "alter") ?? "0"));
  const octave = childText(pitch, "octave") ?? "";
  const accidentals = alter >= 0 ? "#".repeat(alter) : "b".repeat(-alter);

  const midi = Tonal.Note.midi(`${step}${accidentals}${octave}`);
  if (typeof midi !== "number" || midi < 0 || midi > 127) {
    throw new InvalidConfigError(
      "score",
      `Measure ${measure} has a pitch that is not a MIDI note (${step}${accidentals}${octave})`
    );
  }
  return midi;
}

function elements(parent: Element, tag: string): Element[] {
  return Array.from(parent.getElementsByTagName(tag));
}

function childText(parent: Element, tag: string): string | null {
  return parent.getElementsByTagName(tag).item(0)?.textContent?.trim() ?? null;
}
