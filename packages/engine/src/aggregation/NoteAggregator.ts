/**
 * Note Aggregator
 *
 * Pairs note-on/note-off events into NoteEvents and groups overlapping
 * notes into Chords. A chord window opens on the first note-on and closes
 * when every note in it has been released, or when a new note-on arrives
 * after more than `silenceThresholdMs` of inactivity.
 *
 * While notes are held, onsets within `simultaneityEpsilonMs` of the
 * window's latest onset always join it, so a chord whose notes arrive
 * slightly out of order stays one chord. A fully released window is closed
 * at once; nothing joins it afterwards.
 *
 * The aggregator is a pure step function over an explicit state value.
 * `aggregateChords` drives it over an async sequence.
 */

import type {
  AggregationConfig,
  Chord,
  Diagnostic,
  MidiNote,
  Ms,
  NoteEvent,
  PitchClass,
  RawInput,
} from "@progcheck/contracts";
import { toPitchClass } from "@progcheck/contracts";

export const DEFAULT_AGGREGATION_CONFIG: AggregationConfig = {
  silenceThresholdMs: 50,
  simultaneityEpsilonMs: 10,
  minOverlapMs: 0,
};

/**
 * A note currently held down, and the window it was struck in.
 */
interface HeldNote {
  note: NoteEvent;
  windowIndex: number;
}

interface OpenWindow {
  index: number;
  start: Ms;
  lastEventT: Ms;
  latestOnset: Ms;
  notes: NoteEvent[];
}

export interface AggregatorState {
  readonly held: ReadonlyMap<string, HeldNote>;
  readonly window: Readonly<OpenWindow> | null;
  readonly nextIndex: number;
}

export interface AggregationStep {
  state: AggregatorState;
  chords: Chord[];
  diagnostics: Diagnostic[];
}

/**
 * Working copy of the state for one step.
 */
interface Draft {
  held: Map<string, HeldNote>;
  window: OpenWindow | null;
  nextIndex: number;
  chords: Chord[];
  diagnostics: Diagnostic[];
}

export function createAggregatorState(): AggregatorState {
  return { held: new Map(), window: null, nextIndex: 0 };
}

/**
 * Feed one raw input. Returns the next state and any chords the input closed.
 */
export function stepAggregator(
  state: AggregatorState,
  input: RawInput,
  config: AggregationConfig = DEFAULT_AGGREGATION_CONFIG
): AggregationStep {
  const draft: Draft = {
    held: new Map(state.held),
    window: state.window ? { ...state.window, notes: [...state.window.notes] } : null,
    nextIndex: state.nextIndex,
    chords: [],
    diagnostics: [],
  };
  const t = input.t;

  switch (input.type) {
    case "midi_note_on":
      handleNoteOn(draft, input.note, input.velocity, input.channel, t, config);
      break;
    case "midi_note_off":
      handleNoteOff(draft, input.note, input.channel, t, config);
      break;
    case "midi_cc":
      // Controllers (sustain pedal included) do not affect grouping
      break;
  }

  return {
    state: { held: draft.held, window: draft.window, nextIndex: draft.nextIndex },
    chords: draft.chords,
    diagnostics: draft.diagnostics,
  };
}

/**
 * End of input: close the open window. Notes still held keep a null duration.
 */
export function flushAggregator(
  state: AggregatorState,
  config: AggregationConfig = DEFAULT_AGGREGATION_CONFIG
): AggregationStep {
  const draft: Draft = {
    held: new Map(),
    window: state.window ? { ...state.window, notes: [...state.window.notes] } : null,
    nextIndex: state.nextIndex,
    chords: [],
    diagnostics: [],
  };

  const window = draft.window;
  if (window) {
    closeWindow(draft, window.lastEventT, config);
  }

  return {
    state: { held: draft.held, window: null, nextIndex: draft.nextIndex },
    chords: draft.chords,
    diagnostics: [],
  };
}

/**
 * Aggregate a finite input sequence in one go.
 */
export function aggregateNotes(
  inputs: Iterable<RawInput>,
  config: AggregationConfig = DEFAULT_AGGREGATION_CONFIG
): { chords: Chord[]; diagnostics: Diagnostic[] } {
  let state = createAggregatorState();
  const chords: Chord[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const input of inputs) {
    const step = stepAggregator(state, input, config);
    state = step.state;
    chords.push(...step.chords);
    diagnostics.push(...step.diagnostics);
  }
  chords.push(...flushAggregator(state, config).chords);

  return { chords, diagnostics };
}

/**
 * Pipeline stage: lazily turn raw input into chords. The open window is
 * flushed when the input ends, including after cancellation.
 */
export async function* aggregateChords(
  inputs: AsyncIterable<RawInput>,
  config: AggregationConfig = DEFAULT_AGGREGATION_CONFIG,
  onDiagnostic?: (diagnostic: Diagnostic) => void
): AsyncGenerator<Chord> {
  let state = createAggregatorState();

  for await (const input of inputs) {
    const step = stepAggregator(state, input, config);
    state = step.state;
    for (const diagnostic of step.diagnostics) onDiagnostic?.(diagnostic);
    yield* step.chords;
  }

  yield* flushAggregator(state, config).chords;
}

// ============================================================================
// Step handlers
// ============================================================================

function handleNoteOn(
  draft: Draft,
  pitch: MidiNote,
  velocity: number,
  channel: number,
  t: Ms,
  config: AggregationConfig
): void {
  const key = noteKey(pitch, channel);

  // Re-struck while held: the earlier note ends here
  const existing = draft.held.get(key);
  if (existing) {
    draft.held.delete(key);
    releaseNote(draft, existing, t, config);
  }

  let window = draft.window;
  if (
    window &&
    t - window.lastEventT > config.silenceThresholdMs &&
    t - window.latestOnset > config.simultaneityEpsilonMs
  ) {
    closeWindow(draft, t, config);
    window = null;
  }

  if (!window) {
    window = {
      index: draft.nextIndex++,
      start: t,
      lastEventT: t,
      latestOnset: t,
      notes: [],
    };
    draft.window = window;
  }

  const note: NoteEvent = { pitch, velocity, onset: t, duration: null, channel };
  window.notes.push(note);
  window.start = Math.min(window.start, t);
  window.lastEventT = Math.max(window.lastEventT, t);
  window.latestOnset = Math.max(window.latestOnset, t);
  draft.held.set(key, { note, windowIndex: window.index });
}

function handleNoteOff(
  draft: Draft,
  pitch: MidiNote,
  channel: number,
  t: Ms,
  config: AggregationConfig
): void {
  const key = noteKey(pitch, channel);
  const held = draft.held.get(key);

  if (!held) {
    draft.diagnostics.push({
      id: `orphan-note-off:${channel}:${pitch}:${t}`,
      code: "OrphanNoteOff",
      category: "input",
      severity: "warning",
      message: `Note-off for ${pitch} on channel ${channel + 1} with no held note; dropped`,
      timestamp: t,
      source: "note-aggregator",
      persistence: "transient",
    });
    return;
  }

  draft.held.delete(key);
  releaseNote(draft, held, t, config);
}

function releaseNote(draft: Draft, held: HeldNote, t: Ms, config: AggregationConfig): void {
  const window = draft.window;
  // Notes of chords already emitted end silently
  if (!window || window.index !== held.windowIndex) return;

  const i = window.notes.indexOf(held.note);
  if (i < 0) return;

  window.notes[i] = { ...held.note, duration: Math.max(0, t - held.note.onset) };
  window.lastEventT = Math.max(window.lastEventT, t);

  if (window.notes.some((note) => note.duration === null)) return;

  closeWindow(draft, t, config);
}

function closeWindow(draft: Draft, end: Ms, config: AggregationConfig): void {
  const window = draft.window;
  if (!window) return;

  draft.chords.push(buildChord(window, end, config));
  draft.window = null;
}

// ============================================================================
// Chord construction
// ============================================================================

function buildChord(window: OpenWindow, end: Ms, config: AggregationConfig): Chord {
  const notes = window.notes;
  const contributing = contributingNotes(notes, end, config.minOverlapMs);

  const pitches = [...new Set(contributing.map((note) => note.pitch))].sort((a, b) => a - b);
  const pitchSet: PitchClass[] = [...new Set(pitches.map(toPitchClass))].sort((a, b) => a - b);

  return {
    index: window.index,
    pitchSet,
    pitches,
    bass: toPitchClass(pitches[0]),
    window: { start: window.start, end },
    notes: [...notes],
    identity: null,
  };
}

/**
 * Notes that sound together with another note of the window for at least
 * `minOverlapMs`. With the filter off, or when it would drop every note,
 * all notes contribute.
 */
function contributingNotes(notes: readonly NoteEvent[], end: Ms, minOverlapMs: Ms): readonly NoteEvent[] {
  if (minOverlapMs <= 0 || notes.length < 2) return notes;

  const noteEnd = (note: NoteEvent): Ms => (note.duration === null ? end : note.onset + note.duration);

  const kept = notes.filter((note) =>
    notes.some(
      (other) =>
        other !== note &&
        Math.min(noteEnd(note), noteEnd(other)) - Math.max(note.onset, other.onset) >= minOverlapMs
    )
  );

  return kept.length > 0 ? kept : notes;
}

function noteKey(pitch: MidiNote, channel: number): string {
  return `${pitch}:${channel}`;
}
