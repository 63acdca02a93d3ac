/**
 * Pipeline Interfaces
 *
 * Defines the contracts for pipeline stages:
 * MIDI Event Source → Note Aggregator → Chord Identifier →
 * Progression Validator → Reporter.
 *
 * Stages are connected by lazily pulled async sequences with a single
 * consumer each.
 */

import type { SourceId, StreamId } from "../core/provenance";
import type { RawInput } from "../raw/raw";
import type { PitchClass } from "../primitives/primitives";
import type { ChordIdentity, KeyContext } from "../musical/musical";
import type { Verdict } from "../validation/validation";

// ============================================================================
// Event Sources
// ============================================================================

export interface MidiInputInfo {
  id: string;
  name: string;
  /** Filesystem path of the port */
  path: string;
}

/**
 * Capability interface over MIDI input: a live port or a recorded file.
 *
 * `events()` acquires the underlying handle, and releases it when the
 * sequence completes, fails or the consumer stops pulling.
 */
export interface IMidiEventSource {
  readonly source: SourceId;
  readonly stream: StreamId;

  /**
   * Lazily produce raw input in time order.
   * Aborting the signal closes the handle; the sequence then ends cleanly
   * at the next pull.
   */
  events(signal?: AbortSignal): AsyncIterable<RawInput>;
}

// ============================================================================
// Identification
// ============================================================================

export interface IChordIdentifier {
  /**
   * Resolve a pitch-class set to a chord name, or null when no
   * interpretation is confident enough.
   */
  identify(
    pitchSet: readonly PitchClass[],
    bass: PitchClass,
    key: KeyContext
  ): ChordIdentity | null;
}

// ============================================================================
// Sinks
// ============================================================================

/**
 * Streaming consumer of verdicts.
 */
export interface IVerdictSink {
  report(verdict: Verdict): Promise<void>;
}
