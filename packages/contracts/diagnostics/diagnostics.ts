import type { SessionMs } from "../core/time";

/**
 * Diagnostic categories for grouping.
 */
export type DiagnosticCategory = "input" | "aggregation" | "identification" | "validation";

/**
 * Diagnostic severity levels.
 */
export type DiagnosticSeverity = "info" | "warning" | "error";

/**
 * Known diagnostic codes.
 */
export type DiagnosticCode = "OrphanNoteOff";

/**
 * A runtime diagnostic emitted when something goes wrong but the pipeline
 * can continue operating. Handled at the stage that detects it.
 */
export interface Diagnostic {
  /** Unique identifier for deduplication */
  id: string;

  code: DiagnosticCode;

  /** Category for grouping */
  category: DiagnosticCategory;

  /** Severity level */
  severity: DiagnosticSeverity;

  /** Human-readable message */
  message: string;

  /** When the condition was observed */
  timestamp: SessionMs;

  /** Which component emitted this */
  source: string;

  /**
   * Persistence mode:
   * - "transient": a one-off event
   * - "sticky": persists until condition clears
   */
  persistence: "transient" | "sticky";
}
