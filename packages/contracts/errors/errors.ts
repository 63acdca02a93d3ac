/**
 * Fatal pipeline errors.
 *
 * Recoverable conditions (orphan note-offs) are Diagnostics and never
 * thrown. An unidentified chord is `identity: null`, not an error.
 */

/**
 * Pipeline stage names, used to tell the invoker which stage failed.
 */
export type PipelineStage =
  | "config"
  | "event-source"
  | "note-aggregator"
  | "chord-identifier"
  | "progression-validator"
  | "reporter";

export type ValidatorErrorCode =
  | "DeviceUnavailable"
  | "MalformedStream"
  | "SinkClosed"
  | "InvalidConfig"
  | "Internal";

export class ValidatorError extends Error {
  readonly code: ValidatorErrorCode;
  readonly stage: PipelineStage;

  constructor(
    code: ValidatorErrorCode,
    stage: PipelineStage,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ValidatorError";
    this.code = code;
    this.stage = stage;
  }
}

/**
 * The requested input port or file could not be opened.
 */
export class DeviceUnavailableError extends ValidatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DeviceUnavailable", "event-source", message, options);
    this.name = "DeviceUnavailableError";
  }
}

/**
 * Input bytes could not be parsed as MIDI.
 */
export class MalformedStreamError extends ValidatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MalformedStream", "event-source", message, options);
    this.name = "MalformedStreamError";
  }
}

/**
 * The output stream went away mid-run.
 */
export class SinkClosedError extends ValidatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SinkClosed", "reporter", message, options);
    this.name = "SinkClosedError";
  }
}

export class InvalidConfigError extends ValidatorError {
  /** Offending field, dotted path ("rules.2") */
  readonly field: string;

  constructor(field: string, message: string, options?: { cause?: unknown }) {
    super("InvalidConfig", "config", message, options);
    this.name = "InvalidConfigError";
    this.field = field;
  }
}
