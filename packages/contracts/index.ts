export * from "./core/time";
export * from "./core/provenance";

// Primitive musical types (MidiNote, PitchClass, Velocity, ChordQuality)
export * from "./primitives/primitives";

// Raw input types (protocol-level)
export * from "./raw/raw";

// Musical abstractions (aggregator and identifier output)
export * from "./musical/musical";

export * from "./validation/validation";

export * from "./pipeline/interfaces";

export * from "./config/config";

export * from "./diagnostics/diagnostics";

export * from "./errors/errors";
