export type Ms = number;        // milliseconds (durations, windows)
export type SessionMs = number; // ms since session start
export type Hz = number;
export type Confidence = number; // 0..1
