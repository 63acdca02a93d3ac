/**
 * Run configuration.
 *
 * The config file is JSON with snake_case keys. Every key is optional;
 * missing keys take the defaults below. Command-line overrides go through
 * the same schema before they are layered on top.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { ValidatorConfig } from "@progcheck/contracts";
import { InvalidConfigError } from "@progcheck/contracts";
import { DEFAULT_AGGREGATION_CONFIG } from "../aggregation/NoteAggregator";
import { parseChordSymbol } from "../theory/chords";
import { parseKey } from "../theory/key";
import { DEFAULT_RULES, RULE_IDS } from "../validation/rules";

export const DEFAULT_CONFIG: ValidatorConfig = {
  key: "C major",
  rules: [...DEFAULT_RULES],
  aggregation: { ...DEFAULT_AGGREGATION_CONFIG },
  confidenceThreshold: 0.6,
  expectedChords: [],
  expectedNotes: [],
  score: null,
  hand: "both",
  notation: "english",
  referenceTone: false,
};

function isKeyName(value: string): boolean {
  try {
    parseKey(value);
    return true;
  } catch {
    return false;
  }
}

export const ConfigFileSchema = z
  .object({
    key: z.string().refine(isKeyName, 'not a key (e.g. "C major", "F# minor")').optional(),
    rules: z
      .array(z.enum(RULE_IDS))
      .refine((ids) => new Set(ids).size === ids.length, "rule ids must be unique")
      .optional(),
    silence_threshold_ms: z.number().nonnegative().optional(),
    simultaneity_epsilon_ms: z.number().nonnegative().optional(),
    min_overlap_ms: z.number().nonnegative().optional(),
    confidence_threshold: z.number().min(0).max(1).optional(),
    expected_chords: z
      .array(z.string().refine((s) => parseChordSymbol(s) !== null, "not a chord symbol"))
      .optional(),
    expected_notes: z.array(z.array(z.number().int().min(0).max(127))).optional(),
    score: z.string().min(1).optional(),
    hand: z.enum(["left", "right", "both"]).optional(),
    notation: z.enum(["english", "french"]).optional(),
    reference_tone: z.boolean().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Validate a parsed config object.
 * @throws InvalidConfigError naming the first offending field
 */
export function parseConfig(raw: unknown): ConfigFile {
  const result = ConfigFileSchema.safeParse(raw);
  if (result.success) return result.data;

  const [issue] = result.error.issues;
  const unknownKeys = issue.code === "unrecognized_keys" ? issue.keys : [];
  const field = unknownKeys.length > 0 ? unknownKeys.join(",") : issue.path.join(".") || "config";
  throw new InvalidConfigError(field, `${field}: ${issue.message}`, { cause: result.error });
}

/**
 * Read and validate a JSON config file.
 */
export async function loadConfigFile(path: string): Promise<ConfigFile> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new InvalidConfigError("config", `Cannot read config file ${path}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InvalidConfigError("config", `${path} is not valid JSON`, { cause: err });
  }

  return parseConfig(raw);
}

/**
 * Layer config files over the defaults; later layers win.
 */
export function resolveConfig(...layers: ConfigFile[]): ValidatorConfig {
  const config: ValidatorConfig = {
    ...DEFAULT_CONFIG,
    rules: [...DEFAULT_CONFIG.rules],
    aggregation: { ...DEFAULT_CONFIG.aggregation },
  };

  for (const layer of layers) {
    if (layer.key !== undefined) config.key = layer.key;
    if (layer.rules !== undefined) config.rules = [...layer.rules];
    if (layer.silence_threshold_ms !== undefined) {
      config.aggregation.silenceThresholdMs = layer.silence_threshold_ms;
    }
    if (layer.simultaneity_epsilon_ms !== undefined) {
      config.aggregation.simultaneityEpsilonMs = layer.simultaneity_epsilon_ms;
    }
    if (layer.min_overlap_ms !== undefined) config.aggregation.minOverlapMs = layer.min_overlap_ms;
    if (layer.confidence_threshold !== undefined) {
      config.confidenceThreshold = layer.confidence_threshold;
    }
    if (layer.expected_chords !== undefined) config.expectedChords = [...layer.expected_chords];
    if (layer.expected_notes !== undefined) {
      config.expectedNotes = layer.expected_notes.map((group) => [...group]);
    }
    if (layer.score !== undefined) config.score = layer.score;
    if (layer.hand !== undefined) config.hand = layer.hand;
    if (layer.notation !== undefined) config.notation = layer.notation;
    if (layer.reference_tone !== undefined) config.referenceTone = layer.reference_tone;
  }

  return config;
}
