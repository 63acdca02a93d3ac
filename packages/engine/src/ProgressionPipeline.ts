/**
 * Progression Pipeline
 *
 * Coordinates the flow:
 *   Event Source → Note Aggregator → Chord Identifier → Progression Validator → Reporter
 *
 * Stages are async generators pulled by the reporter loop, so at most one
 * chord is in flight at a time. Aborting the signal closes the source; the
 * open chord window is flushed and validated before `run` resolves.
 *
 * Errors that are not already ValidatorErrors are reported as Internal,
 * tagged with the stage they escaped from.
 */

import type {
  Diagnostic,
  IMidiEventSource,
  IVerdictSink,
  KeyContext,
  PipelineStage,
  ValidatorConfig,
} from "@progcheck/contracts";
import { ValidatorError } from "@progcheck/contracts";
import { aggregateChords } from "./aggregation/NoteAggregator";
import { ChordIdentifier, identifyChords } from "./identification/ChordIdentifier";
import { silentLogger, type Logger } from "./logging/logger";
import { parseKey } from "./theory/key";
import { ProgressionValidator } from "./validation/ProgressionValidator";
import { createRuleSet } from "./validation/rules";

export interface ProgressionPipelineOptions {
  /** @default silentLogger */
  logger?: Logger;
}

export interface RunSummary {
  chords: number;
  passed: number;
  failed: number;
  diagnostics: Diagnostic[];
  /** Key in force after the last chord */
  finalKey: KeyContext;
}

export class ProgressionPipeline {
  private config: ValidatorConfig;
  private logger: Logger;
  private initialKey: KeyContext;

  /**
   * @throws InvalidConfigError if the configured key cannot be read
   */
  constructor(config: ValidatorConfig, options: ProgressionPipelineOptions = {}) {
    this.config = config;
    this.logger = (options.logger ?? silentLogger).child("Pipeline");
    this.initialKey = parseKey(config.key);
  }

  get key(): KeyContext {
    return this.initialKey;
  }

  async run(source: IMidiEventSource, sink: IVerdictSink, signal?: AbortSignal): Promise<RunSummary> {
    const { config, logger } = this;

    const identifier = new ChordIdentifier({
      confidenceThreshold: config.confidenceThreshold,
      notation: config.notation,
    });
    const validator = new ProgressionValidator(
      createRuleSet(config.rules, {
        expectedChords: config.expectedChords,
        expectedNotes: config.expectedNotes,
        notation: config.notation,
      }),
      this.initialKey
    );

    const summary: RunSummary = {
      chords: 0,
      passed: 0,
      failed: 0,
      diagnostics: [],
      finalKey: this.initialKey,
    };

    logger.info(
      `Reading ${source.stream} in ${this.initialKey.name} (rules: ${config.rules.join(", ")})`
    );

    const inputs = withStage("event-source", source.events(signal));
    const chords = withStage(
      "note-aggregator",
      aggregateChords(inputs, config.aggregation, (diagnostic) => {
        summary.diagnostics.push(diagnostic);
        logger.warn(diagnostic.message);
      })
    );
    const identified = withStage(
      "chord-identifier",
      identifyChords(chords, identifier, () => validator.key)
    );
    const verdicts = withStage("progression-validator", validator.validate(identified));

    for await (const verdict of verdicts) {
      try {
        await sink.report(verdict);
      } catch (err) {
        throw asValidatorError(err, "reporter");
      }

      summary.chords++;
      if (verdict.passed) {
        summary.passed++;
      } else {
        summary.failed++;
      }
      if (verdict.keyChange) {
        logger.info(`Key change to ${verdict.keyChange.name} after chord ${verdict.chordIndex}`);
      }
      logger.debug(`[${verdict.chordIndex}] ${verdict.message}`);
    }

    summary.finalKey = validator.key;
    return summary;
  }
}

async function* withStage<T>(stage: PipelineStage, iterable: AsyncIterable<T>): AsyncGenerator<T> {
  try {
    yield* iterable;
  } catch (err) {
    throw asValidatorError(err, stage);
  }
}

function asValidatorError(err: unknown, stage: PipelineStage): ValidatorError {
  if (err instanceof ValidatorError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ValidatorError("Internal", stage, `${stage} failed: ${message}`, { cause: err });
}
