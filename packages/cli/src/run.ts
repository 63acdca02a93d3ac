/**
 * CLI entry logic, separated from process handling so it can be driven
 * with in-memory streams.
 *
 * Verdict lines go to stdout; logs and errors go to stderr.
 * Exit codes: 0 done (including cancellation), 1 fatal error, 2 bad usage.
 */

import { Console } from "node:console";
import type { Writable } from "node:stream";
import { DeviceUnavailableError, ValidatorError } from "@progcheck/contracts";
import {
  createEventSource,
  listMidiDevices,
  playReferenceTone,
  type SpawnFn,
} from "@progcheck/adapters";
import {
  applyScore,
  createConsoleLogger,
  loadConfigFile,
  loadScoreNotes,
  parseConfig,
  resolveConfig,
  tonicFrequency,
  ProgressionPipeline,
  VerdictReporter,
  type ConfigFile,
  type Logger,
} from "@progcheck/engine";
import { parseCliArgs, UsageError, USAGE, type CliOptions } from "./args";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  stdout: Writable;
  stderr: Writable;

  /** Aborted on SIGINT/SIGTERM */
  signal?: AbortSignal;

  /** Directory holding raw-MIDI ports (default /dev/snd) */
  deviceDir?: string;

  spawnProcess?: SpawnFn;
}

export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr.write(`error: ${err.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (options.help) {
    io.stdout.write(USAGE);
    return EXIT_OK;
  }

  const logger = createConsoleLogger({
    level: options.verbose ? "debug" : options.quiet ? "error" : "info",
    console: new Console({ stdout: io.stderr, stderr: io.stderr }),
  });

  try {
    if (options.listPorts) {
      await listPorts(io, logger);
      return EXIT_OK;
    }

    const layers: ConfigFile[] = [];
    if (options.configPath) layers.push(await loadConfigFile(options.configPath));
    layers.push(parseConfig(options.overrides));
    let config = resolveConfig(...layers);
    if (config.score) {
      const measures = await loadScoreNotes(config.score, config.hand);
      logger.info(`${measures.length} measures in ${config.score} (hand: ${config.hand})`);
      config = applyScore(config, measures);
    }

    const pipeline = new ProgressionPipeline(config, { logger });
    const input = options.input ?? (await defaultPort(io.deviceDir, logger));
    const source = await createEventSource(input, { deviceDir: io.deviceDir });

    if (config.referenceTone) {
      const frequency = tonicFrequency(pipeline.key);
      logger.info(`Reference tone ${Math.round(frequency)} Hz (${pipeline.key.name})`);
      playReferenceTone({
        frequency,
        spawnProcess: io.spawnProcess,
        onError: (err) => logger.warn(`Reference tone unavailable: ${err.message}`),
      });
    }

    const reporter = new VerdictReporter(io.stdout, { details: options.details });
    const summary = await pipeline.run(source, reporter, io.signal);

    logger.info(`${summary.chords} chords, ${summary.passed} passed, ${summary.failed} failed`);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ValidatorError) {
      io.stderr.write(`error [${err.stage}] ${err.code}: ${err.message}\n`);
      return EXIT_FAILURE;
    }
    throw err;
  }
}

async function listPorts(io: CliIO, logger: Logger): Promise<void> {
  const ports = await listMidiDevices(io.deviceDir);
  if (ports.length === 0) {
    logger.warn("No MIDI ports found");
    return;
  }
  for (const port of ports) {
    io.stdout.write(`${port.id}\t${port.path}\n`);
  }
}

/**
 * The most recently attached port is listed last.
 */
async function defaultPort(deviceDir: string | undefined, logger: Logger): Promise<string> {
  const port = (await listMidiDevices(deviceDir)).at(-1);
  if (!port) {
    throw new DeviceUnavailableError("No MIDI input ports found");
  }
  logger.info(`Listening on ${port.id} (${port.path})`);
  return port.path;
}
