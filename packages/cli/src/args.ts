/**
 * Command-line arguments.
 */

import { parseArgs } from "node:util";

export const USAGE = `Usage: progcheck [options] [input]

Validate a chord progression played on a MIDI keyboard.

  input                  MIDI port (hw:1,0 or /dev/snd/midiC1D0) or a .mid file.
                         Defaults to the last MIDI port found.

Options:
  -c, --config <file>    JSON config file
  -k, --key <key>        Starting key, e.g. "C major", "F# minor"
  -r, --rules <ids>      Comma-separated rule ids
      --notation <name>  english or french
  -s, --score <file>     MusicXML score; its measures are the expected notes
      --hand <hand>      Score staves to check: left, right or both (default)
      --reference-tone   Sound the tonic before listening
      --details          Print rule messages under each verdict
  -l, --list-ports       List MIDI ports and exit
  -v, --verbose          Debug logging
  -q, --quiet            Errors only
  -h, --help             Show this help
`;

export interface CliOptions {
  input: string | null;
  configPath: string | null;
  /** Flag values in config-file form; validated like a config file */
  overrides: Record<string, unknown>;
  details: boolean;
  listPorts: boolean;
  verbose: boolean;
  quiet: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        config: { type: "string", short: "c" },
        key: { type: "string", short: "k" },
        rules: { type: "string", short: "r" },
        notation: { type: "string" },
        score: { type: "string", short: "s" },
        hand: { type: "string" },
        "reference-tone": { type: "boolean" },
        details: { type: "boolean" },
        "list-ports": { type: "boolean", short: "l" },
        verbose: { type: "boolean", short: "v" },
        quiet: { type: "boolean", short: "q" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values, positionals } = parseFlags(argv);
  if (positionals.length > 1) {
    throw new UsageError(`Expected one input, got ${positionals.length}`);
  }

  const overrides: Record<string, unknown> = {};
  if (values.key !== undefined) overrides.key = values.key;
  if (values.rules !== undefined) {
    overrides.rules = values.rules
      .split(",")
      .map((id) => id.trim())
      .filter((id) => id.length > 0);
  }
  if (values.notation !== undefined) overrides.notation = values.notation;
  if (values.score !== undefined) overrides.score = values.score;
  if (values.hand !== undefined) overrides.hand = values.hand;
  if (values["reference-tone"]) overrides.reference_tone = true;

  return {
    input: positionals[0] ?? null,
    configPath: values.config ?? null,
    overrides,
    details: values.details ?? false,
    listPorts: values["list-ports"] ?? false,
    verbose: values.verbose ?? false,
    quiet: values.quiet ?? false,
    help: values.help ?? false,
  };
}
