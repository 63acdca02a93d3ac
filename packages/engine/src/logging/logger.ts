/**
 * Diagnostic logging to stderr. Verdicts own stdout.
 *
 * Lines read `[Scope] message`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger for a sub-component, sharing level and output */
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  /** @default "info" */
  level?: LogLevel;

  /** @default "progcheck" */
  scope?: string;

  /** @default the global console */
  console?: Pick<Console, "error">;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const out = options.console ?? console;
  const scope = options.scope ?? "progcheck";

  const emit =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string): void => {
      if (LEVEL_ORDER[level] < threshold) return;
      const tag = level === "warn" || level === "error" ? ` ${level}:` : "";
      out.error(`[${scope}]${tag} ${message}`);
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    child: (child) => createConsoleLogger({ ...options, scope: child }),
  };
}

export const silentLogger: Logger = createConsoleLogger({ level: "silent" });
