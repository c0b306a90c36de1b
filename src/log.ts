import fs from "node:fs";
import path from "node:path";

import pino, { multistream } from "pino";

export type Logger = pino.Logger;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export type LoggerOptions = {
  /** Write to stdout as well as the file. Defaults to true. */
  console?: boolean;
  /** Bound onto every line, e.g. `{ component: "orchestrator" }`. */
  bindings?: Record<string, unknown>;
};

function ensureLogDir(filePath: string): void {
  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new Error(`Cannot create log directory: ${dir}`, { cause: err });
  }
}

type StreamSpec = { level: LogLevel; stream: pino.DestinationStream };

/** Multistream entries take no "silent" level; a silent stream is simply left out. */
function activeStreams(specs: StreamSpec[]): pino.StreamEntry[] {
  const entries: pino.StreamEntry[] = [];
  for (const spec of specs) {
    if (spec.level === "silent") continue;
    entries.push({ level: spec.level, stream: spec.stream });
  }
  return entries;
}

function withBindings(logger: Logger, opts?: LoggerOptions): Logger {
  return opts?.bindings ? logger.child(opts.bindings) : logger;
}

export function createLogger(
  level: LogLevel,
  filePath?: string,
  fileLevel?: LogLevel,
  opts?: LoggerOptions,
): Logger {
  const consoleEnabled = opts?.console !== false;
  if (!filePath) {
    return withBindings(pino({ level: consoleEnabled ? level : "silent" }), opts);
  }
  ensureLogDir(filePath);
  const streams = activeStreams([
    ...(consoleEnabled ? [{ level, stream: process.stdout }] : []),
    {
      level: fileLevel ?? level,
      stream: pino.destination({ dest: filePath, sync: false }),
    },
  ]);
  return withBindings(pino({ level: "trace" }, multistream(streams)), opts);
}

/**
 * Like {@link createLogger}, but hands back a `close()` that flushes and ends
 * the file destination so short-lived processes do not lose their tail.
 */
export function createLoggerWithCleanup(
  level: LogLevel,
  filePath?: string,
  fileLevel?: LogLevel,
  opts?: LoggerOptions,
): { logger: Logger; close: () => Promise<void> } {
  if (!filePath) {
    return { logger: createLogger(level, undefined, undefined, opts), close: async () => {} };
  }

  ensureLogDir(filePath);
  const dest = pino.destination({ dest: filePath, sync: true });
  const consoleEnabled = opts?.console !== false;
  const base = consoleEnabled
    ? pino(
        { level: "trace" },
        multistream(
          activeStreams([
            { level, stream: process.stdout },
            { level: fileLevel ?? level, stream: dest },
          ]),
        ),
      )
    : pino({ level: fileLevel ?? level }, dest);

  return {
    logger: withBindings(base, opts),
    close: async () => {
      dest.flushSync();
      await new Promise<void>((resolve) => {
        const timeout = setTimeout(resolve, 2000);
        timeout.unref();
        dest.once("close", () => {
          clearTimeout(timeout);
          resolve();
        });
        dest.end();
      });
    },
  };
}

/** Logger that drops everything; handy default for library callers and tests. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
