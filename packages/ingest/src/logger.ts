import pino, { type DestinationStream, type Level, type Logger } from "pino";

export type { Logger };

export type LoggerOptions = {
  /** Append-only log file; receives everything from `fileLevel` up. */
  logFile: string;
  fileLevel?: Level;
  consoleLevel?: Level;
  /** Defaults to stdout. Tests pass their own sink. */
  console?: DestinationStream;
};

/**
 * Two sinks: a debug-level file and an info-level console.
 * Build once at process start and pass it down; nothing reads a global logger.
 */
export function createLogger(opts: LoggerOptions): Logger {
  const fileLevel = opts.fileLevel ?? "debug";
  const consoleLevel = opts.consoleLevel ?? "info";

  const file = pino.destination({ dest: opts.logFile, append: true, sync: true, mkdir: true });

  const streams = pino.multistream([
    { level: fileLevel, stream: file },
    { level: consoleLevel, stream: opts.console ?? process.stdout },
  ]);

  return pino(
    {
      level: minLevel(fileLevel, consoleLevel),
      base: { service: "order-loader" },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    streams
  );
}

function minLevel(a: Level, b: Level): Level {
  return pino.levels.values[a] <= pino.levels.values[b] ? a : b;
}

/** Discards everything. For callers that do not care about log output. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
