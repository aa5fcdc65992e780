import pino, { type Logger, type LoggerOptions } from "pino";

/**
 * Log functions handed in by the hosting runtime. Lines at `error` and
 * above go to `error`, everything else to `log`.
 */
export type LogSink = {
  log: (message: string) => void;
  error: (message: string) => void;
};

type CreateLoggerOptions = {
  name?: string;
  level?: string;
  sink?: LogSink;
};

export type AppLogger = Logger;

const defaultOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  transport:
    process.env.NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true
          }
        }
      : undefined
};

export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const level = options.level ?? defaultOptions.level ?? "info";
  const name = options.name ?? "ballotwire";

  if (options.sink) {
    const sink = options.sink;
    const streams = pino.multistream(
      [
        { level: "trace", stream: { write: (line: string) => sink.log(line.trimEnd()) } },
        { level: "error", stream: { write: (line: string) => sink.error(line.trimEnd()) } }
      ],
      { dedupe: true }
    );
    return pino({ name, level }, streams);
  }

  return pino({
    ...defaultOptions,
    name,
    level
  });
}
