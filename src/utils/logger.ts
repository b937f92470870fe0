export type Level = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

type Sink = (line: string) => void;

const levels: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// eslint-disable-next-line no-console
const consoleSink: Sink = (line) => console.log(line);

export function createLogger(level: Level, sink: Sink = consoleSink, base: LogMeta = {}): Logger {
  const threshold = levels[level] ?? 20;

  const log = (lvl: Level, msg: string, meta?: LogMeta) => {
    if (levels[lvl] < threshold) return;
    sink(
      JSON.stringify({
        level: lvl,
        msg,
        time: new Date().toISOString(),
        ...base,
        ...meta,
      })
    );
  };

  return {
    debug: (msg: string, meta?: LogMeta) => log("debug", msg, meta),
    info: (msg: string, meta?: LogMeta) => log("info", msg, meta),
    warn: (msg: string, meta?: LogMeta) => log("warn", msg, meta),
    error: (msg: string, meta?: LogMeta) => log("error", msg, meta),
    // Bound fields (request id, connection id) go on every line.
    child: (meta: LogMeta): Logger => createLogger(level, sink, { ...base, ...meta }),
  };
}

export type Logger = {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  child: (meta: LogMeta) => Logger;
};

/** Logger that drops everything; handy for tests and scripts. */
export const silentLogger: Logger = createLogger("error", () => undefined);
