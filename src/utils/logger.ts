import pino, { type DestinationStream, type Logger, type LevelWithSilent } from "pino";

export interface LoggingOptions {
  level: LevelWithSilent;
  pretty: boolean;
}

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

function defaultLevel(): LevelWithSilent {
  const fromEnv = process.env.RELAYBOT_LOG_LEVEL ?? process.env.LOG_LEVEL;
  if (isLevel(fromEnv)) return fromEnv;
  if (process.env.VITEST) return "silent";
  return "info";
}

// Loggers are created at import time, before the config is read; the
// output stream is swapped underneath them once logging is configured.
let output: DestinationStream = process.stdout;
const switchingStream: DestinationStream = {
  write(line: string) {
    output.write(line);
  },
};

const rootLogger: Logger = pino(
  {
    level: defaultLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
    base: undefined,
    serializers: { err: pino.stdSerializers.err },
  },
  switchingStream
);

const children = new Set<Logger>();

/** Module-scoped child logger (`module` field on every line) */
export function createLogger(module: string): Logger {
  const child = rootLogger.child({ module });
  children.add(child);
  return child;
}

export function initLoggerFromConfig(options: LoggingOptions): void {
  rootLogger.level = options.level;
  for (const child of children) {
    child.level = options.level;
  }
  output = options.pretty
    ? pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,module",
          messageFormat: "[{module}] {msg}",
        },
      })
    : process.stdout;
}

/** Debug-level chatter that is off unless the log level is debug */
export function verbose(message: string): void {
  rootLogger.debug({ module: "verbose" }, message);
}
