import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type LogFormat = "pretty" | "json";

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

/**
 * The subset of a pino logger the client components call. Anything with this
 * shape works, so embedders can pass their own logger.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];
const LOG_FORMATS: readonly LogFormat[] = ["pretty", "json"];

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value?.trim().toLowerCase());
}

function parseLogFormat(value: string | undefined): LogFormat | undefined {
  return LOG_FORMATS.find((format) => format === value?.trim().toLowerCase());
}

export function resolveLogConfig(
  fileConfig: { level?: LogLevel; format?: LogFormat } | undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedLogConfig {
  const level: LogLevel = parseLogLevel(env.TIDEWIRE_LOG) ?? fileConfig?.level ?? "info";
  const format: LogFormat =
    parseLogFormat(env.TIDEWIRE_LOG_FORMAT) ?? fileConfig?.format ?? "pretty";

  return { level, format };
}

export function createRootLogger(config: ResolvedLogConfig): pino.Logger {
  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
            destination: 2,
          },
        }
      : undefined;

  return pino(
    {
      level: config.level,
      transport,
    },
    transport ? undefined : pino.destination(2)
  );
}

export function createChildLogger(parent: pino.Logger, name: string): pino.Logger {
  return parent.child({ name });
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
