import pino from "pino";

export type Logger = pino.Logger;

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface LoggingConfig {
  readonly level?: LogLevel;
  readonly json?: boolean;
  readonly file?: string;
}

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss" },
      };

  const options: pino.LoggerOptions = {
    name: "codesweep",
    level,
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino({ name: "codesweep", level }, pino.destination(config.file));
  }

  return pino(options);
}

/** Logger that drops everything; the default when a caller injects none. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
