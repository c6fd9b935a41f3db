import pino, { type Logger } from "pino";

export type LoggerOptions = {
  name?: string;
  level: string;
};

/**
 * Builds the process logger at an entry point; services receive it through their constructors.
 */
export const createLogger = (options: LoggerOptions): Logger =>
  pino({
    name: options.name ?? "filing-esg",
    level: options.level,
  });
