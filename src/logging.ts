import pino, { type Logger, type LevelWithSilent } from "pino";
import pinoPretty from "pino-pretty";

export enum LogChannel {
  auth = "auth",
  fetch = "fetch",
  loader = "loader",
  orchestrator = "orchestrator",
  azure = "azure",
}

export interface ChannelLogger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

export interface LoggerBundle {
  base: Logger;
  channel(ch: LogChannel): ChannelLogger;
}

export interface LoggerOptions {
  level?: LevelWithSilent;
  pretty?: boolean;
}

/**
 * Build the process logger. Everything goes to stderr: stdout belongs to the
 * commands' own output and the interactive browser.
 */
export function createLogger(options: LoggerOptions = {}): LoggerBundle {
  const level = options.level ?? "warn";

  const base = options.pretty
    ? pino(
        { level, base: null },
        pinoPretty({
          destination: 2,
          translateTime: "SYS:standard",
          colorize: true,
          ignore: "pid,hostname,channel",
        })
      )
    : pino({ level, base: null }, pino.destination(2));

  const channel = (ch: LogChannel): ChannelLogger => {
    const fields = (extra?: Record<string, unknown>) =>
      extra ? { channel: ch, ...extra } : { channel: ch };
    return {
      debug: (msg, extra) => base.debug(fields(extra), `[${ch}] ${msg}`),
      info: (msg, extra) => base.info(fields(extra), `[${ch}] ${msg}`),
      warn: (msg, extra) => base.warn(fields(extra), `[${ch}] ${msg}`),
      error: (msg, extra) => base.error(fields(extra), `[${ch}] ${msg}`),
    };
  };

  return { base, channel };
}

/** Logger that discards everything; handy for tests and one-shot helpers. */
export function silentLogger(): LoggerBundle {
  return createLogger({ level: "silent" });
}
