// src/logger/SoapLogger.ts
/**
 * Purpose:
 * - Logger contract used by the client and its collaborators, plus the
 *   default pino-backed implementation.
 *
 * Usage:
 *   logger.debug("SoapRequest.send.begin", { operation, url });
 *
 * Notes:
 * - Event names are dotted "<Component>.<action>.<outcome>" keys; details
 *   always travel in meta, never interpolated into the message.
 * - Authorization and cookie header values are redacted before any sink.
 */

import pino, {
  type LevelWithSilent,
  type Logger,
  stdTimeFunctions,
} from "pino";

export type LogMeta = Record<string, unknown>;

export type ISoapLogger = {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
};

export type SoapLoggerOptions = {
  log: boolean;
  logLevel: LevelWithSilent;
};

const REDACT_PATHS = [
  "headers.authorization",
  "headers.Authorization",
  "headers.cookie",
  "headers.Cookie",
];

export function createPinoLogger(opts: SoapLoggerOptions): Logger {
  return pino({
    name: "soapline",
    level: opts.log ? opts.logLevel : "silent",
    base: {},
    timestamp: stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  });
}

/** Adapt pino's (obj, msg) call shape to ISoapLogger's (msg, meta). */
export function fromPino(logger: Logger): ISoapLogger {
  return {
    debug: (msg, meta) => logger.debug(meta ?? {}, msg),
    info: (msg, meta) => logger.info(meta ?? {}, msg),
    warn: (msg, meta) => logger.warn(meta ?? {}, msg),
    error: (msg, meta) => logger.error(meta ?? {}, msg),
  };
}

export function createSoapLogger(opts: SoapLoggerOptions): ISoapLogger {
  return fromPino(createPinoLogger(opts));
}
