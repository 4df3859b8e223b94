import winston from "winston";
import type {Logger as Winston} from "winston";
import {Logger, LoggerOptions, LoggerChildOpts, LogLevel, LogData, logLevelNum} from "./interface.js";
import {getFormat} from "./utils/format.js";

// Log level is configured BY TRANSPORT only. Transports are shared between child loggers, so levels per
// metadata.module are resolved by a custom transport, see `ConsoleDynamicLevel`.

interface DefaultMeta {
  module: string;
}

export class WinstonLogger implements Logger {
  constructor(protected readonly winston: Winston) {}

  error(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.error, message, context, error);
  }

  warn(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.warn, message, context, error);
  }

  info(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.info, message, context, error);
  }

  verbose(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.verbose, message, context, error);
  }

  debug(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.debug, message, context, error);
  }

  trace(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.trace, message, context, error);
  }

  child(options: LoggerChildOpts): WinstonLogger {
    return new WinstonLogger(childWinston(this.winston, options));
  }

  private createLogEntry(level: LogLevel, message: string, context?: LogData, error?: Error): void {
    // Winston only runs format.transform if the entry will actually be written by a transport.
    // Calling `winston.log(level, {message, context, error})` skips the "splat" path so the custom
    // formatter receives the fields untouched.
    this.winston.log(level, {message, context, error});
  }
}

export function createWinstonInstance(options: Partial<LoggerOptions>, transports?: winston.transport[]): Winston {
  const defaultMeta: DefaultMeta = {module: options.module || ""};

  return winston.createLogger({
    // Do not set level at the logger level. Always control by Transport, unless for testLogger
    level: options.level,
    defaultMeta,
    format: getFormat(options),
    transports,
    exitOnError: false,
    levels: logLevelNum,
  });
}

/**
 * Clone a winston instance with `module` extended by the child module. Winston's own `.child` merges
 * metadata with the parent taking precedence, so it can't overwrite `module`.
 */
export function childWinston(parent: Winston, options: LoggerChildOpts): Winston {
  const parentMeta = parent.defaultMeta as DefaultMeta | undefined;
  const defaultMeta: DefaultMeta = {module: [parentMeta?.module, options.module].filter(Boolean).join("/")};

  const child = Object.create(parent) as Winston;
  child.defaultMeta = defaultMeta;
  return child;
}
