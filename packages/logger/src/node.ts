import path from "node:path";
import DailyRotateFile from "winston-daily-rotate-file";
import TransportStream from "winston-transport";
import winston from "winston";
import type {Logger as Winston} from "winston";
import {LogFormat, LogLevel, Logger, TimestampFormat} from "./interface.js";
import {ConsoleDynamicLevel} from "./utils/consoleTransport.js";
import {WinstonLogger, childWinston, createWinstonInstance} from "./winston.js";

const DATE_PATTERN = "YYYY-MM-DD";

export type LoggerNodeOpts = {
  level: LogLevel;
  /**
   * Enable file output transport if set
   */
  file?: {
    filepath: string;
    /**
     * Log level for file output transport
     */
    level: LogLevel;
    /**
     * Number of daily files to keep. Rotation is disabled when unset or 0
     */
    dailyRotate?: number;
  };
  /**
   * Module prefix for all logs
   */
  module?: string;
  /**
   * Rendering format for logs, defaults to "human"
   */
  format?: LogFormat;
  /**
   * Set specific log levels by module
   */
  levelModule?: Record<string, LogLevel>;
  timestampFormat?: TimestampFormat;
};

export type LoggerNodeChildOpts = {
  module?: string;
};

export type LoggerNode = Logger & {
  toOpts(): LoggerNodeOpts;
  child(opts: LoggerNodeChildOpts): LoggerNode;
};

/**
 * Setup a CLI logger: console output with per-module levels and an optional file output
 */
export function getNodeLogger(opts: LoggerNodeOpts): LoggerNode {
  return WinstonLoggerNode.fromNewTransports(opts);
}

function getNodeLoggerTransports(opts: LoggerNodeOpts): TransportStream[] {
  const consoleTransport = new ConsoleDynamicLevel({
    // Set defaultLevel, not level for dynamic level setting of ConsoleDynamicLevel
    defaultLevel: opts.level,
    debugStdout: true,
    handleExceptions: true,
  });

  if (opts.levelModule) {
    for (const [module, level] of Object.entries(opts.levelModule)) {
      consoleTransport.setModuleLevel(module, level);
    }
  }

  const transports: TransportStream[] = [consoleTransport];

  if (opts.file) {
    const filename = opts.file.filepath;

    // `--logFileDailyRotate 10` -> keep 10 daily files
    // `--logFileDailyRotate 0` -> disable daily rotate and accumulate in same file
    const enableDailyRotate = opts.file.dailyRotate != null && opts.file.dailyRotate > 0;

    transports.push(
      enableDailyRotate
        ? new DailyRotateFile({
            level: opts.file.level,
            // insert the date pattern in filename before the file extension.
            filename: filename.replace(/\.(?=[^.]*$)|$/, "-%DATE%$&"),
            datePattern: DATE_PATTERN,
            handleExceptions: true,
            maxFiles: opts.file.dailyRotate,
            auditFile: path.join(path.dirname(filename), ".log_rotate_audit.json"),
          })
        : new winston.transports.File({
            level: opts.file.level,
            filename: filename,
            handleExceptions: true,
          })
    );
  }

  return transports;
}

export class WinstonLoggerNode extends WinstonLogger implements LoggerNode {
  constructor(
    protected readonly winston: Winston,
    private readonly opts: LoggerNodeOpts
  ) {
    super(winston);
  }

  static fromNewTransports(opts: LoggerNodeOpts): WinstonLoggerNode {
    return new WinstonLoggerNode(createWinstonInstance(opts, getNodeLoggerTransports(opts)), opts);
  }

  child(opts: LoggerNodeChildOpts): WinstonLoggerNode {
    const childOpts: LoggerNodeOpts = {...this.opts, module: [this.opts.module, opts.module].filter(Boolean).join("/")};
    return new WinstonLoggerNode(childWinston(this.winston, opts), childOpts);
  }

  toOpts(): LoggerNodeOpts {
    return this.opts;
  }
}
