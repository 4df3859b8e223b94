import {Logger, LogLevel, isLogLevel} from "@minime-proofs/utils";
import {getEmptyLogger} from "./empty.js";
import {LogFormat, TimestampFormat, TimestampFormatCode} from "./interface.js";
import {LoggerNodeOpts, getNodeLogger} from "./node.js";

export function getEnvLogLevel(): LogLevel | null {
  const {LOG_LEVEL, DEBUG, VERBOSE} = process.env;
  if (LOG_LEVEL && isLogLevel(LOG_LEVEL)) return LOG_LEVEL;
  if (DEBUG) return LogLevel.debug;
  if (VERBOSE) return LogLevel.verbose;
  return null;
}

function getEnvLogFormat(): LogFormat | undefined {
  const format = process.env.LOG_FORMAT;
  return format === "human" || format === "json" ? format : undefined;
}

function getEnvTimestampFormat(): TimestampFormat | undefined {
  switch (process.env.LOG_TIMESTAMP_FORMAT) {
    case TimestampFormatCode.Hidden:
      return {format: TimestampFormatCode.Hidden};
    case TimestampFormatCode.DateRegular:
      return {format: TimestampFormatCode.DateRegular};
    default:
      return undefined;
  }
}

/**
 * Console logger configured from `LOG_LEVEL`, `DEBUG`, `VERBOSE`, `LOG_FORMAT` and `LOG_TIMESTAMP_FORMAT`.
 * Returns an empty logger when no level is set.
 */
export function getEnvLogger(opts?: Partial<LoggerNodeOpts>): Logger {
  const level = opts?.level ?? getEnvLogLevel();
  if (level == null) {
    return getEmptyLogger();
  }

  return getNodeLogger({
    ...opts,
    level,
    format: opts?.format ?? getEnvLogFormat(),
    timestampFormat: opts?.timestampFormat ?? getEnvTimestampFormat(),
  });
}
