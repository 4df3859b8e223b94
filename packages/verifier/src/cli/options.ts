import {CliCommandOptions, LogLevel, LogLevels, isLogLevel} from "@minime-proofs/utils";
import {LogFormat, LoggerNodeOpts, TimestampFormatCode, logFormats} from "@minime-proofs/logger";
import {YargsError} from "../utils/errors.js";

export type GlobalArgs = {
  logLevel: string;
  logFormat?: string;
  logLevelModule?: string[];
  logFile?: string;
  logFileLevel: string;
  logFileDailyRotate: number;
};

export const globalOptions: CliCommandOptions<GlobalArgs> = {
  logLevel: {
    choices: LogLevels,
    description: "Logging verbosity level for emitting logs to terminal",
    default: LogLevel.info,
    type: "string",
  },

  logFormat: {
    description: "Log format used when emitting logs to the terminal and / or file",
    choices: logFormats,
    type: "string",
  },

  logLevelModule: {
    description: "Set log level for a specific module by name: 'minime/verifier=debug' or 'minime=warn,minime/verifier=debug'",
    type: "array",
    string: true,
    coerce: (args: string[]) => args.flatMap((item) => item.split(",")),
  },

  logFile: {
    description: "Path to also output all logs to a file",
    type: "string",
  },

  logFileLevel: {
    choices: LogLevels,
    description: "Logging verbosity level for emitting logs to file",
    default: LogLevel.debug,
    type: "string",
  },

  logFileDailyRotate: {
    description:
      "Daily rotate log files, set to an integer to limit the file count, set to 0 (zero) to disable rotation",
    default: 0,
    type: "number",
  },
};

export function parseGlobalArgs(args: GlobalArgs): LoggerNodeOpts {
  return {
    level: parseLogLevel(args.logLevel),
    levelModule: args.logLevelModule && parseLogLevelModule(args.logLevelModule),
    file:
      args.logFile === undefined
        ? undefined
        : {
            filepath: args.logFile,
            level: parseLogLevel(args.logFileLevel),
            dailyRotate: args.logFileDailyRotate,
          },
    module: "minime",
    format: args.logFormat !== undefined ? parseLogFormat(args.logFormat) : undefined,
    timestampFormat: {format: TimestampFormatCode.DateRegular},
  };
}

function parseLogLevel(level: string): LogLevel {
  if (!isLogLevel(level)) {
    throw new YargsError(`Unknown log level '${level}'`);
  }
  return level;
}

function parseLogLevelModule(logLevelModuleArr: string[]): Record<string, LogLevel> {
  const levelModule: Record<string, LogLevel> = {};
  for (const logLevelModule of logLevelModuleArr) {
    const [module, levelStr] = logLevelModule.split("=");
    if (!module || levelStr === undefined) {
      throw new YargsError(`Invalid log level module '${logLevelModule}', expected 'module=level'`);
    }
    levelModule[module] = parseLogLevel(levelStr);
  }
  return levelModule;
}

function parseLogFormat(format: string): LogFormat {
  const logFormat = logFormats.find((f) => f === format);
  if (logFormat === undefined) {
    throw new YargsError(`Unknown log format '${format}'`);
  }
  return logFormat;
}
