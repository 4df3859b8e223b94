import winston, {format} from "winston";
import {CodedError, isEmptyObject, logCtxToJson, logCtxToString} from "@minime-proofs/utils";
import {LoggerOptions, TimestampFormatCode} from "../interface.js";

type Format = ReturnType<typeof winston.format.combine>;

type WinstonInfoArg = {
  level: string;
  message: string;
  module?: string;
  timestamp?: string;
  context: unknown;
  error: unknown;
};

export function getFormat(opts: LoggerOptions): Format {
  switch (opts.format) {
    case "json":
      return jsonLogFormat(opts);
    case "human":
    default:
      return humanReadableLogFormat(opts);
  }
}

function humanReadableLogFormat(opts: LoggerOptions): Format {
  return format.combine(
    ...(opts.timestampFormat?.format === TimestampFormatCode.Hidden
      ? []
      : [format.timestamp({format: "MMM-DD HH:mm:ss.SSS"})]),
    format.colorize(),
    format.printf(humanReadableTemplateFn)
  );
}

function jsonLogFormat(opts: LoggerOptions): Format {
  return format.combine(
    ...(opts.timestampFormat?.format === TimestampFormatCode.Hidden ? [] : [format.timestamp()]),
    format((_info) => {
      const info = _info as WinstonInfoArg;
      info.context = logCtxToJson(info.context);
      info.error = logCtxToJson(info.error);
      return _info;
    })(),
    format.json()
  );
}

/**
 * Winston template function print a human readable string given a log object
 */
function humanReadableTemplateFn(_info: {[key: string]: unknown; level: string; message: unknown}): string {
  const info = _info as WinstonInfoArg;

  const paddingBetweenInfo = 30;

  const infoString = info.module || "";
  const infoPad = paddingBetweenInfo - infoString.length;

  let str = "";

  if (info.timestamp) str += info.timestamp;

  str += `[${infoString}] ${info.level.padStart(infoPad)}: ${info.message}`;

  if (info.context !== undefined && !isEmptyObject(info.context)) str += " " + logCtxToString(info.context);
  if (info.error !== undefined) {
    str +=
      // CodedError is formatted in the same way as context, it is either appended to
      // the log message (" ") or extends existing context properties (", "). For any other
      // error, the message is printed out and clearly separated from the log message (" - ").
      (info.error instanceof CodedError
        ? info.context === undefined || isEmptyObject(info.context)
          ? " "
          : ", "
        : " - ") + logCtxToString(info.error);
  }

  return str;
}
