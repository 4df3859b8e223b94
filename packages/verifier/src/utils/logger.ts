import {Logger} from "@minime-proofs/utils";
import {getEnvLogger} from "@minime-proofs/logger";
import {LogOptions} from "../interfaces.js";

export function getLogger(opts: LogOptions): Logger {
  if (opts.logger) return opts.logger;

  // Silent unless a level is passed or set through LOG_LEVEL, DEBUG or VERBOSE
  return getEnvLogger({level: opts.logLevel, module: "minime"});
}
