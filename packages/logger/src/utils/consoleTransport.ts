import {Logger, transports} from "winston";
import {LEVEL, LogLevel, WinstonLogInfo} from "../interface.js";

/**
 * Console transport filtering each entry by the level set for its `module`, or `defaultLevel` if none is set.
 * Modules are matched by their full child path, e.g. `minime/verifier`.
 */
export class ConsoleDynamicLevel extends transports.Console {
  private readonly levelByModule = new Map<string, LogLevel>();
  private readonly defaultLevel: LogLevel;

  // TransportStream sets these at runtime but doesn't declare them
  private readonly levels!: Record<LogLevel, number>;
  private parent?: Logger;

  constructor(opts: {defaultLevel: LogLevel} & transports.ConsoleTransportOptions) {
    super(opts);
    this.defaultLevel = opts.defaultLevel;
    // Filtering happens in _write
    this.level = undefined;
  }

  setModuleLevel(module: string, level: LogLevel): void {
    this.levelByModule.set(module, level);
  }

  _write(info: WinstonLogInfo, enc: BufferEncoding, callback: (error?: Error | null | undefined) => void): void {
    const level = this.levelByModule.get(info.module) ?? this.defaultLevel;
    // Lower number is more severe: {error: 0, warn: 1, info: 2, ...}
    if (this.levels[info[LEVEL]] > this.levels[level]) {
      callback(null);
      return;
    }

    // A parent level would filter again in TransportStream
    this.parent = undefined;
    super._write(info, enc, callback);
  }
}
