export * from "./interface.js";
export {getEmptyLogger} from "./empty.js";
export {getEnvLogger, getEnvLogLevel} from "./env.js";
export {getNodeLogger, WinstonLoggerNode} from "./node.js";
export type {LoggerNode, LoggerNodeOpts, LoggerNodeChildOpts} from "./node.js";
export {WinstonLogger} from "./winston.js";
export {ConsoleDynamicLevel} from "./utils/consoleTransport.js";
