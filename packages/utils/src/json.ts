import {toHex} from "./bytes.js";
import {CodedError} from "./errors.js";
import {mapValues} from "./objects.js";

export type Json = string | number | boolean | null | undefined | Json[] | {[key: string]: Json};

/**
 * Renders any log Context to JSON up to one level of depth.
 *
 * By limiting recursiveness, it renders limited content while ensuring safer logging.
 * Consumers of the logger should ensure to send pre-formated data if they require nesting.
 */
export function logCtxToJson(arg: unknown, recursive = false, fromError = false): Json {
  switch (typeof arg) {
    case "bigint":
    case "symbol":
    case "function":
      return arg.toString();

    case "object": {
      if (arg === null) return "null";

      if (arg instanceof Uint8Array) {
        return toHex(arg);
      }

      // For any type that may include recursiveness break early at the first level
      // - Prevent recursive loops
      // - Ensures Error with deep complex metadata won't leak into the logs and cause bugs
      if (recursive) {
        return "[object]";
      }

      if (arg instanceof Error) {
        let metadata: {[key: string]: Json};
        if (arg instanceof CodedError) {
          if (fromError) {
            return "[CodedErrorCircular]";
          }
          metadata = mapValues(arg.getMetadata(), (item) => logCtxToJson(item, true, true));
        } else {
          metadata = {message: arg.message};
        }
        if (arg.stack) metadata.stack = arg.stack;
        return metadata;
      }

      if (Array.isArray(arg)) {
        return arg.map((item) => logCtxToJson(item, true));
      }

      return Object.fromEntries(Object.entries(arg).map(([key, value]) => [key, logCtxToJson(value, true)] as const));
    }

    case "number":
    case "string":
    case "boolean":
    case "undefined":
      return arg;

    default:
      return String(arg);
  }
}

/**
 * Renders any log Context to a string up to one level of depth.
 *
 * By limiting recursiveness, it renders limited content while ensuring safer logging.
 * Consumers of the logger should ensure to send pre-formated data if they require nesting.
 */
export function logCtxToString(arg: unknown, recursive = false, fromError = false): string {
  switch (typeof arg) {
    case "bigint":
    case "symbol":
    case "function":
      return arg.toString();

    case "object": {
      if (arg === null) return "null";

      if (arg instanceof Uint8Array) {
        return toHex(arg);
      }

      if (recursive) {
        return "[object]";
      }

      if (arg instanceof Error) {
        let metadata: string;
        if (arg instanceof CodedError) {
          if (fromError) {
            return "[CodedErrorCircular]";
          }
          metadata = logCtxToString(arg.getMetadata(), false, true);
        } else {
          metadata = arg.message;
        }
        return `${metadata}\n${arg.stack || ""}`;
      }

      if (Array.isArray(arg)) {
        return arg.map((item) => logCtxToString(item, true)).join(", ");
      }

      return Object.entries(arg)
        .map(([key, value]) => `${key}=${logCtxToString(value, true)}`)
        .join(", ");
    }

    default:
      return String(arg);
  }
}
