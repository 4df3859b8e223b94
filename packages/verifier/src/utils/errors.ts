import {CodedError, logCtxToString} from "@minime-proofs/utils";

/**
 * Expected error that shouldn't print a stack trace
 */
export class YargsError extends Error {}

/**
 * Text printed by the CLI when a command fails. Proof rejections print their code and metadata, unexpected errors their stack.
 */
export function renderCliError(msg: string | undefined, err: Error | undefined): string {
  if (err === undefined) {
    return msg || "Unknown error";
  }
  if (err instanceof YargsError) {
    return err.message;
  }
  if (err instanceof CodedError) {
    return `${err.message}\n   ${logCtxToString(err.getMetadata())}`;
  }
  return err.stack ?? err.message;
}
