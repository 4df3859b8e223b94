export type CodedErrorMetaData = Record<string, string | number | null>;
export type CodedErrorObject = CodedErrorMetaData & {stack: string};

/**
 * Generic error with attached metadata. The `type` object carries a `code` and any extra context,
 * which loggers render the same way as log context.
 */
export class CodedError<T extends {code: string}> extends Error {
  type: T;
  constructor(type: T, message?: string) {
    super(message || type.code);
    this.type = type;
  }

  getMetadata(): CodedErrorMetaData {
    return this.type;
  }

  /**
   * Get the metadata and the stacktrace for the error.
   */
  toObject(): CodedErrorObject {
    return {
      // Ignore message since it's just type.code
      ...this.getMetadata(),
      stack: this.stack || "",
    };
  }
}

/**
 * Render an unknown thrown value as a message string
 */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
