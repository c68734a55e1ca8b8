/**
 * Thrown when a schema type or constant reaches a mapping with no case for
 * it, e.g. a primitive read method requested for a struct type.
 */
export class InternalError extends Error {
  constructor(
    readonly operation: string,
    readonly kind: string,
  ) {
    super(`${operation}#${kind}`);
    this.name = "InternalError";
  }
}

/**
 * Thrown when a fragment source cannot be compiled, or when the dictionary
 * it is rendered with lacks a key or holds a value of the wrong shape.
 */
export class TemplateError extends Error {
  constructor(
    readonly fragment: string,
    readonly key: string | undefined,
    message: string,
  ) {
    const where = key === undefined ? "" : ` [${key}]`;
    super(`Template "${fragment}"${where}: ${message}`);
    this.name = "TemplateError";
  }
}
