/**
 * Error types
 *
 * Missing optional fields are defaulted and never raise. Everything below
 * propagates to the batch pipeline, which records it against the document.
 */

/**
 * The parsed document does not have the shape of a topic
 */
export class ContentDecodeError extends Error {
  constructor(
    message: string,
    /** Location in the document, e.g. `diapositivas[0].contenido[2]` */
    public readonly path: string
  ) {
    super(path ? `${message} (at ${path})` : message);
    this.name = 'ContentDecodeError';
  }
}

/**
 * Table rows or chart series whose lengths disagree
 */
export class ShapeMismatchError extends Error {
  constructor(
    message: string,
    public readonly itemType: string
  ) {
    super(message);
    this.name = 'ShapeMismatchError';
  }
}

export class OutputWriteError extends Error {
  constructor(
    message: string,
    public readonly destination: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'OutputWriteError';
  }
}

export class TemplateError extends Error {
  constructor(
    message: string,
    public readonly templatePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'TemplateError';
  }
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
