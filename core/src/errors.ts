/**
 * Canonical pipeline error.
 *
 * Every failure that crosses from a stage into framework-owned code becomes a
 * PipelineError exactly once. Foreign errors are carried as the `cause` of the
 * MIDDLEWARE_WRAPPED variant so their message and cause chain stay inspectable.
 */

export type PipelineErrorCode =
  | "MIDDLEWARE_WRAPPED"
  | "BODY_CONSUMED"
  | "INTERNAL_ERROR";

/**
 * Structured error for pipeline failures.
 */
export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly status: number;
  public readonly details?: unknown;

  constructor(args: {
    code: PipelineErrorCode;
    message: string;
    status?: number;
    details?: unknown;
    cause?: unknown;
  }) {
    super(args.message, { cause: args.cause });
    this.name = "PipelineError";
    this.code = args.code;
    this.status = args.status ?? 500;
    this.details = args.details;
  }

  /**
   * Boxes an error raised by a foreign stage. The source error object itself
   * becomes the cause, not a copy of it.
   */
  static middlewareWrapped(source: Error): PipelineError {
    return new PipelineError({
      code: "MIDDLEWARE_WRAPPED",
      message: `Error while executing middleware: ${source.message}`,
      cause: source,
    });
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

/**
 * Walks the cause chain starting at (and excluding) `err`.
 * Stops on a cycle.
 */
export function* errorSources(err: Error): Generator<unknown> {
  const seen = new Set<unknown>([err]);
  let current: unknown = err.cause;
  while (current !== undefined && !seen.has(current)) {
    yield current;
    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }
}
