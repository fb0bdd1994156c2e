export type ToolErrorCode =
  | "CONFIGURATION_ERROR"
  | "VALIDATION_ERROR"
  | "UPSTREAM_ERROR";

/**
 * Base class for every failure surfaced to a tool caller.
 */
export class ToolError extends Error {
  constructor(
    message: string,
    readonly code: ToolErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing credential, raised on first use rather than at startup */
export class ConfigurationError extends ToolError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
  }
}

export class ValidationError extends ToolError {
  constructor(
    message: string,
    readonly parameter: string
  ) {
    super(message, "VALIDATION_ERROR");
  }
}

/**
 * Non-200 response, network failure, timeout or abort.
 * `status` is only set when the provider answered.
 */
export class UpstreamError extends ToolError {
  readonly status?: number;

  constructor(
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, "UPSTREAM_ERROR", { cause: options.cause });
    this.status = options.status;
  }
}

export function isToolError(err: unknown): err is ToolError {
  return err instanceof ToolError;
}
