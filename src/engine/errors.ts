export const COMMAND_ERROR_KINDS = [
  "EmptyMessage",
  "ParseError",
  "MissingCommand",
  "UnknownCommand",
  "ConversionFailed",
  "HandlerExecutionFailed",
] as const;

export type CommandErrorKind = (typeof COMMAND_ERROR_KINDS)[number];

/** Command name reported for failures that happen before a command is known. */
export const UNKNOWN_COMMAND_NAME = "unknown";

/**
 * Classified dispatch failure delivered to error observers.
 * Never thrown out of the engine.
 */
export type CommandError = {
  commandName: string;
  kind: CommandErrorKind;
  message: string;
  /** Closest registered name, only for `UnknownCommand`. */
  suggestion?: string;
  /** Underlying error for `ConversionFailed` and `HandlerExecutionFailed`. */
  cause?: unknown;
};

const MAX_DESCRIBED_VALUE_LENGTH = 200;

export function describeValue(value: unknown): string {
  if (value === undefined) {
    return "undefined";
  }
  let text: string;
  try {
    text = JSON.stringify(value) ?? String(value);
  } catch {
    // Cyclic graphs and bigints cannot be serialized
    text = Object.prototype.toString.call(value);
  }
  if (text.length > MAX_DESCRIBED_VALUE_LENGTH) {
    return `${text.slice(0, MAX_DESCRIBED_VALUE_LENGTH)}…`;
  }
  return text;
}

/** Parameter payload does not match the declared input shape. */
export class ConversionError extends Error {
  readonly code = "CONVERSION_FAILED";

  constructor(
    readonly typeName: string,
    readonly value: unknown,
    message: string,
  ) {
    super(message);
    this.name = "ConversionError";
  }
}

/** Async handler did not settle within the configured timeout. */
export class HandlerTimeoutError extends Error {
  readonly code = "HANDLER_TIMEOUT";

  constructor(
    readonly commandName: string,
    readonly timeoutMs: number,
  ) {
    super(`Handler for '${commandName}' did not complete within ${timeoutMs}ms`);
    this.name = "HandlerTimeoutError";
  }
}

/**
 * Follow the `cause` chain to the error that started it, so reports name the
 * originating failure instead of a wrapper.
 */
export function unwrapCause(error: unknown): unknown {
  let current = error;
  const seen = new Set<unknown>();
  while (current instanceof Error && current.cause !== undefined && !seen.has(current)) {
    seen.add(current);
    current = current.cause;
  }
  return current;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
