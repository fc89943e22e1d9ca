import { logger } from "../logger";
import { decodeParameters, type AbsentParameters } from "./codec";
import {
  ConversionError,
  HandlerTimeoutError,
  UNKNOWN_COMMAND_NAME,
  describeValue,
  formatErrorMessage,
  unwrapCause,
  type CommandError,
  type CommandErrorKind,
} from "./errors";
import type { CommandEvents } from "./events";
import type { CommandDescriptor, CommandRegistry } from "./registry";
import { DEFAULT_SUGGESTION_MAX_DISTANCE, findClosestCommand } from "./suggest";
import { typeTagName, type AnyTypeTagValue } from "./type-tags";

/** Envelope after parsing: `{ "command": "...", "parameters": ... }`. */
export type Envelope = {
  command: string;
  parameters?: unknown;
};

export type DispatcherOptions = {
  suggestions?: {
    enabled?: boolean;
    maxDistance?: number;
  };
  /** Upper bound for handlers that return a promise. Synchronous handlers cannot be interrupted. */
  handlerTimeoutMs?: number;
  absentParameters?: AbsentParameters;
  /** Debug-log every incoming envelope. */
  logPayloads?: boolean;
};

export type DispatchOutcome =
  | { status: "completed"; commandName: string; durationMs: number }
  | { status: "failed"; error: CommandError };

type StageResult<T> = { ok: true; value: T } | { ok: false; error: CommandError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function commandError(
  commandName: string,
  kind: CommandErrorKind,
  message: string,
  extra: Pick<CommandError, "suggestion" | "cause"> = {},
): { ok: false; error: CommandError } {
  return { ok: false, error: { commandName, kind, message, ...extra } };
}

/**
 * Runs each envelope through parse → resolve → decode → invoke. Calls are
 * queued so one envelope finishes before the next starts. Every failure is
 * classified, logged and pushed to the error channel; nothing is thrown to
 * the caller.
 */
export class Dispatcher {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly registry: CommandRegistry,
    private readonly events: CommandEvents,
    private readonly options: DispatcherOptions = {},
  ) {}

  dispatch(text: string | null | undefined): Promise<DispatchOutcome> {
    return this.enqueue(() => this.processText(text));
  }

  /** Dispatch an envelope that is already a JavaScript value, e.g. from an in-process transport. */
  dispatchEnvelope(envelope: unknown): Promise<DispatchOutcome> {
    return this.enqueue(() => this.processValue(envelope));
  }

  private enqueue(task: () => Promise<DispatchOutcome>): Promise<DispatchOutcome> {
    const run = this.tail.then(task).catch((error: unknown) => this.failUnexpectedly(error));
    this.tail = run.then(() => undefined);
    return run;
  }

  private failUnexpectedly(error: unknown): DispatchOutcome {
    const cause = unwrapCause(error);
    logger.error({ err: cause }, "Dispatcher task failed unexpectedly");
    return this.finish(
      commandError(
        UNKNOWN_COMMAND_NAME,
        "HandlerExecutionFailed",
        `Execution error: ${formatErrorMessage(cause)}`,
        { cause },
      ),
    );
  }

  private async processText(text: string | null | undefined): Promise<DispatchOutcome> {
    if (text === undefined || text === null || text.length === 0) {
      logger.error("Received empty message");
      return this.finish(commandError(UNKNOWN_COMMAND_NAME, "EmptyMessage", "Empty message"));
    }
    if (this.options.logPayloads) {
      logger.debug({ payload: text }, "Processing message");
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      logger.error({ received: text }, "Received message is not valid JSON");
      return this.finish(
        commandError(
          UNKNOWN_COMMAND_NAME,
          "ParseError",
          `Invalid JSON: ${formatErrorMessage(error)}`,
          { cause: error },
        ),
      );
    }
    return this.processParsed(parsed);
  }

  private async processValue(envelope: unknown): Promise<DispatchOutcome> {
    if (envelope === undefined || envelope === null) {
      logger.error("Received empty message");
      return this.finish(commandError(UNKNOWN_COMMAND_NAME, "EmptyMessage", "Empty message"));
    }
    if (this.options.logPayloads) {
      logger.debug({ payload: describeValue(envelope) }, "Processing message");
    }
    return this.processParsed(envelope);
  }

  private async processParsed(parsed: unknown): Promise<DispatchOutcome> {
    const extracted = this.extract(parsed);
    if (!extracted.ok) {
      return this.finish(extracted);
    }
    const envelope = extracted.value;

    const resolved = this.resolve(envelope.command);
    if (!resolved.ok) {
      return this.finish(resolved);
    }
    // Looked up per call, never cached: re-registration applies to the next envelope
    const descriptor = resolved.value;

    const decoded = this.decode(descriptor, envelope.parameters);
    if (!decoded.ok) {
      return this.finish(decoded);
    }

    const invoked = await this.invoke(descriptor, decoded.value);
    if (!invoked.ok) {
      return this.finish(invoked);
    }

    const durationMs = invoked.value;
    logger.info({ command: descriptor.name, durationMs }, "Executed command");
    this.events.emitExecuted({
      commandName: descriptor.name,
      inputType: typeTagName(descriptor.inputType),
      durationMs,
    });
    return { status: "completed", commandName: descriptor.name, durationMs };
  }

  private extract(parsed: unknown): StageResult<Envelope> {
    let command: unknown;
    let parameters: unknown;
    try {
      // In-process envelopes may carry accessors that throw
      command = isRecord(parsed) ? parsed.command : undefined;
      parameters = isRecord(parsed) ? parsed.parameters : undefined;
    } catch (error) {
      logger.error({ err: error }, "Invalid message: envelope fields could not be read");
      return commandError(
        UNKNOWN_COMMAND_NAME,
        "MissingCommand",
        `Missing command field: ${formatErrorMessage(error)}`,
        { cause: error },
      );
    }
    if (typeof command !== "string" || command.length === 0) {
      logger.error({ message: describeValue(parsed) }, "Invalid message: missing 'command' field");
      return commandError(UNKNOWN_COMMAND_NAME, "MissingCommand", "Missing command field");
    }
    if (parameters === undefined || parameters === null) {
      logger.warn({ command }, "Command has no parameters");
    }
    return { ok: true, value: { command, parameters } };
  }

  private resolve(commandName: string): StageResult<CommandDescriptor> {
    const descriptor = this.registry.lookup(commandName);
    if (descriptor) {
      return { ok: true, value: descriptor };
    }

    const available = this.registry.names();
    const suggestions = this.options.suggestions ?? {};
    const suggestion =
      suggestions.enabled === false
        ? undefined
        : findClosestCommand(
            commandName,
            available,
            suggestions.maxDistance ?? DEFAULT_SUGGESTION_MAX_DISTANCE,
          );
    logger.error({ command: commandName, available, suggestion }, "Command not found");

    const message = suggestion
      ? `Command not found: '${commandName}'. Did you mean: '${suggestion}'?`
      : `Command not found: '${commandName}'`;
    return commandError(commandName, "UnknownCommand", message, suggestion ? { suggestion } : {});
  }

  private decode(descriptor: CommandDescriptor, parameters: unknown): StageResult<AnyTypeTagValue> {
    const typeName = typeTagName(descriptor.inputType);
    let conversionError: ConversionError;
    try {
      const decoded = decodeParameters(parameters, descriptor.inputType, {
        absentParameters: this.options.absentParameters,
      });
      if (decoded.ok) {
        return decoded;
      }
      conversionError = decoded.error;
    } catch (error) {
      // Refinements and transforms in record schemas are caller code and may throw
      conversionError = new ConversionError(typeName, parameters, formatErrorMessage(error));
    }

    logger.error(
      { command: descriptor.name, type: typeName, err: conversionError },
      "Parameter conversion failed",
    );
    return commandError(
      descriptor.name,
      "ConversionFailed",
      `Conversion error: ${conversionError.message}`,
      { cause: conversionError },
    );
  }

  private async invoke(
    descriptor: CommandDescriptor,
    value: AnyTypeTagValue,
  ): Promise<StageResult<number>> {
    const startedAt = Date.now();
    try {
      const returned = descriptor.invoke(value);
      if (returned instanceof Promise) {
        await this.settleWithTimeout(returned, descriptor.name);
      }
      return { ok: true, value: Date.now() - startedAt };
    } catch (error) {
      const cause = unwrapCause(error);
      const causeMessage = formatErrorMessage(cause);
      logger.error(
        { command: descriptor.name, err: cause },
        `Command '${descriptor.name}' execution failed: ${causeMessage}`,
      );
      return commandError(
        descriptor.name,
        "HandlerExecutionFailed",
        `Execution error: ${causeMessage}`,
        { cause },
      );
    }
  }

  private async settleWithTimeout(pending: Promise<void>, commandName: string): Promise<void> {
    const timeoutMs = this.options.handlerTimeoutMs;
    if (timeoutMs === undefined || timeoutMs <= 0) {
      await pending;
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new HandlerTimeoutError(commandName, timeoutMs)), timeoutMs);
    });
    try {
      await Promise.race([pending, timeout]);
    } catch (error) {
      if (error instanceof HandlerTimeoutError) {
        // The handler is still running and may reject later
        pending.catch((lateError: unknown) => {
          logger.warn({ command: commandName, err: lateError }, "Handler failed after timing out");
        });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private finish(result: { ok: false; error: CommandError }): DispatchOutcome {
    this.events.emitError(result.error);
    return { status: "failed", error: result.error };
  }
}
