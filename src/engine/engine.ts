import type { CmdwireConfig } from "../config";
import { logger } from "../logger";
import { Dispatcher, type DispatcherOptions } from "./dispatcher";
import { CommandEvents, type CommandErrorListener, type CommandExecutedListener } from "./events";
import { CommandRegistry, type CommandHandler } from "./registry";
import { typeTagName, type TypeTag, type TypeTagValue } from "./type-tags";

export type CommandEngineOptions = DispatcherOptions;

export type RegisteredCommandInfo = {
  name: string;
  inputType: string;
};

/**
 * Owns one registry, one observer channel and one dispatch queue. Created
 * and torn down explicitly by the host; there is no shared instance.
 */
export class CommandEngine {
  private readonly registry = new CommandRegistry();
  private readonly events = new CommandEvents();
  private readonly dispatcher: Dispatcher;
  private disposed = false;

  constructor(options: CommandEngineOptions = {}) {
    this.dispatcher = new Dispatcher(this.registry, this.events, options);
  }

  /**
   * Bind `name` to a handler taking the value described by `inputType`.
   * Returns false, with a logged warning, when the registration is invalid.
   */
  register<T extends TypeTag>(
    name: string,
    inputType: T,
    handler: CommandHandler<TypeTagValue<T>>,
  ): boolean {
    if (this.disposed) {
      logger.warn({ command: name }, "Ignoring registration on a disposed command engine");
      return false;
    }
    return this.registry.register({ name, inputType, invoke: handler });
  }

  unregister(name: string): boolean {
    return this.registry.unregister(name);
  }

  /**
   * Process one envelope of JSON text. Resolves once the envelope has been
   * handled; failures go to `onCommandError` listeners and never reject.
   */
  async dispatch(envelopeText: string | null | undefined): Promise<void> {
    if (this.disposed) {
      logger.warn("Ignoring message sent to a disposed command engine");
      return;
    }
    await this.dispatcher.dispatch(envelopeText);
  }

  async dispatchEnvelope(envelope: unknown): Promise<void> {
    if (this.disposed) {
      logger.warn("Ignoring message sent to a disposed command engine");
      return;
    }
    await this.dispatcher.dispatchEnvelope(envelope);
  }

  onCommandError(listener: CommandErrorListener): () => void {
    return this.events.onError(listener);
  }

  onCommandExecuted(listener: CommandExecutedListener): () => void {
    return this.events.onExecuted(listener);
  }

  registeredCommandCount(): number {
    return this.registry.count();
  }

  registeredCommandNames(): string[] {
    return this.registry.names();
  }

  describeCommands(): RegisteredCommandInfo[] {
    return this.registry.list().map((descriptor) => ({
      name: descriptor.name,
      inputType: typeTagName(descriptor.inputType),
    }));
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  /** Drop every registration and listener. Later calls are ignored with a warning. */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.registry.clear();
    this.events.removeAllListeners();
    logger.debug("Command engine disposed");
  }
}

export function createCommandEngine(options: CommandEngineOptions = {}): CommandEngine {
  return new CommandEngine(options);
}

export function resolveEngineOptions(config?: CmdwireConfig): CommandEngineOptions {
  const engine = config?.engine;
  return {
    suggestions: {
      enabled: engine?.suggestions?.enabled,
      maxDistance: engine?.suggestions?.maxDistance,
    },
    handlerTimeoutMs: engine?.handlerTimeoutMs,
    absentParameters: engine?.absentParameters,
    logPayloads: engine?.logPayloads,
  };
}
