import { logger } from "../logger";
import { isTypeTag, typeTagName, type TypeTag, type TypeTagValue } from "./type-tags";

export type CommandHandler<T> = (value: T) => void | Promise<void>;

/**
 * Registry entry binding a command name to its declared input type and
 * callback. `invoke` is a method so descriptors of any tag share one map.
 */
export interface CommandDescriptor<T extends TypeTag = TypeTag> {
  readonly name: string;
  readonly inputType: T;
  invoke(value: TypeTagValue<T>): void | Promise<void>;
}

/**
 * Name → descriptor map. Names match byte-for-byte; a later registration
 * under an existing name replaces the earlier one.
 */
export class CommandRegistry {
  private commands = new Map<string, CommandDescriptor>();

  /** Returns false and leaves the registry unchanged when the descriptor is invalid. */
  register(descriptor: CommandDescriptor): boolean {
    const { name } = descriptor;
    if (typeof name !== "string" || name.length === 0) {
      logger.warn("Rejected command registration: command name cannot be empty");
      return false;
    }
    if (typeof descriptor.invoke !== "function") {
      logger.warn({ command: name }, "Rejected command registration: handler must be a function");
      return false;
    }
    if (!isTypeTag(descriptor.inputType)) {
      logger.warn({ command: name }, "Rejected command registration: unknown input type");
      return false;
    }

    if (this.commands.has(name)) {
      logger.warn({ command: name }, "Overwriting registered command");
    }
    this.commands.set(name, descriptor);
    logger.info(
      { command: name, inputType: typeTagName(descriptor.inputType) },
      "Registered command",
    );
    return true;
  }

  unregister(name: string): boolean {
    const removed = this.commands.delete(name);
    if (removed) {
      logger.info({ command: name }, "Unregistered command");
    }
    return removed;
  }

  lookup(name: string): CommandDescriptor | undefined {
    return this.commands.get(name);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  names(): string[] {
    return Array.from(this.commands.keys());
  }

  list(): CommandDescriptor[] {
    return Array.from(this.commands.values());
  }

  count(): number {
    return this.commands.size;
  }

  clear(): void {
    this.commands.clear();
  }
}
