import { EventEmitter } from "node:events";
import { logger } from "../logger";
import type { CommandError } from "./errors";

export type CommandExecutedEvent = {
  commandName: string;
  inputType: string;
  durationMs: number;
};

export type CommandErrorListener = (error: CommandError) => void;
export type CommandExecutedListener = (event: CommandExecutedEvent) => void;

const COMMAND_ERROR_EVENT = "command-error";
const COMMAND_EXECUTED_EVENT = "command-executed";

/**
 * Per-engine observer channel. A listener that throws is logged and does not
 * stop delivery to the others or reach the dispatcher.
 */
export class CommandEvents {
  private readonly emitter = new EventEmitter();

  emitError(error: CommandError): void {
    this.emitter.emit(COMMAND_ERROR_EVENT, error);
  }

  emitExecuted(event: CommandExecutedEvent): void {
    this.emitter.emit(COMMAND_EXECUTED_EVENT, event);
  }

  onError(listener: CommandErrorListener): () => void {
    return this.subscribe(COMMAND_ERROR_EVENT, (error: CommandError) => {
      try {
        listener(error);
      } catch (listenerError) {
        logger.error(
          { err: listenerError, command: error.commandName, kind: error.kind },
          "Command error listener failed",
        );
      }
    });
  }

  onExecuted(listener: CommandExecutedListener): () => void {
    return this.subscribe(COMMAND_EXECUTED_EVENT, (event: CommandExecutedEvent) => {
      try {
        listener(event);
      } catch (listenerError) {
        logger.error(
          { err: listenerError, command: event.commandName },
          "Command executed listener failed",
        );
      }
    });
  }

  listenerCount(): number {
    return (
      this.emitter.listenerCount(COMMAND_ERROR_EVENT) +
      this.emitter.listenerCount(COMMAND_EXECUTED_EVENT)
    );
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }

  private subscribe<E>(eventName: string, handler: (event: E) => void): () => void {
    this.emitter.on(eventName, handler);
    return () => this.emitter.off(eventName, handler);
  }
}
