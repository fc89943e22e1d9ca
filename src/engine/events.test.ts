import { afterEach, describe, expect, it, vi } from "vitest";
import { logger } from "../logger";
import type { CommandError } from "./errors";
import { CommandEvents } from "./events";

vi.mock("../logger", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const unknownCommand: CommandError = {
  commandName: "Fly",
  kind: "UnknownCommand",
  message: "Command not found: 'Fly'",
};

describe("CommandEvents", () => {
  const events = new CommandEvents();

  afterEach(() => {
    events.removeAllListeners();
    vi.clearAllMocks();
  });

  it("delivers errors to every subscriber", () => {
    const first = vi.fn();
    const second = vi.fn();
    events.onError(first);
    events.onError(second);

    events.emitError(unknownCommand);

    expect(first).toHaveBeenCalledWith(unknownCommand);
    expect(second).toHaveBeenCalledWith(unknownCommand);
  });

  it("keeps delivering when a listener throws", () => {
    const after = vi.fn();
    events.onError(() => {
      throw new Error("listener broke");
    });
    events.onError(after);

    expect(() => events.emitError(unknownCommand)).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ command: "Fly", kind: "UnknownCommand" }),
      "Command error listener failed",
    );
  });

  it("stops delivery after unsubscribe", () => {
    const listener = vi.fn();
    const unsubscribe = events.onExecuted(listener);
    events.emitExecuted({ commandName: "Quack", inputType: "String", durationMs: 1 });
    unsubscribe();
    events.emitExecuted({ commandName: "Quack", inputType: "String", durationMs: 1 });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(events.listenerCount()).toBe(0);
  });
});
