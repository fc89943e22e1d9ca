import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { CommandEngine } from "../../engine/engine";
import { setupEngine } from "../setup";

export type PipeSummary = {
  received: number;
  completed: number;
  failed: number;
};

/**
 * Dispatch every non-empty line of `input` as one envelope, in order.
 * Each reported failure is written to `errorOutput` as a JSON line.
 */
export async function pipeEnvelopes(
  engine: CommandEngine,
  input: Readable,
  errorOutput: Writable,
): Promise<PipeSummary> {
  const summary: PipeSummary = { received: 0, completed: 0, failed: 0 };
  const offError = engine.onCommandError((error) => {
    summary.failed += 1;
    errorOutput.write(
      `${JSON.stringify({
        command: error.commandName,
        kind: error.kind,
        message: error.message,
        suggestion: error.suggestion,
      })}\n`,
    );
  });
  const offExecuted = engine.onCommandExecuted(() => {
    summary.completed += 1;
  });

  const lines = readline.createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
  try {
    for await (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed) {
        continue;
      }
      summary.received += 1;
      await engine.dispatch(trimmed);
    }
  } finally {
    offError();
    offExecuted();
    lines.close();
  }
  return summary;
}

export async function runPipe(options: { config?: string }): Promise<void> {
  const setup = await setupEngine(options.config);
  if (!setup.ok) {
    console.error(`Failed to load config: ${setup.configPath}`);
    for (const error of setup.errors) {
      console.error(`  ${error}`);
    }
    process.exitCode = 1;
    return;
  }

  const { engine } = setup;
  try {
    const summary = await pipeEnvelopes(engine, process.stdin, process.stderr);
    console.log(
      `Processed ${summary.received} envelope(s): ${summary.completed} completed, ${summary.failed} failed`,
    );
  } finally {
    engine.dispose();
  }
}
