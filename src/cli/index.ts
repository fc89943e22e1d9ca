#!/usr/bin/env node
import { Command } from "commander";
import { APP_VERSION } from "../version";

const program = new Command()
  .name("cmdwire")
  .description("Typed dispatch for JSON command envelopes")
  .version(APP_VERSION);

program
  .command("pipe")
  .description("Dispatch newline-delimited JSON envelopes read from stdin")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { runPipe } = await import("./commands/pipe");
    await runPipe(options);
  });

program
  .command("commands")
  .description("List commands registered by the configured handler modules")
  .option("-c, --config <path>", "Config file path")
  .option("--json", "Print as JSON")
  .action(async (options: { config?: string; json?: boolean }) => {
    const { runListCommands } = await import("./commands/list");
    await runListCommands(options);
  });

await program.parseAsync(process.argv);
