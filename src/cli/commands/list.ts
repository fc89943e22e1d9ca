import { setupEngine } from "../setup";

export async function runListCommands(options: { config?: string; json?: boolean }): Promise<void> {
  const setup = await setupEngine(options.config);
  if (!setup.ok) {
    console.error(`Failed to load config: ${setup.configPath}`);
    for (const error of setup.errors) {
      console.error(`  ${error}`);
    }
    process.exitCode = 1;
    return;
  }

  const commands = setup.engine
    .describeCommands()
    .toSorted((a, b) => a.name.localeCompare(b.name));
  setup.engine.dispose();

  if (options.json) {
    console.log(JSON.stringify(commands, null, 2));
    return;
  }
  if (commands.length === 0) {
    console.log("No commands registered.");
    return;
  }
  const width = Math.max(...commands.map((command) => command.name.length));
  console.log(`Registered commands (${commands.length}):`);
  for (const command of commands) {
    console.log(`  ${command.name.padEnd(width)}  ${command.inputType}`);
  }
}
