import { loadConfig, resolveConfigPath, type CmdwireConfig } from "../config";
import { createCommandEngine, resolveEngineOptions, type CommandEngine } from "../engine/engine";
import { loadHandlerModules } from "../handlers/loader";
import type { HandlerModuleDiagnostic } from "../handlers/types";
import { configureLogger, logger } from "../logger";

export type EngineSetupResult =
  | { ok: true; engine: CommandEngine; diagnostics: HandlerModuleDiagnostic[]; configPath: string }
  | { ok: false; errors: string[]; configPath: string };

/**
 * Build an engine from the config file and load its handler modules. A
 * missing default config is not an error: the engine starts with defaults.
 */
export async function setupEngine(configPath?: string): Promise<EngineSetupResult> {
  const resolvedPath = resolveConfigPath(configPath);
  const loaded = loadConfig(configPath);
  let config: CmdwireConfig = {};
  if (loaded.success && loaded.config) {
    config = loaded.config;
  } else if (configPath || process.env.CMDWIRE_CONFIG) {
    return { ok: false, errors: loaded.errors ?? [], configPath: resolvedPath };
  } else {
    logger.debug({ path: resolvedPath }, "No config file found; using defaults");
  }

  configureLogger(config.logging?.level);
  const engine = createCommandEngine(resolveEngineOptions(config));
  const { diagnostics } = await loadHandlerModules(engine, config.handlers?.paths ?? []);
  for (const diagnostic of diagnostics) {
    if (diagnostic.level === "error") {
      logger.error({ source: diagnostic.source }, diagnostic.message);
    } else {
      logger.warn({ source: diagnostic.source }, diagnostic.message);
    }
  }
  return { ok: true, engine, diagnostics, configPath: resolvedPath };
}
