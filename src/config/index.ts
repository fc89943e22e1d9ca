export {
  loadConfig,
  resolveConfigPath,
  applyConfigDefaults,
  type ConfigLoadResult,
} from "./loader";
export { CmdwireConfigSchema, type CmdwireConfig } from "./schema";
export type { EngineConfig } from "./schema/engine";
export type { HandlersConfig } from "./schema/handlers";
