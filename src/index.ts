export * from "./engine";
export { loadHandlerModules } from "./handlers/loader";
export type {
  HandlerModuleDefinition,
  HandlerModuleDiagnostic,
  HandlerModuleLoadResult,
  HandlerRegisterApi,
  HandlerRegisterFn,
  LoadedHandlerModule,
} from "./handlers/types";
export {
  CmdwireConfigSchema,
  loadConfig,
  resolveConfigPath,
  type CmdwireConfig,
  type ConfigLoadResult,
} from "./config";
export { configureLogger, logger, type LogLevel } from "./logger";
