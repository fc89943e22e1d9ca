import type { Logger } from "pino";
import type { CommandEngine } from "../engine/engine";
import type { TypeTags } from "../engine/type-tags";

/** What a handler module receives when it is loaded. */
export type HandlerRegisterApi = {
  register: CommandEngine["register"];
  tags: typeof TypeTags;
  logger: Logger;
};

export type HandlerRegisterFn = (api: HandlerRegisterApi) => void | Promise<void>;

export type HandlerModuleDefinition = {
  id?: string;
  register: HandlerRegisterFn;
};

export type HandlerModuleDiagnostic = {
  source: string;
  level: "warn" | "error";
  message: string;
};

export type LoadedHandlerModule = {
  id: string;
  source: string;
  commands: string[];
};

export type HandlerModuleLoadResult = {
  modules: LoadedHandlerModule[];
  diagnostics: HandlerModuleDiagnostic[];
};
