import { createJiti } from "jiti";
import fs from "node:fs";
import path from "node:path";
import type { CommandEngine } from "../engine/engine";
import type { CommandHandler } from "../engine/registry";
import { TypeTags, type TypeTag, type TypeTagValue } from "../engine/type-tags";
import { logger } from "../logger";
import type {
  HandlerModuleDiagnostic,
  HandlerModuleLoadResult,
  HandlerRegisterApi,
  HandlerRegisterFn,
  LoadedHandlerModule,
} from "./types";

const MODULE_EXTENSIONS = new Set([".ts", ".mts", ".cts", ".js", ".mjs", ".cjs"]);

type ResolvedHandlerModule = {
  id?: string;
  register: HandlerRegisterFn;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isRegisterFn(value: unknown): value is HandlerRegisterFn {
  return typeof value === "function";
}

function resolveModuleExport(moduleExport: unknown): unknown {
  if (isRecord(moduleExport) && "default" in moduleExport) {
    return moduleExport.default;
  }
  return moduleExport;
}

/**
 * A handler module exports either a register function or an object with
 * `register` and an optional `id`.
 */
function resolveHandlerModule(rawDefinition: unknown): ResolvedHandlerModule | undefined {
  if (isRegisterFn(rawDefinition)) {
    return { register: rawDefinition };
  }
  if (isRecord(rawDefinition) && isRegisterFn(rawDefinition.register)) {
    return {
      id: typeof rawDefinition.id === "string" ? rawDefinition.id : undefined,
      register: rawDefinition.register,
    };
  }
  return undefined;
}

function moduleIdFromPath(source: string): string {
  return path.basename(source, path.extname(source));
}

/**
 * Load handler modules and let each register its commands on `engine`.
 * Problems are collected as diagnostics; a broken module never stops the
 * others from loading.
 */
export async function loadHandlerModules(
  engine: CommandEngine,
  paths: readonly string[],
): Promise<HandlerModuleLoadResult> {
  const modules: LoadedHandlerModule[] = [];
  const diagnostics: HandlerModuleDiagnostic[] = [];
  const commandOwners = new Map<string, string>();
  if (paths.length === 0) {
    return { modules, diagnostics };
  }

  const jitiLoader = createJiti(import.meta.url, {
    interopDefault: true,
    extensions: [...MODULE_EXTENSIONS, ".json"],
  });

  for (const source of paths) {
    if (!MODULE_EXTENSIONS.has(path.extname(source))) {
      diagnostics.push({
        source,
        level: "error",
        message: `Unsupported handler module: ${source}`,
      });
      continue;
    }
    if (!fs.existsSync(source)) {
      diagnostics.push({ source, level: "error", message: `Handler module not found: ${source}` });
      continue;
    }

    let resolved: ResolvedHandlerModule | undefined;
    try {
      resolved = resolveHandlerModule(resolveModuleExport(await jitiLoader.import(source)));
    } catch (error) {
      diagnostics.push({
        source,
        level: "error",
        message: `Failed to load handler module at ${source}: ${error instanceof Error ? error.message : String(error)}`,
      });
      continue;
    }
    if (!resolved) {
      diagnostics.push({
        source,
        level: "error",
        message: `Handler module ${source} must export a register function`,
      });
      continue;
    }

    const id = resolved.id?.trim() || moduleIdFromPath(source);
    const commands: string[] = [];
    const register = <T extends TypeTag>(
      name: string,
      inputType: T,
      handler: CommandHandler<TypeTagValue<T>>,
    ): boolean => {
      const previousOwner = commandOwners.get(name);
      if (!engine.register(name, inputType, handler)) {
        diagnostics.push({
          source,
          level: "warn",
          message: `Registration of command "${name}" was rejected`,
        });
        return false;
      }
      if (previousOwner && previousOwner !== id) {
        diagnostics.push({
          source,
          level: "warn",
          message: `Command "${name}" from "${id}" replaces the one from "${previousOwner}"`,
        });
      }
      commandOwners.set(name, id);
      if (!commands.includes(name)) {
        commands.push(name);
      }
      return true;
    };
    const api: HandlerRegisterApi = {
      register,
      tags: TypeTags,
      logger: logger.child({ handlerModule: id }),
    };

    try {
      await resolved.register(api);
    } catch (error) {
      diagnostics.push({
        source,
        level: "error",
        message: `Handler module "${id}" failed during registration: ${error instanceof Error ? error.message : String(error)}`,
      });
      continue;
    }

    if (commands.length === 0) {
      diagnostics.push({
        source,
        level: "warn",
        message: `Handler module "${id}" registered no commands`,
      });
    }
    modules.push({ id, source, commands });
    logger.info({ handlerModule: id, source, commands }, "Loaded handler module");
  }

  return { modules, diagnostics };
}
