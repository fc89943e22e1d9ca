import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CmdwireConfigSchema, type CmdwireConfig } from "./schema";

export interface ConfigLoadResult {
  success: boolean;
  config?: CmdwireConfig;
  errors?: string[];
  path: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

export function resolveConfigPath(customPath?: string): string {
  if (customPath) {
    return path.resolve(expandHomePath(customPath));
  }
  const envPath = process.env.CMDWIRE_CONFIG;
  if (envPath) {
    return path.resolve(expandHomePath(envPath));
  }
  return path.join(os.homedir(), ".cmdwire", "config.jsonc");
}

/**
 * Fill defaults and resolve handler module paths against the config file's
 * directory, so the rest of the program only sees absolute paths.
 */
export function applyConfigDefaults(raw: unknown, configDir: string): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };

  if (!Object.hasOwn(obj, "logging")) {
    obj.logging = { level: "info" };
  } else if (isRecord(obj.logging) && !Object.hasOwn(obj.logging, "level")) {
    obj.logging = { ...obj.logging, level: "info" };
  }

  if (isRecord(obj.handlers) && Array.isArray(obj.handlers.paths)) {
    obj.handlers = {
      ...obj.handlers,
      paths: obj.handlers.paths.map((value) =>
        typeof value === "string" ? path.resolve(configDir, expandHomePath(value)) : value,
      ),
    };
  }

  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const envPath = path.join(path.dirname(resolvedPath), ".env");
  if (!fs.existsSync(envPath)) {
    return;
  }
  const result = loadDotEnv({ path: envPath, override: false });
  if (result.error) {
    throw result.error;
  }
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return {
      success: false,
      errors: [`Config file not found: ${resolvedPath}`],
      path: resolvedPath,
    };
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    const raw = fs.readFileSync(resolvedPath, "utf-8");
    const parseErrors: ParseError[] = [];
    const parsed: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
    if (parseErrors.length > 0) {
      return {
        success: false,
        errors: parseErrors.map(
          (error) => `Invalid JSONC at offset ${error.offset}: ${printParseErrorCode(error.error)}`,
        ),
        path: resolvedPath,
      };
    }

    const config = applyConfigDefaults(parsed, path.dirname(resolvedPath));
    const result = CmdwireConfigSchema.safeParse(config);
    if (!result.success) {
      const errors = result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      );
      return { success: false, errors, path: resolvedPath };
    }

    return { success: true, config: result.data, path: resolvedPath };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}
