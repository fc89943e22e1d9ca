import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { applyConfigDefaults, loadConfig, resolveConfigPath } from "./loader";

describe("config loader", () => {
  let dir: string;

  function writeConfig(content: string, fileName = "config.jsonc"): string {
    const filePath = path.join(dir, fileName);
    fs.writeFileSync(filePath, content, "utf-8");
    return filePath;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cmdwire-config-"));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    delete process.env.CMDWIRE_TEST_TOKEN;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("resolveConfigPath", () => {
    it("prefers an explicit path and expands the home directory", () => {
      vi.stubEnv("CMDWIRE_CONFIG", "/elsewhere/config.jsonc");
      expect(resolveConfigPath("~/custom.jsonc")).toBe(path.join(os.homedir(), "custom.jsonc"));
    });

    it("falls back to CMDWIRE_CONFIG", () => {
      vi.stubEnv("CMDWIRE_CONFIG", path.join(dir, "from-env.jsonc"));
      expect(resolveConfigPath()).toBe(path.join(dir, "from-env.jsonc"));
    });

    it("defaults to the home config file", () => {
      vi.stubEnv("CMDWIRE_CONFIG", "");
      expect(resolveConfigPath()).toBe(path.join(os.homedir(), ".cmdwire", "config.jsonc"));
    });
  });

  describe("loadConfig", () => {
    it("parses JSONC with comments and trailing commas", () => {
      const configPath = writeConfig(`{
        // engine tuning
        "engine": {
          "handlerTimeoutMs": 500,
          "suggestions": { "maxDistance": 2 },
        },
        "handlers": { "paths": ["./handlers/ducks.ts"] },
      }`);

      const result = loadConfig(configPath);

      expect(result.success).toBe(true);
      expect(result.path).toBe(configPath);
      expect(result.config).toEqual({
        logging: { level: "info" },
        engine: { handlerTimeoutMs: 500, suggestions: { maxDistance: 2 } },
        handlers: { paths: [path.join(dir, "handlers", "ducks.ts")] },
      });
    });

    it("reports a missing file", () => {
      const configPath = path.join(dir, "absent.jsonc");
      expect(loadConfig(configPath)).toEqual({
        success: false,
        errors: [`Config file not found: ${configPath}`],
        path: configPath,
      });
    });

    it("reports JSONC syntax errors", () => {
      const configPath = writeConfig('{ "engine": }');

      const result = loadConfig(configPath);

      expect(result.success).toBe(false);
      expect(result.errors?.[0]).toMatch(/^Invalid JSONC at offset \d+: \w+$/);
    });

    it("reports schema violations with their path", () => {
      const configPath = writeConfig('{ "engine": { "handlerTimeoutMs": 0 } }');

      expect(loadConfig(configPath).errors).toEqual([
        "engine.handlerTimeoutMs: Number must be greater than or equal to 1",
      ]);
    });

    it("rejects unknown top-level keys", () => {
      const configPath = writeConfig('{ "bogus": true }');

      expect(loadConfig(configPath).errors).toEqual(["Unrecognized key(s) in object: 'bogus'"]);
    });

    it("loads a .env file next to the config without overriding the environment", () => {
      fs.writeFileSync(path.join(dir, ".env"), "CMDWIRE_TEST_TOKEN=test-secret\n", "utf-8");
      const configPath = writeConfig("{}");

      const result = loadConfig(configPath);

      expect(result.success).toBe(true);
      expect(process.env.CMDWIRE_TEST_TOKEN).toBe("test-secret");
    });
  });

  describe("applyConfigDefaults", () => {
    it("fills the log level and resolves handler paths", () => {
      expect(
        applyConfigDefaults({ logging: {}, handlers: { paths: ["a.ts", "/abs/b.ts"] } }, "/cfg"),
      ).toEqual({
        logging: { level: "info" },
        handlers: { paths: [path.resolve("/cfg", "a.ts"), path.resolve("/cfg", "/abs/b.ts")] },
      });
    });

    it("leaves non-object input alone", () => {
      expect(applyConfigDefaults("nope", "/cfg")).toBe("nope");
    });
  });
});
