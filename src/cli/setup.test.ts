import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { configureLogger } from "../logger";
import { setupEngine } from "./setup";

const { mockLogger } = vi.hoisted(() => {
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  mockLogger.child.mockReturnValue(mockLogger);
  return { mockLogger };
});

vi.mock("../logger", () => ({ logger: mockLogger, configureLogger: vi.fn() }));

describe("setupEngine", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cmdwire-setup-"));
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("builds an engine from the config and its handler modules", async () => {
    fs.writeFileSync(
      path.join(dir, "ducks.cjs"),
      `module.exports = (api) => { api.register("FeedDuck", api.tags.int32, () => {}); };`,
      "utf-8",
    );
    const configPath = path.join(dir, "config.jsonc");
    fs.writeFileSync(
      configPath,
      '{ "logging": { "level": "debug" }, "handlers": { "paths": ["./ducks.cjs"] } }',
      "utf-8",
    );

    const setup = await setupEngine(configPath);

    expect(setup.ok).toBe(true);
    if (setup.ok) {
      expect(setup.configPath).toBe(configPath);
      expect(setup.diagnostics).toEqual([]);
      expect(setup.engine.registeredCommandNames()).toEqual(["FeedDuck"]);
      setup.engine.dispose();
    }
    expect(configureLogger).toHaveBeenCalledWith("debug");
  });

  it("logs handler diagnostics", async () => {
    const configPath = path.join(dir, "config.jsonc");
    fs.writeFileSync(configPath, '{ "handlers": { "paths": ["./gone.cjs"] } }', "utf-8");

    const setup = await setupEngine(configPath);

    const missing = path.join(dir, "gone.cjs");
    expect(setup.ok).toBe(true);
    expect(mockLogger.error).toHaveBeenCalledWith(
      { source: missing },
      `Handler module not found: ${missing}`,
    );
    if (setup.ok) {
      setup.engine.dispose();
    }
  });

  it("fails when an explicit config path does not exist", async () => {
    const configPath = path.join(dir, "missing.jsonc");

    expect(await setupEngine(configPath)).toEqual({
      ok: false,
      errors: [`Config file not found: ${configPath}`],
      configPath,
    });
  });

  it("starts with defaults when the default config is absent", async () => {
    vi.stubEnv("HOME", dir);
    vi.stubEnv("CMDWIRE_CONFIG", "");

    const setup = await setupEngine();

    expect(setup.ok).toBe(true);
    if (setup.ok) {
      expect(setup.configPath).toBe(path.join(dir, ".cmdwire", "config.jsonc"));
      expect(setup.engine.registeredCommandCount()).toBe(0);
      setup.engine.dispose();
    }
    expect(configureLogger).toHaveBeenCalledWith(undefined);
  });
});
