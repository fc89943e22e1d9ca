import { describe, expect, it } from "vitest";
import { CmdwireConfigSchema } from "./index";
import { EngineConfigSchema } from "./engine";

describe("EngineConfigSchema", () => {
  it("accepts a full engine section", () => {
    const parsed = EngineConfigSchema.parse({
      suggestions: { enabled: true, maxDistance: 3 },
      handlerTimeoutMs: 5000,
      absentParameters: "reject",
      logPayloads: false,
    });
    expect(parsed.absentParameters).toBe("reject");
  });

  it("rejects out-of-range values and unknown keys", () => {
    expect(EngineConfigSchema.safeParse({ suggestions: { maxDistance: 17 } }).success).toBe(false);
    expect(EngineConfigSchema.safeParse({ handlerTimeoutMs: 1.5 }).success).toBe(false);
    expect(EngineConfigSchema.safeParse({ absentParameters: "maybe" }).success).toBe(false);
    expect(EngineConfigSchema.safeParse({ retries: 2 }).success).toBe(false);
  });
});

describe("CmdwireConfigSchema", () => {
  it("accepts an empty config", () => {
    expect(CmdwireConfigSchema.parse({})).toEqual({});
  });

  it("rejects unknown log levels and empty handler paths", () => {
    expect(CmdwireConfigSchema.safeParse({ logging: { level: "loud" } }).success).toBe(false);
    expect(CmdwireConfigSchema.safeParse({ handlers: { paths: [""] } }).success).toBe(false);
  });
});
