import { describe, expect, it } from "vitest";
import { editDistance, findClosestCommand } from "./suggest";

describe("editDistance", () => {
  it("counts insertions, deletions and substitutions", () => {
    expect(editDistance("kitten", "sitting")).toBe(3);
    expect(editDistance("", "abc")).toBe(3);
    expect(editDistance("abc", "")).toBe(3);
    expect(editDistance("same", "same")).toBe(0);
  });

  it("treats a transposition as two edits", () => {
    expect(editDistance("feeddcuk", "feedduck")).toBe(2);
  });
});

describe("findClosestCommand", () => {
  const commands = ["FeedDuck", "SpawnDuck", "SetColor"];

  it("suggests the nearest registered name", () => {
    expect(findClosestCommand("FeedDcuk", commands)).toBe("FeedDuck");
  });

  it("ignores case when comparing", () => {
    expect(findClosestCommand("feedduck", commands)).toBe("FeedDuck");
    expect(findClosestCommand("SETCOLOUR", commands)).toBe("SetColor");
  });

  it("returns undefined when nothing is close enough", () => {
    expect(findClosestCommand("Teleport", commands)).toBeUndefined();
    expect(findClosestCommand("FeedDuck", [])).toBeUndefined();
  });

  it("respects a custom distance limit", () => {
    expect(findClosestCommand("FeedDcuk", commands, 1)).toBeUndefined();
    expect(findClosestCommand("FeedDuk", commands, 1)).toBe("FeedDuck");
  });

  it("keeps the first candidate on ties", () => {
    expect(findClosestCommand("cat", ["bat", "hat"])).toBe("bat");
    expect(findClosestCommand("cat", ["hat", "bat"])).toBe("hat");
  });
});
