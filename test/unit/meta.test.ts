import { describe, it, expect } from "vitest";
import { CommandMeta, metaKey } from "../../src/command/meta.js";

describe("CommandMeta", () => {
  const owner = metaKey<string>("owner");
  const priority = metaKey<number>("priority");

  it("starts empty", () => {
    const meta = CommandMeta.empty();
    expect(meta.keys()).toEqual([]);
    expect(meta.get(owner)).toBeUndefined();
    expect(meta.has(CommandMeta.HIDDEN)).toBe(false);
  });

  it("returns a new instance from with", () => {
    const empty = CommandMeta.empty();
    const meta = empty.with(owner, "admin").with(priority, 3);

    expect(meta.get(owner)).toBe("admin");
    expect(meta.get(priority)).toBe(3);
    expect(meta.keys()).toEqual(["owner", "priority"]);
    expect(empty.keys()).toEqual([]);
  });

  it("replaces an existing entry", () => {
    const meta = CommandMeta.empty().with(owner, "admin").with(owner, "mod");
    expect(meta.get(owner)).toBe("mod");
    expect(meta.keys()).toEqual(["owner"]);
  });

  it("falls back when a key is absent", () => {
    const meta = CommandMeta.empty().with(CommandMeta.DESCRIPTION, "Claims land");
    expect(meta.getOrDefault(CommandMeta.HIDDEN, false)).toBe(false);
    expect(meta.getOrDefault(CommandMeta.DESCRIPTION, "")).toBe("Claims land");
  });

  it("exports its entries as a record", () => {
    const meta = CommandMeta.empty().with(CommandMeta.HIDDEN, true).with(priority, 1);
    expect(meta.toRecord()).toEqual({ hidden: true, priority: 1 });
  });
});
