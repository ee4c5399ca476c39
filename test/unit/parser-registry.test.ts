import { describe, it, expect, vi } from "vitest";
import { ValueType, ValueTypes } from "../../src/command/types.js";
import { ParserRegistry } from "../../src/parsers/registry.js";
import { registerStandardParsers } from "../../src/parsers/standard.js";
import { UsageError } from "../../src/utils/errors.js";
import { stubParser, type TestSender } from "../helpers/fixtures.js";

describe("ParserRegistry", () => {
  it("registers the standard value types", () => {
    const registry = registerStandardParsers(new ParserRegistry<TestSender>());
    expect(registry.types()).toEqual(["string", "integer", "number", "boolean"]);
    expect(registry.has(ValueTypes.boolean)).toBe(true);
    expect(registry.has(ValueTypes.object)).toBe(false);
  });

  it("asks the supplier for a parser on every lookup", () => {
    const uuid = ValueType.of<string>("uuid");
    const supplier = vi.fn(() => stubParser("id"));
    const registry = new ParserRegistry<TestSender>().register(uuid, supplier);

    const first = registry.parser(uuid);
    const second = registry.requireParser(uuid);

    expect(supplier).toHaveBeenCalledTimes(2);
    expect(first).not.toBe(second);
  });

  it("replaces an earlier registration for the same name", () => {
    const uuid = ValueType.of<string>("uuid");
    const replacement = stubParser("other");
    const registry = new ParserRegistry<TestSender>()
      .register(uuid, () => stubParser("id"))
      .register(uuid, () => replacement);

    expect(registry.parser(uuid)).toBe(replacement);
    expect(registry.types()).toEqual(["uuid"]);
  });

  it("returns undefined or throws for unknown types", () => {
    const registry = new ParserRegistry<TestSender>();
    expect(registry.parser(ValueTypes.string)).toBeUndefined();
    expect(() => registry.requireParser(ValueTypes.string)).toThrow(UsageError);
    expect(() => registry.requireParser(ValueTypes.string)).toThrow(
      "No parser registered for value type 'string'",
    );
  });
});
