import { describe, it, expect } from "vitest";
import { CommandContext } from "../../src/command/context.js";
import { ValueTypes } from "../../src/command/types.js";
import { CommandFlag, CommandFlagParser } from "../../src/parsers/flags.js";
import { CommandInput } from "../../src/parsers/input.js";
import { ZodTokenParser, integerSchema } from "../../src/parsers/standard.js";
import { makeSender, type TestSender } from "../helpers/fixtures.js";

describe("CommandFlag", () => {
  it("builds presence and valued flags", () => {
    expect(CommandFlag.presence<TestSender>("force", { aliases: ["f"], description: "Skip checks" })).toEqual({
      name: "force",
      aliases: ["f"],
      description: "Skip checks",
    });
    const descriptor = {
      parser: new ZodTokenParser<TestSender, number>(integerSchema, "integer"),
      valueType: ValueTypes.integer,
    };
    expect(CommandFlag.withValue("radius", descriptor).value).toBe(descriptor);
  });
});

describe("CommandFlagParser", () => {
  const force = CommandFlag.presence<TestSender>("force", { aliases: ["f"] });
  const radius = CommandFlag.withValue<TestSender, number>(
    "radius",
    { parser: new ZodTokenParser<TestSender, number>(integerSchema, "integer"), valueType: ValueTypes.integer },
    { aliases: ["r"] },
  );
  const parser = new CommandFlagParser<TestSender>([force, radius]);

  it("finds flags by long name and short alias", () => {
    expect(parser.findFlag("--force")).toBe(force);
    expect(parser.findFlag("-r")).toBe(radius);
    expect(parser.findFlag("--f")).toBeUndefined();
    expect(parser.findFlag("radius")).toBeUndefined();
  });

  it("parses flags until the first non-flag token", () => {
    const context = new CommandContext(makeSender());
    const input = CommandInput.of("-f", "--radius", "8", "spawn");

    expect(parser.parse(context, input)).toEqual({ ok: true, value: { force: true, radius: 8 } });
    expect(context.flags()).toEqual({ force: true, radius: 8 });
    expect(input.remaining()).toEqual(["spawn"]);
  });

  it("succeeds with nothing when no flags are given", () => {
    const context = new CommandContext(makeSender());
    expect(parser.parse(context, CommandInput.of())).toEqual({ ok: true, value: {} });
    expect(context.flags()).toEqual({});
  });

  it.each([
    [["--verbose"], "Unknown flag '--verbose'"],
    [["-f", "--force"], "Duplicate flag 'force'"],
    [["--radius", "wide"], "Invalid value for flag 'radius': 'wide' is not a valid integer: Expected a whole number"],
    [["-r"], "Invalid value for flag 'radius': Missing integer value"],
  ])("rejects %j", (tokens, message) => {
    const result = parser.parse(new CommandContext(makeSender()), new CommandInput(tokens));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe(message);
  });

  it("copies the flag list", () => {
    parser.flags().pop();
    expect(parser.flags()).toEqual([force, radius]);
  });
});
