import { describe, it, expect } from "vitest";
import { CommandBuilder } from "../../src/command/builder.js";
import { CommandMeta } from "../../src/command/meta.js";
import { Permission } from "../../src/command/permission.js";
import { ValueTypes } from "../../src/command/types.js";
import { describeCommand, formatSyntax, visibleCommands } from "../../src/help/syntax.js";
import { CommandFlag } from "../../src/parsers/flags.js";
import { makeManager, playerType, stubDescriptor, type TestSender } from "../helpers/fixtures.js";

describe("formatSyntax", () => {
  it("renders literals, required and optional arguments and flags", () => {
    const command = CommandBuilder.create<TestSender>("teleport", { aliases: ["tp"] })
      .required("player", stubDescriptor("alex"))
      .optional("world", stubDescriptor("overworld"))
      .flag(CommandFlag.presence<TestSender>("silent"))
      .flag(CommandFlag.withValue<TestSender, string>("reason", stubDescriptor("none")))
      .build();

    expect(formatSyntax(command)).toBe("teleport <player> [world] [--silent] [--reason <reason>]");
  });

  it("expands compound arguments into their parts", () => {
    const command = makeManager()
      .commandBuilder("region")
      .literal("select")
      .requiredArgumentPair("corner", ["x", "z"], [ValueTypes.integer, ValueTypes.integer])
      .optionalArgumentTriplet("offset", ["dx", "dy", "dz"], [ValueTypes.number, ValueTypes.number, ValueTypes.number])
      .build();

    expect(formatSyntax(command)).toBe("region select <x> <z> [dx] [dy] [dz]");
  });
});

describe("visibleCommands", () => {
  it("drops hidden commands", () => {
    const shown = CommandBuilder.create<TestSender>("help").build();
    const hidden = CommandBuilder.create<TestSender>("debug").hidden().build();

    expect(visibleCommands([shown, hidden])).toEqual([shown]);
  });
});

describe("describeCommand", () => {
  it("summarizes a command for help output", () => {
    const command = makeManager()
      .commandBuilder("heal", { aliases: ["h"], description: "Restore health" })
      .senderType(playerType)
      .permission(Permission.anyOf<TestSender>(Permission.of("heal.self"), Permission.of("heal.all")))
      .optional("amount", ValueTypes.integer)
      .build();

    expect(describeCommand(command)).toEqual({
      syntax: "heal [amount]",
      description: "Restore health",
      permission: "heal.self|heal.all",
      senderType: "player",
      aliases: ["h"],
    });
  });

  it("prefers the description meta over the root description", () => {
    const command = CommandBuilder.create<TestSender>("heal", { description: "root text" })
      .meta(CommandMeta.DESCRIPTION, "meta text")
      .build();

    expect(describeCommand(command).description).toBe("meta text");
  });

  it("falls back to the root description, then to nothing", () => {
    expect(describeCommand(CommandBuilder.create<TestSender>("heal", { description: "root text" }).build()).description).toBe(
      "root text",
    );
    expect(describeCommand(CommandBuilder.create<TestSender>("heal").build())).toEqual({
      syntax: "heal",
      description: "",
      permission: "",
      senderType: undefined,
      aliases: [],
    });
  });
});
