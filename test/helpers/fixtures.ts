import pino from "pino";
import { CommandComponent, type ComponentType } from "../../src/command/component.js";
import { senderType } from "../../src/command/sender.js";
import { ValueTypes } from "../../src/command/types.js";
import type { Logger } from "../../src/logging/logger.js";
import { CommandManager } from "../../src/manager/manager.js";
import { ParseResult, type ArgumentParser, type ParserDescriptor } from "../../src/parsers/parser.js";

export interface TestSender {
  readonly name: string;
  readonly permissions: string[];
}

export interface PlayerSender extends TestSender {
  readonly kind: "player";
  readonly world: string;
}

export const playerType = senderType<PlayerSender>(
  "player",
  (sender): sender is PlayerSender =>
    typeof sender === "object" && sender !== null && "kind" in sender && sender.kind === "player",
);

export function makeSender(overrides: Partial<TestSender> = {}): TestSender {
  return { name: "console", permissions: [], ...overrides };
}

export function makePlayer(overrides: Partial<PlayerSender> = {}): PlayerSender {
  return { name: "alex", permissions: [], kind: "player", world: "overworld", ...overrides };
}

/** Consumes one token and always yields `value`. */
export function stubParser<T>(value: T): ArgumentParser<TestSender, T> {
  return {
    parse: (_context, input) => {
      input.read();
      return ParseResult.success(value);
    },
  };
}

export function stubDescriptor(value: string): ParserDescriptor<TestSender, string> {
  return { parser: stubParser(value), valueType: ValueTypes.string };
}

export function makeComponent(
  name: string,
  options: { required?: boolean; type?: ComponentType } = {},
): CommandComponent<TestSender, string> {
  const base = { name, parser: stubParser(name), type: options.type, valueType: ValueTypes.string };
  return options.required === false
    ? new CommandComponent<TestSender, string>({ ...base, required: false })
    : new CommandComponent<TestSender, string>({ ...base, required: true });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeManager(overrideExistingCommands = false): CommandManager<TestSender> {
  return new CommandManager<TestSender>({
    config: {
      logging: { level: "silent" },
      settings: { overrideExistingCommands },
    },
    logger: silentLogger(),
  });
}
