import type { CommandContext } from "../command/context.js";
import { ValueTypes } from "../command/types.js";
import { ArgumentParseError } from "../utils/errors.js";
import type { CommandInput } from "./input.js";
import { ParseResult, type ArgumentParser, type ParserDescriptor } from "./parser.js";

export class LiteralParser<C> implements ArgumentParser<C, string> {
  private readonly main: string;
  private readonly alternatives: readonly string[];

  constructor(name: string, aliases: readonly string[] = []) {
    this.main = name;
    this.alternatives = [...new Set(aliases)].filter((alias) => alias !== name);
  }

  name(): string {
    return this.main;
  }

  aliases(): string[] {
    return [...this.alternatives];
  }

  matches(token: string): boolean {
    const lower = token.toLowerCase();
    return lower === this.main.toLowerCase()
      || this.alternatives.some((alias) => alias.toLowerCase() === lower);
  }

  parse(_context: CommandContext<C>, input: CommandInput): ParseResult<string> {
    const token = input.peek();
    if (token === undefined || !this.matches(token)) {
      return ParseResult.failure(
        new ArgumentParseError(`Expected literal '${this.main}'${token === undefined ? "" : `, got '${token}'`}`),
      );
    }
    input.read();
    return ParseResult.success(this.main);
  }
}

export function literalParser<C>(name: string, ...aliases: string[]): ParserDescriptor<C, string> {
  return { parser: new LiteralParser<C>(name, aliases), valueType: ValueTypes.string };
}
