import type { CommandContext } from "../command/context.js";
import { ArgumentParseError } from "../utils/errors.js";
import type { CommandInput } from "./input.js";
import { ParseResult, type ArgumentParser, type ParserDescriptor } from "./parser.js";

export interface CommandFlag<C, T = boolean> {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly description: string;
  /** Absent for presence flags, which parse to `true`. */
  readonly value?: ParserDescriptor<C, T>;
}

export interface CommandFlagOptions {
  aliases?: string[];
  description?: string;
}

export const CommandFlag = {
  presence: <C>(name: string, options: CommandFlagOptions = {}): CommandFlag<C, boolean> => ({
    name,
    aliases: [...(options.aliases ?? [])],
    description: options.description ?? "",
  }),
  withValue: <C, T>(
    name: string,
    value: ParserDescriptor<C, T>,
    options: CommandFlagOptions = {},
  ): CommandFlag<C, T> => ({
    name,
    aliases: [...(options.aliases ?? [])],
    description: options.description ?? "",
    value,
  }),
};

/**
 * Parses the flags of one command. Long forms are `--name`, short forms are
 * `-alias`. Parsing stops at the first token that is not a flag; parsed values
 * are written to the context and returned keyed by flag name.
 */
export class CommandFlagParser<C> implements ArgumentParser<C, Record<string, unknown>> {
  private readonly registered: readonly CommandFlag<C, unknown>[];

  constructor(flags: readonly CommandFlag<C, unknown>[]) {
    this.registered = [...flags];
  }

  flags(): CommandFlag<C, unknown>[] {
    return [...this.registered];
  }

  findFlag(token: string): CommandFlag<C, unknown> | undefined {
    if (token.startsWith("--")) {
      const name = token.slice(2);
      return this.registered.find((flag) => flag.name === name);
    }
    if (token.startsWith("-")) {
      const alias = token.slice(1);
      return this.registered.find((flag) => flag.aliases.includes(alias));
    }
    return undefined;
  }

  parse(
    context: CommandContext<C>,
    input: CommandInput,
  ): ParseResult<Record<string, unknown>> {
    const parsed: Record<string, unknown> = {};

    for (;;) {
      const token = input.peek();
      if (token === undefined || !token.startsWith("-")) break;

      const flag = this.findFlag(token);
      if (!flag) {
        return ParseResult.failure(new ArgumentParseError(`Unknown flag '${token}'`));
      }
      if (context.hasFlag(flag.name)) {
        return ParseResult.failure(new ArgumentParseError(`Duplicate flag '${flag.name}'`));
      }
      input.read();

      if (!flag.value) {
        context.setFlag(flag.name, true);
        parsed[flag.name] = true;
        continue;
      }

      const result = flag.value.parser.parse(context, input);
      if (!result.ok) {
        return ParseResult.failure(
          new ArgumentParseError(`Invalid value for flag '${flag.name}': ${result.error.message}`),
        );
      }
      context.setFlag(flag.name, result.value);
      parsed[flag.name] = result.value;
    }

    return ParseResult.success(parsed);
  }
}
