import type { CommandContext } from "../command/context.js";
import type { ValueType } from "../command/types.js";
import type { CommandInput } from "./input.js";

export type ParseResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error };

export const ParseResult = {
  success: <T>(value: T): ParseResult<T> => ({ ok: true, value }),
  failure: <T>(error: Error): ParseResult<T> => ({ ok: false, error }),
};

export interface ArgumentParser<C, T> {
  parse(context: CommandContext<C>, input: CommandInput): ParseResult<T>;
}

export interface ParserDescriptor<C, T> {
  readonly parser: ArgumentParser<C, T>;
  readonly valueType: ValueType<T>;
}

export function parserDescriptor<C, T>(
  parser: ArgumentParser<C, T>,
  valueType: ValueType<T>,
): ParserDescriptor<C, T> {
  return { parser, valueType };
}
