import type { CommandContext } from "./context.js";
import type { CommandInput } from "../parsers/input.js";
import type { ParseResult } from "../parsers/parser.js";

declare const valueTypeOf: unique symbol;
declare const keyTypeOf: unique symbol;

/** Run-time tag for the type a parser produces. `T` only exists at compile time. */
export interface ValueType<T> {
  readonly name: string;
  readonly [valueTypeOf]?: T;
}

export const ValueType = {
  of: <T>(name: string): ValueType<T> => ({ name }),
};

export const ValueTypes = {
  string: ValueType.of<string>("string"),
  integer: ValueType.of<number>("integer"),
  number: ValueType.of<number>("number"),
  boolean: ValueType.of<boolean>("boolean"),
  object: ValueType.of<Record<string, unknown>>("object"),
} as const;

export interface ComponentKey<T> {
  readonly name: string;
  readonly [keyTypeOf]?: T;
}

export const ComponentKey = {
  of: <T>(name: string): ComponentKey<T> => ({ name }),
};

export interface Suggestion {
  readonly text: string;
  readonly tooltip?: string;
}

export interface SuggestionProvider<C> {
  suggestions(
    context: CommandContext<C>,
    input: string,
  ): readonly Suggestion[] | Promise<readonly Suggestion[]>;
}

/**
 * Runs before a component's parser. A failed result (or `false`) rejects the
 * input for that component.
 */
export type ComponentPreprocessor<C> = (
  context: CommandContext<C>,
  input: CommandInput,
) => ParseResult<boolean>;
