import type { CommandContext } from "../command/context.js";
import type { ValueType } from "../command/types.js";
import { ArgumentParseError } from "../utils/errors.js";
import type { CommandInput } from "./input.js";
import { ParseResult, type ArgumentParser } from "./parser.js";
import type { ParserRegistry } from "./registry.js";

type Sequence<C, O> = (context: CommandContext<C>, input: CommandInput) => ParseResult<O>;

export type PairMapper<C, U, V, O> = (sender: C, values: readonly [U, V]) => O;
export type TripletMapper<C, U, V, W, O> = (sender: C, values: readonly [U, V, W]) => O;

/**
 * Parses several sub-arguments in order and combines them into one value.
 * `names` and `valueTypes` describe the sub-arguments for help output.
 */
export class CompoundParser<C, O> implements ArgumentParser<C, O> {
  constructor(
    readonly names: readonly string[],
    readonly valueTypes: readonly ValueType<unknown>[],
    private readonly sequence: Sequence<C, O>,
  ) {}

  parse(context: CommandContext<C>, input: CommandInput): ParseResult<O> {
    return this.sequence(context, input);
  }
}

function parseStep<C, T>(
  name: string,
  parser: ArgumentParser<C, T>,
  context: CommandContext<C>,
  input: CommandInput,
): ParseResult<T> {
  const result = parser.parse(context, input);
  if (result.ok) return result;
  return ParseResult.failure(
    new ArgumentParseError(`Invalid value for '${name}': ${result.error.message}`),
  );
}

export function mappedArgumentPair<C, U, V, O>(
  registry: ParserRegistry<C>,
  names: readonly [string, string],
  types: readonly [ValueType<U>, ValueType<V>],
  mapper: PairMapper<C, U, V, O>,
): CompoundParser<C, O> {
  const first = registry.requireParser(types[0]);
  const second = registry.requireParser(types[1]);

  return new CompoundParser<C, O>(names, types, (context, input) => {
    const a = parseStep(names[0], first, context, input);
    if (!a.ok) return ParseResult.failure(a.error);
    const b = parseStep(names[1], second, context, input);
    if (!b.ok) return ParseResult.failure(b.error);
    return ParseResult.success(mapper(context.sender, [a.value, b.value]));
  });
}

export function argumentPair<C, U, V>(
  registry: ParserRegistry<C>,
  names: readonly [string, string],
  types: readonly [ValueType<U>, ValueType<V>],
): CompoundParser<C, readonly [U, V]> {
  return mappedArgumentPair(registry, names, types, (_sender, values) => values);
}

export function mappedArgumentTriplet<C, U, V, W, O>(
  registry: ParserRegistry<C>,
  names: readonly [string, string, string],
  types: readonly [ValueType<U>, ValueType<V>, ValueType<W>],
  mapper: TripletMapper<C, U, V, W, O>,
): CompoundParser<C, O> {
  const first = registry.requireParser(types[0]);
  const second = registry.requireParser(types[1]);
  const third = registry.requireParser(types[2]);

  return new CompoundParser<C, O>(names, types, (context, input) => {
    const a = parseStep(names[0], first, context, input);
    if (!a.ok) return ParseResult.failure(a.error);
    const b = parseStep(names[1], second, context, input);
    if (!b.ok) return ParseResult.failure(b.error);
    const c = parseStep(names[2], third, context, input);
    if (!c.ok) return ParseResult.failure(c.error);
    return ParseResult.success(mapper(context.sender, [a.value, b.value, c.value]));
  });
}

export function argumentTriplet<C, U, V, W>(
  registry: ParserRegistry<C>,
  names: readonly [string, string, string],
  types: readonly [ValueType<U>, ValueType<V>, ValueType<W>],
): CompoundParser<C, readonly [U, V, W]> {
  return mappedArgumentTriplet(registry, names, types, (_sender, values) => values);
}
