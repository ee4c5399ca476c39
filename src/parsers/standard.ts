import { z } from "zod";
import type { CommandContext } from "../command/context.js";
import { ValueTypes } from "../command/types.js";
import { ArgumentParseError } from "../utils/errors.js";
import type { CommandInput } from "./input.js";
import { ParseResult, type ArgumentParser } from "./parser.js";
import type { ParserRegistry } from "./registry.js";

const BOOLEAN_WORDS = ["true", "yes", "on", "false", "no", "off"] as const;
const TRUE_WORDS = new Set<string>(["true", "yes", "on"]);

export const stringSchema = z.string().min(1);
// Plain decimal notation only.
export const integerSchema = z
  .string()
  .regex(/^[+-]?\d+$/, "Expected a whole number")
  .pipe(z.coerce.number().int());
export const numberSchema = z
  .string()
  .regex(/^[+-]?(\d+(\.\d*)?|\.\d+)$/, "Expected a decimal number")
  .pipe(z.coerce.number().finite());
export const booleanSchema = z
  .string()
  .toLowerCase()
  .pipe(z.enum(BOOLEAN_WORDS))
  .transform((word) => TRUE_WORDS.has(word));

/** Parses a single token by validating it against a zod schema. */
export class ZodTokenParser<C, T> implements ArgumentParser<C, T> {
  constructor(
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly typeName: string,
  ) {}

  parse(_context: CommandContext<C>, input: CommandInput): ParseResult<T> {
    const token = input.peek();
    if (token === undefined) {
      return ParseResult.failure(new ArgumentParseError(`Missing ${this.typeName} value`));
    }

    const result = this.schema.safeParse(token);
    if (!result.success) {
      const reason = result.error.issues[0]?.message ?? "invalid value";
      return ParseResult.failure(
        new ArgumentParseError(`'${token}' is not a valid ${this.typeName}: ${reason}`),
      );
    }

    input.read();
    return ParseResult.success(result.data);
  }
}

export function registerStandardParsers<C>(registry: ParserRegistry<C>): ParserRegistry<C> {
  return registry
    .register(ValueTypes.string, () => new ZodTokenParser<C, string>(stringSchema, "string"))
    .register(ValueTypes.integer, () => new ZodTokenParser<C, number>(integerSchema, "integer"))
    .register(ValueTypes.number, () => new ZodTokenParser<C, number>(numberSchema, "number"))
    .register(ValueTypes.boolean, () => new ZodTokenParser<C, boolean>(booleanSchema, "boolean"));
}
