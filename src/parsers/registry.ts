import type { ValueType } from "../command/types.js";
import { UsageError } from "../utils/errors.js";
import type { ArgumentParser } from "./parser.js";

export type ParserSupplier<C, T> = () => ArgumentParser<C, T>;

/** Resolves the default parser for a value type. */
export class ParserRegistry<C> {
  private readonly suppliers = new Map<string, ParserSupplier<C, unknown>>();

  register<T>(type: ValueType<T>, supplier: ParserSupplier<C, T>): this {
    this.suppliers.set(type.name, supplier);
    return this;
  }

  has(type: ValueType<unknown>): boolean {
    return this.suppliers.has(type.name);
  }

  // Suppliers are keyed by the same value type they were registered with.
  parser<T>(type: ValueType<T>): ArgumentParser<C, T> | undefined {
    const supplier = this.suppliers.get(type.name) as ParserSupplier<C, T> | undefined;
    return supplier?.();
  }

  requireParser<T>(type: ValueType<T>): ArgumentParser<C, T> {
    const parser = this.parser(type);
    if (!parser) {
      throw new UsageError(`No parser registered for value type '${type.name}'`);
    }
    return parser;
  }

  types(): string[] {
    return [...this.suppliers.keys()];
  }
}
