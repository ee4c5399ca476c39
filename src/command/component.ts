import type { CommandContext } from "./context.js";
import type { ComponentPreprocessor, SuggestionProvider, ValueType } from "./types.js";
import { LiteralParser } from "../parsers/literal.js";
import type { ArgumentParser } from "../parsers/parser.js";

export type ComponentType = "literal" | "argument" | "flag";

export type DefaultValue<C, T> =
  | { readonly kind: "constant"; readonly value: T }
  | { readonly kind: "dynamic"; evaluate(context: CommandContext<C>): T }
  | { readonly kind: "parsed"; readonly input: string };

export const DefaultValue = {
  constant: <C, T>(value: T): DefaultValue<C, T> => ({ kind: "constant", value }),
  dynamic: <C, T>(evaluate: (context: CommandContext<C>) => T): DefaultValue<C, T> => ({
    kind: "dynamic",
    evaluate,
  }),
  /** Raw input handed to the component's own parser when the argument is omitted. */
  parsed: <C, T>(input: string): DefaultValue<C, T> => ({ kind: "parsed", input }),
};

interface BaseComponentOptions<C, T> {
  name: string;
  parser: ArgumentParser<C, T>;
  type?: ComponentType;
  valueType?: ValueType<T>;
  description?: string;
  suggestionProvider?: SuggestionProvider<C>;
  preprocessors?: readonly ComponentPreprocessor<C>[];
}

// A default value only makes sense on an optional component.
export type CommandComponentOptions<C, T> = BaseComponentOptions<C, T> &
  (
    | { required?: true; defaultValue?: undefined }
    | { required: false; defaultValue?: DefaultValue<C, T> }
  );

export class CommandComponent<C, T = unknown> {
  readonly name: string;
  readonly type: ComponentType;
  readonly required: boolean;
  readonly parser: ArgumentParser<C, T>;
  readonly valueType: ValueType<T> | undefined;
  readonly description: string;
  readonly defaultValue: DefaultValue<C, T> | undefined;
  readonly suggestionProvider: SuggestionProvider<C> | undefined;
  private readonly componentPreprocessors: ComponentPreprocessor<C>[];

  constructor(options: CommandComponentOptions<C, T>) {
    this.name = options.name;
    this.type = options.type ?? "argument";
    this.required = options.required ?? true;
    this.parser = options.parser;
    this.valueType = options.valueType;
    this.description = options.description ?? "";
    this.defaultValue = options.defaultValue;
    this.suggestionProvider = options.suggestionProvider;
    this.componentPreprocessors = [...(options.preprocessors ?? [])];
  }

  optional(): boolean {
    return !this.required;
  }

  hasDefaultValue(): boolean {
    return this.defaultValue !== undefined;
  }

  preprocessors(): ComponentPreprocessor<C>[] {
    return [...this.componentPreprocessors];
  }

  addPreprocessor(preprocessor: ComponentPreprocessor<C>): this {
    this.componentPreprocessors.push(preprocessor);
    return this;
  }

  /** Alternative spellings of a literal; always empty for other components. */
  aliases(): string[] {
    return this.parser instanceof LiteralParser ? this.parser.aliases() : [];
  }

  copy(): CommandComponent<C, T> {
    const base: BaseComponentOptions<C, T> = {
      name: this.name,
      parser: this.parser,
      type: this.type,
      valueType: this.valueType,
      description: this.description,
      suggestionProvider: this.suggestionProvider,
      preprocessors: this.componentPreprocessors,
    };
    return this.required
      ? new CommandComponent<C, T>({ ...base, required: true })
      : new CommandComponent<C, T>({ ...base, required: false, defaultValue: this.defaultValue });
  }

  toString(): string {
    return this.name;
  }
}
