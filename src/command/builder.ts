import { Command } from "./command.js";
import { CommandComponent, type DefaultValue } from "./component.js";
import {
  delegatingExecutionHandler,
  nullExecutionHandler,
  type CommandExecutionHandler,
} from "./handler.js";
import { CommandMeta, type MetaKey } from "./meta.js";
import { isEmptyPermission, Permission, type CommandPermission } from "./permission.js";
import type { SenderType } from "./sender.js";
import {
  ValueType,
  ValueTypes,
  type ComponentKey,
  type ComponentPreprocessor,
  type SuggestionProvider,
} from "./types.js";
import type { CommandManagerContext } from "../manager/types.js";
import {
  argumentPair,
  argumentTriplet,
  mappedArgumentPair,
  mappedArgumentTriplet,
  type PairMapper,
  type TripletMapper,
} from "../parsers/compound.js";
import { CommandFlagParser, type CommandFlag } from "../parsers/flags.js";
import { LiteralParser } from "../parsers/literal.js";
import type { ParserDescriptor } from "../parsers/parser.js";
import { ConstructionError, UsageError } from "../utils/errors.js";

/** A parser, or the value type whose default parser the manager should supply. */
export type ArgumentSource<C, T> = ParserDescriptor<C, T> | ValueType<T>;

/**
 * A parser that also names the component it fills. Suggestion and
 * preprocessor capabilities declared here are attached to the component.
 */
export interface ArgumentDescriptor<C, T> extends ParserDescriptor<C, T> {
  readonly key: ComponentKey<T>;
  readonly suggestionProvider?: SuggestionProvider<C>;
  readonly preprocessors?: readonly ComponentPreprocessor<C>[];
}

export interface ArgumentOptions<C> {
  description?: string;
  suggestionProvider?: SuggestionProvider<C>;
}

export interface OptionalArgumentOptions<C, T> extends ArgumentOptions<C> {
  defaultValue?: DefaultValue<C, T>;
}

export interface LiteralOptions {
  aliases?: string[];
  description?: string;
}

export interface CompoundOptions<C> {
  description?: string;
  /** Used instead of the attached manager for this call. */
  manager?: CommandManagerContext<C>;
}

export interface MappedPairOptions<C, U, V, O> extends CompoundOptions<C> {
  mapper: PairMapper<C, U, V, O>;
  outputType?: ValueType<O>;
}

export interface MappedTripletOptions<C, U, V, W, O> extends CompoundOptions<C> {
  mapper: TripletMapper<C, U, V, W, O>;
  outputType?: ValueType<O>;
}

export interface CreateBuilderOptions<C> {
  aliases?: string[];
  description?: string;
  meta?: CommandMeta;
  manager?: CommandManagerContext<C>;
}

interface BuilderState<C, S> {
  readonly manager: CommandManagerContext<C> | undefined;
  readonly meta: CommandMeta;
  readonly senderType: SenderType<S> | undefined;
  readonly components: readonly CommandComponent<C>[];
  readonly handler: CommandExecutionHandler<S>;
  readonly permission: CommandPermission<C>;
  readonly flags: readonly CommandFlag<C, unknown>[];
}

type ComponentName<T> = string | ComponentKey<T>;

const PAIR_TYPE = ValueType.of<unknown>("pair");
const TRIPLET_TYPE = ValueType.of<unknown>("triplet");

function nameOf<T>(name: ComponentName<T>): string {
  return typeof name === "string" ? name : name.name;
}

/**
 * Immutable builder for {@link Command}. Every operation returns a new
 * builder; the receiver is never changed, so one builder can be extended in
 * several directions or built any number of times.
 */
export class CommandBuilder<C, S extends C = C> {
  private constructor(private readonly state: BuilderState<C, S>) {}

  static create<C>(name: string, options: CreateBuilderOptions<C> = {}): CommandBuilder<C, C> {
    const root = new CommandComponent<C, string>({
      name,
      type: "literal",
      parser: new LiteralParser<C>(name, options.aliases),
      valueType: ValueTypes.string,
      description: options.description,
    });
    return new CommandBuilder<C, C>({
      manager: options.manager,
      meta: options.meta ?? CommandMeta.empty(),
      senderType: undefined,
      components: [root],
      handler: nullExecutionHandler(),
      permission: Permission.empty(),
      flags: [],
    });
  }

  private with(changes: Partial<BuilderState<C, S>>): CommandBuilder<C, S> {
    return new CommandBuilder<C, S>({ ...this.state, ...changes });
  }

  components(): CommandComponent<C>[] {
    return [...this.state.components];
  }

  handler(): CommandExecutionHandler<S>;
  handler(handler: CommandExecutionHandler<S>): CommandBuilder<C, S>;
  handler(handler?: CommandExecutionHandler<S>): CommandExecutionHandler<S> | CommandBuilder<C, S> {
    if (handler === undefined) return this.state.handler;
    return this.with({ handler });
  }

  permission(): CommandPermission<C>;
  permission(
    permission: CommandPermission<C> | string | ((sender: C) => boolean),
  ): CommandBuilder<C, S>;
  permission(
    permission?: CommandPermission<C> | string | ((sender: C) => boolean),
  ): CommandPermission<C> | CommandBuilder<C, S> {
    if (permission === undefined) return this.state.permission;
    if (typeof permission === "string") return this.with({ permission: Permission.of(permission) });
    if (typeof permission === "function") {
      return this.with({ permission: Permission.predicate(permission) });
    }
    return this.with({ permission });
  }

  senderType(): SenderType<S> | undefined;
  /**
   * Restricts the command to senders of type `N`. Not verified here: the
   * dispatcher must check `type.is(sender)` before running the handler.
   */
  senderType<N extends S>(type: SenderType<N>): CommandBuilder<C, N>;
  senderType<N extends S>(
    type?: SenderType<N>,
  ): SenderType<S> | undefined | CommandBuilder<C, N> {
    if (type === undefined) return this.state.senderType;
    return new CommandBuilder<C, N>({ ...this.state, senderType: type });
  }

  flags(): CommandFlag<C, unknown>[] {
    return [...this.state.flags];
  }

  meta(): CommandMeta;
  meta<V>(key: MetaKey<V>, value: V): CommandBuilder<C, S>;
  meta<V>(...args: [] | [key: MetaKey<V>, value: V]): CommandMeta | CommandBuilder<C, S> {
    if (args.length === 0) return this.state.meta;
    const [key, value] = args;
    return this.with({ meta: this.state.meta.with(key, value) });
  }

  hidden(): CommandBuilder<C, S> {
    return this.meta(CommandMeta.HIDDEN, true);
  }

  manager(manager: CommandManagerContext<C> | undefined): CommandBuilder<C, S> {
    return this.with({ manager });
  }

  hasManager(): boolean {
    return this.state.manager !== undefined;
  }

  apply(operation: (builder: CommandBuilder<C, S>) => CommandBuilder<C, S>): CommandBuilder<C, S> {
    return operation(this);
  }

  /** Appends a copy of `component`; later changes to the original do not reach this builder. */
  argument(component: CommandComponent<C, unknown>): CommandBuilder<C, S> {
    return this.with({ components: [...this.state.components, component.copy()] });
  }

  literal(name: string, ...aliases: string[]): CommandBuilder<C, S>;
  literal(name: string, options: LiteralOptions): CommandBuilder<C, S>;
  literal(name: string, ...rest: [LiteralOptions] | string[]): CommandBuilder<C, S> {
    const [first] = rest;
    let options: LiteralOptions;
    if (typeof first === "object") {
      options = first;
    } else {
      const aliases: string[] = [];
      for (const alias of rest) {
        if (typeof alias === "string") aliases.push(alias);
      }
      options = { aliases };
    }

    return this.argument(
      new CommandComponent<C, string>({
        name,
        type: "literal",
        parser: new LiteralParser<C>(name, options.aliases),
        valueType: ValueTypes.string,
        description: options.description,
      }),
    );
  }

  required<T>(
    name: ComponentName<T>,
    source: ArgumentSource<C, T>,
    options: ArgumentOptions<C> = {},
  ): CommandBuilder<C, S> {
    const descriptor = this.resolve(source);
    return this.argument(
      new CommandComponent<C, T>({
        name: nameOf(name),
        parser: descriptor.parser,
        valueType: descriptor.valueType,
        description: options.description,
        suggestionProvider: options.suggestionProvider,
        required: true,
      }),
    );
  }

  optional<T>(
    name: ComponentName<T>,
    source: ArgumentSource<C, T>,
    options: OptionalArgumentOptions<C, T> = {},
  ): CommandBuilder<C, S> {
    const descriptor = this.resolve(source);
    return this.argument(
      new CommandComponent<C, T>({
        name: nameOf(name),
        parser: descriptor.parser,
        valueType: descriptor.valueType,
        description: options.description,
        suggestionProvider: options.suggestionProvider,
        required: false,
        defaultValue: options.defaultValue,
      }),
    );
  }

  requiredArgument<T>(
    descriptor: ArgumentDescriptor<C, T>,
    options: ArgumentOptions<C> = {},
  ): CommandBuilder<C, S> {
    return this.argument(
      new CommandComponent<C, T>({
        ...this.describe(descriptor, options),
        required: true,
      }),
    );
  }

  optionalArgument<T>(
    descriptor: ArgumentDescriptor<C, T>,
    options: OptionalArgumentOptions<C, T> = {},
  ): CommandBuilder<C, S> {
    return this.argument(
      new CommandComponent<C, T>({
        ...this.describe(descriptor, options),
        required: false,
        defaultValue: options.defaultValue,
      }),
    );
  }

  requiredArgumentPair<U, V, O>(
    name: ComponentName<O>,
    names: readonly [string, string],
    types: readonly [ValueType<U>, ValueType<V>],
    options: MappedPairOptions<C, U, V, O>,
  ): CommandBuilder<C, S>;
  requiredArgumentPair<U, V>(
    name: ComponentName<readonly [U, V]>,
    names: readonly [string, string],
    types: readonly [ValueType<U>, ValueType<V>],
    options?: CompoundOptions<C>,
  ): CommandBuilder<C, S>;
  requiredArgumentPair<U, V, O>(
    name: ComponentName<O>,
    names: readonly [string, string],
    types: readonly [ValueType<U>, ValueType<V>],
    options: CompoundOptions<C> & Partial<MappedPairOptions<C, U, V, O>> = {},
  ): CommandBuilder<C, S> {
    return this.compound(nameOf(name), true, options, (manager) =>
      this.pairDescriptor(manager, names, types, options),
    );
  }

  optionalArgumentPair<U, V, O>(
    name: ComponentName<O>,
    names: readonly [string, string],
    types: readonly [ValueType<U>, ValueType<V>],
    options: MappedPairOptions<C, U, V, O>,
  ): CommandBuilder<C, S>;
  optionalArgumentPair<U, V>(
    name: ComponentName<readonly [U, V]>,
    names: readonly [string, string],
    types: readonly [ValueType<U>, ValueType<V>],
    options?: CompoundOptions<C>,
  ): CommandBuilder<C, S>;
  optionalArgumentPair<U, V, O>(
    name: ComponentName<O>,
    names: readonly [string, string],
    types: readonly [ValueType<U>, ValueType<V>],
    options: CompoundOptions<C> & Partial<MappedPairOptions<C, U, V, O>> = {},
  ): CommandBuilder<C, S> {
    return this.compound(nameOf(name), false, options, (manager) =>
      this.pairDescriptor(manager, names, types, options),
    );
  }

  requiredArgumentTriplet<U, V, W>(
    name: ComponentName<readonly [U, V, W]>,
    names: readonly [string, string, string],
    types: readonly [ValueType<U>, ValueType<V>, ValueType<W>],
    options?: CompoundOptions<C>,
  ): CommandBuilder<C, S>;
  requiredArgumentTriplet<U, V, W, O>(
    name: ComponentName<O>,
    names: readonly [string, string, string],
    types: readonly [ValueType<U>, ValueType<V>, ValueType<W>],
    options: MappedTripletOptions<C, U, V, W, O>,
  ): CommandBuilder<C, S>;
  requiredArgumentTriplet<U, V, W, O>(
    name: ComponentName<O>,
    names: readonly [string, string, string],
    types: readonly [ValueType<U>, ValueType<V>, ValueType<W>],
    options: CompoundOptions<C> & Partial<MappedTripletOptions<C, U, V, W, O>> = {},
  ): CommandBuilder<C, S> {
    return this.compound(nameOf(name), true, options, (manager) =>
      this.tripletDescriptor(manager, names, types, options),
    );
  }

  optionalArgumentTriplet<U, V, W>(
    name: ComponentName<readonly [U, V, W]>,
    names: readonly [string, string, string],
    types: readonly [ValueType<U>, ValueType<V>, ValueType<W>],
    options?: CompoundOptions<C>,
  ): CommandBuilder<C, S>;
  optionalArgumentTriplet<U, V, W, O>(
    name: ComponentName<O>,
    names: readonly [string, string, string],
    types: readonly [ValueType<U>, ValueType<V>, ValueType<W>],
    options: MappedTripletOptions<C, U, V, W, O>,
  ): CommandBuilder<C, S>;
  optionalArgumentTriplet<U, V, W, O>(
    name: ComponentName<O>,
    names: readonly [string, string, string],
    types: readonly [ValueType<U>, ValueType<V>, ValueType<W>],
    options: CompoundOptions<C> & Partial<MappedTripletOptions<C, U, V, W, O>> = {},
  ): CommandBuilder<C, S> {
    return this.compound(nameOf(name), false, options, (manager) =>
      this.tripletDescriptor(manager, names, types, options),
    );
  }

  prependHandler(handler: CommandExecutionHandler<S>): CommandBuilder<C, S> {
    return this.handler(delegatingExecutionHandler([handler, this.state.handler]));
  }

  appendHandler(handler: CommandExecutionHandler<S>): CommandBuilder<C, S> {
    return this.handler(delegatingExecutionHandler([this.state.handler, handler]));
  }

  /**
   * Copies the non-literal components of `command` onto this builder in
   * order and takes over its handler. Its flags end up beside this builder's
   * own at build time. The command's permission is only
   * adopted when this builder has none of its own.
   */
  proxies(command: Command<C, S>): CommandBuilder<C, S> {
    let builder: CommandBuilder<C, S> = this;
    for (const component of command.components()) {
      if (component.type === "literal") continue;
      builder = builder.argument(component);
    }
    if (isEmptyPermission(this.state.permission)) {
      builder = builder.permission(command.permission());
    }
    return builder.handler(command.executionHandler());
  }

  flag<T>(flag: CommandFlag<C, T>): CommandBuilder<C, S> {
    return this.with({ flags: [...this.state.flags, flag] });
  }

  /**
   * Flag components already in the chain (e.g. from {@link proxies}) are
   * folded into the single trailing flag component, ahead of the pending flags.
   */
  build(): Command<C, S> {
    const components: CommandComponent<C>[] = [];
    const flags: CommandFlag<C, unknown>[] = [];
    for (const component of this.state.components) {
      if (component.type === "flag" && component.parser instanceof CommandFlagParser) {
        flags.push(...component.parser.flags());
      } else {
        components.push(component);
      }
    }
    flags.push(...this.state.flags);

    const seen = new Set<string>();
    for (const flag of flags) {
      if (seen.has(flag.name)) {
        throw new ConstructionError(`Flag '${flag.name}' is registered more than once`);
      }
      seen.add(flag.name);
    }

    if (flags.length > 0) {
      components.push(
        new CommandComponent<C, Record<string, unknown>>({
          name: "flags",
          type: "flag",
          parser: new CommandFlagParser<C>(flags),
          valueType: ValueTypes.object,
          description: "Command flags",
          required: false,
        }),
      );
    }

    return new Command<C, S>({
      components,
      handler: this.state.handler,
      senderType: this.state.senderType,
      permission: this.state.permission,
      meta: this.state.meta,
    });
  }

  private resolve<T>(source: ArgumentSource<C, T>): ParserDescriptor<C, T> {
    if ("parser" in source) return source;

    const manager = this.state.manager;
    if (!manager) {
      throw new UsageError(
        `Cannot resolve a parser for value type '${source.name}' without a command manager`,
      );
    }
    return { parser: manager.parserRegistry().requireParser(source), valueType: source };
  }

  private describe<T>(descriptor: ArgumentDescriptor<C, T>, options: ArgumentOptions<C>) {
    return {
      name: descriptor.key.name,
      parser: descriptor.parser,
      valueType: descriptor.valueType,
      description: options.description,
      suggestionProvider: options.suggestionProvider ?? descriptor.suggestionProvider,
      preprocessors: descriptor.preprocessors,
    };
  }

  private compound(
    name: string,
    required: boolean,
    options: CompoundOptions<C>,
    createDescriptor: (manager: CommandManagerContext<C>) => ParserDescriptor<C, unknown>,
  ): CommandBuilder<C, S> {
    const manager = options.manager ?? this.state.manager;
    if (!manager) {
      throw new UsageError(
        `Compound argument '${name}' requires a command manager to resolve its parsers`,
      );
    }

    const { parser, valueType } = createDescriptor(manager);
    const base = { name, parser, valueType, description: options.description };
    return this.argument(
      required
        ? new CommandComponent<C, unknown>({ ...base, required: true })
        : new CommandComponent<C, unknown>({ ...base, required: false }),
    );
  }

  private pairDescriptor<U, V, O>(
    manager: CommandManagerContext<C>,
    names: readonly [string, string],
    types: readonly [ValueType<U>, ValueType<V>],
    options: Partial<MappedPairOptions<C, U, V, O>>,
  ): ParserDescriptor<C, unknown> {
    const registry = manager.parserRegistry();
    if (options.mapper) {
      return {
        parser: mappedArgumentPair(registry, names, types, options.mapper),
        valueType: options.outputType ?? PAIR_TYPE,
      };
    }
    return { parser: argumentPair(registry, names, types), valueType: PAIR_TYPE };
  }

  private tripletDescriptor<U, V, W, O>(
    manager: CommandManagerContext<C>,
    names: readonly [string, string, string],
    types: readonly [ValueType<U>, ValueType<V>, ValueType<W>],
    options: Partial<MappedTripletOptions<C, U, V, W, O>>,
  ): ParserDescriptor<C, unknown> {
    const registry = manager.parserRegistry();
    if (options.mapper) {
      return {
        parser: mappedArgumentTriplet(registry, names, types, options.mapper),
        valueType: options.outputType ?? TRIPLET_TYPE,
      };
    }
    return { parser: argumentTriplet(registry, names, types), valueType: TRIPLET_TYPE };
  }
}
