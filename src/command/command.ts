import { CommandBuilder, type CreateBuilderOptions } from "./builder.js";
import type { CommandComponent } from "./component.js";
import type { CommandExecutionHandler } from "./handler.js";
import { CommandMeta } from "./meta.js";
import { Permission, type CommandPermission } from "./permission.js";
import type { SenderType } from "./sender.js";
import { CommandFlagParser } from "../parsers/flags.js";
import { ConstructionError } from "../utils/errors.js";

export interface CommandOptions<C, S extends C> {
  components: readonly CommandComponent<C>[];
  handler: CommandExecutionHandler<S>;
  senderType?: SenderType<S>;
  permission?: CommandPermission<C>;
  meta?: CommandMeta;
}

/**
 * An ordered chain of components plus the handler that runs once a dispatcher
 * has parsed input against it. `C` is the sender type of the hosting manager;
 * `S` is the sender type the handler sees after the dispatcher has checked
 * `senderType()`.
 *
 * Construction enforces that the chain is non-empty, that every component is
 * named, and that no required component follows an optional one. Components
 * are copied on the way in and out, so commands built from one builder never
 * share component instances.
 */
export class Command<C, S extends C = C> {
  private readonly componentList: readonly CommandComponent<C>[];
  private readonly flagComponentRef: CommandComponent<C> | undefined;
  private readonly handler: CommandExecutionHandler<S>;
  private readonly requiredSenderType: SenderType<S> | undefined;
  private readonly commandPermission: CommandPermission<C>;
  private readonly commandMeta: CommandMeta;

  constructor(options: CommandOptions<C, S>) {
    const components = options.components.map((component) => component.copy());
    if (components.length === 0) {
      throw new ConstructionError("At least one command component is required");
    }

    let foundOptional = false;
    for (const component of components) {
      if (component.name.length === 0) {
        throw new ConstructionError("Component names may not be empty");
      }
      if (foundOptional && component.required) {
        throw new ConstructionError(
          `Command component '${component.name}' cannot be placed after an optional argument`,
        );
      }
      if (!component.required) foundOptional = true;
    }

    this.componentList = components;
    this.flagComponentRef = components.find((component) => component.type === "flag");
    this.handler = options.handler;
    this.requiredSenderType = options.senderType;
    this.commandPermission = options.permission ?? Permission.empty();
    this.commandMeta = options.meta ?? CommandMeta.empty();
  }

  /** A detached builder whose root is a literal called `name`. */
  static newBuilder<C>(name: string, options: CreateBuilderOptions<C> = {}): CommandBuilder<C> {
    return CommandBuilder.create<C>(name, options);
  }

  components(): CommandComponent<C>[] {
    return this.componentList.map((component) => component.copy());
  }

  rootComponent(): CommandComponent<C> {
    // The constructor rejects an empty chain.
    const [root] = this.componentList;
    if (!root) throw new ConstructionError("At least one command component is required");
    return root.copy();
  }

  nonFlagArguments(): CommandComponent<C>[] {
    return this.componentList
      .filter((component) => component !== this.flagComponentRef)
      .map((component) => component.copy());
  }

  flagComponent(): CommandComponent<C> | undefined {
    return this.flagComponentRef?.copy();
  }

  flagParser(): CommandFlagParser<C> | undefined {
    const parser = this.flagComponentRef?.parser;
    return parser instanceof CommandFlagParser ? parser : undefined;
  }

  executionHandler(): CommandExecutionHandler<S> {
    return this.handler;
  }

  senderType(): SenderType<S> | undefined {
    return this.requiredSenderType;
  }

  permission(): CommandPermission<C> {
    return this.commandPermission;
  }

  meta(): CommandMeta {
    return this.commandMeta;
  }

  isHidden(): boolean {
    return this.commandMeta.getOrDefault(CommandMeta.HIDDEN, false);
  }

  toString(): string {
    return this.componentList.map((component) => component.name).join(" ");
  }
}
