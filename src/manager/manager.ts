import { CommandBuilder } from "../command/builder.js";
import type { Command } from "../command/command.js";
import { CommandMeta } from "../command/meta.js";
import { loadConfig } from "../config/loader.js";
import { parseConfig } from "../config/schema.js";
import type { CmdkitConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { ParserRegistry } from "../parsers/registry.js";
import { registerStandardParsers } from "../parsers/standard.js";
import { RegistrationError } from "../utils/errors.js";
import type { CommandManagerContext, CommandManagerSettings } from "./types.js";

export interface CommandManagerOptions {
  config?: CmdkitConfig;
  logger?: Logger;
}

export interface CommandBuilderOptions {
  aliases?: string[];
  description?: string;
  meta?: CommandMeta;
}

/**
 * Hosts commands for one sender type: supplies manager-attached builders,
 * resolves parsers by value type and keeps the table of registered commands.
 * Matching input against the table is left to the dispatcher.
 */
export class CommandManager<C> implements CommandManagerContext<C> {
  private readonly registry = registerStandardParsers(new ParserRegistry<C>());
  private readonly registered = new Map<string, Command<C>>();
  private readonly settings: CommandManagerSettings;
  private readonly logger: Logger;

  constructor(options: CommandManagerOptions = {}) {
    const config = options.config ?? parseConfig({});
    this.settings = config.settings;
    this.logger = (options.logger ?? createLogger(config.logging)).child({
      component: "command-manager",
    });
  }

  /** Reads settings from `path`, or from `CMDKIT_CONFIG_PATH` / `cmdkit.config.json`. */
  static fromConfigFile<C>(path?: string, logger?: Logger): CommandManager<C> {
    return new CommandManager<C>({ config: loadConfig(path), logger });
  }

  parserRegistry(): ParserRegistry<C> {
    return this.registry;
  }

  commandBuilder(name: string, options: CommandBuilderOptions = {}): CommandBuilder<C> {
    let meta = options.meta ?? CommandMeta.empty();
    if (options.description !== undefined) {
      meta = meta.with(CommandMeta.DESCRIPTION, options.description);
    }
    return CommandBuilder.create<C>(name, {
      aliases: options.aliases,
      description: options.description,
      meta,
      manager: this,
    });
  }

  /**
   * Registers a command, building it first when given a builder. Two commands
   * with the same component chain conflict unless `overrideExistingCommands`
   * is set, in which case the newer one replaces the older.
   */
  command<S extends C>(input: Command<C, S> | CommandBuilder<C, S>): Command<C, S> {
    const command = input instanceof CommandBuilder ? input.build() : input;
    const key = command.toString();

    if (this.registered.has(key)) {
      if (!this.settings.overrideExistingCommands) {
        throw new RegistrationError(`Command '${key}' is already registered`, key);
      }
      this.logger.warn({ command: key }, "Replacing existing command");
    }

    this.registered.set(key, command);
    this.logger.debug(
      { command: key, hidden: command.isHidden(), flags: command.flagParser()?.flags().length ?? 0 },
      "Command registered",
    );
    return command;
  }

  commands(): Command<C>[] {
    return [...this.registered.values()];
  }

  /** Commands whose root component is called `name`, by name or alias. */
  commandsFor(name: string): Command<C>[] {
    const wanted = name.toLowerCase();
    return this.commands().filter((command) => {
      const root = command.rootComponent();
      return [root.name, ...root.aliases()].some((candidate) => candidate.toLowerCase() === wanted);
    });
  }
}
