import type { Command } from "../command/command.js";
import type { CommandComponent } from "../command/component.js";
import { CommandMeta } from "../command/meta.js";
import { permissionToString } from "../command/permission.js";
import { CompoundParser } from "../parsers/compound.js";
import { CommandFlagParser } from "../parsers/flags.js";

export interface CommandDescription {
  readonly syntax: string;
  readonly description: string;
  readonly permission: string;
  readonly senderType?: string;
  readonly aliases: string[];
}

function wrap(name: string, required: boolean): string {
  return required ? `<${name}>` : `[${name}]`;
}

export function formatComponent<C>(component: CommandComponent<C>): string {
  const parser = component.parser;

  if (component.type === "literal") {
    return component.name;
  }

  if (parser instanceof CommandFlagParser) {
    return parser
      .flags()
      .map((flag) => (flag.value ? `[--${flag.name} <${flag.name}>]` : `[--${flag.name}]`))
      .join(" ");
  }

  if (parser instanceof CompoundParser) {
    return parser.names.map((name) => wrap(name, component.required)).join(" ");
  }

  return wrap(component.name, component.required);
}

/** Renders e.g. `teleport <player> [world] [--silent]`. */
export function formatSyntax<C, S extends C>(command: Command<C, S>): string {
  return command
    .components()
    .map((component) => formatComponent(component))
    .filter((part) => part.length > 0)
    .join(" ");
}

export function visibleCommands<C>(commands: readonly Command<C>[]): Command<C>[] {
  return commands.filter((command) => !command.isHidden());
}

export function describeCommand<C, S extends C>(command: Command<C, S>): CommandDescription {
  const root = command.rootComponent();
  return {
    syntax: formatSyntax(command),
    description: command.meta().get(CommandMeta.DESCRIPTION) ?? root.description,
    permission: permissionToString(command.permission()),
    senderType: command.senderType()?.name,
    aliases: root.aliases(),
  };
}
