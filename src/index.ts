export { Command, type CommandOptions } from "./command/command.js";
export {
  CommandBuilder,
  type ArgumentDescriptor,
  type ArgumentOptions,
  type ArgumentSource,
  type CompoundOptions,
  type CreateBuilderOptions,
  type LiteralOptions,
  type MappedPairOptions,
  type MappedTripletOptions,
  type OptionalArgumentOptions,
} from "./command/builder.js";
export {
  CommandComponent,
  DefaultValue,
  type CommandComponentOptions,
  type ComponentType,
} from "./command/component.js";
export { CommandContext } from "./command/context.js";
export {
  delegatingExecutionHandler,
  nullExecutionHandler,
  type CommandExecutionHandler,
} from "./command/handler.js";
export { CommandMeta, metaKey, type MetaKey } from "./command/meta.js";
export {
  isEmptyPermission,
  Permission,
  permissionToString,
  type AndPermission,
  type CommandPermission,
  type OrPermission,
  type PredicatePermission,
  type SimplePermission,
} from "./command/permission.js";
export { senderType, type SenderType } from "./command/sender.js";
export {
  ComponentKey,
  ValueType,
  ValueTypes,
  type ComponentPreprocessor,
  type Suggestion,
  type SuggestionProvider,
} from "./command/types.js";

export {
  argumentPair,
  argumentTriplet,
  CompoundParser,
  mappedArgumentPair,
  mappedArgumentTriplet,
  type PairMapper,
  type TripletMapper,
} from "./parsers/compound.js";
export { CommandFlag, CommandFlagParser, type CommandFlagOptions } from "./parsers/flags.js";
export { CommandInput } from "./parsers/input.js";
export { LiteralParser, literalParser } from "./parsers/literal.js";
export {
  ParseResult,
  parserDescriptor,
  type ArgumentParser,
  type ParserDescriptor,
} from "./parsers/parser.js";
export { ParserRegistry, type ParserSupplier } from "./parsers/registry.js";
export { registerStandardParsers, ZodTokenParser } from "./parsers/standard.js";

export {
  CommandManager,
  type CommandBuilderOptions,
  type CommandManagerOptions,
} from "./manager/manager.js";
export type { CommandManagerContext, CommandManagerSettings } from "./manager/types.js";

export {
  describeCommand,
  formatComponent,
  formatSyntax,
  visibleCommands,
  type CommandDescription,
} from "./help/syntax.js";

export { loadConfig, substituteEnv } from "./config/loader.js";
export { parseConfig } from "./config/schema.js";
export type { CmdkitConfig, LoggingConfig } from "./config/types.js";
export { createLogger, type Logger } from "./logging/logger.js";
export {
  ArgumentParseError,
  CommandFrameworkError,
  ConstructionError,
  RegistrationError,
  UsageError,
} from "./utils/errors.js";
