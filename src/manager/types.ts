import type { ParserRegistry } from "../parsers/registry.js";

/**
 * What a builder needs from the manager hosting it. The builder only reads
 * through this and never changes the manager.
 */
export interface CommandManagerContext<C> {
  parserRegistry(): ParserRegistry<C>;
}

export interface CommandManagerSettings {
  readonly overrideExistingCommands: boolean;
}
