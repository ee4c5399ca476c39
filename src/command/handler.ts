import type { CommandContext } from "./context.js";

// Declared through a method so handlers compare bivariantly: a command narrowed
// to a sender subtype can still be stored beside the manager's other commands.
export type CommandExecutionHandler<C> = {
  handle(context: CommandContext<C>): void | Promise<void>;
}["handle"];

export function nullExecutionHandler<C>(): CommandExecutionHandler<C> {
  return () => undefined;
}

/**
 * Runs each handler in order, waiting for one to settle before starting the
 * next. A rejection stops the chain and is passed to the caller.
 */
export function delegatingExecutionHandler<C>(
  handlers: readonly CommandExecutionHandler<C>[],
): CommandExecutionHandler<C> {
  const chain = [...handlers];
  return async (context) => {
    for (const handler of chain) {
      await handler(context);
    }
  };
}
