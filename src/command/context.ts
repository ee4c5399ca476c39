import type { ComponentKey } from "./types.js";

/**
 * Values produced while a dispatcher parses input for one command, plus the
 * sender that issued it.
 */
export class CommandContext<C> {
  private readonly values = new Map<string, unknown>();
  private readonly flagValues = new Map<string, unknown>();

  constructor(readonly sender: C) {}

  set<T>(key: ComponentKey<T>, value: T): void {
    this.values.set(key.name, value);
  }

  // Values are only ever stored through a key of the same type.
  get<T>(key: ComponentKey<T>): T | undefined {
    return this.values.get(key.name) as T | undefined;
  }

  getOrDefault<T>(key: ComponentKey<T>, fallback: T): T {
    return this.values.has(key.name) ? (this.values.get(key.name) as T) : fallback;
  }

  contains(key: ComponentKey<unknown> | string): boolean {
    return this.values.has(typeof key === "string" ? key : key.name);
  }

  setFlag(name: string, value: unknown): void {
    this.flagValues.set(name, value);
  }

  hasFlag(name: string): boolean {
    return this.flagValues.has(name);
  }

  flag(name: string): unknown {
    return this.flagValues.get(name);
  }

  flags(): Record<string, unknown> {
    return Object.fromEntries(this.flagValues);
  }
}
