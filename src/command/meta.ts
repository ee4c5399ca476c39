declare const metaValueOf: unique symbol;

export interface MetaKey<V> {
  readonly name: string;
  readonly [metaValueOf]?: V;
}

export function metaKey<V>(name: string): MetaKey<V> {
  return { name };
}

export class CommandMeta {
  static readonly HIDDEN: MetaKey<boolean> = metaKey("hidden");
  static readonly DESCRIPTION: MetaKey<string> = metaKey("description");

  private constructor(private readonly values: ReadonlyMap<string, unknown>) {}

  static empty(): CommandMeta {
    return new CommandMeta(new Map());
  }

  with<V>(key: MetaKey<V>, value: V): CommandMeta {
    const next = new Map(this.values);
    next.set(key.name, value);
    return new CommandMeta(next);
  }

  // Entries are only written through `with`, which pairs the key and value types.
  get<V>(key: MetaKey<V>): V | undefined {
    return this.values.get(key.name) as V | undefined;
  }

  getOrDefault<V>(key: MetaKey<V>, fallback: V): V {
    return this.get(key) ?? fallback;
  }

  has(key: MetaKey<unknown>): boolean {
    return this.values.has(key.name);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  toRecord(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }
}
