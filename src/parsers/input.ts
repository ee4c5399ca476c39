/** Cursor over input that a dispatcher has already split into tokens. */
export class CommandInput {
  private readonly tokens: readonly string[];
  private cursor: number;

  constructor(tokens: readonly string[], cursor = 0) {
    this.tokens = [...tokens];
    this.cursor = cursor;
  }

  static of(...tokens: string[]): CommandInput {
    return new CommandInput(tokens);
  }

  isEmpty(): boolean {
    return this.cursor >= this.tokens.length;
  }

  remainingTokens(): number {
    return Math.max(0, this.tokens.length - this.cursor);
  }

  peek(): string | undefined {
    return this.tokens[this.cursor];
  }

  read(): string | undefined {
    const token = this.tokens[this.cursor];
    if (token !== undefined) this.cursor++;
    return token;
  }

  remaining(): string[] {
    return this.tokens.slice(this.cursor);
  }

  copy(): CommandInput {
    return new CommandInput(this.tokens, this.cursor);
  }
}
