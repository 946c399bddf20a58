/**
 * Command Name
 * Immutable hierarchical identifier made of lowercase tokens
 */

export class CommandNameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandNameError';
  }
}

/**
 * A command name such as `["economy", "pay"]`, written `economy pay`.
 * Two names are equal when their token sequences are equal; `key` is the
 * structural identity used by maps.
 */
export class CommandName {
  private readonly tokens: readonly string[];

  /** Structural identity, safe to use as a Map key */
  readonly key: string;

  private constructor(tokens: readonly string[]) {
    this.tokens = tokens;
    // Tokens never contain whitespace, so a space is an unambiguous separator
    this.key = tokens.join(' ');
  }

  /**
   * Builds a name from raw tokens, lower-casing each one.
   * Throws CommandNameError for an empty list or a token that is empty or holds whitespace.
   */
  static of(...tokens: string[]): CommandName {
    if (tokens.length === 0) {
      throw new CommandNameError('A command name needs at least one token');
    }

    const normalized = tokens.map((token, index) => {
      if (token.length === 0 || /\s/.test(token)) {
        throw new CommandNameError(`Invalid command name token at index ${index}: "${token}"`);
      }
      return token.toLowerCase();
    });

    return new CommandName(Object.freeze(normalized));
  }

  /**
   * Parses a space separated name, e.g. `CommandName.parse('economy pay')`
   */
  static parse(text: string): CommandName {
    const trimmed = text.trim();
    return CommandName.of(...(trimmed === '' ? [] : trimmed.split(/\s+/)));
  }

  size(): number {
    return this.tokens.length;
  }

  getTokens(): readonly string[] {
    return this.tokens;
  }

  hasParent(): boolean {
    return this.tokens.length > 1;
  }

  /**
   * The name with its last token removed
   */
  parent(): CommandName {
    if (!this.hasParent()) {
      throw new CommandNameError(`Command name "${this.key}" has no parent`);
    }
    return new CommandName(this.tokens.slice(0, -1));
  }

  /**
   * The name with its leaf token replaced by `token`.
   * A single-token name is replaced as a whole.
   */
  alias(token: string): CommandName {
    return CommandName.of(...this.tokens.slice(0, -1), token);
  }

  /**
   * The name with `moduleId` prepended as a new root token
   */
  pluginPrefixed(moduleId: string): CommandName {
    return CommandName.of(moduleId, ...this.tokens);
  }

  equals(other: CommandName): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.key;
  }
}
