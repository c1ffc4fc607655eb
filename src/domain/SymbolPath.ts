/**
 * Import path of a function or method symbol, as profilers record it:
 * `[qualifier/...]pkg.Receiver.Method` or `[qualifier/...]pkg.Func`.
 */
export class SymbolPath {
  constructor(public readonly qualifiers: readonly string[]) {}

  static parse(symbol: string): SymbolPath {
    const name = SymbolPath.stripTypeArguments(symbol);
    if (name === '') {
      return new SymbolPath([]);
    }

    const parts = name.split('/');
    parts[parts.length - 1] = SymbolPath.stripMember(parts[parts.length - 1]);
    return new SymbolPath(parts);
  }

  // `Map[go.shape.string]` and friends can embed other import paths
  private static stripTypeArguments(symbol: string): string {
    const bracket = symbol.indexOf('[');
    return bracket >= 0 ? symbol.slice(0, bracket) : symbol;
  }

  private static stripMember(lastPart: string): string {
    const [pkg] = lastPart.split('.', 1);
    return pkg;
  }

  get isEmpty(): boolean {
    return this.qualifiers.length === 0;
  }

  get root(): string {
    return this.qualifiers[0] ?? '';
  }

  /** Hosted import paths start with a domain-like element, the standard library never does. */
  get isStandardLibrary(): boolean {
    return !this.isEmpty && !this.root.includes('.');
  }

  toString(): string {
    return this.qualifiers.join('/');
  }
}
