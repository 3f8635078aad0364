/**
 * Symbol table
 *
 * Label names mapped to their resolved offsets for one assembly run.
 */

export enum SymbolType {
  Label = 'label',
}

export interface AssemblerSymbol {
  readonly name: string;
  readonly type: SymbolType;
  offset: number;
}

export class DuplicateSymbolError extends Error {
  constructor(public symbolName: string) {
    super(`Symbol '${symbolName}' is already declared`);
    this.name = 'DuplicateSymbolError';
  }
}

export class SymbolTable {
  private symbols: Map<string, AssemblerSymbol> = new Map();

  get size(): number {
    return this.symbols.size;
  }

  /** Callers check {@link has} first; a duplicate is never overwritten. */
  add(symbol: AssemblerSymbol): void {
    if (this.symbols.has(symbol.name)) {
      throw new DuplicateSymbolError(symbol.name);
    }
    this.symbols.set(symbol.name, { ...symbol, offset: symbol.offset >>> 0 });
  }

  has(name: string): boolean {
    return this.symbols.has(name);
  }

  lookup(name: string): number | undefined {
    return this.symbols.get(name)?.offset;
  }

  /**
   * Moves an existing symbol to a new offset, as when a string constant's
   * label is pointed at the read-only segment.
   */
  setOffset(name: string, offset: number): boolean {
    const symbol = this.symbols.get(name);
    if (!symbol) return false;
    symbol.offset = offset >>> 0;
    return true;
  }

  entries(): AssemblerSymbol[] {
    return [...this.symbols.values()].map(s => ({ ...s }));
  }

  toMap(): Map<string, number> {
    return new Map([...this.symbols].map(([name, symbol]) => [name, symbol.offset]));
  }
}

export function labelSymbol(name: string, offset: number): AssemblerSymbol {
  return { name, type: SymbolType.Label, offset };
}
