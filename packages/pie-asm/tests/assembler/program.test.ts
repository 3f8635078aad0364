import { describe, it, expect } from 'vitest';
import { parse } from '../../src/assembler/parser.js';
import { SymbolTable, labelSymbol } from '../../src/assembler/symbols.js';

describe('Program', () => {
  it('should flatten a single instruction to one word', () => {
    const { bytes, errors } = parse('load $0 #100\n').toBytes();
    expect(errors).toHaveLength(0);
    expect(bytes).toEqual(new Uint8Array([0, 0, 0, 100]));
  });

  it('should concatenate words in source order', () => {
    const { bytes } = parse('load $1 #1\ninc $1\nhlt').toBytes();
    expect(bytes).toEqual(new Uint8Array([0, 1, 0, 1, 18, 1, 0, 0, 5, 0, 0, 0]));
  });

  it('should emit nothing for directives', () => {
    const { bytes } = parse('.code\ninc $1\n.data').toBytes();
    expect(bytes).toEqual(new Uint8Array([18, 1, 0, 0]));
  });

  it('should resolve labels through the given table', () => {
    const symbols = new SymbolTable();
    symbols.add(labelSymbol('x', 8));
    const { bytes, errors } = parse('jmp @x').toBytes(symbols);
    expect(errors).toHaveLength(0);
    expect(bytes).toEqual(new Uint8Array([6, 0, 8, 0]));
  });

  it('should pass encoder errors through without validating anything else', () => {
    const { bytes, errors } = parse('x: jmp @y').toBytes();
    expect(bytes).toEqual(new Uint8Array([6, 0, 0, 0]));
    expect(errors.map(e => e.kind)).toEqual(['UnresolvedLabel']);
  });
});
