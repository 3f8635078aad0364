/**
 * Program model
 *
 * An ordered, immutable list of parsed instructions. Source order is also
 * execution order.
 */

import type { OperandToken } from './lexer.js';
import type { Opcode } from './opcodes.js';
import type { AssemblerError, AssemblerWarning } from './diagnostics.js';
import { encodeInstruction, INSTRUCTION_WIDTH } from './encoder.js';
import { SymbolTable } from './symbols.js';

export enum NodeType {
  INSTRUCTION = 'INSTRUCTION',
  DIRECTIVE = 'DIRECTIVE',
}

export interface OpcodeInstruction {
  type: NodeType.INSTRUCTION;
  label?: string;
  opcode: Opcode;
  mnemonic: string;
  operands: readonly OperandToken[];
  line: number;
  column: number;
}

export interface DirectiveInstruction {
  type: NodeType.DIRECTIVE;
  label?: string;
  name: string;
  operands: readonly OperandToken[];
  line: number;
  column: number;
}

export type Instruction = OpcodeInstruction | DirectiveInstruction;

export function isDirective(instruction: Instruction): instruction is DirectiveInstruction {
  return instruction.type === NodeType.DIRECTIVE;
}

export interface FlattenedProgram {
  bytes: Uint8Array;
  errors: AssemblerError[];
  warnings: AssemblerWarning[];
}

export class Program {
  readonly instructions: readonly Instruction[];

  constructor(instructions: Instruction[]) {
    this.instructions = Object.freeze([...instructions]);
  }

  get length(): number {
    return this.instructions.length;
  }

  get opcodeCount(): number {
    return this.instructions.filter(i => !isDirective(i)).length;
  }

  /**
   * Concatenates the encoded words of every opcode instruction in source
   * order. Directives contribute nothing. No section or label rules are
   * checked here.
   */
  toBytes(symbols: SymbolTable = new SymbolTable()): FlattenedProgram {
    const bytes = new Uint8Array(this.opcodeCount * INSTRUCTION_WIDTH);
    const errors: AssemblerError[] = [];
    const warnings: AssemblerWarning[] = [];
    let offset = 0;

    this.instructions.forEach((instruction, index) => {
      if (isDirective(instruction)) return;
      const word = encodeInstruction(instruction, symbols, index);
      bytes.set(word.bytes, offset);
      offset += INSTRUCTION_WIDTH;
      errors.push(...word.errors);
      warnings.push(...word.warnings);
    });

    return { bytes, errors, warnings };
  }
}
