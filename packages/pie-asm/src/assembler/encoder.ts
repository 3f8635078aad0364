/**
 * PIE Instruction Encoder
 *
 * Every opcode instruction becomes one 4-byte word:
 *
 *   byte 0      opcode
 *   bytes 1..3  operands in source order, zero-padded
 *
 * Registers take one byte. Integers and label addresses take two,
 * high byte first.
 */

import { TokenType, type OperandToken } from './lexer.js';
import { Opcode } from './opcodes.js';
import type { OpcodeInstruction } from './program.js';
import type { SymbolTable } from './symbols.js';
import type { AssemblerError, AssemblerWarning } from './diagnostics.js';

export const INSTRUCTION_WIDTH = 4;

/** Magic bytes at the start of every PIE artifact ("-21-"). */
export const PIE_HEADER_PREFIX: readonly number[] = [45, 50, 49, 45];
/** Last byte index of the header; the header runs 0..64 inclusive. */
export const PIE_HEADER_LENGTH = 64;
/** The body starts right after the inclusive header boundary. */
export const PIE_BODY_OFFSET = PIE_HEADER_LENGTH + 1;

export const MIN_INTEGER_OPERAND = -0x8000;
export const MAX_INTEGER_OPERAND = 0xffff;

/**
 * Addresses are written as 16 bits. Offsets past this are truncated to
 * their low half; see LabelOffsetTruncated.
 */
export const MAX_ADDRESSABLE_OFFSET = 0xffff;

export interface EncodedInstruction {
  bytes: Uint8Array;
  errors: AssemblerError[];
  warnings: AssemblerWarning[];
}

export function writePieHeader(): Uint8Array {
  const header = new Uint8Array(PIE_BODY_OFFSET);
  header.set(PIE_HEADER_PREFIX);
  return header;
}

export function encodeInstruction(
  instruction: OpcodeInstruction,
  symbols: SymbolTable,
  index: number
): EncodedInstruction {
  const bytes: number[] = [instruction.opcode];
  const errors: AssemblerError[] = [];
  const warnings: AssemblerWarning[] = [];

  if (instruction.opcode === Opcode.IGL) {
    warnings.push({
      kind: 'IllegalOpcode',
      message: `Illegal opcode '${instruction.mnemonic}'`,
      line: instruction.line,
      column: instruction.column,
      instruction: index,
    });
  }

  for (const operand of instruction.operands) {
    encodeOperand(operand, symbols, index, bytes, errors, warnings);
  }

  const word = new Uint8Array(INSTRUCTION_WIDTH);
  if (bytes.length > INSTRUCTION_WIDTH) {
    errors.push({
      kind: 'OperandOverflow',
      message: `Operands of '${instruction.mnemonic}' need ${bytes.length - 1} bytes, only ${INSTRUCTION_WIDTH - 1} are available`,
      line: instruction.line,
      column: instruction.column,
      instruction: index,
    });
    word[0] = instruction.opcode;
  } else {
    word.set(bytes);
  }

  return { bytes: word, errors, warnings };
}

function encodeOperand(
  operand: OperandToken,
  symbols: SymbolTable,
  index: number,
  out: number[],
  errors: AssemblerError[],
  warnings: AssemblerWarning[]
): void {
  const at = { line: operand.line, column: operand.column, instruction: index };

  switch (operand.type) {
    case TokenType.REGISTER:
      out.push(operand.value);
      break;

    case TokenType.INTEGER:
      if (operand.value < MIN_INTEGER_OPERAND || operand.value > MAX_INTEGER_OPERAND) {
        errors.push({
          kind: 'IntegerOutOfRange',
          message: `Integer ${operand.value} does not fit in 16 bits`,
          ...at,
        });
        pushUint16(out, 0);
        break;
      }
      pushUint16(out, operand.value);
      break;

    case TokenType.LABEL_USAGE: {
      const offset = symbols.lookup(operand.value);
      if (offset === undefined) {
        errors.push({
          kind: 'UnresolvedLabel',
          message: `Undefined label '${operand.value}'`,
          ...at,
        });
        pushUint16(out, 0);
        break;
      }
      if (offset > MAX_ADDRESSABLE_OFFSET) {
        warnings.push({
          kind: 'LabelOffsetTruncated',
          message: `Offset ${offset} of label '${operand.value}' exceeds ${MAX_ADDRESSABLE_OFFSET}; only the low 16 bits are emitted`,
          ...at,
        });
      }
      pushUint16(out, offset);
      break;
    }

    case TokenType.STRING:
      errors.push({
        kind: 'InvalidOperand',
        message: `String literal '${operand.value}' cannot be an instruction operand`,
        ...at,
      });
      break;
  }
}

function pushUint16(out: number[], value: number): void {
  const converted = value & 0xffff;
  out.push((converted >> 8) & 0xff);
  out.push(converted & 0xff);
}
