/**
 * PIE Decoder
 *
 * Reads an assembled artifact back into words the way the register
 * machine does. Used for listings and to check what the encoder wrote.
 */

import { mnemonicOf } from './opcodes.js';
import { INSTRUCTION_WIDTH, PIE_BODY_OFFSET, PIE_HEADER_PREFIX } from './encoder.js';

export interface DecodedInstruction {
  /** Byte offset of the word within the body. */
  offset: number;
  opcode: number;
  mnemonic: string;
  operands: [number, number, number];
}

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

export function hasPieHeader(bytes: Uint8Array): boolean {
  if (bytes.length < PIE_BODY_OFFSET) return false;
  return PIE_HEADER_PREFIX.every((byte, i) => bytes[i] === byte);
}

export function decodeProgram(bytes: Uint8Array): DecodedInstruction[] {
  if (!hasPieHeader(bytes)) {
    throw new DecodeError('Missing PIE header');
  }

  const body = bytes.subarray(PIE_BODY_OFFSET);
  if (body.length % INSTRUCTION_WIDTH !== 0) {
    throw new DecodeError(`Body length ${body.length} is not a multiple of ${INSTRUCTION_WIDTH}`);
  }

  const decoded: DecodedInstruction[] = [];
  for (let offset = 0; offset < body.length; offset += INSTRUCTION_WIDTH) {
    decoded.push({
      offset,
      opcode: body[offset],
      mnemonic: mnemonicOf(body[offset]),
      operands: [body[offset + 1], body[offset + 2], body[offset + 3]],
    });
  }
  return decoded;
}

/**
 * Reads a 16-bit operand, high byte first, starting at operand slot `at`
 * (0 or 1).
 */
export function readUint16(instruction: DecodedInstruction, at: 0 | 1): number {
  return (instruction.operands[at] << 8) | instruction.operands[at + 1];
}

/** Signed view of {@link readUint16}. */
export function readInt16(instruction: DecodedInstruction, at: 0 | 1): number {
  const value = readUint16(instruction, at);
  return value >= 0x8000 ? value - 0x10000 : value;
}

function hex(value: number, width: number): string {
  return value.toString(16).padStart(width, '0');
}

export function formatListing(decoded: DecodedInstruction[]): string {
  return decoded
    .map(i => `${hex(i.offset, 4)}: ${i.mnemonic.padEnd(5)} ${i.operands.map(b => hex(b, 2)).join(' ')}`)
    .join('\n');
}
