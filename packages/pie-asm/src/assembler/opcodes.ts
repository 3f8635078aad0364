/**
 * Opcode table
 *
 * Maps assembly mnemonics to the single-byte opcodes the register machine decodes.
 */

export enum Opcode {
  LOAD = 0,
  ADD = 1,
  SUB = 2,
  MUL = 3,
  DIV = 4,
  HLT = 5,
  JMP = 6,
  JMPF = 7,
  JMPB = 8,
  EQ = 9,
  NEQ = 10,
  GTE = 11,
  LTE = 12,
  LT = 13,
  GT = 14,
  JMPE = 15,
  NOP = 16,
  ALOC = 17,
  INC = 18,
  DEC = 19,
  DJMPE = 20,
  PRTS = 21,
  IGL = 255,
}

const MNEMONICS: ReadonlyMap<string, Opcode> = new Map([
  ['load', Opcode.LOAD],
  ['add', Opcode.ADD],
  ['sub', Opcode.SUB],
  ['mul', Opcode.MUL],
  ['div', Opcode.DIV],
  ['hlt', Opcode.HLT],
  ['jmp', Opcode.JMP],
  ['jmpf', Opcode.JMPF],
  ['jmpb', Opcode.JMPB],
  ['eq', Opcode.EQ],
  ['neq', Opcode.NEQ],
  ['gte', Opcode.GTE],
  ['lte', Opcode.LTE],
  ['lt', Opcode.LT],
  ['gt', Opcode.GT],
  ['jmpe', Opcode.JMPE],
  ['nop', Opcode.NOP],
  ['aloc', Opcode.ALOC],
  ['inc', Opcode.INC],
  ['dec', Opcode.DEC],
  ['djmpe', Opcode.DJMPE],
  ['prts', Opcode.PRTS],
  ['igl', Opcode.IGL],
]);

const NAMES: ReadonlyMap<number, string> = new Map(
  [...MNEMONICS].map(([name, opcode]) => [opcode, name])
);

/**
 * Unknown words become {@link Opcode.IGL} instead of failing, so the
 * parser accepts them and the encoder decides what to report.
 */
export function opcodeFromMnemonic(word: string): Opcode {
  return MNEMONICS.get(word.toLowerCase()) ?? Opcode.IGL;
}

export function mnemonicOf(opcode: number): string {
  return NAMES.get(opcode) ?? 'igl';
}
