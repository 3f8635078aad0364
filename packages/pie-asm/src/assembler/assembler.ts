/**
 * PIE Assembler
 *
 * Two-pass assembler that turns register-machine assembly into a PIE
 * artifact: a 65-byte header (bytes 0..64) followed by one 4-byte word
 * per opcode instruction.
 *
 * Pass 1 walks the program once to declare labels, open sections and lay
 * out string constants in the read-only segment. Pass 2 walks it again and
 * encodes every opcode instruction against the finished symbol table.
 * Every instruction, directive or not, advances the address cursor by one
 * word, so a label's offset is its instruction index times four.
 */

import { LexerError, TokenType } from './lexer.js';
import { Parser, ParserError } from './parser.js';
import { Program, Instruction, DirectiveInstruction, isDirective } from './program.js';
import { encodeInstruction, writePieHeader, INSTRUCTION_WIDTH } from './encoder.js';
import { SymbolTable, labelSymbol } from './symbols.js';
import { Section, sectionFromName } from './sections.js';
import type { AssemblerError, AssemblerWarning } from './diagnostics.js';

export enum AssemblerPhase {
  First = 'first',
  Second = 'second',
}

/** Number of section directives a complete program declares. */
export const REQUIRED_SECTIONS = 2;

export interface AssemblerState {
  phase: AssemblerPhase;
  symbols: SymbolTable;
  readOnly: number[];
  readOnlyOffset: number;
  bytecode: number[];
  sections: Section[];
  currentSection?: Section;
  currentInstruction: number;
  address: number;
  errors: AssemblerError[];
  warnings: AssemblerWarning[];
}

export interface AssemblerResult {
  /** Header followed by body; empty whenever errors is not. */
  bytes: Uint8Array;
  readOnly: Uint8Array;
  symbols: Map<string, number>;
  sections: Section[];
  errors: AssemblerError[];
  warnings: AssemblerWarning[];
}

export interface FragmentResult {
  bytes: Uint8Array;
  symbols: Map<string, number>;
  errors: AssemblerError[];
  warnings: AssemblerWarning[];
}

function createState(): AssemblerState {
  return {
    phase: AssemblerPhase.First,
    symbols: new SymbolTable(),
    readOnly: [],
    readOnlyOffset: 0,
    bytecode: [],
    sections: [],
    currentSection: undefined,
    currentInstruction: 0,
    address: 0,
    errors: [],
    warnings: [],
  };
}

const textEncoder = new TextEncoder();

export class Assembler {
  private source: string;

  constructor(source: string) {
    this.source = source;
  }

  assemble(): AssemblerResult {
    const state = createState();

    const program = parseOrReport(this.source, state.errors);
    if (!program) {
      return this.failure(state);
    }

    this.firstPass(program, state);

    if (state.errors.length > 0) {
      return this.failure(state);
    }

    if (state.sections.length !== REQUIRED_SECTIONS) {
      state.errors.push({
        kind: 'InsufficientSections',
        message: `Expected exactly ${REQUIRED_SECTIONS} section directives (.data and .code), found ${state.sections.length}`,
      });
      return this.failure(state);
    }

    this.secondPass(program, state);

    if (state.errors.length > 0) {
      return this.failure(state);
    }

    const header = writePieHeader();
    const bytes = new Uint8Array(header.length + state.bytecode.length);
    bytes.set(header);
    bytes.set(state.bytecode, header.length);

    return {
      bytes,
      readOnly: new Uint8Array(state.readOnly),
      symbols: state.symbols.toMap(),
      sections: state.sections,
      errors: [],
      warnings: state.warnings,
    };
  }

  private failure(state: AssemblerState): AssemblerResult {
    return {
      bytes: new Uint8Array(),
      readOnly: new Uint8Array(state.readOnly),
      symbols: state.symbols.toMap(),
      sections: state.sections,
      errors: state.errors,
      warnings: state.warnings,
    };
  }

  private firstPass(program: Program, state: AssemblerState): void {
    state.address = 0;
    state.currentInstruction = 0;

    for (const instruction of program.instructions) {
      const declared = instruction.label !== undefined
        ? this.declareLabel(instruction, instruction.label, state)
        : false;

      if (isDirective(instruction)) {
        this.processDirective(instruction, declared, state);
      }

      state.address += INSTRUCTION_WIDTH;
      state.currentInstruction++;
    }

    state.phase = AssemblerPhase.Second;
  }

  private declareLabel(instruction: Instruction, name: string, state: AssemblerState): boolean {
    if (!state.currentSection) {
      state.errors.push({
        kind: 'NoSegmentDeclarationFound',
        message: `Label '${name}' declared before any .data or .code section`,
        line: instruction.line,
        column: instruction.column,
        instruction: state.currentInstruction,
      });
      return false;
    }

    if (state.symbols.has(name)) {
      state.errors.push({
        kind: 'SymbolAlreadyDeclared',
        message: `Symbol '${name}' is already declared`,
        line: instruction.line,
        column: instruction.column,
        instruction: state.currentInstruction,
      });
      return false;
    }

    state.symbols.add(labelSymbol(name, state.address));
    return true;
  }

  private processDirective(instruction: DirectiveInstruction, labelDeclared: boolean, state: AssemblerState): void {
    const name = instruction.name.toLowerCase();

    if (name === 'asciiz') {
      // Laid out once; pass 2 sees it as already handled
      if (state.phase === AssemblerPhase.First) {
        this.processAsciiz(instruction, labelDeclared, state);
      }
      return;
    }

    const kind = sectionFromName(name);
    if (kind === 'unknown') {
      if (state.phase === AssemblerPhase.First) {
        state.warnings.push({
          kind: 'UnknownDirective',
          message: `Unknown directive '.${instruction.name}' ignored`,
          line: instruction.line,
          column: instruction.column,
          instruction: state.currentInstruction,
        });
      }
      return;
    }

    const section: Section = { kind, startingInstruction: state.currentInstruction };
    if (state.phase === AssemblerPhase.First) {
      state.sections.push(section);
    }
    state.currentSection = section;
  }

  private processAsciiz(instruction: DirectiveInstruction, labelDeclared: boolean, state: AssemblerState): void {
    if (instruction.label === undefined) {
      state.errors.push({
        kind: 'StringConstantDeclaredWithoutLabel',
        message: 'String constant declared without a label',
        line: instruction.line,
        column: instruction.column,
        instruction: state.currentInstruction,
      });
      return;
    }

    const [operand] = instruction.operands;
    if (operand === undefined || operand.type !== TokenType.STRING) {
      state.errors.push({
        kind: 'MissingStringOperand',
        message: `.asciiz for '${instruction.label}' needs a quoted string`,
        line: instruction.line,
        column: instruction.column,
        instruction: state.currentInstruction,
      });
      return;
    }

    // The label points at the first byte of the string
    if (labelDeclared) {
      state.symbols.setOffset(instruction.label, state.readOnlyOffset);
    }

    for (const byte of textEncoder.encode(operand.value)) {
      state.readOnly.push(byte);
      state.readOnlyOffset++;
    }
    state.readOnly.push(0);
    state.readOnlyOffset++;
  }

  private secondPass(program: Program, state: AssemblerState): void {
    state.address = 0;
    state.currentInstruction = 0;
    state.currentSection = undefined;

    for (const instruction of program.instructions) {
      if (isDirective(instruction)) {
        this.processDirective(instruction, false, state);
      } else {
        const word = encodeInstruction(instruction, state.symbols, state.currentInstruction);
        state.bytecode.push(...word.bytes);
        state.errors.push(...word.errors);
        state.warnings.push(...word.warnings);
      }

      state.address += INSTRUCTION_WIDTH;
      state.currentInstruction++;
    }
  }
}

export function assemble(source: string): AssemblerResult {
  return new Assembler(source).assemble();
}

/**
 * Encodes a loose fragment, such as a single line typed at a prompt,
 * without the header or the section rules. Labels in the fragment resolve
 * with the same one-word-per-instruction accounting.
 */
export function assembleFragment(source: string): FragmentResult {
  const errors: AssemblerError[] = [];
  const symbols = new SymbolTable();

  const program = parseOrReport(source, errors);
  if (!program) {
    return { bytes: new Uint8Array(), symbols: symbols.toMap(), errors, warnings: [] };
  }

  program.instructions.forEach((instruction, index) => {
    if (instruction.label === undefined) return;
    if (symbols.has(instruction.label)) {
      errors.push({
        kind: 'SymbolAlreadyDeclared',
        message: `Symbol '${instruction.label}' is already declared`,
        line: instruction.line,
        column: instruction.column,
        instruction: index,
      });
      return;
    }
    symbols.add(labelSymbol(instruction.label, index * INSTRUCTION_WIDTH));
  });

  const flattened = program.toBytes(symbols);
  errors.push(...flattened.errors);

  return {
    bytes: errors.length > 0 ? new Uint8Array() : flattened.bytes,
    symbols: symbols.toMap(),
    errors,
    warnings: flattened.warnings,
  };
}

function parseOrReport(source: string, errors: AssemblerError[]): Program | null {
  try {
    return new Parser(source).parse();
  } catch (e: unknown) {
    if (e instanceof LexerError || e instanceof ParserError) {
      errors.push({
        kind: 'ParseError',
        message: e.message,
        line: e.line,
        column: e.column,
      });
      return null;
    }
    throw e;
  }
}
