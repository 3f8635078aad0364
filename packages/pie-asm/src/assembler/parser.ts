/**
 * PIE Assembler Parser
 *
 * Parses tokens into a Program of instruction records:
 *
 *   [label:] (opcode | .directive) [operand [operand [operand]]]
 *
 * A label may sit alone on its line and then belongs to the next
 * instruction. Parsing is all or nothing; the first problem aborts.
 */

import {
  Lexer,
  Token,
  TokenType,
  OperandToken,
  OpcodeToken,
  DirectiveToken,
} from './lexer.js';
import { Instruction, NodeType, Program } from './program.js';

export const MAX_OPERANDS = 3;

interface Position {
  line: number;
  column: number;
}

export class ParserError extends Error {
  constructor(message: string, public line: number, public column: number) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'ParserError';
  }
}

export class Parser {
  private tokens: Token[] = [];
  private pos: number = 0;
  private source: string;

  constructor(source: string) {
    this.source = source;
  }

  parse(): Program {
    const lexer = new Lexer(this.source);
    this.tokens = lexer.tokenize();
    this.pos = 0;

    const instructions: Instruction[] = [];

    this.skipNewlines();
    while (!this.isAtEnd()) {
      instructions.push(this.parseInstruction());
      this.expectEndOfStatement();
      this.skipNewlines();
    }

    if (instructions.length === 0) {
      const token = this.peek();
      throw new ParserError('Expected at least one instruction', token.line, token.column);
    }

    return new Program(instructions);
  }

  private parseInstruction(): Instruction {
    let label: string | undefined;

    // Positions refer to the label when there is one
    const first = this.peek();
    const at = { line: first.line, column: first.column };
    if (first.type === TokenType.LABEL_DEF) {
      this.advance();
      label = first.value;
      this.skipNewlines();
    }

    const token = this.peek();

    if (token.type === TokenType.OPCODE) {
      this.advance();
      return this.parseOpcodeInstruction(token, label, at);
    }

    if (token.type === TokenType.DIRECTIVE) {
      this.advance();
      return this.parseDirective(token, label, at);
    }

    if (label !== undefined) {
      throw new ParserError(
        `Expected opcode or directive after label '${label}', got ${describe(token)}`,
        token.line,
        token.column
      );
    }

    throw new ParserError(
      `Expected label, opcode or directive, got ${describe(token)}`,
      token.line,
      token.column
    );
  }

  private parseOpcodeInstruction(token: OpcodeToken, label: string | undefined, at: Position): Instruction {
    return {
      type: NodeType.INSTRUCTION,
      label,
      opcode: token.opcode,
      mnemonic: token.value,
      operands: this.parseOperands(),
      ...at,
    };
  }

  private parseDirective(token: DirectiveToken, label: string | undefined, at: Position): Instruction {
    return {
      type: NodeType.DIRECTIVE,
      label,
      name: token.value,
      operands: this.parseOperands(),
      ...at,
    };
  }

  private parseOperands(): OperandToken[] {
    const operands: OperandToken[] = [];
    while (operands.length < MAX_OPERANDS) {
      const operand = this.parseOperand();
      if (!operand) break;
      operands.push(operand);
    }
    return operands;
  }

  /**
   * Alternatives are tried as integer, label usage, register, string. The
   * prefixes never overlap, so the order only decides which check runs first.
   */
  private parseOperand(): OperandToken | null {
    const token = this.peek();
    switch (token.type) {
      case TokenType.INTEGER:
      case TokenType.LABEL_USAGE:
      case TokenType.REGISTER:
      case TokenType.STRING:
        this.advance();
        return token;
      default:
        return null;
    }
  }

  private expectEndOfStatement(): void {
    const token = this.peek();
    if (token.type === TokenType.NEWLINE || token.type === TokenType.EOF) {
      return;
    }
    throw new ParserError(
      `Unexpected ${describe(token)}, expected end of line`,
      token.line,
      token.column
    );
  }

  // Helper methods
  private skipNewlines(): void {
    while (this.peek().type === TokenType.NEWLINE) {
      this.advance();
    }
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.pos++;
    }
    return this.tokens[this.pos - 1];
  }
}

function describe(token: Token): string {
  switch (token.type) {
    case TokenType.EOF:
      return 'end of input';
    case TokenType.NEWLINE:
      return 'end of line';
    case TokenType.STRING:
      return `string '${token.value}'`;
    case TokenType.DIRECTIVE:
      return `directive '.${token.value}'`;
    case TokenType.LABEL_DEF:
      return `label '${token.value}:'`;
    case TokenType.LABEL_USAGE:
      return `label reference '@${token.value}'`;
    case TokenType.REGISTER:
      return `register '$${token.value}'`;
    case TokenType.INTEGER:
      return `integer '#${token.value}'`;
    case TokenType.OPCODE:
      return `opcode '${token.value}'`;
  }
}

export function parse(source: string): Program {
  return new Parser(source).parse();
}
