/**
 * PIE Assembler Lexer
 *
 * Tokenizes register-machine assembly source into tokens for parsing.
 */

import { Opcode, opcodeFromMnemonic } from './opcodes.js';

export enum TokenType {
  // Instructions and labels
  OPCODE = 'OPCODE',
  LABEL_DEF = 'LABEL_DEF',
  LABEL_USAGE = 'LABEL_USAGE',

  // Operands
  REGISTER = 'REGISTER',
  INTEGER = 'INTEGER',
  STRING = 'STRING',

  // Directives
  DIRECTIVE = 'DIRECTIVE',

  NEWLINE = 'NEWLINE',
  EOF = 'EOF',
}

interface TokenPosition {
  line: number;
  column: number;
}

export interface OpcodeToken extends TokenPosition {
  type: TokenType.OPCODE;
  value: string;
  opcode: Opcode;
}

export interface RegisterToken extends TokenPosition {
  type: TokenType.REGISTER;
  value: number;
}

export interface IntegerToken extends TokenPosition {
  type: TokenType.INTEGER;
  value: number;
}

export interface LabelDefToken extends TokenPosition {
  type: TokenType.LABEL_DEF;
  value: string;
}

export interface LabelUsageToken extends TokenPosition {
  type: TokenType.LABEL_USAGE;
  value: string;
}

export interface DirectiveToken extends TokenPosition {
  type: TokenType.DIRECTIVE;
  value: string;
}

export interface StringToken extends TokenPosition {
  type: TokenType.STRING;
  value: string;
}

export interface NewlineToken extends TokenPosition {
  type: TokenType.NEWLINE;
  value: '\n';
}

export interface EofToken extends TokenPosition {
  type: TokenType.EOF;
  value: '';
}

export type Token =
  | OpcodeToken
  | RegisterToken
  | IntegerToken
  | LabelDefToken
  | LabelUsageToken
  | DirectiveToken
  | StringToken
  | NewlineToken
  | EofToken;

/** Tokens that may stand in an operand position. */
export type OperandToken = IntegerToken | LabelUsageToken | RegisterToken | StringToken;

export const MAX_REGISTER_INDEX = 0xff;

export class LexerError extends Error {
  constructor(message: string, public line: number, public column: number) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'LexerError';
  }
}

export class Lexer {
  private source: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private tokens: Token[] = [];

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (!this.isAtEnd()) {
      this.scanToken();
    }

    this.tokens.push({
      type: TokenType.EOF,
      value: '',
      line: this.line,
      column: this.column,
    });

    return this.tokens;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.source[this.pos];
  }

  private advance(): string {
    const char = this.source[this.pos++];
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private scanToken(): void {
    const startLine = this.line;
    const startColumn = this.column;
    const char = this.advance();

    switch (char) {
      case ' ':
      case '\t':
      case '\r':
        break;

      case '\n':
        this.tokens.push({
          type: TokenType.NEWLINE,
          value: '\n',
          line: startLine,
          column: startColumn,
        });
        break;

      case ';':
        // Comment runs to end of line
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
        break;

      case '$':
        this.scanRegister(startLine, startColumn);
        break;

      case '#':
        this.scanInteger(startLine, startColumn);
        break;

      case '@':
        this.scanLabelUsage(startLine, startColumn);
        break;

      case '.':
        this.scanDirective(startLine, startColumn);
        break;

      case "'":
        this.scanString(startLine, startColumn);
        break;

      default:
        // Label names may start with a digit, so words do too
        if (this.isAlphaNumeric(char)) {
          this.pos--; // Put back the character
          this.column--;
          this.scanWord(startLine, startColumn);
        } else {
          throw new LexerError(`Unexpected character '${char}'`, startLine, startColumn);
        }
    }
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char) || char === '_';
  }

  private scanDigits(): string {
    let digits = '';
    while (!this.isAtEnd() && this.isDigit(this.peek())) {
      digits += this.advance();
    }
    return digits;
  }

  private scanIdentifier(): string {
    let name = '';
    while (!this.isAtEnd() && this.isAlphaNumeric(this.peek())) {
      name += this.advance();
    }
    return name;
  }

  private scanRegister(startLine: number, startColumn: number): void {
    const digits = this.scanDigits();
    if (digits === '') {
      throw new LexerError("Expected register number after '$'", startLine, startColumn);
    }

    const index = parseInt(digits, 10);
    if (index > MAX_REGISTER_INDEX) {
      throw new LexerError(`Register index ${index} does not fit in a byte`, startLine, startColumn);
    }

    this.tokens.push({
      type: TokenType.REGISTER,
      value: index,
      line: startLine,
      column: startColumn,
    });
  }

  private scanInteger(startLine: number, startColumn: number): void {
    let negative = false;
    if (this.peek() === '-' || this.peek() === '+') {
      negative = this.advance() === '-';
    }

    const digits = this.scanDigits();
    if (digits === '') {
      throw new LexerError("Expected digits after '#'", startLine, startColumn);
    }

    // Range is checked by the encoder
    const magnitude = parseInt(digits, 10);

    this.tokens.push({
      type: TokenType.INTEGER,
      value: negative ? -magnitude : magnitude,
      line: startLine,
      column: startColumn,
    });
  }

  private scanLabelUsage(startLine: number, startColumn: number): void {
    if (!this.isAlphaNumeric(this.peek())) {
      throw new LexerError("Expected label name after '@'", startLine, startColumn);
    }

    this.tokens.push({
      type: TokenType.LABEL_USAGE,
      value: this.scanIdentifier(),
      line: startLine,
      column: startColumn,
    });
  }

  private scanDirective(startLine: number, startColumn: number): void {
    let name = '';
    while (!this.isAtEnd() && this.isAlpha(this.peek())) {
      name += this.advance();
    }

    if (name === '') {
      throw new LexerError("Expected directive name after '.'", startLine, startColumn);
    }

    this.tokens.push({
      type: TokenType.DIRECTIVE,
      value: name,
      line: startLine,
      column: startColumn,
    });
  }

  private scanString(startLine: number, startColumn: number): void {
    let value = '';

    while (!this.isAtEnd() && this.peek() !== "'") {
      if (this.peek() === '\n') {
        throw new LexerError('Unterminated string literal', startLine, startColumn);
      }
      value += this.advance();
    }

    if (this.isAtEnd()) {
      throw new LexerError('Unterminated string literal', startLine, startColumn);
    }

    this.advance(); // consume closing quote

    this.tokens.push({
      type: TokenType.STRING,
      value,
      line: startLine,
      column: startColumn,
    });
  }

  private scanWord(startLine: number, startColumn: number): void {
    const name = this.scanIdentifier();

    // Label definition: identifier immediately followed by a colon
    if (this.peek() === ':') {
      this.advance();
      this.tokens.push({
        type: TokenType.LABEL_DEF,
        value: name,
        line: startLine,
        column: startColumn,
      });
      return;
    }

    if (![...name].every(c => this.isAlpha(c))) {
      throw new LexerError(`Unexpected identifier '${name}'`, startLine, startColumn);
    }

    this.tokens.push({
      type: TokenType.OPCODE,
      value: name,
      opcode: opcodeFromMnemonic(name),
      line: startLine,
      column: startColumn,
    });
  }
}
