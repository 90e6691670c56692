/**
 * Splits LMC source into words, `@label` pointers, decimal literals and
 * line breaks. Comments start with `;` or `#`.
 */

import { Mnemonic, isMnemonic } from '../types/instruction.js';

export enum TokenType {
  // Words
  MNEMONIC = 'MNEMONIC',
  IDENTIFIER = 'IDENTIFIER',
  POINTER = 'POINTER',

  // Literals
  NUMBER = 'NUMBER',

  NEWLINE = 'NEWLINE',
  EOF = 'EOF',
}

interface TokenPosition {
  line: number;
  column: number;
}

export type Token = TokenPosition & (
  | { type: TokenType.MNEMONIC; value: Mnemonic }
  | { type: TokenType.IDENTIFIER; value: string }
  // `@name`; value holds the name without the sigil
  | { type: TokenType.POINTER; value: string }
  | { type: TokenType.NUMBER; value: bigint }
  | { type: TokenType.NEWLINE; value: '\n' }
  | { type: TokenType.EOF; value: '' }
);

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
      case '#':
        // Comment runs to end of line
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
        break;

      case '@':
        this.scanPointer(startLine, startColumn);
        break;

      default:
        if (this.isDigit(char)) {
          this.scanNumber(char, startLine, startColumn);
        } else if (this.isIdentifierStart(char)) {
          this.scanWord(char, startLine, startColumn);
        } else {
          throw new LexerError(`Unexpected character '${char}'`, startLine, startColumn);
        }
    }
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isIdentifierStart(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
  }

  private isIdentifierPart(char: string): boolean {
    return this.isIdentifierStart(char) || this.isDigit(char);
  }

  private readIdentifierRest(): string {
    let name = '';
    while (!this.isAtEnd() && this.isIdentifierPart(this.peek())) {
      name += this.advance();
    }
    return name;
  }

  private scanNumber(first: string, startLine: number, startColumn: number): void {
    let digits = first;
    while (!this.isAtEnd() && this.isDigit(this.peek())) {
      digits += this.advance();
    }

    if (this.isIdentifierStart(this.peek())) {
      throw new LexerError(`Invalid number '${digits}${this.peek()}'`, startLine, startColumn);
    }

    this.tokens.push({
      type: TokenType.NUMBER,
      value: BigInt(digits),
      line: startLine,
      column: startColumn,
    });
  }

  private scanPointer(startLine: number, startColumn: number): void {
    if (!this.isIdentifierStart(this.peek())) {
      throw new LexerError(`Expected label name after '@'`, startLine, startColumn);
    }

    const name = this.advance() + this.readIdentifierRest();
    this.tokens.push({
      type: TokenType.POINTER,
      value: name,
      line: startLine,
      column: startColumn,
    });
  }

  private scanWord(first: string, startLine: number, startColumn: number): void {
    const name = first + this.readIdentifierRest();

    // Mnemonics are case-sensitive: `out` is a label, `OUT` an instruction
    if (isMnemonic(name)) {
      this.tokens.push({
        type: TokenType.MNEMONIC,
        value: name,
        line: startLine,
        column: startColumn,
      });
      return;
    }

    this.tokens.push({
      type: TokenType.IDENTIFIER,
      value: name,
      line: startLine,
      column: startColumn,
    });
  }
}
