/**
 * LMC Assembler Parser
 *
 * Parses tokens into an AST: one statement per non-blank line, each an
 * optional label followed by exactly one instruction.
 */

import { Lexer, Token, TokenType } from './lexer.js';
import {
  Instruction,
  SymbolicOperand,
  isAddressMnemonic,
} from '../types/instruction.js';

export interface StatementNode {
  label?: string;
  instruction: Instruction<SymbolicOperand>;
  line: number;
  column: number;
}

export interface AST {
  statements: StatementNode[];
}

export class ParserError extends Error {
  constructor(message: string, public line: number, public column: number) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'ParserError';
  }
}

/**
 * A line-leading word made only of uppercase letters is taken for a
 * mnemonic, never a label, so `FOO HLT` is an unknown instruction.
 */
export function isLabelName(name: string): boolean {
  return name.length > 0 && !/^[A-Z]+$/.test(name);
}

export class Parser {
  private tokens: Token[] = [];
  private pos: number = 0;
  private source: string;

  constructor(source: string) {
    this.source = source;
  }

  parse(): AST {
    const lexer = new Lexer(this.source);
    this.tokens = lexer.tokenize();
    this.pos = 0;

    const statements: StatementNode[] = [];

    while (!this.isAtEnd()) {
      // Skip blank lines
      while (this.check(TokenType.NEWLINE)) {
        this.advance();
      }

      if (this.isAtEnd()) break;

      statements.push(this.parseStatement());
      this.expectEndOfStatement();
    }

    return { statements };
  }

  private parseStatement(): StatementNode {
    const token = this.peek();
    let label: string | undefined;

    if (token.type === TokenType.IDENTIFIER) {
      if (!isLabelName(token.value)) {
        throw new ParserError(`Unknown instruction '${token.value}'`, token.line, token.column);
      }
      label = token.value;
      this.advance();
    }

    const instruction = this.parseInstruction(label);

    return {
      ...(label !== undefined ? { label } : {}),
      instruction,
      line: token.line,
      column: token.column,
    };
  }

  private parseInstruction(label: string | undefined): Instruction<SymbolicOperand> {
    const token = this.peek();

    if (token.type !== TokenType.MNEMONIC) {
      const message = label !== undefined
        ? `Expected instruction after label '${label}', got '${describe(token)}'`
        : `Unexpected token '${describe(token)}'`;
      throw new ParserError(message, token.line, token.column);
    }
    this.advance();

    const mnemonic = token.value;

    if (mnemonic === 'DAT') {
      // DAT with no operand stores 0
      const next = this.peek();
      if (next.type === TokenType.NUMBER) {
        this.advance();
        return { op: 'DAT', value: next.value };
      }
      return { op: 'DAT', value: 0n };
    }

    if (isAddressMnemonic(mnemonic)) {
      return { op: mnemonic, operand: this.parseOperand(mnemonic) };
    }

    return { op: mnemonic };
  }

  private parseOperand(mnemonic: string): SymbolicOperand {
    const token = this.peek();

    switch (token.type) {
      case TokenType.NUMBER:
        this.advance();
        return { kind: 'number', value: token.value };
      case TokenType.IDENTIFIER:
      case TokenType.MNEMONIC:
        // An uppercase word in operand position still names a label
        this.advance();
        return { kind: 'label', name: token.value };
      case TokenType.POINTER:
        this.advance();
        return { kind: 'pointer', name: token.value };
      default:
        throw new ParserError(
          `Expected address, label or @label after ${mnemonic}, got '${describe(token)}'`,
          token.line,
          token.column
        );
    }
  }

  // Helper methods
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

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private expectEndOfStatement(): void {
    const token = this.peek();
    if (token.type === TokenType.NEWLINE || token.type === TokenType.EOF) {
      return;
    }
    throw new ParserError(
      `Unexpected token '${describe(token)}' after instruction`,
      token.line,
      token.column
    );
  }
}

function describe(token: Token): string {
  switch (token.type) {
    case TokenType.NEWLINE:
      return 'end of line';
    case TokenType.EOF:
      return 'end of input';
    case TokenType.POINTER:
      return `@${token.value}`;
    default:
      return String(token.value);
  }
}
