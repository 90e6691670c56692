/**
 * LMC Assembler
 *
 * Two-pass assembler that turns LMC assembly source into resolved
 * instructions, one per mailbox.
 */

import { Parser, AST, ParserError } from './parser.js';
import { LexerError } from './lexer.js';
import { AssemblerError, LabelResolver } from './resolver.js';
import { resolveConfig } from '../config.js';
import { Instruction } from '../types/instruction.js';

export interface AssemblerOptions {
  /** Memory size used to encode `@label` pointers (default 100) */
  memorySize?: number;
}

export interface AssemblerResult {
  instructions: Instruction<number>[];
  symbols: Map<string, number>;
  errors: AssemblerError[];
}

export class Assembler {
  private source: string;
  private memorySize: number;

  constructor(source: string, options: AssemblerOptions = {}) {
    this.source = source;
    // Throws ConfigError for sizes the machine could not be built with
    this.memorySize = resolveConfig({ memorySize: options.memorySize }).memorySize;
  }

  assemble(): AssemblerResult {
    const errors: AssemblerError[] = [];

    let ast: AST;
    try {
      ast = new Parser(this.source).parse();
    } catch (e: unknown) {
      if (e instanceof LexerError || e instanceof ParserError) {
        errors.push({
          kind: 'syntax',
          message: e.message,
          line: e.line,
          column: e.column,
        });
        return { instructions: [], symbols: new Map(), errors };
      }
      throw e;
    }

    const resolver = new LabelResolver(this.memorySize);
    const { instructions, symbols } = resolver.resolve(ast, errors);

    return {
      instructions: errors.length > 0 ? [] : instructions,
      symbols,
      errors,
    };
  }
}

/**
 * Assemble source text in one call.
 */
export function assemble(source: string, options: AssemblerOptions = {}): AssemblerResult {
  return new Assembler(source, options).assemble();
}
