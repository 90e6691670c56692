/**
 * LMC Label Resolver
 *
 * Pass 1 maps every label to the address of its line; pass 2 rewrites each
 * symbolic operand into a concrete address. `@label` operands become the
 * label's address plus the memory size, which the machine reads as
 * "the real address is stored in that cell".
 */

import { AST, StatementNode } from './parser.js';
import { BAND_WIDTH } from '../emulator/codec.js';
import { Instruction, SymbolicOperand } from '../types/instruction.js';

export type AssemblerErrorKind =
  | 'syntax'
  | 'unknown-label'
  | 'duplicate-label'
  | 'operand-out-of-range';

export interface AssemblerError {
  kind: AssemblerErrorKind;
  message: string;
  line: number;
  column: number;
}

export interface ResolvedProgram {
  instructions: Instruction<number>[];
  symbols: Map<string, number>;
}

const I64_MIN = -(1n << 63n);
const I64_MAX = (1n << 63n) - 1n;

export class LabelResolver {
  private symbols: Map<string, number> = new Map();
  private errors: AssemblerError[] = [];

  constructor(private memorySize: number) {}

  /**
   * Resolve every operand in the AST. Errors are appended to `errors`;
   * the returned instructions are only meaningful when none were added.
   */
  resolve(ast: AST, errors: AssemblerError[]): ResolvedProgram {
    this.symbols = new Map();
    this.errors = errors;

    this.pass1(ast);

    if (this.errors.length > 0) {
      return { instructions: [], symbols: this.symbols };
    }

    const instructions = this.pass2(ast);

    return { instructions, symbols: this.symbols };
  }

  private pass1(ast: AST): void {
    // A label's address is the index of its line, DAT lines included
    ast.statements.forEach((stmt, address) => {
      if (stmt.label === undefined) return;

      if (this.symbols.has(stmt.label)) {
        this.errors.push({
          kind: 'duplicate-label',
          message: `Duplicate label '${stmt.label}'`,
          line: stmt.line,
          column: stmt.column,
        });
        return;
      }
      this.symbols.set(stmt.label, address);
    });
  }

  private pass2(ast: AST): Instruction<number>[] {
    const instructions: Instruction<number>[] = [];

    for (const stmt of ast.statements) {
      const instr = stmt.instruction;

      switch (instr.op) {
        case 'DAT':
          if (instr.value < I64_MIN || instr.value > I64_MAX) {
            this.error(stmt, 'operand-out-of-range', `DAT value ${instr.value} does not fit in 64 bits`);
          }
          instructions.push({ op: 'DAT', value: instr.value });
          break;
        case 'HLT':
        case 'INP':
        case 'OUT':
        case 'BWN':
        case 'LDR':
          instructions.push({ op: instr.op });
          break;
        default: {
          const address = this.resolveOperand(stmt, instr.op, instr.operand);
          instructions.push({ op: instr.op, operand: address ?? 0 });
        }
      }
    }

    return this.errors.length > 0 ? [] : instructions;
  }

  private resolveOperand(stmt: StatementNode, op: string, operand: SymbolicOperand): number | null {
    switch (operand.kind) {
      case 'number':
        if (operand.value >= BigInt(BAND_WIDTH)) {
          this.error(
            stmt,
            'operand-out-of-range',
            `Operand ${operand.value} of ${op} does not fit in [0, ${BAND_WIDTH})`
          );
          return null;
        }
        return Number(operand.value);

      case 'label':
      case 'pointer': {
        const address = this.symbols.get(operand.name);
        if (address === undefined) {
          this.error(stmt, 'unknown-label', `Unknown label '${operand.name}'`);
          return null;
        }
        if (operand.kind === 'label') {
          return address;
        }
        // A pointer past the band would be read back as the next opcode
        const pointer = address + this.memorySize;
        if (pointer >= BAND_WIDTH) {
          this.error(
            stmt,
            'operand-out-of-range',
            `Operand ${pointer} of ${op} does not fit in [0, ${BAND_WIDTH})`
          );
          return null;
        }
        return pointer;
      }
    }
  }

  private error(stmt: StatementNode, kind: AssemblerErrorKind, message: string): void {
    this.errors.push({ kind, message, line: stmt.line, column: stmt.column });
  }
}
