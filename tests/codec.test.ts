import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  BAND_BASE,
  BAND_WIDTH,
  CodecError,
  DecodeError,
  FIXED_CODE,
  decode,
  disassemble,
  encode,
  encodeProgram,
  tryDecode,
} from '../src/emulator/codec.js';
import { AddressMnemonic, FixedMnemonic, formatInstruction } from '../src/types/instruction.js';

const ADDRESS_OPS: AddressMnemonic[] = ['ADD', 'SUB', 'STA', 'LDA', 'BRA', 'BRZ', 'BRP', 'BWA', 'BWO', 'BWX'];
const FIXED_OPS: FixedMnemonic[] = ['HLT', 'INP', 'OUT', 'BWN', 'LDR'];

describe('Instruction codec', () => {
  describe('encode', () => {
    it('should add the operand to the band base', () => {
      expect(encode({ op: 'ADD', operand: 5 })).toBe(1005n);
      expect(encode({ op: 'SUB', operand: 0 })).toBe(2000n);
      expect(encode({ op: 'STA', operand: 99 })).toBe(3099n);
      expect(encode({ op: 'LDA', operand: 150 })).toBe(5150n);
      expect(encode({ op: 'BRA', operand: 7 })).toBe(6007n);
      expect(encode({ op: 'BRZ', operand: 7 })).toBe(7007n);
      expect(encode({ op: 'BRP', operand: 7 })).toBe(8007n);
      expect(encode({ op: 'BWA', operand: 1 })).toBe(11001n);
      expect(encode({ op: 'BWO', operand: 1 })).toBe(12001n);
      expect(encode({ op: 'BWX', operand: 1 })).toBe(13001n);
    });

    it('should use fixed codes for operand-less instructions', () => {
      expect(encode({ op: 'HLT' })).toBe(1n);
      expect(encode({ op: 'INP' })).toBe(901n);
      expect(encode({ op: 'OUT' })).toBe(902n);
      expect(encode({ op: 'BWN' })).toBe(10000n);
      expect(encode({ op: 'LDR' })).toBe(4000n);
    });

    it('should write DAT payloads verbatim', () => {
      expect(encode({ op: 'DAT', value: 0n })).toBe(0n);
      expect(encode({ op: 'DAT', value: 1005n })).toBe(1005n);
      expect(encode({ op: 'DAT', value: -42n })).toBe(-42n);
    });

    it('should refuse operands outside the band width', () => {
      expect(() => encode({ op: 'ADD', operand: BAND_WIDTH })).toThrow(CodecError);
      expect(() => encode({ op: 'ADD', operand: -1 })).toThrow('Operand -1 of ADD does not fit in [0, 1000)');
      expect(() => encode({ op: 'STA', operand: 1.5 })).toThrow(CodecError);
    });

    it('should encode a whole program', () => {
      expect(encodeProgram([{ op: 'INP' }, { op: 'STA', operand: 3 }, { op: 'HLT' }, { op: 'DAT', value: 9n }])).toEqual([
        901n,
        3003n,
        1n,
        9n,
      ]);
    });
  });

  describe('decode', () => {
    it('should decode fixed codes', () => {
      expect(decode(1n)).toEqual({ op: 'HLT' });
      expect(decode(901n)).toEqual({ op: 'INP' });
      expect(decode(902n)).toEqual({ op: 'OUT' });
      expect(decode(4000n)).toEqual({ op: 'LDR' });
      expect(decode(10000n)).toEqual({ op: 'BWN' });
    });

    it('should decode band edges', () => {
      expect(decode(1000n)).toEqual({ op: 'ADD', operand: 0 });
      expect(decode(1999n)).toEqual({ op: 'ADD', operand: 999 });
      expect(decode(13999n)).toEqual({ op: 'BWX', operand: 999 });
    });

    it('should reject values outside every band', () => {
      for (const value of [0n, 2n, 900n, 903n, 4001n, 4999n, 9000n, 9999n, 10001n, 14000n, -1n]) {
        expect(tryDecode(value)).toBeNull();
      }
    });

    it('should throw DecodeError carrying the value', () => {
      let caught: unknown;
      try {
        decode(4500n);
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(DecodeError);
      expect(caught).toMatchObject({ value: 4500n, message: 'Unknown opcode 4500' });
    });
  });

  describe('round trip', () => {
    it('should decode every encoded address instruction back to itself', () => {
      fc.assert(
        fc.property(
          fc.constantFrom(...ADDRESS_OPS),
          fc.integer({ min: 0, max: BAND_WIDTH - 1 }),
          (op, operand) => {
            expect(decode(encode({ op, operand }))).toEqual({ op, operand });
          }
        )
      );
    });

    it('should decode every fixed instruction back to itself', () => {
      for (const op of FIXED_OPS) {
        expect(decode(encode({ op }))).toEqual({ op });
      }
    });

    it('should keep bands disjoint from fixed codes', () => {
      const fixed = new Set(Object.values(FIXED_CODE));
      for (const base of Object.values(BAND_BASE)) {
        for (const code of fixed) {
          expect(code >= base && code < base + BAND_WIDTH).toBe(false);
        }
      }
    });
  });

  describe('disassemble', () => {
    it('should render instructions as source', () => {
      expect(disassemble(1005n)).toBe('ADD 5');
      expect(disassemble(902n)).toBe('OUT');
      expect(disassemble(5154n)).toBe('LDA 154');
    });

    it('should render undecodable cells as data', () => {
      expect(disassemble(0n)).toBe('DAT 0');
      expect(disassemble(-7n)).toBe('DAT -7');
    });

    it('should format symbolic operands', () => {
      expect(formatInstruction({ op: 'STA', operand: { kind: 'pointer', name: 'pos' } })).toBe('STA @pos');
      expect(formatInstruction({ op: 'BRA', operand: { kind: 'label', name: 'loop' } })).toBe('BRA loop');
      expect(formatInstruction({ op: 'ADD', operand: { kind: 'number', value: 3n } })).toBe('ADD 3');
    });
  });
});
