/**
 * LMC Instruction Codec
 *
 * Packs an instruction into a single mailbox value and back. Every address
 * instruction owns a band of BAND_WIDTH values starting at its base code;
 * operand-less instructions use one fixed code each.
 */

import {
  AddressMnemonic,
  ExecutableInstruction,
  FixedMnemonic,
  Instruction,
  formatInstruction,
} from '../types/instruction.js';

/** Width of each opcode band; operands must lie in [0, BAND_WIDTH) */
export const BAND_WIDTH = 1000;

export const BAND_BASE: Record<AddressMnemonic, number> = {
  ADD: 1000,
  SUB: 2000,
  STA: 3000,
  LDA: 5000,
  BRA: 6000,
  BRZ: 7000,
  BRP: 8000,
  BWA: 11000,
  BWO: 12000,
  BWX: 13000,
};

export const FIXED_CODE: Record<FixedMnemonic, number> = {
  HLT: 1,
  INP: 901,
  OUT: 902,
  LDR: 4000,
  BWN: 10000,
};

// Decode order: fixed codes first, then bands in ascending order
const FIXED_OPS: readonly FixedMnemonic[] = ['HLT', 'INP', 'OUT', 'LDR', 'BWN'];
const BAND_OPS: readonly AddressMnemonic[] = [
  'ADD', 'SUB', 'STA', 'LDA', 'BRA', 'BRZ', 'BRP', 'BWA', 'BWO', 'BWX',
];

const FIXED_BY_CODE = new Map<bigint, FixedMnemonic>(
  FIXED_OPS.map((op): [bigint, FixedMnemonic] => [BigInt(FIXED_CODE[op]), op])
);

const BANDS = BAND_OPS.map((op) => ({ op, base: BigInt(BAND_BASE[op]) }));

const WIDTH = BigInt(BAND_WIDTH);

export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CodecError';
  }
}

export class DecodeError extends Error {
  constructor(public value: bigint) {
    super(`Unknown opcode ${value}`);
    this.name = 'DecodeError';
  }
}

/**
 * Encode an instruction into a mailbox value. DAT payloads are stored as-is.
 */
export function encode(instr: Instruction<number>): bigint {
  switch (instr.op) {
    case 'DAT':
      return BigInt.asIntN(64, instr.value);
    case 'HLT':
    case 'INP':
    case 'OUT':
    case 'BWN':
    case 'LDR':
      return BigInt(FIXED_CODE[instr.op]);
    default:
      if (!Number.isInteger(instr.operand) || instr.operand < 0 || instr.operand >= BAND_WIDTH) {
        throw new CodecError(
          `Operand ${instr.operand} of ${instr.op} does not fit in [0, ${BAND_WIDTH})`
        );
      }
      return BigInt(BAND_BASE[instr.op] + instr.operand);
  }
}

/**
 * Decode a mailbox value, or return null when it matches no opcode.
 */
export function tryDecode(value: bigint): ExecutableInstruction | null {
  const fixed = FIXED_BY_CODE.get(value);
  if (fixed !== undefined) {
    return { op: fixed };
  }

  for (const { op, base } of BANDS) {
    if (value >= base && value < base + WIDTH) {
      return { op, operand: Number(value - base) };
    }
  }

  return null;
}

export function decode(value: bigint): ExecutableInstruction {
  const instr = tryDecode(value);
  if (instr === null) {
    throw new DecodeError(value);
  }
  return instr;
}

/**
 * Encode a resolved program into its memory image.
 */
export function encodeProgram(instructions: readonly Instruction<number>[]): bigint[] {
  return instructions.map(encode);
}

/**
 * Render a mailbox value as the instruction it decodes to, or as data.
 */
export function disassemble(value: bigint): string {
  const instr = tryDecode(value);
  return formatInstruction(instr ?? { op: 'DAT', value });
}
