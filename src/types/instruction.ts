// Instruction set for the extended Little Man Computer

/** Mnemonics that carry a mailbox address */
export type AddressMnemonic =
  | 'ADD' | 'SUB' | 'STA' | 'LDA'
  | 'BRA' | 'BRZ' | 'BRP'
  | 'BWA' | 'BWO' | 'BWX';

/** Mnemonics encoded as a single fixed code */
export type FixedMnemonic = 'HLT' | 'INP' | 'OUT' | 'BWN' | 'LDR';

export type Mnemonic = AddressMnemonic | FixedMnemonic | 'DAT';

export const ADDRESS_MNEMONICS: ReadonlySet<string> = new Set<AddressMnemonic>([
  'ADD', 'SUB', 'STA', 'LDA',
  'BRA', 'BRZ', 'BRP',
  'BWA', 'BWO', 'BWX',
]);

export const FIXED_MNEMONICS: ReadonlySet<string> = new Set<FixedMnemonic>([
  'HLT', 'INP', 'OUT', 'BWN', 'LDR',
]);

export function isAddressMnemonic(word: string): word is AddressMnemonic {
  return ADDRESS_MNEMONICS.has(word);
}

export function isFixedMnemonic(word: string): word is FixedMnemonic {
  return FIXED_MNEMONICS.has(word);
}

export function isMnemonic(word: string): word is Mnemonic {
  return word === 'DAT' || isAddressMnemonic(word) || isFixedMnemonic(word);
}

export interface AddressInstruction<A> {
  op: AddressMnemonic;
  operand: A;
}

export interface FixedInstruction {
  op: FixedMnemonic;
}

/** Pseudo-instruction: the payload is written verbatim into its mailbox */
export interface DataInstruction {
  op: 'DAT';
  value: bigint;
}

/**
 * One line of a program. `A` is the operand type: symbolic while parsing,
 * a plain address once labels are resolved.
 */
export type Instruction<A = number> =
  | AddressInstruction<A>
  | FixedInstruction
  | DataInstruction;

/** Anything the machine can fetch and run (DAT is never decoded) */
export type ExecutableInstruction = AddressInstruction<number> | FixedInstruction;

// Operand as written in source, before label resolution
export type SymbolicOperand =
  | { kind: 'number'; value: bigint }
  | { kind: 'label'; name: string }
  | { kind: 'pointer'; name: string };

export function formatOperand(operand: SymbolicOperand): string {
  switch (operand.kind) {
    case 'number':
      return operand.value.toString();
    case 'label':
      return operand.name;
    case 'pointer':
      return `@${operand.name}`;
  }
}

/**
 * Render an instruction the way it would be written in source,
 * e.g. `ADD 12`, `HLT`, `DAT 7`.
 */
export function formatInstruction(instr: Instruction<number | SymbolicOperand>): string {
  switch (instr.op) {
    case 'DAT':
      return `DAT ${instr.value}`;
    case 'HLT':
    case 'INP':
    case 'OUT':
    case 'BWN':
    case 'LDR':
      return instr.op;
    default: {
      const operand = typeof instr.operand === 'number' ? instr.operand.toString() : formatOperand(instr.operand);
      return `${instr.op} ${operand}`;
    }
  }
}
