/**
 * LMC Virtual Machine
 *
 * Accumulator machine over a flat array of signed 64-bit mailboxes.
 * Execution is driven one cycle at a time by the host through `step()`;
 * an INP with no buffered value suspends until `input()` supplies one.
 */

import { assemble } from '../assembler/assembler.js';
import { AssemblerError } from '../assembler/resolver.js';
import { MachineConfig, ResolvedMachineConfig, resolveConfig } from '../config.js';
import { ExecutableInstruction } from '../types/instruction.js';
import { encodeProgram, tryDecode } from './codec.js';

export type FaultReason =
  | 'address-out-of-range'
  | 'pointer-out-of-range'
  | 'indirection-too-deep'
  | 'unknown-opcode';

export interface Fault {
  reason: FaultReason;
  /** Address of the instruction that faulted */
  pc: number;
  /** The offending address, pointer or opcode */
  value: bigint;
  message: string;
}

export type StepResult =
  | { kind: 'advanced' }
  | { kind: 'output'; value: bigint }
  | { kind: 'input-required' }
  | { kind: 'halted' }
  | { kind: 'fault'; fault: Fault };

export type MachineStatus = 'running' | 'awaiting-input' | 'halted' | 'faulted';

export interface MachineState {
  pc: number;
  accumulator: bigint;
  cycles: number;
  status: MachineStatus;
  pendingInput: bigint | null;
  lastAccessed: number | null;
  memory: BigInt64Array;
}

export interface CompileResult {
  /** Number of mailboxes the program occupies */
  size: number;
  symbols: Map<string, number>;
}

export type VmErrorCode = 'compile-failed' | 'program-too-large';

export class VmError extends Error {
  constructor(
    public code: VmErrorCode,
    message: string,
    public diagnostics: AssemblerError[] = []
  ) {
    super(message);
    this.name = 'VmError';
  }
}

export interface RunResult {
  outputs: bigint[];
  stop: 'halted' | 'fault' | 'input-required' | 'cycle-limit';
  fault?: Fault;
  /** Steps taken by this call */
  steps: number;
}

type Resolution =
  | { ok: true; address: number }
  | { ok: false; reason: FaultReason; value: bigint };

const ADVANCED: StepResult = { kind: 'advanced' };
const HALTED: StepResult = { kind: 'halted' };
const INPUT_REQUIRED: StepResult = { kind: 'input-required' };

export class VirtualMachine {
  private readonly config: ResolvedMachineConfig;
  private memory: BigInt64Array;
  /** Image written by the last successful compile, restored by reset() */
  private image: BigInt64Array;

  private _pc: number = 0;
  private _accumulator: bigint = 0n;
  private _cycles: number = 0;
  private _status: MachineStatus = 'running';
  private _pendingInput: bigint | null = null;
  private _lastAccessed: number | null = null;
  private _fault: Fault | null = null;

  constructor(config: MachineConfig = {}) {
    this.config = resolveConfig(config);
    this.memory = new BigInt64Array(this.config.memorySize);
    this.image = new BigInt64Array(this.config.memorySize);
  }

  get memorySize(): number {
    return this.config.memorySize;
  }

  get pc(): number {
    return this._pc;
  }

  get accumulator(): bigint {
    return this._accumulator;
  }

  get cycles(): number {
    return this._cycles;
  }

  get status(): MachineStatus {
    return this._status;
  }

  get halted(): boolean {
    return this._status === 'halted';
  }

  get fault(): Fault | null {
    return this._fault;
  }

  get pendingInput(): bigint | null {
    return this._pendingInput;
  }

  /** Mailbox most recently read or written by an instruction */
  get lastAccessed(): number | null {
    return this._lastAccessed;
  }

  readMemory(address: number): bigint {
    if (!Number.isInteger(address) || address < 0 || address >= this.memory.length) {
      throw new RangeError(`Address ${address} is outside memory (0-${this.memory.length - 1})`);
    }
    return this.memory[address];
  }

  /**
   * Assemble a program and load it into memory. On success memory is
   * cleared, the image written and every register reset. On failure the
   * machine is left untouched.
   */
  compile(source: string): CompileResult {
    const result = assemble(source, { memorySize: this.config.memorySize });

    if (result.errors.length > 0) {
      throw new VmError(
        'compile-failed',
        `Could not compile the program: ${result.errors[0].message}`,
        result.errors
      );
    }

    if (result.instructions.length > this.config.memorySize) {
      throw new VmError(
        'program-too-large',
        `Program is ${result.instructions.length} instructions long but memory holds ${this.config.memorySize}`
      );
    }

    const image = new BigInt64Array(this.config.memorySize);
    image.set(encodeProgram(result.instructions));
    this.image = image;
    this.memory.set(image);
    this.resetRegisters();

    return { size: result.instructions.length, symbols: result.symbols };
  }

  /**
   * Restore the last compiled image and clear the registers. Only takes
   * effect once the machine has halted or faulted.
   */
  reset(): boolean {
    if (this._status !== 'halted' && this._status !== 'faulted') {
      return false;
    }
    this.memory.set(this.image);
    this.resetRegisters();
    return true;
  }

  /**
   * Buffer one input value for the next INP, replacing any unconsumed one.
   */
  input(value: bigint): void {
    this._pendingInput = BigInt.asIntN(64, value);
    if (this._status === 'awaiting-input') {
      this._status = 'running';
    }
  }

  /**
   * Execute one cycle
   */
  step(): StepResult {
    if (this._status === 'halted') {
      return HALTED;
    }
    if (this._fault !== null) {
      return { kind: 'fault', fault: this._fault };
    }

    if (this._pc >= this.memory.length) {
      // Ran off the end of memory
      this._cycles++;
      this._status = 'halted';
      return HALTED;
    }

    const word = this.memory[this._pc];
    const instr = tryDecode(word);

    if (instr === null) {
      if (this.config.unknownOpcode === 'fault') {
        return this.raise({ ok: false, reason: 'unknown-opcode', value: word });
      }
      this._cycles++;
      this._pc++;
      return ADVANCED;
    }

    return this.execute(instr);
  }

  /**
   * Step until the machine halts, faults, needs input or `maxCycles`
   * steps have been taken.
   */
  run(maxCycles: number = 1000000): RunResult {
    const outputs: bigint[] = [];

    for (let steps = 0; steps < maxCycles; steps++) {
      const result = this.step();
      switch (result.kind) {
        case 'advanced':
          break;
        case 'output':
          outputs.push(result.value);
          break;
        case 'input-required':
          return { outputs, stop: 'input-required', steps };
        case 'halted':
          return { outputs, stop: 'halted', steps: steps + 1 };
        case 'fault':
          return { outputs, stop: 'fault', fault: result.fault, steps: steps + 1 };
      }
    }

    return { outputs, stop: 'cycle-limit', steps: maxCycles };
  }

  /**
   * Get a copy of the current machine state
   */
  getState(): MachineState {
    return {
      pc: this._pc,
      accumulator: this._accumulator,
      cycles: this._cycles,
      status: this._status,
      pendingInput: this._pendingInput,
      lastAccessed: this._lastAccessed,
      memory: new BigInt64Array(this.memory),
    };
  }

  private resetRegisters(): void {
    this._pc = 0;
    this._accumulator = 0n;
    this._cycles = 0;
    this._status = 'running';
    this._pendingInput = null;
    this._lastAccessed = null;
    this._fault = null;
  }

  private execute(instr: ExecutableInstruction): StepResult {
    switch (instr.op) {
      case 'HLT':
        this._cycles++;
        this._status = 'halted';
        return HALTED;

      case 'INP': {
        if (this._pendingInput === null) {
          this._status = 'awaiting-input';
          return INPUT_REQUIRED;
        }
        this._accumulator = this._pendingInput;
        this._pendingInput = null;
        this._status = 'running';
        return this.next();
      }

      case 'OUT': {
        const value = this._accumulator;
        this.next();
        return { kind: 'output', value };
      }

      case 'BWN':
        this._accumulator = ~this._accumulator;
        return this.next();

      case 'LDR': {
        // Accumulator holds the address to load from
        const target = this.resolve(this._accumulator);
        if (!target.ok) return this.raise(target);
        this._accumulator = this.load(target.address);
        return this.next();
      }

      case 'BRA':
        return this.branch(instr.operand);

      case 'BRZ':
        return this._accumulator === 0n ? this.branch(instr.operand) : this.next();

      case 'BRP':
        // Zero counts as positive
        return this._accumulator >= 0n ? this.branch(instr.operand) : this.next();

      case 'STA': {
        const target = this.resolve(BigInt(instr.operand));
        if (!target.ok) return this.raise(target);
        this.memory[target.address] = this._accumulator;
        this._lastAccessed = target.address;
        return this.next();
      }

      case 'ADD':
      case 'SUB':
      case 'LDA':
      case 'BWA':
      case 'BWO':
      case 'BWX': {
        const target = this.resolve(BigInt(instr.operand));
        if (!target.ok) return this.raise(target);
        const value = this.load(target.address);
        this._accumulator = alu(instr.op, this._accumulator, value);
        return this.next();
      }
    }
  }

  private next(): StepResult {
    this._cycles++;
    this._pc++;
    return ADVANCED;
  }

  private branch(operand: number): StepResult {
    const target = this.resolve(BigInt(operand));
    if (!target.ok) return this.raise(target);
    this._cycles++;
    this._pc = target.address;
    return ADVANCED;
  }

  private load(address: number): bigint {
    this._lastAccessed = address;
    return this.memory[address];
  }

  /**
   * Resolve an operand to a direct address. Values in
   * [memorySize, 2 * memorySize) point at the cell holding the real
   * address, which may itself be a pointer.
   */
  private resolve(operand: bigint): Resolution {
    const size = BigInt(this.memory.length);
    let target = operand;

    for (let depth = 0; ; depth++) {
      if (target < 0n) {
        return { ok: false, reason: 'address-out-of-range', value: target };
      }
      if (target < size) {
        return { ok: true, address: Number(target) };
      }
      if (target >= size * 2n) {
        return { ok: false, reason: 'pointer-out-of-range', value: target };
      }
      if (depth >= this.config.maxIndirectionDepth) {
        return { ok: false, reason: 'indirection-too-deep', value: operand };
      }
      target = this.memory[Number(target - size)];
    }
  }

  private raise(failure: Extract<Resolution, { ok: false }>): StepResult {
    const fault: Fault = {
      reason: failure.reason,
      pc: this._pc,
      value: failure.value,
      message: this.describeFault(failure.reason, failure.value),
    };
    this._cycles++;
    this._fault = fault;
    this._status = 'faulted';
    return { kind: 'fault', fault };
  }

  private describeFault(reason: FaultReason, value: bigint): string {
    const size = this.memory.length;
    switch (reason) {
      case 'address-out-of-range':
        return `Address ${value} is outside memory (0-${size - 1})`;
      case 'pointer-out-of-range':
        return `Pointer ${value} is outside memory and the pointer range (${size}-${2 * size - 1})`;
      case 'indirection-too-deep':
        return `Pointer chain from ${value} exceeds ${this.config.maxIndirectionDepth} hops`;
      case 'unknown-opcode':
        return `Unknown opcode ${value} at address ${this._pc}`;
    }
  }
}

function alu(op: 'ADD' | 'SUB' | 'LDA' | 'BWA' | 'BWO' | 'BWX', acc: bigint, value: bigint): bigint {
  switch (op) {
    case 'ADD':
      return BigInt.asIntN(64, acc + value);
    case 'SUB':
      return BigInt.asIntN(64, acc - value);
    case 'LDA':
      return value;
    case 'BWA':
      return acc & value;
    case 'BWO':
      return acc | value;
    case 'BWX':
      return acc ^ value;
  }
}
