/**
 * Host-side driver: steps a VirtualMachine to completion, feeding INP
 * requests from an asynchronous input source.
 */

import { createInterface, Interface } from 'readline';
import { Fault, StepResult, VirtualMachine } from './vm.js';

export interface InputSource {
  /** Next value, or undefined when the source is exhausted */
  read(): Promise<bigint | undefined>;
}

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

const I64_MIN = -(1n << 63n);
const I64_MAX = (1n << 63n) - 1n;

/**
 * Parse a decimal integer as typed by a user.
 */
export function parseValue(text: string): bigint {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new InputError(`Invalid integer '${text}'`);
  }
  const value = BigInt(trimmed.replace(/^\+/, ''));
  if (value < I64_MIN || value > I64_MAX) {
    throw new InputError(`Integer '${text}' does not fit in 64 bits`);
  }
  return value;
}

export function arrayInput(values: readonly (bigint | number)[]): InputSource {
  let index = 0;
  return {
    read: async () => {
      if (index >= values.length) return undefined;
      return BigInt(values[index++]);
    },
  };
}

export interface LineInput extends InputSource {
  close(): void;
}

/**
 * Read one integer per non-blank line. The stream is only opened on the
 * first read, so programs without INP never touch it.
 */
export function lineInput(stream: NodeJS.ReadableStream = process.stdin): LineInput {
  let rl: Interface | undefined;
  let lines: AsyncIterator<string> | undefined;

  const open = (): AsyncIterator<string> => {
    rl = createInterface({ input: stream, terminal: false });
    return rl[Symbol.asyncIterator]();
  };

  return {
    read: async () => {
      if (lines === undefined) {
        lines = open();
      }
      const iterator = lines;
      for (;;) {
        const next = await iterator.next();
        if (next.done) return undefined;
        if (next.value.trim() === '') continue;
        return parseValue(next.value);
      }
    },
    close: () => {
      rl?.close();
    },
  };
}

export interface StepEvent {
  /** Address of the instruction that was executed */
  pc: number;
  word: bigint;
  result: StepResult;
  accumulator: bigint;
  cycles: number;
}

export interface RunOptions {
  input?: InputSource;
  /** Executed cycles allowed before giving up (default 1,000,000) */
  maxCycles?: number;
  onOutput?: (value: bigint) => void;
  onStep?: (event: StepEvent) => void;
}

export type RunStop = 'halted' | 'fault' | 'input-exhausted' | 'cycle-limit';

export interface RunOutcome {
  stop: RunStop;
  outputs: bigint[];
  inputs: bigint[];
  cycles: number;
  fault?: Fault;
}

export async function runProgram(vm: VirtualMachine, options: RunOptions = {}): Promise<RunOutcome> {
  const input = options.input ?? arrayInput([]);
  const maxCycles = options.maxCycles ?? 1000000;
  const outputs: bigint[] = [];
  const inputs: bigint[] = [];

  const outcome = (stop: RunStop, fault?: Fault): RunOutcome => ({
    stop,
    outputs,
    inputs,
    cycles: vm.cycles,
    ...(fault !== undefined ? { fault } : {}),
  });

  let executed = 0;
  while (executed < maxCycles) {
    const pc = vm.pc;
    const word = pc < vm.memorySize ? vm.readMemory(pc) : 0n;
    const result = vm.step();

    if (result.kind === 'input-required') {
      const value = await input.read();
      if (value === undefined) {
        return outcome('input-exhausted');
      }
      inputs.push(value);
      vm.input(value);
      continue;
    }

    executed++;
    options.onStep?.({ pc, word, result, accumulator: vm.accumulator, cycles: vm.cycles });

    switch (result.kind) {
      case 'output':
        outputs.push(result.value);
        options.onOutput?.(result.value);
        break;
      case 'halted':
        return outcome('halted');
      case 'fault':
        return outcome('fault', result.fault);
      case 'advanced':
        break;
    }
  }

  return outcome('cycle-limit');
}
