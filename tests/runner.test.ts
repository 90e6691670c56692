import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { VirtualMachine } from '../src/emulator/vm.js';
import { InputError, StepEvent, arrayInput, lineInput, parseValue, runProgram } from '../src/emulator/runner.js';

function load(source: string): VirtualMachine {
  const vm = new VirtualMachine();
  vm.compile(source);
  return vm;
}

describe('Runner', () => {
  describe('parseValue', () => {
    it('should parse signed decimal integers', () => {
      expect(parseValue('42')).toBe(42n);
      expect(parseValue('+12')).toBe(12n);
      expect(parseValue(' -7 ')).toBe(-7n);
      expect(parseValue('-9223372036854775808')).toBe(-9223372036854775808n);
    });

    it('should reject malformed integers', () => {
      expect(() => parseValue('1.5')).toThrow("Invalid integer '1.5'");
      expect(() => parseValue('')).toThrow(InputError);
      expect(() => parseValue('0x10')).toThrow(InputError);
    });

    it('should reject integers beyond 64 bits', () => {
      expect(() => parseValue('9223372036854775808')).toThrow(
        "Integer '9223372036854775808' does not fit in 64 bits"
      );
    });
  });

  describe('input sources', () => {
    it('should read an array in order', async () => {
      const input = arrayInput([1, 2n]);
      expect(await input.read()).toBe(1n);
      expect(await input.read()).toBe(2n);
      expect(await input.read()).toBeUndefined();
    });

    it('should read one value per non-blank line', async () => {
      const input = lineInput(Readable.from(['5\n', '\n', '  -3\n']));
      expect(await input.read()).toBe(5n);
      expect(await input.read()).toBe(-3n);
      expect(await input.read()).toBeUndefined();
      input.close();
    });

    it('should reject a line that is not an integer', async () => {
      const input = lineInput(Readable.from(['abc\n']));
      await expect(input.read()).rejects.toThrow("Invalid integer 'abc'");
      input.close();
    });
  });

  describe('runProgram', () => {
    it('should feed inputs and collect outputs until halt', async () => {
      const outcome = await runProgram(load('INP\nOUT\nINP\nOUT\nHLT'), { input: arrayInput([3, 4]) });
      expect(outcome).toEqual({ stop: 'halted', outputs: [3n, 4n], inputs: [3n, 4n], cycles: 5 });
    });

    it('should stop when the input runs out', async () => {
      const outcome = await runProgram(load('INP\nOUT\nINP\nOUT\nHLT'), { input: arrayInput([3]) });
      expect(outcome).toEqual({ stop: 'input-exhausted', outputs: [3n], inputs: [3n], cycles: 2 });
    });

    it('should stop at the cycle limit', async () => {
      const outcome = await runProgram(load('l BRA l'), { maxCycles: 5 });
      expect(outcome.stop).toBe('cycle-limit');
      expect(outcome.cycles).toBe(5);
    });

    it('should report faults', async () => {
      const outcome = await runProgram(load('LDA 250'));
      expect(outcome.stop).toBe('fault');
      expect(outcome.fault).toMatchObject({ reason: 'pointer-out-of-range', pc: 0, value: 250n });
    });

    it('should report every executed step and output', async () => {
      const events: StepEvent[] = [];
      const printed: bigint[] = [];
      await runProgram(load('INP\nOUT\nHLT'), {
        input: arrayInput([5]),
        onStep: (event) => events.push(event),
        onOutput: (value) => printed.push(value),
      });

      expect(printed).toEqual([5n]);
      expect(events).toEqual([
        { pc: 0, word: 901n, result: { kind: 'advanced' }, accumulator: 5n, cycles: 1 },
        { pc: 1, word: 902n, result: { kind: 'output', value: 5n }, accumulator: 5n, cycles: 2 },
        { pc: 2, word: 1n, result: { kind: 'halted' }, accumulator: 5n, cycles: 3 },
      ]);
    });

    it('should read stdin-style lines', async () => {
      const input = lineInput(Readable.from(['20\n22\n']));
      const outcome = await runProgram(load('INP\nSTA a\nINP\nADD a\nOUT\nHLT\na DAT'), { input });
      input.close();
      expect(outcome.outputs).toEqual([42n]);
    });
  });
});
