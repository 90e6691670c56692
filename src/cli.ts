/**
 * LMC command-line runner
 *
 * Usage: lmc <program.lmc> [--input 1,2,3] [--max-cycles N] [--memory-size N]
 *            [--strict] [--dump] [--trace]
 */

import { readFileSync } from 'fs';
import { ConfigError } from './config.js';
import { disassemble } from './emulator/codec.js';
import { InputError, InputSource, LineInput, arrayInput, lineInput, parseValue, runProgram, StepEvent } from './emulator/runner.js';
import { VirtualMachine, VmError } from './emulator/vm.js';

interface CliOptions {
  inputFile: string;
  inputs: bigint[] | null;
  maxCycles: number;
  memorySize?: number;
  strict: boolean;
  dump: boolean;
  trace: boolean;
}

export const EXIT = {
  OK: 0,
  ERROR: 1,
  FAULT: 2,
  INCOMPLETE: 3,
} as const;

function parseCount(flag: string, text: string | undefined): number | null {
  if (text === undefined || !/^\d+$/.test(text)) {
    console.error(`Error: ${flag} requires a positive integer`);
    return null;
  }
  const value = parseInt(text, 10);
  if (value < 1) {
    console.error(`Error: ${flag} requires a positive integer`);
    return null;
  }
  return value;
}

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return null;
  }

  let inputFile = '';
  let inputs: bigint[] | null = null;
  let maxCycles = 1000000;
  let memorySize: number | undefined;
  let strict = false;
  let dump = false;
  let trace = false;

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '-i' || arg === '--input') {
      if (i + 1 >= cliArgs.length) {
        console.error('Error: --input requires a comma-separated list of integers');
        return null;
      }
      const list = cliArgs[++i];
      try {
        inputs = list.split(',').filter((part) => part.trim() !== '').map(parseValue);
      } catch (e) {
        if (!(e instanceof InputError)) throw e;
        console.error(`Error: ${e.message}`);
        return null;
      }
    } else if (arg === '--max-cycles') {
      const value = parseCount(arg, cliArgs[++i]);
      if (value === null) return null;
      maxCycles = value;
    } else if (arg === '--memory-size') {
      const value = parseCount(arg, cliArgs[++i]);
      if (value === null) return null;
      memorySize = value;
    } else if (arg === '--strict') {
      strict = true;
    } else if (arg === '--dump') {
      dump = true;
    } else if (arg === '--trace') {
      trace = true;
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (!arg.startsWith('-')) {
      inputFile = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  if (!inputFile) {
    console.error('Error: No input file specified');
    return null;
  }

  return {
    inputFile,
    inputs,
    maxCycles,
    ...(memorySize !== undefined ? { memorySize } : {}),
    strict,
    dump,
    trace,
  };
}

function printUsage(): void {
  console.log(`Little Man Computer

Usage: lmc <program.lmc> [options]

Options:
  -i, --input <list>     Comma-separated input values (default: read stdin lines)
  --max-cycles <n>       Stop after n cycles (default: 1000000)
  --memory-size <n>      Number of mailboxes (default: 100)
  --strict               Fault on unknown opcodes instead of skipping them
  --dump                 Print the loaded memory image before running
  --trace                Print every executed cycle
  -h, --help             Show this help message

Examples:
  lmc sort.lmc --input 32,7,19
  lmc countdown.lmc --trace`);
}

/**
 * Format the non-zero mailboxes of a memory image, one per line.
 */
export function formatMemoryDump(memory: BigInt64Array): string {
  const width = String(memory.length - 1).length;
  const lines: string[] = [];

  memory.forEach((word, address) => {
    if (word === 0n) return;
    const addr = String(address).padStart(width, '0');
    lines.push(`${addr}: ${String(word).padStart(6)}  ${disassemble(word)}`);
  });

  return lines.join('\n');
}

export function formatTrace(event: StepEvent): string {
  return `[${event.cycles}] ${event.pc}: ${disassemble(event.word)}  ACC=${event.accumulator}`;
}

export async function main(args: string[] = process.argv): Promise<number> {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some((a) => a === '-h' || a === '--help') ? EXIT.OK : EXIT.ERROR;
  }

  // Read input file
  let source: string;
  try {
    source = readFileSync(options.inputFile, 'utf-8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      console.error(`Error: File not found: ${options.inputFile}`);
    } else {
      console.error(`Error: Cannot read file: ${options.inputFile}`);
    }
    return EXIT.ERROR;
  }

  let vm: VirtualMachine;
  try {
    vm = new VirtualMachine({
      ...(options.memorySize !== undefined ? { memorySize: options.memorySize } : {}),
      unknownOpcode: options.strict ? 'fault' : 'skip',
    });
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    console.error(`Error: ${e.message}`);
    return EXIT.ERROR;
  }

  try {
    vm.compile(source);
  } catch (e) {
    if (!(e instanceof VmError)) throw e;
    if (e.diagnostics.length === 0) {
      console.error(`Error: ${e.message}`);
    }
    for (const error of e.diagnostics) {
      console.error(`${options.inputFile}:${error.line}:${error.column}: ${error.message}`);
    }
    return EXIT.ERROR;
  }

  if (options.dump) {
    console.log(formatMemoryDump(vm.getState().memory));
    console.log('');
  }

  const stdin: LineInput | null = options.inputs === null ? lineInput() : null;
  const input: InputSource = stdin ?? arrayInput(options.inputs ?? []);

  try {
    const outcome = await runProgram(vm, {
      input,
      maxCycles: options.maxCycles,
      onOutput: (value) => console.log(String(value)),
      ...(options.trace ? { onStep: (event: StepEvent) => console.log(formatTrace(event)) } : {}),
    });

    switch (outcome.stop) {
      case 'halted':
        console.log(`Halted after ${outcome.cycles} cycles`);
        return EXIT.OK;
      case 'fault': {
        const fault = outcome.fault;
        console.error(fault ? `Fault at address ${fault.pc}: ${fault.message}` : 'Fault');
        return EXIT.FAULT;
      }
      case 'input-exhausted':
        console.error(`Stopped: program requested input after ${outcome.inputs.length} values`);
        return EXIT.INCOMPLETE;
      case 'cycle-limit':
        console.error(`Stopped: cycle limit of ${options.maxCycles} reached`);
        return EXIT.INCOMPLETE;
    }
  } catch (e) {
    if (!(e instanceof InputError)) throw e;
    console.error(`Error: ${e.message}`);
    return EXIT.ERROR;
  } finally {
    stdin?.close();
  }
}
