// Little Man Computer - assembler and virtual machine

// Instruction set
export * from './types/instruction.js';

// Configuration
export {
  MEMORY_SIZE,
  ConfigError,
  resolveConfig,
  type MachineConfig,
  type ResolvedMachineConfig,
  type UnknownOpcodePolicy,
} from './config.js';

// Assembler
export * from './assembler/index.js';

// Codec and virtual machine
export * from './emulator/index.js';

// Command line
export { main as runCli, formatMemoryDump, formatTrace } from './cli.js';
