/**
 * Machine configuration shared by the assembler and the virtual machine.
 */

import { BAND_WIDTH } from './emulator/codec.js';

/** Default number of mailboxes */
export const MEMORY_SIZE = 100;

/** What the machine does with a cell that matches no opcode */
export type UnknownOpcodePolicy = 'skip' | 'fault';

export interface MachineConfig {
  /** Number of mailboxes (default 100) */
  memorySize?: number;
  /** Pointer hops followed before giving up (default: memorySize) */
  maxIndirectionDepth?: number;
  /** Skip undecodable cells or stop with a fault (default 'skip') */
  unknownOpcode?: UnknownOpcodePolicy;
}

export type ResolvedMachineConfig = Required<MachineConfig>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function resolveConfig(config: MachineConfig = {}): ResolvedMachineConfig {
  const memorySize = config.memorySize ?? MEMORY_SIZE;
  if (!Number.isInteger(memorySize) || memorySize < 1) {
    throw new ConfigError(`memorySize must be a positive integer, got ${memorySize}`);
  }
  // Pointer operands (memorySize + k) must stay inside one opcode band
  if (memorySize * 2 > BAND_WIDTH) {
    throw new ConfigError(`memorySize must be at most ${BAND_WIDTH / 2}, got ${memorySize}`);
  }

  const maxIndirectionDepth = config.maxIndirectionDepth ?? memorySize;
  if (!Number.isInteger(maxIndirectionDepth) || maxIndirectionDepth < 0) {
    throw new ConfigError(`maxIndirectionDepth must be a non-negative integer, got ${maxIndirectionDepth}`);
  }

  return {
    memorySize,
    maxIndirectionDepth,
    unknownOpcode: config.unknownOpcode ?? 'skip',
  };
}
