/**
 * LMC Emulator
 */

export * from './codec.js';
export * from './vm.js';
export * from './runner.js';
