/**
 * LMC Assembler
 *
 * Assembles Little Man Computer source into resolved instructions.
 */

export * from './lexer.js';
export * from './parser.js';
export * from './resolver.js';
export * from './assembler.js';
