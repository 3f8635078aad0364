/**
 * PIE Assembler
 *
 * Assembles register-machine assembly source into PIE bytecode.
 */

export * from './opcodes.js';
export * from './lexer.js';
export * from './parser.js';
export * from './program.js';
export * from './symbols.js';
export * from './sections.js';
export * from './diagnostics.js';
export * from './encoder.js';
export * from './assembler.js';
export * from './decoder.js';
export { main as runCli, formatHexDump, formatArtifactDump } from './cli.js';
