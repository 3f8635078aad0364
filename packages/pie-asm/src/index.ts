export * from './assembler/index.js';
