#!/usr/bin/env node
/**
 * PIE Assembler CLI
 *
 * Usage: pie-asm <input.asm> [-o output.pie] [--hex] [--listing] [--symbols]
 */

import { readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { Assembler } from './assembler.js';
import { decodeProgram, formatListing } from './decoder.js';
import { formatDiagnostic } from './diagnostics.js';
import { INSTRUCTION_WIDTH, PIE_BODY_OFFSET } from './encoder.js';

interface CliOptions {
  inputFile: string;
  outputFile: string;
  hexDump: boolean;
  listing: boolean;
  symbols: boolean;
}

type Flag = 'hexDump' | 'listing' | 'symbols';

const FLAGS: ReadonlyMap<string, Flag> = new Map<string, Flag>([
  ['--hex', 'hexDump'],
  ['--listing', 'listing'],
  ['--symbols', 'symbols'],
]);

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2);

  if (cliArgs.length === 0) {
    return null;
  }

  const options: CliOptions = {
    inputFile: '',
    outputFile: '',
    hexDump: false,
    listing: false,
    symbols: false,
  };

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];
    const flag = FLAGS.get(arg);

    if (flag !== undefined) {
      options[flag] = true;
      continue;
    }

    switch (arg) {
      case '-o':
      case '--output':
        if (i + 1 >= cliArgs.length) {
          console.error('Error: -o requires an output filename');
          return null;
        }
        options.outputFile = cliArgs[++i];
        break;
      case '-h':
      case '--help':
        return null;
      default:
        if (arg.startsWith('-')) {
          console.error(`Error: Unknown option '${arg}'`);
          return null;
        }
        options.inputFile = arg;
    }
  }

  if (!options.inputFile) {
    console.error('Error: No input file specified');
    return null;
  }

  if (!options.outputFile) {
    options.outputFile = options.inputFile.replace(/\.(asm|s)$/i, '') + '.pie';
  }

  return options;
}

function printUsage(): void {
  console.log(`PIE Assembler

Usage: pie-asm <input.asm> [-o output.pie] [--hex] [--listing] [--symbols]

Options:
  -o, --output <file>  Output file (default: <input>.pie)
  --hex                Print the header and body as hex
  --listing            Print the decoded instruction listing
  --symbols            Print the symbol table
  -h, --help           Show this help message

Examples:
  pie-asm program.asm
  pie-asm program.asm -o program.pie
  pie-asm program.asm --listing --symbols`);
}

const BYTES_PER_ROW = 16;

/**
 * Sixteen bytes per row, grouped into instruction words. Row offsets start
 * at `baseOffset` so a slice of an artifact keeps its file positions.
 */
export function formatHexDump(bytes: Uint8Array, baseOffset: number = 0): string {
  const lines: string[] = [];

  for (let offset = 0; offset < bytes.length; offset += BYTES_PER_ROW) {
    const words: string[] = [];
    let ascii = '';

    for (let word = 0; word < BYTES_PER_ROW; word += INSTRUCTION_WIDTH) {
      const cells: string[] = [];
      for (let i = word; i < word + INSTRUCTION_WIDTH; i++) {
        if (offset + i < bytes.length) {
          const byte = bytes[offset + i];
          cells.push(byte.toString(16).padStart(2, '0'));
          ascii += byte >= 32 && byte < 127 ? String.fromCharCode(byte) : '.';
        } else {
          cells.push('  ');
          ascii += ' ';
        }
      }
      words.push(cells.join(' '));
    }

    const address = (baseOffset + offset).toString(16).padStart(8, '0');
    lines.push(`${address}: ${words.join('  ')}  |${ascii}|`);
  }

  return lines.join('\n');
}

/** Dumps the header and the body of an artifact under their own headings. */
export function formatArtifactDump(bytes: Uint8Array): string {
  const header = bytes.subarray(0, PIE_BODY_OFFSET);
  const body = bytes.subarray(PIE_BODY_OFFSET);
  return [
    `header (${header.length} bytes):`,
    formatHexDump(header),
    `body (${body.length} bytes):`,
    formatHexDump(body, PIE_BODY_OFFSET),
  ].join('\n');
}

export function main(args: string[] = process.argv): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some(a => a === '-h' || a === '--help') ? 0 : 1;
  }

  let source: string;
  try {
    source = readFileSync(options.inputFile, 'utf-8');
  } catch (e) {
    const code = e instanceof Error && 'code' in e ? e.code : undefined;
    if (code === 'ENOENT') {
      console.error(`Error: File not found: ${options.inputFile}`);
    } else {
      console.error(`Error: Cannot read file: ${options.inputFile}`);
    }
    return 1;
  }

  const result = new Assembler(source).assemble();

  for (const warning of result.warnings) {
    console.warn(`warning: ${formatDiagnostic(options.inputFile, warning)}`);
  }

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      console.error(formatDiagnostic(options.inputFile, error));
    }
    return 1;
  }

  try {
    writeFileSync(options.outputFile, result.bytes);
    console.log(`Assembled ${result.bytes.length} bytes to ${options.outputFile}`);
  } catch {
    console.error(`Error: Cannot write file: ${options.outputFile}`);
    return 1;
  }

  if (options.hexDump) {
    console.log('\nHex dump:');
    console.log(formatArtifactDump(result.bytes));
  }

  if (options.listing) {
    console.log('\nListing:');
    console.log(formatListing(decodeProgram(result.bytes)));
  }

  if (options.symbols) {
    console.log(`\nSymbols: ${result.symbols.size}`);
    for (const [name, offset] of result.symbols) {
      console.log(`  ${name.padEnd(16)} ${offset.toString(16).padStart(8, '0')}`);
    }
  }

  return 0;
}

const invokedDirectly = process.argv[1] !== undefined
  && resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  process.exit(main());
}
