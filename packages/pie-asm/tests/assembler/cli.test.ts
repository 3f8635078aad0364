import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync, readFileSync, existsSync, mkdirSync, rmSync } from 'fs';
import { main, formatHexDump, formatArtifactDump } from '../../src/assembler/cli.js';
import { tmpdir } from 'os';
import { join } from 'path';

describe('CLI', () => {
  const testDir = join(tmpdir(), 'pie-asm-test-' + Date.now());
  let consoleLogs: string[] = [];
  let consoleErrors: string[] = [];
  let consoleWarnings: string[] = [];
  let originalLog: typeof console.log;
  let originalError: typeof console.error;
  let originalWarn: typeof console.warn;

  beforeEach(() => {
    mkdirSync(testDir, { recursive: true });
    consoleLogs = [];
    consoleErrors = [];
    consoleWarnings = [];
    originalLog = console.log;
    originalError = console.error;
    originalWarn = console.warn;
    console.log = (...args) => consoleLogs.push(args.join(' '));
    console.error = (...args) => consoleErrors.push(args.join(' '));
    console.warn = (...args) => consoleWarnings.push(args.join(' '));
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    console.warn = originalWarn;
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('argument parsing', () => {
    it('should show help with no arguments', () => {
      const exitCode = main(['node', 'cli.js']);
      expect(exitCode).toBe(1);
      expect(consoleLogs.some(l => l.includes('Usage'))).toBe(true);
    });

    it('should show help with -h flag', () => {
      const exitCode = main(['node', 'cli.js', '-h']);
      expect(exitCode).toBe(0);
      expect(consoleLogs.some(l => l.includes('Usage'))).toBe(true);
    });

    it('should show help with --help flag', () => {
      const exitCode = main(['node', 'cli.js', '--help']);
      expect(exitCode).toBe(0);
      expect(consoleLogs.some(l => l.includes('Usage'))).toBe(true);
    });

    it('should error on unknown option', () => {
      const exitCode = main(['node', 'cli.js', '--unknown']);
      expect(exitCode).toBe(1);
      expect(consoleErrors).toContain("Error: Unknown option '--unknown'");
    });

    it('should error when -o is missing filename', () => {
      const exitCode = main(['node', 'cli.js', 'test.asm', '-o']);
      expect(exitCode).toBe(1);
      expect(consoleErrors).toContain('Error: -o requires an output filename');
    });

    it('should error when only options are given', () => {
      const exitCode = main(['node', 'cli.js', '--hex']);
      expect(exitCode).toBe(1);
      expect(consoleErrors).toContain('Error: No input file specified');
    });
  });

  describe('file operations', () => {
    it('should error on missing input file', () => {
      const missing = join(testDir, 'nonexistent.asm');
      const exitCode = main(['node', 'cli.js', missing]);
      expect(exitCode).toBe(1);
      expect(consoleErrors).toContain(`Error: File not found: ${missing}`);
    });

    it('should assemble valid program', () => {
      const inputPath = join(testDir, 'test.asm');
      const outputPath = join(testDir, 'test.pie');

      writeFileSync(inputPath, '.data\n.code\nload $0 #1\nhlt');

      const exitCode = main(['node', 'cli.js', inputPath]);

      expect(exitCode).toBe(0);
      expect(existsSync(outputPath)).toBe(true);

      const bytes = readFileSync(outputPath);
      expect(bytes.length).toBe(73); // header + 2 instructions
      expect(Array.from(bytes.subarray(65))).toEqual([0, 0, 0, 1, 5, 0, 0, 0]);
      expect(consoleLogs).toContain(`Assembled 73 bytes to ${outputPath}`);
    });

    it('should use custom output file with -o', () => {
      const inputPath = join(testDir, 'test.asm');
      const outputPath = join(testDir, 'output.pie');

      writeFileSync(inputPath, '.data\n.code\nnop');

      const exitCode = main(['node', 'cli.js', inputPath, '-o', outputPath]);

      expect(exitCode).toBe(0);
      expect(existsSync(outputPath)).toBe(true);
    });

    it('should use custom output file with --output', () => {
      const inputPath = join(testDir, 'test.asm');
      const outputPath = join(testDir, 'output.pie');

      writeFileSync(inputPath, '.data\n.code\nnop');

      const exitCode = main(['node', 'cli.js', inputPath, '--output', outputPath]);

      expect(exitCode).toBe(0);
      expect(existsSync(outputPath)).toBe(true);
    });

    it('should not write output when assembly fails', () => {
      const inputPath = join(testDir, 'error.asm');

      writeFileSync(inputPath, 'hlt');

      const exitCode = main(['node', 'cli.js', inputPath]);

      expect(exitCode).toBe(1);
      expect(existsSync(join(testDir, 'error.pie'))).toBe(false);
    });
  });

  describe('error handling', () => {
    it('should report assembly errors with line numbers', () => {
      const inputPath = join(testDir, 'error.asm');

      writeFileSync(inputPath, 'start: hlt\n.data\n.code');

      const exitCode = main(['node', 'cli.js', inputPath]);

      expect(exitCode).toBe(1);
      expect(consoleErrors).toEqual([
        `${inputPath}:1:1: Label 'start' declared before any .data or .code section`,
      ]);
    });

    it('should report errors without a location', () => {
      const inputPath = join(testDir, 'error.asm');

      writeFileSync(inputPath, 'hlt');

      main(['node', 'cli.js', inputPath]);

      expect(consoleErrors).toEqual([
        `${inputPath}: Expected exactly 2 section directives (.data and .code), found 0`,
      ]);
    });

    it('should report parse errors', () => {
      const inputPath = join(testDir, 'error.asm');

      writeFileSync(inputPath, '.data\n.code\nload $0 &');

      const exitCode = main(['node', 'cli.js', inputPath]);

      expect(exitCode).toBe(1);
      expect(consoleErrors).toEqual([
        `${inputPath}:3:9: Unexpected character '&' at line 3, column 9`,
      ]);
    });

    it('should print warnings and still assemble', () => {
      const inputPath = join(testDir, 'test.asm');

      writeFileSync(inputPath, '.data\n.code\n.text\nhlt');

      const exitCode = main(['node', 'cli.js', inputPath]);

      expect(exitCode).toBe(0);
      expect(consoleWarnings).toEqual([
        `warning: ${inputPath}:3:1: Unknown directive '.text' ignored`,
      ]);
    });
  });

  describe('hex dump', () => {
    it('should print hex dump with --hex flag', () => {
      const inputPath = join(testDir, 'test.asm');

      writeFileSync(inputPath, '.data\n.code\nhlt');

      const exitCode = main(['node', 'cli.js', inputPath, '--hex']);

      expect(exitCode).toBe(0);
      expect(consoleLogs).toContain('\nHex dump:');
      const dump = consoleLogs[consoleLogs.indexOf('\nHex dump:') + 1].split('\n');
      expect(dump[0]).toBe('header (65 bytes):');
      expect(dump[1].startsWith('00000000: 2d 32 31 2d  00 00 00 00')).toBe(true);
      expect(dump[6]).toBe('body (4 bytes):');
      expect(dump[7]).toBe(`00000041: 05 00 00 00${' '.repeat(41)}|....${' '.repeat(12)}|`);
    });

    it('should group bytes into words and show printable characters', () => {
      const dump = formatHexDump(new Uint8Array([0x41, 0x42, 0, 1]));
      expect(dump).toBe(`00000000: 41 42 00 01${' '.repeat(41)}|AB..${' '.repeat(12)}|`);
    });

    it('should number rows from a base offset', () => {
      const dump = formatHexDump(new Uint8Array(20), 0x41).split('\n');
      expect(dump).toHaveLength(2);
      expect(dump[0].startsWith('00000041: 00 00 00 00  00 00 00 00  ')).toBe(true);
      expect(dump[1].startsWith('00000051: 00 00 00 00  ')).toBe(true);
    });

    it('should split an artifact at the end of the header', () => {
      const artifact = new Uint8Array(69);
      artifact.set([45, 50, 49, 45]);
      artifact.set([5, 0, 0, 0], 65);
      const lines = formatArtifactDump(artifact).split('\n');
      expect(lines).toHaveLength(8);
      expect(lines[0]).toBe('header (65 bytes):');
      expect(lines[1]).toBe(`00000000: 2d 32 31 2d  00 00 00 00  00 00 00 00  00 00 00 00  |-21-${'.'.repeat(12)}|`);
      expect(lines[5]).toBe(`00000040: 00${' '.repeat(50)}|.${' '.repeat(15)}|`);
      expect(lines[6]).toBe('body (4 bytes):');
    });
  });

  describe('listing and symbols', () => {
    it('should print the decoded listing', () => {
      const inputPath = join(testDir, 'test.asm');

      writeFileSync(inputPath, '.data\n.code\nload $0 #100\nhlt');

      const exitCode = main(['node', 'cli.js', inputPath, '--listing']);

      expect(exitCode).toBe(0);
      expect(consoleLogs).toContain('\nListing:');
      expect(consoleLogs).toContain('0000: load  00 00 64\n0004: hlt   00 00 00');
    });

    it('should print the symbol table', () => {
      const inputPath = join(testDir, 'test.asm');

      writeFileSync(inputPath, '.data\n.code\nloop: inc $0\njmp @loop');

      const exitCode = main(['node', 'cli.js', inputPath, '--symbols']);

      expect(exitCode).toBe(0);
      expect(consoleLogs).toContain('\nSymbols: 1');
      expect(consoleLogs).toContain(`  ${'loop'.padEnd(16)} 00000008`);
    });
  });
});
