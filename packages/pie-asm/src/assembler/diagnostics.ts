/**
 * Structured diagnostics reported by the assembler.
 *
 * Errors fail the run; warnings are notices the caller may print.
 */

export type AssemblerErrorKind =
  | 'ParseError'
  | 'NoSegmentDeclarationFound'
  | 'StringConstantDeclaredWithoutLabel'
  | 'MissingStringOperand'
  | 'SymbolAlreadyDeclared'
  | 'InsufficientSections'
  | 'UnresolvedLabel'
  | 'IntegerOutOfRange'
  | 'InvalidOperand'
  | 'OperandOverflow';

export type AssemblerWarningKind =
  | 'UnknownDirective'
  | 'IllegalOpcode'
  | 'LabelOffsetTruncated';

export interface AssemblerError {
  kind: AssemblerErrorKind;
  message: string;
  line?: number;
  column?: number;
  /** Zero-based index of the offending instruction within the program. */
  instruction?: number;
}

export interface AssemblerWarning {
  kind: AssemblerWarningKind;
  message: string;
  line?: number;
  column?: number;
  instruction?: number;
}

export function formatDiagnostic(file: string, diagnostic: AssemblerError | AssemblerWarning): string {
  if (diagnostic.line === undefined) {
    return `${file}: ${diagnostic.message}`;
  }
  return `${file}:${diagnostic.line}:${diagnostic.column ?? 1}: ${diagnostic.message}`;
}
