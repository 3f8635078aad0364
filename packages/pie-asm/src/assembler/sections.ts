export type SectionKind = 'data' | 'code' | 'unknown';

export interface Section {
  kind: SectionKind;
  /** Index of the instruction that opened the section. */
  startingInstruction?: number;
}

export function sectionFromName(name: string): SectionKind {
  switch (name.toLowerCase()) {
    case 'data':
      return 'data';
    case 'code':
      return 'code';
    default:
      return 'unknown';
  }
}
