/**
 * A section of a DOL executable.
 */
export type SectionKind = 'text' | 'data';

export interface ExecutableSection {
  /** Slot index among sections of the same kind. */
  readonly index: number;
  readonly kind: SectionKind;
  readonly fileOffset: number;
  readonly memAddress: number;
  readonly size: number;
  /** One past the last byte in the file. */
  readonly endFileOffset: number;
  /** One past the last loaded byte in memory. */
  readonly endMemAddress: number;
}
