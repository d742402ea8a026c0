/**
 * DOL executable layout: the section table mapping file offsets to the
 * memory addresses the loader copies them to.
 *
 * Sections stay contiguous when loaded, but they may be permuted and gaps
 * may open between them, so a range that is contiguous in the file is not
 * necessarily contiguous in memory.
 */
import { FormatError } from './errors.js';
import type { ExecutableSection, SectionKind } from './types/executable-section.js';

const TEXT_SLOTS = 6;
const DATA_SLOTS = 10;

const TEXT_FILE_OFFSETS = 0x00;
const DATA_FILE_OFFSETS = 0x1c;
const TEXT_MEM_ADDRESSES = 0x48;
const DATA_MEM_ADDRESSES = 0x64;
const TEXT_SIZES = 0x90;
const DATA_SIZES = 0xac;
const BSS_MEM_ADDRESS = 0xd8;
const BSS_SIZE = 0xdc;
const ENTRY_POINT = 0xe0;

/** Size of the header; section data follows it. */
export const EXECUTABLE_BODY_OFFSET = 0x100;

function readWords(bytes: Buffer, offset: number, count: number): number[] {
  const words: number[] = [];
  for (let i = 0; i < count; i += 1) {
    words.push(bytes.readUInt32BE(offset + i * 4));
  }
  return words;
}

/**
 * Builds sections for one kind in slot order. The first slot with a zero
 * offset, address or size ends the list, even if later slots are populated.
 */
function collectSections(kind: SectionKind, offsets: number[], addresses: number[], sizes: number[]): ExecutableSection[] {
  const sections: ExecutableSection[] = [];
  for (let index = 0; index < offsets.length; index += 1) {
    const fileOffset = offsets[index];
    const memAddress = addresses[index];
    const size = sizes[index];
    if (fileOffset === 0 || memAddress === 0 || size === 0) {
      break;
    }
    sections.push({
      index,
      kind,
      fileOffset,
      memAddress,
      size,
      endFileOffset: fileOffset + size,
      endMemAddress: memAddress + size,
    });
  }
  return sections;
}

/** Each section's byte ranges abut `next`'s in both the file and memory. */
function precedes(section: ExecutableSection, next: ExecutableSection): boolean {
  return section.endFileOffset === next.fileOffset && section.endMemAddress === next.memAddress;
}

/**
 * Decoded DOL header.
 *
 * `sections` lists text sections then data sections in header order;
 * `sectionsByFileOffset` and `sectionsByMemAddress` hold the same objects in
 * stable sorted order.
 */
export class ExecutableLayout {
  readonly bodyOffset = EXECUTABLE_BODY_OFFSET;
  readonly sections: readonly ExecutableSection[];
  readonly sectionsByFileOffset: readonly ExecutableSection[];
  readonly sectionsByMemAddress: readonly ExecutableSection[];
  private readonly filePosition: ReadonlyMap<ExecutableSection, number>;
  private readonly memPosition: ReadonlyMap<ExecutableSection, number>;

  private constructor(
    readonly textSections: readonly ExecutableSection[],
    readonly dataSections: readonly ExecutableSection[],
    readonly bssMemAddress: number,
    readonly bssSize: number,
    readonly entryPoint: number,
  ) {
    this.sections = [...textSections, ...dataSections];
    this.sectionsByFileOffset = [...this.sections].sort((a, b) => a.fileOffset - b.fileOffset);
    this.sectionsByMemAddress = [...this.sections].sort((a, b) => a.memAddress - b.memAddress);
    this.filePosition = new Map(this.sectionsByFileOffset.map((section, position) => [section, position]));
    this.memPosition = new Map(this.sectionsByMemAddress.map((section, position) => [section, position]));
  }

  /**
   * @param bytes - The executable, or at least its 0x100-byte header
   * @throws {FormatError} If `bytes` is shorter than the header
   */
  static parse(bytes: Buffer): ExecutableLayout {
    if (bytes.length < EXECUTABLE_BODY_OFFSET) {
      throw new FormatError(`Executable too small for a DOL header: 0x${bytes.length.toString(16)} bytes`);
    }
    const textSections = collectSections(
      'text',
      readWords(bytes, TEXT_FILE_OFFSETS, TEXT_SLOTS),
      readWords(bytes, TEXT_MEM_ADDRESSES, TEXT_SLOTS),
      readWords(bytes, TEXT_SIZES, TEXT_SLOTS),
    );
    const dataSections = collectSections(
      'data',
      readWords(bytes, DATA_FILE_OFFSETS, DATA_SLOTS),
      readWords(bytes, DATA_MEM_ADDRESSES, DATA_SLOTS),
      readWords(bytes, DATA_SIZES, DATA_SLOTS),
    );
    return new ExecutableLayout(
      textSections,
      dataSections,
      bytes.readUInt32BE(BSS_MEM_ADDRESS),
      bytes.readUInt32BE(BSS_SIZE),
      bytes.readUInt32BE(ENTRY_POINT),
    );
  }

  sectionContainingMemAddress(memAddress: number): ExecutableSection | null {
    return this.sections.find((section) => memAddress >= section.memAddress && memAddress < section.endMemAddress) ?? null;
  }

  sectionContainingFileOffset(fileOffset: number): ExecutableSection | null {
    return this.sections.find((section) => fileOffset >= section.fileOffset && fileOffset < section.endFileOffset) ?? null;
  }

  /** File offset of the byte loaded to `memAddress`, or null if no section loads there. */
  fileOffsetForMemAddress(memAddress: number): number | null {
    const section = this.sectionContainingMemAddress(memAddress);
    return section ? section.fileOffset + (memAddress - section.memAddress) : null;
  }

  /** Memory address the byte at `fileOffset` is loaded to, or null if it is outside every section. */
  memAddressForFileOffset(fileOffset: number): number | null {
    const section = this.sectionContainingFileOffset(fileOffset);
    return section ? section.memAddress + (fileOffset - section.fileOffset) : null;
  }

  /**
   * Whether the file range [`start`, `endExclusive`) is loaded to one
   * contiguous memory range. `endExclusive` itself need not be mapped.
   *
   * @returns null if `start` is not inside any section
   */
  isRangeContiguousByFileOffset(start: number, endExclusive: number): boolean | null {
    let section = this.sectionContainingFileOffset(start);
    if (!section) {
      return null;
    }
    // Each step moves to a later section in file order, so this terminates.
    while (endExclusive > section.endFileOffset) {
      const fileNext: ExecutableSection | undefined = this.sectionsByFileOffset[(this.filePosition.get(section) ?? -1) + 1];
      const memNext: ExecutableSection | undefined = this.sectionsByMemAddress[(this.memPosition.get(section) ?? -1) + 1];
      if (fileNext === undefined || fileNext !== memNext || !precedes(section, fileNext)) {
        return false;
      }
      section = fileNext;
    }
    return true;
  }

  /**
   * {@link isRangeContiguousByFileOffset} for a memory range.
   *
   * @returns null if either address is not loaded from any section
   */
  isRangeContiguousByMemAddress(startAddress: number, endAddressExclusive: number): boolean | null {
    const start = this.fileOffsetForMemAddress(startAddress);
    const end = this.fileOffsetForMemAddress(endAddressExclusive);
    if (start === null || end === null) {
      return null;
    }
    return this.isRangeContiguousByFileOffset(start, end);
  }
}
