/**
 * File system table decoding and the path registry built from it.
 */
import { ByteRangeView } from './byte-range-view.js';
import type { Container } from './container.js';
import { FormatError, NotFoundError } from './errors.js';
import type { DiscHeader } from './types/disc-header.js';
import type { FileEntry } from './types/file-entry.js';
import type { FstEntry } from './types/fst-entry.js';
import { readZeroTerminated } from './utils/strings.js';
import { FST_ENTRY_SIZE, PATH_SEPARATOR } from './constants/disc-offsets.js';

interface OpenDirectory {
  readonly endIndex: number;
  readonly prefix: string;
}

function decodeEntry(fst: Buffer, index: number): FstEntry {
  const base = index * FST_ENTRY_SIZE;
  const flag = fst.readUInt8(base);
  // Name offsets are 24-bit; the flag byte occupies the top of the word.
  const nameOffset = fst.readUInt32BE(base) & 0x00ffffff;
  const first = fst.readUInt32BE(base + 4);
  const second = fst.readUInt32BE(base + 8);
  if (flag !== 0) {
    return { kind: 'directory', nameOffset, parentIndex: first, endIndex: second };
  }
  return { kind: 'file', nameOffset, offset: first, size: second };
}

function stripLeadingSeparator(path: string): string {
  return path.startsWith(PATH_SEPARATOR) ? path.slice(1) : path;
}

/** `''` for the root, otherwise the path with exactly one trailing separator. */
function directoryPrefix(path: string): string {
  const trimmed = stripLeadingSeparator(path);
  if (trimmed === '' || trimmed.endsWith(PATH_SEPARATOR)) {
    return trimmed;
  }
  return trimmed + PATH_SEPARATOR;
}

/**
 * Ordered registry of every file in a disc image.
 *
 * Holds the synthesized system regions first, then the FST files in
 * table order. Entries are fixed at load time; writing through {@link open}
 * changes bytes, never extents.
 */
export class FileTable {
  private constructor(
    private readonly container: Container,
    private readonly files: ReadonlyMap<string, FileEntry>,
    /** Number of FST records, root included. */
    readonly numEntries: number,
    /** Absolute offset of the FST name table. */
    readonly stringTableOffset: number,
  ) {}

  /**
   * Decodes the FST described by `header` and registers its files after the
   * header's system files.
   *
   * Directory records hold the index one past their subtree; the root's
   * value is the total record count, and every nested end index must fall
   * inside its parent's range.
   *
   * @throws {FormatError} On out-of-range indices or offsets, extents past
   *   the end of the image, or a path registered twice
   */
  static build(container: Container, header: DiscHeader): FileTable {
    const { fstOffset, fstSize } = header;
    if (fstSize < FST_ENTRY_SIZE || fstOffset + fstSize > container.size) {
      throw new FormatError(`FST region [0x${fstOffset.toString(16)}, +0x${fstSize.toString(16)}) does not fit image of size 0x${container.size.toString(16)}`);
    }
    const fst = container.read(fstOffset, fstSize);

    const root = decodeEntry(fst, 0);
    const numEntries = root.kind === 'directory' ? root.endIndex : root.size;
    const stringTable = numEntries * FST_ENTRY_SIZE;
    if (numEntries < 1 || stringTable > fstSize) {
      throw new FormatError(`FST declares ${numEntries} entries, which do not fit in 0x${fstSize.toString(16)} bytes`);
    }

    const files = new Map<string, FileEntry>();
    const register = (entry: FileEntry): void => {
      if (files.has(entry.path)) {
        throw new FormatError(`Duplicate path in FST: ${entry.path}`);
      }
      if (entry.offset + entry.size > container.size) {
        throw new FormatError(`${entry.path} [0x${entry.offset.toString(16)}, +0x${entry.size.toString(16)}) extends beyond image end 0x${container.size.toString(16)}`);
      }
      files.set(entry.path, entry);
    };
    const readName = (index: number, nameOffset: number): string => {
      if (stringTable + nameOffset >= fstSize) {
        throw new FormatError(`FST entry ${index} name offset 0x${nameOffset.toString(16)} lies outside the FST`);
      }
      return readZeroTerminated(fst, stringTable + nameOffset);
    };

    for (const entry of header.systemFiles) {
      register(entry);
    }

    // Pre-order walk; the stack holds the directories enclosing `index`.
    const stack: OpenDirectory[] = [{ endIndex: numEntries, prefix: '' }];
    for (let index = 1; index < numEntries; index += 1) {
      while (stack.length > 1 && index >= stack[stack.length - 1].endIndex) {
        stack.pop();
      }
      const parent = stack[stack.length - 1];
      const entry = decodeEntry(fst, index);
      const name = readName(index, entry.nameOffset);

      if (entry.kind === 'directory') {
        if (entry.endIndex <= index || entry.endIndex > parent.endIndex) {
          throw new FormatError(`FST directory ${index} (${name}) ends at index ${entry.endIndex}, outside (${index}, ${parent.endIndex}]`);
        }
        stack.push({ endIndex: entry.endIndex, prefix: parent.prefix + name + PATH_SEPARATOR });
      } else {
        register({ path: stripLeadingSeparator(parent.prefix + name), offset: entry.offset, size: entry.size });
      }
    }

    return new FileTable(container, files, numEntries, fstOffset + stringTable);
  }

  get size(): number {
    return this.files.size;
  }

  /** All entries in registry order. */
  entries(): IterableIterator<FileEntry> {
    return this.files.values();
  }

  paths(): IterableIterator<string> {
    return this.files.keys();
  }

  /**
   * @throws {NotFoundError} If no file is registered under `path`
   */
  get(path: string): FileEntry {
    const entry = this.files.get(stripLeadingSeparator(path));
    if (!entry) {
      throw new NotFoundError(`No such file in image: ${path}`);
    }
    return entry;
  }

  isFile(path: string): boolean {
    return this.files.has(stripLeadingSeparator(path));
  }

  /**
   * Whether any registered file lies below `path`. Directories without files
   * are invisible, since only files are registered.
   */
  isDirectory(path: string): boolean {
    const prefix = directoryPrefix(path);
    for (const candidate of this.files.keys()) {
      if (candidate.startsWith(prefix)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Paths of every file below `path`, subdirectories included, relative to
   * `path` and in registry order. The result can be iterated repeatedly and
   * walks the registry afresh each time.
   */
  listDirectory(path: string): Iterable<string> {
    const prefix = directoryPrefix(path);
    const files = this.files;
    return {
      *[Symbol.iterator](): Iterator<string> {
        for (const candidate of files.keys()) {
          if (candidate.startsWith(prefix)) {
            yield candidate.slice(prefix.length);
          }
        }
      },
    };
  }

  /**
   * @throws {NotFoundError} If no file is registered under `path`
   */
  open(path: string): ByteRangeView {
    const entry = this.get(path);
    return new ByteRangeView(this.container, entry.offset, entry.size);
  }
}
