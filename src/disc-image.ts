/**
 * GameCube disc image access.
 *
 * ```ts
 * const image = DiscImage.open('melee.iso');
 * try {
 *   const data = image.readFile('opening.bnr');
 *   const dol = image.getExecutable();
 * } finally {
 *   image.close();
 * }
 * ```
 */
import { BannerFile } from './banner-file.js';
import type { ByteRangeView } from './byte-range-view.js';
import { type Container, FileContainer } from './container.js';
import { DiscLayout } from './disc-layout.js';
import { ExecutableLayout } from './executable-layout.js';
import { FileTable } from './file-table.js';
import type { DiscHeader } from './types/disc-header.js';
import { SYSTEM_FILES } from './constants/disc-offsets.js';

export class DiscImage {
  private constructor(
    readonly container: Container,
    readonly header: DiscHeader,
    readonly files: FileTable,
  ) {}

  /**
   * Opens and decodes an image file. The file stays open until {@link close}.
   *
   * @param filePath - Path to the `.iso` / `.gcm` image
   * @param options.writable - Open for patching files in place
   * @throws {FormatError} If the header or FST cannot be decoded
   */
  static open(filePath: string, { writable = false }: { readonly writable?: boolean } = {}): DiscImage {
    const container = FileContainer.open(filePath, { writable });
    try {
      return DiscImage.load(container);
    } catch (error) {
      container.close();
      throw error;
    }
  }

  /** Decodes the header and FST of an already opened container. */
  static load(container: Container): DiscImage {
    const header = DiscLayout.parse(container);
    return new DiscImage(container, header, FileTable.build(container, header));
  }

  /**
   * Reads `count` bytes at `offset` within the file at `path`; by default the
   * whole file.
   */
  readFile(path: string, offset = 0, count?: number): Buffer {
    return this.files.open(path).readAt(offset, count);
  }

  /** Overwrites bytes inside the file at `path`. The file's size never changes. */
  writeFile(path: string, offset: number, data: Uint8Array): number {
    return this.files.open(path).writeAt(offset, data);
  }

  open(path: string): ByteRangeView {
    return this.files.open(path);
  }

  fileOffset(path: string): number {
    return this.files.get(path).offset;
  }

  fileSize(path: string): number {
    return this.files.get(path).size;
  }

  // An empty entry decodes as truncated input rather than an out-of-range read.
  private readContents(path: string): Buffer {
    return this.fileSize(path) === 0 ? Buffer.alloc(0) : this.readFile(path);
  }

  getExecutable(path: string = SYSTEM_FILES.executable): ExecutableLayout {
    return ExecutableLayout.parse(this.readContents(path));
  }

  getBanner(path = 'opening.bnr'): BannerFile {
    return BannerFile.parse(this.readContents(path));
  }

  close(): void {
    this.container.close();
  }
}
