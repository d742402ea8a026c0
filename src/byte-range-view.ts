/**
 * Bounds-checked access to one byte range of a container.
 */
import type { Container } from './container.js';
import { InvalidArgumentError, OutOfRangeError, RangeExceededError } from './errors.js';

/** Origin for {@link ByteRangeView.seek}. */
export enum SeekWhence {
  Start = 0,
  Current = 1,
  End = 2,
}

/**
 * A window of `extent` bytes starting at `baseOffset` in a container.
 *
 * Reads and writes are local to the window and may never cross its end, so a
 * file inside the disc can be patched but never resized. The cursor may be
 * moved anywhere; accesses from an out-of-range cursor fail without moving it.
 *
 * ```ts
 * const view = image.open('PlSs.dat');
 * view.seek(0x1000);
 * const chunk = view.read(0x30);
 * ```
 */
export class ByteRangeView {
  private cursor = 0;

  constructor(
    private readonly container: Container,
    readonly baseOffset: number,
    readonly extent: number,
  ) {}

  private checkOffset(localOffset: number): void {
    if (!Number.isInteger(localOffset)) {
      throw new OutOfRangeError(`Offset ${localOffset} is not an integer`);
    }
    if (localOffset < 0) {
      throw new OutOfRangeError(`Offset ${localOffset} is negative`);
    }
    if (localOffset >= this.extent) {
      throw new OutOfRangeError(`Offset 0x${localOffset.toString(16)} is outside region of size 0x${this.extent.toString(16)}`);
    }
  }

  /**
   * Reads `count` bytes at `localOffset`. A negative or omitted count reads to
   * the end of the region.
   *
   * @throws {OutOfRangeError} If `localOffset` is not an integer, negative or not below the extent
   * @throws {InvalidArgumentError} If `count` is given but not an integer
   * @throws {RangeExceededError} If the read would pass the end of the region
   */
  readAt(localOffset: number, count?: number): Buffer {
    this.checkOffset(localOffset);
    if (count !== undefined && !Number.isInteger(count)) {
      throw new InvalidArgumentError(`Byte count ${count} is not an integer`);
    }
    const length = count === undefined || count < 0 ? this.extent - localOffset : count;
    if (localOffset + length > this.extent) {
      throw new RangeExceededError(`Cannot read 0x${length.toString(16)} bytes at 0x${localOffset.toString(16)}: region ends at 0x${this.extent.toString(16)}`);
    }
    return this.container.read(this.baseOffset + localOffset, length);
  }

  /**
   * Writes `data` at `localOffset` and returns the number of bytes written.
   *
   * @throws {OutOfRangeError} If `localOffset` is not an integer, negative or not below the extent
   * @throws {RangeExceededError} If the write would change the region's size
   */
  writeAt(localOffset: number, data: Uint8Array): number {
    this.checkOffset(localOffset);
    if (localOffset + data.length > this.extent) {
      throw new RangeExceededError(`Cannot write 0x${data.length.toString(16)} bytes at 0x${localOffset.toString(16)}: region size 0x${this.extent.toString(16)} is fixed`);
    }
    return this.container.write(this.baseOffset + localOffset, data);
  }

  /** Reads from the cursor and advances it by the number of bytes read. */
  read(count?: number): Buffer {
    const data = this.readAt(this.cursor, count);
    this.cursor += data.length;
    return data;
  }

  /** Writes at the cursor and advances it by the number of bytes written. */
  write(data: Uint8Array): number {
    const written = this.writeAt(this.cursor, data);
    this.cursor += written;
    return written;
  }

  /**
   * Moves the cursor and returns its new position. Positions outside the
   * region are accepted.
   *
   * @throws {InvalidArgumentError} If `whence` is not a {@link SeekWhence}
   */
  seek(offset: number, whence: SeekWhence = SeekWhence.Start): number {
    switch (whence) {
      case SeekWhence.Start:
        this.cursor = offset;
        break;
      case SeekWhence.Current:
        this.cursor += offset;
        break;
      case SeekWhence.End:
        this.cursor = this.extent + offset;
        break;
      default:
        throw new InvalidArgumentError(`Unknown seek origin: ${String(whence)}`);
    }
    return this.cursor;
  }

  tell(): number {
    return this.cursor;
  }

  // Nothing to release; the container is owned elsewhere.
  close(): void {}
}
