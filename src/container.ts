/**
 * Byte containers backing a disc image.
 *
 * Everything above this layer addresses the disc through absolute byte
 * positions; a container only has to serve those ranges synchronously.
 */
import { closeSync, fstatSync, openSync, readSync, writeSync } from 'node:fs';
import { DiscImageError, OutOfRangeError, RangeExceededError } from './errors.js';

/**
 * Seekable, readable, writable byte store.
 */
export interface Container {
  /** Total number of addressable bytes. */
  readonly size: number;
  /**
   * Reads `length` bytes starting at `position`.
   * Implementations return fewer bytes only when the range runs past `size`.
   */
  read(position: number, length: number): Buffer;
  /** Writes `data` at `position` and returns the number of bytes written. */
  write(position: number, data: Uint8Array): number;
  close(): void;
}

function checkPosition(size: number, position: number): void {
  if (!Number.isInteger(position) || position < 0 || position > size) {
    throw new OutOfRangeError(`Container position 0x${position.toString(16)} is outside [0, 0x${size.toString(16)}]`);
  }
}

function checkAccess(size: number, position: number, length: number): void {
  checkPosition(size, position);
  if (position + length > size) {
    throw new RangeExceededError(`Access of ${length} bytes at 0x${position.toString(16)} runs past container end 0x${size.toString(16)}`);
  }
}

/**
 * Container backed by an open file descriptor.
 */
export class FileContainer implements Container {
  private fd: number | null;
  readonly size: number;

  private constructor(fd: number, size: number, readonly filePath: string, readonly writable: boolean) {
    this.fd = fd;
    this.size = size;
  }

  /**
   * Opens a disc image file. Writes go straight to the file, so `writable`
   * must be requested explicitly.
   */
  static open(filePath: string, { writable = false }: { readonly writable?: boolean } = {}): FileContainer {
    const fd = openSync(filePath, writable ? 'r+' : 'r');
    try {
      return new FileContainer(fd, fstatSync(fd).size, filePath, writable);
    } catch (error) {
      closeSync(fd);
      throw error;
    }
  }

  private descriptor(): number {
    if (this.fd === null) {
      throw new DiscImageError(`Container for ${this.filePath} is closed`);
    }
    return this.fd;
  }

  read(position: number, length: number): Buffer {
    checkPosition(this.size, position);
    const available = Math.max(0, Math.min(length, this.size - position));
    const buffer = Buffer.alloc(available);
    let done = 0;
    while (done < available) {
      const count = readSync(this.descriptor(), buffer, done, available - done, position + done);
      if (count === 0) {
        break;
      }
      done += count;
    }
    return done === available ? buffer : buffer.subarray(0, done);
  }

  write(position: number, data: Uint8Array): number {
    if (!this.writable) {
      throw new DiscImageError(`Container for ${this.filePath} was opened read-only`);
    }
    checkAccess(this.size, position, data.length);
    let done = 0;
    while (done < data.length) {
      done += writeSync(this.descriptor(), data, done, data.length - done, position + done);
    }
    return done;
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

/**
 * Container over an in-memory buffer. Writes modify the buffer in place.
 */
export class BufferContainer implements Container {
  constructor(readonly buffer: Buffer) {}

  get size(): number {
    return this.buffer.length;
  }

  read(position: number, length: number): Buffer {
    checkPosition(this.size, position);
    return Buffer.from(this.buffer.subarray(position, position + length));
  }

  write(position: number, data: Uint8Array): number {
    checkAccess(this.size, position, data.length);
    this.buffer.set(data, position);
    return data.length;
  }

  close(): void {}
}
