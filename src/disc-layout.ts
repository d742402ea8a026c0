/**
 * Disc header decoding.
 */
import type { Container } from './container.js';
import { FormatError } from './errors.js';
import type { DiscHeader, LoaderDescriptor } from './types/disc-header.js';
import type { FileEntry } from './types/file-entry.js';
import { readZeroTerminated } from './utils/strings.js';
import {
  BOOT_HEADER_OFFSET,
  BOOT_HEADER_SIZE,
  DISC_INFO_OFFSET,
  DISC_INFO_SIZE,
  DISK_ID_OFFSET,
  GAME_CODE_OFFSET,
  GAME_NAME_MAX_LENGTH,
  GAME_NAME_OFFSET,
  LAYOUT_FIELDS_OFFSET,
  LOADER_CODE_OFFSET,
  LOADER_DATE_LENGTH,
  LOADER_DESCRIPTOR_OFFSET,
  LOADER_DESCRIPTOR_SIZE,
  MAKER_CODE_OFFSET,
  SYSTEM_FILES,
  VERSION_OFFSET,
} from './constants/disc-offsets.js';

const HEADER_END = LOADER_DESCRIPTOR_OFFSET + LOADER_DESCRIPTOR_SIZE;

function readLoaderDescriptor(buffer: Buffer): LoaderDescriptor {
  const base = LOADER_DESCRIPTOR_OFFSET;
  return {
    date: buffer.toString('latin1', base, base + LOADER_DATE_LENGTH),
    entryPoint: buffer.readUInt32BE(base + 0x10),
    codeSize: buffer.readUInt32BE(base + 0x14),
    trailerSize: buffer.readUInt32BE(base + 0x18),
    codeOffset: LOADER_CODE_OFFSET,
  };
}

/**
 * Decoder for the fixed-offset fields at the start of a disc image.
 */
export class DiscLayout {
  /**
   * Reads the disc header, the layout fields at 0x420 and the loader
   * descriptor, and derives the regions that the FST does not list.
   *
   * @throws {FormatError} If the container is too short to hold the header,
   *   or the FST is placed before the executable
   */
  static parse(container: Container): DiscHeader {
    if (container.size < HEADER_END) {
      throw new FormatError(`Image too small for a disc header: 0x${container.size.toString(16)} bytes`);
    }
    const buffer = container.read(0, HEADER_END);

    const executableOffset = buffer.readUInt32BE(LAYOUT_FIELDS_OFFSET);
    const fstOffset = buffer.readUInt32BE(LAYOUT_FIELDS_OFFSET + 4);
    const fstSize = buffer.readUInt32BE(LAYOUT_FIELDS_OFFSET + 8);
    const maxFstSize = buffer.readUInt32BE(LAYOUT_FIELDS_OFFSET + 12);
    const executableSize = fstOffset - executableOffset;
    if (executableSize < 0) {
      throw new FormatError(`FST offset 0x${fstOffset.toString(16)} precedes executable offset 0x${executableOffset.toString(16)}`);
    }

    const loader = readLoaderDescriptor(buffer);
    const systemFiles: FileEntry[] = [
      { path: SYSTEM_FILES.bootHeader, offset: BOOT_HEADER_OFFSET, size: BOOT_HEADER_SIZE },
      { path: SYSTEM_FILES.discInfo, offset: DISC_INFO_OFFSET, size: DISC_INFO_SIZE },
      { path: SYSTEM_FILES.fileSystemTable, offset: fstOffset, size: fstSize },
      { path: SYSTEM_FILES.executable, offset: executableOffset, size: executableSize },
      { path: SYSTEM_FILES.loader, offset: loader.codeOffset, size: loader.codeSize },
    ];

    return {
      gameCode: buffer.toString('latin1', GAME_CODE_OFFSET, GAME_CODE_OFFSET + 4),
      makerCode: buffer.toString('latin1', MAKER_CODE_OFFSET, MAKER_CODE_OFFSET + 2),
      diskId: buffer.readUInt8(DISK_ID_OFFSET),
      version: buffer.readUInt8(VERSION_OFFSET),
      gameName: readZeroTerminated(buffer, GAME_NAME_OFFSET, GAME_NAME_MAX_LENGTH),
      executableOffset,
      executableSize,
      fstOffset,
      fstSize,
      maxFstSize,
      loader,
      systemFiles,
    };
  }
}
