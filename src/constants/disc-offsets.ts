/**
 * Fixed positions in a GameCube disc image.
 */

export const GAME_CODE_OFFSET = 0x00;
export const MAKER_CODE_OFFSET = 0x04;
export const DISK_ID_OFFSET = 0x06;
export const VERSION_OFFSET = 0x07;
export const GAME_NAME_OFFSET = 0x20;
export const GAME_NAME_MAX_LENGTH = 0x3e0;

/** executableOffset, fstOffset, fstSize, maxFstSize. */
export const LAYOUT_FIELDS_OFFSET = 0x420;

export const BOOT_HEADER_OFFSET = 0x0;
export const BOOT_HEADER_SIZE = 0x440;
export const DISC_INFO_OFFSET = 0x440;
export const DISC_INFO_SIZE = 0x2000;

export const LOADER_DESCRIPTOR_OFFSET = 0x2440;
export const LOADER_DATE_LENGTH = 10;
/** Date, 6 reserved bytes, entry point, code size, trailer size. */
export const LOADER_DESCRIPTOR_SIZE = 0x1c;
export const LOADER_CODE_OFFSET = LOADER_DESCRIPTOR_OFFSET + 0x20;

export const FST_ENTRY_SIZE = 0xc;

/** Names of the regions synthesized from the header rather than the FST. */
export const SYSTEM_FILES = {
  bootHeader: 'boot.bin',
  discInfo: 'bi2.bin',
  fileSystemTable: 'fst.bin',
  executable: 'start.dol',
  loader: 'appldr.bin',
} as const;

export const PATH_SEPARATOR = '/';
