/**
 * gcm-tools - Main entry point
 *
 * Reads and patches files inside GameCube disc images and decodes the DOL
 * executables and banners stored in them.
 */

export { DiscImage } from './disc-image.js';
export { DiscLayout } from './disc-layout.js';
export { FileTable } from './file-table.js';
export { ByteRangeView, SeekWhence } from './byte-range-view.js';
export { ExecutableLayout, EXECUTABLE_BODY_OFFSET } from './executable-layout.js';
export { BannerFile } from './banner-file.js';
export { BufferContainer, FileContainer } from './container.js';
export type { Container } from './container.js';
export {
  DiscImageError,
  FormatError,
  InvalidArgumentError,
  NotFoundError,
  OutOfRangeError,
  RangeExceededError,
} from './errors.js';
export { SYSTEM_FILES } from './constants/disc-offsets.js';

export type { DiscHeader, LoaderDescriptor } from './types/disc-header.js';
export type { FileEntry } from './types/file-entry.js';
export type { FstEntry } from './types/fst-entry.js';
export type { ExecutableSection, SectionKind } from './types/executable-section.js';
export type { BannerMetadata } from './types/banner.js';
