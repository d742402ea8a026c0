/**
 * Banner (`opening.bnr`) decoding. Only the magic and the text records are
 * decoded; pixel data is kept raw.
 */
import { FormatError } from './errors.js';
import type { BannerMetadata } from './types/banner.js';
import { readZeroTerminated } from './utils/strings.js';

const PIXEL_DATA_OFFSET = 0x20;
/** 96x32 pixels, two bytes each. */
const PIXEL_DATA_SIZE = 0x1800;
const METADATA_OFFSET = PIXEL_DATA_OFFSET + PIXEL_DATA_SIZE;
const METADATA_SIZE = 0x140;

function readMetadata(bytes: Buffer, offset: number): BannerMetadata {
  return {
    gameName: readZeroTerminated(bytes, offset, 0x20),
    developerName: readZeroTerminated(bytes, offset + 0x20, 0x20),
    fullGameTitle: readZeroTerminated(bytes, offset + 0x40, 0x40),
    fullDeveloperName: readZeroTerminated(bytes, offset + 0x80, 0x40),
    gameDescription: readZeroTerminated(bytes, offset + 0xc0, 0x80),
  };
}

export class BannerFile {
  private constructor(
    /** `BNR1` for single-language banners, `BNR2` for PAL ones. */
    readonly magic: string,
    /** 16-bit pixels in 4x4 tiles, undecoded. */
    readonly pixelData: Buffer,
    readonly metadata: readonly BannerMetadata[],
  ) {}

  /**
   * @throws {FormatError} If `bytes` cannot hold the image and one metadata record
   */
  static parse(bytes: Buffer): BannerFile {
    if (bytes.length < METADATA_OFFSET + METADATA_SIZE) {
      throw new FormatError(`Banner too small: 0x${bytes.length.toString(16)} bytes`);
    }
    const count = Math.floor((bytes.length - METADATA_OFFSET) / METADATA_SIZE);
    const metadata: BannerMetadata[] = [];
    for (let i = 0; i < count; i += 1) {
      metadata.push(readMetadata(bytes, METADATA_OFFSET + i * METADATA_SIZE));
    }
    return new BannerFile(
      bytes.toString('latin1', 0, 4),
      Buffer.from(bytes.subarray(PIXEL_DATA_OFFSET, METADATA_OFFSET)),
      metadata,
    );
  }
}
