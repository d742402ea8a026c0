/**
 * A file inside the disc image.
 */
export interface FileEntry {
  /** Path relative to the disc root, `/`-separated, one character per name byte. */
  readonly path: string;
  /** Absolute byte offset in the image. */
  readonly offset: number;
  readonly size: number;
}
