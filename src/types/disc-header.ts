/**
 * Decoded disc header and loader descriptor.
 */
import type { FileEntry } from './file-entry.js';

export interface LoaderDescriptor {
  /** ASCII build date, e.g. `2001/11/14`. */
  readonly date: string;
  readonly entryPoint: number;
  readonly codeSize: number;
  readonly trailerSize: number;
  /** Absolute offset of the loader code. */
  readonly codeOffset: number;
}

export interface DiscHeader {
  readonly gameCode: string;
  readonly makerCode: string;
  readonly diskId: number;
  readonly version: number;
  readonly gameName: string;
  readonly executableOffset: number;
  /** Derived: the executable is assumed to end where the FST begins. */
  readonly executableSize: number;
  readonly fstOffset: number;
  readonly fstSize: number;
  /** Largest FST of a multi-disc set. Recorded only. */
  readonly maxFstSize: number;
  readonly loader: LoaderDescriptor;
  /** boot.bin, bi2.bin, fst.bin, start.dol, appldr.bin in that order. */
  readonly systemFiles: readonly FileEntry[];
}
