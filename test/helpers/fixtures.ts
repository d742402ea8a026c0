/**
 * Small synthetic disc shared by the decoding tests.
 */
import { buildDol } from './dol-builder.js';
import type { DiscSpec } from './disc-builder.js';

export function patternBytes(length: number, seed: number): Buffer {
  return Buffer.from(Array.from({ length }, (_, i) => (i * 7 + seed) & 0xff));
}

export const SMALL_DOL = buildDol({
  text: [{ fileOffset: 0x100, memAddress: 0x80003100, size: 0x100 }],
  data: [{ fileOffset: 0x200, memAddress: 0x80004000, size: 0x80 }],
  bssMemAddress: 0x80004080,
  bssSize: 0x40,
  entryPoint: 0x80003100,
  length: 0x280,
});

/**
 * Registry order after the five system files:
 * audio/1padv.ssm, audio/us/1padv.ssm, audio/us/bigblue.ssm,
 * audio/akaneia.hps, PlSs.dat, readme.txt
 */
export const SMALL_DISC: DiscSpec = {
  gameCode: 'GTST',
  makerCode: '01',
  diskId: 1,
  version: 2,
  gameName: 'Super Test Bros',
  loaderDate: '2001/11/14',
  loaderEntryPoint: 0x81200268,
  loaderCode: patternBytes(0x40, 3),
  loaderTrailerSize: 0x1ade0,
  executable: SMALL_DOL,
  files: [
    { path: 'audio/1padv.ssm', data: patternBytes(0x30, 1) },
    { path: 'audio/us/1padv.ssm', data: patternBytes(0x11, 2) },
    { path: 'audio/us/bigblue.ssm', data: patternBytes(0x25, 4) },
    { path: 'audio/akaneia.hps', data: patternBytes(0x08, 5) },
    { path: 'PlSs.dat', data: patternBytes(0x300, 6) },
    { path: 'readme.txt', data: Buffer.from('hello disc\n', 'latin1') },
  ],
};
