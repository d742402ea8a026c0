import * as assert from 'node:assert';
import { BufferContainer } from '../src/container.js';
import { DiscLayout } from '../src/disc-layout.js';
import { FormatError } from '../src/errors.js';
import type { DiscHeader } from '../src/types/disc-header.js';
import { SparseContainer, buildDisc, layoutDisc } from './helpers/disc-builder.js';
import { SMALL_DISC } from './helpers/fixtures.js';

describe('DiscLayout.parse', () => {
  let header: DiscHeader;

  before(() => {
    header = DiscLayout.parse(new BufferContainer(buildDisc(SMALL_DISC).buffer));
  });

  it('should decode the identification fields', () => {
    assert.strictEqual(header.gameCode, 'GTST');
    assert.strictEqual(header.makerCode, '01');
    assert.strictEqual(header.diskId, 1);
    assert.strictEqual(header.version, 2);
    assert.strictEqual(header.gameName, 'Super Test Bros');
  });

  it('should derive the executable size from the FST offset', () => {
    // 0x40 bytes of loader code push the executable to 0x2500; the 0x280-byte
    // DOL is followed by the FST at the next 0x100 boundary.
    assert.strictEqual(header.executableOffset, 0x2500);
    assert.strictEqual(header.fstOffset, 0x2800);
    assert.strictEqual(header.executableSize, 0x300);
    assert.strictEqual(header.maxFstSize, header.fstSize);
  });

  it('should decode the loader descriptor', () => {
    assert.deepStrictEqual(header.loader, {
      date: '2001/11/14',
      entryPoint: 0x81200268,
      codeSize: 0x40,
      trailerSize: 0x1ade0,
      codeOffset: 0x2460,
    });
  });

  it('should synthesize the system regions', () => {
    assert.deepStrictEqual(header.systemFiles, [
      { path: 'boot.bin', offset: 0x0, size: 0x440 },
      { path: 'bi2.bin', offset: 0x440, size: 0x2000 },
      { path: 'fst.bin', offset: 0x2800, size: header.fstSize },
      { path: 'start.dol', offset: 0x2500, size: 0x300 },
      { path: 'appldr.bin', offset: 0x2460, size: 0x40 },
    ]);
  });

  it('should stop the game name at 0x3e0 bytes', () => {
    const { buffer } = buildDisc(SMALL_DISC);
    buffer.fill(0x41, 0x20, 0x420);
    assert.strictEqual(DiscLayout.parse(new BufferContainer(buffer)).gameName, 'A'.repeat(0x3e0));
  });

  it('should decode a full-size image header', () => {
    const layout = layoutDisc({
      gameCode: 'GALE',
      version: 2,
      executableOffset: 0x1e800,
      fstOffset: 0x456e00,
      fstSize: 0x7529,
      files: [{ path: 'TyPokeD.dat', offset: 0x3acf0000, size: 0x327e2 }],
      imageSize: 0x57058000,
    });
    const parsed = DiscLayout.parse(new SparseContainer(layout.size, layout.chunks));
    assert.strictEqual(parsed.gameCode, 'GALE');
    assert.strictEqual(parsed.version, 2);
    assert.strictEqual(parsed.fstOffset, 0x456e00);
    assert.strictEqual(parsed.fstSize, 0x7529);
    assert.strictEqual(parsed.maxFstSize, 0x7529);
    assert.strictEqual(parsed.executableSize, 0x456e00 - 0x1e800);
  });

  it('should reject a truncated image', () => {
    const { buffer } = buildDisc(SMALL_DISC);
    assert.throws(() => DiscLayout.parse(new BufferContainer(buffer.subarray(0, 0x2450))), FormatError);
  });

  it('should reject an FST placed before the executable', () => {
    const { buffer } = buildDisc(SMALL_DISC);
    buffer.writeUInt32BE(0x2400, 0x424);
    assert.throws(() => DiscLayout.parse(new BufferContainer(buffer)), FormatError);
  });
});
