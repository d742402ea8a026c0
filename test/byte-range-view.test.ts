import * as assert from 'node:assert';
import { ByteRangeView, SeekWhence } from '../src/byte-range-view.js';
import { BufferContainer } from '../src/container.js';
import { InvalidArgumentError, OutOfRangeError, RangeExceededError } from '../src/errors.js';

const BASE = 0x40;
const EXTENT = 0x20;

/** 0x100 bytes where each byte holds its own offset. */
function patternContainer(): BufferContainer {
  return new BufferContainer(Buffer.from(Array.from({ length: 0x100 }, (_, i) => i)));
}

describe('ByteRangeView reads', () => {
  let container: BufferContainer;
  let view: ByteRangeView;

  beforeEach(() => {
    container = patternContainer();
    view = new ByteRangeView(container, BASE, EXTENT);
  });

  it('should return exactly the container bytes of the range', () => {
    for (const [offset, count] of [[0, 1], [0, EXTENT], [5, 10], [EXTENT - 1, 1], [0x10, 0]]) {
      assert.deepStrictEqual(view.readAt(offset, count), container.buffer.subarray(BASE + offset, BASE + offset + count));
    }
  });

  it('should read to the end when count is omitted or negative', () => {
    assert.deepStrictEqual(view.readAt(0x1c), Buffer.from([0x5c, 0x5d, 0x5e, 0x5f]));
    assert.deepStrictEqual(view.readAt(0x1e, -1), Buffer.from([0x5e, 0x5f]));
  });

  it('should reject offsets outside the region', () => {
    assert.throws(() => view.readAt(-1, 1), OutOfRangeError);
    assert.throws(() => view.readAt(EXTENT, 0), OutOfRangeError);
    assert.throws(() => view.readAt(EXTENT + 0x100), OutOfRangeError);
  });

  it('should reject reads crossing the end of the region', () => {
    assert.throws(() => view.readAt(0x10, 0x11), RangeExceededError);
  });

  it('should advance the cursor by the bytes read', () => {
    assert.deepStrictEqual(view.read(4), Buffer.from([0x40, 0x41, 0x42, 0x43]));
    assert.strictEqual(view.tell(), 4);
    assert.strictEqual(view.read().length, EXTENT - 4);
    assert.strictEqual(view.tell(), EXTENT);
  });
});

describe('ByteRangeView writes', () => {
  let container: BufferContainer;
  let view: ByteRangeView;

  beforeEach(() => {
    container = patternContainer();
    view = new ByteRangeView(container, BASE, EXTENT);
  });

  it('should read back what was written', () => {
    const data = Buffer.from('patch', 'latin1');
    assert.strictEqual(view.writeAt(0x1b, data), 5);
    assert.deepStrictEqual(view.readAt(0x1b, 5), data);
    assert.strictEqual(container.buffer[BASE + 0x1a], 0x5a);
    assert.strictEqual(container.buffer[BASE + EXTENT], 0x60);
  });

  it('should never grow the region', () => {
    assert.throws(() => view.writeAt(0x1c, Buffer.alloc(5)), RangeExceededError);
    assert.strictEqual(container.buffer[BASE + 0x1c], 0x5c);
  });

  it('should reject offsets outside the region', () => {
    assert.throws(() => view.writeAt(EXTENT, Buffer.alloc(1)), OutOfRangeError);
    assert.throws(() => view.writeAt(-4, Buffer.alloc(1)), OutOfRangeError);
  });

  it('should leave the cursor unchanged after a failed write', () => {
    view.seek(0x1f);
    assert.throws(() => view.write(Buffer.alloc(2)), RangeExceededError);
    assert.strictEqual(view.tell(), 0x1f);
    assert.strictEqual(view.write(Buffer.from([0xff])), 1);
    assert.strictEqual(view.tell(), EXTENT);
    assert.strictEqual(container.buffer[BASE + 0x1f], 0xff);
  });
});

describe('ByteRangeView seeking', () => {
  let view: ByteRangeView;

  beforeEach(() => {
    view = new ByteRangeView(patternContainer(), BASE, EXTENT);
  });

  it('should seek relative to start, cursor and end', () => {
    assert.strictEqual(view.seek(0x10), 0x10);
    assert.deepStrictEqual(view.read(2), Buffer.from([0x50, 0x51]));
    assert.strictEqual(view.seek(4, SeekWhence.Current), 0x16);
    assert.strictEqual(view.seek(-8, SeekWhence.End), EXTENT - 8);
    assert.deepStrictEqual(view.read(), Buffer.from([0x58, 0x59, 0x5a, 0x5b, 0x5c, 0x5d, 0x5e, 0x5f]));
  });

  it('should reject an unknown origin', () => {
    const whence: number = 4;
    assert.throws(() => view.seek(0x20, whence), InvalidArgumentError);
  });

  it('should allow seeking past the end but fail the next read without moving', () => {
    view.seek(0, SeekWhence.End);
    assert.strictEqual(view.seek(0x20, SeekWhence.Current), EXTENT + 0x20);
    assert.throws(() => view.read(0x20), OutOfRangeError);
    assert.strictEqual(view.tell(), EXTENT + 0x20);
  });

  it('should allow seeking before the start', () => {
    assert.strictEqual(view.seek(-3), -3);
    assert.throws(() => view.read(1), OutOfRangeError);
    assert.strictEqual(view.tell(), -3);
  });
});

describe('ByteRangeView non-integer positions', () => {
  let container: BufferContainer;
  let view: ByteRangeView;

  beforeEach(() => {
    container = new BufferContainer(Buffer.alloc(0x100));
    view = new ByteRangeView(container, BASE, EXTENT);
  });

  it('should reject NaN and fractional offsets on write without touching the container', () => {
    assert.throws(() => view.writeAt(NaN, Buffer.from([0xde, 0xad])), OutOfRangeError);
    assert.throws(() => view.writeAt(1.5, Buffer.from([0xde, 0xad])), OutOfRangeError);
    assert.deepStrictEqual(container.buffer, Buffer.alloc(0x100));
  });

  it('should reject NaN and fractional offsets on read', () => {
    assert.throws(() => view.readAt(NaN, 1), OutOfRangeError);
    assert.throws(() => view.readAt(2.25), OutOfRangeError);
  });

  it('should reject non-integer counts other than omitted or negative ones', () => {
    assert.throws(() => view.readAt(0, NaN), InvalidArgumentError);
    assert.throws(() => view.readAt(0, 1.5), InvalidArgumentError);
    assert.throws(() => view.readAt(0, -0.5), InvalidArgumentError);
    assert.strictEqual(view.readAt(0x10, -1).length, 0x10);
  });

  it('should fail cursor reads after seeking to NaN without moving', () => {
    view.seek(NaN, SeekWhence.Current);
    assert.throws(() => view.read(4), OutOfRangeError);
    assert.throws(() => view.write(Buffer.from([1])), OutOfRangeError);
    assert.ok(Number.isNaN(view.tell()));
  });

  it('should reject NaN positions in the container itself', () => {
    assert.throws(() => container.write(NaN, Buffer.from([1])), OutOfRangeError);
    assert.throws(() => container.read(0.5, 1), OutOfRangeError);
  });
});
