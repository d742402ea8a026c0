/**
 * Helpers for the fixed-width and zero-terminated strings found in disc structures.
 */

/**
 * Decodes bytes from `offset` up to the first zero byte, `maxLength` bytes, or
 * the end of the buffer, whichever comes first. One character per byte, so
 * any name bytes survive the round trip through a string.
 */
export function readZeroTerminated(buffer: Buffer, offset: number, maxLength: number = buffer.length - offset): string {
  const limit = Math.min(buffer.length, offset + maxLength);
  let end = offset;
  while (end < limit && buffer[end] !== 0) {
    end += 1;
  }
  return buffer.toString('latin1', offset, end);
}

export function hex(value: number): string {
  return `0x${value.toString(16)}`;
}
