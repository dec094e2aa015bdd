/**
 * Magnitude <-> byte packing.
 *
 * The engine side is always big-endian; `reverse` flips to/from the caller's
 * little-endian layout. Only the unsigned magnitude is encoded.
 */

/**
 * Hex digits of `bytes` read big-endian, after reversing a copy when asked.
 * Empty input gives the empty string.
 */
export function bytesToHex(bytes: Uint8Array, reverse: boolean): string {
  const copy = Buffer.from(bytes);
  if (reverse) copy.reverse();
  return copy.toString('hex');
}

/**
 * Hex of a non-negative value padded to a whole number of bytes.
 */
export function evenHex(magnitude: bigint): string {
  const hex = magnitude.toString(16);
  return hex.length % 2 ? `0${hex}` : hex;
}

/**
 * Drop leading zero bytes. Zero itself becomes an empty buffer.
 */
export function trimLeadingZeros(bytes: Buffer): Buffer {
  let i = 0;
  while (i < bytes.length && bytes[i] === 0) i++;
  return bytes.subarray(i);
}

/**
 * Pack a non-negative value as minimal big-endian bytes, reversed when asked.
 */
export function magnitudeToBytes(magnitude: bigint, reverse: boolean): Buffer {
  const packed = trimLeadingZeros(Buffer.from(evenHex(magnitude), 'hex'));
  const out = Buffer.from(packed);
  return reverse ? out.reverse() : out;
}
