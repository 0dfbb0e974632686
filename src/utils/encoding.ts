/**
 * Byte and text conversions shared by the fingerprint, SCT and certificate code
 */

/**
 * View any ArrayBuffer or ArrayBufferView as a Uint8Array without copying
 */
export function toUint8Array(data: ArrayBuffer | ArrayBufferView): Uint8Array {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (ArrayBuffer.isView(data)) {
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }
  return new Uint8Array(data);
}

/**
 * Convert bytes to an uppercase hex string, optionally joining pairs with a separator
 */
export function bytesToHex(bytes: Uint8Array, separator: string = ""): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0").toUpperCase())
    .join(separator);
}

/**
 * Convert an even-length hex string (no separators) to bytes
 */
export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || /[^0-9A-Fa-f]/.test(hex)) {
    throw new Error(`Invalid hex string: ${hex}`);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = parseInt(hex.substring(i, i + 2), 16);
  }
  return bytes;
}

/**
 * Read a big-endian unsigned 16-bit integer
 */
export function readUint16BE(bytes: Uint8Array, offset: number): number {
  return (bytes[offset] << 8) | bytes[offset + 1];
}

/**
 * Read a big-endian unsigned 64-bit integer as a number.
 * Values above Number.MAX_SAFE_INTEGER lose precision.
 */
export function readUint64BE(bytes: Uint8Array, offset: number): number {
  const view = new DataView(bytes.buffer, bytes.byteOffset + offset, 8);
  return Number(view.getBigUint64(0, false));
}

/**
 * Format a Date as YYYY-MM-DD in UTC.
 * Dates are instants, so a source offset such as +02:00 is not kept.
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Format a Date as an ISO 8601 UTC timestamp without milliseconds
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
