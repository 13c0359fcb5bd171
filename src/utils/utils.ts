// src/utils/utils.ts

const ASCII_MAX = 0x7f;

/**
 * Allocates a zero-filled Uint8Array.
 * @param size - Length of the array
 */
export function allocUint8Array(size: number): Uint8Array {
  return new Uint8Array(size);
}

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Decodes bytes as ASCII, dropping anything above 0x7F.
 * @param data - Raw bytes (strings pass through the same filter)
 */
export function decodeAscii(data: Uint8Array | string): string {
  let out = '';
  if (typeof data === 'string') {
    for (let i = 0; i < data.length; i++) {
      if (data.charCodeAt(i) <= ASCII_MAX) out += data.charAt(i);
    }
    return out;
  }
  for (const byte of data) {
    if (byte <= ASCII_MAX) out += String.fromCharCode(byte);
  }
  return out;
}

/**
 * Encodes an ASCII string as bytes.
 */
export function encodeAscii(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'ascii'));
}

/**
 * Quotes a wire string for logs, with control characters escaped.
 * @example toPrintable('AI1\r;') // "'AI1\\r;'"
 */
export function toPrintable(text: string): string {
  const escaped = Array.from(text, ch => {
    const code = ch.charCodeAt(0);
    if (ch === '\r') return '\\r';
    if (ch === '\n') return '\\n';
    if (ch === '\t') return '\\t';
    if (ch === "'") return "\\'";
    if (ch === '\\') return '\\\\';
    if (code < 0x20 || code === ASCII_MAX) return `\\x${code.toString(16).padStart(2, '0')}`;
    return ch;
  }).join('');
  return `'${escaped}'`;
}

/**
 * Zero-pads an azimuth to the given width. Wider values keep all digits.
 */
export function padAzimuth(azimuth: number, width: number): string {
  return String(azimuth).padStart(width, '0');
}

/**
 * Returns true for an ASCII decimal digit.
 */
export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}
