const HEX = '0123456789abcdef';

/** Lowercase hex rendering, two digits per byte, no separators. */
export function toHex(bytes: Uint8Array): string {
  let out = '';
  for (let i = 0; i < bytes.length; i += 1) {
    const byte = bytes[i]!;
    out += HEX[byte >>> 4]! + HEX[byte & 0x0f]!;
  }
  return out;
}
