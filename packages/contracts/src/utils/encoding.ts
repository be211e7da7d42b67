// Base64url, CRC32 and bit-packing helpers for compact maze share codes

/**
 * Convert bytes to a base64url string without padding.
 * Works in chunks so large mazes do not overflow the argument limit.
 */
export function toBase64Url(bytes: Uint8Array): string {
  const CHUNK_SIZE = 0x8000;
  let binary = "";
  for (let i = 0; i < bytes.length; i += CHUNK_SIZE) {
    const chunk = bytes.subarray(i, Math.min(i + CHUNK_SIZE, bytes.length));
    binary += String.fromCharCode(...chunk);
  }
  return btoa(binary)
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=+$/g, "");
}

/**
 * Convert a base64url string (padded or not) back to bytes.
 */
export function fromBase64Url(input: string): Uint8Array {
  let base64 = input.replace(/-/g, "+").replace(/_/g, "/");
  while (base64.length % 4 !== 0) base64 += "=";
  const binary = atob(base64);
  const out = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) out[i] = binary.charCodeAt(i);
  return out;
}

/**
 * CRC32 (IEEE polynomial) used to make share codes tamper-evident.
 */
export function crc32(input: string | Uint8Array): number {
  const bytes =
    typeof input === "string" ? new TextEncoder().encode(input) : input;
  let crc = 0xffffffff;

  for (const byte of bytes) {
    crc ^= byte;
    for (let bit = 0; bit < 8; bit++) {
      const mask = -(crc & 1);
      crc = (crc >>> 1) ^ (0xedb88320 & mask);
    }
  }

  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * Pack booleans into bytes, LSB-first within each byte.
 */
export function bitPack(flags: readonly boolean[]): Uint8Array {
  const out = new Uint8Array(Math.ceil(flags.length / 8));
  flags.forEach((flag, i) => {
    if (!flag) return;
    const byteIndex = i >>> 3;
    out[byteIndex] = (out[byteIndex] ?? 0) | (1 << (i & 7));
  });
  return out;
}

/**
 * Unpack `count` booleans packed by {@link bitPack}.
 * @throws Error if `packed` is too short for `count` flags
 */
export function bitUnpack(packed: Uint8Array, count: number): boolean[] {
  const requiredBytes = Math.ceil(count / 8);
  if (packed.length < requiredBytes) {
    throw new Error(
      `Packed array too small: need ${requiredBytes} bytes for ${count} flags, got ${packed.length}`,
    );
  }

  const out: boolean[] = new Array<boolean>(count);
  for (let i = 0; i < count; i++) {
    const byte = packed[i >>> 3] ?? 0;
    out[i] = ((byte >> (i & 7)) & 1) === 1;
  }
  return out;
}
