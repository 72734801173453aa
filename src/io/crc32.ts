const POLYNOMIAL = 0xEDB88320;

function tableEntry(byte: number): number {
    let v = byte;
    for (let bit = 0; bit < 8; bit++) v = v & 1 ? POLYNOMIAL ^ (v >>> 1) : v >>> 1;
    return v >>> 0;
}

const TABLE = Uint32Array.from({ length: 256 }, (_, byte) => tableEntry(byte));

/**
 * Reflected IEEE CRC-32, the checksum in front of every save image.
 *
 * Pass the previous return value as `seed` to continue a checksum over several slices.
 */
export function crc32(bytes: Uint8Array, seed = 0): number {
    let state = ~seed >>> 0;
    for (const byte of bytes) state = TABLE[(state ^ byte) & 0xFF] ^ (state >>> 8);
    return ~state >>> 0;
}
