/**
 * LZ4 block format (not frame format), used for chunks whose compressor byte is 5.
 */

import { CorruptChunkError } from '../errors.js';
import { ByteWriter } from '../io/writer.js';

// Block format end conditions: the last match starts at least 12 bytes before the end,
// and the final 5 bytes are always literals.
const MF_LIMIT = 12;
const LAST_LITERALS = 5;
const MIN_MATCH = 4;

/**
 * Decompresses one LZ4 block into exactly `destSize` bytes.
 *
 * Malformed input (offsets before the start of the output, sequences running past either
 * buffer, or a block that ends short of `destSize`) raises `CorruptChunkError`.
 */
export function decompressLZ4Block(src: Uint8Array, destSize: number): Uint8Array {
    const dest = new Uint8Array(destSize);
    let srcOffset = 0;
    let destOffset = 0;

    const corrupt = (reason: string): CorruptChunkError =>
        new CorruptChunkError(`LZ4 block is corrupt: ${reason}`, { srcOffset, destOffset });

    const readLength = (base: number): number => {
        let len = base;
        let b: number;
        do {
            if (srcOffset >= src.length) throw corrupt('length runs past the input');
            b = src[srcOffset++];
            len += b;
        } while (b === 255);
        return len;
    };

    while (srcOffset < src.length) {
        const token = src[srcOffset++];
        let literalLen = token >> 4;
        if (literalLen === 15) literalLen = readLength(literalLen);

        if (srcOffset + literalLen > src.length) throw corrupt('literals run past the input');
        if (destOffset + literalLen > destSize) throw corrupt('literals overflow the output');
        dest.set(src.subarray(srcOffset, srcOffset + literalLen), destOffset);
        srcOffset += literalLen;
        destOffset += literalLen;

        // The last sequence carries literals only.
        if (srcOffset === src.length) break;

        if (srcOffset + 2 > src.length) throw corrupt('match offset runs past the input');
        const matchOffset = src[srcOffset] | (src[srcOffset + 1] << 8);
        srcOffset += 2;
        if (matchOffset === 0 || matchOffset > destOffset) throw corrupt(`invalid match offset ${matchOffset}`);

        let matchLen = token & 0x0F;
        if (matchLen === 15) matchLen = readLength(matchLen);
        matchLen += MIN_MATCH;
        if (destOffset + matchLen > destSize) throw corrupt('match overflows the output');

        // Overlapping copies are legal, so copy byte by byte.
        const matchStart = destOffset - matchOffset;
        for (let i = 0; i < matchLen; i++) dest[destOffset++] = dest[matchStart + i];
    }

    if (destOffset !== destSize) throw corrupt(`decoded ${destOffset} of ${destSize} bytes`);
    return dest;
}

function writeLengthExtension(out: ByteWriter, len: number): void {
    let n = len - 15;
    while (n >= 255) {
        out.writeUint8(255);
        n -= 255;
    }
    out.writeUint8(n);
}

function writeSequence(out: ByteWriter, literals: Uint8Array, match?: { offset: number; length: number }): void {
    const litLen = literals.length;
    const matchNib = match ? Math.min(match.length - MIN_MATCH, 15) : 0;
    out.writeUint8((Math.min(litLen, 15) << 4) | matchNib);
    if (litLen >= 15) writeLengthExtension(out, litLen);
    out.writeBytes(literals);
    if (!match) return;
    out.writeUint8(match.offset & 0xFF);
    out.writeUint8((match.offset >>> 8) & 0xFF);
    if (match.length - MIN_MATCH >= 15) writeLengthExtension(out, match.length - MIN_MATCH);
}

/**
 * LZ4 block compressor.
 *
 * Notes:
 * - greedy single-probe hash matcher, offsets up to 65535
 * - output is a valid block for any conforming decoder, not a byte-for-byte match of liblz4
 */
export function compressLZ4Block(src: Uint8Array): Uint8Array {
    const out = new ByteWriter();
    if (src.length < MF_LIMIT + 1) {
        writeSequence(out, src);
        return out.toUint8Array();
    }

    const hashBits = 16;
    const head = new Int32Array(1 << hashBits).fill(-1);
    const hash = (p: number): number => {
        const v = src[p] | (src[p + 1] << 8) | (src[p + 2] << 16) | (src[p + 3] << 24);
        return Math.imul(v, 2654435761) >>> (32 - hashBits);
    };

    const matchLimit = src.length - LAST_LITERALS;
    const searchLimit = src.length - MF_LIMIT;
    let anchor = 0;
    let i = 0;
    while (i <= searchLimit) {
        const h = hash(i);
        const ref = head[h];
        head[h] = i;

        if (ref >= 0 && i - ref <= 0xFFFF) {
            let mlen = 0;
            while (i + mlen < matchLimit && src[ref + mlen] === src[i + mlen]) mlen++;
            if (mlen >= MIN_MATCH) {
                writeSequence(out, src.subarray(anchor, i), { offset: i - ref, length: mlen });
                const stop = Math.min(i + mlen, searchLimit + 1);
                for (let p = i + 1; p < stop; p++) head[hash(p)] = p;
                i += mlen;
                anchor = i;
                continue;
            }
        }
        i++;
    }

    writeSequence(out, src.subarray(anchor));
    return out.toUint8Array();
}
