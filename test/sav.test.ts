import { describe, expect, it } from 'vitest';

import { CorruptChunkError, TypeMismatchError } from '../src/errors.js';
import { compressBlock, COMPRESSOR_IDS, inferGzipLevel, inferZlibLevel } from '../src/sav/compression.js';
import {
    CHUNK_TAG,
    DEFAULT_BLOCK_SIZE,
    isSavContent,
    parseSavContainer,
    serializeSavContainer,
    type CompressionSettings,
} from '../src/sav/container.js';
import { compressLZ4Block, decompressLZ4Block } from '../src/sav/lz4.js';
import { ascii, build } from './helpers.js';

function image(body: Uint8Array, saveVersion = 9): Uint8Array {
    return build((w) => {
        w.writeZeros(8);
        w.writeUint32(saveVersion);
        w.writeBytes(body);
    });
}

function settings(compressor: CompressionSettings['compressor'], level = 6, blockSize = DEFAULT_BLOCK_SIZE): CompressionSettings {
    return { compressor, blockSize, level };
}

/** A save file holding one hand-built chunk whose header declares `uncompressedSize`. */
function singleChunkFile(compressor: CompressionSettings['compressor'], block: Uint8Array, uncompressedSize: number): Uint8Array {
    return build((w) => {
        w.writeZeros(8);
        w.writeUint32(9);
        w.writeBigUint64(CHUNK_TAG);
        w.writeBigUint64(BigInt(DEFAULT_BLOCK_SIZE));
        w.writeUint8(COMPRESSOR_IDS[compressor]);
        for (let i = 0; i < 2; i++) {
            w.writeBigUint64(BigInt(block.length));
            w.writeBigUint64(BigInt(uncompressedSize));
        }
        w.writeBytes(block);
    });
}

function chunkError(file: Uint8Array): CorruptChunkError {
    try {
        parseSavContainer(file);
    } catch (err) {
        if (err instanceof CorruptChunkError) return err;
        throw err;
    }
    throw new Error('expected CorruptChunkError');
}

const repetitive = Uint8Array.from({ length: 1000 }, (_, i) => (i % 7) * 3);

describe('lz4', () => {
    it('decodes literals, overlapping matches and a literal-only tail', () => {
        const block = Uint8Array.of(0x44, ...ascii('abcd'), 0x04, 0x00, 0x10, ...ascii('e'));
        expect(decompressLZ4Block(block, 13)).toEqual(ascii('abcdabcdabcde'));
    });

    it('rejects a match offset before the start of the output', () => {
        expect(() => decompressLZ4Block(Uint8Array.of(0x10, 0x61, 0x05, 0x00), 10)).toThrow(CorruptChunkError);
    });

    it('rejects a block that decodes short', () => {
        expect(() => decompressLZ4Block(Uint8Array.of(0x20, 0x61, 0x62), 3)).toThrow(/decoded 2 of 3 bytes/);
    });

    it('stores short inputs as a single literal run', () => {
        expect(compressLZ4Block(ascii('hello'))).toEqual(Uint8Array.of(0x50, ...ascii('hello')));
        expect(compressLZ4Block(new Uint8Array(0))).toEqual(Uint8Array.of(0x00));
    });

    it('compresses repetitive input and decodes it back', () => {
        const packed = compressLZ4Block(repetitive);
        expect(packed.length).toBeLessThan(repetitive.length);
        expect(decompressLZ4Block(packed, repetitive.length)).toEqual(repetitive);
    });

    it('round-trips input with long literal runs', () => {
        const noisy = Uint8Array.from({ length: 600 }, (_, i) => (i * 131 + (i >> 3) * 17) & 0xFF);
        expect(decompressLZ4Block(compressLZ4Block(noisy), noisy.length)).toEqual(noisy);
    });
});

describe('deflate level inference', () => {
    it('reads FLEVEL from zlib headers', () => {
        expect(inferZlibLevel(Uint8Array.of(0x78, 0x01))).toBe(1);
        expect(inferZlibLevel(Uint8Array.of(0x78, 0x9C))).toBe(6);
        expect(inferZlibLevel(Uint8Array.of(0x78, 0xDA))).toBe(9);
    });

    it('reads XFL from gzip headers', () => {
        const header = (xfl: number) => Uint8Array.of(0x1F, 0x8B, 8, 0, 0, 0, 0, 0, xfl, 3);
        expect(inferGzipLevel(header(2))).toBe(9);
        expect(inferGzipLevel(header(4))).toBe(1);
        expect(inferGzipLevel(header(0))).toBe(6);
    });
});

describe('save container', () => {
    const body = ascii('archive body bytes');

    it('lays out an uncompressed file', () => {
        const file = serializeSavContainer(image(ascii('abcd')), settings('none'));
        // 12-byte header, 49-byte chunk header, 8-byte payload
        expect(file.length).toBe(12 + 49 + 8);
        const view = new DataView(file.buffer);
        expect(view.getUint32(4, true)).toBe(16);
        expect(view.getUint32(8, true)).toBe(9);
        expect(view.getBigUint64(12, true)).toBe(CHUNK_TAG);
        expect(file[28]).toBe(1);
        expect(file.subarray(61)).toEqual(Uint8Array.of(4, 0, 0, 0, ...ascii('abcd')));
        expect(isSavContent(file)).toBe(true);
    });

    it.each(['none', 'zlib', 'gzip', 'lz4'] as const)('round-trips the image through %s chunks', (compressor) => {
        const file = serializeSavContainer(image(body), settings(compressor));
        const decoded = parseSavContainer(file);
        expect(decoded.image.subarray(8)).toEqual(image(body).subarray(8));
        expect(new DataView(decoded.image.buffer).getUint32(4, true)).toBe(12 + body.length);
        expect(decoded.compression).toEqual(settings(compressor));
    });

    it('reports the deflate level the file was written with', () => {
        for (const level of [1, 9]) {
            expect(parseSavContainer(serializeSavContainer(image(body), settings('zlib', level))).compression.level).toBe(level);
            expect(parseSavContainer(serializeSavContainer(image(body), settings('gzip', level))).compression.level).toBe(level);
        }
    });

    it('reproduces a file byte for byte from its decoded settings', () => {
        const file = serializeSavContainer(image(repetitive), settings('zlib', 9));
        const { image: decoded, compression } = parseSavContainer(file);
        expect(serializeSavContainer(decoded, compression)).toEqual(file);
    });

    it('splits the payload into blocks and joins them again', () => {
        const file = serializeSavContainer(image(repetitive), settings('zlib', 6, 256));
        const decoded = parseSavContainer(file);
        expect(decoded.image.subarray(12)).toEqual(repetitive);
        expect(decoded.compression.blockSize).toBe(256);
    });

    it('detects a checksum mismatch', () => {
        const file = serializeSavContainer(image(body), settings('none'));
        file[file.length - 1] ^= 0xFF;
        expect(() => parseSavContainer(file)).toThrow(/Checksum mismatch/);
    });

    it('detects a content size that disagrees with the chunks', () => {
        const file = serializeSavContainer(image(body), settings('none'));
        new DataView(file.buffer).setUint32(4, 99, true);
        expect(() => parseSavContainer(file)).toThrow(CorruptChunkError);
    });

    it('rejects a bad chunk tag with the chunk offset', () => {
        const file = serializeSavContainer(image(body), settings('none'));
        file[12] ^= 0xFF;
        try {
            parseSavContainer(file);
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(CorruptChunkError);
            if (!(err instanceof CorruptChunkError)) throw err;
            expect(err.context).toEqual({ offset: 12, chunk: 0 });
        }
    });

    it('rejects a deflate stream that does not inflate', () => {
        const err = chunkError(singleChunkFile('zlib', Uint8Array.of(0x78, 0x9C, 1, 2, 3, 4, 5), 8));
        expect(err.message).toBe('zlib block failed to decompress');
        expect(err.context).toEqual({ compressor: 'zlib', chunk: 0, offset: 12 });
        expect(err.cause).toBeInstanceOf(Error);
    });

    it('rejects a broken gzip member', () => {
        const err = chunkError(singleChunkFile('gzip', Uint8Array.of(0x1F, 0x8B, 8, 0, 0, 0, 0, 0, 0, 3, 0xFF, 0xFF), 8));
        expect(err.message).toBe('gzip block failed to decompress');
    });

    it('rejects a block that inflates to a different length than declared', () => {
        const block = compressBlock('zlib', Uint8Array.of(1, 2, 3), 6);
        const err = chunkError(singleChunkFile('zlib', block, 8));
        expect(err.message).toBe('zlib block decompressed to 3 bytes, expected 8');
        expect(err.context).toEqual({ compressor: 'zlib', chunk: 0, offset: 12 });
    });

    it('rejects Oodle chunks', () => {
        const file = build((w) => {
            w.writeZeros(12);
            w.writeBigUint64(CHUNK_TAG);
            w.writeBigUint64(BigInt(DEFAULT_BLOCK_SIZE));
            w.writeUint8(2);
        });
        expect(() => parseSavContainer(file)).toThrow('Unsupported compressor oodle');
    });

    it('rejects a file with no chunks', () => {
        expect(() => parseSavContainer(new Uint8Array(12))).toThrow('Save file contains no chunks');
    });

    it('rejects a non-positive block size', () => {
        expect(() => serializeSavContainer(image(body), settings('none', 6, 0))).toThrow(TypeMismatchError);
    });
});
