import { deflateSync, gunzipSync, gzipSync, inflateSync } from 'node:zlib';

import { CorruptChunkError } from '../errors.js';
import { compressLZ4Block, decompressLZ4Block } from './lz4.js';

export type CompressorName = 'none' | 'zlib' | 'gzip' | 'lz4';

/** Compressor byte in a chunk header. */
const enum CompressorId {
    Custom = 0,
    None = 1,
    Oodle = 2,
    Zlib = 3,
    Gzip = 4,
    LZ4 = 5,
}

export const COMPRESSOR_IDS: Readonly<Record<CompressorName, number>> = {
    none: CompressorId.None,
    zlib: CompressorId.Zlib,
    gzip: CompressorId.Gzip,
    lz4: CompressorId.LZ4,
};

/** Custom compressors carry their name as an FString after the id byte. */
export const CUSTOM_COMPRESSOR_ID: number = CompressorId.Custom;

export function describeCompressorId(id: number): string {
    if (id === CompressorId.Custom) return 'custom';
    if (id === CompressorId.Oodle) return 'oodle';
    return compressorName(id) ?? `unknown (${id})`;
}

export function compressorName(id: number): CompressorName | undefined {
    switch (id) {
        case CompressorId.None: return 'none';
        case CompressorId.Zlib: return 'zlib';
        case CompressorId.Gzip: return 'gzip';
        case CompressorId.LZ4: return 'lz4';
        default: return undefined;
    }
}

// Buffers from node:zlib share pooled memory; hand out plain, owned arrays.
function own(buf: Uint8Array): Uint8Array {
    return new Uint8Array(buf);
}

export function compressBlock(compressor: CompressorName, data: Uint8Array, level: number): Uint8Array {
    switch (compressor) {
        case 'none': return data.slice();
        case 'zlib': return own(deflateSync(data, { level }));
        case 'gzip': return own(gzipSync(data, { level }));
        case 'lz4': return compressLZ4Block(data);
    }
}

function inflateBlock(compressor: CompressorName, data: Uint8Array, uncompressedSize: number): Uint8Array {
    switch (compressor) {
        case 'none': return data.slice();
        case 'zlib': return own(inflateSync(data));
        case 'gzip': return own(gunzipSync(data));
        case 'lz4': return decompressLZ4Block(data, uncompressedSize);
    }
}

export function decompressBlock(compressor: CompressorName, data: Uint8Array, uncompressedSize: number): Uint8Array {
    let out: Uint8Array;
    try {
        out = inflateBlock(compressor, data, uncompressedSize);
    } catch (err) {
        if (err instanceof CorruptChunkError) throw err;
        throw new CorruptChunkError(`${compressor} block failed to decompress`, { compressor }, err);
    }
    if (out.length !== uncompressedSize) {
        throw new CorruptChunkError(`${compressor} block decompressed to ${out.length} bytes, expected ${uncompressedSize}`, {
            compressor,
        });
    }
    return out;
}

/**
 * Recovers the deflate level from a zlib stream header (FLEVEL bits of the second byte).
 * The header only records four buckets; each maps to the level zlib itself reports for it.
 */
export function inferZlibLevel(stream: Uint8Array): number {
    if (stream.length < 2) return 6;
    switch ((stream[1] >> 6) & 0x3) {
        case 0: return 1;
        case 1: return 5;
        case 2: return 6;
        default: return 9;
    }
}

/**
 * Recovers the deflate level from a gzip member header (XFL byte): 2 means maximum
 * compression, 4 the fastest, anything else the default.
 */
export function inferGzipLevel(stream: Uint8Array): number {
    if (stream.length < 10) return 6;
    switch (stream[8]) {
        case 2: return 9;
        case 4: return 1;
        default: return 6;
    }
}
