/**
 * Save container: the file header and the compressed chunk stream around the archive.
 *
 * Layout:
 * - u32 crc32, u32 contentSize, u32 saveVersion
 * - chunks until end of file, each `u64 tag, u64 blockSize, u8 compressor,
 *   {u64 compressed, u64 uncompressed} x2 (summary + block), bytes`
 *
 * The decompressed chunk payload starts with its own length minus 4. Decoding swaps that word
 * for the file header, producing the "archive image" the archive parser reads with absolute
 * offsets: `[crc32][contentSize][saveVersion][payload[4..]]`. The checksum covers image[4..].
 */

import { CorruptChunkError, SavCodecError, TypeMismatchError } from '../errors.js';
import { crc32 } from '../io/crc32.js';
import { ByteReader } from '../io/reader.js';
import { ByteWriter } from '../io/writer.js';
import { silentLogger, type Logger } from '../logger.js';
import {
    COMPRESSOR_IDS,
    CUSTOM_COMPRESSOR_ID,
    compressBlock,
    compressorName,
    decompressBlock,
    describeCompressorId,
    inferGzipLevel,
    inferZlibLevel,
    type CompressorName,
} from './compression.js';

export const CHUNK_TAG = 0x222222229E2A83C1n;
export const DEFAULT_BLOCK_SIZE = 0x20000;
export const DEFAULT_COMPRESSION_LEVEL = 6;

/** Byte length of the `[crc32][contentSize][saveVersion]` prefix. */
export const IMAGE_HEADER_SIZE = 12;

export interface CompressionSettings {
    compressor: CompressorName;
    /** Maximum uncompressed bytes per chunk. */
    blockSize: number;
    /** Deflate level for zlib and gzip; ignored otherwise. */
    level: number;
}

export const DEFAULT_COMPRESSION: Readonly<CompressionSettings> = {
    compressor: 'zlib',
    blockSize: DEFAULT_BLOCK_SIZE,
    level: DEFAULT_COMPRESSION_LEVEL,
};

export interface SavContainer {
    /** `[crc32][contentSize][saveVersion]` followed by the archive body. */
    image: Uint8Array;
    compression: CompressionSettings;
}

export interface ContainerOptions {
    logger?: Logger;
}

/** True when the bytes start with a save header followed by a chunk tag. */
export function isSavContent(bytes: Uint8Array): boolean {
    if (bytes.length < IMAGE_HEADER_SIZE + 8) return false;
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return view.getBigUint64(IMAGE_HEADER_SIZE, true) === CHUNK_TAG;
}

interface ChunkHeader {
    blockSize: number;
    compressor: CompressorName;
    compressedSize: number;
    uncompressedSize: number;
}

function readChunkHeader(r: ByteReader): ChunkHeader {
    const at = r.position;
    const tag = r.readUint64();
    if (tag !== CHUNK_TAG) {
        throw new CorruptChunkError(`Bad chunk tag 0x${tag.toString(16).toUpperCase()}`, { offset: at });
    }
    const blockSize = r.readOffset64();
    const id = r.readUint8();
    const custom = id === CUSTOM_COMPRESSOR_ID ? r.readFString() : undefined;
    const compressor = compressorName(id);
    if (!compressor) {
        const label = custom === undefined ? describeCompressorId(id) : `custom "${custom}"`;
        throw new CorruptChunkError(`Unsupported compressor ${label}`, { offset: at, compressorId: id });
    }

    const summaryCompressed = r.readOffset64();
    const summaryUncompressed = r.readOffset64();
    const compressedSize = r.readOffset64();
    const uncompressedSize = r.readOffset64();
    if (compressedSize !== summaryCompressed || uncompressedSize !== summaryUncompressed) {
        throw new CorruptChunkError('Chunk summary disagrees with its block (multi-block chunks are unsupported)', {
            offset: at,
            summaryCompressed,
            summaryUncompressed,
            compressedSize,
            uncompressedSize,
        });
    }
    return { blockSize, compressor, compressedSize, uncompressedSize };
}

function levelOf(compressor: CompressorName, stream: Uint8Array): number {
    if (compressor === 'zlib') return inferZlibLevel(stream);
    if (compressor === 'gzip') return inferGzipLevel(stream);
    return DEFAULT_COMPRESSION_LEVEL;
}

/**
 * Parse a save file into its archive image.
 *
 * Notes:
 * - the compression settings of the first chunk are reported for re-encoding
 * - size words and the CRC are verified; any disagreement is a `CorruptChunkError`
 */
export function parseSavContainer(bytes: Uint8Array, opts: ContainerOptions = {}): SavContainer {
    const log = opts.logger ?? silentLogger;
    const r = new ByteReader(bytes);
    const crc = r.readUint32();
    const contentSize = r.readUint32();
    const saveVersion = r.readUint32();

    const blocks: Uint8Array[] = [];
    let compression: CompressionSettings | undefined;
    let total = 0;
    while (r.remaining > 0) {
        const at = r.position;
        try {
            const chunk = readChunkHeader(r);
            const data = r.readBytes(chunk.compressedSize);
            blocks.push(decompressBlock(chunk.compressor, data, chunk.uncompressedSize));
            total += chunk.uncompressedSize;
            compression ??= {
                compressor: chunk.compressor,
                blockSize: chunk.blockSize,
                level: levelOf(chunk.compressor, data),
            };
        } catch (err) {
            if (err instanceof SavCodecError) err.annotate({ chunk: blocks.length, offset: at });
            throw err;
        }
    }
    if (!compression) throw new CorruptChunkError('Save file contains no chunks', { offset: r.position });

    const payload = new Uint8Array(total);
    let off = 0;
    for (const b of blocks) {
        payload.set(b, off);
        off += b.length;
    }
    if (payload.length < 4 || payload.length + 8 !== contentSize) {
        throw new CorruptChunkError(`Header declares ${contentSize} content bytes but chunks hold ${payload.length + 8}`, {
            contentSize,
        });
    }
    const payloadView = new DataView(payload.buffer);
    const innerSize = payloadView.getUint32(0, true);
    if (innerSize !== payload.length - 4) {
        throw new CorruptChunkError(`Payload size word ${innerSize} does not match ${payload.length - 4}`);
    }

    const image = new Uint8Array(payload.length + 8);
    const view = new DataView(image.buffer);
    view.setUint32(0, crc, true);
    view.setUint32(4, contentSize, true);
    view.setUint32(8, saveVersion, true);
    image.set(payload.subarray(4), IMAGE_HEADER_SIZE);

    const actual = crc32(image.subarray(4));
    if (actual !== crc) {
        throw new CorruptChunkError(`Checksum mismatch: header 0x${crc.toString(16)}, computed 0x${actual.toString(16)}`, {
            expected: crc,
            actual,
        });
    }

    log.debug('save container decoded', { chunks: blocks.length, bytes: image.length, ...compression });
    return { image, compression };
}

/**
 * Compress an archive image back into a save file.
 * The image's size and checksum words are recomputed; whatever they held is ignored.
 */
export function serializeSavContainer(
    image: Uint8Array,
    compression: CompressionSettings,
    opts: ContainerOptions = {},
): Uint8Array {
    const log = opts.logger ?? silentLogger;
    const { compressor, blockSize, level } = compression;
    if (!Number.isInteger(blockSize) || blockSize <= 0) {
        throw new TypeMismatchError(`Block size must be a positive integer, got ${blockSize}`);
    }
    if (image.length < IMAGE_HEADER_SIZE) {
        throw new TypeMismatchError(`Archive image is ${image.length} bytes, shorter than its header`);
    }

    const patched = image.slice();
    const view = new DataView(patched.buffer);
    view.setUint32(4, patched.length, true);
    const crc = crc32(patched.subarray(4));

    const payload = new Uint8Array(patched.length - 8);
    new DataView(payload.buffer).setUint32(0, patched.length - IMAGE_HEADER_SIZE, true);
    payload.set(patched.subarray(IMAGE_HEADER_SIZE), 4);

    const w = new ByteWriter();
    w.writeUint32(crc);
    w.writeUint32(patched.length);
    w.writeUint32(view.getUint32(8, true));

    let chunks = 0;
    for (let off = 0; off < payload.length; off += blockSize) {
        const block = payload.subarray(off, off + blockSize);
        const data = compressBlock(compressor, block, level);
        w.writeBigUint64(CHUNK_TAG);
        w.writeBigUint64(BigInt(blockSize));
        w.writeUint8(COMPRESSOR_IDS[compressor]);
        for (let i = 0; i < 2; i++) {
            w.writeBigUint64(BigInt(data.length));
            w.writeBigUint64(BigInt(block.length));
        }
        w.writeBytes(data);
        chunks++;
    }

    log.debug('save container encoded', { chunks, bytes: patched.length, compressor, level });
    return w.toUint8Array();
}
