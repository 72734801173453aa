/**
 * Whole-file codec: save bytes <-> `SaveDocument`.
 *
 * `decode(encode(doc))` equals `doc`, and `encode(decode(bytes))` reproduces `bytes` for files
 * whose chunks were written with the codec's compressors at the recorded settings.
 */

import type { SaveDocument } from './archive/model.js';
import { parseArchive } from './archive/parser.js';
import { serializeArchive } from './archive/serializer.js';
import type { Logger } from './logger.js';
import type { NameCodec } from './properties/names.js';
import { parseProperties } from './properties/parser.js';
import type { Property } from './properties/model.js';
import type { TypeRegistry } from './properties/registry.js';
import { serializeProperties } from './properties/serializer.js';
import { parseSavContainer, serializeSavContainer, type CompressionSettings } from './sav/container.js';

export interface DecodeOptions {
    /** Defaults to the built-in registry. */
    registry?: TypeRegistry;
    /** Receives debug summaries of each stage. */
    logger?: Logger;
}

export interface EncodeOptions extends DecodeOptions {
    /** Overrides for the compression settings recorded in the document header. */
    compression?: Partial<CompressionSettings>;
}

export interface PropertyStreamOptions {
    /** Defaults to inline names. */
    names?: NameCodec;
    registry?: TypeRegistry;
}

export function decode(bytes: Uint8Array, opts: DecodeOptions = {}): SaveDocument {
    const { image, compression } = parseSavContainer(bytes, opts);
    const { header, objects } = parseArchive(image, opts);
    const { names, dataOrder, ...fixed } = header;
    return {
        header: { ...fixed, compression, names, ...(dataOrder && { dataOrder }) },
        objects,
    };
}

export function encode(doc: SaveDocument, opts: EncodeOptions = {}): Uint8Array {
    const image = serializeArchive(doc, opts);
    return serializeSavContainer(image, { ...doc.header.compression, ...opts.compression }, opts);
}

/** Decode a bare property stream (a bag and its `None` terminator). */
export function decodeProperties(bytes: Uint8Array, opts: PropertyStreamOptions = {}): Property[] {
    return parseProperties(bytes, opts);
}

export function encodeProperties(properties: readonly Property[], opts: PropertyStreamOptions = {}): Uint8Array {
    return serializeProperties(properties, opts);
}
