/**
 * Property tree decoder.
 *
 * A property sequence is a run of tagged properties ended by the name `None`. Each tag is
 * `name, type, u32 size, u32 index`, a type-specific header, and the property-Guid flag;
 * `size` counts the payload bytes after the tag and is checked after the payload is read.
 */

import { LengthMismatchError } from '../errors.js';
import { ByteReader } from '../io/reader.js';
import { readPropertyGuid, readTagHeader } from './codecs.js';
import { withSegment, type ReadContext } from './context.js';
import { fnameToString, isNone, type Property } from './model.js';
import { InlineNames, type NameCodec } from './names.js';
import { defaultRegistry, type TypeRegistry } from './registry.js';

export interface PropertyReadOptions {
    /** Defaults to inline (string) names. */
    names?: NameCodec;
    registry?: TypeRegistry;
}

export function createReadContext(reader: ByteReader, opts: PropertyReadOptions = {}): ReadContext {
    const ctx: ReadContext = {
        reader,
        names: opts.names ?? new InlineNames(),
        registry: opts.registry ?? defaultRegistry,
        path: [],
        readProperties: () => readProperties(ctx),
    };
    return ctx;
}

/** Reads properties until the `None` terminator; running out of input first is a truncation. */
export function readProperties(ctx: ReadContext): Property[] {
    const properties: Property[] = [];
    for (;;) {
        const property = readProperty(ctx);
        if (!property) return properties;
        properties.push(property);
    }
}

function readProperty(ctx: ReadContext): Property | null {
    const r = ctx.reader;
    const name = ctx.names.readName(r);
    if (isNone(name)) return null;

    return withSegment(ctx, fnameToString(name), () => {
        const tagAt = r.position;
        const type = fnameToString(ctx.names.readName(r));
        const size = r.readUint32();
        const index = r.readUint32();
        const codec = ctx.registry.property(type, ctx);
        const header = readTagHeader(ctx, codec.header);
        const guid = readPropertyGuid(r);

        const start = r.position;
        const value = codec.read(ctx, header, size);
        const consumed = r.position - start;
        if (consumed !== size) {
            throw new LengthMismatchError(
                `${type} declares ${size} payload bytes but ${consumed} were read`,
                size,
                consumed,
                { offset: tagAt },
            );
        }
        return { name, type, index, ...(guid !== undefined && { guid }), value };
    });
}

/**
 * Decode a standalone property stream (a bag and its `None` terminator).
 * Bytes left over after the terminator are reported as a length mismatch.
 */
export function parseProperties(bytes: Uint8Array, opts: PropertyReadOptions = {}): Property[] {
    const r = new ByteReader(bytes);
    const properties = readProperties(createReadContext(r, opts));
    if (r.remaining !== 0) {
        const end = r.position;
        throw new LengthMismatchError(
            `Property stream ends at offset ${end} but the buffer holds ${bytes.length} bytes`,
            end,
            bytes.length,
            { offset: end },
        );
    }
    return properties;
}
