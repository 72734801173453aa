/**
 * Property tree encoder, the inverse of `properties/parser.ts`.
 *
 * Each tag is written with a zero size placeholder that is patched once the payload is known,
 * so the declared sizes always agree with the bytes emitted.
 */

import { ByteWriter } from '../io/writer.js';
import { writePropertyGuid, writeTagHeader } from './codecs.js';
import { withSegment, type WriteContext } from './context.js';
import { NONE_NAME, fname, fnameToString, type Property } from './model.js';
import { InlineNames, type NameCodec } from './names.js';
import { defaultRegistry, type TypeRegistry } from './registry.js';

export interface PropertyWriteOptions {
    /** Defaults to inline (string) names. */
    names?: NameCodec;
    registry?: TypeRegistry;
}

export function createWriteContext(writer: ByteWriter, opts: PropertyWriteOptions = {}): WriteContext {
    const ctx: WriteContext = {
        writer,
        names: opts.names ?? new InlineNames(),
        registry: opts.registry ?? defaultRegistry,
        path: [],
        writeProperties: (properties) => writeProperties(ctx, properties),
    };
    return ctx;
}

export function writeProperties(ctx: WriteContext, properties: readonly Property[]): void {
    for (const p of properties) writeProperty(ctx, p);
    ctx.names.writeName(ctx.writer, fname(NONE_NAME));
}

function writeProperty(ctx: WriteContext, p: Property): void {
    const w = ctx.writer;
    withSegment(ctx, fnameToString(p.name), () => {
        const codec = ctx.registry.property(p.type, ctx);
        ctx.names.writeName(w, p.name);
        ctx.names.writeName(w, fname(p.type));
        const sizeAt = w.length;
        w.writeUint32(0);
        w.writeUint32(p.index);
        writeTagHeader(ctx, codec.header, codec.headerOf(ctx, p.value));
        writePropertyGuid(w, p.guid);

        const start = w.length;
        codec.write(ctx, p.value);
        w.setUint32At(sizeAt, w.length - start);
    });
}

/** Encode a standalone property stream, terminator included. */
export function serializeProperties(properties: readonly Property[], opts: PropertyWriteOptions = {}): Uint8Array {
    const w = new ByteWriter();
    writeProperties(createWriteContext(w, opts), properties);
    return w.toUint8Array();
}
