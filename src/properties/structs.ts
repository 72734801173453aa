/**
 * Struct payload codecs, keyed by struct type name.
 *
 * Native structs have fixed layouts; every other struct type is a property bag terminated by
 * `None`. `PersistenceBlob` holds a length-prefixed byte blob, carried through opaquely unless the
 * archive's class path gives it a layout (`archive/persistence.ts`).
 */

import { expectKind, type StructCodec } from './context.js';

export const PROPERTY_BAG_STRUCT: StructCodec = {
    kind: 'properties',
    read: (ctx) => ({ type: 'properties', properties: ctx.readProperties() }),
    write: (ctx, data) => ctx.writeProperties(expectKind(ctx, data, ['properties']).properties),
};

export const GUID_STRUCT: StructCodec = {
    kind: 'guid',
    read: (ctx) => ({ type: 'guid', value: ctx.reader.readGuid() }),
    write: (ctx, data) => ctx.writer.writeGuid(expectKind(ctx, data, ['guid']).value),
};

const VECTOR_STRUCT: StructCodec = {
    kind: 'vector',
    read: ({ reader: r }) => ({ type: 'vector', x: r.readFloat64(), y: r.readFloat64(), z: r.readFloat64() }),
    write: (ctx, data) => {
        const v = expectKind(ctx, data, ['vector']);
        ctx.writer.writeFloat64(v.x);
        ctx.writer.writeFloat64(v.y);
        ctx.writer.writeFloat64(v.z);
    },
};

const DATE_TIME_STRUCT: StructCodec = {
    kind: 'dateTime',
    read: (ctx) => ({ type: 'dateTime', ticks: ctx.reader.readUint64() }),
    write: (ctx, data) => ctx.writer.writeBigUint64(expectKind(ctx, data, ['dateTime']).ticks),
};

const TIMESPAN_STRUCT: StructCodec = {
    kind: 'timespan',
    read: (ctx) => ({ type: 'timespan', ticks: ctx.reader.readUint64() }),
    write: (ctx, data) => ctx.writer.writeBigUint64(expectKind(ctx, data, ['timespan']).ticks),
};

const SOFT_PATH_STRUCT: StructCodec = {
    kind: 'softPath',
    read: (ctx) => ({ type: 'softPath', value: ctx.reader.readFString() }),
    write: (ctx, data) => ctx.writer.writeFString(expectKind(ctx, data, ['softPath']).value),
};

const BLOB_STRUCT: StructCodec = {
    kind: 'blob',
    read: ({ reader: r }) => ({ type: 'blob', value: r.readBytes(r.readUint32()) }),
    write: (ctx, data) => {
        const { value } = expectKind(ctx, data, ['blob']);
        ctx.writer.writeUint32(value.length);
        ctx.writer.writeBytes(value);
    },
};

export const STRUCT_CODECS: Readonly<Record<string, StructCodec>> = Object.freeze({
    Guid: GUID_STRUCT,
    Vector: VECTOR_STRUCT,
    DateTime: DATE_TIME_STRUCT,
    Timespan: TIMESPAN_STRUCT,
    SoftObjectPath: SOFT_PATH_STRUCT,
    SoftClassPath: SOFT_PATH_STRUCT,
    PersistenceBlob: BLOB_STRUCT,
});
