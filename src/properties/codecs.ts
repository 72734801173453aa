/**
 * Property type codecs, one per wire tag.
 *
 * Each codec reads and writes the payload that follows a property tag. Codecs that may appear
 * inside arrays, sets and maps also implement the element form, which has no tag of its own.
 * Container codecs do not, which is what rejects nested containers.
 */

import { InvalidFormatError, LengthMismatchError, TypeMismatchError } from '../errors.js';
import { ZERO_GUID, type ByteReader, type Guid } from '../io/reader.js';
import type { ByteWriter } from '../io/writer.js';
import {
    expectKind,
    formatPath,
    withSegment,
    type CodecContext,
    type ElementSlot,
    type HeaderKind,
    type PropertyTypeCodec,
    type ReadContext,
    type StructCodec,
    type TagHeader,
    type WriteContext,
} from './context.js';
import {
    NONE_NAME,
    fname,
    fnameToString,
    isNone,
    STRUCT_DATA_KINDS,
    type ArrayStructHeader,
    type BigIntegerKind,
    type ElementValue,
    type FName,
    type FloatKind,
    type IntegerKind,
    type PropertyValue,
    type TextHistory,
    type ValueKind,
} from './model.js';
import { GUID_STRUCT, PROPERTY_BAG_STRUCT } from './structs.js';

const STRUCT_TAG = 'StructProperty';

/** Wire tag written for a value when the document does not name one. */
export const DEFAULT_TAGS: Readonly<Record<ValueKind, string>> = Object.freeze({
    bool: 'BoolProperty',
    int8: 'Int8Property',
    int16: 'Int16Property',
    int32: 'IntProperty',
    int64: 'Int64Property',
    uint8: 'ByteProperty',
    uint16: 'UInt16Property',
    uint32: 'UInt32Property',
    uint64: 'UInt64Property',
    float32: 'FloatProperty',
    float64: 'DoubleProperty',
    string: 'StrProperty',
    name: 'NameProperty',
    enum: 'EnumProperty',
    object: 'ObjectProperty',
    softObject: 'SoftObjectProperty',
    text: 'TextProperty',
    struct: STRUCT_TAG,
    array: 'ArrayProperty',
    set: 'SetProperty',
    map: 'MapProperty',
});

// --- tag headers ---

/** Type tags are names on the wire; a numbered name never matches a registered tag. */
function tagName(name: FName): string {
    return fnameToString(name);
}

export function readTagHeader(ctx: ReadContext, kind: HeaderKind): TagHeader {
    const { reader: r, names } = ctx;
    switch (kind) {
        case 'none': return {};
        case 'bool': return { boolValue: r.readBool() };
        case 'enum': return { enumType: names.readName(r) };
        case 'struct': return { structType: names.readName(r), structGuid: r.readGuid() };
        case 'container': return { innerType: tagName(names.readName(r)) };
        case 'map': return { innerType: tagName(names.readName(r)), valueType: tagName(names.readName(r)) };
    }
}

export function writeTagHeader(ctx: WriteContext, kind: HeaderKind, header: TagHeader): void {
    const { writer: w, names } = ctx;
    switch (kind) {
        case 'none': return;
        case 'bool': return w.writeBool(header.boolValue ?? false);
        case 'enum': return names.writeName(w, header.enumType ?? fname(NONE_NAME));
        case 'struct':
            names.writeName(w, header.structType ?? fname(NONE_NAME));
            return w.writeGuid(header.structGuid ?? ZERO_GUID);
        case 'container':
            return names.writeName(w, fname(header.innerType ?? NONE_NAME));
        case 'map':
            names.writeName(w, fname(header.innerType ?? NONE_NAME));
            return names.writeName(w, fname(header.valueType ?? NONE_NAME));
    }
}

/** `u8 hasPropertyGuid`, followed by the Guid when set. */
export function readPropertyGuid(r: ByteReader): Guid | undefined {
    return r.readBool() ? r.readGuid() : undefined;
}

export function writePropertyGuid(w: ByteWriter, guid: Guid | undefined): void {
    w.writeBool(guid !== undefined);
    if (guid !== undefined) w.writeGuid(guid);
}

const noHeader = (): TagHeader => ({});

// --- scalars ---

export const INTEGER_RANGES: Readonly<Record<IntegerKind, readonly [number, number]>> = {
    int8: [-0x80, 0x7F],
    int16: [-0x8000, 0x7FFF],
    int32: [-0x80000000, 0x7FFFFFFF],
    uint8: [0, 0xFF],
    uint16: [0, 0xFFFF],
    uint32: [0, 0xFFFFFFFF],
};

export const BIG_INTEGER_RANGES: Readonly<Record<BigIntegerKind, readonly [bigint, bigint]>> = {
    int64: [-(1n << 63n), (1n << 63n) - 1n],
    uint64: [0n, (1n << 64n) - 1n],
};

function isIntegerKind(kind: IntegerKind | FloatKind): kind is IntegerKind {
    return kind in INTEGER_RANGES;
}

function outOfRange(ctx: CodecContext, kind: string, value: number | bigint): TypeMismatchError {
    return new TypeMismatchError(`${String(value)} does not fit ${kind}`, { path: formatPath(ctx.path) });
}

function checkInteger(ctx: CodecContext, kind: IntegerKind, v: number): number {
    const [min, max] = INTEGER_RANGES[kind];
    if (!Number.isInteger(v) || v < min || v > max) throw outOfRange(ctx, kind, v);
    return v;
}

type Codec = PropertyTypeCodec;

/** A codec whose tag payload and element form are the same single value. */
function scalar(read: (ctx: ReadContext) => PropertyValue, write: (ctx: WriteContext, value: ElementValue) => void): Codec {
    return {
        header: 'none',
        headerOf: noHeader,
        read: (ctx) => read(ctx),
        write,
        readElement: (ctx) => read(ctx),
        writeElement: (ctx, _slot, value) => write(ctx, value),
    };
}

function numeric(
    kind: IntegerKind | FloatKind,
    read: (r: ByteReader) => number,
    write: (w: ByteWriter, v: number) => void,
): Codec {
    return scalar(
        (ctx) => ({ type: kind, value: read(ctx.reader) }),
        (ctx, value) => {
            const v = expectKind(ctx, value, [kind]).value;
            if (isIntegerKind(kind)) checkInteger(ctx, kind, v);
            write(ctx.writer, v);
        },
    );
}

function bigNumeric(kind: BigIntegerKind, read: (r: ByteReader) => bigint, write: (w: ByteWriter, v: bigint) => void): Codec {
    return scalar(
        (ctx) => ({ type: kind, value: read(ctx.reader) }),
        (ctx, value) => {
            const v = expectKind(ctx, value, [kind]).value;
            const [min, max] = BIG_INTEGER_RANGES[kind];
            if (v < min || v > max) throw outOfRange(ctx, kind, v);
            write(ctx.writer, v);
        },
    );
}

const BOOL: Codec = {
    header: 'bool',
    headerOf: (ctx, value) => ({ boolValue: expectKind(ctx, value, ['bool']).value }),
    read: (_ctx, header) => ({ type: 'bool', value: header.boolValue ?? false }),
    write: (ctx, value) => {
        expectKind(ctx, value, ['bool']);
    },
    readElement: (ctx) => ({ type: 'bool', value: ctx.reader.readBool() }),
    writeElement: (ctx, _slot, value) => ctx.writer.writeBool(expectKind(ctx, value, ['bool']).value),
};

const writeByte = (ctx: WriteContext, value: ElementValue): void =>
    ctx.writer.writeUint8(checkInteger(ctx, 'uint8', expectKind(ctx, value, ['uint8']).value));

/** `ByteProperty` is a raw byte when its enum name is `None`, otherwise an enum member name. */
const BYTE: Codec = {
    header: 'enum',
    headerOf: (ctx, value) => {
        const v = expectKind(ctx, value, ['uint8', 'enum']);
        return { enumType: v.type === 'enum' ? v.enumType : fname(NONE_NAME) };
    },
    read: (ctx, header) => {
        const enumType = header.enumType ?? fname(NONE_NAME);
        if (isNone(enumType)) return { type: 'uint8', value: ctx.reader.readUint8() };
        return { type: 'enum', enumType, memberName: ctx.names.readName(ctx.reader) };
    },
    write: (ctx, value) => {
        const v = expectKind(ctx, value, ['uint8', 'enum']);
        if (v.type === 'uint8') return writeByte(ctx, v);
        if (isNone(v.enumType)) {
            throw new TypeMismatchError('A ByteProperty enum value needs an enum type other than None', {
                path: formatPath(ctx.path),
            });
        }
        ctx.names.writeName(ctx.writer, v.memberName);
    },
    readElement: (ctx) => ({ type: 'uint8', value: ctx.reader.readUint8() }),
    writeElement: (ctx, _slot, value) => writeByte(ctx, value),
};

const ENUM: Codec = {
    header: 'enum',
    headerOf: (ctx, value) => ({ enumType: expectKind(ctx, value, ['enum']).enumType }),
    read: (ctx, header) => ({
        type: 'enum',
        enumType: header.enumType ?? fname(NONE_NAME),
        memberName: ctx.names.readName(ctx.reader),
    }),
    write: (ctx, value) => ctx.names.writeName(ctx.writer, expectKind(ctx, value, ['enum']).memberName),
    readElement: (ctx) => ({ type: 'name', value: ctx.names.readName(ctx.reader) }),
    writeElement: (ctx, _slot, value) => ctx.names.writeName(ctx.writer, expectKind(ctx, value, ['name']).value),
};

const STR = scalar(
    (ctx) => ({ type: 'string', value: ctx.reader.readFString() }),
    (ctx, value) => ctx.writer.writeFString(expectKind(ctx, value, ['string']).value),
);

const NAME = scalar(
    (ctx) => ({ type: 'name', value: ctx.names.readName(ctx.reader) }),
    (ctx, value) => ctx.names.writeName(ctx.writer, expectKind(ctx, value, ['name']).value),
);

const OBJECT = scalar(
    (ctx) => ({ type: 'object', value: ctx.reader.readInt32() }),
    (ctx, value) => {
        ctx.writer.writeInt32(checkInteger(ctx, 'int32', expectKind(ctx, value, ['object']).value));
    },
);

const SOFT_OBJECT = scalar(
    (ctx) => ({ type: 'softObject', value: ctx.reader.readFString() }),
    (ctx, value) => ctx.writer.writeFString(expectKind(ctx, value, ['softObject']).value),
);

const TEXT_HISTORY_BASE = 0;
const TEXT_HISTORY_NONE = -1;

function readTextHistory(ctx: ReadContext): TextHistory {
    const r = ctx.reader;
    const at = r.position;
    const historyType = r.readInt8();
    if (historyType === TEXT_HISTORY_BASE) {
        return { kind: 'base', namespace: r.readFString(), key: r.readFString(), sourceString: r.readFString() };
    }
    if (historyType === TEXT_HISTORY_NONE) {
        const has = r.readUint32();
        if (has > 1) throw new InvalidFormatError(`Text culture-invariant flag is ${has}`, { offset: at + 1 });
        return has ? { kind: 'none', cultureInvariantString: r.readFString() } : { kind: 'none' };
    }
    throw new InvalidFormatError(`Unsupported text history type ${historyType}`, { offset: at });
}

const TEXT = scalar(
    (ctx) => {
        const flags = ctx.reader.readUint32();
        return { type: 'text', flags, history: readTextHistory(ctx) };
    },
    (ctx, value) => {
        const { flags, history } = expectKind(ctx, value, ['text']);
        const w = ctx.writer;
        w.writeUint32(flags);
        if (history.kind === 'base') {
            w.writeInt8(TEXT_HISTORY_BASE);
            w.writeFString(history.namespace);
            w.writeFString(history.key);
            w.writeFString(history.sourceString);
            return;
        }
        w.writeInt8(TEXT_HISTORY_NONE);
        w.writeUint32(history.cultureInvariantString === undefined ? 0 : 1);
        if (history.cultureInvariantString !== undefined) w.writeFString(history.cultureInvariantString);
    },
);

// --- structs ---

/**
 * Struct layout inside a container: array elements follow the array's struct type, map keys
 * and set elements are Guids, and map values are property bags.
 */
function slotStruct(ctx: CodecContext, slot: ElementSlot, header: TagHeader): StructCodec {
    switch (slot) {
        case 'array': return ctx.registry.struct(header.structType?.value ?? NONE_NAME);
        case 'mapValue': return PROPERTY_BAG_STRUCT;
        case 'mapKey':
        case 'set':
            return GUID_STRUCT;
    }
}

const STRUCT: Codec = {
    header: 'struct',
    headerOf: (ctx, value) => {
        const v = expectKind(ctx, value, ['struct']);
        return { structType: v.structType, structGuid: v.structGuid };
    },
    read: (ctx, header) => {
        const structType = header.structType ?? fname(NONE_NAME);
        const data = ctx.registry.struct(structType.value).read(ctx);
        return { type: 'struct', structType, structGuid: header.structGuid ?? ZERO_GUID, data };
    },
    write: (ctx, value) => {
        const v = expectKind(ctx, value, ['struct']);
        ctx.registry.struct(v.structType.value).write(ctx, v.data);
    },
    readElement: (ctx, slot, header) => slotStruct(ctx, slot, header).read(ctx),
    writeElement: (ctx, slot, value, header) =>
        slotStruct(ctx, slot, header).write(ctx, expectKind(ctx, value, STRUCT_DATA_KINDS)),
};

// --- containers ---

interface ElementCodec {
    readElement(ctx: ReadContext, slot: ElementSlot, header: TagHeader): ElementValue;
    writeElement(ctx: WriteContext, slot: ElementSlot, value: ElementValue, header: TagHeader): void;
}

function elementCodec(ctx: CodecContext, elementType: string): ElementCodec {
    const codec = ctx.registry.property(elementType, ctx);
    const { readElement, writeElement } = codec;
    if (!readElement || !writeElement) {
        throw new InvalidFormatError(`${elementType} cannot be a container element`, { path: formatPath(ctx.path) });
    }
    return { readElement, writeElement };
}

function readElements(
    ctx: ReadContext,
    codec: ElementCodec,
    slot: ElementSlot,
    count: number,
    header: TagHeader = {},
    label = '',
): ElementValue[] {
    const out: ElementValue[] = [];
    for (let i = 0; i < count; i++) {
        out.push(withSegment(ctx, `[${label}${i}]`, () => codec.readElement(ctx, slot, header)));
    }
    return out;
}

function writeElements(
    ctx: WriteContext,
    codec: ElementCodec,
    slot: ElementSlot,
    elements: readonly ElementValue[],
    header: TagHeader = {},
    label = '',
): void {
    elements.forEach((e, i) => withSegment(ctx, `[${label}${i}]`, () => codec.writeElement(ctx, slot, e, header)));
}

function requireInner(ctx: CodecContext, header: TagHeader): string {
    if (header.innerType === undefined) {
        throw new InvalidFormatError('Container tag has no element type', { path: formatPath(ctx.path) });
    }
    return header.innerType;
}

interface InnerStructTag {
    header: ArrayStructHeader;
    size: number;
}

function readInnerStructTag(ctx: ReadContext): InnerStructTag {
    const { reader: r, names } = ctx;
    const at = r.position;
    const name = names.readName(r);
    const type = tagName(names.readName(r));
    if (type !== STRUCT_TAG) {
        throw new InvalidFormatError(`Struct array inner tag has type ${type}`, { offset: at });
    }
    const size = r.readUint32();
    const index = r.readUint32();
    const structType = names.readName(r);
    const structGuid = r.readGuid();
    const guid = readPropertyGuid(r);
    return { header: { name, index, structType, structGuid, ...(guid !== undefined && { guid }) }, size };
}

const ARRAY: Codec = {
    header: 'container',
    headerOf: (ctx, value) => ({ innerType: expectKind(ctx, value, ['array']).elementType }),
    read: (ctx, header) => {
        const r = ctx.reader;
        const elementType = requireInner(ctx, header);
        const count = r.readUint32();
        const codec = elementCodec(ctx, elementType);
        if (elementType !== STRUCT_TAG) {
            return { type: 'array', elementType, elements: readElements(ctx, codec, 'array', count) };
        }

        const inner = readInnerStructTag(ctx);
        const start = r.position;
        const elements = readElements(ctx, codec, 'array', count, { structType: inner.header.structType });
        if (r.position - start !== inner.size) {
            throw new LengthMismatchError(
                `Struct array declares ${inner.size} element bytes but ${r.position - start} were read`,
                inner.size,
                r.position - start,
                { offset: start },
            );
        }
        return { type: 'array', elementType, elements, structHeader: inner.header };
    },
    write: (ctx, value) => {
        const { writer: w, names } = ctx;
        const v = expectKind(ctx, value, ['array']);
        const codec = elementCodec(ctx, v.elementType);
        w.writeUint32(v.elements.length);
        if (v.elementType !== STRUCT_TAG) {
            writeElements(ctx, codec, 'array', v.elements);
            return;
        }

        const h = v.structHeader;
        if (!h) throw new TypeMismatchError('A struct array needs a structHeader', { path: formatPath(ctx.path) });
        names.writeName(w, h.name);
        names.writeName(w, fname(STRUCT_TAG));
        const sizeAt = w.length;
        w.writeUint32(0);
        w.writeUint32(h.index);
        names.writeName(w, h.structType);
        w.writeGuid(h.structGuid);
        writePropertyGuid(w, h.guid);
        const start = w.length;
        writeElements(ctx, codec, 'array', v.elements, { structType: h.structType });
        w.setUint32At(sizeAt, w.length - start);
    },
};

const SET: Codec = {
    header: 'container',
    headerOf: (ctx, value) => ({ innerType: expectKind(ctx, value, ['set']).elementType }),
    read: (ctx, header) => {
        const elementType = requireInner(ctx, header);
        const codec = elementCodec(ctx, elementType);
        const removed = readElements(ctx, codec, 'set', ctx.reader.readUint32(), {}, 'removed ');
        const elements = readElements(ctx, codec, 'set', ctx.reader.readUint32());
        return { type: 'set', elementType, elements, removed };
    },
    write: (ctx, value) => {
        const v = expectKind(ctx, value, ['set']);
        const codec = elementCodec(ctx, v.elementType);
        ctx.writer.writeUint32(v.removed.length);
        writeElements(ctx, codec, 'set', v.removed, {}, 'removed ');
        ctx.writer.writeUint32(v.elements.length);
        writeElements(ctx, codec, 'set', v.elements);
    },
};

const MAP: Codec = {
    header: 'map',
    headerOf: (ctx, value) => {
        const v = expectKind(ctx, value, ['map']);
        return { innerType: v.keyType, valueType: v.valueType };
    },
    read: (ctx, header) => {
        const r = ctx.reader;
        const keyType = requireInner(ctx, header);
        const valueType = header.valueType ?? NONE_NAME;
        const keys = elementCodec(ctx, keyType);
        const values = elementCodec(ctx, valueType);
        const removed = readElements(ctx, keys, 'mapKey', r.readUint32(), {}, 'removed ');
        const count = r.readUint32();
        const entries: Array<[ElementValue, ElementValue]> = [];
        for (let i = 0; i < count; i++) {
            entries.push(
                withSegment(ctx, `[${i}]`, (): [ElementValue, ElementValue] => [
                    withSegment(ctx, 'key', () => keys.readElement(ctx, 'mapKey', {})),
                    withSegment(ctx, 'value', () => values.readElement(ctx, 'mapValue', {})),
                ]),
            );
        }
        return { type: 'map', keyType, valueType, entries, removed };
    },
    write: (ctx, value) => {
        const v = expectKind(ctx, value, ['map']);
        const keys = elementCodec(ctx, v.keyType);
        const values = elementCodec(ctx, v.valueType);
        ctx.writer.writeUint32(v.removed.length);
        writeElements(ctx, keys, 'mapKey', v.removed, {}, 'removed ');
        ctx.writer.writeUint32(v.entries.length);
        v.entries.forEach(([k, val], i) =>
            withSegment(ctx, `[${i}]`, () => {
                withSegment(ctx, 'key', () => keys.writeElement(ctx, 'mapKey', k, {}));
                withSegment(ctx, 'value', () => values.writeElement(ctx, 'mapValue', val, {}));
            }),
        );
    },
};

export const PROPERTY_CODECS: Readonly<Record<string, PropertyTypeCodec>> = Object.freeze({
    BoolProperty: BOOL,
    ByteProperty: BYTE,
    EnumProperty: ENUM,
    Int8Property: numeric('int8', (r) => r.readInt8(), (w, v) => w.writeInt8(v)),
    Int16Property: numeric('int16', (r) => r.readInt16(), (w, v) => w.writeInt16(v)),
    IntProperty: numeric('int32', (r) => r.readInt32(), (w, v) => w.writeInt32(v)),
    Int64Property: bigNumeric('int64', (r) => r.readInt64(), (w, v) => w.writeBigInt64(v)),
    UInt16Property: numeric('uint16', (r) => r.readUint16(), (w, v) => w.writeUint16(v)),
    UInt32Property: numeric('uint32', (r) => r.readUint32(), (w, v) => w.writeUint32(v)),
    UInt64Property: bigNumeric('uint64', (r) => r.readUint64(), (w, v) => w.writeBigUint64(v)),
    FloatProperty: numeric('float32', (r) => r.readFloat32(), (w, v) => w.writeFloat32(v)),
    DoubleProperty: numeric('float64', (r) => r.readFloat64(), (w, v) => w.writeFloat64(v)),
    StrProperty: STR,
    NameProperty: NAME,
    ObjectProperty: OBJECT,
    SoftObjectProperty: SOFT_OBJECT,
    TextProperty: TEXT,
    StructProperty: STRUCT,
    ArrayProperty: ARRAY,
    SetProperty: SET,
    MapProperty: MAP,
});
