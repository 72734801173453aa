/**
 * Contexts and codec contracts shared by the property parser, serializer and registry.
 */

import { SavCodecError, TypeMismatchError } from '../errors.js';
import type { ByteReader, Guid } from '../io/reader.js';
import type { ByteWriter } from '../io/writer.js';
import { hasKind, type ElementValue, type FName, type Property, type PropertyValue, type StructData, type StructDataKind } from './model.js';
import type { NameCodec } from './names.js';
import type { TypeRegistry } from './registry.js';

export interface CodecContext {
    readonly names: NameCodec;
    readonly registry: TypeRegistry;
    /** Segments of the property path being coded, outermost first. */
    readonly path: string[];
}

export interface ReadContext extends CodecContext {
    readonly reader: ByteReader;
    /** Reads a property sequence up to and including its `None` terminator. */
    readProperties(): Property[];
}

export interface WriteContext extends CodecContext {
    readonly writer: ByteWriter;
    /** Writes a property sequence followed by its `None` terminator. */
    writeProperties(properties: readonly Property[]): void;
}

/** What follows the array index in a property tag, before the property-Guid flag. */
export type HeaderKind = 'none' | 'bool' | 'enum' | 'struct' | 'container' | 'map';

export interface TagHeader {
    boolValue?: boolean;
    enumType?: FName;
    structType?: FName;
    structGuid?: Guid;
    /** Element type of arrays and sets, key type of maps. */
    innerType?: string;
    /** Value type of maps. */
    valueType?: string;
}

/** Where an element sits; struct elements are laid out differently per slot. */
export type ElementSlot = 'array' | 'mapKey' | 'mapValue' | 'set';

export interface PropertyTypeCodec {
    readonly header: HeaderKind;
    read(ctx: ReadContext, header: TagHeader, size: number): PropertyValue;
    write(ctx: WriteContext, value: PropertyValue): void;
    /** Tag header fields derived from the value being written. */
    headerOf(ctx: WriteContext, value: PropertyValue): TagHeader;
    readElement?(ctx: ReadContext, slot: ElementSlot, header: TagHeader): ElementValue;
    writeElement?(ctx: WriteContext, slot: ElementSlot, value: ElementValue, header: TagHeader): void;
}

export interface StructCodec {
    readonly kind: StructDataKind;
    read(ctx: ReadContext): StructData;
    write(ctx: WriteContext, data: StructData): void;
}

export function formatPath(path: readonly string[]): string {
    return path.reduce((acc, seg) => (seg.startsWith('[') || acc === '' ? acc + seg : `${acc}.${seg}`), '');
}

/** Throws `TypeMismatchError` unless `value` is one of `kinds`. */
export function expectKind<T extends { type: string }, K extends T['type']>(
    ctx: CodecContext,
    value: T,
    kinds: readonly K[],
): Extract<T, { type: K }> {
    if (hasKind(value, kinds)) return value;
    throw new TypeMismatchError(`Expected a ${kinds.join(' or ')} value, got ${value.type}`, {
        path: formatPath(ctx.path),
    });
}

/**
 * Runs `fn` with `segment` pushed onto the property path. Codec errors escaping `fn` are
 * annotated with the path as it stood at the innermost failing segment.
 */
export function withSegment<T>(ctx: CodecContext, segment: string, fn: () => T): T {
    ctx.path.push(segment);
    try {
        return fn();
    } catch (err) {
        if (err instanceof SavCodecError) err.annotate({ path: formatPath(ctx.path) });
        throw err;
    } finally {
        ctx.path.pop();
    }
}
