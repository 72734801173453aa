/**
 * In-memory document model for tagged property bags.
 *
 * A `Property` keeps everything needed to re-emit its tag except the declared byte length,
 * which the serializer always recomputes from the payload.
 */

import type { ArchiveBody, PackageVersion, PersistenceContainer } from '../archive/model.js';
import type { Guid } from '../io/reader.js';

/** Engine name: a string plus an optional instance number (`Foo_3` is `{ value: 'Foo', number: 4 }`). */
export interface FName {
    value: string;
    number?: number;
}

export const NONE_NAME = 'None';

export function fname(value: string, number?: number): FName {
    return number === undefined ? { value } : { value, number };
}

export function fnameEquals(a: FName, b: FName): boolean {
    return a.value === b.value && (a.number ?? 0) === (b.number ?? 0);
}

export function isNone(name: FName): boolean {
    return name.value === NONE_NAME && name.number === undefined;
}

/** Display form used in error paths and JSON keys. */
export function fnameToString(name: FName): string {
    return name.number === undefined ? name.value : `${name.value}#${name.number}`;
}

export type IntegerKind = 'int8' | 'int16' | 'int32' | 'uint8' | 'uint16' | 'uint32';
export type BigIntegerKind = 'int64' | 'uint64';
export type FloatKind = 'float32' | 'float64';

type Scalar<K extends string, V> = K extends unknown ? { type: K; value: V } : never;

export type IntegerValue = Scalar<IntegerKind, number>;
export type BigIntegerValue = Scalar<BigIntegerKind, bigint>;
export type FloatValue = Scalar<FloatKind, number>;

export type TextHistory =
    | { kind: 'base'; namespace: string; key: string; sourceString: string }
    | { kind: 'none'; cultureInvariantString?: string };

/** Payload of a struct, chosen by its struct type name. */
export type StructData =
    | { type: 'properties'; properties: Property[] }
    | { type: 'guid'; value: Guid }
    | { type: 'vector'; x: number; y: number; z: number }
    | { type: 'dateTime'; ticks: bigint }
    | { type: 'timespan'; ticks: bigint }
    | { type: 'softPath'; value: string }
    | { type: 'blob'; value: Uint8Array }
    /** Profile saves: a nested archive with its own package version. */
    | { type: 'persistenceBlob'; packageVersion: PackageVersion; archive: ArchiveBody }
    /** World saves: per-actor archives. */
    | ({ type: 'persistenceContainer' } & PersistenceContainer);

export type StructDataKind = StructData['type'];

/** Inner tag written once ahead of the elements of a struct array. */
export interface ArrayStructHeader {
    name: FName;
    index: number;
    structType: FName;
    structGuid: Guid;
    guid?: Guid;
}

/**
 * A container element. Elements carry no tag of their own: struct elements are bare
 * `StructData`, and `EnumProperty` elements are plain `name` values.
 */
export type ElementValue = PropertyValue | StructData;

export interface ArrayValue {
    type: 'array';
    /** Wire tag of the elements, e.g. `FloatProperty`. */
    elementType: string;
    elements: ElementValue[];
    structHeader?: ArrayStructHeader;
}

export interface SetValue {
    type: 'set';
    elementType: string;
    elements: ElementValue[];
    /** Elements recorded as removed relative to the defaults; usually empty. */
    removed: ElementValue[];
}

export interface MapValue {
    type: 'map';
    keyType: string;
    valueType: string;
    entries: Array<[ElementValue, ElementValue]>;
    removed: ElementValue[];
}

export interface StructValue {
    type: 'struct';
    structType: FName;
    structGuid: Guid;
    data: StructData;
}

export type PropertyValue =
    | { type: 'bool'; value: boolean }
    | IntegerValue
    | BigIntegerValue
    | FloatValue
    | { type: 'string'; value: string }
    | { type: 'name'; value: FName }
    | { type: 'enum'; enumType: FName; memberName: FName }
    | { type: 'object'; value: number }
    | { type: 'softObject'; value: string }
    | { type: 'text'; flags: number; history: TextHistory }
    | StructValue
    | ArrayValue
    | SetValue
    | MapValue;

export type ValueKind = PropertyValue['type'];

export const VALUE_KINDS: readonly ValueKind[] = [
    'bool', 'int8', 'int16', 'int32', 'int64', 'uint8', 'uint16', 'uint32', 'uint64', 'float32', 'float64',
    'string', 'name', 'enum', 'object', 'softObject', 'text', 'struct', 'array', 'set', 'map',
];

export const STRUCT_DATA_KINDS: readonly StructDataKind[] = [
    'properties', 'guid', 'vector', 'dateTime', 'timespan', 'softPath', 'blob', 'persistenceBlob', 'persistenceContainer',
];

/** Narrows any `type`-tagged union member to one of the given kinds. */
export function hasKind<T extends { type: string }, K extends T['type']>(
    value: T,
    kinds: readonly K[],
): value is Extract<T, { type: K }> {
    return kinds.some((k) => k === value.type);
}

export interface Property {
    name: FName;
    /** Wire type tag, e.g. `IntProperty`. */
    type: string;
    /** Static array index; 0 for ordinary properties. */
    index: number;
    /** Present when the tag carries a property Guid. */
    guid?: Guid;
    value: PropertyValue;
}
