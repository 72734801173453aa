/**
 * JSON bridge: converts between `SaveDocument` and a self-describing JSON form.
 *
 * Notes:
 * - every value is a wrapper `{ "type": ..., ... }`, container elements included, so the
 *   document can be re-encoded without a schema
 * - a property bag is a JSON object keyed by property name, in wire order; names that would
 *   collide, reorder (integer-like keys) or carry an instance number get a `Name[n]` key and an
 *   explicit `name` member
 * - 64-bit integers and struct ticks are decimal strings; NaN, the infinities and -0 are strings
 * - byte blobs (and non-default object trailers) are base64
 * - archives nested in persistence structs list their objects the way the document does
 * - anything that does not validate raises `MalformedJsonError` naming the JSON path
 */

import { Buffer } from 'node:buffer';

import { z } from 'zod';

import type {
    ArchiveBody,
    ClassPath,
    Component,
    PackageVersion,
    PersistenceActor,
    SaveDocument,
    SaveHeader,
    SaveObject,
    Transform,
    Variable,
    VariableValue,
    Vector3,
} from '../archive/model.js';
import { isDefaultTrailer } from '../archive/model.js';
import { MalformedJsonError } from '../errors.js';
import { ZERO_GUID } from '../io/reader.js';
import { BIG_INTEGER_RANGES, DEFAULT_TAGS, INTEGER_RANGES } from '../properties/codecs.js';
import {
    fname,
    fnameToString,
    hasKind,
    STRUCT_DATA_KINDS,
    VALUE_KINDS,
    type ArrayStructHeader,
    type BigIntegerKind,
    type ElementValue,
    type FloatKind,
    type FName,
    type IntegerKind,
    type Property,
    type PropertyValue,
    type StructData,
    type TextHistory,
} from '../properties/model.js';
import {
    ArchiveBodyJsonSchema,
    BagJsonSchema,
    ComponentJsonSchema,
    PersistenceActorJsonSchema,
    PropertyMetaSchema,
    SaveDocumentJsonSchema,
    SaveObjectJsonSchema,
    ValueNodeSchema,
} from './schema.js';

export type FNameJson = string | { name: string; number: number };
export type FloatJson = number | 'NaN' | 'Infinity' | '-Infinity' | '-0';

export type StructDataJson =
    | { type: 'properties'; value: PropertyBagJson }
    | { type: 'guid'; value: string }
    | { type: 'vector'; x: FloatJson; y: FloatJson; z: FloatJson }
    | { type: 'dateTime' | 'timespan'; value: string }
    | { type: 'softPath'; value: string }
    | { type: 'blob'; value: string }
    | { type: 'persistenceBlob'; packageVersion: PackageVersion; archive: ArchiveBodyJson }
    | { type: 'persistenceContainer'; version: number; actors: PersistenceActorJson[]; destroyed: string[] };

export interface Vector3Json {
    x: FloatJson;
    y: FloatJson;
    z: FloatJson;
}

export interface TransformJson {
    rotation: { w: FloatJson; x: FloatJson; y: FloatJson; z: FloatJson };
    position: Vector3Json;
    scale: Vector3Json;
}

export interface PersistenceActorJson {
    /** Decimal u64. */
    uniqueId: string;
    transform?: TransformJson;
    archive: ArchiveBodyJson;
    dynamic?: { transform: TransformJson; classPath: ClassPath };
}

export interface ArchiveBodyJson {
    archiveVersion: number;
    names: string[];
    dataOrder?: number[];
    objects: SaveObjectJson[];
}

export interface ArrayStructHeaderJson {
    name: FNameJson;
    index?: number;
    structType: FNameJson;
    structGuid?: string;
    guid?: string;
}

export type ValueJson =
    | { type: 'bool'; value: boolean }
    | { type: IntegerKind; value: number }
    | { type: BigIntegerKind; value: string }
    | { type: FloatKind; value: FloatJson }
    | { type: 'string' | 'softObject'; value: string }
    | { type: 'name'; value: FNameJson }
    | { type: 'enum'; enumType: FNameJson; memberName: FNameJson }
    | { type: 'object'; value: number }
    | { type: 'text'; flags: number; history: TextHistory }
    | { type: 'struct'; structType: FNameJson; structGuid?: string; data: StructDataJson }
    | { type: 'array'; elementType: string; structHeader?: ArrayStructHeaderJson; elements: ElementJson[] }
    | { type: 'set'; elementType: string; elements: ElementJson[]; removed?: ElementJson[] }
    | {
          type: 'map';
          keyType: string;
          valueType: string;
          entries: Array<{ key: ElementJson; value: ElementJson }>;
          removed?: ElementJson[];
      };

export type ElementJson = ValueJson | StructDataJson;

export interface PropertyMetaJson {
    /** Present when the bag key is not the property name. */
    name?: FNameJson;
    index?: number;
    guid?: string;
    /** Wire tag, when it is not the default one for the value type. */
    property?: string;
}

export type PropertyJson = ValueJson & PropertyMetaJson;

export interface PropertyBagJson {
    [key: string]: PropertyJson;
}

export type VariableJson = {
    name: FNameJson;
    value:
        | { type: 'none' }
        | { type: 'bool'; value: boolean }
        | { type: 'int'; value: number }
        | { type: 'float'; value: FloatJson }
        | { type: 'name'; value: FNameJson };
};

export type ComponentJson =
    | { key: string; type: 'variables'; name: FNameJson; variables: VariableJson[] }
    | { key: string; type: 'properties'; properties: PropertyBagJson };

export interface SaveObjectJson {
    wasLoaded: boolean;
    path: string;
    loadedData?: { name: FNameJson; outerId: number };
    properties?: PropertyBagJson;
    /** Base64; omitted for the usual four zero bytes. */
    trailer?: string;
    components?: ComponentJson[];
}

export interface SaveDocumentJson {
    header: SaveHeader;
    objects: SaveObjectJson[];
}

export interface StringifyOptions {
    /** Indent with two spaces. Defaults to true. */
    pretty?: boolean;
}

// --- leaves ---

function fnameToJson(name: FName): FNameJson {
    return name.number === undefined ? name.value : { name: name.value, number: name.number };
}

function fnameFromJson(json: FNameJson): FName {
    return typeof json === 'string' ? fname(json) : fname(json.name, json.number);
}

function floatToJson(value: number): FloatJson {
    if (Number.isNaN(value)) return 'NaN';
    if (value === Infinity) return 'Infinity';
    if (value === -Infinity) return '-Infinity';
    if (Object.is(value, -0)) return '-0';
    return value;
}

function floatFromJson(json: FloatJson): number {
    switch (json) {
        case 'NaN': return NaN;
        case 'Infinity': return Infinity;
        case '-Infinity': return -Infinity;
        case '-0': return -0;
        default: return json;
    }
}

function bytesToBase64(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

function base64ToBytes(text: string): Uint8Array {
    return new Uint8Array(Buffer.from(text, 'base64'));
}

// --- model -> JSON ---

function vector3ToJson(v: Vector3): Vector3Json {
    return { x: floatToJson(v.x), y: floatToJson(v.y), z: floatToJson(v.z) };
}

function transformToJson(t: Transform): TransformJson {
    const q = t.rotation;
    return {
        rotation: { w: floatToJson(q.w), x: floatToJson(q.x), y: floatToJson(q.y), z: floatToJson(q.z) },
        position: vector3ToJson(t.position),
        scale: vector3ToJson(t.scale),
    };
}

function archiveBodyToJson(body: ArchiveBody): ArchiveBodyJson {
    return {
        archiveVersion: body.archiveVersion,
        names: [...body.names],
        ...(body.dataOrder && { dataOrder: [...body.dataOrder] }),
        objects: body.objects.map(objectToJson),
    };
}

function actorToJson(actor: PersistenceActor): PersistenceActorJson {
    return {
        uniqueId: actor.uniqueId.toString(),
        ...(actor.transform && { transform: transformToJson(actor.transform) }),
        archive: archiveBodyToJson(actor.archive),
        ...(actor.dynamic && {
            dynamic: { transform: transformToJson(actor.dynamic.transform), classPath: { ...actor.dynamic.classPath } },
        }),
    };
}

function structDataToJson(data: StructData): StructDataJson {
    switch (data.type) {
        case 'properties':
            return { type: 'properties', value: propertiesToJson(data.properties) };
        case 'guid':
        case 'softPath':
            return { type: data.type, value: data.value };
        case 'vector':
            return { type: 'vector', x: floatToJson(data.x), y: floatToJson(data.y), z: floatToJson(data.z) };
        case 'dateTime':
        case 'timespan':
            return { type: data.type, value: data.ticks.toString() };
        case 'blob':
            return { type: 'blob', value: bytesToBase64(data.value) };
        case 'persistenceBlob':
            return {
                type: 'persistenceBlob',
                packageVersion: { ...data.packageVersion },
                archive: archiveBodyToJson(data.archive),
            };
        case 'persistenceContainer':
            return {
                type: 'persistenceContainer',
                version: data.version,
                actors: data.actors.map(actorToJson),
                destroyed: data.destroyed.map((id) => id.toString()),
            };
    }
}

function structHeaderToJson(header: ArrayStructHeader): ArrayStructHeaderJson {
    return {
        name: fnameToJson(header.name),
        ...(header.index !== 0 && { index: header.index }),
        structType: fnameToJson(header.structType),
        ...(header.structGuid !== ZERO_GUID && { structGuid: header.structGuid }),
        ...(header.guid !== undefined && { guid: header.guid }),
    };
}

function elementToJson(element: ElementValue): ElementJson {
    return hasKind(element, STRUCT_DATA_KINDS) ? structDataToJson(element) : valueToJson(element);
}

/** The JSON wrapper for a single value, without tag fields. */
export function valueToJson(value: PropertyValue): ValueJson {
    switch (value.type) {
        case 'bool':
            return { type: 'bool', value: value.value };
        case 'int8':
        case 'int16':
        case 'int32':
        case 'uint8':
        case 'uint16':
        case 'uint32':
            return { type: value.type, value: value.value };
        case 'int64':
        case 'uint64':
            return { type: value.type, value: value.value.toString() };
        case 'float32':
        case 'float64':
            return { type: value.type, value: floatToJson(value.value) };
        case 'string':
        case 'softObject':
            return { type: value.type, value: value.value };
        case 'name':
            return { type: 'name', value: fnameToJson(value.value) };
        case 'enum':
            return { type: 'enum', enumType: fnameToJson(value.enumType), memberName: fnameToJson(value.memberName) };
        case 'object':
            return { type: 'object', value: value.value };
        case 'text':
            return { type: 'text', flags: value.flags, history: { ...value.history } };
        case 'struct':
            return {
                type: 'struct',
                structType: fnameToJson(value.structType),
                ...(value.structGuid !== ZERO_GUID && { structGuid: value.structGuid }),
                data: structDataToJson(value.data),
            };
        case 'array':
            return {
                type: 'array',
                elementType: value.elementType,
                ...(value.structHeader && { structHeader: structHeaderToJson(value.structHeader) }),
                elements: value.elements.map(elementToJson),
            };
        case 'set':
            return {
                type: 'set',
                elementType: value.elementType,
                elements: value.elements.map(elementToJson),
                ...(value.removed.length > 0 && { removed: value.removed.map(elementToJson) }),
            };
        case 'map':
            return {
                type: 'map',
                keyType: value.keyType,
                valueType: value.valueType,
                entries: value.entries.map(([key, entry]) => ({ key: elementToJson(key), value: elementToJson(entry) })),
                ...(value.removed.length > 0 && { removed: value.removed.map(elementToJson) }),
            };
    }
}

const INTEGER_KEY = /^(0|[1-9]\d*)$/;

function bagKey(property: Property, used: ReadonlySet<string>): string {
    const display = fnameToString(property.name);
    if (!used.has(display) && !INTEGER_KEY.test(display)) return display;
    for (let n = property.index; ; n++) {
        const key = `${display}[${n}]`;
        if (!used.has(key)) return key;
    }
}

export function propertiesToJson(properties: readonly Property[]): PropertyBagJson {
    const used = new Set<string>();
    const entries: Array<[string, PropertyJson]> = [];
    for (const property of properties) {
        const key = bagKey(property, used);
        used.add(key);
        entries.push([
            key,
            {
                ...valueToJson(property.value),
                ...(key !== property.name.value && { name: fnameToJson(property.name) }),
                ...(property.index !== 0 && { index: property.index }),
                ...(property.guid !== undefined && { guid: property.guid }),
                ...(property.type !== DEFAULT_TAGS[property.value.type] && { property: property.type }),
            },
        ]);
    }
    // fromEntries defines own properties, so a "__proto__" key stays data.
    return Object.fromEntries(entries);
}

function variableValueToJson(value: VariableValue): VariableJson['value'] {
    switch (value.type) {
        case 'none':
            return { type: 'none' };
        case 'float':
            return { type: 'float', value: floatToJson(value.value) };
        case 'name':
            return { type: 'name', value: fnameToJson(value.value) };
        default:
            return { ...value };
    }
}

function componentToJson(component: Component): ComponentJson {
    if (component.type === 'properties') {
        return { key: component.key, type: 'properties', properties: propertiesToJson(component.properties) };
    }
    return {
        key: component.key,
        type: 'variables',
        name: fnameToJson(component.name),
        variables: component.variables.map((v) => ({ name: fnameToJson(v.name), value: variableValueToJson(v.value) })),
    };
}

function objectToJson(object: SaveObject): SaveObjectJson {
    return {
        wasLoaded: object.wasLoaded,
        path: object.path,
        ...(object.loadedData && {
            loadedData: { name: fnameToJson(object.loadedData.name), outerId: object.loadedData.outerId },
        }),
        ...(object.data && { properties: propertiesToJson(object.data.properties) }),
        ...(object.data && !isDefaultTrailer(object.data.trailer) && { trailer: bytesToBase64(object.data.trailer) }),
        ...(object.components && { components: object.components.map(componentToJson) }),
    };
}

export function documentToJson(doc: SaveDocument): SaveDocumentJson {
    const { header } = doc;
    return {
        header: {
            ...header,
            packageVersion: { ...header.packageVersion },
            classPath: { ...header.classPath },
            compression: { ...header.compression },
            names: [...header.names],
            ...(header.dataOrder && { dataOrder: [...header.dataOrder] }),
        },
        objects: doc.objects.map(objectToJson),
    };
}

// --- JSON -> model ---

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function child(path: string, key: string | number): string {
    if (typeof key === 'number') return `${path}[${key}]`;
    return IDENTIFIER.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

function fail(path: string, message: string): MalformedJsonError {
    return new MalformedJsonError(`${message} at ${path}`, { path });
}

function parseNode<T>(schema: z.ZodType<T>, input: unknown, path: string): T {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new MalformedJsonError(`Invalid JSON at ${path}:\n${z.prettifyError(result.error)}`, { path });
    }
    return result.data;
}

function checkedInteger(kind: IntegerKind, value: number, path: string): number {
    const [min, max] = INTEGER_RANGES[kind];
    if (value < min || value > max) throw fail(path, `${value} does not fit ${kind}`);
    return value;
}

function checkedBigInt(kind: BigIntegerKind, text: string, path: string): bigint {
    const value = BigInt(text);
    const [min, max] = BIG_INTEGER_RANGES[kind];
    if (value < min || value > max) throw fail(path, `${text} does not fit ${kind}`);
    return value;
}

function structDataFromJson(input: unknown, path: string): StructData {
    const data = elementFromJson(input, path);
    if (!hasKind(data, STRUCT_DATA_KINDS)) throw fail(path, `Expected struct data, found "${data.type}"`);
    return data;
}

function elementsFromJson(items: readonly unknown[], path: string): ElementValue[] {
    return items.map((item, i) => elementFromJson(item, child(path, i)));
}

function elementFromJson(input: unknown, path: string): ElementValue {
    const node = parseNode(ValueNodeSchema, input, path);
    switch (node.type) {
        case 'bool':
            return { type: 'bool', value: node.value };
        case 'int8':
        case 'int16':
        case 'int32':
        case 'uint8':
        case 'uint16':
        case 'uint32':
            return { type: node.type, value: checkedInteger(node.type, node.value, child(path, 'value')) };
        case 'int64':
        case 'uint64':
            return { type: node.type, value: checkedBigInt(node.type, node.value, child(path, 'value')) };
        case 'float32':
            return { type: 'float32', value: Math.fround(floatFromJson(node.value)) };
        case 'float64':
            return { type: 'float64', value: floatFromJson(node.value) };
        case 'string':
        case 'softObject':
            return { type: node.type, value: node.value };
        case 'name':
            return { type: 'name', value: fnameFromJson(node.value) };
        case 'enum':
            return { type: 'enum', enumType: fnameFromJson(node.enumType), memberName: fnameFromJson(node.memberName) };
        case 'object':
            return { type: 'object', value: checkedInteger('int32', node.value, child(path, 'value')) };
        case 'text':
            return { type: 'text', flags: node.flags, history: { ...node.history } };
        case 'struct':
            return {
                type: 'struct',
                structType: fnameFromJson(node.structType),
                structGuid: node.structGuid?.toUpperCase() ?? ZERO_GUID,
                data: structDataFromJson(node.data, child(path, 'data')),
            };
        case 'array': {
            const header = node.structHeader;
            return {
                type: 'array',
                elementType: node.elementType,
                elements: elementsFromJson(node.elements, child(path, 'elements')),
                ...(header && {
                    structHeader: {
                        name: fnameFromJson(header.name),
                        index: header.index ?? 0,
                        structType: fnameFromJson(header.structType),
                        structGuid: header.structGuid?.toUpperCase() ?? ZERO_GUID,
                        ...(header.guid !== undefined && { guid: header.guid.toUpperCase() }),
                    },
                }),
            };
        }
        case 'set':
            return {
                type: 'set',
                elementType: node.elementType,
                elements: elementsFromJson(node.elements, child(path, 'elements')),
                removed: elementsFromJson(node.removed ?? [], child(path, 'removed')),
            };
        case 'map': {
            const entriesPath = child(path, 'entries');
            return {
                type: 'map',
                keyType: node.keyType,
                valueType: node.valueType,
                entries: node.entries.map((entry, i): [ElementValue, ElementValue] => [
                    elementFromJson(entry.key, child(child(entriesPath, i), 'key')),
                    elementFromJson(entry.value, child(child(entriesPath, i), 'value')),
                ]),
                removed: elementsFromJson(node.removed ?? [], child(path, 'removed')),
            };
        }
        case 'properties':
            return { type: 'properties', properties: propertiesFromJson(node.value, child(path, 'value')) };
        case 'guid':
            return { type: 'guid', value: node.value.toUpperCase() };
        case 'vector':
            return { type: 'vector', x: floatFromJson(node.x), y: floatFromJson(node.y), z: floatFromJson(node.z) };
        case 'dateTime':
        case 'timespan':
            return { type: node.type, ticks: checkedBigInt('uint64', node.value, child(path, 'value')) };
        case 'softPath':
            return { type: 'softPath', value: node.value };
        case 'blob':
            return { type: 'blob', value: base64ToBytes(node.value) };
        case 'persistenceBlob':
            return {
                type: 'persistenceBlob',
                packageVersion: { ...node.packageVersion },
                archive: archiveBodyFromJson(node.archive, child(path, 'archive')),
            };
        case 'persistenceContainer': {
            const actorsPath = child(path, 'actors');
            const destroyedPath = child(path, 'destroyed');
            return {
                type: 'persistenceContainer',
                version: node.version,
                actors: node.actors.map((actor, i) => actorFromJson(actor, child(actorsPath, i))),
                destroyed: node.destroyed.map((id, i) => checkedBigInt('uint64', id, child(destroyedPath, i))),
            };
        }
    }
}

/** Parses a single value wrapper. */
export function valueFromJson(input: unknown, path = '$'): PropertyValue {
    const value = elementFromJson(input, path);
    if (!hasKind(value, VALUE_KINDS)) throw fail(path, `"${value.type}" is struct data, not a property value`);
    return value;
}

function propertyFromJson(key: string, input: unknown, path: string): Property {
    const meta = parseNode(PropertyMetaSchema, input, path);
    const value = valueFromJson(input, path);
    return {
        name: meta.name !== undefined ? fnameFromJson(meta.name) : fname(key),
        type: meta.property ?? DEFAULT_TAGS[value.type],
        index: meta.index ?? 0,
        ...(meta.guid !== undefined && { guid: meta.guid.toUpperCase() }),
        value,
    };
}

export function propertiesFromJson(input: unknown, path = '$'): Property[] {
    const bag = parseNode(BagJsonSchema, input, path);
    return Object.entries(bag).map(([key, wrapper]) => propertyFromJson(key, wrapper, child(path, key)));
}

function variablesFromJson(json: Extract<z.infer<typeof ComponentJsonSchema>, { type: 'variables' }>): Variable[] {
    return json.variables.map(({ name, value }): Variable => {
        switch (value.type) {
            case 'float':
                return { name: fnameFromJson(name), value: { type: 'float', value: Math.fround(floatFromJson(value.value)) } };
            case 'name':
                return { name: fnameFromJson(name), value: { type: 'name', value: fnameFromJson(value.value) } };
            default:
                return { name: fnameFromJson(name), value: { ...value } };
        }
    });
}

function componentFromJson(input: unknown, path: string): Component {
    const json = parseNode(ComponentJsonSchema, input, path);
    if (json.type === 'properties') {
        return { key: json.key, type: 'properties', properties: propertiesFromJson(json.properties, child(path, 'properties')) };
    }
    return { key: json.key, type: 'variables', name: fnameFromJson(json.name), variables: variablesFromJson(json) };
}

function objectFromJson(input: unknown, path: string): SaveObject {
    const json = parseNode(SaveObjectJsonSchema, input, path);
    if (json.trailer !== undefined && json.properties === undefined) {
        throw fail(child(path, 'trailer'), 'An object trailer needs properties');
    }
    const object: SaveObject = { wasLoaded: json.wasLoaded, path: json.path };
    if (json.loadedData) {
        object.loadedData = { name: fnameFromJson(json.loadedData.name), outerId: json.loadedData.outerId };
    }
    if (json.properties) {
        object.data = {
            properties: propertiesFromJson(json.properties, child(path, 'properties')),
            trailer: json.trailer !== undefined ? base64ToBytes(json.trailer) : new Uint8Array(4),
        };
    }
    if (json.components) {
        const componentsPath = child(path, 'components');
        object.components = json.components.map((c, i) => componentFromJson(c, child(componentsPath, i)));
    }
    return object;
}

function vector3FromJson(json: Vector3Json): Vector3 {
    return { x: floatFromJson(json.x), y: floatFromJson(json.y), z: floatFromJson(json.z) };
}

function transformFromJson(json: TransformJson): Transform {
    const q = json.rotation;
    return {
        rotation: { w: floatFromJson(q.w), x: floatFromJson(q.x), y: floatFromJson(q.y), z: floatFromJson(q.z) },
        position: vector3FromJson(json.position),
        scale: vector3FromJson(json.scale),
    };
}

function archiveBodyFromJson(input: unknown, path: string): ArchiveBody {
    const json = parseNode(ArchiveBodyJsonSchema, input, path);
    const objectsPath = child(path, 'objects');
    return {
        archiveVersion: json.archiveVersion,
        names: json.names,
        ...(json.dataOrder && { dataOrder: json.dataOrder }),
        objects: json.objects.map((o, i) => objectFromJson(o, child(objectsPath, i))),
    };
}

function actorFromJson(input: unknown, path: string): PersistenceActor {
    const json = parseNode(PersistenceActorJsonSchema, input, path);
    return {
        uniqueId: checkedBigInt('uint64', json.uniqueId, child(path, 'uniqueId')),
        ...(json.transform && { transform: transformFromJson(json.transform) }),
        archive: archiveBodyFromJson(json.archive, child(path, 'archive')),
        ...(json.dynamic && {
            dynamic: { transform: transformFromJson(json.dynamic.transform), classPath: { ...json.dynamic.classPath } },
        }),
    };
}

export function documentFromJson(input: unknown): SaveDocument {
    const json = parseNode(SaveDocumentJsonSchema, input, '$');
    const { dataOrder, ...header } = json.header;
    return {
        header: { ...header, ...(dataOrder && { dataOrder }) },
        objects: json.objects.map((o, i) => objectFromJson(o, child('$.objects', i))),
    };
}

export function stringifyDocument(doc: SaveDocument, opts: StringifyOptions = {}): string {
    return `${JSON.stringify(documentToJson(doc), null, (opts.pretty ?? true) ? 2 : undefined)}\n`;
}

export function parseDocument(text: string): SaveDocument {
    let input: unknown;
    try {
        input = JSON.parse(text);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new MalformedJsonError(`Document is not valid JSON: ${reason}`, {}, err);
    }
    return documentFromJson(input);
}
