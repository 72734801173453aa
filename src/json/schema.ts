/**
 * zod schemas for the annotated JSON form of a save document.
 *
 * Each schema validates one node. Children that are themselves values or property bags are
 * typed `unknown` here and validated by the bridge as it walks them, so every error can name
 * its full JSON path.
 */

import { z } from 'zod';

const U32_MAX = 0xFFFFFFFF;

export const u32 = z.number().int().min(0).max(U32_MAX);

export const FNameJsonSchema = z.union([
    z.string(),
    z.object({ name: z.string(), number: u32 }),
]);

export const GuidJsonSchema = z.string().regex(/^[0-9A-Fa-f]{32}$/, 'Expected 32 hex digits');

/** Finite numbers, plus the string spellings of values JSON has no literal for. */
export const FloatJsonSchema = z.union([
    z.number(),
    z.enum(['NaN', 'Infinity', '-Infinity', '-0']),
]);

/** 64-bit integers travel as decimal strings. */
export const BigIntJsonSchema = z.string().regex(/^-?\d+$/, 'Expected a decimal integer string');

export const Base64JsonSchema = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'Expected base64');

const PackageVersionJsonSchema = z.object({ ue4: u32, ue5: u32 });

const ClassPathJsonSchema = z.object({ path: z.string(), name: z.string() });

const Vector3JsonSchema = z.object({ x: FloatJsonSchema, y: FloatJsonSchema, z: FloatJsonSchema });

const TransformJsonSchema = z.object({
    rotation: z.object({ w: FloatJsonSchema, x: FloatJsonSchema, y: FloatJsonSchema, z: FloatJsonSchema }),
    position: Vector3JsonSchema,
    scale: Vector3JsonSchema,
});

const TextHistorySchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('base'), namespace: z.string(), key: z.string(), sourceString: z.string() }),
    z.object({ kind: z.literal('none'), cultureInvariantString: z.string().optional() }),
]);

const ArrayStructHeaderSchema = z.object({
    name: FNameJsonSchema,
    index: u32.optional(),
    structType: FNameJsonSchema,
    structGuid: GuidJsonSchema.optional(),
    guid: GuidJsonSchema.optional(),
});

/** Any JSON object; its members are property wrappers checked one by one. */
export const BagJsonSchema = z.custom<Record<string, unknown>>(
    (value) => typeof value === 'object' && value !== null && !Array.isArray(value),
    'Expected an object of properties',
);

export const ValueNodeSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('bool'), value: z.boolean() }),
    z.object({ type: z.enum(['int8', 'int16', 'int32', 'uint8', 'uint16', 'uint32']), value: z.number().int() }),
    z.object({ type: z.enum(['int64', 'uint64']), value: BigIntJsonSchema }),
    z.object({ type: z.enum(['float32', 'float64']), value: FloatJsonSchema }),
    z.object({ type: z.enum(['string', 'softObject']), value: z.string() }),
    z.object({ type: z.literal('name'), value: FNameJsonSchema }),
    z.object({ type: z.literal('enum'), enumType: FNameJsonSchema, memberName: FNameJsonSchema }),
    z.object({ type: z.literal('object'), value: z.number().int() }),
    z.object({ type: z.literal('text'), flags: u32, history: TextHistorySchema }),
    z.object({
        type: z.literal('struct'),
        structType: FNameJsonSchema,
        structGuid: GuidJsonSchema.optional(),
        data: z.unknown(),
    }),
    z.object({
        type: z.literal('array'),
        elementType: z.string(),
        structHeader: ArrayStructHeaderSchema.optional(),
        elements: z.array(z.unknown()),
    }),
    z.object({
        type: z.literal('set'),
        elementType: z.string(),
        elements: z.array(z.unknown()),
        removed: z.array(z.unknown()).optional(),
    }),
    z.object({
        type: z.literal('map'),
        keyType: z.string(),
        valueType: z.string(),
        entries: z.array(z.object({ key: z.unknown(), value: z.unknown() })),
        removed: z.array(z.unknown()).optional(),
    }),
    // struct payloads
    z.object({ type: z.literal('properties'), value: BagJsonSchema }),
    z.object({ type: z.literal('guid'), value: GuidJsonSchema }),
    z.object({ type: z.literal('vector'), x: FloatJsonSchema, y: FloatJsonSchema, z: FloatJsonSchema }),
    z.object({ type: z.enum(['dateTime', 'timespan']), value: BigIntJsonSchema }),
    z.object({ type: z.literal('softPath'), value: z.string() }),
    z.object({ type: z.literal('blob'), value: Base64JsonSchema }),
    z.object({ type: z.literal('persistenceBlob'), packageVersion: PackageVersionJsonSchema, archive: z.unknown() }),
    z.object({
        type: z.literal('persistenceContainer'),
        version: u32,
        actors: z.array(z.unknown()),
        destroyed: z.array(BigIntJsonSchema),
    }),
]);

export type ValueNode = z.infer<typeof ValueNodeSchema>;

/** Tag fields a property wrapper may carry alongside its value. */
export const PropertyMetaSchema = z.object({
    name: FNameJsonSchema.optional(),
    index: u32.optional(),
    guid: GuidJsonSchema.optional(),
    property: z.string().min(1).optional(),
});

const VariableJsonSchema = z.object({
    name: FNameJsonSchema,
    value: z.discriminatedUnion('type', [
        z.object({ type: z.literal('none') }),
        z.object({ type: z.literal('bool'), value: z.boolean() }),
        z.object({ type: z.literal('int'), value: z.number().int() }),
        z.object({ type: z.literal('float'), value: FloatJsonSchema }),
        z.object({ type: z.literal('name'), value: FNameJsonSchema }),
    ]),
});

export const ComponentJsonSchema = z.discriminatedUnion('type', [
    z.object({ key: z.string(), type: z.literal('variables'), name: FNameJsonSchema, variables: z.array(VariableJsonSchema) }),
    z.object({ key: z.string(), type: z.literal('properties'), properties: BagJsonSchema }),
]);

export const SaveObjectJsonSchema = z.object({
    wasLoaded: z.boolean(),
    path: z.string(),
    loadedData: z.object({ name: FNameJsonSchema, outerId: u32 }).optional(),
    properties: BagJsonSchema.optional(),
    trailer: Base64JsonSchema.optional(),
    components: z.array(z.unknown()).optional(),
});

/** Content of an archive nested in a persistence struct. */
export const ArchiveBodyJsonSchema = z.object({
    archiveVersion: u32,
    names: z.array(z.string()),
    dataOrder: z.array(z.number().int().min(0)).optional(),
    objects: z.array(z.unknown()),
});

export const PersistenceActorJsonSchema = z.object({
    uniqueId: BigIntJsonSchema,
    transform: TransformJsonSchema.optional(),
    archive: z.unknown(),
    dynamic: z.object({ transform: TransformJsonSchema, classPath: ClassPathJsonSchema }).optional(),
});

export const SaveHeaderJsonSchema = z.object({
    saveVersion: u32,
    buildNumber: u32,
    packageVersion: PackageVersionJsonSchema,
    classPath: ClassPathJsonSchema,
    archiveVersion: u32,
    compression: z.object({
        compressor: z.enum(['none', 'zlib', 'gzip', 'lz4']),
        blockSize: z.number().int().positive(),
        level: z.number().int().min(0).max(9),
    }),
    names: z.array(z.string()),
    dataOrder: z.array(z.number().int().min(0)).optional(),
});

export const SaveDocumentJsonSchema = z.object({
    header: SaveHeaderJsonSchema,
    objects: z.array(z.unknown()),
});
