/**
 * `PersistenceBlob` structs: the u32-length-prefixed blobs where most world and profile state
 * lives. How the blob is laid out depends on the class path of the save holding it.
 *
 * Notes:
 * - profile saves: `[u32 ue4][u32 ue5]` then archive content, offsets relative to the blob
 * - world saves: a container, `[u32 version][u32 indexOffset][u32 dynamicOffset]`, the actor
 *   blobs back to back, the actor index and destroyed ids at `indexOffset`, then the dynamic
 *   actors at `dynamicOffset` running to the end of the blob
 * - an actor blob is `[u32 hasTransform][transform?]` then archive content without a class path,
 *   offsets relative to the actor blob
 * - any other save (and any blob inside a nested archive) keeps the bytes opaque
 * - a container is decoded only in the layout it is re-encoded in, so anything else is rejected
 */

import { InvalidFormatError, LengthMismatchError, SavCodecError, TypeMismatchError } from '../errors.js';
import { ByteReader } from '../io/reader.js';
import { ByteWriter } from '../io/writer.js';
import { expectKind, formatPath, type StructCodec } from '../properties/context.js';
import type { StructData } from '../properties/model.js';
import type { TypeRegistry } from '../properties/registry.js';
import { readArchiveContent, writeArchiveContent } from './content.js';
import type { ClassPath, DynamicActor, PersistenceActor, PersistenceContainer, Transform } from './model.js';

export const PROFILE_CLASS_PATH = '/Game/_Core/Blueprints/Base/BP_RemnantSaveGameProfile';
export const WORLD_CLASS_PATH = '/Game/_Core/Blueprints/Base/BP_RemnantSaveGame';

const PERSISTENCE_BLOB = 'PersistenceBlob';

/** Fixed part of a container: version and the two offsets. */
const CONTAINER_HEADER_SIZE = 12;

type BlobLayout = 'profile' | 'world';

function blobLayout(classPath: string): BlobLayout | undefined {
    if (classPath === PROFILE_CLASS_PATH) return 'profile';
    if (classPath === WORLD_CLASS_PATH) return 'world';
    return undefined;
}

// --- transforms ---

function readTransform(r: ByteReader): Transform {
    const rotation = { w: r.readFloat64(), x: r.readFloat64(), y: r.readFloat64(), z: r.readFloat64() };
    const position = { x: r.readFloat64(), y: r.readFloat64(), z: r.readFloat64() };
    const scale = { x: r.readFloat64(), y: r.readFloat64(), z: r.readFloat64() };
    return { rotation, position, scale };
}

function writeTransform(w: ByteWriter, t: Transform): void {
    const { rotation: q, position: p, scale: s } = t;
    for (const v of [q.w, q.x, q.y, q.z, p.x, p.y, p.z, s.x, s.y, s.z]) w.writeFloat64(v);
}

// --- profile blobs ---

function readProfileBlob(bytes: Uint8Array, nested: TypeRegistry, path: readonly string[]): StructData {
    const r = new ByteReader(bytes);
    const packageVersion = { ue4: r.readUint32(), ue5: r.readUint32() };
    const archive = readArchiveContent(r, { registry: nested, path });
    return { type: 'persistenceBlob', packageVersion, archive };
}

function writeProfileBlob(
    data: Extract<StructData, { type: 'persistenceBlob' }>,
    nested: TypeRegistry,
    path: readonly string[],
): Uint8Array {
    const w = new ByteWriter();
    w.writeUint32(data.packageVersion.ue4);
    w.writeUint32(data.packageVersion.ue5);
    writeArchiveContent(w, data.archive, { registry: nested, path });
    return w.toUint8Array();
}

// --- world containers ---

interface ActorInfo {
    uniqueId: bigint;
    offset: number;
    size: number;
}

function readActor(bytes: Uint8Array, uniqueId: bigint, nested: TypeRegistry, path: readonly string[]): PersistenceActor {
    const r = new ByteReader(bytes);
    const transform = r.readBool32() ? readTransform(r) : undefined;
    const archive = readArchiveContent(r, { registry: nested, path });
    return { uniqueId, ...(transform && { transform }), archive };
}

function readDynamicActor(r: ByteReader): { uniqueId: bigint; dynamic: DynamicActor } {
    const uniqueId = r.readUint64();
    const transform = readTransform(r);
    const classPath: ClassPath = { path: r.readFString(), name: r.readFString() };
    return { uniqueId, dynamic: { transform, classPath } };
}

function expectOffset(actual: number, expected: number, what: string): void {
    if (actual !== expected) {
        throw new LengthMismatchError(`${what} is at ${actual}, expected ${expected}`, expected, actual, {
            offset: actual,
        });
    }
}

function readContainer(bytes: Uint8Array, nested: TypeRegistry, path: readonly string[]): PersistenceContainer {
    const r = new ByteReader(bytes);
    const version = r.readUint32();
    const indexOffset = r.readUint32();
    const dynamicOffset = r.readUint32();

    r.seek(indexOffset);
    const infos: ActorInfo[] = [];
    const count = r.readUint32();
    for (let i = 0; i < count; i++) {
        infos.push({ uniqueId: r.readUint64(), offset: r.readUint32(), size: r.readUint32() });
    }
    const destroyed: bigint[] = [];
    const destroyedCount = r.readUint32();
    for (let i = 0; i < destroyedCount; i++) destroyed.push(r.readUint64());
    expectOffset(r.position, dynamicOffset, 'Dynamic actor list');

    const slots = new Map<bigint, number>();
    const actors: PersistenceActor[] = [];
    let next = CONTAINER_HEADER_SIZE;
    infos.forEach((info, i) => {
        if (slots.has(info.uniqueId)) {
            throw new InvalidFormatError(`Actor ${info.uniqueId} is listed twice`, { offset: indexOffset + 4 + i * 16 });
        }
        expectOffset(info.offset, next, `Actor ${info.uniqueId}`);
        r.seek(info.offset);
        const actorBytes = r.readBytes(info.size);
        next = info.offset + info.size;
        slots.set(info.uniqueId, i);
        actors.push(readActor(actorBytes, info.uniqueId, nested, [...path, `actors[${i}]`]));
    });
    expectOffset(indexOffset, next, 'Actor index');

    r.seek(dynamicOffset);
    const dynamicCount = r.readUint32();
    let previous = -1;
    for (let i = 0; i < dynamicCount; i++) {
        const at = r.position;
        const { uniqueId, dynamic } = readDynamicActor(r);
        const slot = slots.get(uniqueId);
        if (slot === undefined) {
            throw new InvalidFormatError(`Dynamic actor ${uniqueId} has no entry in the actor index`, { offset: at });
        }
        if (slot <= previous) {
            throw new InvalidFormatError(`Dynamic actor ${uniqueId} is out of actor order`, { offset: at });
        }
        previous = slot;
        actors[slot].dynamic = dynamic;
    }
    expectOffset(r.position, r.length, 'End of the dynamic actor list');

    return { version, actors, destroyed };
}

function writeContainer(container: PersistenceContainer, nested: TypeRegistry, path: readonly string[]): Uint8Array {
    const w = new ByteWriter();
    w.writeUint32(container.version);
    w.writeZeros(8);

    const seen = new Set<bigint>();
    const infos: ActorInfo[] = container.actors.map((actor, i) => {
        if (seen.has(actor.uniqueId)) {
            throw new TypeMismatchError(`Actor ${actor.uniqueId} appears twice`, { path: formatPath([...path, `actors[${i}]`]) });
        }
        seen.add(actor.uniqueId);
        const actorWriter = new ByteWriter();
        actorWriter.writeUint32(actor.transform ? 1 : 0);
        if (actor.transform) writeTransform(actorWriter, actor.transform);
        writeArchiveContent(actorWriter, actor.archive, { registry: nested, path: [...path, `actors[${i}]`] });
        const offset = w.length;
        w.writeBytes(actorWriter.toUint8Array());
        return { uniqueId: actor.uniqueId, offset, size: w.length - offset };
    });

    w.setUint32At(4, w.length);
    w.writeUint32(infos.length);
    for (const info of infos) {
        w.writeBigUint64(info.uniqueId);
        w.writeUint32(info.offset);
        w.writeUint32(info.size);
    }
    w.writeUint32(container.destroyed.length);
    for (const id of container.destroyed) w.writeBigUint64(id);

    w.setUint32At(8, w.length);
    const dynamic = container.actors.flatMap(({ uniqueId, dynamic: d }) => (d ? [{ uniqueId, ...d }] : []));
    w.writeUint32(dynamic.length);
    for (const { uniqueId, transform, classPath } of dynamic) {
        w.writeBigUint64(uniqueId);
        writeTransform(w, transform);
        w.writeFString(classPath.path);
        w.writeFString(classPath.name);
    }
    return w.toUint8Array();
}

// --- struct codec ---

type PersistenceData = Extract<StructData, { type: 'blob' | 'persistenceBlob' | 'persistenceContainer' }>;

function blobBytes(data: PersistenceData, nested: TypeRegistry, path: readonly string[]): Uint8Array {
    switch (data.type) {
        case 'blob': return data.value;
        case 'persistenceBlob': return writeProfileBlob(data, nested, path);
        case 'persistenceContainer': return writeContainer(data, nested, path);
    }
}

/**
 * Codec for `PersistenceBlob` in a save of the given layout. Decoding follows the layout;
 * encoding takes any persistence form, so an opaque blob can still be written back as is.
 */
function persistenceStruct(layout: BlobLayout | undefined, nested: TypeRegistry): StructCodec {
    return {
        kind: layout === 'profile' ? 'persistenceBlob' : layout === 'world' ? 'persistenceContainer' : 'blob',
        read: (ctx) => {
            const r = ctx.reader;
            const bytes = r.readBytes(r.readUint32());
            const blobOffset = r.position - bytes.length;
            try {
                if (layout === 'profile') return readProfileBlob(bytes, nested, ctx.path);
                if (layout === 'world') return { type: 'persistenceContainer', ...readContainer(bytes, nested, ctx.path) };
            } catch (err) {
                // Offsets inside the blob are relative to its first byte.
                if (err instanceof SavCodecError) err.annotate({ blobOffset });
                throw err;
            }
            return { type: 'blob', value: bytes };
        },
        write: (ctx, data) => {
            const bytes = blobBytes(expectKind(ctx, data, ['blob', 'persistenceBlob', 'persistenceContainer']), nested, ctx.path);
            ctx.writer.writeUint32(bytes.length);
            ctx.writer.writeBytes(bytes);
        },
    };
}

/**
 * The registry a top-level archive is coded with: `base` with `PersistenceBlob` decoded for
 * the save's class path. Archives nested in the blob are coded with `base` itself.
 */
export function persistenceRegistry(base: TypeRegistry, classPath: string): TypeRegistry {
    return base.extend({ structs: { [PERSISTENCE_BLOB]: persistenceStruct(blobLayout(classPath), base) } });
}
