/**
 * Archive content: object data, the object index and the name table.
 *
 * Notes:
 * - the content opens with `[u64 nameTableOffset][u32 archiveVersion][u64 objectIndexOffset]`;
 *   offsets are absolute within the buffer holding the archive
 * - the name table and object index are read first, since object data refers to both
 * - every region must be consumed exactly; leftover bytes are a `LengthMismatchError`
 * - top-level archives and the archives nested in persistence structs share this layout
 */

import { InvalidFormatError, LengthMismatchError, TypeMismatchError } from '../errors.js';
import type { ByteReader } from '../io/reader.js';
import type { ByteWriter } from '../io/writer.js';
import { withSegment, type ReadContext, type WriteContext } from '../properties/context.js';
import { NameTable } from '../properties/names.js';
import { createReadContext, readProperties } from '../properties/parser.js';
import type { TypeRegistry } from '../properties/registry.js';
import { createWriteContext, writeProperties } from '../properties/serializer.js';
import { readComponents, writeComponents } from './components.js';
import type { ArchiveBody, ObjectData, SaveObject } from './model.js';

export interface ContentOptions {
    registry: TypeRegistry;
    /**
     * Class path of an archive that has one. A loaded object 0 then takes it as its path
     * instead of storing one.
     */
    classPath?: string;
    /** Property path of the struct holding a nested archive, prefixed to error paths. */
    path?: readonly string[];
}

function expectAt(r: ByteReader, expected: number, region: string): void {
    if (r.position !== expected) {
        throw new LengthMismatchError(
            `${region} ends at ${r.position}, expected ${expected}`,
            expected,
            r.position,
            { offset: r.position },
        );
    }
}

function readIndexEntry(ctx: ReadContext, id: number, classPath: string | undefined): SaveObject {
    const r = ctx.reader;
    const wasLoaded = r.readBool();
    const path = wasLoaded && id === 0 && classPath !== undefined ? classPath : r.readFString();
    if (wasLoaded) return { wasLoaded, path };
    const name = ctx.names.readName(r);
    const outerId = r.readUint32();
    return { wasLoaded, path, loadedData: { name, outerId } };
}

function readObjectData(ctx: ReadContext): ObjectData | undefined {
    const r = ctx.reader;
    const length = r.readUint32();
    if (length === 0) return undefined;
    const start = r.position;
    const properties = readProperties(ctx);
    const used = r.position - start;
    if (used > length) {
        throw new LengthMismatchError(`Object data declares ${length} bytes but ${used} were read`, length, used, {
            offset: start,
        });
    }
    return { properties, trailer: r.readBytes(length - used) };
}

/** Reads archive content starting at the reader's position; the name table must end the buffer. */
export function readArchiveContent(r: ByteReader, opts: ContentOptions): ArchiveBody {
    const nameTableOffset = r.readOffset64();
    const archiveVersion = r.readUint32();
    const objectIndexOffset = r.readOffset64();
    const dataStart = r.position;

    r.seek(nameTableOffset);
    const names = NameTable.read(r);
    expectAt(r, r.length, 'Name table');

    const ctx = createReadContext(r, { names, registry: opts.registry });
    ctx.path.push(...(opts.path ?? []));

    r.seek(objectIndexOffset);
    const count = r.readUint32();
    const objects: SaveObject[] = [];
    for (let id = 0; id < count; id++) {
        objects.push(withSegment(ctx, `objects[${id}]`, () => readIndexEntry(ctx, id, opts.classPath)));
    }
    expectAt(r, nameTableOffset, 'Object index');

    r.seek(dataStart);
    const order: number[] = [];
    const seen = new Uint8Array(count);
    for (let i = 0; i < count; i++) {
        const at = r.position;
        const id = r.readUint32();
        if (id >= count || seen[id]) {
            throw new InvalidFormatError(`Object data entry ${i} names ${id < count ? 'duplicate' : 'unknown'} object ${id}`, {
                offset: at,
            });
        }
        seen[id] = 1;
        order.push(id);
        const object = objects[id];
        withSegment(ctx, `objects[${id}]`, () => {
            const data = readObjectData(ctx);
            if (data) object.data = data;
            if (r.readBool()) object.components = readComponents(ctx);
        });
    }
    expectAt(r, objectIndexOffset, 'Object data');

    return {
        archiveVersion,
        names: [...names.names],
        ...(order.some((id, i) => id !== i) && { dataOrder: order }),
        objects,
    };
}

function storageOrder(dataOrder: readonly number[] | undefined, count: number): readonly number[] {
    const order = dataOrder ?? Array.from({ length: count }, (_, i) => i);
    const seen = new Set(order);
    if (order.length !== count || seen.size !== count || order.some((id) => !Number.isInteger(id) || id < 0 || id >= count)) {
        throw new TypeMismatchError(`dataOrder must list each of the ${count} object ids exactly once`);
    }
    return order;
}

function writeIndexEntry(ctx: WriteContext, object: SaveObject, id: number, classPath: string | undefined): void {
    const w = ctx.writer;
    w.writeBool(object.wasLoaded);
    if (object.wasLoaded && id === 0 && classPath !== undefined) {
        if (object.path !== classPath) {
            throw new TypeMismatchError(`A loaded object 0 takes its path from the class path "${classPath}"`);
        }
    } else {
        w.writeFString(object.path);
    }

    if (object.wasLoaded) {
        if (object.loadedData) throw new TypeMismatchError('A loaded object cannot carry loadedData');
        return;
    }
    if (!object.loadedData) throw new TypeMismatchError('An object that was not loaded needs loadedData');
    ctx.names.writeName(w, object.loadedData.name);
    w.writeUint32(object.loadedData.outerId);
}

function writeObjectData(ctx: WriteContext, object: SaveObject): void {
    const w = ctx.writer;
    const lengthAt = w.length;
    w.writeUint32(0);
    if (object.data) {
        const start = w.length;
        writeProperties(ctx, object.data.properties);
        w.writeBytes(object.data.trailer);
        w.setUint32At(lengthAt, w.length - start);
    }
    w.writeBool(object.components !== undefined);
    if (object.components) writeComponents(ctx, object.components);
}

/**
 * Writes archive content at the writer's end: placeholder offsets, object data in storage
 * order, the object index, then the name table (last, since writing names may extend it).
 * Returns the size of the name table written.
 */
export function writeArchiveContent(w: ByteWriter, body: ArchiveBody, opts: ContentOptions): number {
    const { objects } = body;
    const names = new NameTable(body.names);
    const ctx = createWriteContext(w, { names, registry: opts.registry });
    ctx.path.push(...(opts.path ?? []));

    const nameTableOffsetAt = w.length;
    w.writeBigUint64(0n);
    w.writeUint32(body.archiveVersion);
    const objectIndexOffsetAt = w.length;
    w.writeBigUint64(0n);

    for (const id of storageOrder(body.dataOrder, objects.length)) {
        w.writeUint32(id);
        withSegment(ctx, `objects[${id}]`, () => writeObjectData(ctx, objects[id]));
    }

    w.setBigUint64At(objectIndexOffsetAt, BigInt(w.length));
    w.writeUint32(objects.length);
    objects.forEach((object, id) =>
        withSegment(ctx, `objects[${id}]`, () => writeIndexEntry(ctx, object, id, opts.classPath)),
    );

    w.setBigUint64At(nameTableOffsetAt, BigInt(w.length));
    names.write(w);
    return names.size;
}
