import { describe, expect, it } from 'vitest';

import type { ArchiveBody, PersistenceActor, SaveDocument } from '../src/archive/model.js';
import { persistenceRegistry, PROFILE_CLASS_PATH, WORLD_CLASS_PATH } from '../src/archive/persistence.js';
import { decode, decodeProperties, encode, encodeProperties } from '../src/codec.js';
import { InvalidFormatError, LengthMismatchError, SavCodecError, TypeMismatchError } from '../src/errors.js';
import { ZERO_GUID } from '../src/io/reader.js';
import type { ByteWriter } from '../src/io/writer.js';
import { parseDocument, propertiesFromJson, propertiesToJson, stringifyDocument } from '../src/json/bridge.js';
import { fname, type Property, type StructData } from '../src/properties/model.js';
import { defaultRegistry } from '../src/properties/registry.js';
import { DEFAULT_BLOCK_SIZE } from '../src/sav/container.js';
import { build, stream, structHeader } from './helpers.js';

const world = persistenceRegistry(defaultRegistry, WORLD_CLASS_PATH);
const profile = persistenceRegistry(defaultRegistry, PROFILE_CLASS_PATH);

const level: Property = { name: fname('Level'), type: 'IntProperty', index: 0, value: { type: 'int32', value: 7 } };

/** Archive content with one loaded object holding `Level = 7`; offsets count from the start of `w`. */
function writeContent(w: ByteWriter, path: string): void {
    const nameTableAt = w.length;
    w.writeBigUint64(0n);
    w.writeUint32(6);
    const indexAt = w.length;
    w.writeBigUint64(0n);

    w.writeUint32(0);
    w.writeUint32(23);
    w.writeUint16(1);
    w.writeUint16(2);
    w.writeUint32(4);
    w.writeUint32(0);
    w.writeUint8(0);
    w.writeInt32(7);
    w.writeUint16(0);
    w.writeZeros(4);
    w.writeUint8(0);

    w.setBigUint64At(indexAt, BigInt(w.length));
    w.writeUint32(1);
    w.writeUint8(1);
    w.writeFString(path);

    w.setBigUint64At(nameTableAt, BigInt(w.length));
    w.writeUint32(3);
    for (const name of ['None', 'Level', 'IntProperty']) w.writeFString(name);
}

function content(path: string): ArchiveBody {
    return {
        archiveVersion: 6,
        names: ['None', 'Level', 'IntProperty'],
        objects: [{ wasLoaded: true, path, data: { properties: [level], trailer: new Uint8Array(4) } }],
    };
}

const doorTransform = { rotation: { w: 1, x: 0, y: 0, z: 0 }, position: { x: 10, y: 20, z: 30 }, scale: { x: 1, y: 1, z: 1 } };
const spawnTransform = {
    rotation: { w: 0.5, x: 0.5, y: 0.5, z: 0.5 },
    position: { x: -1, y: -2, z: -3 },
    scale: { x: 2, y: 2, z: 2 },
};

interface ContainerSpec {
    /** Offset recorded for the first actor; it is stored at 12. */
    firstOffset?: number;
    dynamicId?: bigint;
}

/**
 * version 3; actor 100 (placed, with a transform) and actor 200 (spawned, dynamic entry);
 * actor 300 destroyed
 */
function worldContainer(spec: ContainerSpec = {}): Uint8Array {
    const door = build((w) => {
        w.writeUint32(1);
        for (const v of [1, 0, 0, 0, 10, 20, 30, 1, 1, 1]) w.writeFloat64(v);
        writeContent(w, '/Game/Map.Door');
    });
    const spawned = build((w) => {
        w.writeUint32(0);
        writeContent(w, '/Game/Map.Spawned');
    });
    return build((w) => {
        w.writeUint32(3);
        w.writeZeros(8);
        w.writeBytes(door);
        w.writeBytes(spawned);

        w.setUint32At(4, w.length);
        w.writeUint32(2);
        w.writeBigUint64(100n);
        w.writeUint32(spec.firstOffset ?? 12);
        w.writeUint32(door.length);
        w.writeBigUint64(200n);
        w.writeUint32(12 + door.length);
        w.writeUint32(spawned.length);
        w.writeUint32(1);
        w.writeBigUint64(300n);

        w.setUint32At(8, w.length);
        w.writeUint32(1);
        w.writeBigUint64(spec.dynamicId ?? 200n);
        for (const v of [0.5, 0.5, 0.5, 0.5, -1, -2, -3, 2, 2, 2]) w.writeFloat64(v);
        w.writeFString('/Game/Spawned.Spawned_C');
        w.writeFString('Spawned_C');
    });
}

const profileBlob = build((w) => {
    w.writeUint32(522);
    w.writeUint32(1009);
    writeContent(w, '/Game/Profile.Inner');
});

/** A `Data` property holding `blob` as its PersistenceBlob payload. */
function blobStream(blob: Uint8Array): Uint8Array {
    return stream({
        name: 'Data',
        type: 'StructProperty',
        header: structHeader('PersistenceBlob'),
        payload: build((w) => {
            w.writeUint32(blob.length);
            w.writeBytes(blob);
        }),
    });
}

function structData(properties: Property[]): StructData {
    const [p] = properties;
    if (p.value.type !== 'struct') throw new Error('expected a struct');
    return p.value.data;
}

function errorOf(fn: () => unknown): SavCodecError {
    try {
        fn();
    } catch (err) {
        if (err instanceof SavCodecError) return err;
        throw err;
    }
    throw new Error('expected a codec error');
}

const worldActors: PersistenceActor[] = [
    { uniqueId: 100n, transform: doorTransform, archive: content('/Game/Map.Door') },
    {
        uniqueId: 200n,
        archive: content('/Game/Map.Spawned'),
        dynamic: { transform: spawnTransform, classPath: { path: '/Game/Spawned.Spawned_C', name: 'Spawned_C' } },
    },
];

describe('world persistence containers', () => {
    it('decodes actors, their archives, dynamic entries and destroyed ids', () => {
        const properties = decodeProperties(blobStream(worldContainer()), { registry: world });
        expect(properties[0].value).toEqual({
            type: 'struct',
            structType: { value: 'PersistenceBlob' },
            structGuid: ZERO_GUID,
            data: { type: 'persistenceContainer', version: 3, actors: worldActors, destroyed: [300n] },
        });
    });

    it('re-encodes the same bytes', () => {
        const bytes = blobStream(worldContainer());
        expect(encodeProperties(decodeProperties(bytes, { registry: world }), { registry: world })).toEqual(bytes);
    });

    it('rejects an actor that is not where the layout puts it', () => {
        const err = errorOf(() => decodeProperties(blobStream(worldContainer({ firstOffset: 13 })), { registry: world }));
        expect(err).toBeInstanceOf(LengthMismatchError);
        expect(err.message).toBe('Actor 100 is at 13, expected 12');
        // 73-byte tag, then the u32 blob length
        expect(err.context.blobOffset).toBe(77);
    });

    it('rejects a dynamic entry for an actor it does not list', () => {
        const err = errorOf(() => decodeProperties(blobStream(worldContainer({ dynamicId: 999n })), { registry: world }));
        expect(err).toBeInstanceOf(InvalidFormatError);
        expect(err.message).toBe('Dynamic actor 999 has no entry in the actor index');
    });

    it('rejects two actors with one id', () => {
        const data: StructData = { type: 'persistenceContainer', version: 3, actors: [worldActors[0], worldActors[0]], destroyed: [] };
        const property: Property = {
            name: fname('Data'),
            type: 'StructProperty',
            index: 0,
            value: { type: 'struct', structType: fname('PersistenceBlob'), structGuid: ZERO_GUID, data },
        };
        const err = errorOf(() => encodeProperties([property], { registry: world }));
        expect(err).toBeInstanceOf(TypeMismatchError);
        expect(err.message).toBe('Actor 100 appears twice');
        expect(err.context.path).toBe('Data.actors[1]');
    });

    it('carries containers through JSON', () => {
        const bytes = blobStream(worldContainer());
        const json = propertiesToJson(decodeProperties(bytes, { registry: world }));
        expect(json.Data).toEqual({
            type: 'struct',
            structType: 'PersistenceBlob',
            data: {
                type: 'persistenceContainer',
                version: 3,
                actors: [
                    {
                        uniqueId: '100',
                        transform: doorTransform,
                        archive: {
                            archiveVersion: 6,
                            names: ['None', 'Level', 'IntProperty'],
                            objects: [{ wasLoaded: true, path: '/Game/Map.Door', properties: { Level: { type: 'int32', value: 7 } } }],
                        },
                    },
                    {
                        uniqueId: '200',
                        archive: {
                            archiveVersion: 6,
                            names: ['None', 'Level', 'IntProperty'],
                            objects: [{ wasLoaded: true, path: '/Game/Map.Spawned', properties: { Level: { type: 'int32', value: 7 } } }],
                        },
                        dynamic: { transform: spawnTransform, classPath: { path: '/Game/Spawned.Spawned_C', name: 'Spawned_C' } },
                    },
                ],
                destroyed: ['300'],
            },
        });
        const back = propertiesFromJson(JSON.parse(JSON.stringify(json)));
        expect(encodeProperties(back, { registry: world })).toEqual(bytes);
    });
});

describe('profile persistence blobs', () => {
    it('decodes the nested archive with its package version', () => {
        const properties = decodeProperties(blobStream(profileBlob), { registry: profile });
        expect(structData(properties)).toEqual({
            type: 'persistenceBlob',
            packageVersion: { ue4: 522, ue5: 1009 },
            archive: content('/Game/Profile.Inner'),
        });
        expect(encodeProperties(properties, { registry: profile })).toEqual(blobStream(profileBlob));
    });

    it('keeps the blob opaque without a class path that names a layout', () => {
        const other = persistenceRegistry(defaultRegistry, '/Game/Other.Other_C');
        for (const registry of [defaultRegistry, other]) {
            const properties = decodeProperties(blobStream(profileBlob), { registry });
            expect(structData(properties)).toEqual({ type: 'blob', value: profileBlob });
        }
    });

    it('round-trips a profile save through bytes and JSON', () => {
        const doc: SaveDocument = {
            header: {
                saveVersion: 9,
                buildNumber: 400000,
                packageVersion: { ue4: 522, ue5: 1009 },
                classPath: { path: PROFILE_CLASS_PATH, name: 'BP_RemnantSaveGameProfile_C' },
                archiveVersion: 6,
                compression: { compressor: 'zlib', blockSize: DEFAULT_BLOCK_SIZE, level: 6 },
                names: ['None'],
            },
            objects: [
                {
                    wasLoaded: true,
                    path: PROFILE_CLASS_PATH,
                    data: {
                        properties: [
                            {
                                name: fname('Data'),
                                type: 'StructProperty',
                                index: 0,
                                value: {
                                    type: 'struct',
                                    structType: fname('PersistenceBlob'),
                                    structGuid: ZERO_GUID,
                                    data: {
                                        type: 'persistenceBlob',
                                        packageVersion: { ue4: 522, ue5: 1009 },
                                        archive: content('/Game/Profile.Inner'),
                                    },
                                },
                            },
                        ],
                        trailer: new Uint8Array(4),
                    },
                },
            ],
        };
        const bytes = encode(doc);
        const decoded = decode(bytes);
        expect(decoded.objects).toEqual(doc.objects);
        expect(encode(parseDocument(stringifyDocument(decoded)))).toEqual(bytes);
    });
});
