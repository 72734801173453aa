import type { FName, Property } from '../properties/model.js';
import type { CompressionSettings } from '../sav/container.js';

export interface PackageVersion {
    ue4: number;
    ue5: number;
}

/** Top-level asset path of the save-game class. */
export interface ClassPath {
    path: string;
    name: string;
}

/** Object data, object index and name table: the part shared by top-level and nested archives. */
export interface ArchiveBody {
    archiveVersion: number;
    /** Decoded name table; encoding starts from it so indices come out unchanged. */
    names: string[];
    /** Object ids in the order their data is stored, when that differs from index order. */
    dataOrder?: number[];
    objects: SaveObject[];
}

export interface Vector3 {
    x: number;
    y: number;
    z: number;
}

export interface Quaternion {
    w: number;
    x: number;
    y: number;
    z: number;
}

export interface Transform {
    rotation: Quaternion;
    position: Vector3;
    scale: Vector3;
}

/** Spawn record of an actor created at run time rather than placed in the map. */
export interface DynamicActor {
    transform: Transform;
    classPath: ClassPath;
}

export interface PersistenceActor {
    uniqueId: bigint;
    transform?: Transform;
    archive: ArchiveBody;
    dynamic?: DynamicActor;
}

/**
 * World-save persistence data: one archive per actor, keyed by unique id, plus the ids of
 * placed actors that were destroyed.
 */
export interface PersistenceContainer {
    version: number;
    /** In storage order. */
    actors: PersistenceActor[];
    destroyed: bigint[];
}

export interface ArchiveHeader {
    /** Save-game file version from the file header. */
    saveVersion: number;
    buildNumber: number;
    packageVersion: PackageVersion;
    classPath: ClassPath;
    archiveVersion: number;
    /** Decoded name table; encoding starts from it so indices come out unchanged. */
    names: string[];
    /** Object ids in the order their data is stored, when that differs from index order. */
    dataOrder?: number[];
}

export interface SaveHeader extends ArchiveHeader {
    compression: CompressionSettings;
}

export interface ObjectData {
    properties: Property[];
    /** Bytes after the property terminator, up to the declared length (normally 4 zero bytes). */
    trailer: Uint8Array;
}

/** Present only for objects that were not loaded from a package. */
export interface LoadedData {
    name: FName;
    outerId: number;
}

export type VariableValue =
    | { type: 'none' }
    | { type: 'bool'; value: boolean }
    | { type: 'int'; value: number }
    | { type: 'float'; value: number }
    | { type: 'name'; value: FName };

export interface Variable {
    name: FName;
    value: VariableValue;
}

export type Component =
    | { key: string; type: 'variables'; name: FName; variables: Variable[] }
    | { key: string; type: 'properties'; properties: Property[] };

export interface SaveObject {
    wasLoaded: boolean;
    /** Object path; for a loaded object 0 this is the class path and is not stored separately. */
    path: string;
    loadedData?: LoadedData;
    /** Absent when the object's data length is 0. */
    data?: ObjectData;
    /** Present for actors. */
    components?: Component[];
}

export interface SaveArchive {
    header: ArchiveHeader;
    objects: SaveObject[];
}

export interface SaveDocument {
    header: SaveHeader;
    objects: SaveObject[];
}

/** Component keys whose payload is a variable list rather than a property bag. */
export const VARIABLE_COMPONENT_KEYS: ReadonlySet<string> = new Set([
    'GlobalVariables',
    'Variables',
    'Variable',
    'PersistenceKeys',
    'PersistanceKeys1',
    'PersistenceKeys1',
]);

/** The usual object trailer: four zero bytes. */
export function isDefaultTrailer(bytes: Uint8Array): boolean {
    return bytes.length === 4 && bytes.every((b) => b === 0);
}
