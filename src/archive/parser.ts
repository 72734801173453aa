/**
 * Archive parser: reads the object graph out of a decompressed archive image.
 *
 * The image starts with the 12-byte `[crc32][contentSize][saveVersion]` prefix, then the build
 * number, package version and class path, then the archive content (`archive/content.ts`).
 * The class path selects how `PersistenceBlob` structs are decoded.
 */

import { ByteReader } from '../io/reader.js';
import { silentLogger, type Logger } from '../logger.js';
import { defaultRegistry, type TypeRegistry } from '../properties/registry.js';
import { IMAGE_HEADER_SIZE } from '../sav/container.js';
import { readArchiveContent } from './content.js';
import type { ArchiveHeader, SaveArchive } from './model.js';
import { persistenceRegistry } from './persistence.js';

export interface ArchiveReadOptions {
    registry?: TypeRegistry;
    logger?: Logger;
}

export function parseArchive(image: Uint8Array, opts: ArchiveReadOptions = {}): SaveArchive {
    const log = opts.logger ?? silentLogger;
    const r = new ByteReader(image);
    r.seek(IMAGE_HEADER_SIZE - 4);

    const saveVersion = r.readUint32();
    const buildNumber = r.readUint32();
    const packageVersion = { ue4: r.readUint32(), ue5: r.readUint32() };
    const classPath = { path: r.readFString(), name: r.readFString() };
    const registry = persistenceRegistry(opts.registry ?? defaultRegistry, classPath.path);
    const { objects, ...content } = readArchiveContent(r, { registry, classPath: classPath.path });

    const header: ArchiveHeader = { saveVersion, buildNumber, packageVersion, classPath, ...content };
    log.debug('archive decoded', {
        objects: objects.length,
        names: content.names.length,
        buildNumber,
        archiveVersion: content.archiveVersion,
    });
    return { header, objects };
}
