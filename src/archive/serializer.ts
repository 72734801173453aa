/**
 * Archive serializer, the inverse of `archive/parser.ts`.
 *
 * Layout written: image prefix, class header, then the archive content (`archive/content.ts`).
 */

import { ByteWriter } from '../io/writer.js';
import { silentLogger, type Logger } from '../logger.js';
import { defaultRegistry, type TypeRegistry } from '../properties/registry.js';
import { writeArchiveContent } from './content.js';
import type { SaveArchive } from './model.js';
import { persistenceRegistry } from './persistence.js';

export interface ArchiveWriteOptions {
    registry?: TypeRegistry;
    logger?: Logger;
}

export function serializeArchive(archive: SaveArchive, opts: ArchiveWriteOptions = {}): Uint8Array {
    const log = opts.logger ?? silentLogger;
    const { header, objects } = archive;
    const w = new ByteWriter();

    // crc32 and contentSize belong to the container.
    w.writeZeros(8);
    w.writeUint32(header.saveVersion);
    w.writeUint32(header.buildNumber);
    w.writeUint32(header.packageVersion.ue4);
    w.writeUint32(header.packageVersion.ue5);
    w.writeFString(header.classPath.path);
    w.writeFString(header.classPath.name);

    const registry = persistenceRegistry(opts.registry ?? defaultRegistry, header.classPath.path);
    const names = writeArchiveContent(
        w,
        { archiveVersion: header.archiveVersion, names: header.names, dataOrder: header.dataOrder, objects },
        { registry, classPath: header.classPath.path },
    );

    log.debug('archive encoded', { objects: objects.length, names, bytes: w.length });
    return w.toUint8Array();
}
