/**
 * Type registry: the static tables the property codec dispatches through.
 *
 * Property codecs are keyed by wire tag (`IntProperty`, `StructProperty`, ...); struct codecs
 * by struct type name (`Guid`, `Vector`, ...). Struct types without an entry decode as nested
 * property bags. A registry never changes after construction; `extend()` returns a new one.
 */

import { UnknownPropertyTypeError } from '../errors.js';
import { PROPERTY_CODECS } from './codecs.js';
import { formatPath, type CodecContext, type PropertyTypeCodec, type StructCodec } from './context.js';
import { PROPERTY_BAG_STRUCT, STRUCT_CODECS } from './structs.js';

export interface RegistryExtension {
    properties?: Readonly<Record<string, PropertyTypeCodec>>;
    structs?: Readonly<Record<string, StructCodec>>;
}

export class TypeRegistry {
    private constructor(
        private readonly properties: ReadonlyMap<string, PropertyTypeCodec>,
        private readonly structs: ReadonlyMap<string, StructCodec>,
    ) {
        Object.freeze(this);
    }

    static create(ext: RegistryExtension): TypeRegistry {
        return new TypeRegistry(new Map(Object.entries(ext.properties ?? {})), new Map(Object.entries(ext.structs ?? {})));
    }

    /** A new registry with `ext` layered over this one's entries. */
    extend(ext: RegistryExtension): TypeRegistry {
        return new TypeRegistry(
            new Map([...this.properties, ...Object.entries(ext.properties ?? {})]),
            new Map([...this.structs, ...Object.entries(ext.structs ?? {})]),
        );
    }

    hasProperty(tag: string): boolean {
        return this.properties.has(tag);
    }

    property(tag: string, ctx?: CodecContext): PropertyTypeCodec {
        const codec = this.properties.get(tag);
        if (!codec) throw new UnknownPropertyTypeError(tag, ctx && { path: formatPath(ctx.path) });
        return codec;
    }

    /** Struct codec for a struct type name; unknown names are property bags. */
    struct(structType: string): StructCodec {
        return this.structs.get(structType) ?? PROPERTY_BAG_STRUCT;
    }
}

export const defaultRegistry: TypeRegistry = TypeRegistry.create({
    properties: PROPERTY_CODECS,
    structs: STRUCT_CODECS,
});
