import { ByteWriter } from '../src/io/writer.js';

/** Runs `fn` against a fresh writer and returns the bytes it wrote. */
export function build(fn: (w: ByteWriter) => void): Uint8Array {
    const w = new ByteWriter();
    fn(w);
    return w.toUint8Array();
}

export const ascii = (s: string): Uint8Array => Uint8Array.from(s, (c) => c.charCodeAt(0));

export interface TagSpec {
    name: string;
    type: string;
    /** Written after the index, before the property-Guid flag. */
    header?: (w: ByteWriter) => void;
    payload: Uint8Array;
    index?: number;
    /** Overrides the declared size. */
    size?: number;
}

/** Writes one property with inline names. */
export function writeTag(w: ByteWriter, spec: TagSpec): void {
    w.writeFString(spec.name);
    w.writeFString(spec.type);
    w.writeUint32(spec.size ?? spec.payload.length);
    w.writeUint32(spec.index ?? 0);
    spec.header?.(w);
    w.writeUint8(0);
    w.writeBytes(spec.payload);
}

/** A property stream with inline names: the tags, then `None`. */
export function stream(...specs: TagSpec[]): Uint8Array {
    return build((w) => {
        for (const spec of specs) writeTag(w, spec);
        w.writeFString('None');
    });
}

export const levelTag: TagSpec = {
    name: 'Level',
    type: 'IntProperty',
    payload: build((w) => w.writeInt32(7)),
};

export function structHeader(structType: string): (w: ByteWriter) => void {
    return (w) => {
        w.writeFString(structType);
        w.writeZeros(16);
    };
}
