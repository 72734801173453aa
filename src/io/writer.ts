import { InvalidFormatError, TypeMismatchError } from '../errors.js';
import { isGuid, type Guid } from './reader.js';

const INITIAL_CAPACITY = 1024;

/**
 * Growable little-endian byte buffer.
 *
 * Placeholders (sizes, offsets) are written as zeros first and patched with the `set*At`
 * helpers once the payload that follows them is known.
 */
export class ByteWriter {
    private bytes = new Uint8Array(INITIAL_CAPACITY);
    private view = new DataView(this.bytes.buffer);
    private used = 0;

    get length(): number {
        return this.used;
    }

    toUint8Array(): Uint8Array {
        return this.bytes.slice(0, this.used);
    }

    /** Makes room for `extra` more bytes, at least doubling the capacity when it grows. */
    private reserve(extra: number): void {
        const required = this.used + extra;
        if (required <= this.bytes.length) return;
        const grown = new Uint8Array(Math.max(required, this.bytes.length * 2));
        grown.set(this.bytes.subarray(0, this.used));
        this.bytes = grown;
        this.view = new DataView(grown.buffer);
    }

    private patchRange(offset: number, size: number): void {
        if (!Number.isInteger(offset) || offset < 0 || offset + size > this.used) {
            throw new InvalidFormatError(`Cannot patch ${size} bytes at offset ${offset} of a ${this.used}-byte buffer`, {
                offset,
            });
        }
    }

    /** New bytes of a grown buffer start zeroed, so padding only moves the end. */
    writeZeros(n: number): void {
        this.reserve(n);
        this.used += n;
    }

    writeUint8(v: number): void {
        this.reserve(1);
        this.view.setUint8(this.used, v);
        this.used += 1;
    }

    writeInt8(v: number): void {
        this.reserve(1);
        this.view.setInt8(this.used, v);
        this.used += 1;
    }

    writeBool(v: boolean): void {
        this.writeUint8(v ? 1 : 0);
    }

    writeUint16(v: number): void {
        this.reserve(2);
        this.view.setUint16(this.used, v, true);
        this.used += 2;
    }

    writeInt16(v: number): void {
        this.reserve(2);
        this.view.setInt16(this.used, v, true);
        this.used += 2;
    }

    writeInt32(v: number): void {
        this.reserve(4);
        this.view.setInt32(this.used, v, true);
        this.used += 4;
    }

    writeUint32(v: number): void {
        this.reserve(4);
        this.view.setUint32(this.used, v >>> 0, true);
        this.used += 4;
    }

    writeFloat32(v: number): void {
        this.reserve(4);
        this.view.setFloat32(this.used, v, true);
        this.used += 4;
    }

    writeFloat64(v: number): void {
        this.reserve(8);
        this.view.setFloat64(this.used, v, true);
        this.used += 8;
    }

    writeBigInt64(v: bigint): void {
        this.reserve(8);
        this.view.setBigInt64(this.used, v, true);
        this.used += 8;
    }

    writeBigUint64(v: bigint): void {
        this.reserve(8);
        this.view.setBigUint64(this.used, v, true);
        this.used += 8;
    }

    setUint32At(offset: number, v: number): void {
        this.patchRange(offset, 4);
        this.view.setUint32(offset, v >>> 0, true);
    }

    setBigUint64At(offset: number, v: bigint): void {
        this.patchRange(offset, 8);
        this.view.setBigUint64(offset, v, true);
    }

    writeBytes(bytes: Uint8Array): void {
        this.reserve(bytes.length);
        this.bytes.set(bytes, this.used);
        this.used += bytes.length;
    }

    writeGuid(guid: Guid): void {
        if (!isGuid(guid)) throw new TypeMismatchError(`"${guid}" is not a 32-digit uppercase hex Guid`);
        for (let i = 0; i < 4; i++) this.writeUint32(Number.parseInt(guid.slice(i * 8, i * 8 + 8), 16));
    }

    /** Single-byte form when every code unit is ASCII, UTF-16LE otherwise. */
    writeFString(s: string): void {
        if (s.length === 0) {
            this.writeInt32(0);
            return;
        }
        let narrow = true;
        for (let i = 0; i < s.length; i++) {
            if (s.charCodeAt(i) > 0x7F) {
                narrow = false;
                break;
            }
        }
        if (narrow) {
            this.writeInt32(s.length + 1);
            this.reserve(s.length + 1);
            for (let i = 0; i < s.length; i++) this.bytes[this.used + i] = s.charCodeAt(i);
            this.bytes[this.used + s.length] = 0;
            this.used += s.length + 1;
            return;
        }
        this.writeInt32(-(s.length + 1));
        for (let i = 0; i < s.length; i++) this.writeUint16(s.charCodeAt(i));
        this.writeUint16(0);
    }
}
