import { InvalidFormatError, TruncatedInputError } from '../errors.js';

/** 32 uppercase hex digits, the four little-endian words of a Guid in order. */
export type Guid = string;

export const ZERO_GUID: Guid = '0'.repeat(32);

/**
 * Bounds-checked little-endian reader over an immutable byte buffer.
 *
 * Every read verifies the remaining length first and raises `TruncatedInputError` with the
 * offending offset, so a short buffer never surfaces as a `RangeError` from `DataView`.
 */
export class ByteReader {
    private view: DataView;
    private offset = 0;

    constructor(private data: Uint8Array) {
        this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    }

    get position(): number {
        return this.offset;
    }

    get length(): number {
        return this.data.length;
    }

    get remaining(): number {
        return this.data.length - this.offset;
    }

    seek(position: number): void {
        if (!Number.isInteger(position) || position < 0 || position > this.data.length) {
            throw new TruncatedInputError(`Seek to ${position} is outside a ${this.data.length}-byte buffer`, {
                offset: position,
                available: this.data.length,
            });
        }
        this.offset = position;
    }

    private need(n: number): void {
        if (this.offset + n > this.data.length) {
            throw new TruncatedInputError(`Unexpected end of input: needed ${n} bytes at offset ${this.offset}`, {
                offset: this.offset,
                needed: n,
                available: this.data.length - this.offset,
            });
        }
    }

    readUint8(): number {
        this.need(1);
        return this.data[this.offset++];
    }

    readInt8(): number {
        this.need(1);
        const v = this.view.getInt8(this.offset);
        this.offset += 1;
        return v;
    }

    /** A byte that must be 0 or 1; anything else would not survive a re-encode. */
    readBool(): boolean {
        const at = this.offset;
        const v = this.readUint8();
        if (v > 1) throw new InvalidFormatError(`Boolean byte ${v} is neither 0 nor 1`, { offset: at });
        return v === 1;
    }

    readBool32(): boolean {
        const at = this.offset;
        const v = this.readUint32();
        if (v > 1) throw new InvalidFormatError(`Boolean word ${v} is neither 0 nor 1`, { offset: at });
        return v === 1;
    }

    readUint16(): number {
        this.need(2);
        const v = this.view.getUint16(this.offset, true);
        this.offset += 2;
        return v;
    }

    readInt16(): number {
        this.need(2);
        const v = this.view.getInt16(this.offset, true);
        this.offset += 2;
        return v;
    }

    readUint32(): number {
        this.need(4);
        const v = this.view.getUint32(this.offset, true);
        this.offset += 4;
        return v;
    }

    readInt32(): number {
        this.need(4);
        const v = this.view.getInt32(this.offset, true);
        this.offset += 4;
        return v;
    }

    readUint64(): bigint {
        this.need(8);
        const v = this.view.getBigUint64(this.offset, true);
        this.offset += 8;
        return v;
    }

    readInt64(): bigint {
        this.need(8);
        const v = this.view.getBigInt64(this.offset, true);
        this.offset += 8;
        return v;
    }

    /** A u64 used as an offset or size; values beyond 2^53 cannot address a buffer. */
    readOffset64(): number {
        const at = this.offset;
        const v = this.readUint64();
        if (v > BigInt(Number.MAX_SAFE_INTEGER)) {
            throw new InvalidFormatError(`64-bit offset ${v} is out of range`, { offset: at });
        }
        return Number(v);
    }

    readFloat32(): number {
        this.need(4);
        const v = this.view.getFloat32(this.offset, true);
        this.offset += 4;
        return v;
    }

    readFloat64(): number {
        this.need(8);
        const v = this.view.getFloat64(this.offset, true);
        this.offset += 8;
        return v;
    }

    /** Returns a copy, so callers may keep it after the source buffer is reused. */
    readBytes(n: number): Uint8Array {
        this.need(n);
        const out = this.data.slice(this.offset, this.offset + n);
        this.offset += n;
        return out;
    }

    readGuid(): Guid {
        let out = '';
        for (let i = 0; i < 4; i++) out += this.readUint32().toString(16).toUpperCase().padStart(8, '0');
        return out;
    }

    /**
     * Length-prefixed engine string.
     *
     * Notes:
     * - length 0 is the empty string (no terminator follows)
     * - positive length: ASCII characters, terminator included
     * - negative length: UTF-16LE code units, terminator included, at least one above 0x7F
     * - any other spelling of a string (a bare terminator, a high byte in the narrow form, a
     *   wide form `writeFString` would have written narrow) is rejected
     */
    readFString(): string {
        const at = this.offset;
        const len = this.readInt32();
        if (len === 0) return '';
        if (len === 1 || len === -1) {
            throw new InvalidFormatError('Empty string is stored with a terminator instead of length 0', { offset: at });
        }

        if (len > 0) {
            this.need(len);
            const start = this.offset;
            if (this.data[start + len - 1] !== 0) {
                throw new InvalidFormatError('String is missing its NUL terminator', { offset: at });
            }
            let s = '';
            for (let i = 0; i < len - 1; i++) {
                const c = this.data[start + i];
                if (c > 0x7F) {
                    throw new InvalidFormatError(`Narrow string holds non-ASCII byte 0x${c.toString(16).toUpperCase()}`, {
                        offset: start + i,
                    });
                }
                s += String.fromCharCode(c);
            }
            this.offset += len;
            return s;
        }

        const units = -len;
        this.need(units * 2);
        if (this.view.getUint16(this.offset + (units - 1) * 2, true) !== 0) {
            throw new InvalidFormatError('Wide string is missing its NUL terminator', { offset: at });
        }
        let s = '';
        let wide = false;
        for (let i = 0; i < units - 1; i++) {
            const unit = this.view.getUint16(this.offset + i * 2, true);
            if (unit > 0x7F) wide = true;
            s += String.fromCharCode(unit);
        }
        if (!wide) throw new InvalidFormatError('Wide string holds only ASCII characters', { offset: at });
        this.offset += units * 2;
        return s;
    }
}

export function isGuid(value: string): boolean {
    return /^[0-9A-F]{32}$/.test(value);
}
