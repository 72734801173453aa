import { describe, expect, it } from 'vitest';

import { InvalidFormatError, TruncatedInputError, TypeMismatchError } from '../src/errors.js';
import { crc32 } from '../src/io/crc32.js';
import { ByteReader, ZERO_GUID } from '../src/io/reader.js';
import { ByteWriter } from '../src/io/writer.js';
import { ascii, build } from './helpers.js';

describe('ByteReader', () => {
    it('reads little-endian integers', () => {
        const r = new ByteReader(Uint8Array.of(0x01, 0x02, 0x03, 0x04, 0xFE, 0xFF, 0xFF, 0xFF, 0xFF));
        expect(r.readUint32()).toBe(0x04030201);
        expect(r.readInt32()).toBe(-2);
        expect(r.readUint8()).toBe(0xFF);
        expect(r.remaining).toBe(0);
    });

    it('reads 64-bit values as bigint', () => {
        const bytes = build((w) => {
            w.writeBigInt64(-5n);
            w.writeBigUint64(0xFFFFFFFFFFFFFFFFn);
        });
        const r = new ByteReader(bytes);
        expect(r.readInt64()).toBe(-5n);
        expect(r.readUint64()).toBe(0xFFFFFFFFFFFFFFFFn);
    });

    it('rejects offsets beyond the safe integer range', () => {
        const r = new ByteReader(build((w) => w.writeBigUint64(1n << 60n)));
        expect(() => r.readOffset64()).toThrow(InvalidFormatError);
    });

    it('raises TruncatedInputError with the offset when input runs out', () => {
        const r = new ByteReader(Uint8Array.of(1, 2, 3));
        r.readUint8();
        try {
            r.readUint32();
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(TruncatedInputError);
            if (!(err instanceof TruncatedInputError)) throw err;
            expect(err.context).toEqual({ offset: 1, needed: 4, available: 2 });
        }
    });

    it('reads narrow, wide and empty strings', () => {
        const bytes = build((w) => {
            w.writeInt32(4);
            w.writeBytes(ascii('abc\0'));
            w.writeInt32(-2);
            w.writeUint16(0xE9);
            w.writeUint16(0);
            w.writeInt32(0);
        });
        const r = new ByteReader(bytes);
        expect(r.readFString()).toBe('abc');
        expect(r.readFString()).toBe('é');
        expect(r.readFString()).toBe('');
        expect(r.remaining).toBe(0);
    });

    it('requires the string terminator', () => {
        const bytes = build((w) => {
            w.writeInt32(3);
            w.writeBytes(ascii('abc'));
        });
        expect(() => new ByteReader(bytes).readFString()).toThrow(InvalidFormatError);
    });

    it('rejects string spellings that would re-encode differently', () => {
        const latin1 = Uint8Array.of(3, 0, 0, 0, 0x41, 0xE9, 0);
        const bareTerminator = Uint8Array.of(1, 0, 0, 0, 0);
        const wideAscii = Uint8Array.of(0xFE, 0xFF, 0xFF, 0xFF, 0x41, 0, 0, 0);
        expect(() => new ByteReader(latin1).readFString()).toThrow('Narrow string holds non-ASCII byte 0xE9');
        expect(() => new ByteReader(bareTerminator).readFString()).toThrow(
            'Empty string is stored with a terminator instead of length 0',
        );
        expect(() => new ByteReader(wideAscii).readFString()).toThrow('Wide string holds only ASCII characters');
    });

    it('reads booleans as 0 or 1 only', () => {
        const r = new ByteReader(Uint8Array.of(0, 1, 2));
        expect(r.readBool()).toBe(false);
        expect(r.readBool()).toBe(true);
        try {
            r.readBool();
            expect.unreachable();
        } catch (err) {
            if (!(err instanceof InvalidFormatError)) throw err;
            expect(err.message).toBe('Boolean byte 2 is neither 0 nor 1');
            expect(err.context).toEqual({ offset: 2 });
        }
    });

    it('formats Guids as four uppercase hex words', () => {
        const bytes = build((w) => {
            w.writeUint32(0x0A0B0C0D);
            w.writeUint32(1);
            w.writeUint32(0xFFFFFFFF);
            w.writeUint32(0);
        });
        expect(new ByteReader(bytes).readGuid()).toBe('0A0B0C0D00000001FFFFFFFF00000000');
    });

    it('rejects seeks outside the buffer', () => {
        expect(() => new ByteReader(new Uint8Array(4)).seek(5)).toThrow(TruncatedInputError);
    });
});

describe('ByteWriter', () => {
    it('writes ASCII strings in the single-byte form', () => {
        expect(build((w) => w.writeFString('Hi'))).toEqual(Uint8Array.of(3, 0, 0, 0, 0x48, 0x69, 0));
    });

    it('writes other strings as UTF-16LE with a negative length', () => {
        expect(build((w) => w.writeFString('é'))).toEqual(Uint8Array.of(0xFE, 0xFF, 0xFF, 0xFF, 0xE9, 0, 0, 0));
    });

    it('writes the empty string as a bare zero length', () => {
        expect(build((w) => w.writeFString(''))).toEqual(Uint8Array.of(0, 0, 0, 0));
    });

    it('grows past its initial capacity', () => {
        const w = new ByteWriter();
        for (let i = 0; i < 3000; i++) w.writeUint8(i);
        const bytes = w.toUint8Array();
        expect(bytes.length).toBe(3000);
        expect(bytes[2999]).toBe(2999 & 0xFF);
    });

    it('patches placeholders in place', () => {
        const w = new ByteWriter();
        w.writeUint32(0);
        w.writeUint8(9);
        w.setUint32At(0, 0xDEADBEEF);
        expect(w.toUint8Array()).toEqual(Uint8Array.of(0xEF, 0xBE, 0xAD, 0xDE, 9));
    });

    it('refuses to patch outside what has been written', () => {
        const w = new ByteWriter();
        w.writeUint32(0);
        expect(() => w.setUint32At(2, 1)).toThrow(InvalidFormatError);
        try {
            w.setBigUint64At(0, 1n);
            expect.unreachable();
        } catch (err) {
            if (!(err instanceof InvalidFormatError)) throw err;
            expect(err.message).toBe('Cannot patch 8 bytes at offset 0 of a 4-byte buffer');
            expect(err.context).toEqual({ offset: 0 });
        }
    });

    it('round-trips Guids and rejects malformed ones', () => {
        const guid = '0123456789ABCDEF0123456789ABCDEF';
        expect(new ByteReader(build((w) => w.writeGuid(guid))).readGuid()).toBe(guid);
        expect(new ByteReader(build((w) => w.writeGuid(ZERO_GUID))).readGuid()).toBe(ZERO_GUID);
        expect(() => build((w) => w.writeGuid('0123'))).toThrow(TypeMismatchError);
    });
});

describe('crc32', () => {
    it('matches the standard check value', () => {
        expect(crc32(ascii('123456789'))).toBe(0xCBF43926);
    });

    it('is 0 for empty input', () => {
        expect(crc32(new Uint8Array(0))).toBe(0);
    });

    it('continues a checksum across slices', () => {
        const bytes = ascii('123456789');
        expect(crc32(bytes.subarray(4), crc32(bytes.subarray(0, 4)))).toBe(0xCBF43926);
    });
});
