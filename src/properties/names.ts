import { InvalidFormatError, TypeMismatchError } from '../errors.js';
import type { ByteReader } from '../io/reader.js';
import type { ByteWriter } from '../io/writer.js';
import { fname, fnameToString, type FName } from './model.js';

/** How FNames are stored in a property stream. */
export interface NameCodec {
    readName(r: ByteReader): FName;
    writeName(w: ByteWriter, name: FName): void;
}

/** Names written in place as strings. Numbered names have no inline form. */
export class InlineNames implements NameCodec {
    readName(r: ByteReader): FName {
        return fname(r.readFString());
    }

    writeName(w: ByteWriter, name: FName): void {
        if (name.number !== undefined) {
            throw new TypeMismatchError(`Name "${fnameToString(name)}" carries a number, which inline names cannot store`);
        }
        w.writeFString(name.value);
    }
}

const NUMBER_FLAG = 0x8000;
const MAX_ENTRIES = 0x7FFF;

/**
 * Names stored as indices into a string table.
 *
 * Notes:
 * - each reference is a u16 index; bit 15 set means a u32 instance number follows
 * - writing a string that is not in the table appends it, so a table seeded with the decoded
 *   entries reproduces the decoded indices
 */
export class NameTable implements NameCodec {
    private readonly entries: string[];
    private readonly lookup = new Map<string, number>();

    constructor(entries: readonly string[] = []) {
        this.entries = [];
        for (const e of entries) this.push(e);
    }

    get names(): readonly string[] {
        return this.entries;
    }

    get size(): number {
        return this.entries.length;
    }

    private push(value: string): number {
        if (this.entries.length >= MAX_ENTRIES) {
            throw new InvalidFormatError(`Name table is full (${MAX_ENTRIES} entries)`, { name: value });
        }
        const index = this.entries.length;
        this.entries.push(value);
        if (!this.lookup.has(value)) this.lookup.set(value, index);
        return index;
    }

    readName(r: ByteReader): FName {
        const at = r.position;
        const raw = r.readUint16();
        const index = raw & ~NUMBER_FLAG;
        const number = raw & NUMBER_FLAG ? r.readUint32() : undefined;
        if (index >= this.entries.length) {
            throw new InvalidFormatError(`Name index ${index} is outside a ${this.entries.length}-entry table`, {
                offset: at,
            });
        }
        return fname(this.entries[index], number);
    }

    writeName(w: ByteWriter, name: FName): void {
        const index = this.lookup.get(name.value) ?? this.push(name.value);
        if (name.number === undefined) {
            w.writeUint16(index);
            return;
        }
        w.writeUint16(index | NUMBER_FLAG);
        w.writeUint32(name.number);
    }

    static read(r: ByteReader): NameTable {
        const count = r.readUint32();
        if (count > MAX_ENTRIES) {
            throw new InvalidFormatError(`Name table declares ${count} entries`, { offset: r.position - 4 });
        }
        const entries: string[] = [];
        const seen = new Set<string>();
        for (let i = 0; i < count; i++) {
            const at = r.position;
            const entry = r.readFString();
            // A repeated entry has two indices, and writeName can only reproduce the first.
            if (seen.has(entry)) {
                throw new InvalidFormatError(`Name table lists "${entry}" twice`, { offset: at, index: i });
            }
            seen.add(entry);
            entries.push(entry);
        }
        return new NameTable(entries);
    }

    write(w: ByteWriter): void {
        w.writeUint32(this.entries.length);
        for (const e of this.entries) w.writeFString(e);
    }
}
