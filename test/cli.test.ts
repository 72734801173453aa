import { describe, expect, it } from 'vitest';

import type { SaveDocument } from '../src/archive/model.js';
import { parseCliArgs, packOutputPath, runCli, unpackOutputPath, USAGE, type CliIo } from '../src/cli/commands.js';
import { decode, encode } from '../src/codec.js';
import { silentLogger } from '../src/logger.js';
import { fname } from '../src/properties/model.js';
import { DEFAULT_BLOCK_SIZE } from '../src/sav/container.js';

interface MemoryIo extends CliIo {
    files: Map<string, Uint8Array | string>;
    out: string[];
    err: string[];
}

function memoryIo(files: Record<string, Uint8Array | string> = {}): MemoryIo {
    const io: MemoryIo = {
        cwd: '/work',
        files: new Map(Object.entries(files)),
        out: [],
        err: [],
        readFile: async (path) => {
            const data = io.files.get(path);
            if (data === undefined) throw new Error(`ENOENT: ${path}`);
            return typeof data === 'string' ? new TextEncoder().encode(data) : data;
        },
        writeFile: async (path, data) => {
            io.files.set(path, data);
        },
        listDir: async () => [...io.files.keys()].map((path) => path.slice('/work/'.length)),
        stdout: (line) => io.out.push(line),
        stderr: (line) => io.err.push(line),
    };
    return io;
}

function run(io: MemoryIo, args: string[], env: Record<string, string> = {}): Promise<number> {
    return runCli(args, { io, env, logger: silentLogger });
}

function sampleDocument(): SaveDocument {
    return {
        header: {
            saveVersion: 9,
            buildNumber: 400000,
            packageVersion: { ue4: 522, ue5: 1009 },
            classPath: { path: '/Game/Save.Save_C', name: 'Save_C' },
            archiveVersion: 6,
            compression: { compressor: 'zlib', blockSize: DEFAULT_BLOCK_SIZE, level: 6 },
            names: ['None'],
        },
        objects: [
            {
                wasLoaded: true,
                path: '/Game/Save.Save_C',
                data: {
                    properties: [{ name: fname('Level'), type: 'IntProperty', index: 0, value: { type: 'int32', value: 7 } }],
                    trailer: new Uint8Array(4),
                },
            },
        ],
    };
}

describe('output paths', () => {
    it('appends .json when unpacking', () => {
        expect(unpackOutputPath('profile.sav')).toBe('profile.sav.json');
    });

    it('strips or replaces .json when packing', () => {
        expect(packOutputPath('profile.sav.json')).toBe('profile.sav');
        expect(packOutputPath('edited.json')).toBe('edited.sav');
        expect(packOutputPath('raw')).toBe('raw.sav');
    });
});

describe('parseCliArgs', () => {
    it('separates the command, files and options', () => {
        expect(parseCliArgs(['pack', 'a.json', '--compact', '-o', 'b.sav'])).toEqual({
            command: 'pack',
            files: ['a.json'],
            out: 'b.sav',
            compact: true,
            help: false,
        });
    });

    it('rejects unknown options and a missing output path', () => {
        expect(() => parseCliArgs(['unpack', '--fast'])).toThrow('unknown option: --fast');
        expect(() => parseCliArgs(['unpack', '-o'])).toThrow('-o needs a path');
    });
});

describe('runCli', () => {
    it('unpacks every save in the working directory and packs it back', async () => {
        const bytes = encode(sampleDocument());
        const io = memoryIo({ '/work/profile.sav': bytes, '/work/notes.txt': 'ignored' });

        expect(await run(io, ['unpack'])).toBe(0);
        expect(io.out).toEqual(['wrote profile.sav.json']);
        const text = io.files.get('/work/profile.sav.json');
        expect(typeof text === 'string' && text.startsWith('{\n  "header": {')).toBe(true);

        expect(await run(io, ['pack', 'profile.sav.json', '-o', 'copy.sav'])).toBe(0);
        expect(io.out).toEqual(['wrote profile.sav.json', 'wrote copy.sav']);
        expect(io.files.get('/work/copy.sav')).toEqual(bytes);
    });

    it('writes compact JSON with --compact', async () => {
        const io = memoryIo({ '/work/a.sav': encode(sampleDocument()) });
        expect(await run(io, ['unpack', 'a.sav', '--compact'])).toBe(0);
        const text = io.files.get('/work/a.sav.json');
        expect(typeof text === 'string' && text.startsWith('{"header":{')).toBe(true);
    });

    it('applies the configured compression level when packing', async () => {
        const io = memoryIo({ '/work/a.sav': encode(sampleDocument()) });
        await run(io, ['unpack', 'a.sav']);
        expect(await run(io, ['pack', 'a.sav.json'], { SAV_CODEC_COMPRESSION_LEVEL: '9' })).toBe(0);
        const packed = io.files.get('/work/a.sav');
        if (!(packed instanceof Uint8Array)) throw new Error('expected bytes');
        expect(decode(packed).header.compression).toEqual({ compressor: 'zlib', blockSize: DEFAULT_BLOCK_SIZE, level: 9 });
    });

    it('reports a failing file and carries on with the rest', async () => {
        const io = memoryIo({ '/work/bad.sav': Uint8Array.of(1, 2, 3), '/work/good.sav': encode(sampleDocument()) });
        expect(await run(io, ['unpack'])).toBe(1);
        expect(io.err).toHaveLength(1);
        expect(io.err[0]).toMatch(/^bad\.sav: TruncatedInputError \[truncated_input\]/);
        expect(io.out).toEqual(['wrote good.sav.json']);
    });

    it('reports malformed JSON when packing', async () => {
        const io = memoryIo({ '/work/broken.json': '{"header":' });
        expect(await run(io, ['pack', 'broken.json'])).toBe(1);
        expect(io.err[0]).toMatch(/^broken\.json: MalformedJsonError \[malformed_json\]: Document is not valid JSON/);
        expect(io.files.has('/work/broken.sav')).toBe(false);
    });

    it('says so when there is nothing to unpack', async () => {
        const io = memoryIo();
        expect(await run(io, ['unpack'])).toBe(0);
        expect(io.out).toEqual(['no .sav files in /work']);
    });

    it('needs inputs for pack and a single input for --out', async () => {
        const io = memoryIo();
        expect(await run(io, ['pack'])).toBe(1);
        expect(await run(io, ['unpack', 'a.sav', 'b.sav', '-o', 'x.json'])).toBe(1);
        expect(io.err).toEqual(['error: pack needs at least one input file', 'error: --out takes a single input file']);
    });

    it('prints usage for help, no command and unknown commands', async () => {
        const io = memoryIo();
        expect(await run(io, ['--help'])).toBe(0);
        expect(await run(io, [])).toBe(1);
        expect(await run(io, ['convert'])).toBe(1);
        expect(io.out).toEqual([USAGE, USAGE, USAGE]);
        expect(io.err).toEqual(['unknown command: convert']);
    });

    it('rejects bad options and configuration before doing any work', async () => {
        const io = memoryIo();
        expect(await run(io, ['unpack', '--fast'])).toBe(1);
        expect(await run(io, ['unpack'], { SAV_CODEC_LOG_LEVEL: 'loud' })).toBe(1);
        expect(io.err[0]).toBe('error: Error [unknown]: unknown option: --fast');
        expect(io.err[1]).toMatch(/^error: ConfigError \[invalid_config\]: Configuration validation failed/);
        expect(io.out).toEqual([]);
    });
});
