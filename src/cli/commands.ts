import { readdir, readFile, writeFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';

import { decode, encode, type EncodeOptions } from '../codec.js';
import { loadConfig, type CodecConfig } from '../config.js';
import { formatError } from '../errors.js';
import { parseDocument, stringifyDocument } from '../json/bridge.js';
import { createLogger, type Logger } from '../logger.js';

export const USAGE = `Usage: sav-codec <command> [files...] [options]

Commands:
  unpack [file.sav ...]     Decode saves to <file>.json (every *.sav in the current directory by default)
  pack <file.json ...>      Encode JSON documents back to .sav

Options:
  -o, --out <file>          Output path (single input only)
  --compact                 Write JSON without indentation
  -h, --help                Show this help

Environment:
  SAV_CODEC_LOG_LEVEL, SAV_CODEC_LOG_PRETTY, SAV_CODEC_PRETTY_JSON, SAV_CODEC_COMPRESSION_LEVEL`;

/** File system and console access, swappable in tests. */
export interface CliIo {
    cwd: string;
    readFile(path: string): Promise<Uint8Array>;
    writeFile(path: string, data: Uint8Array | string): Promise<void>;
    listDir(path: string): Promise<string[]>;
    stdout(line: string): void;
    stderr(line: string): void;
}

export const nodeIo: CliIo = {
    cwd: process.cwd(),
    readFile: async (path) => new Uint8Array(await readFile(path)),
    writeFile: (path, data) => writeFile(path, data),
    listDir: (path) => readdir(path),
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
};

export interface CliDeps {
    io: CliIo;
    env: Record<string, string | undefined>;
    /** Built from the environment when absent. */
    logger?: Logger;
}

export type Command = 'unpack' | 'pack';

export interface CliArgs {
    command?: string;
    files: string[];
    out?: string;
    compact: boolean;
    help: boolean;
}

export function parseCliArgs(args: readonly string[]): CliArgs {
    const parsed: CliArgs = { files: [], compact: false, help: false };
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '-h' || arg === '--help') {
            parsed.help = true;
        } else if (arg === '-o' || arg === '--out') {
            const value = args[++i];
            if (value === undefined) throw new Error(`${arg} needs a path`);
            parsed.out = value;
        } else if (arg === '--compact') {
            parsed.compact = true;
        } else if (arg.startsWith('-')) {
            throw new Error(`unknown option: ${arg}`);
        } else if (parsed.command === undefined) {
            parsed.command = arg;
        } else {
            parsed.files.push(arg);
        }
    }
    return parsed;
}

/** `x.sav` -> `x.sav.json` */
export function unpackOutputPath(input: string): string {
    return `${input}.json`;
}

/** `x.sav.json` -> `x.sav`, `x.json` -> `x.sav`, anything else gains `.sav`. */
export function packOutputPath(input: string): string {
    if (input.endsWith('.sav.json')) return input.slice(0, -'.json'.length);
    if (input.endsWith('.json')) return `${input.slice(0, -'.json'.length)}.sav`;
    return `${input}.sav`;
}

async function findSaves(io: CliIo): Promise<string[]> {
    const entries = await io.listDir(io.cwd);
    return entries.filter((name) => name.endsWith('.sav')).sort();
}

async function unpackFile(io: CliIo, config: CodecConfig, log: Logger, input: string, output: string): Promise<void> {
    const bytes = await io.readFile(resolve(io.cwd, input));
    const doc = decode(bytes, { logger: log });
    const text = stringifyDocument(doc, { pretty: config.prettyJson });
    await io.writeFile(resolve(io.cwd, output), text);
    log.info('unpacked', { input, output, objects: doc.objects.length });
}

async function packFile(io: CliIo, config: CodecConfig, log: Logger, input: string, output: string): Promise<void> {
    const bytes = await io.readFile(resolve(io.cwd, input));
    const doc = parseDocument(new TextDecoder().decode(bytes));
    const opts: EncodeOptions = {
        logger: log,
        ...(config.compressionLevel !== undefined && { compression: { level: config.compressionLevel } }),
    };
    const encoded = encode(doc, opts);
    await io.writeFile(resolve(io.cwd, output), encoded);
    log.info('packed', { input, output, bytes: encoded.length });
}

/**
 * Runs one CLI invocation and resolves to its exit code.
 * A failing file does not stop the others; any failure makes the exit code 1.
 */
export async function runCli(args: readonly string[], deps: CliDeps = { io: nodeIo, env: process.env }): Promise<number> {
    const { io } = deps;

    let parsed: CliArgs;
    let config: CodecConfig;
    try {
        parsed = parseCliArgs(args);
        config = loadConfig(deps.env);
    } catch (err) {
        io.stderr(`error: ${formatError(err)}`);
        return 1;
    }

    if (parsed.help || parsed.command === undefined) {
        io.stdout(USAGE);
        return parsed.help ? 0 : 1;
    }
    if (parsed.command !== 'unpack' && parsed.command !== 'pack') {
        io.stderr(`unknown command: ${parsed.command}`);
        io.stdout(USAGE);
        return 1;
    }
    const command: Command = parsed.command;
    if (parsed.compact) config = { ...config, prettyJson: false };

    const log = (deps.logger ?? createLogger({ level: config.logLevel, prettify: config.logPretty })).child({ command });

    let inputs = parsed.files;
    if (inputs.length === 0) {
        if (command === 'pack') {
            io.stderr('error: pack needs at least one input file');
            return 1;
        }
        inputs = await findSaves(io);
        if (inputs.length === 0) {
            io.stdout(`no .sav files in ${io.cwd}`);
            return 0;
        }
    }
    if (parsed.out !== undefined && inputs.length > 1) {
        io.stderr('error: --out takes a single input file');
        return 1;
    }

    let failed = 0;
    for (const input of inputs) {
        const output = parsed.out ?? (command === 'unpack' ? unpackOutputPath(input) : packOutputPath(input));
        try {
            if (command === 'unpack') {
                await unpackFile(io, config, log, input, output);
            } else {
                await packFile(io, config, log, input, output);
            }
            io.stdout(`wrote ${output}`);
        } catch (err) {
            failed++;
            log.error('failed', { input: basename(input), err });
            io.stderr(`${input}: ${formatError(err)}`);
        }
    }
    return failed === 0 ? 0 : 1;
}
