#!/usr/bin/env node

import { formatError } from '../errors.js';
import { runCli } from './commands.js';

async function main(): Promise<void> {
    process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err: unknown) => {
    console.error(formatError(err));
    process.exit(1);
});
