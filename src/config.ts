import { z } from 'zod';

import { ConfigError } from './errors.js';

export const ENV_PREFIX = 'SAV_CODEC_';

const ConfigSchema = z.object({
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    LOG_PRETTY: z.stringbool().default(false),
    PRETTY_JSON: z.stringbool().default(true),
    COMPRESSION_LEVEL: z.coerce.number().int().min(0).max(9).optional(),
});

export type RawConfig = z.infer<typeof ConfigSchema>;

export interface CodecConfig {
    logLevel: RawConfig['LOG_LEVEL'];
    logPretty: boolean;
    /** Indent JSON written by `unpack`. */
    prettyJson: boolean;
    /** Deflate level for `pack`, overriding the level recorded in the document. */
    compressionLevel?: number;
}

/**
 * Reads `SAV_CODEC_*` variables from `env`.
 * Empty values count as unset, so `SAV_CODEC_LOG_LEVEL=` falls back to the default.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): CodecConfig {
    const values: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (key.startsWith(ENV_PREFIX) && value !== undefined && value !== '') {
            values[key.slice(ENV_PREFIX.length)] = value;
        }
    }

    const result = ConfigSchema.safeParse(values);
    if (!result.success) {
        throw new ConfigError(`Configuration validation failed:\n${z.prettifyError(result.error)}`, {
            keys: Object.keys(values).map((k) => ENV_PREFIX + k).join(','),
        });
    }

    const { LOG_LEVEL, LOG_PRETTY, PRETTY_JSON, COMPRESSION_LEVEL } = result.data;
    return {
        logLevel: LOG_LEVEL,
        logPretty: LOG_PRETTY,
        prettyJson: PRETTY_JSON,
        ...(COMPRESSION_LEVEL !== undefined && { compressionLevel: COMPRESSION_LEVEL }),
    };
}
