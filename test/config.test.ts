import { describe, expect, it } from 'vitest';

import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
    it('falls back to defaults', () => {
        expect(loadConfig({})).toEqual({ logLevel: 'info', logPretty: false, prettyJson: true });
    });

    it('reads prefixed variables', () => {
        const config = loadConfig({
            SAV_CODEC_LOG_LEVEL: 'debug',
            SAV_CODEC_LOG_PRETTY: 'true',
            SAV_CODEC_PRETTY_JSON: '0',
            SAV_CODEC_COMPRESSION_LEVEL: '9',
        });
        expect(config).toEqual({ logLevel: 'debug', logPretty: true, prettyJson: false, compressionLevel: 9 });
    });

    it('ignores empty and unrelated variables', () => {
        expect(loadConfig({ SAV_CODEC_LOG_LEVEL: '', LOG_LEVEL: 'trace', HOME: '/root' })).toEqual({
            logLevel: 'info',
            logPretty: false,
            prettyJson: true,
        });
    });

    it('rejects an unknown log level', () => {
        try {
            loadConfig({ SAV_CODEC_LOG_LEVEL: 'loud' });
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigError);
            if (!(err instanceof ConfigError)) throw err;
            expect(err.context).toEqual({ keys: 'SAV_CODEC_LOG_LEVEL' });
            expect(err.message.startsWith('Configuration validation failed:\n')).toBe(true);
        }
    });

    it.each(['12', '-1', '2.5', 'fast'])('rejects compression level %s', (level) => {
        expect(() => loadConfig({ SAV_CODEC_COMPRESSION_LEVEL: level })).toThrow(ConfigError);
    });

    it('rejects a flag that is not a boolean word', () => {
        expect(() => loadConfig({ SAV_CODEC_LOG_PRETTY: 'maybe' })).toThrow(ConfigError);
    });
});
