/**
 * Environment variable config tests.
 *
 * Env vars follow the pattern: WEFT_{SETTING}
 *
 * @example
 * WEFT_LOG_LEVEL=warn        ->  { log: { level: 'warn' } }
 * WEFT_OPEN_MARKER='{{'      ->  { markers: { open: '{{' } }
 */
import { describe, it, expect } from 'vitest';

import { getEnvConfig } from '../../../src/core/config/index.js';

describe('config: env', () => {

    it('should return an empty config when nothing is set', () => {

        expect(getEnvConfig({})).toEqual({});

    });

    it('should read the log level case-insensitively', () => {

        expect(getEnvConfig({ WEFT_LOG_LEVEL: 'WARN' })).toEqual({ log: { level: 'warn' } });

    });

    it('should reject an unknown log level', () => {

        expect(() => getEnvConfig({ WEFT_LOG_LEVEL: 'loud' }))
            .toThrow('Invalid WEFT_LOG_LEVEL: must be one of silent, error, warn, info, verbose');

    });

    it('should parse boolean flags', () => {

        expect(getEnvConfig({ WEFT_JSON: 'true', WEFT_COLOR: '0' }))
            .toEqual({ log: { json: true, color: false } });
        expect(getEnvConfig({ WEFT_JSON: ' 1 ', WEFT_COLOR: 'False' }))
            .toEqual({ log: { json: true, color: false } });

    });

    it('should ignore unrecognized boolean values', () => {

        expect(getEnvConfig({ WEFT_JSON: 'yes' })).toEqual({});

    });

    it('should read markers', () => {

        expect(getEnvConfig({ WEFT_OPEN_MARKER: '{{', WEFT_CLOSE_MARKER: '}}' }))
            .toEqual({ markers: { open: '{{', close: '}}' } });

    });

    it('should combine sections', () => {

        expect(getEnvConfig({ WEFT_LOG_LEVEL: 'verbose', WEFT_CLOSE_MARKER: '%>' }))
            .toEqual({ log: { level: 'verbose' }, markers: { close: '%>' } });

    });

});
