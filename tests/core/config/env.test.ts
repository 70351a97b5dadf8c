/**
 * Environment config tests.
 */
import { describe, it, expect, afterEach, vi } from 'vitest';

import { getEnvConfig, getEnvOptions } from '../../../src/core/config/index.js';

describe('config: env', () => {

    afterEach(() => {

        vi.unstubAllEnvs();

    });

    it('should nest underscore-separated names', () => {

        vi.stubEnv('DUCKDB_CLI_FORMAT', 'grid');
        vi.stubEnv('DUCKDB_CLI_LOG_LEVEL', 'warn');

        expect(getEnvConfig()).toEqual({ format: 'grid', log: { level: 'warn' } });

    });

    it('should convert numbers and booleans', () => {

        vi.stubEnv('DUCKDB_CLI_LIMIT', '25');
        vi.stubEnv('DUCKDB_CLI_JSON', 'true');

        expect(getEnvOptions()).toEqual({ limit: 25, json: true });

    });

    it('should keep the database path as written', () => {

        vi.stubEnv('DUCKDB_CLI_DATABASE', './data/app.duckdb');

        expect(getEnvOptions()).toEqual({ database: './data/app.duckdb' });

    });

    it('should map LOG_LEVEL to logLevel', () => {

        vi.stubEnv('DUCKDB_CLI_LOG_LEVEL', 'error');

        expect(getEnvOptions()).toEqual({ logLevel: 'error' });

    });

    it('should ignore meta and foreign variables', () => {

        vi.stubEnv('DUCKDB_CLI_DEBUG', '1');
        vi.stubEnv('OTHER_FORMAT', 'grid');

        expect(getEnvOptions()).toEqual({});

    });

});
