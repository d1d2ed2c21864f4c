import { describe, test, expect } from '@jest/globals';
import { loadConfig } from '../Config.js';

describe('Configuration', () => {
    test('defaults', () => {
        expect(loadConfig({})).toEqual({
            database: 'database.db',
            host: 'localhost',
            port: 8000,
            levelKey: 'groups',
            logRequests: true
        });
    });

    test('reads the environment', () => {
        const config = loadConfig({
            DB_DATABASE: ':memory:',
            HOST: '0.0.0.0',
            PORT: '9001',
            LEVEL_KEY: 'pair',
            LOG_REQUESTS: 'false'
        });

        expect(config).toEqual({
            database: ':memory:',
            host: '0.0.0.0',
            port: 9001,
            levelKey: 'pair',
            logRequests: false
        });
    });

    test('rejects unknown level keys', () => {
        expect(() => loadConfig({ LEVEL_KEY: 'tuple' })).toThrow(/Invalid configuration: LEVEL_KEY/);
    });

    test('rejects out of range ports', () => {
        expect(() => loadConfig({ PORT: '70000' })).toThrow(/PORT/);
    });
});
