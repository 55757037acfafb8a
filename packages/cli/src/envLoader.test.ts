import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { getProcessedEnv, isStringLosslesslyNumeric, loadEnvFile } from './envLoader';

describe('isStringLosslesslyNumeric', () => {
    it('should accept plain numbers', () => {
        expect(isStringLosslesslyNumeric('3')).toBe(true);
        expect(isStringLosslesslyNumeric('2.5')).toBe(true);
        expect(isStringLosslesslyNumeric('1.0')).toBe(true);
    });

    it('should reject everything else', () => {
        expect(isStringLosslesslyNumeric('')).toBe(false);
        expect(isStringLosslesslyNumeric('  ')).toBe(false);
        expect(isStringLosslesslyNumeric('ssdp:all')).toBe(false);
        expect(isStringLosslesslyNumeric('Infinity')).toBe(false);
        expect(isStringLosslesslyNumeric('0x10')).toBe(false);
        expect(isStringLosslesslyNumeric(undefined)).toBe(false);
    });
});

describe('getProcessedEnv', () => {
    it('should convert numeric values only', () => {
        expect(getProcessedEnv({ DISCOVERY_RETRIES: '0', DISCOVERY_SEARCH_TARGET: 'upnp:rootdevice' })).toEqual({
            DISCOVERY_RETRIES: 0,
            DISCOVERY_SEARCH_TARGET: 'upnp:rootdevice',
        });
    });
});

describe('loadEnvFile', () => {
    const key = 'SSDP_ENV_LOADER_TEST_VALUE';
    let directory: string;
    let envPath: string;

    beforeEach(() => {
        directory = fs.mkdtempSync(path.join(os.tmpdir(), 'ssdp-env-'));
        envPath = path.join(directory, '.env');
        fs.writeFileSync(envPath, `${key}=from-file\n`);
    });

    afterEach(() => {
        delete process.env[key];
        fs.rmSync(directory, { recursive: true, force: true });
    });

    it('should load variables from an existing file', () => {
        expect(loadEnvFile(envPath)).toBe(true);
        expect(process.env[key]).toBe('from-file');
    });

    it('should skip a missing file', () => {
        expect(loadEnvFile(path.join(directory, 'missing.env'))).toBe(false);
    });

    it('should keep existing values unless told to override', () => {
        process.env[key] = 'preset';
        loadEnvFile(envPath);
        expect(process.env[key]).toBe('preset');

        loadEnvFile(envPath, true);
        expect(process.env[key]).toBe('from-file');
    });
});

describe('env loading order', () => {
    let directory: string;

    beforeEach(() => {
        directory = fs.mkdtempSync(path.join(os.tmpdir(), 'ssdp-env-log-'));
    });

    afterEach(() => {
        for (const key of ['LOG_TO_FILE', 'LOG_FILE_PATH', 'LOG_EXCEPTIONS_PATH', 'LOG_REJECTIONS_PATH']) {
            delete process.env[key];
        }
        vi.doUnmock('ssdp-core');
        vi.resetModules();
    });

    it('should not pull in the discovery core', async () => {
        const coreLoaded = vi.fn();
        vi.resetModules();
        vi.doMock('ssdp-core', () => {
            coreLoaded();
            return {};
        });

        await import('./envLoader');

        expect(coreLoaded).not.toHaveBeenCalled();
    });

    it('should let loggers created afterwards pick up the file settings', async () => {
        const envPath = path.join(directory, '.env');
        fs.writeFileSync(envPath, [
            'LOG_TO_FILE=true',
            `LOG_FILE_PATH=${path.join(directory, 'discovery.log')}`,
            `LOG_EXCEPTIONS_PATH=${path.join(directory, 'exceptions.log')}`,
            `LOG_REJECTIONS_PATH=${path.join(directory, 'rejections.log')}`,
        ].join('\n'));

        expect(loadEnvFile(envPath)).toBe(true);
        const { createModuleLogger } = await import('ssdp-core');
        const logger = createModuleLogger('envLoaderTest');

        expect(logger.silent).toBe(false);
        expect(logger.transports).toHaveLength(1);
        logger.exceptions.unhandle();
        logger.rejections.unhandle();
        logger.clear();
    });
});
