import { describe, it, expect } from 'vitest';
import { collectSearchIssues, createDiscoveryConfig } from './discoveryConfig';
import { InvalidConfigError } from './errors';

const issuesOf = (run: () => unknown): readonly string[] => {
    try {
        run();
    } catch (err) {
        if (err instanceof InvalidConfigError) return err.issues;
        throw err;
    }
    return [];
};

describe('createDiscoveryConfig', () => {
    it('should fill in defaults', () => {
        expect(createDiscoveryConfig()).toEqual({
            searchTarget: 'ssdp:all',
            maxWaitSeconds: 2,
            timeoutSeconds: 3,
            retryCount: 3,
            verbose: false,
            ipVersion: 4,
            maxWaitLimit: 5,
            userAgent: undefined,
            multicastInterface: undefined,
            multicastTtl: 4,
        });
    });

    it('should derive the timeout from MX when not given', () => {
        expect(createDiscoveryConfig({ maxWaitSeconds: 4 }).timeoutSeconds).toBe(5);
        expect(createDiscoveryConfig({ maxWaitSeconds: 4, timeoutSeconds: 4 }).timeoutSeconds).toBe(4);
    });

    it('should freeze the result', () => {
        expect(Object.isFrozen(createDiscoveryConfig({ searchTarget: 'upnp:rootdevice' }))).toBe(true);
    });

    it('should collect every problem into one error', () => {
        const issues = issuesOf(() => createDiscoveryConfig({
            searchTarget: ' ',
            maxWaitSeconds: 3,
            timeoutSeconds: 2,
            retryCount: -1,
            multicastTtl: 0,
            userAgent: 'bad\nagent',
        }));

        expect(issues).toEqual([
            'searchTarget must be a non-empty string',
            'timeoutSeconds (2) must be >= maxWaitSeconds (3)',
            'retryCount must be a non-negative integer (got -1)',
            'multicastTtl must be an integer between 1 and 255 (got 0)',
            'userAgent must not contain line breaks',
        ]);
    });

    it('should reject a non-positive timeout', () => {
        expect(issuesOf(() => createDiscoveryConfig({ timeoutSeconds: 0 }))).toEqual([
            'timeoutSeconds must be a positive number (got 0)',
        ]);
    });

    it('should reject a fractional retry count', () => {
        expect(() => createDiscoveryConfig({ retryCount: 1.5 })).toThrow(InvalidConfigError);
    });

    it('should accept zero retries', () => {
        expect(createDiscoveryConfig({ retryCount: 0 }).retryCount).toBe(0);
    });
});

describe('collectSearchIssues', () => {
    it('should validate the MX limit itself', () => {
        expect(collectSearchIssues('ssdp:all', 2, 0)).toEqual(['maxWaitLimit must be an integer >= 1 (got 0)']);
    });

    it('should return nothing for valid input', () => {
        expect(collectSearchIssues('upnp:rootdevice', 5)).toEqual([]);
    });
});
