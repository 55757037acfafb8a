import { describe, it, expect, vi } from 'vitest';
import { currentLogLevel, setLogLevel, SocketError, type DiscoverServicesOptions, type DiscoveryConfigInput, type DiscoveryResult, type ServiceRecord } from 'ssdp-core';
import { normalizeLegacyFlags, runCli, type CliIo } from './cli';

const records: ServiceRecord[] = [
    {
        location: 'http://10.0.0.5:80/desc.xml',
        serviceType: 'urn:x',
        usn: 'uuid:abc::urn:x',
        sourceAddress: '10.0.0.5',
        sourcePort: 1900,
        headers: {},
        receivedAt: 0,
    },
    {
        usn: 'uuid:bare',
        sourceAddress: '10.0.0.6',
        sourcePort: 1900,
        headers: {},
        receivedAt: 0,
    },
];

const createIo = () => {
    const out: string[] = [];
    const err: string[] = [];
    const io: CliIo = {
        stdout: (line) => {
            out.push(line);
        },
        stderr: (line) => {
            err.push(line);
        },
    };
    return { out, err, io };
};

const createDiscover = (result: DiscoveryResult = records) =>
    vi.fn(async (_config: DiscoveryConfigInput, _options?: DiscoverServicesOptions): Promise<DiscoveryResult> => result);

describe('normalizeLegacyFlags', () => {
    it('should rewrite the two-letter flags to long options', () => {
        expect(normalizeLegacyFlags(['-st', 'upnp:rootdevice', '-mx', '3', '-v'])).toEqual([
            '--search-target', 'upnp:rootdevice', '--max-wait', '3', '-v',
        ]);
    });

    it('should keep an attached value', () => {
        expect(normalizeLegacyFlags(['-st=urn:x:device:Test:1'])).toEqual(['--search-target=urn:x:device:Test:1']);
    });

    it('should leave everything after -- alone', () => {
        expect(normalizeLegacyFlags(['-r', '1', '--', '-st'])).toEqual(['-r', '1', '--', '-st']);
    });
});

describe('runCli', () => {
    it('should pass the parsed flags to discovery', async () => {
        const discover = createDiscover();
        const { io } = createIo();

        const exitCode = await runCli(['-st', 'upnp:rootdevice', '-mx', '3', '-t', '5', '-r', '1', '-v', '-6'], { discover, env: {}, io });

        expect(exitCode).toBe(0);
        expect(discover.mock.calls[0][0]).toEqual({
            searchTarget: 'upnp:rootdevice',
            maxWaitSeconds: 3,
            timeoutSeconds: 5,
            retryCount: 1,
            verbose: true,
            ipVersion: 6,
        });
    });

    it('should raise the log level to debug with -v', async () => {
        setLogLevel('info');
        const { io } = createIo();

        await runCli(['-v'], { discover: createDiscover(), env: {}, io });

        expect(currentLogLevel()).toBe('debug');
    });

    it('should keep a trace level with -v', async () => {
        setLogLevel('trace');
        const { io } = createIo();

        await runCli(['-v'], { discover: createDiscover(), env: {}, io });

        expect(currentLogLevel()).toBe('trace');
    });

    it('should use the defaults when no flags are given', async () => {
        const discover = createDiscover();
        const { io } = createIo();

        await runCli([], { discover, env: {}, io });

        expect(discover.mock.calls[0][0]).toEqual({
            searchTarget: 'ssdp:all',
            maxWaitSeconds: 2,
            timeoutSeconds: undefined,
            retryCount: 3,
            verbose: false,
            ipVersion: 4,
        });
    });

    it('should let flags win over environment defaults', async () => {
        const discover = createDiscover();
        const { io } = createIo();
        const env = { DISCOVERY_SEARCH_TARGET: 'urn:x', DISCOVERY_MAX_WAIT: 4, DISCOVERY_TIMEOUT: 6, DISCOVERY_RETRIES: 0 };

        await runCli(['-mx', '1'], { discover, env, io });

        expect(discover.mock.calls[0][0]).toEqual({
            searchTarget: 'urn:x',
            maxWaitSeconds: 1,
            timeoutSeconds: 6,
            retryCount: 0,
            verbose: false,
            ipVersion: 4,
        });
    });

    it('should forward the abort signal', async () => {
        const discover = createDiscover();
        const { io } = createIo();
        const controller = new AbortController();

        await runCli([], { discover, env: {}, io, abortSignal: controller.signal });

        expect(discover.mock.calls[0][1]).toEqual({ abortSignal: controller.signal });
    });

    it('should print one line per service', async () => {
        const { out, io } = createIo();

        const exitCode = await runCli([], { discover: createDiscover(), env: {}, io });

        expect(exitCode).toBe(0);
        expect(out).toEqual(['urn:x  http://10.0.0.5:80/desc.xml', '-  -']);
    });

    it('should print a notice and exit 0 when nothing was found', async () => {
        const { out, io } = createIo();

        const exitCode = await runCli([], { discover: createDiscover([]), env: {}, io });

        expect(exitCode).toBe(0);
        expect(out).toEqual(['No SSDP services found.']);
    });

    it('should print JSON with --json', async () => {
        const { out, io } = createIo();

        await runCli(['--json'], { discover: createDiscover(), env: {}, io });

        expect(out).toHaveLength(1);
        expect(JSON.parse(out[0])).toEqual(records);
    });

    it('should exit 1 on invalid configuration without touching the network', async () => {
        const { out, err, io } = createIo();

        const exitCode = await runCli(['-mx', '9'], { env: {}, io });

        expect(exitCode).toBe(1);
        expect(out).toEqual([]);
        expect(err).toEqual(['Error: Invalid discovery configuration: maxWaitSeconds must be an integer between 1 and 5 (got 9)']);
    });

    it('should exit 1 when the socket cannot be opened', async () => {
        const { err, io } = createIo();
        const discover = vi.fn(async (): Promise<DiscoveryResult> => {
            throw new SocketError('Failed to bind msearchIPv4 on 0.0.0.0: EADDRINUSE');
        });

        const exitCode = await runCli([], { discover, env: {}, io });

        expect(exitCode).toBe(1);
        expect(err).toEqual(['Error: Failed to bind msearchIPv4 on 0.0.0.0: EADDRINUSE']);
    });

    it('should propagate unexpected failures', async () => {
        const { io } = createIo();
        const discover = vi.fn(async (): Promise<DiscoveryResult> => {
            throw new Error('boom');
        });

        await expect(runCli([], { discover, env: {}, io })).rejects.toThrow('boom');
    });

    it('should print usage for -h without discovering', async () => {
        const discover = createDiscover();
        const { out, io } = createIo();

        const exitCode = await runCli(['-h'], { discover, env: {}, io });

        expect(exitCode).toBe(0);
        expect(out[0].startsWith('Usage: ssdp-discover [options]')).toBe(true);
        expect(discover).not.toHaveBeenCalled();
    });

    it('should reject a non-numeric value', async () => {
        const discover = createDiscover();
        const { err, io } = createIo();

        const exitCode = await runCli(['-mx', 'abc'], { discover, env: {}, io });

        expect(exitCode).toBe(1);
        expect(err[0]).toContain('Not a number.');
        expect(discover).not.toHaveBeenCalled();
    });

    it('should reject an unknown option', async () => {
        const discover = createDiscover();
        const { io } = createIo();

        expect(await runCli(['--bogus'], { discover, env: {}, io })).toBe(1);
        expect(discover).not.toHaveBeenCalled();
    });
});
