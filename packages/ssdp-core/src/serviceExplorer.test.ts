import { describe, it, expect } from 'vitest';
import { discoverServices, discoverServicesIterable } from './serviceExplorer';
import { SocketError } from './errors';
import { FakeClock, ScriptedTransport, scriptedFactory, ssdpReply } from './testTransport';
import type { ServiceRecord } from './types';

const replies = [
    { delayMs: 100, message: ssdpReply({ LOCATION: 'http://192.168.1.30/one.xml', ST: 'urn:x', USN: 'uuid:one' }) },
    { delayMs: 200, message: ssdpReply({ LOCATION: 'http://192.168.1.31/two.xml', ST: 'urn:x', USN: 'uuid:two' }) },
];

describe('discoverServices', () => {
    it('should resolve with every unique service and report each once', async () => {
        const clock = new FakeClock();
        const transport = new ScriptedTransport(clock, [replies, replies]);
        const seen: string[] = [];

        const result = await discoverServices(
            { retryCount: 1 },
            { transportFactory: scriptedFactory(transport), clock, onServiceFound: (record) => seen.push(record.usn ?? '') }
        );

        expect(result.map((record) => record.location)).toEqual([
            'http://192.168.1.30/one.xml',
            'http://192.168.1.31/two.xml',
        ]);
        expect(seen).toEqual(['uuid:one', 'uuid:two']);
    });

    it('should resolve with an empty result when nothing answers', async () => {
        const clock = new FakeClock();
        const result = await discoverServices({ retryCount: 0 }, { transportFactory: scriptedFactory(new ScriptedTransport(clock)), clock });
        expect(result).toEqual([]);
    });
});

describe('discoverServicesIterable', () => {
    const collect = async (iterable: AsyncIterable<ServiceRecord>): Promise<ServiceRecord[]> => {
        const records: ServiceRecord[] = [];
        for await (const record of iterable) {
            records.push(record);
        }
        return records;
    };

    it('should yield each unique service', async () => {
        const clock = new FakeClock();
        const transport = new ScriptedTransport(clock, [replies, replies]);

        const records = await collect(discoverServicesIterable({ retryCount: 1 }, { transportFactory: scriptedFactory(transport), clock }));

        expect(records.map((record) => record.usn)).toEqual(['uuid:one', 'uuid:two']);
        expect(transport.closed).toBe(true);
    });

    it('should close the transport when the consumer stops early', async () => {
        const clock = new FakeClock();
        const transport = new ScriptedTransport(clock, [replies, replies, replies, replies]);

        let first: ServiceRecord | undefined;
        for await (const record of discoverServicesIterable({ retryCount: 3 }, { transportFactory: scriptedFactory(transport), clock })) {
            first = record;
            break;
        }

        expect(first?.usn).toBe('uuid:one');
        expect(transport.closed).toBe(true);
    });

    it('should surface a socket failure to the consumer', async () => {
        const clock = new FakeClock();
        const transport = new ScriptedTransport(clock);
        transport.openError = new SocketError('bind failed');

        await expect(collect(discoverServicesIterable({}, { transportFactory: scriptedFactory(transport), clock }))).rejects.toThrow(SocketError);
    });
});
