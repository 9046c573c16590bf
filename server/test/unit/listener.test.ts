import dgram from 'node:dgram';
import { describe, expect, it, vi } from 'vitest';
import dnsPacket from 'dns-packet';

import { decodeQuery, normalizeClientIp, startDnsListener } from '../../src/dns/listener.js';
import type { QueryHandler } from '../../src/dns/queryHandler.js';
import { buildRefusedResponse } from '../../src/dns/responses.js';
import type { Logger } from '../../src/logger.js';

function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

async function exchange(port: number, msg: Buffer, timeoutMs: number): Promise<Buffer | null> {
  const socket = dgram.createSocket('udp4');
  return await new Promise<Buffer | null>((resolve) => {
    const timer = setTimeout(() => {
      socket.close();
      resolve(null);
    }, timeoutMs);
    socket.once('message', (data) => {
      clearTimeout(timer);
      socket.close();
      resolve(data);
    });
    socket.send(msg, port, '127.0.0.1');
  });
}

describe('listener decodeQuery', () => {
  it('accepts a standard query with one question', () => {
    const msg = dnsPacket.encode({ type: 'query', id: 7, questions: [{ type: 'A', name: 'a.example' }] });
    const packet = decodeQuery(msg);
    expect(packet?.id).toBe(7);
    expect(packet?.questions?.[0]?.name).toBe('a.example');
  });

  it('rejects bytes that are not a DNS message', () => {
    expect(decodeQuery(Buffer.from([1, 2, 3]))).toBeNull();
    expect(decodeQuery(Buffer.alloc(0))).toBeNull();
  });

  it('rejects responses', () => {
    const msg = dnsPacket.encode({ type: 'response', id: 7, questions: [{ type: 'A', name: 'a.example' }] });
    expect(decodeQuery(msg)).toBeNull();
  });

  it('rejects opcodes other than QUERY', () => {
    // opcode 2 (STATUS) lives in bits 11-14 of the flags word
    const msg = dnsPacket.encode({ type: 'query', id: 7, flags: 2 << 11, questions: [{ type: 'A', name: 'a.example' }] });
    expect(decodeQuery(msg)).toBeNull();
  });

  it('rejects zero or several questions', () => {
    expect(decodeQuery(dnsPacket.encode({ type: 'query', id: 7, questions: [] }))).toBeNull();
    expect(
      decodeQuery(
        dnsPacket.encode({
          type: 'query',
          id: 7,
          questions: [
            { type: 'A', name: 'a.example' },
            { type: 'A', name: 'b.example' }
          ]
        })
      )
    ).toBeNull();
  });
});

describe('normalizeClientIp', () => {
  it('strips the IPv4-mapped prefix and zone ids', () => {
    expect(normalizeClientIp('::ffff:192.0.2.1')).toBe('192.0.2.1');
    expect(normalizeClientIp('fe80::1%eth0')).toBe('fe80::1');
    expect(normalizeClientIp(' 10.0.0.1 ')).toBe('10.0.0.1');
    expect(normalizeClientIp('')).toBe('0.0.0.0');
  });
});

describe('startDnsListener', () => {
  it('logs a failed send and keeps serving', async () => {
    const logger = fakeLogger();
    // Larger than any UDP payload, so the send itself fails.
    const handler: QueryHandler = async ({ packet }) =>
      packet.questions?.[0]?.name === 'huge.example' ? Buffer.alloc(70_000) : buildRefusedResponse(packet);

    const listener = await startDnsListener({ host: '127.0.0.1', port: 0, handler, logger, maxInFlight: 8 });
    try {
      const port = listener.address().port;
      const huge = dnsPacket.encode({ type: 'query', id: 1, questions: [{ type: 'A', name: 'huge.example' }] });
      expect(await exchange(port, huge, 300)).toBeNull();
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn.mock.calls[0]?.[1]).toBe('failed to send DNS response');

      const next = dnsPacket.encode({ type: 'query', id: 2, questions: [{ type: 'A', name: 'next.example' }] });
      const reply = await exchange(port, next, 2000);
      expect(reply && dnsPacket.decode(reply).rcode).toBe('REFUSED');
      expect(reply && dnsPacket.decode(reply).id).toBe(2);
      await vi.waitFor(() => expect(listener.inFlight()).toBe(0), { timeout: 500, interval: 10 });
    } finally {
      await listener.close();
    }
  });
});
