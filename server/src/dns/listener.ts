import dgram from 'node:dgram';
import dnsPacket from 'dns-packet';
import type { DecodedPacket } from 'dns-packet';
import ipaddr from 'ipaddr.js';

import type { Logger } from '../logger.js';
import type { QueryHandler } from './queryHandler.js';

export type DnsListenerOptions = {
  host: string;
  port: number;
  handler: QueryHandler;
  logger: Logger;
  maxInFlight: number;
};

export type DnsListener = {
  address: () => { address: string; port: number };
  /** Datagrams currently being handled. */
  inFlight: () => number;
  close: () => Promise<void>;
};

export function normalizeClientIp(ipRaw: string): string {
  const raw = String(ipRaw ?? '').trim();
  if (!raw) return '0.0.0.0';
  const noZone = raw.includes('%') ? raw.slice(0, raw.indexOf('%')) : raw;
  return noZone.startsWith('::ffff:') ? noZone.slice('::ffff:'.length) : noZone;
}

/**
 * Returns the decoded packet only for a standard query with exactly one question. Anything
 * else (garbage, responses, other opcodes) yields null and is not answered.
 */
export function decodeQuery(msg: Buffer): DecodedPacket | null {
  let packet: DecodedPacket;
  try {
    packet = dnsPacket.decode(msg);
  } catch {
    return null;
  }
  if (packet.type !== 'query' || packet.flag_qr) return null;
  if (packet.opcode !== 'QUERY') return null;
  const questions = packet.questions ?? [];
  if (questions.length !== 1) return null;
  if (!questions[0]?.name) return null;
  return packet;
}

export async function startDnsListener(opts: DnsListenerOptions): Promise<DnsListener> {
  const udp = ipaddr.IPv6.isValid(opts.host) ? dgram.createSocket({ type: 'udp6', ipv6Only: false }) : dgram.createSocket('udp4');
  let inFlight = 0;

  const send = (resp: Buffer, rinfo: dgram.RemoteInfo): Promise<void> =>
    new Promise<void>((resolve) => {
      udp.send(resp, rinfo.port, rinfo.address, (err) => {
        if (err) opts.logger.warn({ err, client: rinfo.address }, 'failed to send DNS response');
        resolve();
      });
    });

  udp.on('message', (msg, rinfo) => {
    const client = normalizeClientIp(rinfo.address);

    if (inFlight >= opts.maxInFlight) {
      opts.logger.debug({ client, inFlight }, 'dropping datagram, too many queries in flight');
      return;
    }

    const packet = decodeQuery(msg);
    if (!packet) {
      opts.logger.debug({ client, bytes: msg.length }, 'dropping malformed datagram');
      return;
    }

    inFlight += 1;
    void opts
      .handler({ packet, raw: msg, client })
      .then((resp) => send(resp, rinfo))
      .catch((err: unknown) => {
        opts.logger.error({ err, client }, 'query handling failed');
      })
      .finally(() => {
        inFlight -= 1;
      });
  });

  udp.on('error', (err) => {
    opts.logger.error({ err }, 'DNS socket error');
  });

  await new Promise<void>((resolve, reject) => {
    udp.once('error', reject);
    udp.bind(opts.port, opts.host, () => {
      udp.off('error', reject);
      resolve();
    });
  });

  const bound = udp.address();
  opts.logger.info({ host: bound.address, port: bound.port }, 'DNS listener ready');

  return {
    address: () => {
      const a = udp.address();
      return { address: a.address, port: a.port };
    },
    inFlight: () => inFlight,
    close: () =>
      new Promise<void>((resolve) => {
        udp.close(() => resolve());
      })
  };
}
