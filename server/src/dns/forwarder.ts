import dgram from 'node:dgram';
import ipaddr from 'ipaddr.js';
import { request } from 'undici';

/** Hands a raw query to an upstream resolver and returns its raw reply. */
export type Forwarder = {
  readonly target: string;
  forward: (msg: Buffer) => Promise<Buffer>;
};

function portOr53(raw: string | undefined): number {
  const port = Number(raw);
  return Number.isInteger(port) && port > 0 && port <= 65535 ? port : 53;
}

export function parseHostPort(value: string): { host: string; port: number } {
  const trimmed = value.trim();

  // [v6]:port or bare [v6]
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed);
  if (bracketed) {
    return { host: bracketed[1] ?? '', port: portOr53(bracketed[2]) };
  }

  // A bare IPv6 literal has several colons and no port.
  if (ipaddr.IPv6.isValid(trimmed)) return { host: trimmed, port: 53 };

  const idx = trimmed.lastIndexOf(':');
  if (idx < 0) return { host: trimmed, port: 53 };
  return { host: trimmed.slice(0, idx), port: portOr53(trimmed.slice(idx + 1)) };
}

function sameAddress(a: string, b: string): boolean {
  if (!ipaddr.isValid(a) || !ipaddr.isValid(b)) return a === b;
  const pa = ipaddr.process(a);
  const pb = ipaddr.process(b);
  return pa.kind() === pb.kind() && pa.toNormalizedString() === pb.toNormalizedString();
}

/** A hostname upstream resolves at send time, so only its port can be checked. */
function isFromUpstream(upstream: { host: string; port: number }, rinfo: dgram.RemoteInfo): boolean {
  if (rinfo.port !== upstream.port) return false;
  return !ipaddr.isValid(upstream.host) || sameAddress(upstream.host, rinfo.address);
}

export async function forwardUdp(upstream: { host: string; port: number }, msg: Buffer, timeoutMs: number): Promise<Buffer> {
  return await new Promise<Buffer>((resolve, reject) => {
    const socket = dgram.createSocket(ipaddr.IPv6.isValid(upstream.host) ? 'udp6' : 'udp4');
    let settled = false;

    const finish = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.close();
      fn();
    };

    const timer = setTimeout(() => finish(() => reject(new Error('UPSTREAM_TIMEOUT'))), timeoutMs);

    socket.once('error', (err) => finish(() => reject(err)));
    socket.on('message', (data, rinfo) => {
      // Anything not sent by the upstream we queried is ignored; the real reply may still arrive.
      if (!isFromUpstream(upstream, rinfo)) return;
      finish(() => resolve(data));
    });

    socket.send(msg, upstream.port, upstream.host, (err) => {
      if (err) finish(() => reject(err));
    });
  });
}

export async function forwardDoh(dohUrl: string, msg: Buffer, timeoutMs: number): Promise<Buffer> {
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), timeoutMs);
  try {
    const res = await request(dohUrl, {
      method: 'POST',
      headers: {
        'content-type': 'application/dns-message',
        accept: 'application/dns-message',
        'user-agent': 'timegate-dns/0.1'
      },
      body: msg,
      signal: ac.signal
    });

    if (res.statusCode !== 200) {
      await res.body.dump();
      throw new Error(`HTTP_${res.statusCode}`);
    }

    return Buffer.from(await res.body.arrayBuffer());
  } catch (err) {
    if (ac.signal.aborted) throw new Error('UPSTREAM_TIMEOUT');
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

/** `''` means no upstream; `https://…` is DNS-over-HTTPS; anything else is a UDP `host:port`. */
export function createForwarder(upstream: string, timeoutMs: number): Forwarder | null {
  const value = upstream.trim();
  if (!value) return null;

  if (/^https:\/\//i.test(value)) {
    return { target: value, forward: (msg) => forwardDoh(value, msg, timeoutMs) };
  }

  const hostPort = parseHostPort(value);
  if (!hostPort.host) throw new Error(`Invalid upstream: ${JSON.stringify(upstream)}`);
  return {
    target: hostPort.host.includes(':') ? `[${hostPort.host}]:${hostPort.port}` : `${hostPort.host}:${hostPort.port}`,
    forward: (msg) => forwardUdp(hostPort, msg, timeoutMs)
  };
}
