import dnsPacket from 'dns-packet';
import type { Answer, DecodedPacket } from 'dns-packet';

import type { RuleTarget } from '../rules/rule.js';

export const ANSWER_TTL = 60;

export const RCODE = {
  NOERROR: 0,
  SERVFAIL: 2,
  REFUSED: 5
} as const;

export type Rcode = (typeof RCODE)[keyof typeof RCODE];

const OPCODE_MASK = 0x7800;
const HEADER_LENGTH = 12;

/**
 * Echoes id, question section, opcode and RD from the query. dns-packet takes the header RCODE
 * from the low 4 bits of `flags`; the QR bit comes from `type`.
 */
export function buildResponse(query: DecodedPacket, rcode: Rcode, answers: Answer[] = []): Buffer {
  const baseFlags = typeof query.flags === 'number' ? query.flags : 0;
  return dnsPacket.encode({
    type: 'response',
    id: query.id ?? 0,
    flags: (baseFlags & (OPCODE_MASK | dnsPacket.RECURSION_DESIRED)) | dnsPacket.RECURSION_AVAILABLE | rcode,
    questions: query.questions ?? [],
    answers,
    authorities: [],
    additionals: []
  });
}

export function buildRefusedResponse(query: DecodedPacket): Buffer {
  return buildResponse(query, RCODE.REFUSED);
}

export function buildServFailResponse(query: DecodedPacket): Buffer {
  return buildResponse(query, RCODE.SERVFAIL);
}

export function buildMaintenanceResponse(query: DecodedPacket, message: string): Buffer {
  const name = query.questions?.[0]?.name ?? '';
  return buildResponse(query, RCODE.NOERROR, [{ type: 'TXT', name, ttl: ANSWER_TTL, class: 'IN', data: message }]);
}

/**
 * A redirect target only answers the matching family (A for IPv4, AAAA for IPv6). Any other
 * question type gets NOERROR with no answers.
 */
export function buildRedirectResponse(
  query: DecodedPacket,
  target: Extract<RuleTarget, { kind: 'address' }>
): { response: Buffer; answered: boolean } {
  const question = query.questions?.[0];
  const name = question?.name ?? '';
  const qtype = question?.type;

  let answer: Answer | null = null;
  if (target.family === 4 && qtype === 'A') {
    answer = { type: 'A', name, ttl: ANSWER_TTL, class: 'IN', data: target.address };
  } else if (target.family === 6 && qtype === 'AAAA') {
    answer = { type: 'AAAA', name, ttl: ANSWER_TTL, class: 'IN', data: target.address };
  }

  return {
    response: buildResponse(query, RCODE.NOERROR, answer ? [answer] : []),
    answered: answer !== null
  };
}

/** Offset just past the question section, or null if the message is cut short. */
export function questionSectionEnd(msg: Buffer): number | null {
  if (msg.length < HEADER_LENGTH) return null;
  const qdcount = msg.readUInt16BE(4);
  let offset = HEADER_LENGTH;

  for (let q = 0; q < qdcount; q++) {
    for (;;) {
      if (offset >= msg.length) return null;
      const len = msg[offset] ?? 0;
      if ((len & 0xc0) === 0xc0) {
        offset += 2;
        break;
      }
      if (len & 0xc0) return null;
      offset += len + 1;
      if (len === 0) break;
    }
    offset += 4;
  }
  return offset <= msg.length ? offset : null;
}

/**
 * Puts the query's question section back into a synthesized response byte for byte, so QCLASS
 * and QTYPE values the codec has no name for are echoed unchanged. The response is returned as is
 * when either message cannot be walked or the question counts differ.
 */
export function withRawQuestion(response: Buffer, rawQuery: Buffer): Buffer {
  const queryEnd = questionSectionEnd(rawQuery);
  const responseEnd = questionSectionEnd(response);
  if (queryEnd == null || responseEnd == null) return response;
  if (rawQuery.readUInt16BE(4) !== response.readUInt16BE(4)) return response;

  return Buffer.concat([
    response.subarray(0, HEADER_LENGTH),
    rawQuery.subarray(HEADER_LENGTH, queryEnd),
    response.subarray(responseEnd)
  ]);
}
