import type { DecodedPacket } from 'dns-packet';

import type { Logger } from '../logger.js';
import type { QueryAction, QueryLog } from '../queryLog.js';
import { formatTarget, type Rule } from '../rules/rule.js';
import { decide, minutesOfDay } from '../rules/matcher.js';
import type { RuleStore } from '../rules/ruleStore.js';
import type { StatsRecorder } from '../stats/statsRecorder.js';
import type { Forwarder } from './forwarder.js';
import {
  buildMaintenanceResponse,
  buildRedirectResponse,
  buildRefusedResponse,
  buildServFailResponse,
  withRawQuestion
} from './responses.js';

export type DnsQuery = {
  packet: DecodedPacket;
  /** The datagram as received; forwarded upstream untouched. */
  raw: Buffer;
  client: string;
};

export type QueryHandler = (query: DnsQuery) => Promise<Buffer>;

export type QueryHandlerDeps = {
  store: RuleStore;
  stats: StatsRecorder;
  queryLog: QueryLog;
  forwarder: Forwarder | null;
  logger: Logger;
  clock?: () => Date;
};

function sameTransactionId(reply: Buffer, id: number): boolean {
  return reply.length >= 12 && reply.readUInt16BE(0) === id;
}

export function createQueryHandler(deps: QueryHandlerDeps): QueryHandler {
  const clock = deps.clock ?? (() => new Date());

  return async ({ packet, raw, client }) => {
    const now = clock();
    const question = packet.questions?.[0];
    const name = question?.name ?? '';
    const type = question?.type ?? 'A';

    const log = (action: QueryAction, rule?: Rule): void => {
      deps.queryLog.append({
        ts: now.toISOString(),
        client,
        name,
        type,
        action,
        ...(rule ? { pattern: rule.pattern, target: formatTarget(rule.target) } : {})
      });
    };

    const maintenance = deps.store.maintenance();
    if (maintenance.active) {
      log('maintenance');
      return withRawQuestion(buildMaintenanceResponse(packet, maintenance.message), raw);
    }

    // One snapshot per query; later publishes do not affect this decision.
    const decision = decide(name, deps.store.current(), minutesOfDay(now));

    if (decision.kind === 'block') {
      const { rule } = decision;
      deps.stats.record(rule.pattern, now);

      if (rule.target.kind === 'refuse') {
        log('refused', rule);
        deps.logger.debug({ client, name, type, pattern: rule.pattern }, 'query refused');
        return withRawQuestion(buildRefusedResponse(packet), raw);
      }

      const { response, answered } = buildRedirectResponse(packet, rule.target);
      log(answered ? 'redirected' : 'empty', rule);
      deps.logger.debug({ client, name, type, pattern: rule.pattern, target: rule.target.address }, 'query redirected');
      return withRawQuestion(response, raw);
    }

    if (!deps.forwarder) {
      log('servfail');
      return withRawQuestion(buildServFailResponse(packet), raw);
    }

    try {
      const reply = await deps.forwarder.forward(raw);
      if (!sameTransactionId(reply, packet.id ?? 0)) throw new Error('UPSTREAM_ID_MISMATCH');
      log('forwarded');
      return reply;
    } catch (err) {
      deps.logger.warn({ err, name, upstream: deps.forwarder.target }, 'upstream forward failed');
      log('servfail');
      return withRawQuestion(buildServFailResponse(packet), raw);
    }
  };
}
