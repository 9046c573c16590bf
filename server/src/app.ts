import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';

import { resolveStateFile, type AppConfig } from './config.js';
import type { AppContext } from './context.js';
import { createForwarder, type Forwarder } from './dns/forwarder.js';
import { startDnsListener, type DnsListener } from './dns/listener.js';
import { createQueryHandler } from './dns/queryHandler.js';
import { createStateWriter, loadPersistedState, type LoadedState } from './persistedState.js';
import { QueryLog } from './queryLog.js';
import { RuleStore } from './rules/ruleStore.js';
import { createSnapshot } from './rules/snapshot.js';
import { StatsRecorder } from './stats/statsRecorder.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerMaintenanceRoutes } from './routes/maintenance.js';
import { registerQueryLogsRoutes } from './routes/queryLogs.js';
import { registerRulesRoutes } from './routes/rules.js';
import { registerStatsRoutes } from './routes/stats.js';

export type BuildAppOptions = {
  enableDns?: boolean;
  /** Read the state file at startup and write every change back to it. */
  persist?: boolean;
  /** Overrides the forwarder built from UPSTREAM_DNS; `null` means none. */
  forwarder?: Forwarder | null;
  clock?: () => Date;
};

const EMPTY_STATE: LoadedState = { rules: [], maintenance: false, skipped: 0 };

export async function buildApp(config: AppConfig, options: BuildAppOptions = {}) {
  const enableDns = options.enableDns ?? true;
  const persist = options.persist ?? true;

  const app = Fastify({
    logger:
      config.NODE_ENV === 'test'
        ? false
        : {
            level: config.NODE_ENV === 'production' ? 'info' : 'debug'
          },
    trustProxy: config.TRUST_PROXY
  });

  // JSON-only API, nothing to upgrade to HTTPS.
  await app.register(helmet, { global: true, contentSecurityPolicy: false, hsts: false });
  await app.register(cors, {
    origin: config.FRONTEND_ORIGIN,
    credentials: true
  });
  await app.register(rateLimit, {
    global: false,
    max: 200,
    timeWindow: '1 minute'
  });

  const statePath = resolveStateFile(config);
  let loaded: LoadedState;
  try {
    loaded = persist ? loadPersistedState(statePath, app.log) : EMPTY_STATE;
  } catch (err) {
    await app.close();
    throw err;
  }
  if (loaded.skipped > 0) {
    app.log.warn({ skipped: loaded.skipped, statePath }, 'some stored rules were invalid and were not loaded');
  }

  const store = new RuleStore({
    snapshot: createSnapshot(loaded.rules),
    maintenance: loaded.maintenance,
    maintenanceMessage: config.MAINTENANCE_MESSAGE
  });
  const ctx: AppContext = {
    store,
    stats: new StatsRecorder(),
    queryLog: new QueryLog(config.QUERY_LOG_LIMIT)
  };

  const writer = persist ? createStateWriter(statePath, app.log) : null;
  const unsubscribe = writer
    ? store.onChange(() => {
        // save() never rejects; failures are logged inside the writer.
        void writer.save(store.toPersisted());
      })
    : () => undefined;

  await registerHealthRoutes(app, config, ctx);
  await registerRulesRoutes(app, config, ctx);
  await registerMaintenanceRoutes(app, config, ctx);
  await registerStatsRoutes(app, config, ctx);
  await registerQueryLogsRoutes(app, config, ctx);

  const forwarder =
    options.forwarder !== undefined ? options.forwarder : createForwarder(config.UPSTREAM_DNS, config.DNS_FORWARD_TIMEOUT_MS);
  if (!forwarder) {
    app.log.warn('UPSTREAM_DNS is not set; queries that match no rule will get SERVFAIL');
  }

  let dns: DnsListener | null = null;
  if (enableDns && config.ENABLE_DNS) {
    try {
      dns = await startDnsListener({
        host: config.DNS_HOST,
        port: config.DNS_PORT,
        maxInFlight: config.DNS_MAX_INFLIGHT,
        logger: app.log,
        handler: createQueryHandler({ ...ctx, forwarder, logger: app.log, clock: options.clock })
      });
    } catch (err) {
      unsubscribe();
      await app.close();
      throw err;
    }
  }

  await app.ready();

  async function close(): Promise<void> {
    unsubscribe();
    try {
      await dns?.close();
    } catch (err) {
      app.log.warn({ err }, 'failed to close DNS listener');
    }
    await writer?.flush();
    await app.close();
  }

  return { app, ctx, dns, close };
}
