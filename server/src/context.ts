import type { QueryLog } from './queryLog.js';
import type { RuleStore } from './rules/ruleStore.js';
import type { StatsRecorder } from './stats/statsRecorder.js';

/** Shared in-memory state handed to the DNS side and to every admin route. */
export type AppContext = {
  store: RuleStore;
  stats: StatsRecorder;
  queryLog: QueryLog;
};
