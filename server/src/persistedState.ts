import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import type { Logger } from './logger.js';
import { createRuleFromClock, type Rule } from './rules/rule.js';
import type { PersistedState } from './rules/ruleStore.js';

const persistedRuleSchema = z.object({
  pattern: z.string(),
  ip: z.string(),
  start: z.string().optional(),
  end: z.string().optional(),
  enabled: z.boolean().optional()
});

const persistedStateSchema = z.object({
  rules: z.array(z.unknown()).optional().default([]),
  maintenance: z.boolean().optional().default(false)
});

export type LoadedState = {
  rules: Rule[];
  maintenance: boolean;
  skipped: number;
};

function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/**
 * Reads the state file once at startup. A missing file is an empty state; a file that is not
 * valid JSON of the expected shape throws. Individual rules that fail validation are skipped.
 */
export function loadPersistedState(filePath: string, logger: Logger): LoadedState {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      logger.info({ filePath }, 'no state file yet, starting with an empty rule set');
      return { rules: [], maintenance: false, skipped: 0 };
    }
    throw err;
  }

  const parsed = persistedStateSchema.parse(JSON.parse(text));

  const rules: Rule[] = [];
  let skipped = 0;
  parsed.rules.forEach((raw, index) => {
    const shape = persistedRuleSchema.safeParse(raw);
    if (!shape.success) {
      skipped += 1;
      logger.warn({ index }, 'skipping malformed rule in state file');
      return;
    }
    const res = createRuleFromClock(shape.data);
    if (!res.ok) {
      skipped += 1;
      logger.warn({ index, pattern: shape.data.pattern, code: res.error.code }, res.error.message);
      return;
    }
    rules.push(res.rule);
  });

  return { rules, maintenance: parsed.maintenance, skipped };
}

export function writePersistedState(filePath: string, state: PersistedState): void {
  ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, `${JSON.stringify(state, null, 2)}\n`, 'utf8');
  fs.renameSync(tmpPath, filePath);
}

export type StateWriter = {
  save: (state: PersistedState) => Promise<boolean>;
  /** Resolves once every queued save has finished. */
  flush: () => Promise<void>;
};

/** Saves run one after another in call order, so the file always ends up with the latest state. */
export function createStateWriter(filePath: string, logger: Logger): StateWriter {
  let chain: Promise<unknown> = Promise.resolve();

  const save = (state: PersistedState): Promise<boolean> => {
    const next = chain.then(() => {
      try {
        writePersistedState(filePath, state);
        return true;
      } catch (err) {
        logger.error({ err, filePath }, 'failed to write state file');
        return false;
      }
    });
    chain = next;
    return next;
  };

  return {
    save,
    flush: async () => {
      await chain;
    }
  };
}
