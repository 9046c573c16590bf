import { normalizeName, withEnabled, type Rule } from './rule.js';

/**
 * Immutable, ordered view of all rules. Insertion order is the tie-break order for matching.
 * A new snapshot is built for every change; published snapshots are never edited.
 */
export type RuleSnapshot = {
  readonly version: number;
  readonly rules: readonly Rule[];
};

export function createSnapshot(rules: readonly Rule[], version = 0): RuleSnapshot {
  return Object.freeze({ version, rules: Object.freeze([...rules]) });
}

export const EMPTY_SNAPSHOT: RuleSnapshot = createSnapshot([]);

export function withRule(snapshot: RuleSnapshot, rule: Rule): RuleSnapshot {
  return createSnapshot([...snapshot.rules, rule], snapshot.version + 1);
}

/** Drops every rule with the given pattern. Returns the input snapshot when nothing matched. */
export function withoutPattern(snapshot: RuleSnapshot, pattern: string): { snapshot: RuleSnapshot; count: number } {
  const key = normalizeName(pattern);
  const kept = snapshot.rules.filter((r) => r.pattern !== key);
  const count = snapshot.rules.length - kept.length;
  if (count === 0) return { snapshot, count };
  return { snapshot: createSnapshot(kept, snapshot.version + 1), count };
}

/** Flips `enabled` on every rule with the given pattern. */
export function withToggled(snapshot: RuleSnapshot, pattern: string): { snapshot: RuleSnapshot; count: number } {
  const key = normalizeName(pattern);
  let count = 0;
  const next = snapshot.rules.map((r) => {
    if (r.pattern !== key) return r;
    count += 1;
    return withEnabled(r, !r.enabled);
  });
  if (count === 0) return { snapshot, count };
  return { snapshot: createSnapshot(next, snapshot.version + 1), count };
}
