import { createRule, formatMinutes, formatTarget, type Rule, type RuleInput, type RuleResult } from './rule.js';
import { EMPTY_SNAPSHOT, withRule, withoutPattern, withToggled, type RuleSnapshot } from './snapshot.js';

export type MaintenanceState = {
  readonly active: boolean;
  readonly message: string;
};

/** On-disk shape of one rule: `ip` is an address or `REFUSED`, times are `HH:MM`. */
export type PersistedRule = {
  pattern: string;
  ip: string;
  start: string;
  end: string;
  enabled: boolean;
};

export type PersistedState = {
  rules: PersistedRule[];
  maintenance: boolean;
};

export type RuleStoreChange = 'rules' | 'maintenance';

export function toPersistedRule(rule: Rule): PersistedRule {
  return {
    pattern: rule.pattern,
    ip: formatTarget(rule.target),
    start: formatMinutes(rule.window.start),
    end: formatMinutes(rule.window.end),
    enabled: rule.enabled
  };
}

/**
 * Holds the published rule snapshot and the maintenance flag.
 *
 * Readers take `current()` once per query and keep that reference; writers build a new snapshot
 * from the current one and swap the reference. Nothing is ever edited in place, so a reader can
 * never see a half-applied change.
 */
export class RuleStore {
  private snapshot: RuleSnapshot;
  private maintenanceState: MaintenanceState;
  private readonly listeners = new Set<(change: RuleStoreChange) => void>();

  constructor(opts: { snapshot?: RuleSnapshot; maintenance?: boolean; maintenanceMessage: string }) {
    this.snapshot = opts.snapshot ?? EMPTY_SNAPSHOT;
    this.maintenanceState = Object.freeze({ active: opts.maintenance ?? false, message: opts.maintenanceMessage });
  }

  current(): RuleSnapshot {
    return this.snapshot;
  }

  publish(next: RuleSnapshot): void {
    this.snapshot = next;
    this.emit('rules');
  }

  maintenance(): MaintenanceState {
    return this.maintenanceState;
  }

  setMaintenance(active: boolean): MaintenanceState {
    this.maintenanceState = Object.freeze({ active, message: this.maintenanceState.message });
    this.emit('maintenance');
    return this.maintenanceState;
  }

  addRule(input: RuleInput): RuleResult {
    const res = createRule(input);
    if (!res.ok) return res;
    this.publish(withRule(this.snapshot, res.rule));
    return res;
  }

  /** Returns how many rules were removed; nothing is published when it is 0. */
  removeRule(pattern: string): number {
    const { snapshot, count } = withoutPattern(this.snapshot, pattern);
    if (count > 0) this.publish(snapshot);
    return count;
  }

  /** Returns how many rules were toggled; nothing is published when it is 0. */
  toggleRule(pattern: string): number {
    const { snapshot, count } = withToggled(this.snapshot, pattern);
    if (count > 0) this.publish(snapshot);
    return count;
  }

  onChange(listener: (change: RuleStoreChange) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  toPersisted(): PersistedState {
    return {
      rules: this.snapshot.rules.map(toPersistedRule),
      maintenance: this.maintenanceState.active
    };
  }

  private emit(change: RuleStoreChange): void {
    for (const listener of this.listeners) listener(change);
  }
}
