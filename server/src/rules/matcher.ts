import { MINUTES_PER_DAY, normalizeName, type Rule, type RuleWindow } from './rule.js';
import type { RuleSnapshot } from './snapshot.js';

export type Decision = { kind: 'block'; rule: Rule } | { kind: 'pass' };

export function minutesOfDay(now: Date): number {
  return now.getHours() * 60 + now.getMinutes();
}

export function isWithinWindow(window: RuleWindow, nowMinutes: number): boolean {
  const { start, end } = window;
  if (start === end) return true;
  const t = ((Math.floor(nowMinutes) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  if (start < end) return t >= start && t < end;
  // Spans midnight.
  return t >= start || t < end;
}

/** `name` must already be normalized. Wildcards need at least one extra label. */
export function patternMatches(rule: Rule, name: string): boolean {
  if (!rule.wildcard) return rule.pattern === name;
  return name !== rule.suffix && name.endsWith(`.${rule.suffix}`);
}

function labelCount(name: string): number {
  return name.split('.').filter(Boolean).length;
}

/** Higher wins: exact patterns outrank every wildcard, longer wildcard suffixes outrank shorter ones. */
function specificity(rule: Rule): number {
  return rule.wildcard ? labelCount(rule.suffix) : Number.MAX_SAFE_INTEGER;
}

export function decide(name: string, snapshot: RuleSnapshot, nowMinutes: number): Decision {
  const q = normalizeName(name);
  if (!q) return { kind: 'pass' };

  let best: Rule | null = null;
  let bestScore = -1;

  for (const rule of snapshot.rules) {
    if (!rule.enabled) continue;
    if (!patternMatches(rule, q)) continue;
    if (!isWithinWindow(rule.window, nowMinutes)) continue;

    // Strictly greater keeps the earliest rule on ties.
    const score = specificity(rule);
    if (score > bestScore) {
      best = rule;
      bestScore = score;
    }
  }

  return best ? { kind: 'block', rule: best } : { kind: 'pass' };
}
