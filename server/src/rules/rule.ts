import ipaddr from 'ipaddr.js';

export const MINUTES_PER_DAY = 24 * 60;

export type RuleTarget =
  | { kind: 'refuse' }
  | { kind: 'address'; family: 4 | 6; address: string };

/** Daily `[start, end)` interval in minutes since local midnight. `start === end` is all day. */
export type RuleWindow = {
  start: number;
  end: number;
};

export type Rule = {
  readonly pattern: string;
  readonly wildcard: boolean;
  /** For wildcards, the part after `*.`; for exact patterns, the pattern itself. */
  readonly suffix: string;
  readonly target: RuleTarget;
  readonly window: Readonly<RuleWindow>;
  readonly enabled: boolean;
};

export type RuleInput = {
  pattern: string;
  target: string;
  window?: RuleWindow;
  enabled?: boolean;
};

export type RuleValidationCode = 'INVALID_PATTERN' | 'INVALID_TARGET' | 'INVALID_WINDOW';

export class RuleValidationError extends Error {
  readonly code: RuleValidationCode;

  constructor(code: RuleValidationCode, message: string) {
    super(message);
    this.name = 'RuleValidationError';
    this.code = code;
  }
}

export type RuleResult = { ok: true; rule: Rule } | { ok: false; error: RuleValidationError };

export const ALL_DAY: Readonly<RuleWindow> = Object.freeze({ start: 0, end: 0 });

const REFUSE_KEYWORD = 'REFUSED';
const LABEL_RE = /^[a-z0-9_](?:[a-z0-9_-]*[a-z0-9_])?$/;
const OCTET = '(?:25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)';
const IPV4_RE = new RegExp(`^${OCTET}(?:\\.${OCTET}){3}$`);

/** Lower-cases, trims and leaves exactly one trailing dot. Empty input stays empty. */
export function normalizeName(name: string): string {
  const n = String(name ?? '').trim().toLowerCase().replace(/\.+$/, '');
  return n ? `${n}.` : '';
}

function isValidHostname(name: string): boolean {
  const bare = name.slice(0, -1);
  if (!bare || bare.length > 253) return false;
  return bare.split('.').every((label) => label.length <= 63 && LABEL_RE.test(label));
}

export function parsePattern(input: string): { pattern: string; wildcard: boolean; suffix: string } | null {
  const pattern = normalizeName(input);
  if (!pattern) return null;

  if (pattern.startsWith('*.')) {
    const suffix = pattern.slice(2);
    if (!suffix || !isValidHostname(suffix)) return null;
    return { pattern, wildcard: true, suffix };
  }

  if (!isValidHostname(pattern)) return null;
  return { pattern, wildcard: false, suffix: pattern };
}

export function parseTarget(input: string): RuleTarget | null {
  const raw = String(input ?? '').trim();
  if (!raw) return null;
  if (raw.toUpperCase() === REFUSE_KEYWORD) return { kind: 'refuse' };

  if (IPV4_RE.test(raw)) {
    return { kind: 'address', family: 4, address: raw };
  }
  // Zone ids cannot be carried in an AAAA record.
  if (raw.includes(':') && !raw.includes('%') && ipaddr.IPv6.isValid(raw)) {
    return { kind: 'address', family: 6, address: ipaddr.IPv6.parse(raw).toString() };
  }
  return null;
}

export function formatTarget(target: RuleTarget): string {
  return target.kind === 'refuse' ? REFUSE_KEYWORD : target.address;
}

export function parseTimeToMinutes(value: string): number | null {
  const m = /^\s*(\d{1,2}):(\d{2})\s*$/.exec(String(value ?? ''));
  if (!m) return null;
  const hh = Number(m[1]);
  const mm = Number(m[2]);
  if (hh > 23 || mm > 59) return null;
  return hh * 60 + mm;
}

export function formatMinutes(minutes: number): string {
  const hh = Math.floor(minutes / 60);
  const mm = minutes % 60;
  return `${String(hh).padStart(2, '0')}:${String(mm).padStart(2, '0')}`;
}

function isMinuteOfDay(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < MINUTES_PER_DAY;
}

export function createRule(input: RuleInput): RuleResult {
  const parsed = parsePattern(input.pattern);
  if (!parsed) {
    return {
      ok: false,
      error: new RuleValidationError('INVALID_PATTERN', `Invalid pattern: ${JSON.stringify(input.pattern)}`)
    };
  }

  const target = parseTarget(input.target);
  if (!target) {
    return {
      ok: false,
      error: new RuleValidationError(
        'INVALID_TARGET',
        `Target must be ${REFUSE_KEYWORD} or an IPv4/IPv6 address, got ${JSON.stringify(input.target)}`
      )
    };
  }

  const window = input.window ?? ALL_DAY;
  if (!isMinuteOfDay(window.start) || !isMinuteOfDay(window.end)) {
    return {
      ok: false,
      error: new RuleValidationError('INVALID_WINDOW', `Window bounds must be within 0..${MINUTES_PER_DAY - 1}`)
    };
  }

  const rule: Rule = Object.freeze({
    pattern: parsed.pattern,
    wildcard: parsed.wildcard,
    suffix: parsed.suffix,
    target: Object.freeze(target),
    window: Object.freeze({ start: window.start, end: window.end }),
    enabled: input.enabled ?? true
  });
  return { ok: true, rule };
}

/**
 * Parses the `HH:MM` pair used by the admin API and the state file. A rule needs both bounds to be
 * time-limited; with either one missing it is active all day. Bounds that are given must still parse.
 */
export function parseClockWindow(start?: string, end?: string): RuleWindow | RuleValidationError {
  const startRaw = start?.trim() ?? '';
  const endRaw = end?.trim() ?? '';

  const s = startRaw ? parseTimeToMinutes(startRaw) : null;
  const e = endRaw ? parseTimeToMinutes(endRaw) : null;
  if ((startRaw && s == null) || (endRaw && e == null)) {
    return new RuleValidationError('INVALID_WINDOW', `Times must be HH:MM, got ${JSON.stringify(`${startRaw}-${endRaw}`)}`);
  }
  if (s == null || e == null) return ALL_DAY;
  return { start: s, end: e };
}

export type ClockRuleInput = {
  pattern: string;
  ip: string;
  start?: string;
  end?: string;
  enabled?: boolean;
};

export function toRuleInput(input: ClockRuleInput): RuleInput | RuleValidationError {
  const window = parseClockWindow(input.start, input.end);
  if (window instanceof RuleValidationError) return window;
  return { pattern: input.pattern, target: input.ip, window, enabled: input.enabled };
}

export function createRuleFromClock(input: ClockRuleInput): RuleResult {
  const ruleInput = toRuleInput(input);
  if (ruleInput instanceof RuleValidationError) return { ok: false, error: ruleInput };
  return createRule(ruleInput);
}

export function withEnabled(rule: Rule, enabled: boolean): Rule {
  return Object.freeze({ ...rule, enabled });
}
