/**
 * Explicit cooking-time patterns over normalized tokens.
 *
 * "under 30 minutes", "less than an hour", "within 2 hours", "30 minutes or less",
 * "20 min meals" → upper bound; "over 2 hours", "at least 90 minutes",
 * "an hour or more" → lower bound.
 */

import type { TimeConstraint } from '../types.js';

export interface TimeMatch {
  readonly constraint: TimeConstraint;
  /** Token span [start, end) covered by the pattern */
  readonly start: number;
  readonly end: number;
}

type Bound = 'max' | 'min';

interface Affix {
  readonly tokens: readonly string[];
  readonly bound: Bound;
}

const UNIT_MINUTES = new Map<string, number>([
  ['m', 1], ['min', 1], ['mins', 1], ['minute', 1], ['minutes', 1],
  ['h', 60], ['hr', 60], ['hrs', 60], ['hour', 60], ['hours', 60],
]);

const NUMBER_WORDS = new Map<string, number>([
  ['a', 1], ['an', 1], ['one', 1], ['two', 2], ['three', 3], ['four', 4], ['five', 5],
  ['six', 6], ['ten', 10], ['fifteen', 15], ['twenty', 20], ['thirty', 30],
  ['forty', 40], ['fifty', 50], ['sixty', 60], ['ninety', 90],
]);

const COMPACT_DURATION = /^(\d+)(m|min|mins|minute|minutes|h|hr|hrs|hour|hours)$/;

const PREFIXES: readonly Affix[] = sortLongestFirst([
  { tokens: ['no', 'more', 'than'], bound: 'max' },
  { tokens: ['not', 'more', 'than'], bound: 'max' },
  { tokens: ['in', 'less', 'than'], bound: 'max' },
  { tokens: ['in', 'under'], bound: 'max' },
  { tokens: ['less', 'than'], bound: 'max' },
  { tokens: ['fewer', 'than'], bound: 'max' },
  { tokens: ['at', 'most'], bound: 'max' },
  { tokens: ['up', 'to'], bound: 'max' },
  { tokens: ['under'], bound: 'max' },
  { tokens: ['within'], bound: 'max' },
  { tokens: ['below'], bound: 'max' },
  { tokens: ['in'], bound: 'max' },
  { tokens: ['max'], bound: 'max' },
  { tokens: ['maximum'], bound: 'max' },
  { tokens: ['more', 'than'], bound: 'min' },
  { tokens: ['longer', 'than'], bound: 'min' },
  { tokens: ['at', 'least'], bound: 'min' },
  { tokens: ['upwards', 'of'], bound: 'min' },
  { tokens: ['over'], bound: 'min' },
  { tokens: ['minimum'], bound: 'min' },
]);

const SUFFIXES: readonly Affix[] = sortLongestFirst([
  { tokens: ['or', 'less'], bound: 'max' },
  { tokens: ['or', 'under'], bound: 'max' },
  { tokens: ['or', 'fewer'], bound: 'max' },
  { tokens: ['max'], bound: 'max' },
  { tokens: ['tops'], bound: 'max' },
  { tokens: ['or', 'more'], bound: 'min' },
  { tokens: ['or', 'longer'], bound: 'min' },
  { tokens: ['plus'], bound: 'min' },
  { tokens: ['minimum'], bound: 'min' },
]);

interface Duration {
  readonly minutes: number;
  readonly length: number;
  /** Written with digits ("30 min"), as opposed to words ("an hour") */
  readonly numeric: boolean;
}

/**
 * Find the first explicit time expression, by token position.
 * Tokens in `consumed` are never part of a match.
 */
export function findExplicitTime(
  tokens: readonly string[],
  consumed: ReadonlySet<number> = new Set()
): TimeMatch | null {
  for (let i = 0; i < tokens.length; i++) {
    const duration = parseDuration(tokens, i);
    if (!duration || duration.minutes <= 0) continue;

    const durationEnd = i + duration.length;
    const prefix = PREFIXES.find(p => matchesAt(tokens, p.tokens, i - p.tokens.length));
    const suffix = SUFFIXES.find(s => matchesAt(tokens, s.tokens, durationEnd));

    // A suffix states the direction more precisely than a bare "in"
    const affix = suffix ?? prefix;
    if (!affix && !duration.numeric) continue;

    const start = prefix && (!suffix || prefix.bound === suffix.bound) ? i - prefix.tokens.length : i;
    const end = suffix ? durationEnd + suffix.tokens.length : durationEnd;
    if (spanTouches(consumed, start, end)) continue;

    const bound: Bound = affix?.bound ?? 'max';
    return {
      constraint: {
        label: 'explicit',
        maxMinutes: bound === 'max' ? duration.minutes : null,
        minMinutes: bound === 'min' ? duration.minutes : null,
      },
      start,
      end,
    };
  }
  return null;
}

function parseDuration(tokens: readonly string[], i: number): Duration | null {
  const head = tokens[i];
  if (head === undefined) return null;

  if (head === 'half') {
    if (isHourUnit(tokens[i + 1])) return { minutes: 30, length: 2, numeric: false };
    if ((tokens[i + 1] === 'an' || tokens[i + 1] === 'a') && isHourUnit(tokens[i + 2])) {
      return { minutes: 30, length: 3, numeric: false };
    }
    return null;
  }

  const compact = COMPACT_DURATION.exec(head);
  if (compact) {
    const unit = UNIT_MINUTES.get(compact[2]);
    return unit === undefined ? null : { minutes: Number(compact[1]) * unit, length: 1, numeric: true };
  }

  const unitToken = tokens[i + 1];
  const unit = unitToken === undefined ? undefined : UNIT_MINUTES.get(unitToken);
  if (unit === undefined) return null;

  if (/^\d+$/.test(head)) {
    return { minutes: Number(head) * unit, length: 2, numeric: true };
  }
  const word = NUMBER_WORDS.get(head);
  return word === undefined ? null : { minutes: word * unit, length: 2, numeric: false };
}

function isHourUnit(token: string | undefined): boolean {
  return token !== undefined && UNIT_MINUTES.get(token) === 60;
}

function matchesAt(tokens: readonly string[], sequence: readonly string[], start: number): boolean {
  if (start < 0 || start + sequence.length > tokens.length) return false;
  return sequence.every((t, k) => tokens[start + k] === t);
}

function spanTouches(consumed: ReadonlySet<number>, start: number, end: number): boolean {
  for (let k = start; k < end; k++) {
    if (consumed.has(k)) return true;
  }
  return false;
}

function sortLongestFirst(affixes: Affix[]): Affix[] {
  return [...affixes].sort((a, b) => b.tokens.length - a.tokens.length);
}
