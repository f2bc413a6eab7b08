import Decimal from 'decimal.js';
import { parseCombo } from './cards';
import type { Report } from './diagnostics';
import { UnrecognizedActionError } from './errors';
import { BettingActionKind, PlayerAction, PresenceActionKind } from './types';

const AMOUNT = String.raw`\d+(?:\.\d+)?`;
const AMOUNT_RE = new RegExp(AMOUNT);
const UNCALLED_RE = new RegExp(String.raw`^Uncalled bet \([^\d]*?(${AMOUNT})\) returned to\s+(.+)$`);
const COLLECTED_RE = new RegExp(String.raw`^(.+?) collected [^\d]*?(${AMOUNT}) from (?:main |side )?pot`);
const JOIN_RE = /^(.+?) joins the table at seat #(\d+)$/;
const BRACKETS_RE = /\[([^\]]*)\]/;
const ALL_IN_RE = /\band is all-in\b/;

const VERBS: Record<string, BettingActionKind> = {
  fold: 'fold',
  folds: 'fold',
  folded: 'fold',
  check: 'check',
  checks: 'check',
  checked: 'check',
  call: 'call',
  calls: 'call',
  called: 'call',
  bet: 'bet',
  bets: 'bet',
  raise: 'raise',
  raises: 'raise',
  raised: 'raise',
  post: 'post',
  posts: 'post',
  posted: 'post',
};

export interface ActionRule {
  name: string;
  test: (line: string) => boolean;
  extract: (line: string) => PlayerAction | null;
}

export type ClassifyResult =
  | { ok: true; action: PlayerAction }
  | { ok: false; error: UnrecognizedActionError };

/** Text before `anchor`, or null when the anchor is missing or nothing precedes it. */
function nameBefore(line: string, anchor: string): string | null {
  const index = line.indexOf(anchor);
  if (index <= 0) return null;
  const name = line.slice(0, index).trim();
  return name.length > 0 ? name : null;
}

function colonName(line: string, fallbackAnchor: string): string | null {
  return nameBefore(line, ': ') ?? nameBefore(line, fallbackAnchor);
}

function presenceRule(kind: Exclude<PresenceActionKind, 'muck'>, anchor: string): ActionRule {
  return {
    name: kind,
    test: (line) => line.includes(anchor),
    extract: (line) => {
      const name = nameBefore(line, anchor);
      return name ? { kind, name } : null;
    },
  };
}

function parsePlayerAction(line: string): PlayerAction | null {
  const name = nameBefore(line, ': ');
  if (!name) return null;
  const rest = line.slice(line.indexOf(': ') + 2).trim();
  const verb = /^\S+/.exec(rest)?.[0].toLowerCase() ?? '';
  const kind = VERBS[verb];
  if (!kind) return null;
  const amount = AMOUNT_RE.exec(rest.slice(verb.length))?.[0];
  return {
    kind,
    name,
    amount: amount === undefined ? null : new Decimal(amount),
    allIn: ALL_IN_RE.test(rest),
  };
}

/**
 * Classifier rules, most specific first. Several kinds share vocabulary
 * ("collected" shows up in win lines and in showdown recaps), so the order
 * is part of the grammar.
 */
export const ACTION_RULES: readonly ActionRule[] = [
  {
    name: 'return',
    test: (line) => line.startsWith('Uncalled bet'),
    extract: (line) => {
      const match = UNCALLED_RE.exec(line);
      return match ? { kind: 'return', name: match[2].trim(), amount: new Decimal(match[1]) } : null;
    },
  },
  {
    name: 'win',
    test: (line) => line.includes(' collected '),
    extract: (line) => {
      const match = COLLECTED_RE.exec(line);
      return match ? { kind: 'win', name: match[1], amount: new Decimal(match[2]) } : null;
    },
  },
  {
    name: 'muck',
    test: (line) => line.includes(" doesn't show hand") || line.includes('mucks hand'),
    extract: (line) => {
      const name = colonName(line, line.includes('mucks hand') ? ' mucks hand' : " doesn't show hand");
      return name ? { kind: 'muck', name } : null;
    },
  },
  {
    name: 'join',
    test: (line) => line.includes('joins the table'),
    extract: (line) => {
      const match = JOIN_RE.exec(line);
      return match ? { kind: 'join', name: match[1], seat: Number(match[2]) } : null;
    },
  },
  presenceRule('leave', ' leaves the table'),
  presenceRule('timedOut', ' has timed out'),
  presenceRule('connected', ' is connected'),
  presenceRule('disconnected', ' is disconnected'),
  presenceRule('removed', ' was removed'),
  {
    name: 'show',
    test: (line) => line.includes(' shows '),
    extract: (line) => {
      const name = colonName(line, ' shows ');
      const cards = BRACKETS_RE.exec(line);
      if (!name || !cards) return null;
      return { kind: 'show', name, combo: parseCombo(cards[1]) };
    },
  },
  {
    name: 'player',
    test: (line) => line.includes(': '),
    extract: parsePlayerAction,
  },
];

/**
 * Classifies one trimmed line of hand-body text. Throws only when a shown
 * card set is itself invalid; any other unknown line comes back as
 * `{ ok: false }`.
 */
export function classifyAction(line: string): ClassifyResult {
  const text = line.trim();
  for (const rule of ACTION_RULES) {
    if (!rule.test(text)) continue;
    const action = rule.extract(text);
    if (action) return { ok: true, action };
  }
  return { ok: false, error: new UnrecognizedActionError(text) };
}

/** Classifies a group of lines, reporting and dropping the unknown ones. */
export function classifyActions(lines: readonly string[], report: Report): PlayerAction[] | null {
  const actions: PlayerAction[] = [];
  for (const line of lines) {
    const result = classifyAction(line);
    if (result.ok) {
      actions.push(result.action);
    } else {
      report('unrecognized-action', result.error.message, line);
    }
  }
  return actions.length > 0 ? actions : null;
}
