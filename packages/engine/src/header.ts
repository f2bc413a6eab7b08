import Decimal from 'decimal.js';
import { DateTime } from 'luxon';
import { HeaderFormatError } from './errors';
import { Currency, GameType, GameVariant, HandHeader, Limit, ParserOptions } from './types';

const AMOUNT = String.raw`\d+(?:\.\d+)?`;
const MONEY = String.raw`[$€£]?${AMOUNT}`;

const HEADER_RE = new RegExp(
  [
    String.raw`^PokerStars\s+(?:Zoom\s+)?Hand\s+#(?<handId>\d+):\s+`,
    String.raw`(?:Tournament\s+#(?<tournamentId>\d+),\s+`,
    String.raw`(?:(?<freeroll>Freeroll)|(?<buyIn>${MONEY})(?:\+(?<bounty>${MONEY})(?=\+))?(?:\+(?<rake>${MONEY}))?`,
    String.raw`(?:\s+(?<buyInCurrency>[A-Z]{2,3}))?)\s+)?`,
    String.raw`(?<game>.+?)\s+(?<limit>(?:Pot\s+|No\s+|Fixed\s+)?Limit)\s+`,
    String.raw`(?:-\s+Level\s+(?<level>\S+)\s+)?`,
    String.raw`\((?<blinds>[^)]*)\)\s+`,
    String.raw`-\s+(?:.+?\s+\[(?<date>[^\]]+)\]|(?<plainDate>\d{4}\/\d{1,2}\/\d{1,2}\s+\d{1,2}:\d{2}:\d{2}\s+ET))\s*$`,
  ].join('')
);

const HAND_ID_RE = /Hand\s+#(\d+)/;
const CHIP_BLINDS_RE = new RegExp(String.raw`^(${AMOUNT})\/(${AMOUNT})$`);
const MONEY_BLINDS_RE = new RegExp(String.raw`^([$€£])(${AMOUNT})\/([$€£])(${AMOUNT})(?:\s+([A-Z]{2,3}))?$`);
const DATE_FORMAT = 'yyyy/M/d H:mm:ss';

const GAMES: Record<string, GameVariant> = {
  "Hold'em": 'holdem',
  Omaha: 'omaha',
  'Omaha Hi/Lo': 'omahaHiLo',
};

const LIMITS: Record<string, Limit> = {
  'No Limit': 'noLimit',
  'Pot Limit': 'potLimit',
  'Fixed Limit': 'fixedLimit',
  Limit: 'fixedLimit',
};

const CURRENCY_CODES: readonly Currency[] = ['USD', 'EUR', 'GBP', 'SC'];

const CURRENCY_SYMBOLS: Record<string, Currency> = {
  $: 'USD',
  '€': 'EUR',
  '£': 'GBP',
};

/** The blinds group resolves to exactly one of these, or the line is rejected. */
type BlindsMatch =
  | { kind: 'chips'; smallBlind: Decimal; bigBlind: Decimal }
  | { kind: 'money'; smallBlind: Decimal; bigBlind: Decimal; currency: Currency };

interface HeaderContext {
  line: string;
  handId: string | null;
}

function fail(context: HeaderContext, reason: string): never {
  throw new HeaderFormatError(`Invalid hand header, ${reason}: ${context.line}`, context.line, context.handId);
}

function toCurrency(context: HeaderContext, code: string): Currency {
  const currency = CURRENCY_CODES.find((candidate) => candidate === code);
  return currency ?? fail(context, `unknown currency ${code}`);
}

function stripSymbol(money: string): { value: Decimal; symbol: string | null } {
  const symbol = /^[$€£]/.exec(money)?.[0] ?? null;
  return { value: new Decimal(symbol ? money.slice(symbol.length) : money), symbol };
}

function matchBlinds(context: HeaderContext, text: string): BlindsMatch {
  const chips = CHIP_BLINDS_RE.exec(text);
  const money = MONEY_BLINDS_RE.exec(text);
  if (chips && money) fail(context, 'ambiguous blinds');
  if (chips) {
    return { kind: 'chips', smallBlind: new Decimal(chips[1]), bigBlind: new Decimal(chips[2]) };
  }
  if (money) {
    const [, sbSymbol, sb, bbSymbol, bb, code] = money;
    if (sbSymbol !== bbSymbol) fail(context, 'mixed blind currencies');
    const currency = code ? toCurrency(context, code) : CURRENCY_SYMBOLS[sbSymbol];
    return { kind: 'money', smallBlind: new Decimal(sb), bigBlind: new Decimal(bb), currency };
  }
  return fail(context, `unreadable blinds (${text})`);
}

function parseDate(context: HeaderContext, text: string, timeZone: string): Date {
  const local = text.replace(/\s+ET$/, '').trim();
  const date = DateTime.fromFormat(local, DATE_FORMAT, { zone: timeZone });
  if (!date.isValid) fail(context, `unreadable date ${text}`);
  return date.toJSDate();
}

interface TournamentGroups {
  tournamentId: string;
  freeroll?: string;
  buyIn?: string;
  bounty?: string;
  rake?: string;
  buyInCurrency?: string;
}

function resolveTournament(
  context: HeaderContext,
  groups: TournamentGroups,
  level: string | null,
  freerollCurrency: Currency
): { gameType: GameType; currency: Currency | null } {
  if (groups.freeroll) {
    const currency = groups.buyInCurrency ? toCurrency(context, groups.buyInCurrency) : freerollCurrency;
    return {
      gameType: {
        kind: 'tournament',
        id: groups.tournamentId,
        level,
        freeroll: true,
        buyIn: new Decimal(0),
        bounty: null,
        rake: new Decimal(0),
      },
      currency,
    };
  }
  if (!groups.buyIn) fail(context, 'tournament without buy-in');
  const buyIn = stripSymbol(groups.buyIn);
  const bounty = groups.bounty ? stripSymbol(groups.bounty).value : null;
  const rake = groups.rake ? stripSymbol(groups.rake).value : new Decimal(0);
  let currency: Currency | null = null;
  if (groups.buyInCurrency) {
    currency = toCurrency(context, groups.buyInCurrency);
  } else if (buyIn.symbol) {
    currency = CURRENCY_SYMBOLS[buyIn.symbol];
  }
  return {
    gameType: {
      kind: 'tournament',
      id: groups.tournamentId,
      level,
      freeroll: false,
      buyIn: buyIn.value,
      bounty,
      rake,
    },
    currency,
  };
}

/** Best-effort hand id for error context; the header itself may be broken. */
export function probeHandId(line: string): string | null {
  return HAND_ID_RE.exec(line)?.[1] ?? null;
}

/**
 * Reads the first line of a hand. The line either matches one consistent
 * branch of the grammar or is rejected as a whole; there is no partial header.
 */
export function parseHeaderLine(line: string, options: ParserOptions): HandHeader {
  const context: HeaderContext = { line, handId: probeHandId(line) };
  const groups = HEADER_RE.exec(line.trim())?.groups;
  if (!groups) fail(context, 'no known format matched');

  const variant = GAMES[groups.game] ?? fail(context, `unsupported game ${groups.game}`);
  const limit = LIMITS[groups.limit.replace(/\s+/g, ' ')] ?? fail(context, `unknown limit ${groups.limit}`);
  const blinds = matchBlinds(context, groups.blinds.trim());
  const level = groups.level ?? null;

  let gameType: GameType;
  let currency: Currency | null;
  if (groups.tournamentId) {
    if (blinds.kind === 'money') fail(context, 'tournament blinds must be chip amounts');
    ({ gameType, currency } = resolveTournament(
      context,
      { ...groups, tournamentId: groups.tournamentId },
      level,
      options.freerollCurrency
    ));
  } else {
    if (level !== null) fail(context, 'blind level outside a tournament');
    gameType = { kind: 'cash' };
    currency = blinds.kind === 'money' ? blinds.currency : null;
  }

  const dateText = groups.date ?? groups.plainDate;
  if (!dateText) fail(context, 'missing date');

  return {
    handId: groups.handId,
    gameType,
    currency,
    moneyType: currency ? 'real' : 'play',
    smallBlind: blinds.smallBlind,
    bigBlind: blinds.bigBlind,
    limit,
    variant,
    date: parseDate(context, dateText, options.timeZone),
  };
}
