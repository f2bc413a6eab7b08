import Decimal from 'decimal.js';
import { IANAZone } from 'luxon';
import { classifyActions } from './actions';
import { findCards, holeCardCount, parseCombo } from './cards';
import { DiagnosticsCollector, type Report } from './diagnostics';
import { attachHandId, HandFormatError, HeaderFormatError, InvalidComboError } from './errors';
import { parseHeaderLine } from './header';
import { findSection, HandSection, splitSections } from './sections';
import { buildFlop, buildStreet } from './street';
import { Card, Hand, HandBody, HandHeader, ParserOptions, PlayerAction, Seat } from './types';

export const DEFAULT_OPTIONS: ParserOptions = {
  timeZone: 'America/New_York',
  freerollCurrency: 'USD',
};

const TABLE_RE = /^Table '(?<name>.*)' (?<max>\d+)-max(?: \(Play Money\))? Seat #(?<button>\d+) is the button/;
const SEAT_RE =
  /^Seat (?<seat>\d+): (?<name>.+?) \([$€£]?(?<stack>\d+(?:\.\d+)?) in chips(?:,[^)]*)?\)(?<sittingOut> is sitting out)?/;
const HERO_RE = /^Dealt to (?<name>.+?) \[(?<cards>[^\]]+)\]/;
const POT_RE = /^Total pot [^\d]*?(?<pot>\d+(?:\.\d+)?) .*\| Rake [^\d]*?(?<rake>\d+(?:\.\d+)?)/;
const POSITION = String.raw`(?: \((?:button|small blind|big blind)\))*`;
const COLLECTED_RE = new RegExp(String.raw`^Seat \d+: (?<name>.+?)${POSITION} collected \(`);
const SHOWED_WON_RE = new RegExp(String.raw`^Seat \d+: (?<name>.+?)${POSITION} showed \[.+?\] and won`);
const COLLECTED_FROM_POT_RE = /^(?<name>.+?) collected [^\d]*?\d+(?:\.\d+)? from (?:main |side )?pot/;

export type HandHistoryStatus = 'unparsed' | 'headerParsed' | 'fullyParsed';

export type HandHistoryState =
  | { status: 'unparsed' }
  | { status: 'headerParsed'; header: HandHeader; sections: HandSection[] }
  | { status: 'fullyParsed'; hand: Hand };

function resolveOptions(options?: Partial<ParserOptions>): ParserOptions {
  const resolved = { ...DEFAULT_OPTIONS, ...options };
  if (!IANAZone.isValidZone(resolved.timeZone)) {
    throw new Error(`Invalid time zone: ${resolved.timeZone}`);
  }
  return resolved;
}

function parseTable(header: HandSection) {
  const line = header.lines[1] ?? '';
  const match = TABLE_RE.exec(line)?.groups;
  if (!match) throw new HandFormatError(`Invalid table line: ${line}`, line);
  return { tableName: match.name, maxPlayers: Number(match.max), buttonSeat: Number(match.button) };
}

/** Seat lines follow the table line; the first other line ends them. */
function parseSeats(header: HandSection, maxPlayers: number, report: Report) {
  const players: (Seat | null)[] = new Array<Seat | null>(maxPlayers).fill(null);
  let index = 2;
  for (; index < header.lines.length; index += 1) {
    const line = header.lines[index];
    const match = SEAT_RE.exec(line)?.groups;
    if (!match) break;
    const seat = Number(match.seat);
    if (seat < 1 || seat > maxPlayers) {
      report('seat-out-of-range', `Seat ${seat} outside a ${maxPlayers}-max table`, line);
      continue;
    }
    players[seat - 1] = {
      seat,
      name: match.name,
      stack: new Decimal(match.stack),
      combo: null,
      sittingOut: match.sittingOut !== undefined,
    };
  }
  return { players, rest: header.lines.slice(index) };
}

function parseHero(
  holeCards: HandSection | null,
  players: (Seat | null)[],
  header: HandHeader,
  report: Report
): Seat | null {
  const line = holeCards?.lines.find((l) => HERO_RE.test(l));
  const match = line ? HERO_RE.exec(line)?.groups : undefined;
  if (!line || !match) return null;
  const index = players.findIndex((p) => p?.name === match.name);
  const seat = players[index];
  if (!seat) {
    report('unknown-hero', `Dealt-to player ${match.name} has no seat`, line);
    return null;
  }
  const combo = parseCombo(match.cards);
  if (combo.cards.length !== holeCardCount(header.variant)) {
    throw new InvalidComboError(`Hole cards do not fit ${header.variant}: ${match.cards}`, match.cards);
  }
  const hero: Seat = { ...seat, combo };
  players[index] = hero;
  return hero;
}

function parseWinners(summary: HandSection | null, showDown: boolean): Set<string> {
  const winners = new Set<string>();
  for (const line of summary?.lines ?? []) {
    let match: RegExpExecArray | null = null;
    if (showDown) {
      match = line.includes(' won') ? SHOWED_WON_RE.exec(line) : null;
    } else if (line.includes(' collected ')) {
      match = COLLECTED_RE.exec(line) ?? COLLECTED_FROM_POT_RE.exec(line);
    }
    if (match?.groups) winners.add(match.groups.name);
  }
  return winners;
}

function parseBody(
  header: HandHeader,
  sections: HandSection[],
  report: Report
): Omit<HandBody, 'diagnostics'> {
  const headerSection = sections[0];
  const { tableName, maxPlayers, buttonSeat } = parseTable(headerSection);
  const { players, rest } = parseSeats(headerSection, maxPlayers, report);
  const postingActions = classifyActions(rest, report);

  for (const section of sections) {
    if (section.marker === 'unknown') {
      const label = section.label ? `*** ${section.label} ***` : 'text after a blank line';
      report('unknown-section', `Ignored ${label} (${section.lines.length} lines)`, section.lines[0]);
    }
  }

  const holeCards = findSection(sections, 'holeCards');
  if (!holeCards) report('missing-section', 'No HOLE CARDS section');
  const hero = parseHero(holeCards, players, header, report);
  const button = players[buttonSeat - 1] ?? null;
  const preflopActions = classifyActions(
    (holeCards?.lines ?? []).filter((line) => !line.startsWith('Dealt to ')),
    report
  );

  const flopSection = findSection(sections, 'flop');
  const flop = flopSection ? buildFlop(flopSection.board, flopSection.lines, report) : null;
  // Later streets only count once there is a flop.
  const turnSection = flop ? findSection(sections, 'turn') : null;
  const turn = turnSection ? buildStreet(turnSection.board, turnSection.lines, report) : null;
  const riverSection = turn ? findSection(sections, 'river') : null;
  const river = riverSection ? buildStreet(riverSection.board, riverSection.lines, report) : null;

  const showDownSection = findSection(sections, 'showDown');
  const showDown = showDownSection !== null;
  const showDownActions: PlayerAction[] | null = showDownSection
    ? classifyActions(showDownSection.lines, report) ?? []
    : null;

  const summary = findSection(sections, 'summary');
  if (!summary) report('missing-section', 'No SUMMARY section');
  const pot = summary?.lines.map((line) => POT_RE.exec(line)?.groups).find((groups) => groups);
  const boardLine = summary?.lines.find((line) => line.startsWith('Board'));
  const board: Card[] | null = boardLine ? findCards(boardLine) : null;

  return {
    tableName,
    maxPlayers,
    buttonSeat,
    button,
    hero,
    players,
    postingActions,
    preflopActions,
    flop,
    flopActions: flop ? flop.actions : null,
    turn: turn ? turn.cards[0] : null,
    turnActions: turn ? turn.actions : null,
    river: river ? river.cards[0] : null,
    riverActions: river ? river.actions : null,
    showDown,
    showDownActions,
    totalPot: pot ? new Decimal(pot.pot) : null,
    rake: pot ? new Decimal(pot.rake) : null,
    board,
    winners: parseWinners(summary, showDown),
  };
}

/**
 * One hand history, parsed in two phases: `parseHeader()` reads only the
 * first line, `parse()` reads the rest. Each instance owns its own state, so
 * separate hands can be parsed side by side.
 */
export class HandHistory {
  readonly raw: string;
  private readonly options: ParserOptions;
  private readonly diagnostics: DiagnosticsCollector;
  private state: HandHistoryState = { status: 'unparsed' };

  constructor(raw: string, options?: Partial<ParserOptions>) {
    this.raw = raw;
    this.options = resolveOptions(options);
    this.diagnostics = new DiagnosticsCollector(this.options.diagnostics);
  }

  get status(): HandHistoryStatus {
    return this.state.status;
  }

  get header(): HandHeader {
    switch (this.state.status) {
      case 'unparsed':
        throw new Error('Hand header has not been parsed');
      case 'headerParsed':
        return this.state.header;
      case 'fullyParsed':
        return this.state.hand;
    }
  }

  get hand(): Hand {
    if (this.state.status !== 'fullyParsed') throw new Error('Hand has not been parsed');
    return this.state.hand;
  }

  parseHeader(): HandHeader {
    if (this.state.status !== 'unparsed') return this.header;
    const sections = splitSections(this.raw);
    const line = sections[0].lines[0] ?? '';
    if (!line) throw new HeaderFormatError('Hand history is empty', line);
    const header = parseHeaderLine(line, this.options);
    this.diagnostics.handId = header.handId;
    this.state = { status: 'headerParsed', header, sections };
    return header;
  }

  parse(): Hand {
    if (this.state.status === 'fullyParsed') return this.state.hand;
    this.parseHeader();
    if (this.state.status !== 'headerParsed') throw new Error('Hand header has not been parsed');
    const { header, sections } = this.state;
    const body = attachHandId(header.handId, () => parseBody(header, sections, this.diagnostics.report));
    const hand: Hand = { ...header, ...body, diagnostics: this.diagnostics.entries };
    this.state = { status: 'fullyParsed', hand };
    return hand;
  }

  toString(): string {
    return this.state.status === 'unparsed' ? '<HandHistory>' : `<HandHistory: #${this.header.handId}>`;
  }
}

export function parseHandHeader(raw: string, options?: Partial<ParserOptions>): HandHeader {
  return new HandHistory(raw, options).parseHeader();
}

export function parseHandHistory(raw: string, options?: Partial<ParserOptions>): Hand {
  return new HandHistory(raw, options).parse();
}
