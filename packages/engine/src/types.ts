import type Decimal from 'decimal.js';

export type Suit = 's' | 'h' | 'd' | 'c';
export type Rank = '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | 'T' | 'J' | 'Q' | 'K' | 'A';

export interface Card {
  rank: Rank;
  suit: Suit;
}

/** Hole (or shown) cards of one player, kept in canonical order. */
export interface Combo {
  cards: readonly Card[];
}

export type Currency = 'USD' | 'EUR' | 'GBP' | 'SC';
export type MoneyType = 'real' | 'play';
export type Limit = 'noLimit' | 'potLimit' | 'fixedLimit';
export type GameVariant = 'holdem' | 'omaha' | 'omahaHiLo';

export type GameType =
  | { kind: 'cash' }
  | {
      kind: 'tournament';
      id: string;
      level: string | null;
      freeroll: boolean;
      buyIn: Decimal;
      bounty: Decimal | null;
      rake: Decimal;
    };

export interface HandHeader {
  handId: string;
  gameType: GameType;
  currency: Currency | null;
  moneyType: MoneyType;
  smallBlind: Decimal;
  bigBlind: Decimal;
  limit: Limit;
  variant: GameVariant;
  date: Date;
}

export interface Seat {
  seat: number;
  name: string;
  stack: Decimal;
  combo: Combo | null;
  sittingOut: boolean;
}

export type BettingActionKind = 'fold' | 'check' | 'call' | 'bet' | 'raise' | 'post';
export type PresenceActionKind =
  | 'muck'
  | 'leave'
  | 'timedOut'
  | 'connected'
  | 'disconnected'
  | 'removed';

export type ActionKind = BettingActionKind | PresenceActionKind | 'return' | 'win' | 'show' | 'join';

export type PlayerAction =
  | { kind: BettingActionKind; name: string; amount: Decimal | null; allIn: boolean }
  | { kind: 'return' | 'win'; name: string; amount: Decimal }
  | { kind: 'show'; name: string; combo: Combo }
  | { kind: 'join'; name: string; seat: number }
  | { kind: PresenceActionKind; name: string };

export interface Street {
  cards: readonly Card[];
  actions: readonly PlayerAction[] | null;
}

export interface FlopTexture {
  rainbow: boolean;
  monotone: boolean;
  triplet: boolean;
  paired: boolean;
  flushDraw: boolean;
  straightDraw: boolean;
  gutshot: boolean;
}

export interface Flop extends Street {
  cards: readonly [Card, Card, Card];
  texture: FlopTexture;
  players: readonly string[] | null;
}

export type DiagnosticCode =
  | 'unrecognized-action'
  | 'unknown-section'
  | 'missing-section'
  | 'seat-out-of-range'
  | 'unknown-hero';

export interface ParseDiagnostic {
  code: DiagnosticCode;
  message: string;
  handId: string | null;
  line: string | null;
}

export type DiagnosticsSink = (diagnostic: ParseDiagnostic) => void;

export interface ParserOptions {
  timeZone: string;
  freerollCurrency: Currency;
  diagnostics?: DiagnosticsSink;
}

export interface HandBody {
  tableName: string;
  maxPlayers: number;
  buttonSeat: number;
  button: Seat | null;
  hero: Seat | null;
  players: readonly (Seat | null)[];
  postingActions: readonly PlayerAction[] | null;
  preflopActions: readonly PlayerAction[] | null;
  flop: Flop | null;
  flopActions: readonly PlayerAction[] | null;
  turn: Card | null;
  turnActions: readonly PlayerAction[] | null;
  river: Card | null;
  riverActions: readonly PlayerAction[] | null;
  showDown: boolean;
  showDownActions: readonly PlayerAction[] | null;
  totalPot: Decimal | null;
  rake: Decimal | null;
  board: readonly Card[] | null;
  winners: ReadonlySet<string>;
  diagnostics: readonly ParseDiagnostic[];
}

export type Hand = HandHeader & HandBody;
