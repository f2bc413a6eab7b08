import { z } from 'zod';
import { formatCard, formatCombo, type Card, type Hand, type PlayerAction, type Seat } from '@hhparse/engine';

export const HAND_RECORD_VERSION = 1 as const;

const CARD = '[2-9TJQKA][shdc]';
const decimalSchema = z.string().regex(/^-?\d+(?:\.\d+)?$/, 'Expected a decimal amount');
const cardSchema = z.string().regex(new RegExp(`^${CARD}$`), 'Expected a card such as As');
const comboSchema = z.string().regex(new RegExp(`^(?:${CARD}){2}(?:(?:${CARD}){2})?$`), 'Expected 2 or 4 cards');
const nameSchema = z.string().min(1);

const versionedRecord = <T extends z.ZodRawShape>(shape: T) =>
  z
    .object({
      v: z.literal(HAND_RECORD_VERSION).optional(),
      ...shape,
    })
    .strict();

const actionRecordSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.enum(['fold', 'check', 'call', 'bet', 'raise', 'post']),
      name: nameSchema,
      amount: decimalSchema.nullable(),
      allIn: z.boolean(),
    })
    .strict(),
  z.object({ kind: z.enum(['return', 'win']), name: nameSchema, amount: decimalSchema }).strict(),
  z.object({ kind: z.literal('show'), name: nameSchema, combo: comboSchema }).strict(),
  z.object({ kind: z.literal('join'), name: nameSchema, seat: z.number().int().positive() }).strict(),
  z
    .object({
      kind: z.enum(['muck', 'leave', 'timedOut', 'connected', 'disconnected', 'removed']),
      name: nameSchema,
    })
    .strict(),
]);

export type ActionRecord = z.infer<typeof actionRecordSchema>;

const actionsSchema = z.array(actionRecordSchema).nullable();

const seatRecordSchema = z
  .object({
    seat: z.number().int().positive(),
    name: nameSchema,
    stack: decimalSchema,
    combo: comboSchema.nullable(),
    sittingOut: z.boolean(),
  })
  .strict();

export type SeatRecord = z.infer<typeof seatRecordSchema>;

const gameTypeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('cash') }).strict(),
  z
    .object({
      kind: z.literal('tournament'),
      id: z.string().min(1),
      level: z.string().min(1).nullable(),
      freeroll: z.boolean(),
      buyIn: decimalSchema,
      bounty: decimalSchema.nullable(),
      rake: decimalSchema,
    })
    .strict(),
]);

const flopRecordSchema = z
  .object({
    cards: z.tuple([cardSchema, cardSchema, cardSchema]),
    texture: z
      .object({
        rainbow: z.boolean(),
        monotone: z.boolean(),
        triplet: z.boolean(),
        paired: z.boolean(),
        flushDraw: z.boolean(),
        straightDraw: z.boolean(),
        gutshot: z.boolean(),
      })
      .strict(),
    players: z.array(nameSchema).nullable(),
  })
  .strict();

export const handRecordSchema = versionedRecord({
  handId: z.string().regex(/^\d+$/),
  gameType: gameTypeSchema,
  currency: z.enum(['USD', 'EUR', 'GBP', 'SC']).nullable(),
  moneyType: z.enum(['real', 'play']),
  smallBlind: decimalSchema,
  bigBlind: decimalSchema,
  limit: z.enum(['noLimit', 'potLimit', 'fixedLimit']),
  variant: z.enum(['holdem', 'omaha', 'omahaHiLo']),
  date: z.string().datetime(),
  tableName: z.string(),
  maxPlayers: z.number().int().positive(),
  buttonSeat: z.number().int().positive(),
  button: seatRecordSchema.nullable(),
  hero: seatRecordSchema.nullable(),
  players: z.array(seatRecordSchema.nullable()),
  postingActions: actionsSchema,
  preflopActions: actionsSchema,
  flop: flopRecordSchema.nullable(),
  flopActions: actionsSchema,
  turn: cardSchema.nullable(),
  turnActions: actionsSchema,
  river: cardSchema.nullable(),
  riverActions: actionsSchema,
  showDown: z.boolean(),
  showDownActions: actionsSchema,
  totalPot: decimalSchema.nullable(),
  rake: decimalSchema.nullable(),
  board: z.array(cardSchema).nullable(),
  winners: z.array(nameSchema),
});

export type HandRecord = z.infer<typeof handRecordSchema>;
export type StampedHandRecord = HandRecord & { v: typeof HAND_RECORD_VERSION };

function actionRecord(action: PlayerAction): ActionRecord {
  switch (action.kind) {
    case 'show':
      return { kind: 'show', name: action.name, combo: formatCombo(action.combo) };
    case 'join':
      return { kind: 'join', name: action.name, seat: action.seat };
    case 'return':
    case 'win':
      return { kind: action.kind, name: action.name, amount: action.amount.toFixed() };
    case 'fold':
    case 'check':
    case 'call':
    case 'bet':
    case 'raise':
    case 'post':
      return {
        kind: action.kind,
        name: action.name,
        amount: action.amount ? action.amount.toFixed() : null,
        allIn: action.allIn,
      };
    default:
      return { kind: action.kind, name: action.name };
  }
}

function actionRecords(actions: readonly PlayerAction[] | null): ActionRecord[] | null {
  return actions ? actions.map(actionRecord) : null;
}

function seatRecord(seat: Seat): SeatRecord {
  return {
    seat: seat.seat,
    name: seat.name,
    stack: seat.stack.toFixed(),
    combo: seat.combo ? formatCombo(seat.combo) : null,
    sittingOut: seat.sittingOut,
  };
}

function cardRecord(card: Card | null): string | null {
  return card ? formatCard(card) : null;
}

/** Flattens a parsed hand into plain JSON. Diagnostics stay with the parse. */
export function toHandRecord(hand: Hand): StampedHandRecord {
  const { gameType } = hand;
  return {
    v: HAND_RECORD_VERSION,
    handId: hand.handId,
    gameType:
      gameType.kind === 'cash'
        ? { kind: 'cash' }
        : {
            kind: 'tournament',
            id: gameType.id,
            level: gameType.level,
            freeroll: gameType.freeroll,
            buyIn: gameType.buyIn.toFixed(),
            bounty: gameType.bounty ? gameType.bounty.toFixed() : null,
            rake: gameType.rake.toFixed(),
          },
    currency: hand.currency,
    moneyType: hand.moneyType,
    smallBlind: hand.smallBlind.toFixed(),
    bigBlind: hand.bigBlind.toFixed(),
    limit: hand.limit,
    variant: hand.variant,
    date: hand.date.toISOString(),
    tableName: hand.tableName,
    maxPlayers: hand.maxPlayers,
    buttonSeat: hand.buttonSeat,
    button: hand.button ? seatRecord(hand.button) : null,
    hero: hand.hero ? seatRecord(hand.hero) : null,
    players: hand.players.map((seat) => (seat ? seatRecord(seat) : null)),
    postingActions: actionRecords(hand.postingActions),
    preflopActions: actionRecords(hand.preflopActions),
    flop: hand.flop
      ? {
          cards: [formatCard(hand.flop.cards[0]), formatCard(hand.flop.cards[1]), formatCard(hand.flop.cards[2])],
          texture: { ...hand.flop.texture },
          players: hand.flop.players ? [...hand.flop.players] : null,
        }
      : null,
    flopActions: actionRecords(hand.flopActions),
    turn: cardRecord(hand.turn),
    turnActions: actionRecords(hand.turnActions),
    river: cardRecord(hand.river),
    riverActions: actionRecords(hand.riverActions),
    showDown: hand.showDown,
    showDownActions: actionRecords(hand.showDownActions),
    totalPot: hand.totalPot ? hand.totalPot.toFixed() : null,
    rake: hand.rake ? hand.rake.toFixed() : null,
    board: hand.board ? hand.board.map(formatCard) : null,
    winners: [...hand.winners].sort(),
  };
}

function formatSchemaError(error: z.ZodError) {
  return error.issues
    .slice(0, 3)
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/** Validates a record from the wire; records written before versioning get the current version. */
export function parseHandRecordPayload(value: unknown): StampedHandRecord {
  const parsed = handRecordSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid hand record: ${formatSchemaError(parsed.error)}`);
  }
  return { ...parsed.data, v: HAND_RECORD_VERSION };
}

export function isHandRecord(value: unknown): value is HandRecord {
  return handRecordSchema.safeParse(value).success;
}
