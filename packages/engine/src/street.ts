import { classifyActions } from './actions';
import { findCards, rankIndex } from './cards';
import type { Report } from './diagnostics';
import { HandFormatError } from './errors';
import { Card, Flop, FlopTexture, PlayerAction, Street } from './types';

function pairs<T>(items: readonly T[]): [T, T][] {
  const result: [T, T][] = [];
  for (let i = 0; i < items.length; i += 1) {
    for (let j = i + 1; j < items.length; j += 1) {
      result.push([items[i], items[j]]);
    }
  }
  return result;
}

/** Texture of the three flop cards; later streets never recompute it. */
export function flopTexture(cards: readonly [Card, Card, Card]): FlopTexture {
  const cardPairs = pairs(cards);
  const rankGaps = cardPairs.map(([a, b]) => Math.abs(rankIndex(a.rank) - rankIndex(b.rank)));
  return {
    rainbow: cardPairs.every(([a, b]) => a.suit !== b.suit),
    monotone: cardPairs.every(([a, b]) => a.suit === b.suit),
    triplet: cardPairs.every(([a, b]) => a.rank === b.rank),
    paired: cardPairs.some(([a, b]) => a.rank === b.rank),
    flushDraw: cardPairs.some(([a, b]) => a.suit === b.suit),
    straightDraw: rankGaps.some((gap) => gap >= 1 && gap <= 3),
    gutshot: rankGaps.some((gap) => gap >= 1 && gap <= 4),
  };
}

/** Distinct actor names in order of first appearance. */
export function streetPlayers(actions: readonly PlayerAction[] | null): string[] | null {
  if (!actions) return null;
  const names: string[] = [];
  for (const action of actions) {
    if (!names.includes(action.name)) names.push(action.name);
  }
  return names;
}

export function buildFlop(board: string | null, lines: readonly string[], report: Report): Flop {
  const cards = findCards(board ?? '');
  if (cards.length !== 3) {
    throw new HandFormatError(`Flop needs 3 board cards: ${board ?? ''}`, board ?? '');
  }
  const flopCards: [Card, Card, Card] = [cards[0], cards[1], cards[2]];
  const actions = classifyActions(lines, report);
  return {
    cards: flopCards,
    actions,
    texture: flopTexture(flopCards),
    players: streetPlayers(actions),
  };
}

/**
 * Turn or river: the marker repeats the board so far and brackets the new
 * card last, e.g. `[Kh 8d 2c] [7h]`.
 */
export function buildStreet(board: string | null, lines: readonly string[], report: Report): Street {
  const cards = findCards(board ?? '');
  const card = cards[cards.length - 1];
  if (!card) {
    throw new HandFormatError(`Street has no board card: ${board ?? ''}`, board ?? '');
  }
  return { cards: [card], actions: classifyActions(lines, report) };
}
