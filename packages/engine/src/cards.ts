import { InvalidCardError, InvalidComboError } from './errors';
import { Card, Combo, GameVariant, Rank, Suit } from './types';

export const SUITS: readonly Suit[] = ['s', 'h', 'd', 'c'];
export const RANKS: readonly Rank[] = ['2', '3', '4', '5', '6', '7', '8', '9', 'T', 'J', 'Q', 'K', 'A'];

const CARD_RE = /^([2-9TJQKA])([shdc])$/;
const CARD_TOKEN_RE = /[2-9TJQKA][shdc]/g;

function isRank(value: string): value is Rank {
  return RANKS.some((rank) => rank === value);
}

function isSuit(value: string): value is Suit {
  return SUITS.some((suit) => suit === value);
}

export function buildDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push({ rank, suit });
    }
  }
  return deck;
}

export function rankIndex(rank: Rank): number {
  return RANKS.indexOf(rank);
}

export function parseCard(text: string): Card {
  const match = CARD_RE.exec(text.trim());
  if (!match || !isRank(match[1]) || !isSuit(match[2])) {
    throw new InvalidCardError(`Invalid card: ${text}`, text);
  }
  return { rank: match[1], suit: match[2] };
}

export function formatCard(card: Card): string {
  return `${card.rank}${card.suit}`;
}

export const cardKey = formatCard;

export function cardsEqual(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

/** Every card token in a piece of text, e.g. the board in `[Kh 8d 2c] [7h]`. */
export function findCards(text: string): Card[] {
  return (text.match(CARD_TOKEN_RE) ?? []).map(parseCard);
}

function compareCards(a: Card, b: Card): number {
  const byRank = rankIndex(b.rank) - rankIndex(a.rank);
  if (byRank !== 0) return byRank;
  return SUITS.indexOf(a.suit) - SUITS.indexOf(b.suit);
}

export function comboFromCards(cards: readonly Card[]): Combo {
  const text = cards.map(formatCard).join('');
  if (cards.length !== 2 && cards.length !== 4) {
    throw new InvalidComboError(`A combo holds 2 or 4 cards, got ${cards.length}: ${text}`, text);
  }
  const keys = new Set(cards.map(cardKey));
  if (keys.size !== cards.length) {
    throw new InvalidComboError(`Duplicate card in combo: ${text}`, text);
  }
  return { cards: [...cards].sort(compareCards) };
}

/** Accepts `'AcJh'`, `'Ac Jh'` or `['Ac', 'Jh']`. */
export function parseCombo(input: string | readonly string[]): Combo {
  const text = typeof input === 'string' ? input.replace(/\s+/g, '') : input.join('');
  if (text.length % 2 !== 0) {
    throw new InvalidComboError(`Invalid combo: ${text}`, text);
  }
  const cards: Card[] = [];
  for (let i = 0; i < text.length; i += 2) {
    cards.push(parseCard(text.slice(i, i + 2)));
  }
  return comboFromCards(cards);
}

export function formatCombo(combo: Combo): string {
  return combo.cards.map(formatCard).join('');
}

export function combosEqual(a: Combo, b: Combo): boolean {
  return formatCombo(a) === formatCombo(b);
}

export function holeCardCount(variant: GameVariant): number {
  return variant === 'holdem' ? 2 : 4;
}
