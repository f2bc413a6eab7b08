import { describe, expect, it } from 'vitest';
import {
  buildDeck,
  cardsEqual,
  comboFromCards,
  combosEqual,
  findCards,
  formatCombo,
  holeCardCount,
  InvalidCardError,
  InvalidComboError,
  parseCard,
  parseCombo,
} from '../src';
import { C } from './testUtils';

describe('cards', () => {
  it('parses rank and suit', () => {
    expect(parseCard('As')).toEqual(C('A', 's'));
    expect(parseCard(' Td ')).toEqual(C('T', 'd'));
  });

  it('rejects malformed card text', () => {
    expect(() => parseCard('1s')).toThrow(InvalidCardError);
    expect(() => parseCard('AS')).toThrow(InvalidCardError);
    expect(() => parseCard('10h')).toThrow('Invalid card: 10h');
  });

  it('builds a deck of 52 distinct cards', () => {
    const deck = buildDeck();
    expect(deck).toHaveLength(52);
    expect(new Set(deck.map((c) => `${c.rank}${c.suit}`)).size).toBe(52);
  });

  it('compares cards by rank and suit', () => {
    expect(cardsEqual(C('K', 'h'), parseCard('Kh'))).toBe(true);
    expect(cardsEqual(C('K', 'h'), C('K', 'd'))).toBe(false);
  });

  it('finds every card token in board text', () => {
    expect(findCards('[Kh 8d 2c] [7h]')).toEqual([C('K', 'h'), C('8', 'd'), C('2', 'c'), C('7', 'h')]);
    expect(findCards('Board []')).toEqual([]);
  });
});

describe('combos', () => {
  it('keeps cards in canonical order', () => {
    expect(formatCombo(parseCombo('JhAc'))).toBe('AcJh');
    expect(formatCombo(parseCombo('8cAcKd8s'))).toBe('AcKd8s8c');
  });

  it('accepts spaced text and card arrays', () => {
    expect(parseCombo('Ac Kd 8s 8c')).toEqual(parseCombo('AcKd8s8c'));
    expect(parseCombo(['Jh', 'Ac'])).toEqual(parseCombo('AcJh'));
  });

  it('treats combos with the same cards as equal regardless of order', () => {
    expect(combosEqual(parseCombo('5s7s7cAs'), parseCombo('As7c7s5s'))).toBe(true);
    expect(combosEqual(parseCombo('AcKd'), parseCombo('AcKh'))).toBe(false);
  });

  it.each(['AsAs', 'AsAsAsAs', 'AsKdAsQc'])('rejects duplicate cards in %s', (text) => {
    expect(() => parseCombo(text)).toThrow(InvalidComboError);
  });

  it('rejects combos that are not 2 or 4 cards', () => {
    expect(() => parseCombo('AsKd7c')).toThrow('A combo holds 2 or 4 cards, got 3: AsKd7c');
    expect(() => comboFromCards([C('A', 's')])).toThrow(InvalidComboError);
    expect(() => parseCombo('AsK')).toThrow(InvalidComboError);
  });

  it('knows the hole card count of each variant', () => {
    expect(holeCardCount('holdem')).toBe(2);
    expect(holeCardCount('omaha')).toBe(4);
    expect(holeCardCount('omahaHiLo')).toBe(4);
  });
});
