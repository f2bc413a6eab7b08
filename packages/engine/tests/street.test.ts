import { describe, expect, it } from 'vitest';
import { buildFlop, buildStreet, findCards, flopTexture, HandFormatError, streetPlayers, type Card } from '../src';
import { describeActions, describeCards } from './testUtils';

function flop(text: string): [Card, Card, Card] {
  const [a, b, c] = findCards(text);
  return [a, b, c];
}

const noReport = () => undefined;

describe('flopTexture', () => {
  it('describes a paired rainbow flop', () => {
    expect(flopTexture(flop('2s 6d 6h'))).toEqual({
      rainbow: true,
      monotone: false,
      triplet: false,
      paired: true,
      flushDraw: false,
      straightDraw: false,
      gutshot: true,
    });
  });

  it('finds straight and flush draws on connected two-tone flops', () => {
    expect(flopTexture(flop('6s 4d 3s'))).toEqual({
      rainbow: false,
      monotone: false,
      triplet: false,
      paired: false,
      flushDraw: true,
      straightDraw: true,
      gutshot: true,
    });
  });

  it('flags monotone flops as flush draws too', () => {
    const texture = flopTexture(flop('Ah Kh Qh'));
    expect(texture.monotone).toBe(true);
    expect(texture.flushDraw).toBe(true);
    expect(texture.rainbow).toBe(false);
    expect(texture.straightDraw).toBe(true);
  });

  it('counts trips as paired', () => {
    const texture = flopTexture(flop('9c 9d 9h'));
    expect(texture.triplet).toBe(true);
    expect(texture.paired).toBe(true);
    expect(texture.straightDraw).toBe(false);
    expect(texture.gutshot).toBe(false);
  });

  it('plays the ace high only', () => {
    const texture = flopTexture(flop('Ac 2d 7h'));
    expect(texture.straightDraw).toBe(false);
    expect(texture.gutshot).toBe(false);
  });

  it('separates gutshots from open draws by rank gap', () => {
    const texture = flopTexture(flop('Kc 9d 2h'));
    expect(texture.straightDraw).toBe(false);
    expect(texture.gutshot).toBe(true);
  });
});

describe('streetPlayers', () => {
  it('lists actors once in order of first action', () => {
    const built = buildFlop('[2s 6d 6h]', ['b: bets 10', 'a: calls 10', 'b joins the table at seat #3'], noReport);
    expect(built.players).toEqual(['b', 'a']);
    expect(streetPlayers(null)).toBeNull();
  });
});

describe('buildFlop', () => {
  it('reads cards, actions and texture', () => {
    const built = buildFlop('[Kh 8d 2c]', ['MayTrix: checks', 'IceKermit: bets $0.90'], noReport);
    expect(describeCards(built.cards)).toEqual(['Kh', '8d', '2c']);
    expect(describeActions(built.actions)).toEqual(['MayTrix check', 'IceKermit bet 0.9']);
    expect(built.texture.rainbow).toBe(true);
  });

  it('leaves actions null on a silent flop', () => {
    const built = buildFlop('[Kh 8d 2c]', [], noReport);
    expect(built.actions).toBeNull();
    expect(built.players).toBeNull();
  });

  it('requires exactly three cards', () => {
    expect(() => buildFlop('[Kh 8d]', [], noReport)).toThrow(HandFormatError);
    expect(() => buildFlop(null, [], noReport)).toThrow('Flop needs 3 board cards: ');
  });
});

describe('buildStreet', () => {
  it('takes the card dealt last', () => {
    const built = buildStreet('[Kh 8d 2c 7h] [3s]', ['IceKermit: checks'], noReport);
    expect(describeCards(built.cards)).toEqual(['3s']);
    expect(describeActions(built.actions)).toEqual(['IceKermit check']);
  });

  it('rejects a marker without cards', () => {
    expect(() => buildStreet('', [], noReport)).toThrow(HandFormatError);
  });
});
