import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { formatCard, formatCombo, type Card, type PlayerAction, type Seat } from '../src';

export type FixtureName =
  | 'tournament-flop'
  | 'omaha-cash-showdown'
  | 'tournament-preflop'
  | 'cash-limit-events';

export function loadFixture(name: FixtureName): string {
  return readFileSync(fileURLToPath(new URL(`./fixtures/${name}.txt`, import.meta.url)), 'utf8');
}

export const C = (rank: Card['rank'], suit: Card['suit']): Card => ({ rank, suit });

/** One line per action, e.g. `HeroPlayer raise 40` or `IceKermit show AcKd8s8c`. */
export function describeAction(action: PlayerAction): string {
  switch (action.kind) {
    case 'show':
      return `${action.name} show ${formatCombo(action.combo)}`;
    case 'join':
      return `${action.name} join #${action.seat}`;
    case 'return':
    case 'win':
      return `${action.name} ${action.kind} ${action.amount.toString()}`;
    case 'fold':
    case 'check':
    case 'call':
    case 'bet':
    case 'raise':
    case 'post': {
      const amount = action.amount ? ` ${action.amount.toString()}` : '';
      return `${action.name} ${action.kind}${amount}${action.allIn ? ' all-in' : ''}`;
    }
    default:
      return `${action.name} ${action.kind}`;
  }
}

export function describeActions(actions: readonly PlayerAction[] | null): string[] | null {
  return actions ? actions.map(describeAction) : null;
}

export function describeCards(cards: readonly Card[] | null): string[] | null {
  return cards ? cards.map(formatCard) : null;
}

/** `seat:name:stack[:combo]` per occupied seat, `-` for an empty one. */
export function describeSeats(players: readonly (Seat | null)[]): string[] {
  return players.map((p) => {
    if (!p) return '-';
    const combo = p.combo ? `:${formatCombo(p.combo)}` : '';
    return `${p.seat}:${p.name}:${p.stack.toString()}${combo}`;
  });
}

export function handLines(...lines: string[]): string {
  return lines.join('\n');
}
