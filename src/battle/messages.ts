import type { CombatantSide } from '../unit/types.ts';
import type { BattleEvent } from './types.ts';

export type CombatantNames = Readonly<Record<CombatantSide, string>>;

/** Dialogue line shown for `event`; the player is always addressed as "you". */
export function describeBattleEvent(event: BattleEvent, names: CombatantNames): string {
  switch (event.type) {
    case 'matchStarted':
      return `A wild ${names.enemy} appeared!`;
    case 'turnChanged':
      return event.side === 'player' ? 'Your turn!' : `${names.enemy} attacks!`;
    case 'missed':
      return event.side === 'player' ? 'Your attack missed!' : `${names.enemy} missed!`;
    case 'criticalHit':
      return event.side === 'player' ? 'Critical hit!' : 'Enemy lands a critical!';
    case 'hit':
      if (event.side === 'player') {
        return `You deal ${event.amount} damage!`;
      }
      return event.mitigated
        ? `You block and take ${event.amount} damage!`
        : `You take ${event.amount} damage!`;
    case 'healed':
      return `Recovered ${event.amount} HP!`;
    case 'healRejected':
      return 'Already at full health!';
    case 'defendStarted':
      return event.side === 'player' ? 'You brace for the next attack!' : `${names.enemy} braces!`;
    case 'defendEnded':
      return event.side === 'player' ? 'You lower your guard.' : `${names.enemy} lowers its guard.`;
    case 'defeated':
      return event.side === 'enemy' ? `${names.enemy} has been defeated!` : 'You have been defeated!';
    case 'leveledUp':
      return `${names[event.side]} reached level ${event.newLevel}!`;
    case 'bestLevelRecorded':
      return `New best: level ${event.bestLevel}!`;
    case 'matchEnded':
      return event.result === 'won' ? 'You Win!' : 'You Lose!';
  }
}

export function describeBattleEvents(
  events: readonly BattleEvent[],
  names: CombatantNames
): string[] {
  return events.map((event) => describeBattleEvent(event, names));
}
