import type { LevelingConfig } from '../config/battleConfig.ts';
import { toPersistenceError, type PersistenceError } from '../core/errors.ts';
import type { ProgressStore } from '../save/progressStore.ts';
import type { Combatant } from '../units/Combatant.ts';
import type { BattleEvent, MatchOutcome, MatchResult } from './types.ts';

export interface OutcomeResolution {
  readonly outcome: MatchOutcome;
  readonly events: readonly BattleEvent[];
  readonly persistenceError: PersistenceError | null;
}

/**
 * Applies the consequences of a finished match: a win levels the player up
 * and saves the new level; any result may raise the best level. Losses
 * never reset progress.
 */
export class MatchOutcomeHandler {
  constructor(
    private readonly store: ProgressStore,
    private readonly leveling: Pick<LevelingConfig, 'levelUpAmount'>
  ) {}

  resolve(result: MatchResult, player: Combatant, enemy: Combatant): OutcomeResolution {
    const events: BattleEvent[] = [];
    let persistenceError: PersistenceError | null = null;
    const previousLevel = player.level;

    if (result === 'won') {
      const summary = player.levelUp(this.leveling.levelUpAmount);
      if (summary.level !== summary.previousLevel) {
        events.push({
          type: 'leveledUp',
          side: player.side,
          previousLevel: summary.previousLevel,
          newLevel: summary.level,
          maxHpGain: summary.maxHpGain
        });
      }
      try {
        this.store.setPlayerLevel(player.level);
      } catch (error) {
        persistenceError = toPersistenceError('write', error);
      }
    }

    // Best level has its own key; settle it even when the level save failed.
    let previousBest = player.level;
    try {
      previousBest = this.store.getBestLevel();
    } catch (error) {
      persistenceError ??= toPersistenceError('read', error);
    }
    const bestLevel = Math.max(previousBest, player.level);
    let newBest = false;
    if (player.level > previousBest) {
      try {
        this.store.setBestLevel(player.level);
        newBest = true;
        events.push({ type: 'bestLevelRecorded', previousBest, bestLevel });
      } catch (error) {
        persistenceError ??= toPersistenceError('write', error);
      }
    }

    events.push({ type: 'matchEnded', result });

    return {
      outcome: {
        result,
        previousLevel,
        playerLevel: player.level,
        bestLevel,
        newBest,
        player: player.snapshot(),
        enemy: enemy.snapshot()
      },
      events,
      persistenceError
    };
  }
}
