import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { TurnScheduler } from '../../src/battle/TurnScheduler.ts';
import { createBattleConfig } from '../../src/config/battleConfig.ts';
import type { RandomSource } from '../../src/lib/rng.ts';
import { StorageProgressStore, createMemoryStorage } from '../../src/save/progressStore.ts';

function scripted(values: readonly number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[index];
    if (value === undefined) {
      throw new Error('random source exhausted');
    }
    index += 1;
    return value;
  };
}

beforeEach(() => {
  vi.spyOn(console, 'debug').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('defend scenario', () => {
  const config = createBattleConfig({
    player: { stats: { baseDefense: 50 } },
    enemy: { stats: { baseAttack: 28, attackGrowth: 1 } },
    damage: { minMultiplier: 1, maxMultiplier: 1, critChance: 0 },
    accuracy: { baseHitChance: 1, speedFactor: 0 },
    leveling: { enemyLevelOffset: { min: 0, max: 0 } }
  });

  it('softens exactly one enemy hit', () => {
    const scheduler = new TurnScheduler({
      config,
      store: new StorageProgressStore(createMemoryStorage()),
      random: scripted([0, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5])
    });
    scheduler.start();

    const defended = scheduler.chooseDefend();
    expect(defended.events[2]).toMatchObject({
      type: 'hit',
      side: 'enemy',
      rawAmount: 20,
      amount: 13,
      mitigated: true,
      remainingHp: 21
    });
    expect(defended.state.player?.isDefending).toBe(false);

    const attacked = scheduler.chooseAttack();
    expect(attacked.state.enemy?.currentHp).toBe(28);
    expect(attacked.events[2]).toMatchObject({
      type: 'hit',
      side: 'enemy',
      rawAmount: 20,
      amount: 20,
      mitigated: false,
      remainingHp: 1
    });
    expect(attacked.state.phase).toBe('playerTurn');
    expect(attacked.state.player?.currentHp).toBe(1);
  });
});
