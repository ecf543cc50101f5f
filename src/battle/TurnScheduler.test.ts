import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TurnScheduler } from './TurnScheduler.ts';
import { createRecordingSink } from './sinks.ts';
import {
  createBattleConfig,
  mergeBattleConfig,
  DEFAULT_BATTLE_CONFIG,
  type BattleConfigOverrides
} from '../config/battleConfig.ts';
import { ConfigurationError, PersistenceError } from '../core/errors.ts';
import type { RandomSource } from '../lib/rng.ts';
import {
  StorageProgressStore,
  createMemoryStorage,
  type StorageLike
} from '../save/progressStore.ts';

function scripted(values: readonly number[]): RandomSource & { remaining: () => number } {
  let index = 0;
  const random = () => {
    if (index >= values.length) {
      throw new Error(`random source exhausted after ${values.length} draws`);
    }
    const value = values[index];
    index += 1;
    return value;
  };
  return Object.assign(random, { remaining: () => values.length - index });
}

const certainHits: BattleConfigOverrides = {
  damage: { minMultiplier: 1, maxMultiplier: 1, critChance: 0 },
  accuracy: { baseHitChance: 1, speedFactor: 0, minHitChance: 0.05, maxHitChance: 1 },
  leveling: { enemyLevelOffset: { min: 0, max: 0 } }
};

function setup(overrides: BattleConfigOverrides = {}, draws: readonly number[] = [0]) {
  const base = createBattleConfig(certainHits);
  const config = mergeBattleConfig(base, overrides);
  const storage = createMemoryStorage();
  const store = new StorageProgressStore(storage);
  const sink = createRecordingSink();
  const random = scripted(draws);
  const scheduler = new TurnScheduler({ config, store, random, sink });
  return { scheduler, store, sink, random };
}

beforeEach(() => {
  vi.spyOn(console, 'debug').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('TurnScheduler', () => {
  it('rejects an invalid configuration up front', () => {
    const config = mergeBattleConfig(DEFAULT_BATTLE_CONFIG, {
      damage: { minMultiplier: 2, maxMultiplier: 1 }
    });
    const store = new StorageProgressStore(createMemoryStorage());
    expect(() => new TurnScheduler({ config, store })).toThrow(ConfigurationError);
  });

  it('opens with the player when speeds tie', () => {
    const { scheduler, store } = setup();
    const result = scheduler.start();

    expect(result.status).toBe('resolved');
    expect(result.events).toEqual([
      { type: 'matchStarted', playerLevel: 1, enemyLevel: 1, firstTurn: 'player' },
      { type: 'turnChanged', side: 'player', turn: 1 }
    ]);
    expect(result.state.phase).toBe('playerTurn');
    expect(result.state.player?.currentHp).toBe(34);
    expect(result.state.enemy?.currentHp).toBe(34);
    expect(store.getEnemyLevel()).toBe(1);
  });

  it('resolves the opening enemy attack inside start when the enemy is faster', () => {
    const { scheduler, random } = setup(
      { enemy: { stats: { baseSpeed: 20 } } },
      [0, 0.5, 0.5, 0.5]
    );
    const result = scheduler.start();

    expect(result.events).toEqual([
      { type: 'matchStarted', playerLevel: 1, enemyLevel: 1, firstTurn: 'enemy' },
      { type: 'turnChanged', side: 'enemy', turn: 1 },
      {
        type: 'hit',
        side: 'enemy',
        target: 'player',
        rawAmount: 6,
        amount: 6,
        wasCrit: false,
        mitigated: false,
        remainingHp: 28
      },
      { type: 'turnChanged', side: 'player', turn: 2 }
    ]);
    expect(result.state.phase).toBe('playerTurn');
    expect(random.remaining()).toBe(0);
  });

  it('trades attacks and hands the turn back to the player', () => {
    const { scheduler, sink } = setup({}, [0, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5]);
    scheduler.start();
    const result = scheduler.chooseAttack();

    expect(result.events).toEqual([
      {
        type: 'hit',
        side: 'player',
        target: 'enemy',
        rawAmount: 6,
        amount: 6,
        wasCrit: false,
        mitigated: false,
        remainingHp: 28
      },
      { type: 'turnChanged', side: 'enemy', turn: 2 },
      {
        type: 'hit',
        side: 'enemy',
        target: 'player',
        rawAmount: 6,
        amount: 6,
        wasCrit: false,
        mitigated: false,
        remainingHp: 28
      },
      { type: 'turnChanged', side: 'player', turn: 3 }
    ]);
    expect(result.state.turn).toBe(3);
    expect(sink.events).toHaveLength(2 + 4);
    expect(sink.events.slice(2)).toEqual(result.events);
  });

  it('skips damage and crit draws on a miss', () => {
    const { scheduler, random } = setup(
      { accuracy: { baseHitChance: 0.5 } },
      [0, 0.9, 0.1, 0.5, 0.5]
    );
    scheduler.start();
    const result = scheduler.chooseAttack();

    expect(result.events[0]).toEqual({
      type: 'missed',
      side: 'player',
      target: 'enemy',
      hitChance: 0.5
    });
    expect(result.state.enemy?.currentHp).toBe(34);
    expect(result.state.player?.currentHp).toBe(28);
    expect(random.remaining()).toBe(0);
  });

  it('re-prompts a heal at full health without consuming the turn', () => {
    const { scheduler, random } = setup();
    scheduler.start();
    const result = scheduler.chooseHeal();

    expect(result.status).toBe('reprompt');
    expect(result.events).toEqual([
      { type: 'healRejected', side: 'player', reason: 'fullHealth' }
    ]);
    expect(result.state.phase).toBe('playerTurn');
    expect(result.state.turn).toBe(1);
    expect(random.remaining()).toBe(0);
  });

  it('heals the rolled amount before the enemy acts', () => {
    const { scheduler } = setup(
      {},
      [0, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.9, 0.5, 0.5, 0.5]
    );
    scheduler.start();
    scheduler.chooseAttack();
    const result = scheduler.chooseHeal();

    expect(result.events.slice(0, 2)).toEqual([
      { type: 'healed', side: 'player', amount: 2, currentHp: 30 },
      { type: 'turnChanged', side: 'enemy', turn: 4 }
    ]);
    expect(result.state.player?.currentHp).toBe(24);
  });

  it('mitigates the next enemy hit while defending and drops the stance on the next turn', () => {
    const { scheduler } = setup(
      { player: { stats: { baseDefense: 100 } } },
      [0, 0.5, 0.5, 0.5]
    );
    scheduler.start();
    const result = scheduler.chooseDefend();

    expect(result.events).toEqual([
      { type: 'defendStarted', side: 'player' },
      { type: 'turnChanged', side: 'enemy', turn: 2 },
      {
        type: 'hit',
        side: 'enemy',
        target: 'player',
        rawAmount: 6,
        amount: 3,
        wasCrit: false,
        mitigated: true,
        remainingHp: 31
      },
      { type: 'turnChanged', side: 'player', turn: 3 },
      { type: 'defendEnded', side: 'player' }
    ]);
    expect(result.state.player?.isDefending).toBe(false);
  });

  it('levels the player up and records the best level on a win', () => {
    const { scheduler, store } = setup(
      { enemy: { stats: { baseHp: 1, hpGrowth: 1 } } },
      [0, 0.5, 0.5, 0.5]
    );
    scheduler.start();
    const result = scheduler.chooseAttack();

    expect(result.events).toEqual([
      {
        type: 'hit',
        side: 'player',
        target: 'enemy',
        rawAmount: 6,
        amount: 6,
        wasCrit: false,
        mitigated: false,
        remainingHp: 0
      },
      { type: 'defeated', side: 'enemy' },
      { type: 'leveledUp', side: 'player', previousLevel: 1, newLevel: 2, maxHpGain: 20 },
      { type: 'bestLevelRecorded', previousBest: 1, bestLevel: 2 },
      { type: 'matchEnded', result: 'won' }
    ]);
    expect(result.state.phase).toBe('won');
    expect(result.state.outcome).toMatchObject({
      result: 'won',
      previousLevel: 1,
      playerLevel: 2,
      bestLevel: 2,
      newBest: true
    });
    expect(store.getPlayerLevel()).toBe(2);
    expect(store.getBestLevel()).toBe(2);
  });

  it('ends in a loss without touching the stored player level', () => {
    const { scheduler, store } = setup(
      { enemy: { stats: { baseAttack: 100, attackGrowth: 1 } } },
      [0, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5]
    );
    scheduler.start();
    const result = scheduler.chooseAttack();

    expect(result.events.slice(2)).toEqual([
      {
        type: 'hit',
        side: 'enemy',
        target: 'player',
        rawAmount: 70,
        amount: 70,
        wasCrit: false,
        mitigated: false,
        remainingHp: 0
      },
      { type: 'defeated', side: 'player' },
      { type: 'matchEnded', result: 'lost' }
    ]);
    expect(result.state.phase).toBe('lost');
    expect(store.hasSavedProgress()).toBe(false);
    expect(store.getBestLevel()).toBe(1);
  });

  it('ignores actions outside the player turn and reports a finished match', () => {
    const { scheduler, sink } = setup(
      { enemy: { stats: { baseHp: 1, hpGrowth: 1 } } },
      [0, 0.5, 0.5, 0.5]
    );
    expect(scheduler.chooseAttack()).toMatchObject({ status: 'ignored', events: [] });

    scheduler.start();
    expect(scheduler.start()).toMatchObject({ status: 'ignored', events: [] });
    scheduler.chooseAttack();
    const published = sink.events.length;

    const late = scheduler.chooseDefend();
    expect(late.status).toBe('matchOver');
    expect(late.events).toEqual([]);
    expect(late.state.phase).toBe('won');
    expect(sink.events).toHaveLength(published);
  });

  it('keeps the match playable when storage fails', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const broken: StorageLike = {
      getItem: () => {
        throw new Error('disk unavailable');
      },
      setItem: () => {
        throw new Error('quota exceeded');
      },
      removeItem: () => {}
    };
    const scheduler = new TurnScheduler({
      config: createBattleConfig(certainHits),
      store: new StorageProgressStore(broken),
      random: scripted([0])
    });

    const result = scheduler.start();

    expect(result.status).toBe('resolved');
    expect(result.state.phase).toBe('playerTurn');
    expect(result.state.player?.level).toBe(1);
    expect(result.persistenceError).toBeInstanceOf(PersistenceError);
    expect(result.persistenceError?.operation).toBe('read');
    expect(result.persistenceError?.key).toBe('duel-ladder:player-level');
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('labels a failed level lookup from a custom store as a read', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    class UnreachableStore extends StorageProgressStore {
      getPlayerLevel(): number {
        throw new Error('connection reset');
      }
    }
    const scheduler = new TurnScheduler({
      config: createBattleConfig(certainHits),
      store: new UnreachableStore(createMemoryStorage()),
      random: scripted([0])
    });

    const result = scheduler.start();

    expect(result.state.player?.level).toBe(1);
    expect(result.persistenceError).toBeInstanceOf(PersistenceError);
    expect(result.persistenceError?.operation).toBe('read');
    expect(result.persistenceError?.message).toBe(
      'Failed to read progress key "unknown": connection reset'
    );
  });
});

