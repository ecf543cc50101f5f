import { DEFAULT_BATTLE_CONFIG, validateBattleConfig, type BattleConfig } from '../config/battleConfig.ts';
import {
  toPersistenceError,
  type PersistenceError,
  type PersistenceOperation
} from '../core/errors.ts';
import { resolveAttack, rollHeal } from '../combat/resolve.ts';
import type { RandomSource } from '../lib/rng.ts';
import type { ProgressStore } from '../save/progressStore.ts';
import { emitStructuredTelemetry, reportPersistenceFailure } from '../telemetry/structured.ts';
import type { Combatant } from '../units/Combatant.ts';
import { MatchOutcomeHandler } from './outcome.ts';
import { createCombatant, determineFirstTurn, rollEnemyLevel } from './setup.ts';
import type {
  ActionResult,
  ActionStatus,
  BattleEvent,
  BattleEventSink,
  MatchOutcome,
  MatchPhase,
  MatchResult,
  MatchSnapshot,
  PlayerAction
} from './types.ts';

export interface TurnSchedulerOptions {
  readonly store: ProgressStore;
  readonly config?: BattleConfig;
  readonly random?: RandomSource;
  readonly sink?: BattleEventSink | null;
}

interface Resolution {
  readonly events: BattleEvent[];
  persistenceError: PersistenceError | null;
}

function capturePersistence(
  resolution: Resolution,
  context: string,
  operation: PersistenceOperation,
  error: unknown
): void {
  const wrapped = toPersistenceError(operation, error);
  reportPersistenceFailure(context, wrapped);
  resolution.persistenceError ??= wrapped;
}

/**
 * Drives one match: setup, alternating player and enemy turns, and the
 * terminal outcome. Every entry point resolves synchronously and returns
 * the ordered events for presentation to replay at its own pace.
 */
export class TurnScheduler {
  private readonly config: BattleConfig;
  private readonly store: ProgressStore;
  private readonly random: RandomSource;
  private readonly sink: BattleEventSink | null;
  private readonly outcomeHandler: MatchOutcomeHandler;
  private phaseValue: MatchPhase = 'setup';
  private turn = 0;
  private player: Combatant | null = null;
  private enemy: Combatant | null = null;
  private outcome: MatchOutcome | null = null;

  constructor(options: TurnSchedulerOptions) {
    this.config = validateBattleConfig(options.config ?? DEFAULT_BATTLE_CONFIG);
    this.store = options.store;
    this.random = options.random ?? Math.random;
    this.sink = options.sink ?? null;
    this.outcomeHandler = new MatchOutcomeHandler(this.store, this.config.leveling);
  }

  get phase(): MatchPhase {
    return this.phaseValue;
  }

  isOver(): boolean {
    return this.phaseValue === 'won' || this.phaseValue === 'lost';
  }

  getState(): MatchSnapshot {
    return {
      phase: this.phaseValue,
      turn: this.turn,
      player: this.player?.snapshot() ?? null,
      enemy: this.enemy?.snapshot() ?? null,
      outcome: this.outcome
    };
  }

  /**
   * Builds both combatants from saved progress and opens the first turn.
   * When the enemy is faster its opening attack resolves here as well.
   */
  start(): ActionResult {
    if (this.phaseValue !== 'setup') {
      return this.finish(this.isOver() ? 'matchOver' : 'ignored', []);
    }

    const resolution: Resolution = { events: [], persistenceError: null };

    let playerLevel = 1;
    try {
      playerLevel = this.store.getPlayerLevel();
    } catch (error) {
      capturePersistence(resolution, 'setup', 'read', error);
    }
    const enemyLevel = rollEnemyLevel(playerLevel, this.config.leveling.enemyLevelOffset, this.random);
    try {
      this.store.setEnemyLevel(enemyLevel);
    } catch (error) {
      capturePersistence(resolution, 'setup', 'write', error);
    }

    const player = createCombatant(this.config, 'player', playerLevel);
    const enemy = createCombatant(this.config, 'enemy', enemyLevel);
    this.player = player;
    this.enemy = enemy;

    const firstTurn = determineFirstTurn(player, enemy);
    resolution.events.push({
      type: 'matchStarted',
      playerLevel: player.level,
      enemyLevel: enemy.level,
      firstTurn
    });
    emitStructuredTelemetry('battle:matchStarted', {
      playerLevel: player.level,
      enemyLevel: enemy.level,
      playerSpeed: player.speed,
      enemySpeed: enemy.speed,
      firstTurn
    });

    if (firstTurn === 'player') {
      this.enterPlayerTurn(player, resolution);
    } else {
      this.runEnemyTurn(player, enemy, resolution);
    }

    return this.finish('resolved', resolution.events, resolution.persistenceError);
  }

  chooseAttack(): ActionResult {
    return this.choose('attack');
  }

  chooseHeal(): ActionResult {
    return this.choose('heal');
  }

  chooseDefend(): ActionResult {
    return this.choose('defend');
  }

  choose(action: PlayerAction): ActionResult {
    if (this.isOver()) {
      return this.finish('matchOver', []);
    }
    const player = this.player;
    const enemy = this.enemy;
    if (this.phaseValue !== 'playerTurn' || !player || !enemy) {
      return this.finish('ignored', []);
    }

    const resolution: Resolution = { events: [], persistenceError: null };

    switch (action) {
      case 'attack': {
        if (this.performAttack(player, enemy, resolution)) {
          this.conclude('won', resolution);
        } else {
          this.runEnemyTurn(player, enemy, resolution);
        }
        break;
      }
      case 'heal': {
        if (player.currentHp >= player.maxHp) {
          resolution.events.push({ type: 'healRejected', side: player.side, reason: 'fullHealth' });
          return this.finish('reprompt', resolution.events);
        }
        const amount = rollHeal(player.level, this.config.heal, this.random, player.missingHp);
        player.heal(amount);
        resolution.events.push({
          type: 'healed',
          side: player.side,
          amount,
          currentHp: player.currentHp
        });
        this.runEnemyTurn(player, enemy, resolution);
        break;
      }
      case 'defend': {
        player.startDefending();
        resolution.events.push({ type: 'defendStarted', side: player.side });
        this.runEnemyTurn(player, enemy, resolution);
        break;
      }
    }

    return this.finish('resolved', resolution.events, resolution.persistenceError);
  }

  private enterPlayerTurn(player: Combatant, resolution: Resolution): void {
    this.phaseValue = 'playerTurn';
    this.turn += 1;
    resolution.events.push({ type: 'turnChanged', side: 'player', turn: this.turn });
    if (player.isDefending) {
      player.endDefending();
      resolution.events.push({ type: 'defendEnded', side: player.side });
    }
  }

  /** The enemy only attacks; a surviving player gets the next turn. */
  private runEnemyTurn(player: Combatant, enemy: Combatant, resolution: Resolution): void {
    this.phaseValue = 'enemyTurn';
    this.turn += 1;
    resolution.events.push({ type: 'turnChanged', side: 'enemy', turn: this.turn });
    if (enemy.isDefending) {
      enemy.endDefending();
      resolution.events.push({ type: 'defendEnded', side: enemy.side });
    }

    if (this.performAttack(enemy, player, resolution)) {
      this.conclude('lost', resolution);
      return;
    }
    this.enterPlayerTurn(player, resolution);
  }

  /** Returns whether the defender was defeated. */
  private performAttack(attacker: Combatant, defender: Combatant, resolution: Resolution): boolean {
    const attack = resolveAttack(attacker, defender, this.config, this.random);
    if (!attack.hit || !attack.roll || !attack.receipt) {
      resolution.events.push({
        type: 'missed',
        side: attacker.side,
        target: defender.side,
        hitChance: attack.hitChance
      });
      return false;
    }

    if (attack.roll.wasCrit) {
      resolution.events.push({ type: 'criticalHit', side: attacker.side });
    }
    resolution.events.push({
      type: 'hit',
      side: attacker.side,
      target: defender.side,
      rawAmount: attack.receipt.raw,
      amount: attack.receipt.applied,
      wasCrit: attack.roll.wasCrit,
      mitigated: attack.receipt.mitigated,
      remainingHp: attack.receipt.remainingHp
    });

    if (attack.receipt.defeated) {
      resolution.events.push({ type: 'defeated', side: defender.side });
      return true;
    }
    return false;
  }

  private conclude(result: MatchResult, resolution: Resolution): void {
    const player = this.player;
    const enemy = this.enemy;
    if (!player || !enemy) {
      return;
    }
    this.phaseValue = result;
    const settled = this.outcomeHandler.resolve(result, player, enemy);
    resolution.events.push(...settled.events);
    if (settled.persistenceError) {
      capturePersistence(resolution, 'match outcome', 'write', settled.persistenceError);
    }
    this.outcome = settled.outcome;
    emitStructuredTelemetry('battle:matchEnded', {
      result,
      turns: this.turn,
      playerLevel: settled.outcome.playerLevel,
      bestLevel: settled.outcome.bestLevel,
      newBest: settled.outcome.newBest
    });
  }

  private finish(
    status: ActionStatus,
    events: readonly BattleEvent[],
    persistenceError: PersistenceError | null = null
  ): ActionResult {
    if (this.sink) {
      for (const event of events) {
        this.sink.publish(event);
      }
    }
    return { status, state: this.getState(), events, persistenceError };
  }
}
