import type { BattleConfig, LevelOffsetRange } from '../config/battleConfig.ts';
import type { CombatantSide } from '../unit/types.ts';
import { normalizeLevel } from '../unit/level.ts';
import { Combatant } from '../units/Combatant.ts';
import { randomInt, type RandomSource } from '../lib/rng.ts';

/** Player level shifted by a uniform offset from the inclusive range, floored at 1. */
export function rollEnemyLevel(
  playerLevel: number,
  offset: LevelOffsetRange,
  random: RandomSource
): number {
  return Math.max(1, normalizeLevel(playerLevel) + randomInt(offset.min, offset.max, random));
}

/** The faster side opens; the player wins ties. */
export function determineFirstTurn(player: Combatant, enemy: Combatant): CombatantSide {
  return player.speed >= enemy.speed ? 'player' : 'enemy';
}

export function createCombatant(
  config: BattleConfig,
  side: CombatantSide,
  level: number
): Combatant {
  const template = side === 'player' ? config.player : config.enemy;
  return new Combatant({
    name: template.name,
    side,
    growth: template.stats,
    level,
    defenseConstant: config.defenseConstant
  });
}
