import type { AccuracyConfig, DamageConfig, HealConfig } from '../config/battleConfig.ts';
import type { DamageReceipt, Combatant } from '../units/Combatant.ts';
import type { CombatantSide } from '../unit/types.ts';
import { randomInt, sampleUnit, type RandomSource } from '../lib/rng.ts';

export const DEFAULT_DEFENSE_CONSTANT = 100;

export interface DamageRoll {
  readonly amount: number;
  readonly wasCrit: boolean;
}

export interface AttackResolution {
  readonly attacker: CombatantSide;
  readonly defender: CombatantSide;
  readonly hitChance: number;
  readonly hit: boolean;
  /** Present only when the attack landed. */
  readonly roll: DamageRoll | null;
  readonly receipt: DamageReceipt | null;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function clampNonNegative(value: number): number {
  return Number.isFinite(value) ? Math.max(0, value) : 0;
}

export function resolveHitChance(
  attackerSpeed: number,
  defenderSpeed: number,
  accuracy: AccuracyConfig
): number {
  const raw = accuracy.baseHitChance + (attackerSpeed - defenderSpeed) * accuracy.speedFactor;
  return clamp(raw, accuracy.minHitChance, accuracy.maxHitChance);
}

/** One draw; a draw equal to the chance still hits. */
export function rollHit(chance: number, random: RandomSource): boolean {
  return sampleUnit(random) <= chance;
}

/**
 * Draw order is fixed: damage first, then the crit check. Damage is not
 * floored at 1 here; mitigation enforces that later.
 */
export function rollDamage(attack: number, damage: DamageConfig, random: RandomSource): DamageRoll {
  const high = Math.ceil(attack * damage.maxMultiplier);
  let low = Math.floor(attack * damage.minMultiplier);
  if (low > high) {
    low = high;
  }
  const base = randomInt(low, high, random);
  const wasCrit = sampleUnit(random) < damage.critChance;
  return {
    amount: wasCrit ? Math.ceil(base * damage.critMultiplier) : base,
    wasCrit
  };
}

export function rollHeal(
  level: number,
  heal: HealConfig,
  random: RandomSource,
  missingHp: number
): number {
  let low = clampNonNegative(Math.floor(level * heal.minMultiplier));
  const high = clampNonNegative(Math.ceil(level * heal.maxMultiplier));
  if (low > high) {
    low = high;
  }
  let amount = randomInt(low, high, random);
  if (heal.minimumHealOne && amount === 0) {
    amount = 1;
  }
  return Math.min(amount, clampNonNegative(missingHp));
}

/** A defended hit always costs at least 1 HP, even when the roll was 0. */
export function mitigateDamage(
  amount: number,
  defense: number,
  defenseConstant: number = DEFAULT_DEFENSE_CONSTANT
): number {
  const raw = clampNonNegative(amount);
  const scaled = (raw * defenseConstant) / (defenseConstant + clampNonNegative(defense));
  return Math.max(1, Math.round(scaled));
}

export function resolveAttack(
  attacker: Combatant,
  defender: Combatant,
  config: { readonly accuracy: AccuracyConfig; readonly damage: DamageConfig },
  random: RandomSource
): AttackResolution {
  const hitChance = resolveHitChance(attacker.speed, defender.speed, config.accuracy);
  const hit = rollHit(hitChance, random);
  if (!hit) {
    return {
      attacker: attacker.side,
      defender: defender.side,
      hitChance,
      hit,
      roll: null,
      receipt: null
    };
  }

  const roll = rollDamage(attacker.attack, config.damage, random);
  const receipt = defender.receiveHit(roll.amount);
  return {
    attacker: attacker.side,
    defender: defender.side,
    hitChance,
    hit,
    roll,
    receipt
  };
}
