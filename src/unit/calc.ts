import type { CombatantStats, RoundingMode, StatGrowth, StatProgression } from './types.ts';
import { curveProgress, normalizeLevel } from './level.ts';

function applyRounding(value: number, mode: RoundingMode = 'round'): number {
  switch (mode) {
    case 'floor':
      return Math.floor(value);
    case 'ceil':
      return Math.ceil(value);
    case 'none':
      return value;
    case 'round':
    default:
      return Math.round(value);
  }
}

export function evaluateProgression(progression: StatProgression, level?: number): number {
  const resolvedLevel = normalizeLevel(level);
  const progress = curveProgress(resolvedLevel, progression.curve);
  const value =
    progression.curve === 'logarithmic'
      ? progression.base * progress * progression.growth
      : progression.base + progression.growth * progress;
  const rounded = applyRounding(value, progression.round ?? 'round');
  const min = progression.min;
  return min !== undefined && Number.isFinite(min) ? Math.max(rounded, min) : rounded;
}

/** HP rounds down, attack rounds up, speed and defense round to nearest. */
export function toStatProgressions(growth: StatGrowth): Record<keyof CombatantStats, StatProgression> {
  return {
    maxHp: {
      base: growth.baseHp,
      growth: growth.hpGrowth,
      curve: 'logarithmic',
      round: 'floor',
      min: 1
    },
    attack: {
      base: growth.baseAttack,
      growth: growth.attackGrowth,
      curve: 'logarithmic',
      round: 'ceil',
      min: 1
    },
    speed: {
      base: growth.baseSpeed,
      growth: growth.speedGrowthPerLevel,
      curve: 'linear',
      round: 'round',
      min: 1
    },
    defense: {
      base: growth.baseDefense ?? 0,
      growth: growth.defenseGrowth ?? 0,
      curve: 'linear',
      round: 'round',
      min: 0
    }
  };
}

export function computeCombatantStats(growth: StatGrowth, level?: number): CombatantStats {
  const resolvedLevel = normalizeLevel(level);
  const progressions = toStatProgressions(growth);
  return {
    maxHp: evaluateProgression(progressions.maxHp, resolvedLevel),
    attack: evaluateProgression(progressions.attack, resolvedLevel),
    speed: evaluateProgression(progressions.speed, resolvedLevel),
    defense: evaluateProgression(progressions.defense, resolvedLevel)
  } satisfies CombatantStats;
}
