export type CombatantSide = 'player' | 'enemy';

/** `logarithmic`: base × growth × ln(level + 1). `linear`: base + growth × (level − 1). */
export type LevelCurve = 'logarithmic' | 'linear';

export type RoundingMode = 'floor' | 'ceil' | 'round' | 'none';

export interface StatProgression {
  /** Base value the curve starts from. */
  base: number;
  /** Growth factor applied according to {@link curve}. */
  growth: number;
  curve: LevelCurve;
  /** Minimum bound applied after rounding. */
  min?: number;
  round?: RoundingMode;
}

/**
 * Per-side growth tunables. Defense is optional; a side without it has a
 * defense of 0 at every level.
 */
export interface StatGrowth {
  baseHp: number;
  hpGrowth: number;
  baseAttack: number;
  attackGrowth: number;
  baseSpeed: number;
  speedGrowthPerLevel: number;
  baseDefense?: number;
  defenseGrowth?: number;
}

export interface CombatantStats {
  maxHp: number;
  attack: number;
  speed: number;
  defense: number;
}
