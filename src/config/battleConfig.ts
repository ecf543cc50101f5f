import type { StatGrowth } from '../unit/types.ts';
import { ConfigurationError } from '../core/errors.ts';

export interface CombatantTemplate {
  readonly name: string;
  readonly stats: StatGrowth;
}

export interface DamageConfig {
  readonly minMultiplier: number;
  readonly maxMultiplier: number;
  /** Probability in `[0, 1]` that a landed hit is critical. */
  readonly critChance: number;
  readonly critMultiplier: number;
}

export interface HealConfig {
  readonly minMultiplier: number;
  readonly maxMultiplier: number;
  /** Lift a rolled heal of 0 to 1 before clamping to missing HP. */
  readonly minimumHealOne: boolean;
}

export interface AccuracyConfig {
  readonly baseHitChance: number;
  /** Hit chance added per point of speed the attacker has over the defender. */
  readonly speedFactor: number;
  readonly minHitChance: number;
  readonly maxHitChance: number;
}

export interface LevelOffsetRange {
  readonly min: number;
  readonly max: number;
}

export interface LevelingConfig {
  readonly levelUpAmount: number;
  readonly enemyLevelOffset: LevelOffsetRange;
  /** Player level written by a fresh run. */
  readonly startingLevel: number;
}

export interface BattleConfig {
  readonly player: CombatantTemplate;
  readonly enemy: CombatantTemplate;
  readonly damage: DamageConfig;
  readonly heal: HealConfig;
  readonly accuracy: AccuracyConfig;
  readonly leveling: LevelingConfig;
  readonly defenseConstant: number;
}

export type BattleConfigOverrides = {
  readonly player?: { readonly name?: string; readonly stats?: Partial<StatGrowth> };
  readonly enemy?: { readonly name?: string; readonly stats?: Partial<StatGrowth> };
  readonly damage?: Partial<DamageConfig>;
  readonly heal?: Partial<HealConfig>;
  readonly accuracy?: Partial<AccuracyConfig>;
  readonly leveling?: {
    readonly levelUpAmount?: number;
    readonly enemyLevelOffset?: Partial<LevelOffsetRange>;
    readonly startingLevel?: number;
  };
  readonly defenseConstant?: number;
};

const DEFAULT_GROWTH: StatGrowth = Object.freeze({
  baseHp: 20,
  hpGrowth: 2.5,
  baseAttack: 5,
  attackGrowth: 1.5,
  baseSpeed: 10,
  speedGrowthPerLevel: 0.5,
  baseDefense: 0,
  defenseGrowth: 0
});

export const DEFAULT_BATTLE_CONFIG: BattleConfig = Object.freeze({
  player: Object.freeze({ name: 'Hero', stats: DEFAULT_GROWTH }),
  enemy: Object.freeze({ name: 'Goblin', stats: DEFAULT_GROWTH }),
  damage: Object.freeze({
    minMultiplier: 0.8,
    maxMultiplier: 1.2,
    critChance: 0.1,
    critMultiplier: 1.5
  }),
  heal: Object.freeze({
    minMultiplier: 0.5,
    maxMultiplier: 1.5,
    minimumHealOne: false
  }),
  accuracy: Object.freeze({
    baseHitChance: 0.95,
    speedFactor: 0.01,
    minHitChance: 0.05,
    maxHitChance: 1
  }),
  leveling: Object.freeze({
    levelUpAmount: 1,
    enemyLevelOffset: Object.freeze({ min: -1, max: 2 }),
    startingLevel: 1
  }),
  defenseConstant: 100
});

function mergeTemplate(
  base: CombatantTemplate,
  override: BattleConfigOverrides['player']
): CombatantTemplate {
  return {
    name: override?.name ?? base.name,
    stats: { ...base.stats, ...override?.stats }
  };
}

export function mergeBattleConfig(
  base: BattleConfig,
  overrides: BattleConfigOverrides = {}
): BattleConfig {
  return {
    player: mergeTemplate(base.player, overrides.player),
    enemy: mergeTemplate(base.enemy, overrides.enemy),
    damage: { ...base.damage, ...overrides.damage },
    heal: { ...base.heal, ...overrides.heal },
    accuracy: { ...base.accuracy, ...overrides.accuracy },
    leveling: {
      levelUpAmount: overrides.leveling?.levelUpAmount ?? base.leveling.levelUpAmount,
      enemyLevelOffset: {
        ...base.leveling.enemyLevelOffset,
        ...overrides.leveling?.enemyLevelOffset
      },
      startingLevel: overrides.leveling?.startingLevel ?? base.leveling.startingLevel
    },
    defenseConstant: overrides.defenseConstant ?? base.defenseConstant
  };
}

class IssueCollector {
  readonly issues: string[] = [];

  finite(path: string, value: number): boolean {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.issues.push(`${path} must be a finite number (received ${String(value)})`);
      return false;
    }
    return true;
  }

  atLeast(path: string, value: number, min: number): void {
    if (this.finite(path, value) && value < min) {
      this.issues.push(`${path} must be at least ${min} (received ${value})`);
    }
  }

  probability(path: string, value: number): void {
    if (this.finite(path, value) && (value < 0 || value > 1)) {
      this.issues.push(`${path} must be within [0, 1] (received ${value})`);
    }
  }

  integer(path: string, value: number, min?: number): void {
    if (!this.finite(path, value)) {
      return;
    }
    if (!Number.isInteger(value)) {
      this.issues.push(`${path} must be an integer (received ${value})`);
    } else if (min !== undefined && value < min) {
      this.issues.push(`${path} must be at least ${min} (received ${value})`);
    }
  }

  ordered(path: string, low: number, high: number): void {
    if (Number.isFinite(low) && Number.isFinite(high) && low > high) {
      this.issues.push(`${path} is inverted (min ${low} > max ${high})`);
    }
  }
}

function checkTemplate(collect: IssueCollector, side: string, template: CombatantTemplate): void {
  if (typeof template.name !== 'string' || template.name.trim().length === 0) {
    collect.issues.push(`${side}.name must be a non-empty string`);
  }
  const stats = template.stats;
  collect.atLeast(`${side}.stats.baseHp`, stats.baseHp, 0);
  collect.atLeast(`${side}.stats.hpGrowth`, stats.hpGrowth, 0);
  collect.atLeast(`${side}.stats.baseAttack`, stats.baseAttack, 0);
  collect.atLeast(`${side}.stats.attackGrowth`, stats.attackGrowth, 0);
  collect.atLeast(`${side}.stats.baseSpeed`, stats.baseSpeed, 0);
  collect.finite(`${side}.stats.speedGrowthPerLevel`, stats.speedGrowthPerLevel);
  collect.atLeast(`${side}.stats.baseDefense`, stats.baseDefense ?? 0, 0);
  collect.atLeast(`${side}.stats.defenseGrowth`, stats.defenseGrowth ?? 0, 0);
}

/** Returns every problem with the configuration; an empty list means valid. */
export function collectConfigIssues(config: BattleConfig): string[] {
  const collect = new IssueCollector();

  checkTemplate(collect, 'player', config.player);
  checkTemplate(collect, 'enemy', config.enemy);

  const { damage, heal, accuracy, leveling } = config;
  collect.atLeast('damage.minMultiplier', damage.minMultiplier, 0);
  collect.atLeast('damage.maxMultiplier', damage.maxMultiplier, 0);
  collect.ordered('damage multiplier range', damage.minMultiplier, damage.maxMultiplier);
  collect.probability('damage.critChance', damage.critChance);
  collect.atLeast('damage.critMultiplier', damage.critMultiplier, 1);

  collect.atLeast('heal.minMultiplier', heal.minMultiplier, 0);
  collect.atLeast('heal.maxMultiplier', heal.maxMultiplier, 0);
  collect.ordered('heal multiplier range', heal.minMultiplier, heal.maxMultiplier);
  if (typeof heal.minimumHealOne !== 'boolean') {
    collect.issues.push('heal.minimumHealOne must be a boolean');
  }

  collect.probability('accuracy.baseHitChance', accuracy.baseHitChance);
  collect.atLeast('accuracy.speedFactor', accuracy.speedFactor, 0);
  collect.probability('accuracy.minHitChance', accuracy.minHitChance);
  collect.probability('accuracy.maxHitChance', accuracy.maxHitChance);
  collect.ordered('hit chance bounds', accuracy.minHitChance, accuracy.maxHitChance);

  collect.integer('leveling.levelUpAmount', leveling.levelUpAmount, 0);
  collect.integer('leveling.enemyLevelOffset.min', leveling.enemyLevelOffset.min);
  collect.integer('leveling.enemyLevelOffset.max', leveling.enemyLevelOffset.max);
  collect.ordered(
    'enemy level offset range',
    leveling.enemyLevelOffset.min,
    leveling.enemyLevelOffset.max
  );
  collect.integer('leveling.startingLevel', leveling.startingLevel, 1);

  if (collect.finite('defenseConstant', config.defenseConstant) && config.defenseConstant <= 0) {
    collect.issues.push(`defenseConstant must be positive (received ${config.defenseConstant})`);
  }

  return collect.issues;
}

export function validateBattleConfig(config: BattleConfig): BattleConfig {
  const issues = collectConfigIssues(config);
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return config;
}

/** Defaults merged with `overrides`, validated. */
export function createBattleConfig(overrides: BattleConfigOverrides = {}): BattleConfig {
  return validateBattleConfig(mergeBattleConfig(DEFAULT_BATTLE_CONFIG, overrides));
}
