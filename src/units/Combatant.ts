import type { CombatantSide, CombatantStats, StatGrowth } from '../unit/types.ts';
import { computeCombatantStats } from '../unit/calc.ts';
import { normalizeLevel } from '../unit/level.ts';
import { DEFAULT_DEFENSE_CONSTANT, mitigateDamage } from '../combat/resolve.ts';

export interface CombatantOptions {
  readonly name: string;
  readonly side: CombatantSide;
  readonly growth: StatGrowth;
  readonly level?: number;
  readonly defenseConstant?: number;
}

export interface DamageReceipt {
  /** Damage before the defend stance was applied. */
  readonly raw: number;
  readonly applied: number;
  readonly mitigated: boolean;
  readonly defeated: boolean;
  readonly remainingHp: number;
}

export interface LevelUpSummary {
  readonly previousLevel: number;
  readonly level: number;
  readonly maxHpGain: number;
}

export interface CombatantSnapshot extends CombatantStats {
  readonly name: string;
  readonly side: CombatantSide;
  readonly level: number;
  readonly currentHp: number;
  readonly isDefending: boolean;
}

function toWholeAmount(amount: number): number {
  return Number.isFinite(amount) ? Math.max(0, Math.round(amount)) : 0;
}

/** One side of a duel: level-derived stats, current HP and the defend stance. */
export class Combatant {
  readonly name: string;
  readonly side: CombatantSide;
  private readonly growth: StatGrowth;
  private readonly defenseConstant: number;
  private levelValue = 1;
  private stats: CombatantStats;
  private hp = 0;
  private defending = false;

  constructor(options: CombatantOptions) {
    this.name = options.name;
    this.side = options.side;
    this.growth = { ...options.growth };
    this.defenseConstant = options.defenseConstant ?? DEFAULT_DEFENSE_CONSTANT;
    this.stats = computeCombatantStats(this.growth, 1);
    this.initialize(options.level ?? 1);
  }

  get level(): number {
    return this.levelValue;
  }

  get maxHp(): number {
    return this.stats.maxHp;
  }

  get attack(): number {
    return this.stats.attack;
  }

  get speed(): number {
    return this.stats.speed;
  }

  get defense(): number {
    return this.stats.defense;
  }

  get currentHp(): number {
    return this.hp;
  }

  get isDefending(): boolean {
    return this.defending;
  }

  get missingHp(): number {
    return this.stats.maxHp - this.hp;
  }

  isDefeated(): boolean {
    return this.hp <= 0;
  }

  /** Recompute stats for `level` and heal to full. */
  initialize(level: number): void {
    this.levelValue = normalizeLevel(level);
    this.stats = computeCombatantStats(this.growth, this.levelValue);
    this.hp = this.stats.maxHp;
    this.defending = false;
  }

  /** Heals by the gain in max HP only, keeping damage already taken. */
  levelUp(levels = 1): LevelUpSummary {
    const previousLevel = this.levelValue;
    if (!Number.isFinite(levels) || levels <= 0) {
      return { previousLevel, level: previousLevel, maxHpGain: 0 };
    }
    const previousMax = this.stats.maxHp;
    this.levelValue = normalizeLevel(previousLevel + Math.floor(levels));
    this.stats = computeCombatantStats(this.growth, this.levelValue);
    const gain = this.stats.maxHp - previousMax;
    this.hp = Math.min(this.hp, this.stats.maxHp);
    if (gain > 0) {
      this.heal(gain);
    }
    return { previousLevel, level: this.levelValue, maxHpGain: gain };
  }

  /** Returns whether the hit left this combatant at 0 HP. */
  takeDamage(amount: number): boolean {
    return this.receiveHit(amount).defeated;
  }

  /**
   * The defend stance survives the hit; it is cleared when this
   * combatant's own next turn begins.
   */
  receiveHit(amount: number): DamageReceipt {
    const raw = toWholeAmount(amount);
    const applied = this.defending ? mitigateDamage(raw, this.stats.defense, this.defenseConstant) : raw;
    this.hp = Math.min(this.stats.maxHp, Math.max(0, this.hp - applied));
    return {
      raw,
      applied,
      mitigated: this.defending,
      defeated: this.hp <= 0,
      remainingHp: this.hp
    };
  }

  heal(amount: number): void {
    const value = toWholeAmount(amount);
    this.hp = Math.min(this.hp + value, this.stats.maxHp);
  }

  startDefending(): void {
    this.defending = true;
  }

  endDefending(): void {
    this.defending = false;
  }

  snapshot(): CombatantSnapshot {
    return {
      name: this.name,
      side: this.side,
      level: this.levelValue,
      currentHp: this.hp,
      isDefending: this.defending,
      ...this.stats
    };
  }
}
