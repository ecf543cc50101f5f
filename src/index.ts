export type {
  CombatantSide,
  CombatantStats,
  LevelCurve,
  RoundingMode,
  StatGrowth,
  StatProgression
} from './unit/types.ts';
export { computeCombatantStats, evaluateProgression, toStatProgressions } from './unit/calc.ts';
export { normalizeLevel } from './unit/level.ts';

export {
  Combatant,
  type CombatantOptions,
  type CombatantSnapshot,
  type DamageReceipt,
  type LevelUpSummary
} from './units/Combatant.ts';

export {
  DEFAULT_DEFENSE_CONSTANT,
  mitigateDamage,
  resolveAttack,
  resolveHitChance,
  rollDamage,
  rollHeal,
  rollHit,
  type AttackResolution,
  type DamageRoll
} from './combat/resolve.ts';

export { TurnScheduler, type TurnSchedulerOptions } from './battle/TurnScheduler.ts';
export { MatchOutcomeHandler, type OutcomeResolution } from './battle/outcome.ts';
export { createCombatant, determineFirstTurn, rollEnemyLevel } from './battle/setup.ts';
export { createBattleEventBus, createEventBusSink, createRecordingSink } from './battle/sinks.ts';
export { describeBattleEvent, describeBattleEvents, type CombatantNames } from './battle/messages.ts';
export { autoPlay, cautiousPolicy, type ActionPolicy, type AutoPlayResult } from './battle/autoplay.ts';
export type * from './battle/types.ts';

export {
  DEFAULT_BATTLE_CONFIG,
  collectConfigIssues,
  createBattleConfig,
  mergeBattleConfig,
  validateBattleConfig,
  type AccuracyConfig,
  type BattleConfig,
  type BattleConfigOverrides,
  type CombatantTemplate,
  type DamageConfig,
  type HealConfig,
  type LevelOffsetRange,
  type LevelingConfig
} from './config/battleConfig.ts';
export {
  ConfigurationError,
  PersistenceError,
  isPersistenceError,
  type PersistenceOperation
} from './core/errors.ts';

export {
  DEFAULT_PROGRESS_KEYS,
  StorageProgressStore,
  createMemoryStorage,
  type ProgressKeys,
  type ProgressStore,
  type StorageLike
} from './save/progressStore.ts';
export { createFileStorage } from './save/fileStorage.ts';

export { EventBus, type Listener } from './events/EventBus.ts';
export { createSeededRandom, hashSeed, randomInt, sampleUnit, type RandomSource } from './lib/rng.ts';
export { emitStructuredTelemetry, type StructuredTelemetryEntry } from './telemetry/structured.ts';
export { BattleSession, type BattleSessionOptions, type ProgressResetOptions } from './game/session.ts';
