import type { CombatantSide } from '../unit/types.ts';
import type { CombatantSnapshot } from '../units/Combatant.ts';
import type { PersistenceError } from '../core/errors.ts';

export type MatchPhase = 'setup' | 'playerTurn' | 'enemyTurn' | 'won' | 'lost';

export type MatchResult = 'won' | 'lost';

export type PlayerAction = 'attack' | 'heal' | 'defend';

export interface MatchStartedEvent {
  readonly type: 'matchStarted';
  readonly playerLevel: number;
  readonly enemyLevel: number;
  readonly firstTurn: CombatantSide;
}

export interface TurnChangedEvent {
  readonly type: 'turnChanged';
  readonly side: CombatantSide;
  readonly turn: number;
}

export interface MissedEvent {
  readonly type: 'missed';
  readonly side: CombatantSide;
  readonly target: CombatantSide;
  readonly hitChance: number;
}

export interface CriticalHitEvent {
  readonly type: 'criticalHit';
  readonly side: CombatantSide;
}

export interface HitEvent {
  readonly type: 'hit';
  readonly side: CombatantSide;
  readonly target: CombatantSide;
  /** Rolled damage before any defend mitigation. */
  readonly rawAmount: number;
  readonly amount: number;
  readonly wasCrit: boolean;
  readonly mitigated: boolean;
  readonly remainingHp: number;
}

export interface HealedEvent {
  readonly type: 'healed';
  readonly side: CombatantSide;
  readonly amount: number;
  readonly currentHp: number;
}

export interface HealRejectedEvent {
  readonly type: 'healRejected';
  readonly side: CombatantSide;
  readonly reason: 'fullHealth';
}

export interface DefendStartedEvent {
  readonly type: 'defendStarted';
  readonly side: CombatantSide;
}

export interface DefendEndedEvent {
  readonly type: 'defendEnded';
  readonly side: CombatantSide;
}

export interface DefeatedEvent {
  readonly type: 'defeated';
  readonly side: CombatantSide;
}

export interface LeveledUpEvent {
  readonly type: 'leveledUp';
  readonly side: CombatantSide;
  readonly previousLevel: number;
  readonly newLevel: number;
  readonly maxHpGain: number;
}

export interface BestLevelRecordedEvent {
  readonly type: 'bestLevelRecorded';
  readonly previousBest: number;
  readonly bestLevel: number;
}

export interface MatchEndedEvent {
  readonly type: 'matchEnded';
  readonly result: MatchResult;
}

export type BattleEvent =
  | MatchStartedEvent
  | TurnChangedEvent
  | MissedEvent
  | CriticalHitEvent
  | HitEvent
  | HealedEvent
  | HealRejectedEvent
  | DefendStartedEvent
  | DefendEndedEvent
  | DefeatedEvent
  | LeveledUpEvent
  | BestLevelRecordedEvent
  | MatchEndedEvent;

export type BattleEventType = BattleEvent['type'];

/** Event payloads keyed by `type`, for use with an {@link EventBus}. */
export type BattleEventMap = {
  [K in BattleEventType]: Extract<BattleEvent, { type: K }>;
};

export interface BattleEventSink {
  publish(event: BattleEvent): void;
}

export interface MatchOutcome {
  readonly result: MatchResult;
  readonly previousLevel: number;
  readonly playerLevel: number;
  readonly bestLevel: number;
  readonly newBest: boolean;
  readonly player: CombatantSnapshot;
  readonly enemy: CombatantSnapshot;
}

export interface MatchSnapshot {
  readonly phase: MatchPhase;
  readonly turn: number;
  readonly player: CombatantSnapshot | null;
  readonly enemy: CombatantSnapshot | null;
  readonly outcome: MatchOutcome | null;
}

/**
 * `ignored`: the call arrived outside the player's turn.
 * `matchOver`: the match already ended.
 * `reprompt`: the player must choose again without losing the turn.
 */
export type ActionStatus = 'resolved' | 'reprompt' | 'ignored' | 'matchOver';

export interface ActionResult {
  readonly status: ActionStatus;
  readonly state: MatchSnapshot;
  readonly events: readonly BattleEvent[];
  /** Storage failure met while resolving; the match itself stays valid. */
  readonly persistenceError: PersistenceError | null;
}
