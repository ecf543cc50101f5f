import { DEFAULT_BATTLE_CONFIG, validateBattleConfig, type BattleConfig } from '../config/battleConfig.ts';
import {
  toPersistenceError,
  type PersistenceError,
  type PersistenceOperation
} from '../core/errors.ts';
import type { RandomSource } from '../lib/rng.ts';
import type { ProgressStore } from '../save/progressStore.ts';
import { emitStructuredTelemetry, reportPersistenceFailure } from '../telemetry/structured.ts';
import { TurnScheduler } from '../battle/TurnScheduler.ts';
import type { ActionResult, BattleEventSink, MatchSnapshot } from '../battle/types.ts';

export interface BattleSessionOptions {
  readonly store: ProgressStore;
  readonly config?: BattleConfig;
  readonly random?: RandomSource;
  readonly sink?: BattleEventSink | null;
}

export interface ProgressResetOptions {
  /** Clear the stored player and enemy level; the best level survives. */
  readonly resetProgress?: boolean;
}

const IDLE_STATE: MatchSnapshot = Object.freeze({
  phase: 'setup',
  turn: 0,
  player: null,
  enemy: null,
  outcome: null
});

/**
 * A run of consecutive matches over one progress store: the menu flow of
 * starting, continuing, advancing after a win and retrying after a loss.
 */
export class BattleSession {
  private readonly config: BattleConfig;
  private readonly store: ProgressStore;
  private readonly random: RandomSource | undefined;
  private readonly sink: BattleEventSink | null;
  private match: TurnScheduler | null = null;

  constructor(options: BattleSessionOptions) {
    this.config = validateBattleConfig(options.config ?? DEFAULT_BATTLE_CONFIG);
    this.store = options.store;
    this.random = options.random;
    this.sink = options.sink ?? null;
  }

  get currentMatch(): TurnScheduler | null {
    return this.match;
  }

  getState(): MatchSnapshot {
    return this.match?.getState() ?? IDLE_STATE;
  }

  /** Throws {@link PersistenceError} when the store cannot be read. */
  hasSavedProgress(): boolean {
    return this.store.hasSavedProgress();
  }

  /** Throws {@link PersistenceError} when the store cannot be read. */
  getBestLevel(): number {
    return this.store.getBestLevel();
  }

  startNewGame(): ActionResult {
    let failure: PersistenceError | null = null;
    try {
      this.store.setPlayerLevel(this.config.leveling.startingLevel);
      this.store.setEnemyLevel(1);
    } catch (error) {
      failure = this.capture('new game', 'write', error);
    }
    emitStructuredTelemetry('session:newGame', {
      startingLevel: this.config.leveling.startingLevel
    });
    return this.begin(failure);
  }

  continueGame(): ActionResult {
    return this.begin(null);
  }

  /** Starts the following match; only valid once the current one is won. */
  nextBattle(): ActionResult {
    if (this.match?.phase !== 'won') {
      return this.ignored();
    }
    return this.begin(null);
  }

  /** Starts over after a loss, optionally from a cleared save. */
  retry(options: ProgressResetOptions = {}): ActionResult {
    if (this.match?.phase !== 'lost') {
      return this.ignored();
    }
    const failure = options.resetProgress ? this.resetProgress('retry') : null;
    return this.begin(failure);
  }

  /** Drops the current match. Returns the storage failure met while resetting, if any. */
  quit(options: ProgressResetOptions = {}): PersistenceError | null {
    const failure = options.resetProgress ? this.resetProgress('quit') : null;
    emitStructuredTelemetry('session:quit', {
      phase: this.match?.phase ?? 'setup',
      resetProgress: options.resetProgress === true
    });
    this.match = null;
    return failure;
  }

  private begin(prior: PersistenceError | null): ActionResult {
    const match = new TurnScheduler({
      config: this.config,
      store: this.store,
      random: this.random,
      sink: this.sink
    });
    this.match = match;
    const result = match.start();
    if (!prior) {
      return result;
    }
    return { ...result, persistenceError: prior };
  }

  private resetProgress(context: string): PersistenceError | null {
    try {
      this.store.resetProgress();
      return null;
    } catch (error) {
      return this.capture(context, 'reset', error);
    }
  }

  private capture(context: string, operation: PersistenceOperation, error: unknown): PersistenceError {
    const wrapped = toPersistenceError(operation, error);
    reportPersistenceFailure(context, wrapped);
    return wrapped;
  }

  private ignored(): ActionResult {
    return { status: 'ignored', state: this.getState(), events: [], persistenceError: null };
  }
}
