import { PersistenceError } from '../core/errors.ts';

export interface StorageLike {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

/** Read/write contract for progress that survives between matches. */
export interface ProgressStore {
  getPlayerLevel(): number;
  setPlayerLevel(level: number): void;
  getEnemyLevel(): number;
  setEnemyLevel(level: number): void;
  getBestLevel(): number;
  setBestLevel(level: number): void;
  /** Clears player and enemy level; the best level is kept. */
  resetProgress(): void;
  hasSavedProgress(): boolean;
}

export interface ProgressKeys {
  readonly playerLevel: string;
  readonly enemyLevel: string;
  readonly bestLevel: string;
}

export const DEFAULT_PROGRESS_KEYS: ProgressKeys = Object.freeze({
  playerLevel: 'duel-ladder:player-level',
  enemyLevel: 'duel-ladder:enemy-level',
  bestLevel: 'duel-ladder:best-level'
});

const DEFAULT_LEVEL = 1;

function sanitizeLevel(value: number): number {
  if (!Number.isFinite(value)) {
    return DEFAULT_LEVEL;
  }
  return Math.max(DEFAULT_LEVEL, Math.trunc(value));
}

export function createMemoryStorage(initial: Record<string, string> = {}): StorageLike {
  const entries = new Map<string, string>(Object.entries(initial));
  return {
    getItem: (key) => entries.get(key) ?? null,
    setItem: (key, value) => {
      entries.set(key, String(value));
    },
    removeItem: (key) => {
      entries.delete(key);
    }
  };
}

/**
 * Stores levels as decimal strings in any `localStorage`-compatible backend.
 * Every failure of the backend surfaces as a {@link PersistenceError}.
 */
export class StorageProgressStore implements ProgressStore {
  constructor(
    private readonly storage: StorageLike,
    private readonly keys: ProgressKeys = DEFAULT_PROGRESS_KEYS
  ) {}

  getPlayerLevel(): number {
    return this.readLevel(this.keys.playerLevel);
  }

  setPlayerLevel(level: number): void {
    this.writeLevel(this.keys.playerLevel, level);
  }

  getEnemyLevel(): number {
    return this.readLevel(this.keys.enemyLevel);
  }

  setEnemyLevel(level: number): void {
    this.writeLevel(this.keys.enemyLevel, level);
  }

  getBestLevel(): number {
    return this.readLevel(this.keys.bestLevel);
  }

  setBestLevel(level: number): void {
    this.writeLevel(this.keys.bestLevel, level);
  }

  resetProgress(): void {
    for (const key of [this.keys.playerLevel, this.keys.enemyLevel]) {
      try {
        this.storage.removeItem(key);
      } catch (error) {
        throw new PersistenceError('reset', key, error);
      }
    }
  }

  hasSavedProgress(): boolean {
    return this.readRaw(this.keys.playerLevel) !== null;
  }

  private readRaw(key: string): string | null {
    try {
      return this.storage.getItem(key);
    } catch (error) {
      throw new PersistenceError('read', key, error);
    }
  }

  private readLevel(key: string): number {
    const raw = this.readRaw(key);
    if (raw === null) {
      return DEFAULT_LEVEL;
    }
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isFinite(parsed) || parsed < DEFAULT_LEVEL) {
      console.warn('Ignoring malformed stored level', { key, raw });
      return DEFAULT_LEVEL;
    }
    return parsed;
  }

  private writeLevel(key: string, level: number): void {
    try {
      this.storage.setItem(key, String(sanitizeLevel(level)));
    } catch (error) {
      throw new PersistenceError('write', key, error);
    }
  }
}
