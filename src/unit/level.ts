import type { LevelCurve } from './types.ts';

export function normalizeLevel(level?: number): number {
  if (level === undefined || !Number.isFinite(level)) {
    return 1;
  }
  return Math.max(1, Math.floor(level));
}

export function levelIndex(level?: number): number {
  return Math.max(0, normalizeLevel(level) - 1);
}

export function curveProgress(level: number, curve: LevelCurve): number {
  switch (curve) {
    case 'logarithmic':
      return Math.log(normalizeLevel(level) + 1);
    case 'linear':
    default:
      return levelIndex(level);
  }
}
