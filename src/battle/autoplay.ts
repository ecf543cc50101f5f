import type { TurnScheduler } from './TurnScheduler.ts';
import type { ActionResult, BattleEvent, MatchSnapshot, PlayerAction } from './types.ts';

export type ActionPolicy = (state: MatchSnapshot) => PlayerAction;

export interface AutoPlayResult {
  readonly state: MatchSnapshot;
  readonly events: readonly BattleEvent[];
  readonly actions: number;
}

const HEAL_THRESHOLD = 0.35;

/** Heals below roughly a third of max HP, attacks otherwise. */
export const cautiousPolicy: ActionPolicy = (state) => {
  const player = state.player;
  if (player && player.currentHp < player.maxHp * HEAL_THRESHOLD) {
    return 'heal';
  }
  return 'attack';
};

/**
 * Starts `match` if needed and feeds it actions from `policy` until it ends.
 * A re-prompted action falls back to attacking.
 */
export function autoPlay(
  match: TurnScheduler,
  policy: ActionPolicy = cautiousPolicy,
  maxActions = 500
): AutoPlayResult {
  const events: BattleEvent[] = [];
  const record = (result: ActionResult): ActionResult => {
    events.push(...result.events);
    return result;
  };

  if (match.phase === 'setup') {
    record(match.start());
  }

  let actions = 0;
  while (!match.isOver()) {
    if (actions >= maxActions) {
      throw new Error(`Match did not finish within ${maxActions} actions`);
    }
    const result = record(match.choose(policy(match.getState())));
    if (result.status === 'reprompt') {
      record(match.chooseAttack());
    }
    actions += 1;
  }

  return { state: match.getState(), events, actions };
}
