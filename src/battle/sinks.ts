import { EventBus } from '../events/EventBus.ts';
import type { BattleEvent, BattleEventMap, BattleEventSink } from './types.ts';

export function createBattleEventBus(): EventBus<BattleEventMap> {
  return new EventBus<BattleEventMap>();
}

/** Forwards each event to the bus under its `type`. */
export function createEventBusSink(bus: EventBus<BattleEventMap>): BattleEventSink {
  return {
    publish: (event: BattleEvent) => {
      bus.emit(event.type, event);
    }
  };
}

/** Keeps every published event in order; handy for replay and tests. */
export function createRecordingSink(): BattleEventSink & { readonly events: BattleEvent[] } {
  const events: BattleEvent[] = [];
  return {
    events,
    publish: (event) => {
      events.push(event);
    }
  };
}
