import fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { autoPlay } from '../src/battle/autoplay.ts';
import { createRecordingSink } from '../src/battle/sinks.ts';
import { describeBattleEvents } from '../src/battle/messages.ts';
import { createBattleConfig } from '../src/config/battleConfig.ts';
import { BattleSession } from '../src/game/session.ts';
import { createSeededRandom } from '../src/lib/rng.ts';
import { createFileStorage } from '../src/save/fileStorage.ts';
import { StorageProgressStore } from '../src/save/progressStore.ts';
import type { BattleEvent } from '../src/battle/types.ts';

interface SimulationRow {
  seed: number;
  match: number;
  playerLevel: number;
  enemyLevel: number;
  result: string;
  turns: number;
  crits: number;
  misses: number;
  bestLevel: number;
}

const MATCHES_PER_SEED = 30;

function countEvents(events: readonly BattleEvent[], type: BattleEvent['type']): number {
  return events.filter((event) => event.type === type).length;
}

function runSeededSimulation(
  seed: number,
  directory: string
): { rows: SimulationRow[]; transcript: string[] } {
  const config = createBattleConfig();
  const store = new StorageProgressStore(createFileStorage(join(directory, `seed-${seed}.json`)));
  const sink = createRecordingSink();
  const session = new BattleSession({ store, config, sink, random: createSeededRandom(seed) });
  const names = { player: config.player.name, enemy: config.enemy.name };

  const rows: SimulationRow[] = [];
  const transcript: string[] = [];

  session.startNewGame();
  let mark = 0;
  for (let match = 1; match <= MATCHES_PER_SEED; match++) {
    const scheduler = session.currentMatch;
    if (!scheduler) {
      break;
    }
    const opening = scheduler.getState();
    const played = autoPlay(scheduler);
    const events = sink.events.slice(mark);
    mark = sink.events.length;
    const outcome = played.state.outcome;
    rows.push({
      seed,
      match,
      playerLevel: opening.player?.level ?? 0,
      enemyLevel: opening.enemy?.level ?? 0,
      result: played.state.phase,
      turns: played.state.turn,
      crits: countEvents(events, 'criticalHit'),
      misses: countEvents(events, 'missed'),
      bestLevel: outcome?.bestLevel ?? session.getBestLevel()
    });
    if (match === 1) {
      transcript.push(...describeBattleEvents(events, names));
    }

    if (played.state.phase === 'won') {
      session.nextBattle();
    } else {
      session.retry();
    }
  }

  return { rows, transcript };
}

async function main(): Promise<void> {
  const directory = await fs.mkdtemp(join(tmpdir(), 'duel-ladder-'));
  const seeds = Array.from({ length: 20 }, (_, index) => index);
  const runs = seeds.map((seed) => runSeededSimulation(seed, directory));

  const header = 'seed,match,playerLevel,enemyLevel,result,turns,crits,misses,bestLevel';
  const lines = runs
    .flatMap((run) => run.rows)
    .map((row) =>
      [
        row.seed,
        row.match,
        row.playerLevel,
        row.enemyLevel,
        row.result,
        row.turns,
        row.crits,
        row.misses,
        row.bestLevel
      ].join(',')
    );
  const csv = [header, ...lines].join('\n');

  const balancePath = join(directory, 'balance.csv');
  await fs.writeFile(balancePath, csv, 'utf8');
  console.log(`Balance snapshot saved to ${balancePath}`);

  const transcriptPath = join(directory, 'transcript.txt');
  await fs.writeFile(transcriptPath, `${runs[0]?.transcript.join('\n') ?? ''}\n`, 'utf8');
  console.log(`First match transcript saved to ${transcriptPath}`);
}

void main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
