// Operational script: re-resolve stored battles and compare with their logs
// Usage: npm run replay -- [battleId...]   (no ids: every completed battle)

import 'dotenv/config';
import { MemoryCoordinationStore } from '../src/infrastructure/coordination/MemoryCoordinationStore.js';
import { createEngineServices } from '../src/infrastructure/EngineFactory.js';
import { buildAppConfig } from '../src/utils/config.js';

async function replayBattles(ids: string[]): Promise<number> {
  const config = buildAppConfig(process.env);
  const services = await createEngineServices(config, {
    // Replay only reads; no other worker needs to see its locks
    coordination: new MemoryCoordinationStore(),
  });

  const battleIds = ids.length > 0
    ? ids
    : services.database.connection.getData().battles
      .filter((b) => b.status === 'COMPLETE')
      .map((b) => b.id);

  console.log(`Replaying ${battleIds.length} battle(s) from ${config.storage.dbPath}`);

  let mismatches = 0;
  for (const id of battleIds) {
    const result = await services.battles.replayBattle(id);
    if (!result.ok) {
      console.log(`  ${id}: ${result.error.code} ${result.error.message}`);
      mismatches++;
      continue;
    }

    const report = result.value;
    if (report.matches) {
      console.log(`  ${id}: ok (${report.turnsReplayed} turns, winner ${report.storedWinner ?? 'none'})`);
    } else {
      mismatches++;
      console.log(
        `  ${id}: MISMATCH at log index ${report.firstDivergence ?? '-'}; ` +
          `stored winner ${report.storedWinner ?? 'none'}, replayed ${report.replayedWinner ?? 'none'}`
      );
    }
  }

  await services.close();
  return mismatches;
}

replayBattles(process.argv.slice(2))
  .then((mismatches) => {
    console.log(mismatches === 0 ? 'All battles replay identically' : `${mismatches} battle(s) did not match`);
    process.exit(mismatches === 0 ? 0 : 1);
  })
  .catch((error) => {
    console.error('Replay failed:', error);
    process.exit(1);
  });
