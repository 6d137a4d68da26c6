import { readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { backfillEntities } from '../orchestrators/backfillOrchestrator.js';
import { EntityInputSchema } from '../services/entityRegistry.js';
import { openJobRuntime, runJobMain } from './runtime.js';
import { parseSeedArgs } from './seedArgs.js';

const SeedFileSchema = z.union([z.array(EntityInputSchema), z.object({ entities: z.array(EntityInputSchema) })]);

async function main(): Promise<number> {
  const args = parseSeedArgs(process.argv.slice(2));
  const resolved = path.resolve(process.cwd(), args.file);
  const parsed = SeedFileSchema.parse(JSON.parse(readFileSync(resolved, 'utf8')));
  const entities = Array.isArray(parsed) ? parsed : parsed.entities;

  const runtime = await openJobRuntime();
  try {
    const { inserted, updated } = await runtime.registry.upsertMany(entities);
    const stats = await runtime.registry.getStatistics();
    console.log(`[seed] ${resolved}: ${inserted} inserted, ${updated} updated; ${stats.active} active of ${stats.total}`);
    if (args.skipBackfill) return 0;

    const backfill = await backfillEntities(
      {
        ledger: runtime.ledger,
        records: runtime.records,
        calendar: runtime.calendar,
        fetchMarketData: runtime.dataApi.fetchDailyBars,
        source: runtime.dataApi.source,
      },
      entities.map((entity) => entity.id),
      { force: args.forceBackfill },
    );
    let failed = 0;
    for (const outcome of backfill.outcomes) {
      if (outcome.status === 'loaded') {
        const note = outcome.sufficient ? '' : ' (short of the analysis minimum)';
        console.log(`[seed]   ${outcome.entityId}: ${outcome.rowsInWindow} rows in ${backfill.from}..${backfill.to}${note}`);
      } else if (outcome.status === 'failed') {
        failed += 1;
        console.log(`[seed]   ${outcome.entityId}: backfill failed: ${outcome.error}`);
      }
    }
    return failed > 0 ? 1 : 0;
  } finally {
    await runtime.close();
  }
}

runJobMain('seed', main);
