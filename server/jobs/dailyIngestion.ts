import { planIngestion, runIngestion } from '../orchestrators/ingestionOrchestrator.js';
import { parseIngestionArgs } from './ingestionArgs.js';
import { openJobRuntime, runJobMain } from './runtime.js';

async function main(): Promise<number> {
  const args = parseIngestionArgs(process.argv.slice(2));
  const runtime = await openJobRuntime();
  try {
    if (args.dryRun) {
      const plan = await planIngestion(runtime, args.options);
      const range = plan.dates.length > 0 ? `${plan.dates[0]}..${plan.dates[plan.dates.length - 1]}` : 'none';
      console.log(
        `[ingestion] dry run ${plan.logicalDate}: last completed ${plan.lastCompleted ?? 'never'}; would ingest ${plan.dates.length} business day(s) (${range})`,
      );
      for (const date of plan.dates) {
        console.log(`[ingestion]   ${date}`);
      }
      return 0;
    }
    const result = await runIngestion(
      {
        ledger: runtime.ledger,
        registry: runtime.registry,
        records: runtime.records,
        calendar: runtime.calendar,
        fetchMarketData: runtime.dataApi.fetchDailyBars,
        source: runtime.dataApi.source,
      },
      args.options,
    );
    console.log(`[ingestion] ${result.status} ${result.logicalDate}: ${result.detail}`);
    return result.status === 'failed' ? 1 : 0;
  } finally {
    await runtime.close();
  }
}

runJobMain('ingestion', main);
