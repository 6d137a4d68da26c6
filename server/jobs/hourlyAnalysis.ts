import { getAnalysisStatus, runAnalysis } from '../orchestrators/analysisOrchestrator.js';
import { computeAnalytics } from '../services/technicalAnalysis.js';
import { parseAnalysisArgs } from './analysisArgs.js';
import { openJobRuntime, runJobMain } from './runtime.js';

async function main(): Promise<number> {
  const args = parseAnalysisArgs(process.argv.slice(2));
  const runtime = await openJobRuntime();
  try {
    if (args.status) {
      const status = await getAnalysisStatus(runtime, args.options.logicalDate ?? runtime.currentAnalysisDate());
      console.log(`[analysis] status ${JSON.stringify(status)}`);
      return 0;
    }
    const result = await runAnalysis(
      {
        ledger: runtime.ledger,
        registry: runtime.registry,
        records: runtime.records,
        computeAnalytics,
      },
      args.options,
    );
    console.log(`[analysis] ${result.status} ${result.logicalDate}: ${result.detail}`);
    return result.status === 'failed' ? 1 : 0;
  } finally {
    await runtime.close();
  }
}

runJobMain('analysis', main);
