import { parseArgs } from 'node:util';
import { isDateKey } from '../lib/dateUtils.js';
import type { IngestionOptions } from '../orchestrators/ingestionOrchestrator.js';

export interface IngestionCliArgs {
  /** List the dates a run would replay without opening a run or writing anything. */
  dryRun: boolean;
  options: IngestionOptions;
}

/** `--dry-run`, `--date YYYY-MM-DD`. */
export function parseIngestionArgs(argv: string[]): IngestionCliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      'dry-run': { type: 'boolean', default: false },
      date: { type: 'string' },
    },
    strict: true,
  });
  const options: IngestionOptions = {};
  if (values.date !== undefined) {
    if (!isDateKey(values.date)) {
      throw new RangeError(`--date must be YYYY-MM-DD (received: ${values.date})`);
    }
    options.today = values.date;
  }
  return { dryRun: values['dry-run'] === true, options };
}
