import { parseArgs } from 'node:util';
import { isDateKey } from '../lib/dateUtils.js';
import type { AnalysisOptions } from '../orchestrators/analysisOrchestrator.js';

export interface AnalysisCliArgs {
  status: boolean;
  options: AnalysisOptions;
}

/** `--status`, `--max-minutes N` (alias `--max-time`), `--max-entities N`, `--date YYYY-MM-DD`. */
export function parseAnalysisArgs(argv: string[]): AnalysisCliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      status: { type: 'boolean', default: false },
      'max-minutes': { type: 'string' },
      'max-time': { type: 'string' },
      'max-entities': { type: 'string' },
      date: { type: 'string' },
    },
    strict: true,
  });
  const options: AnalysisOptions = {};
  if (values['max-minutes'] !== undefined && values['max-time'] !== undefined) {
    throw new RangeError('--max-minutes and --max-time are the same option; pass one');
  }
  const maxMinutes = values['max-minutes'] ?? values['max-time'];
  if (maxMinutes !== undefined) {
    const minutes = Number(maxMinutes);
    if (!Number.isFinite(minutes) || minutes <= 0) {
      throw new RangeError(`--max-minutes must be a positive number (received: ${maxMinutes})`);
    }
    options.timeBudgetMs = minutes * 60_000;
  }
  if (values['max-entities'] !== undefined) {
    const maxEntities = Number(values['max-entities']);
    if (!Number.isInteger(maxEntities) || maxEntities < 0) {
      throw new RangeError(`--max-entities must be a non-negative integer (received: ${values['max-entities']})`);
    }
    options.maxEntities = maxEntities;
  }
  if (values.date !== undefined) {
    if (!isDateKey(values.date)) {
      throw new RangeError(`--date must be YYYY-MM-DD (received: ${values.date})`);
    }
    options.logicalDate = values.date;
  }
  return { status: values.status === true, options };
}
