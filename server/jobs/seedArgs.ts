import { parseArgs } from 'node:util';

export interface SeedCliArgs {
  file: string;
  /** Register entities only; their history is left to a later backfill. */
  skipBackfill: boolean;
  /** Reload history for entities that already have raw records. */
  forceBackfill: boolean;
}

/** `<entities.json> [--skip-backfill] [--force-backfill]`. */
export function parseSeedArgs(argv: string[]): SeedCliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      'skip-backfill': { type: 'boolean', default: false },
      'force-backfill': { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });
  if (positionals.length !== 1) {
    throw new RangeError('usage: seedEntities <entities.json> [--skip-backfill] [--force-backfill]');
  }
  const skipBackfill = values['skip-backfill'] === true;
  const forceBackfill = values['force-backfill'] === true;
  if (skipBackfill && forceBackfill) {
    throw new RangeError('--skip-backfill and --force-backfill cannot be combined');
  }
  return { file: positionals[0], skipBackfill, forceBackfill };
}
