import test from 'node:test';
import assert from 'node:assert/strict';

import { parseIngestionArgs } from '../server/jobs/ingestionArgs.js';

test('parseIngestionArgs defaults to a real run for today', () => {
  assert.deepEqual(parseIngestionArgs([]), { dryRun: false, options: {} });
});

test('parseIngestionArgs maps --dry-run and --date', () => {
  assert.deepEqual(parseIngestionArgs(['--dry-run', '--date', '2026-03-06']), {
    dryRun: true,
    options: { today: '2026-03-06' },
  });
});

test('parseIngestionArgs rejects bad values', () => {
  assert.throws(() => parseIngestionArgs(['--date', '06/03/2026']), RangeError);
  assert.throws(() => parseIngestionArgs(['--force']), { code: 'ERR_PARSE_ARGS_UNKNOWN_OPTION' });
});
