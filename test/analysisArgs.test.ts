import test from 'node:test';
import assert from 'node:assert/strict';

import { parseAnalysisArgs } from '../server/jobs/analysisArgs.js';

test('parseAnalysisArgs defaults to a normal run', () => {
  assert.deepEqual(parseAnalysisArgs([]), { status: false, options: {} });
});

test('parseAnalysisArgs maps the run overrides', () => {
  assert.deepEqual(parseAnalysisArgs(['--max-minutes', '5', '--max-entities', '40', '--date', '2026-03-06']), {
    status: false,
    options: { timeBudgetMs: 300_000, maxEntities: 40, logicalDate: '2026-03-06' },
  });
  assert.equal(parseAnalysisArgs(['--status']).status, true);
});

test('parseAnalysisArgs rejects bad values', () => {
  assert.throws(() => parseAnalysisArgs(['--max-minutes', '0']), RangeError);
  assert.throws(() => parseAnalysisArgs(['--max-entities', '1.5']), RangeError);
  assert.throws(() => parseAnalysisArgs(['--date', '2026-02-30']), RangeError);
  assert.throws(() => parseAnalysisArgs(['--unknown']), { code: 'ERR_PARSE_ARGS_UNKNOWN_OPTION' });
});

test('parseAnalysisArgs accepts --max-time for the time budget', () => {
  assert.deepEqual(parseAnalysisArgs(['--max-time', '30']), { status: false, options: { timeBudgetMs: 1_800_000 } });
  assert.throws(() => parseAnalysisArgs(['--max-time', '30', '--max-minutes', '20']), RangeError);
  assert.throws(() => parseAnalysisArgs(['--max-time', 'soon']), {
    name: 'RangeError',
    message: '--max-minutes must be a positive number (received: soon)',
  });
});
