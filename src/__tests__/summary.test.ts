/**
 * Tests for run status and the summary box
 *
 * Usage: node --import tsx --test src/__tests__/summary.test.ts
 */

import { before, describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import {
  collectSummaryLines,
  computeCollectStatus,
  computeEnrichStatus,
  enrichSummaryLines,
  formatDuration,
  renderSummaryBox
} from '../summary.js';
import type { CollectSummary, EnrichSummary } from '../types.js';

function collectSummary(overrides: Partial<CollectSummary> = {}): CollectSummary {
  return {
    totalUsers: 3,
    collected: 3,
    skipped: 0,
    mfaEnabled: 2,
    mfaDisabled: 1,
    startedAt: 0,
    endedAt: 2000,
    ...overrides
  };
}

function enrichSummary(overrides: Partial<EnrichSummary> = {}): EnrichSummary {
  return {
    total: 4,
    found: 2,
    notFound: 1,
    lookupErrors: 1,
    invalidMobiles: 1,
    startedAt: 0,
    endedAt: 250,
    ...overrides
  };
}

before(() => {
  process.env.NO_COLOR = '1';
});

describe('formatDuration', () => {
  it('uses milliseconds under a second', () => {
    assert.strictEqual(formatDuration(250), '250 ms');
    assert.strictEqual(formatDuration(1500), '1.5 s');
  });
});

describe('computeCollectStatus', () => {
  it('is Success when no user was skipped', () => {
    assert.strictEqual(computeCollectStatus(collectSummary()), 'Success');
  });

  it('is Completed with errors when some users were skipped', () => {
    assert.strictEqual(computeCollectStatus(collectSummary({ collected: 2, skipped: 1 })), 'Completed with errors');
  });

  it('is Failed when every user was skipped', () => {
    assert.strictEqual(computeCollectStatus(collectSummary({ collected: 0, skipped: 3 })), 'Failed');
  });
});

describe('computeEnrichStatus', () => {
  it('ignores users that were not found', () => {
    assert.strictEqual(computeEnrichStatus(enrichSummary({ lookupErrors: 0, notFound: 2 })), 'Success');
  });

  it('degrades on lookup errors', () => {
    assert.strictEqual(computeEnrichStatus(enrichSummary()), 'Completed with errors');
    assert.strictEqual(computeEnrichStatus(enrichSummary({ found: 0, notFound: 0, lookupErrors: 4 })), 'Failed');
  });

  it('is Success for an empty report', () => {
    assert.strictEqual(computeEnrichStatus(enrichSummary({ total: 0, found: 0, notFound: 0, lookupErrors: 0 })), 'Success');
  });
});

describe('summary lines', () => {
  it('lists collector counts', () => {
    assert.deepStrictEqual(collectSummaryLines(collectSummary()), [
      'Users listed: 3',
      'Users reported: 3',
      'MFA enabled: 2',
      'MFA disabled: 1',
      'Skipped (method lookup failed): 0',
      'Duration: 2.0 s'
    ]);
  });

  it('lists invalid mobiles only when normalizing', () => {
    assert.deepStrictEqual(enrichSummaryLines(enrichSummary(), false), [
      'Users: 4',
      'Found in AD: 2',
      'Not found: 1',
      'Lookup errors: 1',
      'Duration: 250 ms'
    ]);
    assert.ok(enrichSummaryLines(enrichSummary(), true).includes('Invalid mobile numbers: 1'));
  });
});

describe('renderSummaryBox', () => {
  it('boxes the status and lines', () => {
    const rule = '─'.repeat(17);
    assert.strictEqual(
      renderSummaryBox('Success', ['Users: 1']),
      [`┌${rule}┐`, '│ SUMMARY         │', '│ Status: Success │', '│ Users: 1        │', `└${rule}┘`].join('\n')
    );
  });
});
