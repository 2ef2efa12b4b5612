import { describe, it, expect, vi } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { buildMemo, groupByOrganization } from '../../../src/jobs/disbursement-reconciler.js';

describe('groupByOrganization', () => {
  it('groups and sums items per organization in id order', () => {
    const groups = groupByOrganization([
      { id: 'x1', organizationId: 'org-b', costCents: 10 },
      { id: 'x2', organizationId: 'org-a', costCents: 20 },
      { id: 'x3', organizationId: 'org-b', costCents: 30 },
    ]);

    expect(groups).toEqual([
      { organizationId: 'org-a', itemIds: ['x2'], totalCents: 20 },
      { organizationId: 'org-b', itemIds: ['x1', 'x3'], totalCents: 40 },
    ]);
  });

  it('returns nothing for an empty snapshot', () => {
    expect(groupByOrganization([])).toEqual([]);
  });
});

describe('buildMemo', () => {
  it('embeds the idempotency key', () => {
    expect(buildMemo('Fulfillment', 3, 'disb_abc')).toBe('Fulfillment // 3 Items // ref:disb_abc');
  });

  it('uses the singular for one item', () => {
    expect(buildMemo('Shipping', 1, 'disb_abc')).toBe('Shipping // 1 Item // ref:disb_abc');
  });
});
