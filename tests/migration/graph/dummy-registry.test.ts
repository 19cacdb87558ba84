/**
 * Tests for placeholder records
 */

import { describe, it, expect, jest } from '@jest/globals';
import { FatalSetupError, StoreApiError } from '../../../lib/store/errors';
import { MemoryRecordStore } from '../../../lib/store/memory-store';
import type { FieldMap, FieldSpec } from '../../../lib/store/types';
import { DummyRegistry, DummyRegistryOptions, formatDate, placeholderName } from '../../../lib/migration/graph/dummy-registry';
import { EntityMetadataTable } from '../../../lib/migration/graph/entity-metadata';
import { buildSchemas, FIXED_NOW, reference, scalar } from './fixtures';

async function setup(
  schemas: Record<string, FieldSpec[]> = buildSchemas(),
  options: Partial<DummyRegistryOptions> = {}
) {
  const target = new MemoryRecordStore({ schemas, idPrefix: 'tgt' });
  const external = new Set(['User', 'RecordType']);
  const metadata = await EntityMetadataTable.load(target, Object.keys(schemas), { externalTypes: external });
  const registry = new DummyRegistry({ target, metadata, external, now: () => FIXED_NOW, ...options });
  return { target, registry };
}

describe('placeholderName', () => {
  it('splits camel case and upper-cases the type name', () => {
    expect(placeholderName('Account')).toBe('NO ACCOUNT');
    expect(placeholderName('QuoteLineItem')).toBe('NO QUOTE LINE ITEM');
  });
});

describe('formatDate', () => {
  it('formats as a UTC calendar date', () => {
    expect(formatDate(new Date('2024-12-31T23:30:00.000Z'))).toBe('2024-12-31');
  });
});

describe('DummyRegistry', () => {
  it('synthesizes required values and creates referenced placeholders first', async () => {
    const { target, registry } = await setup();

    const opportunityId = await registry.ensure('Opportunity');

    expect(registry.entries()).toEqual([
      { entityType: 'Account', targetId: 'tgt-Account-1' },
      { entityType: 'Opportunity', targetId: 'tgt-Opportunity-2' },
    ]);
    expect(opportunityId).toBe('tgt-Opportunity-2');
    expect(target.getFields('Opportunity', opportunityId)).toEqual({
      Name: 'NO OPPORTUNITY',
      StageName: 'Prospecting',
      CloseDate: '2024-03-01',
      AccountId: 'tgt-Account-1',
    });
    expect(registry.isDummy('Account', 'tgt-Account-1')).toBe(true);
  });

  it('resolves date and placeholder tokens in templates', async () => {
    const { registry } = await setup(buildSchemas(), {
      templates: {
        Opportunity: { Name: 'Migration holder', CloseDate: '$today+30', AccountId: '$dummy:Account', Amount: 0 },
      },
    });

    const payload: FieldMap = await registry.buildPayload('Opportunity');

    expect(payload).toEqual({
      Name: 'Migration holder',
      CloseDate: '2024-03-31',
      AccountId: 'tgt-Account-1',
      Amount: 0,
      StageName: 'Prospecting',
    });
  });

  it('creates one placeholder per type for concurrent callers', async () => {
    const { target, registry } = await setup();
    const createRecord = jest.spyOn(target, 'createRecord');

    const ids = await Promise.all([registry.ensure('Account'), registry.ensure('Account')]);

    expect(ids).toEqual(['tgt-Account-1', 'tgt-Account-1']);
    expect(createRecord).toHaveBeenCalledTimes(1);
  });

  it('fails setup when placeholders require each other', async () => {
    const { registry } = await setup({
      Alpha: [scalar('Name', { required: true }), reference('BetaId', 'Beta', { required: true })],
      Beta: [scalar('Name', { required: true }), reference('AlphaId', 'Alpha', { required: true })],
    });

    const ensured = registry.ensure('Alpha');
    await expect(ensured).rejects.toBeInstanceOf(FatalSetupError);
    await expect(ensured).rejects.toThrow('Placeholder records form a cycle: Alpha -> Beta -> Alpha');
  });

  it('fails setup when the target rejects the placeholder', async () => {
    const { target, registry } = await setup();
    target.rejectCreateWhen('Account', () => true, new StoreApiError('Insufficient access', 403));

    const ensured = registry.ensure('Account');
    await expect(ensured).rejects.toBeInstanceOf(FatalSetupError);
    await expect(ensured).rejects.toThrow('Unable to create placeholder Account: Insufficient access');
    await expect(ensured).rejects.toMatchObject({ cause: expect.objectContaining({ statusCode: 403 }) });
  });

  it('refuses placeholders for external types', async () => {
    const { registry } = await setup();

    await expect(registry.ensure('User')).rejects.toThrow('User records cannot be given a placeholder');
  });

  it('reuses a retained placeholder that matches its template', async () => {
    const { target, registry } = await setup(buildSchemas(), {
      templates: { Account: { Name: 'Migration Placeholder' } },
      retain: ['Account'],
    });
    target.seed('Account', [{ id: 'tgt-kept', Name: 'Migration Placeholder' }]);

    expect(await registry.ensure('Account')).toBe('tgt-kept');
    expect(target.count('Account')).toBe(1);

    const purged = await registry.purge();
    expect(purged).toEqual({ deleted: [], retained: ['Account'], failed: [] });
    expect(target.count('Account')).toBe(1);
  });

  it('purges placeholders dependants first', async () => {
    const { target, registry } = await setup();
    await registry.ensure('Opportunity');
    const deleteRecord = jest.spyOn(target, 'deleteRecord');

    const purged = await registry.purge();

    expect(purged.deleted).toEqual(['Opportunity', 'Account']);
    expect(deleteRecord.mock.calls).toEqual([
      ['Opportunity', 'tgt-Opportunity-2'],
      ['Account', 'tgt-Account-1'],
    ]);
  });

  it('reports placeholders it could not delete', async () => {
    const { target, registry } = await setup();
    await registry.ensure('Account');
    jest.spyOn(target, 'deleteRecord').mockRejectedValueOnce(new Error('Record is referenced'));

    const purged = await registry.purge();

    expect(purged.failed).toEqual([{ entityType: 'Account', targetId: 'tgt-Account-1', error: 'Record is referenced' }]);
  });
});
