/**
 * Tests for the batch accumulator
 * Positional correlation, failure handling and width-limited batch sizes
 */

import { describe, it, expect, jest } from '@jest/globals';
import { BatchOrderError, BulkOperationError, FlushTimeoutError } from '../../../lib/store/errors';
import { BatchAccumulator, FlushOutcome, recoverBulkResults } from '../../../lib/migration/graph/batch-accumulator';
import { NO_RETRY } from './fixtures';

interface MarkedPayload {
  marker: string;
  [field: string]: unknown;
}

type Outcome = FlushOutcome<MarkedPayload, number, string>;

function echoIds(_entityType: string, payloads: MarkedPayload[]): Promise<string[]> {
  return Promise.resolve(payloads.map(payload => `tgt-${payload.marker}`));
}

describe('BatchAccumulator', () => {
  it('correlates results to payloads by position', async () => {
    const accumulator = new BatchAccumulator<MarkedPayload, number, string>({ submit: echoIds, batchSize: 5, retry: NO_RETRY });
    const markers = ['m3', 'm1', 'm5', 'm2', 'm4'];
    const outcomes: Array<Outcome | null> = [];

    for (const [index, marker] of markers.entries()) {
      outcomes.push(await accumulator.add('Contact', { marker, LastName: `Name ${5 - index}` }, index));
    }

    expect(outcomes.slice(0, 4)).toEqual([null, null, null, null]);
    const outcome = outcomes[4];
    if (outcome?.status !== 'flushed') {
      throw new Error('expected the fifth add to flush');
    }
    expect(outcome.entries.map(entry => entry.context)).toEqual([0, 1, 2, 3, 4]);
    outcome.entries.forEach((entry, i) => {
      expect(outcome.results[i]).toBe(`tgt-${entry.payload.marker}`);
    });
    expect(accumulator.pendingCount('Contact')).toBe(0);
  });

  it('keeps a failed batch pending until it is cleared', async () => {
    const accumulator = new BatchAccumulator<MarkedPayload, number, string>({
      submit: () => Promise.reject(new Error('Service unavailable')),
      retry: NO_RETRY,
    });
    const failed = jest.fn();
    accumulator.on('batchFailed', failed);

    for (const marker of ['a', 'b', 'c']) {
      await accumulator.add('Contact', { marker }, 0);
    }
    const outcome = await accumulator.flush('Contact');

    expect(outcome?.status).toBe('failed');
    expect(failed).toHaveBeenCalledTimes(1);
    expect(accumulator.pendingCount('Contact')).toBe(3);
    expect(accumulator.clear('Contact').map(entry => entry.payload.marker)).toEqual(['a', 'b', 'c']);
    expect(accumulator.pendingCount()).toBe(0);
  });

  it('treats a result count mismatch as a failed flush', async () => {
    const accumulator = new BatchAccumulator<MarkedPayload, number, string>({
      submit: () => Promise.resolve(['only-one']),
      retry: NO_RETRY,
    });
    await accumulator.add('Contact', { marker: 'a' }, 0);
    await accumulator.add('Contact', { marker: 'b' }, 1);

    const outcome = await accumulator.flush('Contact');

    expect(outcome?.status).toBe('failed');
    if (outcome?.status === 'failed') {
      expect(outcome.error).toBeInstanceOf(BatchOrderError);
      expect(outcome.recoveredResults).toBeUndefined();
    }
  });

  it('exposes positional partial results only when they cover the whole batch', async () => {
    const submit = jest
      .fn<(entityType: string, payloads: MarkedPayload[]) => Promise<string[]>>()
      .mockRejectedValueOnce(new BulkOperationError('row 2 failed', ['tgt-a', null]))
      .mockRejectedValueOnce(new BulkOperationError('row 2 failed', ['tgt-a']));
    const accumulator = new BatchAccumulator<MarkedPayload, number, string>({
      submit,
      retry: NO_RETRY,
      recoverResults: recoverBulkResults,
    });
    await accumulator.add('Contact', { marker: 'a' }, 0);
    await accumulator.add('Contact', { marker: 'b' }, 1);

    const first = await accumulator.flush('Contact');
    const second = await accumulator.flush('Contact');

    expect(first?.status === 'failed' && first.recoveredResults).toEqual(['tgt-a', null]);
    expect(second?.status === 'failed' && second.recoveredResults).toBeUndefined();
  });

  it('shrinks the batch so width times size stays within the cell limit', async () => {
    const submit = jest.fn(echoIds);
    const accumulator = new BatchAccumulator<MarkedPayload, number, string>({
      submit,
      batchSize: 200,
      maxCellsPerBatch: 10,
      payloadWidth: payload => Object.keys(payload).length,
      retry: NO_RETRY,
    });
    const wide = (marker: string) => ({ marker, Street: 'x', City: 'y', Country: 'z' });

    expect(await accumulator.add('Account', wide('a'), 0)).toBeNull();
    expect(accumulator.effectiveBatchSize('Account')).toBe(2);

    const outcome = await accumulator.add('Account', wide('b'), 1);
    expect(outcome?.status).toBe('flushed');
    expect(submit).toHaveBeenCalledTimes(1);
    expect(submit.mock.calls[0][1]).toHaveLength(2);
  });

  it('returns null when nothing is pending', async () => {
    const accumulator = new BatchAccumulator<MarkedPayload, number, string>({ submit: echoIds });

    expect(await accumulator.flush('Account')).toBeNull();
  });

  it('serializes concurrent flushes of one type', async () => {
    const submit = jest.fn(echoIds);
    const accumulator = new BatchAccumulator<MarkedPayload, number, string>({ submit, batchSize: 10, retry: NO_RETRY });
    for (const marker of ['a', 'b', 'c']) {
      await accumulator.add('Contact', { marker }, 0);
    }

    const [first, second] = await Promise.all([accumulator.flush('Contact'), accumulator.flush('Contact')]);

    expect(first?.status).toBe('flushed');
    expect(first?.entries).toHaveLength(3);
    expect(second).toBeNull();
    expect(submit).toHaveBeenCalledTimes(1);
  });

  it('fails a flush that exceeds the wait limit', async () => {
    const accumulator = new BatchAccumulator<MarkedPayload, number, string>({
      submit: () => new Promise<string[]>(() => undefined),
      flushTimeoutMs: 20,
      retry: NO_RETRY,
    });
    await accumulator.add('Contact', { marker: 'a' }, 0);

    const outcome = await accumulator.flush('Contact');

    expect(outcome?.status === 'failed' && outcome.error).toBeInstanceOf(FlushTimeoutError);
    expect(accumulator.pendingCount('Contact')).toBe(1);
  });

  it('drains every pending type', async () => {
    const accumulator = new BatchAccumulator<MarkedPayload, number, string>({ submit: echoIds, batchSize: 2, retry: NO_RETRY });
    await accumulator.add('Account', { marker: 'a1' }, 0);
    await accumulator.add('Contact', { marker: 'c1' }, 0);

    const outcomes = await accumulator.flushAll();

    expect(outcomes.map(outcome => outcome.entityType)).toEqual(['Account', 'Contact']);
    expect(accumulator.pendingTypes()).toEqual([]);
  });
});
