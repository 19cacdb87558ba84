import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { StoreApiError } from '../../../lib/store/errors';
import { FailureLogger, toFailure } from '../../../lib/migration/graph/failure-logger';

describe('toFailure', () => {
  it('takes message and code from the classified error', () => {
    const failure = toFailure({
      kind: 'BackpatchFieldFailure',
      entityType: 'Contact',
      sourceId: 'C1',
      targetId: 'tgt-c1',
      field: 'ReportsToId',
      error: new StoreApiError('Field is locked', 400, 'FIELD_REJECTED'),
    });

    expect(failure).toMatchObject({
      kind: 'BackpatchFieldFailure',
      entityType: 'Contact',
      sourceId: 'C1',
      targetId: 'tgt-c1',
      field: 'ReportsToId',
      category: 'validation',
      message: 'Field is locked',
      code: 'FIELD_REJECTED',
    });
  });

  it('lets the caller override the category', () => {
    const failure = toFailure({ kind: 'RecordCreateFailure', entityType: 'Account', error: new Error('gone'), category: 'validation' });

    expect(failure.category).toBe('validation');
    expect(failure.sourceId).toBeUndefined();
  });
});

describe('FailureLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'failures-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('keeps failures in memory filtered by kind', async () => {
    const logger = new FailureLogger('run-1');

    await logger.logFailure({ kind: 'BatchFailure', entityType: 'Account', error: new Error('bulk failed') });
    await logger.logFailuresBulk([
      { kind: 'ResolutionMiss', entityType: 'RecordType', sourceId: 'RT1', error: new Error('no match') },
      { kind: 'ResolutionMiss', entityType: 'RecordType', sourceId: 'RT2', error: new Error('no match') },
    ]);

    expect(logger.getFailures()).toHaveLength(3);
    expect(logger.getFailures('ResolutionMiss').map(failure => failure.sourceId)).toEqual(['RT1', 'RT2']);
  });

  it('appends JSON lines under the run directory and reads them back', async () => {
    const logger = new FailureLogger('run/2', dir);

    await logger.logFailure({ kind: 'RecordCreateFailure', entityType: 'Account', sourceId: 'A1', error: new Error('Required field missing') });
    await logger.logFailure({ kind: 'BatchFailure', entityType: 'Contact', error: new Error('bulk failed') });

    const content = await fs.readFile(path.join(dir, 'run_2', 'failures.log'), 'utf8');
    expect(content.trim().split('\n')).toHaveLength(2);

    const read = await logger.readFailures();
    expect(read.map(failure => [failure.kind, failure.category])).toEqual([
      ['RecordCreateFailure', 'validation'],
      ['BatchFailure', 'unknown'],
    ]);
  });

  it('reads nothing before the first failure is written', async () => {
    const logger = new FailureLogger('run-3', path.join(dir, 'not-created'));

    await expect(logger.readFailures()).resolves.toEqual([]);
  });
});
