import { describe, expect, it } from 'vitest';

import { AuditJobManager, JOB_TTL_MS, type AuditJobSnapshot } from '../src/auditJobManager.js';
import type { AuditProgress, AuditResponse } from '../src/audit/types.js';

const TARGET = { region: 'us-east-1', mode: 'live-delete' as const };

const RESULT: AuditResponse = {
  runId: 'us-east-1_20260131-093005_a1b2c3d4',
  region: 'us-east-1',
  mode: 'live-delete',
  outputDir: 'output/us-east-1/20260131-093005_a1b2c3d4',
  counts: { groups: 3, deletionCandidates: 2, deleted: 1, deleteFailed: 1 },
};

/** A run the test drives by hand: report progress, then resolve or reject. */
function controlledRun() {
  let report: (p: AuditProgress) => void = () => undefined;
  let resolve: (r: AuditResponse) => void = () => undefined;
  let reject: (e: unknown) => void = () => undefined;
  const run = (onProgress: (p: AuditProgress) => void) => {
    report = onProgress;
    return new Promise<AuditResponse>((res, rej) => {
      resolve = res;
      reject = rej;
    });
  };
  return {
    run,
    progress: (p: AuditProgress) => report(p),
    resolve: (r: AuditResponse) => resolve(r),
    reject: (e: unknown) => reject(e),
  };
}

describe('AuditJobManager', () => {
  it('tracks stages and the deletion tally through to the result', async () => {
    const manager = new AuditJobManager(() => 0);
    const control = controlledRun();
    const started = manager.start(TARGET, control.run);
    if (!started) throw new Error('job did not start');

    expect(started.job).toMatchObject({
      region: 'us-east-1',
      mode: 'live-delete',
      status: 'running',
      stage: 'queued',
      percent: 0,
      deletions: null,
      startedAt: '1970-01-01T00:00:00.000Z',
    });

    control.progress({ stage: 'deleting', percent: 75, deletions: { total: 2, deleted: 1, failed: 0 } });
    control.progress({ stage: 'writing-report', percent: 90 });
    expect(manager.getJob(started.job.jobId)).toMatchObject({
      stage: 'writing-report',
      percent: 90,
      deletions: { total: 2, deleted: 1, failed: 0 },
    });

    control.resolve(RESULT);
    await expect(started.completion).resolves.toEqual(RESULT);
    expect(manager.getJob(started.job.jobId)).toMatchObject({
      status: 'done',
      stage: 'done',
      percent: 100,
      result: RESULT,
      finishedAt: '1970-01-01T00:00:00.000Z',
    });
    expect(manager.hasRunningJob()).toBe(false);
  });

  it('never lets the percentage go backwards', () => {
    const manager = new AuditJobManager(() => 0);
    const control = controlledRun();
    const started = manager.start(TARGET, control.run);
    control.progress({ stage: 'classifying', percent: 55 });
    control.progress({ stage: 'classifying', percent: 12.5 });
    expect(manager.getJob(started?.job.jobId ?? '')?.percent).toBe(55);
  });

  it('refuses a second audit while one is running', async () => {
    const manager = new AuditJobManager(() => 0);
    const control = controlledRun();
    const first = manager.start(TARGET, control.run);
    expect(manager.start(TARGET, controlledRun().run)).toBeNull();

    control.resolve(RESULT);
    await first?.completion;
    expect(manager.start(TARGET, controlledRun().run)).not.toBeNull();
  });

  it('records a failed audit and hands the original error to the caller', async () => {
    const manager = new AuditJobManager(() => 0);
    const control = controlledRun();
    const started = manager.start(TARGET, control.run);
    const failure = new Error('AuthFailure');

    control.reject(failure);
    await expect(started?.completion).rejects.toBe(failure);
    expect(manager.getJob(started?.job.jobId ?? '')).toMatchObject({ status: 'failed', error: 'AuthFailure' });
  });

  it('sends listeners each update and the final snapshot', async () => {
    const manager = new AuditJobManager(() => 0);
    const control = controlledRun();
    const started = manager.start(TARGET, control.run);
    const seen: AuditJobSnapshot[] = [];
    manager.subscribe(started?.job.jobId ?? '', (s) => seen.push(s));

    control.progress({ stage: 'listing-groups', percent: 5 });
    control.resolve(RESULT);
    await started?.completion;

    expect(seen.map((s) => [s.status, s.stage])).toEqual([
      ['running', 'listing-groups'],
      ['done', 'done'],
    ]);
    expect(manager.subscribe(started?.job.jobId ?? '', () => undefined)).toBeNull();
  });

  it('drops finished jobs an hour after they finish', async () => {
    let clock = 0;
    const manager = new AuditJobManager(() => clock);
    const control = controlledRun();
    const started = manager.start(TARGET, control.run);
    const jobId = started?.job.jobId ?? '';

    clock = 2 * JOB_TTL_MS;
    expect(manager.getJob(jobId)?.status).toBe('running');

    control.resolve(RESULT);
    await started?.completion;
    clock += JOB_TTL_MS - 1;
    expect(manager.getJob(jobId)).not.toBeNull();
    clock += 1;
    expect(manager.getJob(jobId)).toBeNull();
    expect(manager.getJob('missing')).toBeNull();
  });
});
