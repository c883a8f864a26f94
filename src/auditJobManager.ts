import { randomUUID } from 'node:crypto';

import { errorMessage } from './audit/errors.js';
import type { AuditMode, AuditProgress, AuditResponse, AuditStage, DeletionTally } from './audit/types.js';

export type AuditJobStatus = 'running' | 'done' | 'failed';

export type AuditJobSnapshot = {
  jobId: string;
  region: string;
  mode: AuditMode;
  status: AuditJobStatus;
  stage: AuditStage | 'queued';
  percent: number;
  deletions: DeletionTally | null;
  startedAt: string;
  finishedAt?: string;
  result?: AuditResponse;
  error?: string;
};

export type AuditJobListener = (snapshot: AuditJobSnapshot) => void;

export type AuditJobTarget = { region: string; mode: AuditMode };

export type StartedAuditJob = {
  job: AuditJobSnapshot;
  /** Settles with the audit itself; the job records the outcome whether or not this is awaited. */
  completion: Promise<AuditResponse>;
};

type JobEntry = {
  snapshot: AuditJobSnapshot;
  listeners: Set<AuditJobListener>;
  finishedAtMs?: number;
};

export const JOB_TTL_MS = 60 * 60 * 1000;

/**
 * Runs audits one at a time and keeps their snapshots for an hour after they finish.
 * Listeners see every progress update, then the final snapshot, then are dropped.
 */
export class AuditJobManager {
  private readonly jobs = new Map<string, JobEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  hasRunningJob(): boolean {
    for (const entry of this.jobs.values()) {
      if (entry.snapshot.status === 'running') return true;
    }
    return false;
  }

  /** Returns null when another audit is still running. */
  start(target: AuditJobTarget, run: (onProgress: (p: AuditProgress) => void) => Promise<AuditResponse>): StartedAuditJob | null {
    this.expireFinished();
    if (this.hasRunningJob()) return null;

    const entry: JobEntry = {
      snapshot: {
        jobId: randomUUID(),
        region: target.region,
        mode: target.mode,
        status: 'running',
        stage: 'queued',
        percent: 0,
        deletions: null,
        startedAt: new Date(this.now()).toISOString(),
      },
      listeners: new Set(),
    };
    this.jobs.set(entry.snapshot.jobId, entry);

    const completion = run((p) => this.applyProgress(entry, p));
    void completion.then(
      (result) => this.finish(entry, { status: 'done', stage: 'done', percent: 100, result }),
      (error: unknown) => this.finish(entry, { status: 'failed', error: errorMessage(error) || 'audit failed' }),
    );
    return { job: { ...entry.snapshot }, completion };
  }

  getJob(jobId: string): AuditJobSnapshot | null {
    this.expireFinished();
    const entry = this.jobs.get(jobId);
    return entry ? { ...entry.snapshot } : null;
  }

  /** Returns null for an unknown or already finished job. */
  subscribe(jobId: string, listener: AuditJobListener): (() => void) | null {
    const entry = this.jobs.get(jobId);
    if (!entry || entry.snapshot.status !== 'running') return null;
    entry.listeners.add(listener);
    return () => {
      entry.listeners.delete(listener);
    };
  }

  private applyProgress(entry: JobEntry, p: AuditProgress): void {
    if (entry.snapshot.status !== 'running') return;
    entry.snapshot = {
      ...entry.snapshot,
      stage: p.stage,
      // stages only move forward
      percent: Math.max(entry.snapshot.percent, Math.min(100, Math.floor(p.percent))),
      deletions: p.deletions ? { ...p.deletions } : entry.snapshot.deletions,
    };
    this.notify(entry);
  }

  private finish(entry: JobEntry, patch: Partial<AuditJobSnapshot>): void {
    entry.finishedAtMs = this.now();
    entry.snapshot = { ...entry.snapshot, ...patch, finishedAt: new Date(entry.finishedAtMs).toISOString() };
    this.notify(entry);
    entry.listeners.clear();
  }

  private notify(entry: JobEntry): void {
    for (const listener of entry.listeners) listener({ ...entry.snapshot });
  }

  private expireFinished(): void {
    const now = this.now();
    for (const [jobId, entry] of this.jobs) {
      if (entry.finishedAtMs !== undefined && now - entry.finishedAtMs >= JOB_TTL_MS) this.jobs.delete(jobId);
    }
  }
}
