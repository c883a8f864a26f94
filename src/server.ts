import express, { type NextFunction, type Request, type Response } from 'express';
import path from 'node:path';

import { AuditJobManager, type AuditJobSnapshot, type StartedAuditJob } from './auditJobManager.js';
import { REPORT_FILES } from './audit/defaults.js';
import { AuditInputError, errorMessage } from './audit/errors.js';
import { readJsonFile } from './audit/io.js';
import { parseAuditMode, parseRegion, runAudit, type RunAuditOptions } from './audit/runAudit.js';
import { listRunRegistry, resolveRunIdToOutputDir } from './audit/runRegistry.js';
import type { AuditRequest, AuditResponse } from './audit/types.js';

export type ServerOptions = {
  outputRoot: string;
  jobs?: AuditJobManager;
  audit?: Pick<RunAuditOptions, 'createApi' | 'now'>;
};

export const DEFAULT_HOST = '127.0.0.1';

const SSE_PING_MS = 15_000;
const BUSY_MESSAGE = 'an audit is already running, try again later';

function isRecord(v: unknown): v is Record<string, unknown> {
  return Boolean(v) && typeof v === 'object' && !Array.isArray(v);
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const v = body[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== 'string') throw new AuditInputError(`${key} must be a string`);
  return v;
}

export function toAuditRequest(body: unknown, outputRoot: string): AuditRequest {
  const b: Record<string, unknown> = isRecord(body) ? body : {};
  const includeDefault = b.includeDefault;
  if (includeDefault !== undefined && typeof includeDefault !== 'boolean') {
    throw new AuditInputError('includeDefault must be a boolean');
  }
  return {
    region: optionalString(b, 'region'),
    mode: optionalString(b, 'mode'),
    profile: optionalString(b, 'profile'),
    includeDefault,
    outputRoot,
  };
}

/** Caller mistakes are 400; AWS listing failures, bad inventories and disk errors are 500. */
export function statusForError(error: unknown): 400 | 500 {
  return error instanceof AuditInputError ? 400 : 500;
}

function stripReport(result: AuditResponse): AuditResponse {
  return { runId: result.runId, region: result.region, mode: result.mode, outputDir: result.outputDir, counts: result.counts };
}

function sendError(res: Response, status: number, error: unknown): void {
  res.status(status).json({ ok: false, error: errorMessage(error) });
}

function sseEvent(snapshot: AuditJobSnapshot): string {
  const event = snapshot.status === 'running' ? 'progress' : snapshot.status;
  return `event: ${event}\ndata: ${JSON.stringify(snapshot)}\n\n`;
}

function originHost(origin: string): string | null {
  try {
    return new URL(origin).host;
  } catch {
    return null;
  }
}

// The API has no browser client: a request a browser sends on behalf of another site is refused.
function rejectCrossOrigin(req: Request, res: Response, next: NextFunction): void {
  const { origin, host } = req.headers;
  if (origin !== undefined && originHost(origin) !== host) {
    res.status(403).json({ ok: false, error: 'cross-origin requests are not accepted' });
    return;
  }
  next();
}

export function createApp(options: ServerOptions) {
  const { outputRoot } = options;
  const jobs = options.jobs ?? new AuditJobManager();
  const app = express();

  app.use(rejectCrossOrigin);
  app.use(express.json({ limit: '1mb' }));

  function startAudit(body: unknown): StartedAuditJob | null {
    const request = toAuditRequest(body, outputRoot);
    const target = { region: parseRegion(request.region), mode: parseAuditMode(request.mode) };
    return jobs.start(target, async (onProgress) => stripReport(await runAudit(request, { ...options.audit, onProgress })));
  }

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/runs', async (_req, res) => {
    try {
      res.json(await listRunRegistry(outputRoot));
    } catch (error) {
      sendError(res, 500, error);
    }
  });

  app.post('/api/audits', async (req, res) => {
    try {
      const started = startAudit(req.body);
      if (!started) {
        res.status(409).json({ ok: false, error: BUSY_MESSAGE });
        return;
      }
      res.json({ ok: true, ...(await started.completion) });
    } catch (error) {
      sendError(res, statusForError(error), error);
    }
  });

  app.post('/api/audits/jobs', (req, res) => {
    let started: StartedAuditJob | null;
    try {
      started = startAudit(req.body);
    } catch (error) {
      sendError(res, statusForError(error), error);
      return;
    }
    if (!started) {
      res.status(409).json({ ok: false, error: BUSY_MESSAGE });
      return;
    }
    res.json({ ok: true, jobId: started.job.jobId });
  });

  app.get('/api/audits/jobs/:jobId', (req, res) => {
    const job = jobs.getJob(req.params.jobId);
    if (!job) {
      res.status(404).json({ ok: false, error: `unknown jobId=${req.params.jobId}` });
      return;
    }
    res.json({ ok: true, job });
  });

  app.get('/api/audits/jobs/:jobId/events', (req, res) => {
    const jobId = req.params.jobId;
    const current = jobs.getJob(jobId);
    if (!current) {
      res.status(404).json({ ok: false, error: `unknown jobId=${jobId}` });
      return;
    }

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.flushHeaders();
    res.write(sseEvent(current));

    const unsubscribe = jobs.subscribe(jobId, (snapshot) => {
      if (res.writableEnded) return;
      res.write(sseEvent(snapshot));
      if (snapshot.status !== 'running') res.end();
    });
    if (!unsubscribe) {
      res.end();
      return;
    }

    const ping = setInterval(() => {
      if (!res.writableEnded) res.write(': ping\n\n');
    }, SSE_PING_MS);
    ping.unref();
    req.on('close', () => {
      clearInterval(ping);
      unsubscribe();
    });
  });

  app.get('/api/results/report', async (req, res) => {
    let outputDir: string;
    try {
      const runId = typeof req.query.runId === 'string' && req.query.runId ? req.query.runId : undefined;
      outputDir = await resolveRunIdToOutputDir(outputRoot, runId);
    } catch (error) {
      sendError(res, 404, error);
      return;
    }
    try {
      res.json(await readJsonFile(path.join(outputDir, REPORT_FILES.reportJson)));
    } catch (error) {
      sendError(res, 500, error);
    }
  });

  return app;
}

export function startServer(options: ServerOptions & { port: number; host?: string }): Promise<void> {
  const app = createApp(options);
  const host = options.host ?? DEFAULT_HOST;
  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, host, () => {
      console.log(`SG audit API listening on http://${host}:${options.port}`);
      resolve();
    });
    server.on('error', reject);
  });
}
