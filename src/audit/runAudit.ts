import { randomUUID } from 'node:crypto';
import path from 'node:path';

import { classifyInventory } from './classify.js';
import { DEFAULT_MODE, DEFAULT_OUTPUT_DIR, REPORT_FILES } from './defaults.js';
import { deletableCandidates, executeDeletions, planDeletions } from './deletion.js';
import { createEc2Api, type AwsSession, type Ec2Api } from './ec2Api.js';
import { AuditInputError } from './errors.js';
import { buildInventory } from './inventory.js';
import { ensureDir, writeJsonFile, writeTextFile } from './io.js';
import { loadKeepList } from './keepList.js';
import { buildAuditReport, renderAuditReportText, renderGroupsCsv, type AuditReport } from './report.js';
import { writeRunRegistry } from './runRegistry.js';
import { formatTimestampForDir } from './time.js';
import type {
  AuditMode,
  AuditProgress,
  AuditRequest,
  AuditResponse,
  AuditStage,
  DeletionResult,
  DeletionTally,
} from './types.js';

export type RunAuditOptions = {
  onProgress?: (p: AuditProgress) => void;
  createApi?: (session: AwsSession) => Ec2Api;
  now?: () => Date;
  runSuffix?: () => string;
};

export type AuditRunResult = AuditResponse & { report: AuditReport; text: string };

const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/u;

// where each stage starts; deleting spreads over 65..85
const STAGE_PERCENT: Record<AuditStage, number> = {
  'listing-groups': 5,
  'listing-interfaces': 30,
  classifying: 55,
  deleting: 65,
  'writing-report': 90,
  done: 100,
};
const DELETING_SPAN = 20;

function newRunSuffix(): string {
  return randomUUID().slice(0, 8);
}

export function parseAuditMode(raw: string | undefined): AuditMode {
  const mode = (raw ?? DEFAULT_MODE).trim().toLowerCase();
  if (mode === 'dry-run' || mode === 'live-delete') return mode;
  throw new AuditInputError(`unknown mode=${raw}; expected dry-run or live-delete`);
}

export function parseRegion(raw: string | undefined): string {
  const region = typeof raw === 'string' ? raw.trim() : '';
  if (!region) throw new AuditInputError('region is required (argument, AWS_REGION or AWS_DEFAULT_REGION)');
  if (!REGION_PATTERN.test(region)) throw new AuditInputError(`invalid region=${region}`);
  return region;
}

async function writeOutputBase(base: string, report: AuditReport, text: string): Promise<void> {
  await writeTextFile(`${base}.txt`, text);
  await writeJsonFile(`${base}.json`, report);
}

export async function runAudit(req: AuditRequest, options: RunAuditOptions = {}): Promise<AuditRunResult> {
  const progress = (stage: AuditStage, deletions?: DeletionTally, percent = STAGE_PERCENT[stage]) =>
    options.onProgress?.(deletions ? { stage, percent, deletions } : { stage, percent });
  const region = parseRegion(req.region);
  const mode = parseAuditMode(req.mode);
  const profile = req.profile?.trim() || undefined;
  const keepList = await loadKeepList(req.keepListPath);

  const api = (options.createApi ?? createEc2Api)({ region, profile });

  progress('listing-groups');
  const groups = await api.listSecurityGroups();
  progress('listing-interfaces');
  const attachments = await api.listNetworkAttachments();

  progress('classifying');
  const inventory = buildInventory(groups, attachments);
  const classifications = classifyInventory(inventory);
  const planned = planDeletions({
    region,
    classifications,
    groupsById: inventory.groupsById,
    keepList,
    includeDefault: req.includeDefault,
  });

  let results: DeletionResult[] | undefined;
  if (mode === 'live-delete') {
    const toDelete = deletableCandidates(planned);
    const tally: DeletionTally = { total: toDelete.length, deleted: 0, failed: 0 };
    progress('deleting', { ...tally });
    results = await executeDeletions(api, toDelete, {
      onDeleted: (r, i) => {
        if (r.ok) tally.deleted++;
        else tally.failed++;
        progress('deleting', { ...tally }, STAGE_PERCENT.deleting + Math.floor(((i + 1) / toDelete.length) * DELETING_SPAN));
      },
    });
  }

  const generatedAt = (options.now ?? (() => new Date()))();
  const timestamp = formatTimestampForDir(generatedAt);
  // two runs of one region can land in the same second
  const runDirName = `${timestamp}_${(options.runSuffix ?? newRunSuffix)()}`;
  const runId = `${region}_${runDirName}`;
  const outputDirRel = path.join(DEFAULT_OUTPUT_DIR, region, runDirName);
  const outputDirAbs = path.join(req.outputRoot, outputDirRel);

  progress('writing-report');
  const report = buildAuditReport({
    runId,
    region,
    mode,
    attachmentCount: attachments.length,
    inventory,
    classifications,
    planned,
    results,
    generatedAt,
  });
  const text = renderAuditReportText(report);

  await ensureDir(outputDirAbs);
  await writeJsonFile(path.join(outputDirAbs, REPORT_FILES.meta), {
    runId,
    input: { region, mode, profile: profile ?? null, keepList: req.keepListPath ?? null, includeDefault: Boolean(req.includeDefault) },
    counts: report.meta.counts,
  });
  await writeJsonFile(path.join(outputDirAbs, REPORT_FILES.reportJson), report);
  await writeTextFile(path.join(outputDirAbs, REPORT_FILES.reportText), text);
  await writeTextFile(path.join(outputDirAbs, REPORT_FILES.groupsCsv), renderGroupsCsv(report));
  if (req.outputBase) await writeOutputBase(path.resolve(req.outputRoot, req.outputBase), report, text);

  const outputDir = outputDirRel.replaceAll(path.sep, '/');
  await writeRunRegistry(req.outputRoot, { runId, region, mode, outputDir });
  progress('done');

  return {
    runId,
    region,
    mode,
    outputDir,
    counts: {
      groups: report.meta.counts.groups,
      deletionCandidates: report.meta.counts.deletionCandidates,
      deleted: report.meta.counts.deleted,
      deleteFailed: report.meta.counts.deleteFailed,
    },
    report,
    text,
  };
}
