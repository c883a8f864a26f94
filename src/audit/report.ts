import type {
  AuditMode,
  Classification,
  ClassificationStatus,
  DeletionCandidate,
  DeletionResult,
  Inventory,
  SkipReason,
} from './types.js';

export type GroupReportEntry = {
  id: string;
  name: string;
  status: ClassificationStatus;
  referencedBy: string[];
  attached: boolean;
  selfReferenced: boolean;
};

export type DanglingReportEntry = {
  groupId: string;
  groupName: string;
  status: Exclude<ClassificationStatus, 'IN_USE'>;
  selfReferenced: boolean;
  command: string;
  skipReason?: SkipReason;
  result?: DeletionResult;
};

export type AuditReport = {
  meta: {
    runId: string;
    generatedAt: string;
    region: string;
    mode: AuditMode;
    counts: {
      groups: number;
      attachments: number;
      inUse: number;
      dangling: number;
      danglingSelfRef: number;
      protected: number;
      deletionCandidates: number;
      deleted: number;
      deleteFailed: number;
    };
  };
  groups: GroupReportEntry[];
  danglingGroups: DanglingReportEntry[];
};

export const MUTUAL_REFERENCE_NOTE =
  'Note: a reference from any other group protects a group, even when the referrer is unused itself. ' +
  'Unattached groups that only reference each other are reported IN USE; review them by hand.';

const RULE = '-'.repeat(60);

const GROUPS_CSV_COLUMNS: ReadonlyArray<readonly [string, (g: GroupReportEntry) => string]> = [
  ['id', (g) => g.id],
  ['name', (g) => g.name],
  ['status', (g) => g.status],
  ['referencedBy', (g) => g.referencedBy.join(' ')],
  ['attached', (g) => String(g.attached)],
  ['selfReferenced', (g) => String(g.selfReferenced)],
];

function csvCell(raw: string): string {
  return /[",\n\r]/u.test(raw) ? `"${raw.replaceAll('"', '""')}"` : raw;
}

/** One row per group; starts with a BOM so spreadsheet tools read it as utf-8. */
export function renderGroupsCsv(report: AuditReport): string {
  const lines = [GROUPS_CSV_COLUMNS.map(([header]) => csvCell(header)).join(',')];
  for (const g of report.groups) {
    lines.push(GROUPS_CSV_COLUMNS.map(([, value]) => csvCell(value(g))).join(','));
  }
  return `\ufeff${lines.join('\n')}\n`;
}

export function buildAuditReport(args: {
  runId: string;
  region: string;
  mode: AuditMode;
  attachmentCount: number;
  inventory: Inventory;
  classifications: readonly Classification[];
  planned: readonly DeletionCandidate[];
  results?: readonly DeletionResult[];
  generatedAt?: Date;
}): AuditReport {
  const resultById = new Map((args.results ?? []).map((r) => [r.groupId, r] as const));

  const groups: GroupReportEntry[] = args.classifications.map((c) => ({
    id: c.groupId,
    name: args.inventory.groupsById.get(c.groupId)?.name ?? '',
    status: c.status,
    referencedBy: c.referencedBy,
    attached: args.inventory.attachedIds.has(c.groupId),
    selfReferenced: args.inventory.selfReferencingIds.has(c.groupId),
  }));

  const danglingGroups: DanglingReportEntry[] = args.planned.map((p) => {
    const entry: DanglingReportEntry = {
      groupId: p.groupId,
      groupName: p.groupName,
      status: p.status,
      selfReferenced: p.status === 'DANGLING_SELF_REF',
      command: p.command,
    };
    if (p.skipReason) entry.skipReason = p.skipReason;
    const result = resultById.get(p.groupId);
    if (result) entry.result = result;
    return entry;
  });

  const countStatus = (s: ClassificationStatus) => args.classifications.filter((c) => c.status === s).length;
  const deletionCandidates = args.planned.filter((p) => p.skipReason === undefined).length;
  const results = args.results ?? [];

  return {
    meta: {
      runId: args.runId,
      generatedAt: (args.generatedAt ?? new Date()).toISOString(),
      region: args.region,
      mode: args.mode,
      counts: {
        groups: args.classifications.length,
        attachments: args.attachmentCount,
        inUse: countStatus('IN_USE'),
        dangling: countStatus('DANGLING'),
        danglingSelfRef: countStatus('DANGLING_SELF_REF'),
        protected: args.classifications.length - deletionCandidates,
        deletionCandidates,
        deleted: results.filter((r) => r.ok).length,
        deleteFailed: results.filter((r) => !r.ok).length,
      },
    },
    groups,
    danglingGroups,
  };
}

function describeResult(result: DeletionResult | undefined): string {
  if (!result) return 'NOT ATTEMPTED';
  return result.ok ? 'SUCCESSFULLY DELETED' : `DELETE FAILED: ${result.error}`;
}

function renderDanglingEntry(entry: DanglingReportEntry, mode: AuditMode): string[] {
  const selfRef = entry.selfReferenced ? ' (Self-Ref)' : '';
  const name = entry.groupName || 'No Name';
  if (entry.skipReason) {
    return [`[SKIPPED: ${entry.skipReason}${selfRef}] ${entry.groupId} (${name})`];
  }
  const lines = [`[DELETE CANDIDATE${selfRef}] ${entry.groupId} (${name})`];
  if (mode === 'dry-run') lines.push(`   -> CLI Command: ${entry.command}`);
  else lines.push(`   -> Result: ${describeResult(entry.result)}`);
  return lines;
}

export function renderAuditReportText(report: AuditReport): string {
  const { meta } = report;
  const modeLabel = meta.mode === 'dry-run' ? 'DRY RUN' : 'LIVE DELETE';
  const lines: string[] = [
    RULE,
    `--- SG AUDIT REPORT | Region: ${meta.region} | Mode: ${modeLabel} ---`,
    RULE,
    `Total SGs found: ${meta.counts.groups}`,
    `Network interfaces scanned: ${meta.counts.attachments}`,
    `Protected SGs (In Use or Skipped): ${meta.counts.protected}`,
    `Dangling Candidates (Deletable): ${meta.counts.deletionCandidates}`,
  ];
  if (meta.mode === 'live-delete') {
    lines.push(`Deleted: ${meta.counts.deleted} | Failed: ${meta.counts.deleteFailed}`);
  }
  lines.push(RULE);

  if (report.danglingGroups.length === 0) {
    lines.push('No deletable dangling security groups found.');
  } else {
    for (const entry of report.danglingGroups) lines.push(...renderDanglingEntry(entry, meta.mode));
    if (meta.counts.deletionCandidates === 0) lines.push('No deletable dangling security groups found.');
  }

  lines.push(RULE, MUTUAL_REFERENCE_NOTE, RULE);
  return `${lines.join('\n')}\n`;
}
