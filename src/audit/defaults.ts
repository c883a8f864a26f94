import path from 'node:path';

export const DEFAULT_OUTPUT_DIR = 'output';
export const RUN_REGISTRY_SUBDIR = '_runs';

export const DEFAULT_MODE = 'dry-run';

// DescribeSecurityGroups / DescribeNetworkInterfaces accept 5..1000
export const DEFAULT_PAGE_SIZE = 1000;
export const DEFAULT_MAX_PAGES = 1000;

export const REPORT_FILES = {
  meta: 'meta.json',
  reportJson: 'report.json',
  reportText: 'report.txt',
  groupsCsv: 'groups.csv',
} as const;

export function resolveOutputRoot(cwd: string): string {
  const override = process.env.SG_AUDIT_OUTPUT_ROOT?.trim();
  return override ? path.resolve(cwd, override) : cwd;
}

export function resolveDefaultRegion(): string | undefined {
  const region = process.env.AWS_REGION?.trim() || process.env.AWS_DEFAULT_REGION?.trim();
  return region || undefined;
}

export function resolveDefaultProfile(): string | undefined {
  return process.env.AWS_PROFILE?.trim() || undefined;
}
