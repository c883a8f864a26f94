export { buildInventory } from './audit/inventory.js';
export { classify, classifyGroup, classifyInventory, isDangling } from './audit/classify.js';
export { buildDeletionCommand, deletableCandidates, executeDeletions, planDeletions } from './audit/deletion.js';
export { collectPages, createEc2Api, toNetworkAttachment, toSecurityGroup } from './audit/ec2Api.js';
export type { AwsSession, Ec2Api } from './audit/ec2Api.js';
export { AuditInputError, InventoryError } from './audit/errors.js';
export type { InventoryErrorKind } from './audit/errors.js';
export { loadKeepList, parseKeepList } from './audit/keepList.js';
export { buildAuditReport, renderAuditReportText, renderGroupsCsv } from './audit/report.js';
export type { AuditReport, DanglingReportEntry, GroupReportEntry } from './audit/report.js';
export { parseAuditMode, parseRegion, runAudit } from './audit/runAudit.js';
export type { AuditRunResult, RunAuditOptions } from './audit/runAudit.js';
export { AuditJobManager } from './auditJobManager.js';
export type { AuditJobSnapshot, AuditJobStatus } from './auditJobManager.js';
export { createApp, startServer, statusForError } from './server.js';
export type * from './audit/types.js';
