export type SecurityGroup = {
  id: string;
  name: string;
  vpcId?: string;
  ingressReferences: ReadonlySet<string>; // may contain id itself
  egressReferences: ReadonlySet<string>; // may contain id itself
};

export type NetworkAttachment = {
  id: string;
  attachedGroupIds: ReadonlySet<string>;
};

export type ClassificationStatus = 'IN_USE' | 'DANGLING' | 'DANGLING_SELF_REF';

export type Classification = {
  groupId: string;
  status: ClassificationStatus;
  referencedBy: string[]; // sorted, other known groups only
};

export type Inventory = {
  groupsById: ReadonlyMap<string, SecurityGroup>;
  attachedIds: ReadonlySet<string>;
  referenceMap: ReadonlyMap<string, ReadonlySet<string>>;
  selfReferencingIds: ReadonlySet<string>;
};

export type AuditMode = 'dry-run' | 'live-delete';

export type SkipReason = 'default-group' | 'keep-list';

export type DeletionCandidate = {
  groupId: string;
  groupName: string;
  status: Exclude<ClassificationStatus, 'IN_USE'>;
  command: string;
  skipReason?: SkipReason;
};

export type DeletionResult = { groupId: string; ok: true } | { groupId: string; ok: false; error: string };

export type AuditStage = 'listing-groups' | 'listing-interfaces' | 'classifying' | 'deleting' | 'writing-report' | 'done';

export type DeletionTally = {
  total: number;
  deleted: number;
  failed: number;
};

/** `deletions` is present once a live-delete run has started deleting. */
export type AuditProgress = {
  stage: AuditStage;
  percent: number;
  deletions?: DeletionTally;
};

export type AuditRequest = {
  region?: string;
  mode?: string;
  profile?: string;
  outputBase?: string;
  keepListPath?: string;
  includeDefault?: boolean;
  outputRoot: string;
};

export type AuditResponse = {
  runId: string;
  region: string;
  mode: AuditMode;
  outputDir: string;
  counts: {
    groups: number;
    deletionCandidates: number;
    deleted: number;
    deleteFailed: number;
  };
};
