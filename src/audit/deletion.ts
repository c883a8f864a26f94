import { isDangling } from './classify.js';
import { errorMessage } from './errors.js';
import type { Ec2Api } from './ec2Api.js';
import type { Classification, DeletionCandidate, DeletionResult, SecurityGroup } from './types.js';

export const DEFAULT_GROUP_NAME = 'default';

export function buildDeletionCommand(groupId: string, region: string): string {
  return `aws ec2 delete-security-group --group-id ${groupId} --region ${region}`;
}

export function planDeletions(args: {
  region: string;
  classifications: readonly Classification[];
  groupsById: ReadonlyMap<string, SecurityGroup>;
  keepList?: ReadonlyMap<string, string>;
  includeDefault?: boolean;
}): DeletionCandidate[] {
  const planned: DeletionCandidate[] = [];
  for (const c of args.classifications) {
    if (!isDangling(c)) continue;
    const groupName = args.groupsById.get(c.groupId)?.name ?? '';
    const candidate: DeletionCandidate = {
      groupId: c.groupId,
      groupName,
      status: c.status,
      command: buildDeletionCommand(c.groupId, args.region),
    };
    // the VPC default group can't be deleted through the API
    if (groupName === DEFAULT_GROUP_NAME && !args.includeDefault) candidate.skipReason = 'default-group';
    else if (args.keepList?.has(c.groupId)) candidate.skipReason = 'keep-list';
    planned.push(candidate);
  }
  return planned;
}

export function deletableCandidates(planned: readonly DeletionCandidate[]): DeletionCandidate[] {
  return planned.filter((c) => c.skipReason === undefined);
}

/**
 * Deletes one group at a time. A failure is recorded against its id and the batch carries on.
 */
export async function executeDeletions(
  api: Pick<Ec2Api, 'deleteSecurityGroup'>,
  candidates: readonly DeletionCandidate[],
  options: { onDeleted?: (result: DeletionResult, index: number) => void } = {},
): Promise<DeletionResult[]> {
  const results: DeletionResult[] = [];
  for (const [index, c] of candidates.entries()) {
    let result: DeletionResult;
    try {
      await api.deleteSecurityGroup(c.groupId);
      result = { groupId: c.groupId, ok: true };
    } catch (error) {
      result = { groupId: c.groupId, ok: false, error: errorMessage(error) };
    }
    results.push(result);
    options.onDeleted?.(result, index);
  }
  return results;
}
