import type { Ec2Api } from '../src/audit/ec2Api.js';
import type { NetworkAttachment, SecurityGroup } from '../src/audit/types.js';

export function sg(id: string, opts: { name?: string; ingress?: string[]; egress?: string[] } = {}): SecurityGroup {
  return {
    id,
    name: opts.name ?? `${id}-name`,
    ingressReferences: new Set(opts.ingress ?? []),
    egressReferences: new Set(opts.egress ?? []),
  };
}

export function eni(id: string, groupIds: string[]): NetworkAttachment {
  return { id, attachedGroupIds: new Set(groupIds) };
}

export class FakeEc2Api implements Ec2Api {
  readonly deleted: string[] = [];
  readonly failDeletes = new Map<string, string>();
  listError?: Error;

  constructor(
    private readonly groups: SecurityGroup[],
    private readonly attachments: NetworkAttachment[],
  ) {}

  async listSecurityGroups(): Promise<SecurityGroup[]> {
    if (this.listError) throw this.listError;
    return this.groups;
  }

  async listNetworkAttachments(): Promise<NetworkAttachment[]> {
    return this.attachments;
  }

  async deleteSecurityGroup(groupId: string): Promise<void> {
    const failure = this.failDeletes.get(groupId);
    if (failure) throw new Error(failure);
    this.deleted.push(groupId);
  }
}
