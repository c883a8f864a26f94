import {
  DeleteSecurityGroupCommand,
  EC2Client,
  paginateDescribeNetworkInterfaces,
  paginateDescribeSecurityGroups,
  type IpPermission,
  type NetworkInterface,
  type SecurityGroup as Ec2SecurityGroup,
} from '@aws-sdk/client-ec2';

import { DEFAULT_MAX_PAGES, DEFAULT_PAGE_SIZE } from './defaults.js';
import { InventoryError, errorMessage } from './errors.js';
import type { NetworkAttachment, SecurityGroup } from './types.js';

export type Ec2Api = {
  listSecurityGroups(): Promise<SecurityGroup[]>;
  listNetworkAttachments(): Promise<NetworkAttachment[]>;
  deleteSecurityGroup(groupId: string): Promise<void>;
};

export type AwsSession = {
  region: string;
  profile?: string;
};

function collectGroupRefs(permissions: IpPermission[] | undefined): Set<string> {
  const refs = new Set<string>();
  for (const perm of permissions ?? []) {
    for (const pair of perm.UserIdGroupPairs ?? []) {
      if (pair.GroupId) refs.add(pair.GroupId);
    }
  }
  return refs;
}

export function toSecurityGroup(raw: Ec2SecurityGroup): SecurityGroup {
  if (!raw.GroupId) {
    throw new InventoryError('IncompleteInventory', `security group record without GroupId (name=${raw.GroupName ?? '?'})`);
  }
  return {
    id: raw.GroupId,
    name: raw.GroupName ?? '',
    vpcId: raw.VpcId,
    ingressReferences: collectGroupRefs(raw.IpPermissions),
    egressReferences: collectGroupRefs(raw.IpPermissionsEgress),
  };
}

export function toNetworkAttachment(raw: NetworkInterface): NetworkAttachment {
  const attachedGroupIds = new Set<string>();
  for (const g of raw.Groups ?? []) {
    if (g.GroupId) attachedGroupIds.add(g.GroupId);
  }
  return { id: raw.NetworkInterfaceId ?? '', attachedGroupIds };
}

/**
 * Drains a paginator. Hitting the page limit while a NextToken remains means the snapshot
 * would be partial, which is fatal.
 */
export async function collectPages<P extends { NextToken?: string }, T>(args: {
  label: string;
  pages: AsyncIterable<P>;
  items: (page: P) => T[];
  maxPages?: number;
}): Promise<T[]> {
  const maxPages = args.maxPages ?? DEFAULT_MAX_PAGES;
  const items: T[] = [];
  let pageCount = 0;
  try {
    for await (const page of args.pages) {
      pageCount++;
      items.push(...args.items(page));
      if (pageCount >= maxPages && page.NextToken) {
        throw new InventoryError('IncompleteInventory', `${args.label} listing truncated after ${maxPages} pages`);
      }
    }
  } catch (error) {
    if (error instanceof InventoryError) throw error;
    throw new InventoryError('FetchFailed', `failed to list ${args.label}: ${errorMessage(error)}`, { cause: error });
  }
  return items;
}

export function createEc2Api(session: AwsSession, options: { maxPages?: number } = {}): Ec2Api {
  const client = new EC2Client({ region: session.region, profile: session.profile });
  const paging = { client, pageSize: DEFAULT_PAGE_SIZE };

  return {
    listSecurityGroups: () =>
      collectPages({
        label: 'security groups',
        maxPages: options.maxPages,
        pages: paginateDescribeSecurityGroups(paging, {}),
        items: (out) => (out.SecurityGroups ?? []).map(toSecurityGroup),
      }),

    listNetworkAttachments: () =>
      collectPages({
        label: 'network interfaces',
        maxPages: options.maxPages,
        pages: paginateDescribeNetworkInterfaces(paging, {}),
        items: (out) => (out.NetworkInterfaces ?? []).map(toNetworkAttachment),
      }),

    deleteSecurityGroup: async (groupId) => {
      await client.send(new DeleteSecurityGroupCommand({ GroupId: groupId }));
    },
  };
}
