import { buildInventory } from './inventory.js';
import type { Classification, ClassificationStatus, Inventory, NetworkAttachment, SecurityGroup } from './types.js';

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Attachment wins over everything, then a reference from any other known group.
 * Reference protection is structural: a referrer that is itself unused still protects.
 */
export function classifyGroup(inventory: Inventory, groupId: string): ClassificationStatus {
  if (inventory.attachedIds.has(groupId)) return 'IN_USE';
  const referrers = inventory.referenceMap.get(groupId);
  if (referrers && referrers.size > 0) return 'IN_USE';
  if (inventory.selfReferencingIds.has(groupId)) return 'DANGLING_SELF_REF';
  return 'DANGLING';
}

export function classifyInventory(inventory: Inventory): Classification[] {
  const ids = [...inventory.groupsById.keys()].sort(compareIds);
  return ids.map((groupId) => ({
    groupId,
    status: classifyGroup(inventory, groupId),
    referencedBy: [...(inventory.referenceMap.get(groupId) ?? [])].sort(compareIds),
  }));
}

export function classify(groups: readonly SecurityGroup[], attachments: readonly NetworkAttachment[]): Classification[] {
  return classifyInventory(buildInventory(groups, attachments));
}

export function isDangling(c: Classification): c is Classification & { status: Exclude<ClassificationStatus, 'IN_USE'> } {
  return c.status !== 'IN_USE';
}
