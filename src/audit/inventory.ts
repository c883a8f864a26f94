import { InventoryError } from './errors.js';
import type { Inventory, NetworkAttachment, SecurityGroup } from './types.js';

function indexGroups(groups: readonly SecurityGroup[]): Map<string, SecurityGroup> {
  const byId = new Map<string, SecurityGroup>();
  for (const g of groups) {
    if (!g.id) throw new InventoryError('IncompleteInventory', 'security group without an id in inventory');
    if (byId.has(g.id)) throw new InventoryError('IncompleteInventory', `duplicate security group id=${g.id} in inventory`);
    byId.set(g.id, g);
  }
  return byId;
}

/**
 * Assembles the lookup sets the classifier works from.
 *
 * Ids that do not belong to a known group (other accounts, managed groups) are dropped
 * here, so they can never protect anything.
 */
export function buildInventory(groups: readonly SecurityGroup[], attachments: readonly NetworkAttachment[]): Inventory {
  const groupsById = indexGroups(groups);

  const attachedIds = new Set<string>();
  for (const a of attachments) {
    for (const id of a.attachedGroupIds) {
      if (groupsById.has(id)) attachedIds.add(id);
    }
  }

  const referenceMap = new Map<string, Set<string>>();
  const selfReferencingIds = new Set<string>();
  for (const g of groupsById.values()) {
    for (const refs of [g.ingressReferences, g.egressReferences]) {
      for (const ref of refs) {
        if (ref === g.id) {
          selfReferencingIds.add(g.id);
          continue;
        }
        if (!groupsById.has(ref)) continue;
        const referrers = referenceMap.get(ref) ?? new Set<string>();
        referrers.add(g.id);
        referenceMap.set(ref, referrers);
      }
    }
  }

  return { groupsById, attachedIds, referenceMap, selfReferencingIds };
}
