import { describe, expect, it } from 'vitest';

import { InventoryError } from '../src/audit/errors.js';
import { buildInventory } from '../src/audit/inventory.js';

import { eni, sg } from './fakes.js';

describe('buildInventory', () => {
  it('collects attached, referenced and self-referencing groups', () => {
    const inv = buildInventory(
      [sg('sg-a', { ingress: ['sg-a', 'sg-b'] }), sg('sg-b', { egress: ['sg-b'] }), sg('sg-c', { egress: ['sg-b'] })],
      [eni('eni-1', ['sg-c']), eni('eni-2', ['sg-c', 'sg-unknown']), eni('eni-3', [])],
    );

    expect([...inv.attachedIds]).toEqual(['sg-c']);
    expect([...inv.selfReferencingIds].sort()).toEqual(['sg-a', 'sg-b']);
    expect([...inv.referenceMap.keys()]).toEqual(['sg-b']);
    expect([...(inv.referenceMap.get('sg-b') ?? [])].sort()).toEqual(['sg-a', 'sg-c']);
    expect(inv.groupsById.size).toBe(3);
  });

  it('never maps a group to itself', () => {
    const inv = buildInventory([sg('sg-a', { ingress: ['sg-a'], egress: ['sg-a'] })], []);
    expect(inv.referenceMap.has('sg-a')).toBe(false);
    expect(inv.selfReferencingIds.has('sg-a')).toBe(true);
  });

  it('drops ids that are not in the inventory', () => {
    const inv = buildInventory([sg('sg-a', { ingress: ['sg-elsewhere'] })], [eni('eni-1', ['sg-elsewhere'])]);
    expect(inv.attachedIds.size).toBe(0);
    expect(inv.referenceMap.size).toBe(0);
  });

  it('rejects duplicate group ids', () => {
    expect(() => buildInventory([sg('sg-a'), sg('sg-a')], [])).toThrow(InventoryError);
    expect(() => buildInventory([sg('sg-a'), sg('sg-a')], [])).toThrow('duplicate security group id=sg-a in inventory');
  });

  it('rejects a group without an id', () => {
    try {
      buildInventory([sg('')], []);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InventoryError);
      expect(error instanceof InventoryError ? error.kind : undefined).toBe('IncompleteInventory');
    }
  });
});
