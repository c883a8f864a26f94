import { describe, expect, it } from 'vitest';

import { classifyInventory } from '../src/audit/classify.js';
import { buildDeletionCommand, deletableCandidates, executeDeletions, planDeletions } from '../src/audit/deletion.js';
import { buildInventory } from '../src/audit/inventory.js';

import { FakeEc2Api, sg } from './fakes.js';

function plan(opts: { keepList?: Map<string, string>; includeDefault?: boolean } = {}) {
  const inventory = buildInventory(
    [
      sg('sg-a', { ingress: ['sg-a'] }),
      sg('sg-b', { ingress: ['sg-c'] }),
      sg('sg-c'),
      sg('sg-d', { name: 'default' }),
      sg('sg-e'),
    ],
    [],
  );
  return planDeletions({
    region: 'eu-west-1',
    classifications: classifyInventory(inventory),
    groupsById: inventory.groupsById,
    ...opts,
  });
}

describe('deletion planning', () => {
  it('builds the aws cli delete command', () => {
    expect(buildDeletionCommand('sg-123', 'us-west-2')).toBe('aws ec2 delete-security-group --group-id sg-123 --region us-west-2');
  });

  it('plans every dangling group and skips the default group', () => {
    expect(plan()).toEqual([
      {
        groupId: 'sg-a',
        groupName: 'sg-a-name',
        status: 'DANGLING_SELF_REF',
        command: 'aws ec2 delete-security-group --group-id sg-a --region eu-west-1',
      },
      {
        groupId: 'sg-b',
        groupName: 'sg-b-name',
        status: 'DANGLING',
        command: 'aws ec2 delete-security-group --group-id sg-b --region eu-west-1',
      },
      {
        groupId: 'sg-d',
        groupName: 'default',
        status: 'DANGLING',
        command: 'aws ec2 delete-security-group --group-id sg-d --region eu-west-1',
        skipReason: 'default-group',
      },
      {
        groupId: 'sg-e',
        groupName: 'sg-e-name',
        status: 'DANGLING',
        command: 'aws ec2 delete-security-group --group-id sg-e --region eu-west-1',
      },
    ]);
  });

  it('honours the keep-list and includeDefault', () => {
    const planned = plan({ keepList: new Map([['sg-e', 'shared with batch jobs']]), includeDefault: true });
    expect(planned.map((p) => [p.groupId, p.skipReason])).toEqual([
      ['sg-a', undefined],
      ['sg-b', undefined],
      ['sg-d', undefined],
      ['sg-e', 'keep-list'],
    ]);
    expect(deletableCandidates(planned).map((p) => p.groupId)).toEqual(['sg-a', 'sg-b', 'sg-d']);
  });
});

describe('executeDeletions', () => {
  it('records failures per group and keeps going', async () => {
    const api = new FakeEc2Api([], []);
    api.failDeletes.set('sg-b', 'DependencyViolation: resource sg-b has a dependent object');
    const seen: number[] = [];

    const results = await executeDeletions(api, deletableCandidates(plan()), { onDeleted: (_r, i) => seen.push(i) });

    expect(results).toEqual([
      { groupId: 'sg-a', ok: true },
      { groupId: 'sg-b', ok: false, error: 'DependencyViolation: resource sg-b has a dependent object' },
      { groupId: 'sg-e', ok: true },
    ]);
    expect(api.deleted).toEqual(['sg-a', 'sg-e']);
    expect(seen).toEqual([0, 1, 2]);
  });

  it('does nothing for an empty batch', async () => {
    const api = new FakeEc2Api([], []);
    await expect(executeDeletions(api, [])).resolves.toEqual([]);
    expect(api.deleted).toEqual([]);
  });
});
