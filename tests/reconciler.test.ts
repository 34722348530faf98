import { describe, expect, it } from 'vitest';

import { Logger } from '../src/logger.js';
import {
  ChildTreeReconciler,
  collectDescendants,
  describePlan,
  isNoop,
  planChild,
  resolvePolicies,
  unionByName,
} from '../src/reconciler.js';
import { NotFoundError, TrackerWriteError } from '../src/utils/errors.js';
import { FakeTracker, issue } from './helpers/fake-tracker.js';

const quiet = () => new Logger('error', () => undefined);

function buildTree(): FakeTracker {
  const root = issue('ROOT', {
    components: [
      { name: 'core', id: 'c1' },
      { name: 'ui', id: 'c2' },
    ],
    labels: ['a', 'b'],
    fixVersions: [{ name: '1.0', id: 'v1' }],
  });

  return new FakeTracker()
    .add(
      root,
      issue('E1', { components: [{ name: 'legacy' }], labels: ['x'] }),
      issue('E2', { labels: ['a'] }),
      issue('T1'),
      issue('T2'),
      issue('T3'),
      issue('S1')
    )
    .link('ROOT', 'E1', 'E2')
    .link('E1', 'T1', 'T2')
    .link('E2', 'T3')
    .link('T1', 'S1');
}

describe('union helpers', () => {
  it('collapses refs by name and keeps the first occurrence', () => {
    const merged = unionByName([{ name: 'core', id: 'c1' }], [{ name: 'core' }, { name: 'api' }]);
    expect(merged).toEqual([{ name: 'core', id: 'c1' }, { name: 'api' }]);
  });

  it('lets overwrite win over append', () => {
    const policies = resolvePolicies(['labels'], ['labels', 'versions']);
    expect([...policies]).toEqual([
      ['labels', 'overwrite'],
      ['versions', 'union'],
    ]);
  });
});

describe('planChild', () => {
  const root = issue('ROOT', { labels: ['a', 'b'] });
  const child = issue('C-1', { labels: ['b', 'c'] });

  it('unions labels of root and child', () => {
    const plan = planChild(root, child, resolvePolicies([], ['labels']));
    expect(plan.update).toEqual({ labels: ['a', 'b', 'c'] });
  });

  it('overwrites labels with the root value', () => {
    const plan = planChild(root, child, resolvePolicies(['labels'], []));
    expect(plan.update).toEqual({ labels: ['a', 'b'] });
  });

  it('gives the same union when applied to its own result', () => {
    const policies = resolvePolicies([], ['labels']);
    const once = planChild(root, child, policies);
    const twice = planChild(root, { ...child, labels: once.update.labels ?? [] }, policies);
    expect(twice.update).toEqual(once.update);
    expect(isNoop(twice)).toBe(true);
  });

  it('maps versions to fixVersions and leaves other fields out', () => {
    const withVersions = issue('ROOT', { fixVersions: [{ name: '2.0', id: 'v2' }] });
    const plan = planChild(withVersions, issue('C-2', { fixVersions: [{ name: '1.0' }] }), resolvePolicies(['versions'], []));
    expect(plan.update).toEqual({ fixVersions: [{ name: '2.0', id: 'v2' }] });
  });

  it('describes the change as is and to be', () => {
    const plan = planChild(root, child, resolvePolicies([], ['labels']));
    expect(describePlan(plan)).toEqual([
      'C-1: Summary of C-1',
      '  labels (union)',
      '    as is : [b, c]',
      '    to be : [a, b, c]',
    ]);
  });
});

describe('collectDescendants', () => {
  it('visits every descendant once, breadth first', async () => {
    const tracker = buildTree();
    const root = issue('ROOT');

    const found = await collectDescendants(tracker, root);

    expect(found.map((i) => i.key)).toEqual(['E1', 'E2', 'T1', 'T2', 'T3', 'S1']);
    expect(tracker.searches.map((s) => s.jql)).toEqual([
      'parent = ROOT',
      'parent = E1',
      'parent = E2',
      'parent = T1',
      'parent = T2',
      'parent = T3',
      'parent = S1',
    ]);
  });

  it('stops on parent cycles', async () => {
    const tracker = buildTree().link('S1', 'ROOT', 'E1').link('T3', 'T1');

    const found = await collectDescendants(tracker, issue('ROOT'));

    expect(found.map((i) => i.key)).toEqual(['E1', 'E2', 'T1', 'T2', 'T3', 'S1']);
  });
});

describe('ChildTreeReconciler', () => {
  it('writes only the selected fields to every descendant', async () => {
    const tracker = buildTree();

    const report = await new ChildTreeReconciler(tracker, quiet()).run({
      rootKey: 'ROOT',
      overwrite: ['components'],
      append: ['labels'],
      dryRun: false,
    });

    expect(report.applied).toEqual(['E1', 'E2', 'T1', 'T2', 'T3', 'S1']);
    expect(tracker.writes[0]).toEqual({
      method: 'updateFields',
      key: 'E1',
      fields: {
        components: [
          { name: 'core', id: 'c1' },
          { name: 'ui', id: 'c2' },
        ],
        labels: ['a', 'b', 'x'],
      },
    });
    expect(tracker.issues.get('E2')?.labels).toEqual(['a', 'b']);
    expect(tracker.writes.every((w) => w.method === 'updateFields' && !('fixVersions' in w.fields))).toBe(true);
  });

  it('does not write anything in a dry run', async () => {
    const tracker = buildTree();

    const report = await new ChildTreeReconciler(tracker, quiet()).run({
      rootKey: 'ROOT',
      overwrite: ['components', 'labels', 'versions'],
      append: [],
      dryRun: true,
    });

    expect(tracker.writes).toEqual([]);
    expect(report.plans).toHaveLength(6);
    expect(report.applied).toEqual([]);
  });

  it('skips children that already match when asked to', async () => {
    const tracker = new FakeTracker()
      .add(issue('ROOT', { labels: ['a'] }), issue('C1', { labels: ['a'] }), issue('C2', { labels: ['z'] }))
      .link('ROOT', 'C1', 'C2');

    const report = await new ChildTreeReconciler(tracker, quiet()).run({
      rootKey: 'ROOT',
      overwrite: ['labels'],
      append: [],
      dryRun: false,
      skipUnchanged: true,
    });

    expect(report.applied).toEqual(['C2']);
  });

  it('fails with a not-found error for a missing root', async () => {
    const run = new ChildTreeReconciler(new FakeTracker(), quiet()).run({
      rootKey: 'NOPE-1',
      overwrite: ['labels'],
      append: [],
      dryRun: false,
    });

    await expect(run).rejects.toBeInstanceOf(NotFoundError);
    await expect(run).rejects.toMatchObject({ exitCode: 2, message: 'Issue NOPE-1 not found.' });
  });

  it('aborts on the first failed update and keeps earlier ones', async () => {
    const tracker = buildTree().failOn('updateFields', 'T1');

    const run = new ChildTreeReconciler(tracker, quiet()).run({
      rootKey: 'ROOT',
      overwrite: [],
      append: ['labels'],
      dryRun: false,
    });

    await expect(run).rejects.toBeInstanceOf(TrackerWriteError);
    await expect(run).rejects.toMatchObject({ exitCode: 10 });
    expect(tracker.writes.map((w) => ('key' in w ? w.key : ''))).toEqual(['E1', 'E2']);
  });
});
