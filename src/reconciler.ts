import type { Logger } from './logger.js';
import type { ChildPlan, FieldChange, FieldName, FieldPolicy, FieldUpdate, Issue, NamedRef, TrackerClient } from './types.js';
import { guardWrite, NotFoundError } from './utils/errors.js';

export interface ReconcileOptions {
  rootKey: string;
  overwrite: FieldName[];
  append: FieldName[];
  dryRun: boolean;
  skipUnchanged?: boolean;
}

export interface ReconcileReport {
  root: Issue;
  plans: ChildPlan[];
  applied: string[];
}

const FIELD_ORDER: FieldName[] = ['components', 'labels', 'versions'];

// ── Set helpers ─────────────────────────────────────────────

/** Union keyed by name; the first occurrence of a name wins. */
export function unionByName<T extends NamedRef>(...groups: T[][]): T[] {
  const seen = new Map<string, T>();
  for (const group of groups) {
    for (const ref of group) {
      if (!seen.has(ref.name)) seen.set(ref.name, ref);
    }
  }
  return [...seen.values()];
}

export function unionLabels(...groups: string[][]): string[] {
  return [...new Set(groups.flat())];
}

function sameNames(a: string[], b: string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((name) => right.has(name));
}

// ── Plan ────────────────────────────────────────────────────

/** Overwrite wins over append for a field named in both lists. */
export function resolvePolicies(overwrite: FieldName[], append: FieldName[]): Map<FieldName, FieldPolicy> {
  const policies = new Map<FieldName, FieldPolicy>();
  for (const field of FIELD_ORDER) {
    if (overwrite.includes(field)) policies.set(field, 'overwrite');
    else if (append.includes(field)) policies.set(field, 'union');
  }
  return policies;
}

export function planChild(root: Issue, child: Issue, policies: Map<FieldName, FieldPolicy>): ChildPlan {
  const changes: FieldChange[] = [];
  const update: FieldUpdate = {};

  for (const [field, policy] of policies) {
    const overwrite = policy === 'overwrite';

    if (field === 'components') {
      const toBe = overwrite ? unionByName(root.components) : unionByName(root.components, child.components);
      update.components = toBe;
      changes.push({ field, policy, asIs: child.components.map((c) => c.name), toBe: toBe.map((c) => c.name) });
    } else if (field === 'labels') {
      const toBe = overwrite ? unionLabels(root.labels) : unionLabels(root.labels, child.labels);
      update.labels = toBe;
      changes.push({ field, policy, asIs: [...child.labels], toBe });
    } else {
      const toBe = overwrite ? unionByName(root.fixVersions) : unionByName(root.fixVersions, child.fixVersions);
      update.fixVersions = toBe;
      changes.push({ field, policy, asIs: child.fixVersions.map((v) => v.name), toBe: toBe.map((v) => v.name) });
    }
  }

  return { issue: child, changes, update };
}

export function isNoop(plan: ChildPlan): boolean {
  return plan.changes.every((change) => sameNames(change.asIs, change.toBe));
}

export function describePlan(plan: ChildPlan): string[] {
  const lines = [`${plan.issue.key}: ${plan.issue.summary}`];
  for (const change of plan.changes) {
    lines.push(`  ${change.field} (${change.policy})`);
    lines.push(`    as is : [${change.asIs.join(', ')}]`);
    lines.push(`    to be : [${change.toBe.join(', ')}]`);
  }
  return lines;
}

// ── Tree walk ───────────────────────────────────────────────

/**
 * Breadth-first collection of every descendant of `root`. Keys already seen
 * are skipped, so inconsistent parent links cannot loop.
 */
export async function collectDescendants(tracker: TrackerClient, root: Issue, log?: Logger): Promise<Issue[]> {
  const visited = new Set<string>([root.key]);
  const queue: Issue[] = [root];
  const descendants: Issue[] = [];

  while (queue.length > 0) {
    const parent = queue.shift();
    if (!parent) break;

    const children = await tracker.search(`parent = ${parent.key}`);
    log?.debug(`${parent.key} has ${children.length} direct child issue(s)`);

    for (const child of children) {
      if (visited.has(child.key)) {
        log?.warn(`${child.key} was already visited, skipping`);
        continue;
      }
      visited.add(child.key);
      descendants.push(child);
      queue.push(child);
    }
  }

  return descendants;
}

// ── Run ─────────────────────────────────────────────────────

export class ChildTreeReconciler {
  constructor(
    private tracker: TrackerClient,
    private log: Logger
  ) {}

  async run(options: ReconcileOptions): Promise<ReconcileReport> {
    const root = await this.tracker.findIssue(options.rootKey);
    if (!root) throw new NotFoundError('issue', options.rootKey);

    const policies = resolvePolicies(options.overwrite, options.append);
    this.log.info(
      `Reconciling children of ${root.key} (${root.summary}): ` +
        [...policies].map(([field, policy]) => `${field}=${policy}`).join(', ')
    );

    const descendants = await collectDescendants(this.tracker, root, this.log);
    this.log.info(`Found ${descendants.length} descendant issue(s) of ${root.key}`);

    const plans = descendants.map((child) => planChild(root, child, policies));
    const applied: string[] = [];

    for (const plan of plans) {
      if (options.dryRun) {
        describePlan(plan).forEach((line) => this.log.dryRun(line));
        continue;
      }

      if (options.skipUnchanged && isNoop(plan)) {
        this.log.debug(`${plan.issue.key} already matches ${root.key}, skipping`);
        continue;
      }

      await guardWrite('update', plan.issue.key, () => this.tracker.updateFields(plan.issue.key, plan.update));
      applied.push(plan.issue.key);
      this.log.success(`${plan.issue.key} updated`);
    }

    if (options.dryRun) {
      this.log.info(`Dry run: ${plans.length} issue(s) would be updated`);
    } else {
      this.log.info(`Updated ${applied.length} of ${plans.length} issue(s)`);
    }

    return { root, plans, applied };
  }
}
