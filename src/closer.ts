import type { Logger } from './logger.js';
import type { Issue, TrackerClient } from './types.js';
import { guardWrite } from './utils/errors.js';

export interface CloseStaleOptions {
  projectKey: string;
  staleDays: number;
  transitionTo: string;
  dryRun: boolean;
  maxResults: number;
}

export interface CloseStaleReport {
  found: Issue[];
  closed: string[];
}

export function staleOrphanJql(projectKey: string, staleDays: number): string {
  return (
    `project = "${projectKey}" AND type IN (Task, Story, Bug, Epic) AND status NOT IN (Done, Rejected)` +
    ` AND parent is null AND updated <= -${staleDays}d ORDER BY created DESC`
  );
}

export function closingComment(staleDays: number): string {
  return `Issue will be closed because it does not have a parent and it has not been updated for ${staleDays} days`;
}

export class StaleOrphanCloser {
  constructor(
    private tracker: TrackerClient,
    private log: Logger
  ) {}

  async run(options: CloseStaleOptions): Promise<CloseStaleReport> {
    const found = await this.tracker.search(staleOrphanJql(options.projectKey, options.staleDays), options.maxResults);
    const comment = closingComment(options.staleDays);
    const closed: string[] = [];

    this.log.info(`Found ${found.length} stale issue(s) without a parent in ${options.projectKey}`);
    this.log.info(`Comment: ${comment}`);

    for (const issue of found) {
      const line = `${issue.key} | ${issue.type} | ${issue.summary}`;
      if (options.dryRun) {
        this.log.dryRun(`${line} -> ${options.transitionTo}`);
        continue;
      }

      await guardWrite('comment on', issue.key, () => this.tracker.addComment(issue.key, comment));
      await guardWrite('transition', issue.key, () => this.tracker.transition(issue.key, options.transitionTo));
      closed.push(issue.key);
      this.log.success(`${line} -> ${options.transitionTo}`);
    }

    return { found, closed };
  }
}
