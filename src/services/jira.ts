import { AgileClient, Version3Client } from 'jira.js';
import { z } from 'zod';
import type { ConnectionConfig } from '../config.js';
import type { FieldUpdate, Issue, IssueRef, NewIssue, NamedRef, Sprint, SprintState, TrackerClient } from '../types.js';
import { httpStatusOf } from '../utils/errors.js';

interface AdfNode {
  type: string;
  text?: string;
  content?: AdfNode[];
  marks?: Array<{ type: string; attrs?: Record<string, string> }>;
  attrs?: Record<string, unknown>;
}

interface AdfDoc {
  type: 'doc';
  version: 1;
  content: AdfNode[];
}

const ISSUE_FIELDS = ['summary', 'issuetype', 'status', 'labels', 'components', 'fixVersions', 'parent'];
const PAGE_SIZE = 100;

const namedRef = z.object({ name: z.string(), id: z.string().optional() });

const rawIssueSchema = z.object({
  id: z.string(),
  key: z.string(),
  fields: z
    .object({
      summary: z.string().nullish(),
      issuetype: z.object({ name: z.string() }).nullish(),
      status: z.object({ name: z.string() }).nullish(),
      labels: z.array(z.string()).nullish(),
      components: z.array(namedRef).nullish(),
      fixVersions: z.array(namedRef).nullish(),
      parent: z.object({ id: z.string(), key: z.string() }).nullish(),
    })
    .default({}),
});

const rawSprintSchema = z.object({
  id: z.number(),
  name: z.string(),
  state: z.enum(['active', 'future', 'closed']),
  startDate: z.string().nullish(),
  endDate: z.string().nullish(),
});

function toRef(ref: z.infer<typeof namedRef>): NamedRef {
  return ref.id ? { name: ref.name, id: ref.id } : { name: ref.name };
}

export function toIssue(raw: unknown): Issue {
  const { id, key, fields } = rawIssueSchema.parse(raw);
  return {
    id,
    key,
    type: fields.issuetype?.name ?? '',
    status: fields.status?.name ?? '',
    summary: fields.summary ?? '',
    components: (fields.components ?? []).map(toRef),
    labels: fields.labels ?? [],
    fixVersions: (fields.fixVersions ?? []).map(toRef),
    parent: fields.parent ? { id: fields.parent.id, key: fields.parent.key } : null,
  };
}

export function toSprint(raw: unknown): Sprint {
  const sprint = rawSprintSchema.parse(raw);
  return {
    id: sprint.id,
    name: sprint.name,
    state: sprint.state,
    startDate: sprint.startDate ? new Date(sprint.startDate) : null,
    endDate: sprint.endDate ? new Date(sprint.endDate) : null,
  };
}

/** Jira matches components and versions by id when given one, by name otherwise. */
function toJiraRefs(refs: NamedRef[]): Array<{ id: string } | { name: string }> {
  return refs.map((ref) => (ref.id ? { id: ref.id } : { name: ref.name }));
}

export function toJiraFields(update: FieldUpdate): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(update)) {
    if (name === 'components' && update.components) fields.components = toJiraRefs(update.components);
    else if (name === 'fixVersions' && update.fixVersions) fields.fixVersions = toJiraRefs(update.fixVersions);
    else fields[name] = value;
  }
  return fields;
}

export class JiraService implements TrackerClient {
  private client: Version3Client;
  private agile: AgileClient;
  private accountIds = new Map<string, string>();

  constructor(config: Pick<ConnectionConfig, 'base_url' | 'username' | 'api_token'>) {
    const options = {
      host: config.base_url.replace(/\/$/, ''),
      authentication: {
        basic: {
          email: config.username,
          apiToken: config.api_token,
        },
      },
    };
    this.client = new Version3Client(options);
    this.agile = new AgileClient(options);
  }

  async findIssue(key: string): Promise<Issue | null> {
    try {
      const issue = await this.client.issues.getIssue({ issueIdOrKey: key, fields: ISSUE_FIELDS });
      return toIssue(issue);
    } catch (error) {
      if (httpStatusOf(error) === 404) return null;
      throw error;
    }
  }

  async search(jql: string, maxResults = Number.POSITIVE_INFINITY): Promise<Issue[]> {
    const issues: Issue[] = [];
    let nextPageToken: string | undefined;

    while (issues.length < maxResults) {
      const page = await this.client.issueSearch.searchForIssuesUsingJqlEnhancedSearch({
        jql,
        fields: ISSUE_FIELDS,
        maxResults: Math.min(PAGE_SIZE, maxResults - issues.length),
        nextPageToken,
      });
      issues.push(...(page.issues ?? []).map(toIssue));
      nextPageToken = page.nextPageToken ?? undefined;
      if (!nextPageToken) break;
    }

    return issues;
  }

  async listSprints(boardId: number, states: SprintState[]): Promise<Sprint[]> {
    const sprints: Sprint[] = [];
    let startAt = 0;

    for (;;) {
      const page = await this.agile.board.getAllSprints({
        boardId,
        state: states.join(','),
        startAt,
        maxResults: 50,
      });
      const values = page.values ?? [];
      sprints.push(...values.map(toSprint));
      startAt += values.length;
      if (page.isLast !== false || values.length === 0) break;
    }

    return sprints;
  }

  /** `transitionName` is a transition name (any case) or a transition id. */
  async transition(issueKey: string, transitionName: string): Promise<void> {
    const transitions = await this.client.issues.getTransitions({
      issueIdOrKey: issueKey,
    });

    const transition = transitions.transitions?.find(
      (t) => t.id === transitionName || t.name?.toLowerCase() === transitionName.toLowerCase()
    );

    if (!transition?.id) {
      const available = transitions.transitions?.map((t) => `${t.name} (${t.id})`).join(', ');
      throw new Error(
        `No transition "${transitionName}" found for ${issueKey}. Available: ${available}`
      );
    }

    await this.client.issues.doTransition({
      issueIdOrKey: issueKey,
      transition: { id: transition.id },
    });
  }

  async assign(issueKey: string, person: string): Promise<void> {
    await this.client.issues.assignIssue({
      issueIdOrKey: issueKey,
      accountId: await this.resolveAccountId(person),
    });
  }

  async addComment(issueKey: string, text: string): Promise<void> {
    await this.client.issueComments.addComment({
      issueIdOrKey: issueKey,
      comment: markdownToAdf(text),
    });
  }

  async updateFields(issueKey: string, update: FieldUpdate): Promise<void> {
    await this.client.issues.editIssue({
      issueIdOrKey: issueKey,
      fields: toJiraFields(update),
    });
  }

  async createIssue(data: NewIssue): Promise<IssueRef> {
    const created = await this.client.issues.createIssue({
      fields: {
        project: { key: data.projectKey },
        summary: data.summary,
        description: markdownToAdf(data.description),
        issuetype: { name: data.issueType },
        parent: { id: data.parentId },
      },
    });

    if (!created.id || !created.key) {
      throw new Error(`Jira did not return a key for the issue "${data.summary}"`);
    }
    return { id: created.id, key: created.key };
  }

  /** Jira Cloud assigns by account id; people are configured by e-mail. */
  private async resolveAccountId(person: string): Promise<string> {
    if (!person.includes('@')) return person;

    const cached = this.accountIds.get(person);
    if (cached) return cached;

    const users = await this.client.userSearch.findUsers({ query: person });
    const match =
      users.find((u) => u.emailAddress?.toLowerCase() === person.toLowerCase()) ??
      (users.length === 1 ? users[0] : undefined);

    if (!match?.accountId) {
      throw new Error(`No Jira account found for ${person}`);
    }
    this.accountIds.set(person, match.accountId);
    return match.accountId;
  }
}

// ── Atlassian Document Format ───────────────────────────────

/** Blank lines separate paragraphs; bare URLs become links. */
export function markdownToAdf(text: string): AdfDoc {
  const blocks: AdfNode[] = text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph !== '')
    .map((paragraph) => ({ type: 'paragraph', content: parseInlineLinks(paragraph) }));

  if (blocks.length === 0) {
    blocks.push({ type: 'paragraph', content: [{ type: 'text', text }] });
  }

  return { type: 'doc', version: 1, content: blocks };
}

function parseInlineLinks(text: string): AdfNode[] {
  const nodes: AdfNode[] = [];
  const regex = /https?:\/\/[^\s)]+/g;
  let lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(text)) !== null) {
    if (match.index > lastIndex) {
      nodes.push({ type: 'text', text: text.slice(lastIndex, match.index) });
    }
    nodes.push({ type: 'text', text: match[0], marks: [{ type: 'link', attrs: { href: match[0] } }] });
    lastIndex = match.index + match[0].length;
  }

  if (lastIndex < text.length) {
    nodes.push({ type: 'text', text: text.slice(lastIndex) });
  }

  return nodes;
}
