export interface NamedRef {
  name: string;
  id?: string;
}

export type ComponentRef = NamedRef;
export type VersionRef = NamedRef;

export interface IssueRef {
  id: string;
  key: string;
}

export interface Issue {
  id: string;
  key: string;
  type: string;
  status: string;
  summary: string;
  components: ComponentRef[];
  labels: string[];
  fixVersions: VersionRef[];
  parent: IssueRef | null;
}

export type SprintState = 'active' | 'future' | 'closed';

export interface Sprint {
  id: number;
  name: string;
  state: SprintState;
  startDate: Date | null;
  endDate: Date | null;
}

/** Payload accepted by the tracker when patching an issue. Absent keys are left untouched. */
export interface FieldUpdate {
  components?: ComponentRef[];
  labels?: string[];
  fixVersions?: VersionRef[];
  [customField: string]: unknown;
}

export interface NewIssue {
  projectKey: string;
  summary: string;
  description: string;
  issueType: string;
  parentId: string;
}

export interface TrackerClient {
  findIssue(key: string): Promise<Issue | null>;
  search(jql: string, maxResults?: number): Promise<Issue[]>;
  addComment(issueKey: string, text: string): Promise<void>;
  transition(issueKey: string, transitionName: string): Promise<void>;
  updateFields(issueKey: string, fields: FieldUpdate): Promise<void>;
  createIssue(data: NewIssue): Promise<IssueRef>;
  assign(issueKey: string, person: string): Promise<void>;
  listSprints(boardId: number, states: SprintState[]): Promise<Sprint[]>;
}

// ── Reconciliation ───────────────────────────────────────────

export type FieldName = 'components' | 'labels' | 'versions';

export type FieldPolicy = 'overwrite' | 'union';

export interface FieldChange {
  field: FieldName;
  policy: FieldPolicy;
  asIs: string[];
  toBe: string[];
}

export interface ChildPlan {
  issue: Issue;
  changes: FieldChange[];
  update: FieldUpdate;
}

// ── Duty rotation ────────────────────────────────────────────

export type DutyWeek = 1 | 2;

export interface DutySlot {
  sprint: Sprint;
  week: DutyWeek;
  /** First working day of the duty week, `YYYY-MM-DD`. */
  startDay: string;
}

export interface DutyContext extends DutySlot {
  projectKey: string;
  epic: Issue;
}

export interface DutyText {
  summary: string;
  description: string;
}

/** Produces the summary and description of one duty issue. */
export type DutyTemplate = (context: DutyContext) => DutyText;

export interface DutyAssignment {
  slot: DutySlot;
  person: string;
  issue: NewIssue;
  created: IssueRef | null;
}
