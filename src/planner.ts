import { SPRINT_NUMBER_PLACEHOLDER } from './config.js';
import type { Logger } from './logger.js';
import type {
  DutyAssignment,
  DutyContext,
  DutySlot,
  DutyTemplate,
  DutyWeek,
  FieldUpdate,
  Issue,
  NewIssue,
  Sprint,
  TrackerClient,
} from './types.js';
import { ConfigurationError, guardWrite, NotFoundError, UnexpectedStateError } from './utils/errors.js';

export interface RotationOptions {
  projectKey: string;
  boardId: number;
  epicKey: string;
  sprintTemplate: string;
  startingNumber: number;
  people: string[];
  dryRun: boolean;
  sprintField: string;
  template: DutyTemplate;
}

export interface RotationReport {
  epic: Issue;
  startSprint: Sprint | null;
  assignments: DutyAssignment[];
  unassigned: string[];
}

type ScanPhase = 'searching' | 'found-start' | 'assigning';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Sprints shorter than this hold a single duty week. */
export const STANDARD_SPRINT_MIN_DAYS = 8;

// Sprints start at midnight before the first working day.
const WEEK_OFFSET_DAYS = { 1: 1, 2: 8 } as const;

export function sprintName(template: string, sprintNumber: number): string {
  if (!template.includes(SPRINT_NUMBER_PLACEHOLDER)) {
    throw new ConfigurationError([`sprint_template must contain ${SPRINT_NUMBER_PLACEHOLDER}`]);
  }
  return template.split(SPRINT_NUMBER_PLACEHOLDER).join(String(sprintNumber));
}

export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function isShortSprint(sprint: Sprint): boolean {
  if (!sprint.startDate || !sprint.endDate) return false;
  return sprint.endDate.getTime() - sprint.startDate.getTime() < STANDARD_SPRINT_MIN_DAYS * DAY_MS;
}

/** Duty slots of a scheduled sprint: week 1 only for a short sprint, weeks 1 and 2 otherwise. */
export function sprintSlots(sprint: Sprint): DutySlot[] {
  const start = sprint.startDate;
  if (!start) return [];

  const weeks: DutyWeek[] = isShortSprint(sprint) ? [1] : [1, 2];
  return weeks.map((week) => ({
    sprint,
    week,
    startDay: formatDay(new Date(start.getTime() + WEEK_OFFSET_DAYS[week] * DAY_MS)),
  }));
}

export function buildDutyIssue(template: DutyTemplate, context: DutyContext): NewIssue {
  const { summary, description } = template(context);
  return {
    projectKey: context.projectKey,
    summary,
    description,
    issueType: 'Task',
    parentId: context.epic.id,
  };
}

export class DutyRotationPlanner {
  constructor(
    private tracker: TrackerClient,
    private log: Logger
  ) {}

  async run(options: RotationOptions): Promise<RotationReport> {
    const startName = sprintName(options.sprintTemplate, options.startingNumber);

    const epic = await this.tracker.findIssue(options.epicKey);
    if (!epic) throw new NotFoundError('epic', options.epicKey, 'Duty issues are created under it.');

    const sprints = await this.tracker.listSprints(options.boardId, ['active', 'future']);
    this.log.debug(`Board ${options.boardId} has ${sprints.length} active or future sprint(s)`);

    const startIndex = sprints.findIndex((s) => s.name === startName);
    if (startIndex === -1) {
      throw new NotFoundError('sprint', startName, `It is not an active or future sprint of board ${options.boardId}.`);
    }

    const { startSprint, slots } = await this.openSlots(options, epic, sprints.slice(startIndex));

    const assignments: DutyAssignment[] = [];
    const people = options.people.slice(0, slots.length);
    const unassigned = options.people.slice(slots.length);

    for (const [i, person] of people.entries()) {
      const slot = slots[i];
      const issue = buildDutyIssue(options.template, { ...slot, projectKey: options.projectKey, epic });
      const created = await this.createDuty(options, issue, person, slot);
      assignments.push({ slot, person, issue, created });
    }

    if (unassigned.length > 0) {
      this.log.warn(
        `Ran out of sprints: ${unassigned.length} person(s) left unassigned: ${unassigned.join(', ')}`
      );
    }

    return { epic, startSprint, assignments, unassigned };
  }

  /**
   * Walks the sprints from the configured one onwards. The first sprint with
   * free duty weeks is the start; every later sprint contributes all of its
   * weeks.
   */
  private async openSlots(
    options: RotationOptions,
    epic: Issue,
    candidates: Sprint[]
  ): Promise<{ startSprint: Sprint | null; slots: DutySlot[] }> {
    let phase: ScanPhase = 'searching';
    let startSprint: Sprint | null = null;
    const slots: DutySlot[] = [];

    for (const sprint of candidates) {
      const sprintSlotList = sprintSlots(sprint);
      if (sprintSlotList.length === 0) {
        this.log.warn(`Sprint ${sprint.name} has no start date, not scheduling into it or later sprints`);
        break;
      }
      if (!sprint.endDate) {
        this.log.warn(`Sprint ${sprint.name} has no end date, assuming a standard two week sprint`);
      }

      if (phase === 'searching') {
        const existing = await this.countExisting(options.projectKey, sprint, epic);
        if (existing > sprintSlotList.length) {
          throw new UnexpectedStateError(
            `Found ${existing} duty issues under ${epic.key} in sprint ${sprint.name}, ` +
              `which only has room for ${sprintSlotList.length}. Is sprint ${options.startingNumber} correct?`
          );
        }
        if (existing === sprintSlotList.length) {
          this.log.info(`Sprint ${sprint.name} already has ${existing} duty issue(s), skipping`);
          continue;
        }

        phase = 'found-start';
        startSprint = sprint;
        this.log.info(
          existing === 0
            ? `No duty issues in sprint ${sprint.name} yet, starting there`
            : `Sprint ${sprint.name} has ${existing} duty issue(s), filling week ${existing + 1} onwards`
        );
        slots.push(...sprintSlotList.slice(existing));
        continue;
      }

      phase = 'assigning';
      slots.push(...sprintSlotList);
    }

    if (phase === 'searching') {
      this.log.warn('Every available sprint already has its duty issues');
    }
    return { startSprint, slots };
  }

  private async countExisting(projectKey: string, sprint: Sprint, epic: Issue): Promise<number> {
    const existing = await this.tracker.search(
      `project = "${projectKey}" AND sprint = ${sprint.id} AND parent = ${epic.key}`
    );
    return existing.length;
  }

  private async createDuty(
    options: RotationOptions,
    issue: NewIssue,
    person: string,
    slot: DutySlot
  ): Promise<DutyAssignment['created']> {
    if (options.dryRun) {
      this.log.dryRun(`Would create "${issue.summary}" for ${person} in sprint ${slot.sprint.name} (${slot.sprint.id})`);
      issue.description.split('\n').forEach((line) => this.log.debug(`  ${line}`));
      return null;
    }

    const created = await guardWrite('create', `"${issue.summary}"`, () => this.tracker.createIssue(issue));
    await guardWrite('assign', created.key, () => this.tracker.assign(created.key, person));
    const sprintUpdate: FieldUpdate = {};
    sprintUpdate[options.sprintField] = slot.sprint.id;
    await guardWrite('set the sprint of', created.key, () => this.tracker.updateFields(created.key, sprintUpdate));

    this.log.success(`${created.key} created for ${person} in sprint ${slot.sprint.name} week ${slot.week}`);
    return created;
  }
}
