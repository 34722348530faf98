import { Command } from 'commander';
import { StaleOrphanCloser } from './closer.js';
import {
  collectSources,
  loadCloseStaleConfig,
  loadDutyRotationConfig,
  loadUpdateChildrenConfig,
  logLevelFor,
  type ConfigSources,
  type ConnectionConfig,
} from './config.js';
import { DUTY_KINDS, DUTY_TEMPLATES, type DutyKind } from './duties.js';
import { Logger } from './logger.js';
import { DutyRotationPlanner } from './planner.js';
import { ChildTreeReconciler } from './reconciler.js';
import { JiraService } from './services/jira.js';
import type { TrackerClient } from './types.js';
import { ChoreError, errorMessage, exitCodeFor } from './utils/errors.js';

export interface ProgramDeps {
  createTracker?: (config: ConnectionConfig) => TrackerClient;
  env?: NodeJS.ProcessEnv;
  sink?: (line: string) => void;
}

type CommandOptions = Record<string, unknown>;

type Chore<C> = (config: C, tracker: TrackerClient, log: Logger) => Promise<void>;

const DUTY_DESCRIPTIONS: Record<DutyKind, string> = {
  'support-vanguard': 'Create and assign Support Vanguard issues for upcoming sprints',
  'show-and-tell': 'Create and assign Show and Tell issues for upcoming sprints',
};

function withConnectionOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', `YAML settings file (default: ${command.name()}.yaml)`)
    .option('-b, --base-url <url>', 'URL of the Jira instance')
    .option('-u, --username <email>', 'Jira user to log in as')
    .option('-t, --api-token <token>', 'Jira API token (or JIRA_API_TOKEN)')
    .option('--dry-run', 'Show what would change without changing anything')
    .option('--no-dry-run', 'Apply changes even if the settings file asks for a dry run')
    .option('-v, --verbose', 'Show debug output');
}

async function execute<C extends ConnectionConfig>(
  deps: ProgramDeps,
  commandName: string,
  options: CommandOptions,
  load: (sources: ConfigSources) => C,
  chore: Chore<C>
): Promise<void> {
  const sink = deps.sink ?? console.log;
  let log = new Logger('info', sink);

  try {
    const explicitFile = typeof options.config === 'string';
    const fileName = typeof options.config === 'string' ? options.config : `${commandName}.yaml`;
    const config = load(collectSources(fileName, explicitFile, options, deps.env));

    log = new Logger(logLevelFor(config), sink);
    if (config.dry_run) log.info('Dry run: nothing will be changed in Jira');
    log.debug(`Connecting to ${config.base_url} as ${config.username}`);

    const tracker = deps.createTracker ? deps.createTracker(config) : new JiraService(config);
    await chore(config, tracker, log);
  } catch (error) {
    log.error(errorMessage(error));
    if (!(error instanceof ChoreError) && error instanceof Error && error.stack) {
      log.debug(error.stack);
    }
    process.exitCode = exitCodeFor(error);
  }
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();

  program.name('tracker-chores').description('Recurring Jira maintenance chores').version('0.1.0');

  withConnectionOptions(
    program
      .command('close-stale')
      .description('Comment on and close stale issues that have no parent')
      .option('-p, --project-key <key>', 'Jira project key')
      .option('-s, --stale-days <days>', 'Days without update after which an issue is stale')
      .option('--transition-to <status>', 'Transition to apply, e.g. Rejected')
      .option('--max-results <n>', 'Maximum number of issues to process')
  ).action(async (options: CommandOptions) => {
    await execute(deps, 'close-stale', options, loadCloseStaleConfig, async (config, tracker, log) => {
      await new StaleOrphanCloser(tracker, log).run({
        projectKey: config.project_key,
        staleDays: config.stale_days,
        transitionTo: config.transition_to,
        dryRun: config.dry_run,
        maxResults: config.max_results,
      });
    });
  });

  withConnectionOptions(
    program
      .command('update-children')
      .description('Copy components, labels or fix versions of an issue to all of its descendants')
      .option('-i, --issue <key>', 'Key of the root issue')
      .option('-a, --append <fields...>', 'Fields to merge into the children: components, labels, versions')
      .option('-o, --overwrite <fields...>', 'Fields to replace in the children; wins over --append')
      .option('--skip-unchanged', 'Do not write children that already match')
  ).action(async (options: CommandOptions) => {
    await execute(deps, 'update-children', options, loadUpdateChildrenConfig, async (config, tracker, log) => {
      await new ChildTreeReconciler(tracker, log).run({
        rootKey: config.issue,
        overwrite: config.overwrite,
        append: config.append,
        dryRun: config.dry_run,
        skipUnchanged: config.skip_unchanged,
      });
    });
  });

  for (const kind of DUTY_KINDS) {
    withConnectionOptions(
      program
        .command(kind)
        .description(DUTY_DESCRIPTIONS[kind])
        .option('-p, --project-key <key>', 'Jira project key')
        .option('--board-id <id>', 'Scrum board whose sprints are used')
        .option('-e, --epic-key <key>', 'Epic the duty issues are created under')
        .option('--sprint-template <template>', 'Sprint name containing ${sprint_number}')
        .option('--sprint-starting-number <n>', 'Number of the first sprint to fill')
        .option('-q, --people-queue <people...>', 'People to assign, in rotation order')
        .option('--sprint-field <field>', 'Custom field holding the sprint (default: customfield_10020)')
        .option('--info-url <url>', 'Link added to every issue description')
    ).action(async (options: CommandOptions) => {
      await execute(deps, kind, options, loadDutyRotationConfig, async (config, tracker, log) => {
        const report = await new DutyRotationPlanner(tracker, log).run({
          projectKey: config.project_key,
          boardId: config.board_id,
          epicKey: config.epic_key,
          sprintTemplate: config.sprint_template,
          startingNumber: config.sprint_starting_number,
          people: config.people_queue,
          dryRun: config.dry_run,
          sprintField: config.sprint_field,
          template: DUTY_TEMPLATES[kind](config.info_url),
        });
        log.info(
          `${report.assignments.length} duty slot(s) ${config.dry_run ? 'planned' : 'created'}, ` +
            `${report.unassigned.length} person(s) unassigned`
        );
      });
    });
  }

  return program;
}
