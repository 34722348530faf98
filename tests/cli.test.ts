import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createProgram } from '../src/cli.js';
import { FakeTracker, issue, sprint } from './helpers/fake-tracker.js';

const env = {
  JIRA_BASE_URL: 'https://jira.example.com',
  JIRA_USERNAME: 'bot@example.com',
  JIRA_API_TOKEN: 'test-token',
};

describe.sequential('cli', () => {
  let tempDir = '';
  let originalExitCode: typeof process.exitCode;
  let lines: string[] = [];

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(os.tmpdir(), 'tracker-chores-cli-'));
    originalExitCode = process.exitCode;
    process.exitCode = undefined;
    lines = [];
  });

  afterEach(() => {
    process.exitCode = originalExitCode;
    rmSync(tempDir, { recursive: true, force: true });
  });

  function configFile(name: string, content: string[]): string {
    const file = path.join(tempDir, name);
    writeFileSync(file, content.join('\n'));
    return file;
  }

  function run(tracker: FakeTracker, args: string[], environment: NodeJS.ProcessEnv = env) {
    const createTracker = vi.fn(() => tracker);
    const program = createProgram({ createTracker, env: environment, sink: (line) => lines.push(line) });
    return { createTracker, done: program.parseAsync(['node', 'tracker-chores', ...args]) };
  }

  it('updates every child of the root issue', async () => {
    const fake = new FakeTracker()
      .add(issue('ROOT', { labels: ['a'] }), issue('C1'), issue('C2'))
      .link('ROOT', 'C1')
      .link('C1', 'C2');
    const file = configFile('update-children.yaml', ['issue: ROOT', 'overwrite:', '  - labels']);

    await run(fake, ['update-children', '-c', file]).done;

    expect(process.exitCode).toBeUndefined();
    expect(fake.writes).toEqual([
      { method: 'updateFields', key: 'C1', fields: { labels: ['a'] } },
      { method: 'updateFields', key: 'C2', fields: { labels: ['a'] } },
    ]);
  });

  it('exits with 2 when the root issue is missing', async () => {
    const file = configFile('update-children.yaml', ['issue: NOPE-1', 'append: labels']);

    await run(new FakeTracker(), ['update-children', '-c', file]).done;

    expect(process.exitCode).toBe(2);
    expect(lines.some((line) => line.endsWith(' Issue NOPE-1 not found.'))).toBe(true);
  });

  it('exits with 1 before connecting when settings are missing', async () => {
    const { createTracker, done } = run(new FakeTracker(), ['close-stale', '-p', 'OPS'], {});
    await done;

    expect(process.exitCode).toBe(1);
    expect(createTracker).not.toHaveBeenCalled();
  });

  it('plans duty issues from command line flags without writing in a dry run', async () => {
    const fake = new FakeTracker().add(issue('EPIC-1', { type: 'Epic' }));
    fake.sprints = [sprint(10, 'Team 10', '2026-01-05')];

    await run(fake, [
      'support-vanguard',
      '--dry-run',
      '-p',
      'OPS',
      '--board-id',
      '7',
      '-e',
      'EPIC-1',
      '--sprint-template',
      'Team ${sprint_number}',
      '--sprint-starting-number',
      '10',
      '-q',
      'a@example.com',
      'b@example.com',
    ]).done;

    expect(process.exitCode).toBeUndefined();
    expect(fake.writes).toEqual([]);
    expect(fake.sprintRequests).toEqual([{ boardId: 7, states: ['active', 'future'] }]);
  });

  it('lets --no-dry-run override a dry run in the settings file', async () => {
    const fake = new FakeTracker();
    fake.searchResults = [issue('OPS-9')];
    const file = configFile('close-stale.yaml', [
      'dry_run: true',
      'project_key: OPS',
      'stale_days: 60',
      'transition_to: Rejected',
    ]);

    await run(fake, ['close-stale', '-c', file, '--no-dry-run']).done;

    expect(process.exitCode).toBeUndefined();
    expect(fake.writes.map((w) => w.method)).toEqual(['addComment', 'transition']);
  });

  it('exits with 70 on unexpected failures', async () => {
    const fake = new FakeTracker();
    vi.spyOn(fake, 'search').mockRejectedValue(new Error('socket hang up'));
    const file = configFile('close-stale.yaml', ['project_key: OPS', 'stale_days: 60', 'transition_to: Rejected']);

    await run(fake, ['close-stale', '-c', file]).done;

    expect(process.exitCode).toBe(70);
    expect(lines.some((line) => line.endsWith(' socket hang up'))).toBe(true);
  });
});
