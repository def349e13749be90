import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import chalk from 'chalk';
import { shortId } from '@tasktrack/core';
import type { Task } from '@tasktrack/core';
import { TaskSession } from '../src/session.js';

/** Sunday Feb 8 2026 */
const now = new Date(2026, 1, 8, 9, 0);

let session: TaskSession;

function printed(): string[] {
  return vi.mocked(console.log).mock.calls.map(call => String(call[0]));
}

async function run(...lines: string[]): Promise<string[]> {
  vi.mocked(console.log).mockClear();
  for (const line of lines) await session.execute(line);
  return printed();
}

function onlyTask(): Task {
  const [task] = session.store.listSorted();
  if (!task) throw new Error('expected a task');
  return task;
}

beforeEach(() => {
  chalk.level = 0;
  vi.spyOn(console, 'log').mockImplementation(() => {});
  session = new TaskSession({ defaultPriority: 3, verbose: false }, () => now);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('add', () => {
  it('adds a task and reports its short id', async () => {
    const lines = await run('add Buy milk --due tomorrow -p 2 -d "Semi-skimmed"');
    const task = onlyTask();
    expect(lines).toEqual([`Task added successfully! (${shortId(task.id)})`]);
    expect(task).toMatchObject({
      title: 'Buy milk',
      description: 'Semi-skimmed',
      dueDate: '2026-02-09',
      priority: 2,
      completed: false,
    });
  });

  it('defaults to today and the configured priority', async () => {
    session = new TaskSession({ defaultPriority: 4, verbose: false }, () => now);
    await run('add Quick one');
    expect(onlyTask()).toMatchObject({ dueDate: '2026-02-08', priority: 4, description: null });
  });

  it('rejects a blank title', async () => {
    expect(await run('add "   "')).toEqual(['Error: Title must not be empty or whitespace']);
    expect(session.store.size).toBe(0);
  });

  it('rejects a past due date', async () => {
    expect(await run('add Old --due yesterday')).toEqual(['Error: Due date must not be in the past']);
  });

  it('rejects an unknown date', async () => {
    expect(await run('add Vague --due someday')).toEqual(['Error: Due date must be a valid date (yyyy-MM-dd)']);
  });

  it('rejects an out-of-range priority', async () => {
    expect(await run('add Urgent -p 6')).toEqual(['Error: Priority must be an integer between 1 and 5']);
  });
});

describe('list', () => {
  it('says when there are no tasks', async () => {
    expect(await run('list')).toEqual(['No tasks available.']);
  });

  it('lists tasks by due date', async () => {
    await run(
      'add March --due 2026-03-05',
      'add Tomorrow --due tomorrow -p 1',
      'add February --due 2026-02-20 -p 5',
    );
    const [tomorrow, february, march] = session.store.listSorted().map(t => shortId(t.id));
    expect(await run('list')).toEqual([
      `${tomorrow} [ ] P1 Tomorrow  Due: Tomorrow`,
      `${february} [ ] P5 February  Due: 2026-02-20`,
      `${march} [ ] P3 March  Due: 2026-03-05`,
    ]);
  });

  it('prints JSON', async () => {
    await run('add Json task');
    const [json] = await run('list --json');
    expect(JSON.parse(json ?? '')).toEqual([onlyTask()]);
  });
});

describe('edit', () => {
  it('updates fields and keeps the id', async () => {
    await run('add Draft --due tomorrow');
    const before = onlyTask();

    const lines = await run(`edit ${shortId(before.id)} --title "Final version" -p 5 -d Notes`);
    expect(lines).toEqual(['Task updated successfully!']);
    expect(onlyTask()).toEqual({
      id: before.id,
      title: 'Final version',
      description: 'Notes',
      dueDate: '2026-02-09',
      priority: 5,
      completed: false,
    });
  });

  it('clears the description', async () => {
    await run('add Notes -d "some text"');
    await run(`edit ${onlyTask().id} --clear-description`);
    expect(onlyTask().description).toBeNull();
  });

  it('keeps the task when the edit is invalid', async () => {
    await run('add Stable');
    const before = onlyTask();
    expect(await run(`edit ${before.id} -p 0`)).toEqual(['Error: Priority must be an integer between 1 and 5']);
    expect(onlyTask()).toEqual(before);
  });

  it('warns when nothing would change', async () => {
    await run('add Same');
    expect(await run(`edit ${onlyTask().id}`)).toEqual([
      'Nothing to change. Use --title, --description, --due or --priority',
    ]);
  });

  it('reports an unknown id', async () => {
    expect(await run('edit nope --title x')).toEqual(['Could not find task with id nope']);
  });
});

describe('done', () => {
  it('completes a task and is idempotent', async () => {
    await run('add Finish');
    const id = shortId(onlyTask().id);
    expect(await run(`done ${id}`, `done ${id}`)).toEqual([
      `Completed task: ${id}`,
      `Task ${id} is already completed`,
    ]);
    expect(onlyTask().completed).toBe(true);
  });
});

describe('delete', () => {
  it('deletes once, then reports not found', async () => {
    await run('add Remove');
    const id = shortId(onlyTask().id);
    expect(await run(`delete ${id}`, `delete ${id}`)).toEqual([
      `Deleted task: ${id}`,
      `Could not find task with id ${id}`,
    ]);
  });
});

describe('show', () => {
  it('prints every field', async () => {
    await run('add Inspect --due tomorrow -p 2');
    const task = onlyTask();
    expect(await run(`show ${shortId(task.id)}`)).toEqual([
      `ID:          ${task.id}`,
      'Title:       Inspect',
      'Description: None',
      'Due Date:    2026-02-09  Due: Tomorrow',
      'Priority:    2',
      'Completed:   No',
    ]);
  });
});

describe('stats', () => {
  it('counts tasks', async () => {
    await run('add One', 'add Two');
    const [first] = session.store.listSorted();
    await run(`done ${first?.id ?? ''}`);
    expect(await run('stats')).toEqual(['2 task(s): 1 active, 1 completed, 0 overdue']);
  });
});

describe('session control', () => {
  it('exits on exit and quit', async () => {
    expect(await session.execute('exit')).toBe('exit');
    expect(await session.execute('  QUIT ')).toBe('exit');
    expect(await session.execute('list')).toBe('continue');
  });

  it('ignores blank lines', async () => {
    expect(await run('   ')).toEqual([]);
  });

  it('reports unknown commands and keeps going', async () => {
    const lines = await run('frobnicate');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^error: unknown command 'frobnicate'/);
    expect(await session.execute('list')).toBe('continue');
  });

  it('reports a missing argument', async () => {
    expect(await run('done')).toEqual(["error: missing required argument 'taskIds'"]);
  });

  it('reports an unterminated quote', async () => {
    expect(await run('add "oops')).toEqual(['Unterminated quote or escape in command']);
  });

  it('prints help', async () => {
    const lines = await run('help');
    expect(lines.join('\n')).toContain('Add a new task');
  });

  it('keeps separate stores per session', async () => {
    await run('add Mine');
    const other = new TaskSession({ defaultPriority: 3, verbose: false }, () => now);
    expect(other.store.size).toBe(0);
    expect(session.store.size).toBe(1);
  });

  it('runs a piped script until exit', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    input.end('add First\nadd Second\nexit\nadd Never\n');
    await session.run(input, output, false);
    expect(session.store.listSorted().map(t => t.title)).toEqual(['First', 'Second']);
  });
});
